/**
 * Error Class Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  ArchiveError,
  ConfigurationError,
  JarpackError,
  PackIOError,
  TemplateRenderError,
  withIO,
} from '../errors/index.js';

describe('Errors', () => {
  it('PackIOError names the operation and path and keeps the cause', () => {
    const cause = new Error('ENOENT: no such file');
    const error = new PackIOError('copy', '/deps/a.jar', cause);

    assert.ok(error instanceof JarpackError);
    assert.equal(error.name, 'PackIOError');
    assert.equal(error.code, 'PACK_IO_ERROR');
    assert.equal(error.message, 'Failed to copy /deps/a.jar: ENOENT: no such file');
    assert.equal(error.cause, cause);
    assert.deepEqual(error.details, { operation: 'copy', path: '/deps/a.jar' });
  });

  it('ConfigurationError joins issues into its message', () => {
    const error = new ConfigurationError('pack settings', [
      { path: 'packDir', message: 'Required' },
      { path: '', message: 'bad' },
    ]);
    assert.equal(error.message, 'Invalid pack settings: packDir: Required; bad');
  });

  it('TemplateRenderError and ArchiveError carry their codes', () => {
    assert.equal(new TemplateRenderError('launch.mustache', 'boom').code, 'TEMPLATE_RENDER_ERROR');
    assert.equal(new TemplateRenderError('launch.mustache', 'boom').message, 'Failed to render template launch.mustache: boom');
    assert.equal(new ArchiveError('a.tar.gz', new Error('disk full')).code, 'ARCHIVE_ERROR');
  });

  describe('withIO', () => {
    it('passes the result through', async () => {
      assert.equal(await withIO('read', '/x', async () => 42), 42);
    });

    it('wraps plain errors in PackIOError', async () => {
      await assert.rejects(
        withIO('write', '/x/y', async () => {
          throw new Error('EACCES');
        }),
        (error: unknown) => {
          assert.ok(error instanceof PackIOError);
          assert.equal(error.operation, 'write');
          assert.equal(error.path, '/x/y');
          return true;
        }
      );
    });

    it('rethrows jarpack errors unchanged', async () => {
      const original = new TemplateRenderError('t', 'x');
      await assert.rejects(
        withIO('write', '/x', async () => {
          throw original;
        }),
        (error: unknown) => error === original
      );
    });
  });
});
