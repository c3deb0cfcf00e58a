/**
 * Project Graph Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ManifestError, type ProjectDescriptor } from '@jarpack/core';

import { collectProjects } from '../projectGraph.js';

function project(...uses: string[]): ProjectDescriptor {
  return { uses, jars: [], unmanagedJars: [], reports: [] };
}

const names = (selected: { name: string }[]): string[] => selected.map((p) => p.name);

describe('collectProjects', () => {
  it('walks depth-first from the root in declaration order', () => {
    const projects = {
      root: project('web', 'cli'),
      web: project('core'),
      cli: project('core', 'util'),
      core: project('util'),
      util: project(),
      unrelated: project(),
    };

    assert.deepEqual(names(collectProjects({ root: 'root', projects })), ['root', 'web', 'core', 'util', 'cli']);
  });

  it('drops excluded projects but keeps what they use', () => {
    const projects = {
      root: project('docs'),
      docs: project('core'),
      core: project(),
    };

    assert.deepEqual(names(collectProjects({ root: 'root', projects }, ['docs'])), ['root', 'core']);
  });

  it('can exclude the root itself', () => {
    const projects = { root: project('core'), core: project() };

    assert.deepEqual(names(collectProjects({ root: 'root', projects }, ['root'])), ['core']);
  });

  it('terminates on cyclic references', () => {
    const projects = { a: project('b'), b: project('a') };

    assert.deepEqual(names(collectProjects({ root: 'a', projects })), ['a', 'b']);
  });

  it('rejects references to undefined projects', () => {
    assert.throws(
      () => collectProjects({ root: 'root', projects: { root: project('ghost') } }),
      (error: unknown) => {
        assert.ok(error instanceof ManifestError);
        assert.equal(error.message, 'Project root uses unknown project ghost');
        return true;
      }
    );
    assert.throws(() => collectProjects({ root: 'missing', projects: {} }), ManifestError);
  });
});
