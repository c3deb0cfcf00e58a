/**
 * Settings and Manifest Schema Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { parseBuildManifest, parsePackSettings } from '../config/settings.js';
import { ConfigurationError } from '../errors/index.js';

describe('parsePackSettings', () => {
  it('fills in defaults for an empty object', () => {
    const settings = parsePackSettings({});

    assert.equal(settings.packDir, 'pack');
    assert.deepEqual(settings.main, {});
    assert.deepEqual(settings.exclude, []);
    assert.equal(settings.macIconFile, 'icon-mac.png');
    assert.deepEqual(settings.resourceDirs, ['src/pack']);
    assert.equal(settings.expandedClasspath, false);
    assert.equal(settings.jarNameConvention, 'default');
    assert.equal(settings.generateWindowsBatFile, true);
    assert.deepEqual(settings.includeClassifiers, []);
    assert.equal(settings.executableByOthers, true);
    assert.equal(settings.archivePrefix, undefined);
    assert.equal(settings.bashTemplate, undefined);
  });

  it('treats undefined as an empty object', () => {
    assert.equal(parsePackSettings(undefined).packDir, 'pack');
  });

  it('returns a frozen value', () => {
    assert.ok(Object.isFrozen(parsePackSettings({ main: { app: 'com.example.Main' } })));
  });

  it('rejects an unknown naming convention', () => {
    assert.throws(
      () => parsePackSettings({ jarNameConvention: 'short' }),
      (error: unknown) => {
        assert.ok(error instanceof ConfigurationError);
        assert.equal(error.code, 'CONFIGURATION_ERROR');
        assert.equal(error.issues.length, 1);
        assert.equal(error.issues[0]?.path, 'jarNameConvention');
        return true;
      }
    );
  });

  it('rejects unknown keys', () => {
    assert.throws(() => parsePackSettings({ packDirectory: 'out' }), ConfigurationError);
  });
});

describe('parseBuildManifest', () => {
  it('defaults project fields and normalizes a null classifier', () => {
    const manifest = parseBuildManifest({
      name: 'app',
      version: '1.0.0',
      root: 'app',
      projects: {
        app: {
          reports: [{
            configurations: [{
              configuration: 'runtime',
              modules: [{
                module: { organization: 'com.example', name: 'foo', revision: '1.0' },
                artifacts: [{ artifact: { name: 'foo', classifier: null }, file: 'deps/foo-1.0.jar' }],
              }],
            }],
          }],
        },
      },
    });

    assert.equal(manifest.baseDir, '.');
    assert.equal(manifest.targetDir, undefined);
    const app = manifest.projects['app'];
    assert.ok(app);
    assert.deepEqual(app.uses, []);
    assert.deepEqual(app.jars, []);
    assert.deepEqual(app.unmanagedJars, []);
    const artifact = app.reports[0]?.configurations[0]?.modules[0]?.artifacts[0];
    assert.equal(artifact?.artifact.classifier, undefined);
    assert.equal(artifact?.file, 'deps/foo-1.0.jar');
  });

  it('reports missing fields with their paths', () => {
    assert.throws(
      () => parseBuildManifest({ name: 'app', projects: {} }),
      (error: unknown) => {
        assert.ok(error instanceof ConfigurationError);
        assert.deepEqual(error.issues.map((i) => i.path).sort(), ['root', 'version']);
        return true;
      }
    );
  });
});
