/**
 * Module Identity Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  compareModules,
  createModuleIdentity,
  defaultJarName,
  formatModule,
  fullJarName,
  moduleKey,
  noVersionJarName,
  originalJarName,
  resolveJarName,
  type ModuleIdentity,
} from '../types/module.js';

const foo = createModuleIdentity({
  organization: 'com.example',
  name: 'foo',
  revision: '1.0',
  originalFileName: 'foo_2.13-1.0.jar',
});

const fooSources = createModuleIdentity({
  organization: 'com.example',
  name: 'foo',
  revision: '1.0',
  classifier: 'sources',
  originalFileName: 'foo-1.0-sources.jar',
});

describe('Module Identity', () => {
  describe('jar names', () => {
    it('default: name-revision.jar', () => {
      assert.equal(defaultJarName(foo), 'foo-1.0.jar');
      assert.equal(defaultJarName(fooSources), 'foo-1.0-sources.jar');
    });

    it('full: organization.name-revision.jar', () => {
      assert.equal(fullJarName(foo), 'com.example.foo-1.0.jar');
      assert.equal(fullJarName(fooSources), 'com.example.foo-1.0-sources.jar');
    });

    it('no-version: organization.name.jar', () => {
      assert.equal(noVersionJarName(foo), 'com.example.foo.jar');
      assert.equal(noVersionJarName(fooSources), 'com.example.foo-sources.jar');
    });

    it('original: the upstream file name', () => {
      assert.equal(originalJarName(foo), 'foo_2.13-1.0.jar');
    });

    it('resolveJarName dispatches on the convention', () => {
      assert.equal(resolveJarName(foo, 'default'), 'foo-1.0.jar');
      assert.equal(resolveJarName(foo, 'original'), 'foo_2.13-1.0.jar');
      assert.equal(resolveJarName(foo, 'full'), 'com.example.foo-1.0.jar');
      assert.equal(resolveJarName(foo, 'no-version'), 'com.example.foo.jar');
    });
  });

  it('formats as organization:name:revision[-classifier]', () => {
    assert.equal(formatModule(foo), 'com.example:foo:1.0');
    assert.equal(formatModule(fooSources), 'com.example:foo:1.0-sources');
  });

  it('is frozen and omits an undefined classifier', () => {
    const id = createModuleIdentity({
      organization: 'o',
      name: 'n',
      revision: '1',
      classifier: undefined,
      originalFileName: 'n-1.jar',
    });
    assert.ok(Object.isFrozen(id));
    assert.equal('classifier' in id, false);
  });

  describe('ordering', () => {
    const make = (organization: string, name: string, revision: string, classifier?: string): ModuleIdentity =>
      createModuleIdentity({ organization, name, revision, classifier, originalFileName: `${name}.jar` });

    it('sorts by organization, name, revision, then classifier', () => {
      const modules = [
        make('org.b', 'a', '1'),
        make('org.a', 'z', '1'),
        make('org.a', 'b', '2'),
        make('org.a', 'b', '1', 'tests'),
        make('org.a', 'b', '1'),
        make('org.a', 'b', '1', 'javadoc'),
      ];

      const sorted = [...modules].sort(compareModules).map(formatModule);

      assert.deepEqual(sorted, [
        'org.a:b:1',
        'org.a:b:1-javadoc',
        'org.a:b:1-tests',
        'org.a:b:2',
        'org.a:z:1',
        'org.b:a:1',
      ]);
    });

    it('treats identities that differ only in file name as equal', () => {
      const a = createModuleIdentity({ organization: 'o', name: 'n', revision: '1', originalFileName: 'x.jar' });
      const b = createModuleIdentity({ organization: 'o', name: 'n', revision: '1', originalFileName: 'y.jar' });
      assert.equal(compareModules(a, b), 0);
      assert.equal(moduleKey(a), moduleKey(b));
      assert.notEqual(moduleKey(a), moduleKey(fooSources));
    });
  });
});
