import fs from 'node:fs';
import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import {
  assertResourcesExist,
  resolveResourceDir,
  resolveResourcePath
} from '../../src/resources/resolve';
import { normalizePackageDescriptor } from '../../src/resources/definitions';
import { ResourceDirectoryNotFoundError } from '../../src/errors';
import {
  type LibraryRootFixture,
  createLibraryRoot
} from '../helpers/library-root';

describe('resolveResourceDir', () => {
  let fixture: LibraryRootFixture | undefined;

  afterEach(() => {
    fixture?.cleanup();
    fixture = undefined;
  });

  it('yields the same absolute path on every call', () => {
    const current = createLibraryRoot();
    fixture = current;

    const first = resolveResourceDir(current.root);
    const second = resolveResourceDir(current.root);

    expect(first).toBe(second);
    expect(path.isAbsolute(first)).toBe(true);
    expect(first).toBe(fs.realpathSync(current.depsDir));
  });

  it('resolves relative library roots against the working directory', () => {
    const current = createLibraryRoot();
    fixture = current;
    const relativeRoot = path.relative(process.cwd(), current.root);

    expect(resolveResourceDir(relativeRoot)).toBe(
      resolveResourceDir(current.root)
    );
  });

  it('reports the missing directory', () => {
    const current = createLibraryRoot([], { withDeps: false });
    fixture = current;

    let caught: unknown;
    try {
      resolveResourceDir(current.root);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ResourceDirectoryNotFoundError);
    expect(caught).toMatchObject({
      name: 'ResourceDirectoryNotFoundError',
      path: current.depsDir
    });
  });

  it('rejects a deps entry that is a file', () => {
    const current = createLibraryRoot([], { withDeps: false });
    fixture = current;
    fs.writeFileSync(current.depsDir, '');

    expect(() => resolveResourceDir(current.root)).toThrow(
      ResourceDirectoryNotFoundError
    );
  });
});

describe('resolveResourcePath', () => {
  const resourceDir = path.resolve('/srv/app/deps');

  it('joins paths inside the resource directory', () => {
    expect(resolveResourcePath(resourceDir, 'dash_share.min.js')).toBe(
      path.join(resourceDir, 'dash_share.min.js')
    );
    expect(resolveResourcePath(resourceDir, 'maps/bundle.js.map')).toBe(
      path.join(resourceDir, 'maps', 'bundle.js.map')
    );
  });

  it('refuses paths leaving the resource directory', () => {
    expect(resolveResourcePath(resourceDir, '../package.json')).toBeUndefined();
    expect(resolveResourcePath(resourceDir, '..')).toBeUndefined();
    expect(resolveResourcePath(resourceDir, '/etc/passwd')).toBeUndefined();
  });

  it('refuses the directory itself', () => {
    expect(resolveResourcePath(resourceDir, '.')).toBeUndefined();
  });

  it('accepts file names starting with two dots', () => {
    expect(resolveResourcePath(resourceDir, '..hidden.js')).toBe(
      path.join(resourceDir, '..hidden.js')
    );
  });
});

describe('assertResourcesExist', () => {
  let fixture: LibraryRootFixture | undefined;

  afterEach(() => {
    fixture?.cleanup();
    fixture = undefined;
  });

  const describePackage = (resourceDir: string, paths: string[]) =>
    normalizePackageDescriptor({
      name: 'dash_share',
      resourceDir,
      version: '0.0.1',
      resources: paths.map(relativePath => ({
        relativePath,
        kind: 'script' as const
      }))
    });

  it('accepts a package whose assets are all present', () => {
    const current = createLibraryRoot();
    fixture = current;
    const descriptor = describePackage(current.depsDir, [
      'dash_share.min.js',
      'dash_share.min.js.map'
    ]);

    expect(() => assertResourcesExist(descriptor)).not.toThrow();
  });

  it('names the first missing asset', () => {
    const current = createLibraryRoot(['dash_share.min.js']);
    fixture = current;
    const descriptor = describePackage(current.depsDir, [
      'dash_share.min.js',
      'dash_share.min.js.map'
    ]);
    const missing = path.join(current.depsDir, 'dash_share.min.js.map');

    expect(() => assertResourcesExist(descriptor)).toThrow(
      `[assertResourcesExist] Resource '${missing}' of package 'dash_share' does not exist.`
    );
  });

  it('treats a directory in place of an asset as missing', () => {
    const current = createLibraryRoot(['dash_share.min.js']);
    fixture = current;
    fs.mkdirSync(path.join(current.depsDir, 'dash_share.min.js.map'));
    const descriptor = describePackage(current.depsDir, [
      'dash_share.min.js.map'
    ]);

    expect(() => assertResourcesExist(descriptor)).toThrow(
      ResourceDirectoryNotFoundError
    );
  });

  it('rejects assets outside the resource directory', () => {
    const current = createLibraryRoot();
    fixture = current;
    fs.writeFileSync(path.join(current.root, 'outside.js'), '');
    const descriptor = describePackage(current.depsDir, ['../outside.js']);

    expect(() => assertResourcesExist(descriptor)).toThrow(
      `[assertResourcesExist] Resource '../outside.js' of package 'dash_share' is outside '${current.depsDir}'.`
    );
  });
});
