import { realpathSync, statSync } from 'node:fs';
import path from 'node:path';

import type { PackageDescriptor } from '../types';
import { ResourceDirectoryNotFoundError } from '../errors';

/**
 * Directory, relative to the library root, holding the built frontend assets.
 */
export const RESOURCE_DIR_NAME = 'deps';

/**
 * Resolves `<libraryRoot>/deps` to an absolute, symlink-free path.
 *
 * Deterministic: the same root yields the same path for the lifetime of the
 * process (nothing is cached, the filesystem answer is simply stable).
 *
 * @param libraryRoot - Installation directory of the library.
 * @throws ResourceDirectoryNotFoundError when the directory is missing or is not a directory.
 */
export function resolveResourceDir(libraryRoot: string): string {
  const candidate = path.resolve(libraryRoot, RESOURCE_DIR_NAME);

  let resolved: string;
  try {
    resolved = realpathSync(candidate);
  } catch (error) {
    throw new ResourceDirectoryNotFoundError(
      `[resolveResourceDir] Resource directory '${candidate}' does not exist.`,
      candidate,
      error
    );
  }

  if (!statSync(resolved).isDirectory()) {
    throw new ResourceDirectoryNotFoundError(
      `[resolveResourceDir] Resource path '${resolved}' is not a directory.`,
      resolved
    );
  }

  return resolved;
}

/**
 * Joins an asset path onto its resource directory.
 *
 * Returns `undefined` for paths that leave `resourceDir` (`../x`, absolute
 * paths) or that point at the directory itself.
 */
export function resolveResourcePath(
  resourceDir: string,
  relativePath: string
): string | undefined {
  const assetPath = path.resolve(resourceDir, relativePath);
  const fromDir = path.relative(resourceDir, assetPath);

  if (
    fromDir === '' ||
    fromDir === '..' ||
    fromDir.startsWith(`..${path.sep}`) ||
    path.isAbsolute(fromDir)
  ) {
    return undefined;
  }

  return assetPath;
}

/**
 * Checks that every declared asset is a regular file inside `resourceDir`.
 *
 * Runs before registration so the host never receives a package it cannot
 * serve.
 *
 * @throws ResourceDirectoryNotFoundError naming the first missing or escaping asset.
 */
export function assertResourcesExist(descriptor: PackageDescriptor): void {
  for (const resource of descriptor.resources) {
    const assetPath = resolveResourcePath(
      descriptor.resourceDir,
      resource.relativePath
    );

    if (!assetPath) {
      throw new ResourceDirectoryNotFoundError(
        `[assertResourcesExist] Resource '${resource.relativePath}' of package '${descriptor.name}' is outside '${descriptor.resourceDir}'.`,
        path.resolve(descriptor.resourceDir, resource.relativePath)
      );
    }

    const stats = statSync(assetPath, { throwIfNoEntry: false });
    if (!stats?.isFile()) {
      throw new ResourceDirectoryNotFoundError(
        `[assertResourcesExist] Resource '${assetPath}' of package '${descriptor.name}' does not exist.`,
        assetPath
      );
    }
  }
}
