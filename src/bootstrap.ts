import type { HostRegistry, PackageDescriptor } from './types';
import { type Logger, defaultLogger } from './logger';
import {
  LIBRARY_ROOT,
  PACKAGE_NAME,
  PACKAGE_RESOURCES,
  PACKAGE_VERSION
} from './package-info';
import { normalizePackageDescriptor } from './resources/definitions';
import { assertResourcesExist, resolveResourceDir } from './resources/resolve';

export type BootstrapState = 'unregistered' | 'registered';

export type BootstrapOptions = {
  /**
   * The host's registry. Receives exactly one `register` call.
   */
  registry: HostRegistry;
  /**
   * Directory containing `deps/`. Defaults to this library's installation root.
   */
  libraryRoot?: string;
  logger?: Logger;
};

export interface Bootstrapper {
  /**
   * Registers the library's assets with the host.
   *
   * Meant to be called from the host's start-up sequence. Calling it again
   * after a successful registration does nothing.
   *
   * @throws ResourceDirectoryNotFoundError when `deps/` or one of its assets is missing.
   * @throws DuplicateRegistrationError when the registry rejects the package name.
   */
  initialize(): void;
  readonly state: BootstrapState;
}

/**
 * Builds the descriptor this library registers: name, resolved `deps/`
 * directory, version and the literal resource table.
 *
 * @throws ResourceDirectoryNotFoundError when the directory or an asset is missing.
 */
export function createPackageDescriptor(
  libraryRoot: string = LIBRARY_ROOT
): PackageDescriptor {
  const descriptor = normalizePackageDescriptor({
    name: PACKAGE_NAME,
    resourceDir: resolveResourceDir(libraryRoot),
    version: PACKAGE_VERSION,
    resources: PACKAGE_RESOURCES
  });

  assertResourcesExist(descriptor);

  return descriptor;
}

/**
 * Creates the bootstrapper that advertises this library's frontend bundle.
 *
 * Lifecycle:
 * - `unregistered` → `registered`, once. There is no way back.
 * - Any failure propagates and leaves the state `unregistered`; nothing is
 *   retried.
 */
export function createBootstrapper(options: BootstrapOptions): Bootstrapper {
  const { registry, libraryRoot = LIBRARY_ROOT, logger = defaultLogger } =
    options;
  let state: BootstrapState = 'unregistered';

  function initialize(): void {
    if (state === 'registered') return;

    const descriptor = createPackageDescriptor(libraryRoot);
    registry.register(descriptor);
    state = 'registered';

    logger.info(
      `[Bootstrapper.initialize] Registered '${descriptor.name}@${descriptor.version}' from '${descriptor.resourceDir}'.`
    );
  }

  return {
    initialize,
    get state() {
      return state;
    }
  };
}
