import type { DuplicatePolicy, HostRegistry, PackageDescriptor } from './types';
import { DuplicateRegistrationError } from './errors';
import { type Logger, defaultLogger } from './logger';
import { resolveResourcePath } from './resources/resolve';

export type HostRegistryOptions = {
  /**
   * Behavior when a name is registered twice. Defaults to `"reject"`.
   */
  onDuplicate?: DuplicatePolicy;
  logger?: Logger;
};

/**
 * In-process registry with the read side a host's asset pipeline needs.
 */
export interface InMemoryHostRegistry extends HostRegistry {
  /**
   * Registered packages, in registration order.
   */
  packages(): PackageDescriptor[];
  /**
   * Absolute path of a declared asset of a registered package.
   *
   * Only paths listed in the package's resource table resolve; anything else
   * (unknown package, undeclared file) yields `undefined`.
   */
  resolveAsset(name: string, relativePath: string): string | undefined;
}

/**
 * Creates a process-local package registry.
 *
 * Entries are keyed by package name. The duplicate policy decides what a
 * second `register` for a known name does; none of them produce two entries.
 */
export function createHostRegistry(
  options: HostRegistryOptions = {}
): InMemoryHostRegistry {
  const { onDuplicate = 'reject', logger = defaultLogger } = options;
  const entries = new Map<string, PackageDescriptor>();

  function register(descriptor: PackageDescriptor): void {
    const existing = entries.get(descriptor.name);
    if (!existing) {
      entries.set(descriptor.name, descriptor);
      return;
    }

    const incoming = `${descriptor.name}@${descriptor.version}`;
    const current = `${existing.name}@${existing.version}`;

    switch (onDuplicate) {
      case 'overwrite':
        logger.info(
          `[HostRegistry.register] Replacing '${current}' with '${incoming}'.`
        );
        // Map.set on an existing key keeps the original insertion position.
        entries.set(descriptor.name, descriptor);
        return;
      case 'ignore':
        logger.warn(
          `[HostRegistry.register] Skipped: '${incoming}' is already registered as '${current}'.`
        );
        return;
      case 'reject': {
        const message = `[HostRegistry.register] Package '${incoming}' is already registered as '${current}'.`;
        logger.warn(message);
        throw new DuplicateRegistrationError(message, descriptor.name);
      }
    }
  }

  function lookup(name: string): PackageDescriptor | undefined {
    return entries.get(name);
  }

  function packages(): PackageDescriptor[] {
    return [...entries.values()];
  }

  function resolveAsset(
    name: string,
    relativePath: string
  ): string | undefined {
    const descriptor = entries.get(name);
    if (!descriptor) return undefined;

    const declared = descriptor.resources.some(
      resource => resource.relativePath === relativePath
    );
    if (!declared) return undefined;

    return resolveResourcePath(descriptor.resourceDir, relativePath);
  }

  return { register, lookup, packages, resolveAsset };
}
