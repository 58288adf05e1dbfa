export type {
  DuplicatePolicy,
  HostRegistry,
  PackageDescriptor,
  PackageDescriptorInput,
  ResourceDescriptor,
  ResourceDescriptorInput,
  ResourceKind
} from './types';
export type { Logger } from './logger';
export type { ShareConfig } from './config';

export {
  DuplicateRegistrationError,
  InvalidPackageDescriptorError,
  ResourceDirectoryNotFoundError
} from './errors';

export {
  type BootstrapOptions,
  type BootstrapState,
  type Bootstrapper,
  createBootstrapper,
  createPackageDescriptor
} from './bootstrap';
export {
  type HostRegistryOptions,
  type InMemoryHostRegistry,
  createHostRegistry
} from './host-registry';
export {
  type DashDistribution,
  type DashResourceEntry,
  toDashDistribution
} from './registry-adapter';

export {
  defineResource,
  normalizePackageDescriptor
} from './resources/definitions';
export {
  RESOURCE_DIR_NAME,
  assertResourcesExist,
  resolveResourceDir,
  resolveResourcePath
} from './resources/resolve';
export { PACKAGE_NAME, PACKAGE_RESOURCES, PACKAGE_VERSION } from './package-info';

export { loadShareConfig } from './config';
export {
  type ComponentStateUpdates,
  type LayoutNode,
  type LayoutValue,
  normalizeComponentId,
  updateComponentState
} from './layout/update-component-state';
export {
  buildShareUrl,
  encodeLayout,
  getUrlBase,
  parseQueryString
} from './layout/share-link';
