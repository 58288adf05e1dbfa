import type { SetOptional, Simplify } from 'type-fest';

/**
 * Kind of a built frontend asset.
 *
 * - `"script"`: injected as a `<script>` tag (the host's JS distribution).
 * - `"stylesheet"`: injected as a `<link rel="stylesheet">` (the host's CSS distribution).
 */
export type ResourceKind = 'script' | 'stylesheet';

/**
 * One static asset advertised to the host, plus its load-time hints.
 *
 * Load hints are plain booleans once normalized:
 * - `dynamic: true` means the host may fetch the asset lazily
 *   (e.g. a source map, requested only when devtools ask for it).
 * - `async: true` means the host loads the asset without blocking render.
 *
 * `externalUrl` and `relativePath` are both informative; the host decides
 * which one to serve from.
 */
export type ResourceDescriptor = {
  /**
   * Path of the built asset relative to the package's `resourceDir`.
   */
  readonly relativePath: string;
  readonly externalUrl?: string;
  readonly dynamic: boolean;
  readonly async: boolean;
  readonly kind: ResourceKind;
};

/**
 * Authored resource shape.
 *
 * Load hints may be omitted at the definition site; absent means `false`.
 */
export type ResourceDescriptorInput = Simplify<
  SetOptional<ResourceDescriptor, 'dynamic' | 'async'>
>;

/**
 * The registration unit handed to the host: identity, location on disk,
 * and the ordered asset list.
 *
 * Once registered a descriptor is frozen and never mutated.
 */
export type PackageDescriptor = {
  /**
   * Identifier within the host registry's namespace.
   */
  readonly name: string;
  /**
   * Absolute, symlink-resolved directory the assets are served from.
   */
  readonly resourceDir: string;
  /**
   * Semantic version string; hosts use it to cache-bust served assets.
   */
  readonly version: string;
  /**
   * Load order.
   */
  readonly resources: ReadonlyArray<ResourceDescriptor>;
};

export type PackageDescriptorInput = Simplify<
  Omit<PackageDescriptor, 'resources'> & {
    resources: ReadonlyArray<ResourceDescriptorInput>;
  }
>;

/**
 * What a registry does when a package name is registered a second time.
 *
 * - `"reject"`: warn, then throw `DuplicateRegistrationError`. The first entry stays.
 * - `"overwrite"`: replace the entry with the new descriptor.
 * - `"ignore"`: warn and keep the first entry.
 *
 * No policy ever leaves two live entries for one name.
 */
export type DuplicatePolicy = 'reject' | 'overwrite' | 'ignore';

/**
 * The host-side registry a component library registers with.
 *
 * The bootstrapper only ever calls `register`, once. The read operations
 * exist for the host's asset pipeline (and for tests asserting on it).
 */
export interface HostRegistry {
  /**
   * Adds a package. Throws when the registry refuses it.
   */
  register(descriptor: PackageDescriptor): void;
  lookup(name: string): PackageDescriptor | undefined;
}
