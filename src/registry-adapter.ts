import type { PackageDescriptor, ResourceDescriptor } from './types';

/**
 * One row of the host framework's resource tables.
 *
 * Field names follow the host's wire format (snake_case), so the rows can be
 * serialized into the host's component-suite metadata as they are.
 */
export type DashResourceEntry = {
  relative_package_path: string;
  namespace: string;
  external_url?: string;
  dynamic?: true;
  async?: true;
};

/**
 * The host's per-package distribution tables.
 *
 * - `_js_dist`: scripts, injected in order.
 * - `_css_dist`: stylesheets, injected in order.
 */
export type DashDistribution = {
  _js_dist: DashResourceEntry[];
  _css_dist: DashResourceEntry[];
};

/**
 * Converts one normalized resource into a host table row.
 *
 * Inclusion rule:
 * - Load hints are emitted only when `true`; the host reads a missing flag
 *   as `false`.
 * - `external_url` is emitted only when the resource declares one.
 */
function toDashResourceEntry(
  namespace: string,
  resource: ResourceDescriptor
): DashResourceEntry {
  const entry: DashResourceEntry = {
    relative_package_path: resource.relativePath,
    namespace
  };

  if (resource.externalUrl !== undefined) {
    entry.external_url = resource.externalUrl;
  }
  if (resource.dynamic) entry.dynamic = true;
  if (resource.async) entry.async = true;

  return entry;
}

/**
 * Projects a package descriptor onto the host's distribution tables.
 *
 * Context:
 * - Registration (`HostRegistry.register`) carries the full descriptor.
 * - Hosts that consume resource tables instead of descriptors (the shape a
 *   component suite exposes to the page renderer) need this flattened view.
 *
 * Scripts and stylesheets are split by `kind`; the relative order of each
 * table matches the descriptor's load order. The package name becomes every
 * row's `namespace`.
 *
 * @param descriptor - A normalized package descriptor.
 * @returns Fresh tables; the descriptor is not touched.
 */
export function toDashDistribution(
  descriptor: PackageDescriptor
): DashDistribution {
  const distribution: DashDistribution = { _js_dist: [], _css_dist: [] };

  for (const resource of descriptor.resources) {
    const entry = toDashResourceEntry(descriptor.name, resource);

    if (resource.kind === 'stylesheet') {
      distribution._css_dist.push(entry);
    } else {
      distribution._js_dist.push(entry);
    }
  }

  return distribution;
}
