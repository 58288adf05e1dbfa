import * as semver from 'semver';
import { z } from 'zod';

import type {
  PackageDescriptor,
  PackageDescriptorInput,
  ResourceDescriptor,
  ResourceDescriptorInput
} from '../types';
import { InvalidPackageDescriptorError } from '../errors';

// =============================================================================
// Schemas
// =============================================================================

/**
 * Runtime shape of a resource entry.
 *
 * Normalization:
 * - `dynamic` / `async` default to `false`, so registered descriptors always
 *   carry explicit booleans regardless of how they were authored.
 * - `externalUrl` stays absent when not given.
 */
const resourceDescriptorSchema = z.object({
  relativePath: z.string().min(1, 'relative path must not be empty'),
  externalUrl: z.string().url().optional(),
  dynamic: z.boolean().default(false),
  async: z.boolean().default(false),
  kind: z.enum(['script', 'stylesheet'])
});

/**
 * Runtime shape of a package descriptor.
 *
 * The version check compares `semver.valid(version)` against the input
 * verbatim: `"v0.0.1"` or `" 0.0.1"` are cleaned up by semver and therefore
 * rejected instead of being registered under a different string.
 */
const packageDescriptorSchema = z.object({
  name: z.string().min(1, 'package name must not be empty'),
  resourceDir: z.string().min(1, 'resource directory must not be empty'),
  version: z
    .string()
    .refine(version => semver.valid(version) === version, {
      message: 'version must be a semantic version string'
    }),
  resources: z.array(resourceDescriptorSchema)
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
}

// =============================================================================
// Typed checkpoints
// =============================================================================

/**
 * Typed checkpoint for a single resource entry.
 *
 * Runtime: no-op (returns input unchanged). Normalization happens once, in
 * `normalizePackageDescriptor`, when the whole package is assembled.
 */
export function defineResource(
  resource: ResourceDescriptorInput
): ResourceDescriptorInput {
  return resource;
}

// =============================================================================
// Normalization
// =============================================================================

/**
 * Validates an authored package descriptor and returns the frozen,
 * normalized descriptor handed to the host.
 *
 * Steps:
 * 1) Schema check of identity fields and every resource entry.
 * 2) Load hints normalized to booleans (see `resourceDescriptorSchema`).
 * 3) Resources frozen one by one, then the list, then the descriptor itself.
 *
 * Existence of `resourceDir` and of the assets is not checked here; that is
 * the filesystem step in `resolve.ts`.
 *
 * @throws InvalidPackageDescriptorError listing every failing field.
 */
export function normalizePackageDescriptor(
  input: PackageDescriptorInput
): PackageDescriptor {
  const result = packageDescriptorSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidPackageDescriptorError(
      `Invalid package descriptor "${input.name}": ${formatIssues(result.error)}`,
      result.error
    );
  }

  const { name, resourceDir, version } = result.data;
  const resources: ReadonlyArray<ResourceDescriptor> = Object.freeze(
    result.data.resources.map(resource => Object.freeze(resource))
  );

  return Object.freeze({ name, resourceDir, version, resources });
}
