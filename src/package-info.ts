import { fileURLToPath } from 'node:url';

import { defineResource } from './resources/definitions';

/**
 * Name the host registry knows this library by. Also the namespace of its
 * assets in the host's distribution tables.
 */
export const PACKAGE_NAME = 'dash_share';

/**
 * Declared version; kept in step with `package.json`.
 */
export const PACKAGE_VERSION = '0.0.1';

/**
 * Installation root of the library.
 *
 * Sources live in `src/` and the bundle in `dist/`, so one level up from
 * either is the directory that also holds `deps/`.
 */
export const LIBRARY_ROOT = fileURLToPath(new URL('..', import.meta.url));

/**
 * The built frontend assets, in load order.
 *
 * The source map is `dynamic`: the host serves it on request and never
 * injects it into the page.
 */
export const PACKAGE_RESOURCES = [
  defineResource({
    relativePath: 'dash_share.min.js',
    kind: 'script'
  }),
  defineResource({
    relativePath: 'dash_share.min.js.map',
    dynamic: true,
    kind: 'script'
  })
] as const;
