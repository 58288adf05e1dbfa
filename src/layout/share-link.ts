import { createHash } from 'node:crypto';

import type { ShareConfig } from '../config';
import type { LayoutValue } from './update-component-state';

/**
 * Hashes a layout into a short share code.
 *
 * SHAKE-128 over `JSON.stringify(layout)`, hex encoded. `length` is the
 * number of hex characters wanted; odd lengths round down to whole bytes.
 */
export function encodeLayout(layout: LayoutValue, length = 8): string {
  const serialized = layout === undefined ? 'null' : JSON.stringify(layout);

  return createHash('shake128', { outputLength: Math.floor(length / 2) })
    .update(serialized, 'utf8')
    .digest('hex');
}

/**
 * Scheme and host of `url`, plus the `/dash` mount prefix when running
 * behind the production proxy.
 */
export function getUrlBase(url: string, config: ShareConfig): string {
  const parsed = new URL(url);
  const mount = config.onServer ? '/dash' : '';

  return `${parsed.protocol}//${parsed.host}${mount}`;
}

/**
 * Link that reopens the app with the layout stored under `hash`.
 */
export function buildShareUrl(
  url: string,
  hash: string,
  config: ShareConfig
): string {
  return `${getUrlBase(url, config)}/?state=${encodeURIComponent(hash)}`;
}

/**
 * Parses a location search string into a flat record.
 *
 * - Every `?` is stripped first, so both `?a=1` and `a=1` work.
 * - Pairs with an empty value are dropped.
 * - When a key repeats, its first value wins.
 */
export function parseQueryString(qs: string): Record<string, string> {
  const params = new URLSearchParams(qs.replaceAll('?', ''));
  const result: Record<string, string> = {};

  for (const [key, value] of params) {
    if (value === '' || Object.hasOwn(result, key)) continue;
    result[key] = value;
  }

  return result;
}
