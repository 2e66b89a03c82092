// Dotted attribute path lookup over ConfigValue maps

import type { ConfigValue } from '../../models/config-value.js';
import type { AttributePath } from '../../models/drift.js';

/**
 * Outcome of a path lookup. Absence is a normal result, not an error.
 */
export type Resolution =
  | { readonly found: true; readonly value: ConfigValue }
  | { readonly found: false };

const NOT_FOUND: Resolution = Object.freeze({ found: false });

/**
 * Splits a dotted path into its map-key segments
 */
export function splitPath(path: AttributePath): string[] {
  return path.split('.');
}

/**
 * Resolves `path` against `tree`, descending through map nodes only.
 *
 * Lists are never indexed: a list-valued attribute is addressed as a
 * whole and compared with multiset semantics. A list or scalar met
 * before the last segment means the attribute is absent.
 */
export function resolvePath(tree: ConfigValue, path: AttributePath): Resolution {
  if (path === '') {
    return NOT_FOUND;
  }

  let current = tree;
  for (const segment of splitPath(path)) {
    if (current.kind !== 'map') {
      return NOT_FOUND;
    }
    const next = current.entries.get(segment);
    if (next === undefined) {
      return NOT_FOUND;
    }
    current = next;
  }

  return { found: true, value: current };
}
