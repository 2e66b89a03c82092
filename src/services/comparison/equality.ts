/**
 * Equality Engine
 *
 * Deep structural equality over ConfigValue:
 * - null equals only null
 * - scalars are equal when kind and value match
 * - maps are equal when they hold the same key set and equal values per key
 * - lists are compared as multisets: order is ignored, multiplicity is not
 */

import type { ConfigValue, ListValue, MapValue } from '../../models/config-value.js';
import type { ListMatching } from '../../models/drift.js';

export interface EqualityOptions {
  /**
   * How list elements are paired up.
   * `bipartite` searches for a perfect matching with augmenting paths;
   * `greedy` pairs each left element with the first unused equal right
   * element. Defaults to `bipartite`.
   */
  listMatching?: ListMatching;
}

/**
 * Pairs elements of `left` with distinct elements of `right`.
 * Returns the index in `right` matched to each index in `left`, or null
 * when no complete pairing exists.
 */
export type ListMatcher = <T>(
  left: readonly T[],
  right: readonly T[],
  equals: (a: T, b: T) => boolean
) => number[] | null;

export function configEquals(a: ConfigValue, b: ConfigValue, options: EqualityOptions = {}): boolean {
  const matcher = options.listMatching === 'greedy' ? matchGreedy : matchBipartite;
  return valuesEqual(a, b, matcher);
}

function valuesEqual(a: ConfigValue, b: ConfigValue, matcher: ListMatcher): boolean {
  switch (a.kind) {
    case 'null':
      return b.kind === 'null';
    case 'bool':
      return b.kind === 'bool' && b.value === a.value;
    case 'number':
      return b.kind === 'number' && b.value === a.value;
    case 'string':
      return b.kind === 'string' && b.value === a.value;
    case 'map':
      return b.kind === 'map' && mapsEqual(a, b, matcher);
    case 'list':
      return b.kind === 'list' && listsEqual(a, b, matcher);
  }
}

function mapsEqual(a: MapValue, b: MapValue, matcher: ListMatcher): boolean {
  if (a.entries.size !== b.entries.size) {
    return false;
  }

  for (const [key, left] of a.entries) {
    const right = b.entries.get(key);
    if (right === undefined || !valuesEqual(left, right, matcher)) {
      return false;
    }
  }

  return true;
}

function listsEqual(a: ListValue, b: ListValue, matcher: ListMatcher): boolean {
  if (a.items.length !== b.items.length) {
    return false;
  }
  if (a.items.length === 0) {
    return true;
  }
  return matcher(a.items, b.items, (x, y) => valuesEqual(x, y, matcher)) !== null;
}

/**
 * Left-to-right first-fit matching.
 */
export function matchGreedy<T>(
  left: readonly T[],
  right: readonly T[],
  equals: (a: T, b: T) => boolean
): number[] | null {
  if (left.length !== right.length) return null;

  const used = new Array<boolean>(right.length).fill(false);
  const assignment: number[] = [];

  for (const item of left) {
    let matched = -1;
    for (let j = 0; j < right.length; j++) {
      if (!used[j] && equals(item, right[j])) {
        matched = j;
        break;
      }
    }
    if (matched === -1) {
      return null;
    }
    used[matched] = true;
    assignment.push(matched);
  }

  return assignment;
}

/**
 * Maximum bipartite matching (Kuhn's augmenting paths).
 *
 * Finds a complete pairing whenever one exists, even where an early
 * first-fit choice would block a later element.
 */
export function matchBipartite<T>(
  left: readonly T[],
  right: readonly T[],
  equals: (a: T, b: T) => boolean
): number[] | null {
  if (left.length !== right.length) return null;

  const candidates: number[][] = left.map(item => {
    const edges: number[] = [];
    for (let j = 0; j < right.length; j++) {
      if (equals(item, right[j])) {
        edges.push(j);
      }
    }
    return edges;
  });

  // owner[j] = index in left currently paired with right[j]
  const owner = new Array<number>(right.length).fill(-1);

  const augment = (i: number, visited: boolean[]): boolean => {
    for (const j of candidates[i]) {
      if (visited[j]) continue;
      visited[j] = true;
      if (owner[j] === -1 || augment(owner[j], visited)) {
        owner[j] = i;
        return true;
      }
    }
    return false;
  };

  for (let i = 0; i < left.length; i++) {
    if (candidates[i].length === 0) {
      return null;
    }
    const visited = new Array<boolean>(right.length).fill(false);
    if (!augment(i, visited)) {
      return null;
    }
  }

  const assignment = new Array<number>(left.length).fill(-1);
  owner.forEach((i, j) => {
    assignment[i] = j;
  });
  return assignment;
}
