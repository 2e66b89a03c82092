// Contract for sources that describe a resource as it currently exists

import type { MapValue } from '../../models/config-value.js';

/**
 * Produces the live configuration tree of one resource.
 *
 * Implementations normalize at their boundary and reject with
 * FetchError when the resource cannot be described.
 */
export interface LiveResourceFetcher {
  /** Display label for this side of the comparison, e.g. "AWS" */
  readonly label: string;
  fetch(resourceId: string, signal?: AbortSignal): Promise<MapValue>;
}
