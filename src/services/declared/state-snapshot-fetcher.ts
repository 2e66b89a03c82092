// Live source stand-in that reads a second state snapshot (simulation mode)

import { FetchError, errorMessage } from '../../core/errors.js';
import type { MapValue } from '../../models/config-value.js';
import type { LiveResourceFetcher } from '../live/live-fetcher.js';
import { StateFileResolver, type StateFileResolverOptions } from './state-resolver.js';

/**
 * Serves "live" trees from a target state file, so drift between two
 * snapshots can be checked without cloud credentials.
 */
export class StateSnapshotFetcher implements LiveResourceFetcher {
  readonly label = 'target state';

  private resolver: StateFileResolver;

  constructor(targetStatePath: string, options: StateFileResolverOptions = {}) {
    this.resolver = new StateFileResolver(targetStatePath, options);
  }

  async fetch(resourceId: string, signal?: AbortSignal): Promise<MapValue> {
    signal?.throwIfAborted();
    try {
      return await this.resolver.resolve(resourceId);
    } catch (error) {
      throw new FetchError(`error reading ${resourceId} from target state: ${errorMessage(error)}`, resourceId, error);
    }
  }
}
