// Contract for sources that describe a resource as declared, plus the factory

import { ConfigurationError } from '../../core/errors.js';
import type { MapValue } from '../../models/config-value.js';
import { HclResolver, type HclResolverOptions } from './hcl-resolver.js';
import { StateFileResolver, type StateFileResolverOptions } from './state-resolver.js';

/**
 * Produces the declared configuration tree of one resource.
 *
 * Rejects with NotFoundError when the id is not declared and with
 * ParseError when the source itself is malformed.
 */
export interface DeclaredConfigResolver {
  /** Display label for this side of the comparison, e.g. "Terraform" */
  readonly label: string;
  resolve(resourceId: string): Promise<MapValue>;
}

export interface DeclaredSourceOptions extends StateFileResolverOptions, HclResolverOptions {
  statePath?: string;
  configPath?: string;
}

/**
 * Picks the resolver for whichever declared source was given.
 *
 * @throws ConfigurationError unless exactly one of statePath and configPath is set
 */
export function createDeclaredResolver(options: DeclaredSourceOptions): DeclaredConfigResolver {
  const { statePath, configPath } = options;

  if (statePath && configPath) {
    throw new ConfigurationError('Specify either a state file or a configuration path, not both');
  }
  if (statePath) {
    return new StateFileResolver(statePath, options);
  }
  if (configPath) {
    return new HclResolver(configPath, options);
  }
  throw new ConfigurationError('Either a state file or a configuration path must be provided');
}
