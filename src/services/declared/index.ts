/**
 * Declared Configuration Module
 *
 * Terraform state and HCL readers that produce the declared side of a
 * drift check, plus the state-backed live source used for simulation.
 *
 * @module services/declared
 */

export * from './declared-resolver.js';
export * from './state-resolver.js';
export * from './state-snapshot-fetcher.js';
export * from './hcl-parser.js';
export * from './hcl-resolver.js';
