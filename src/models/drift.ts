// Drift report types

import type { ConfigValue } from './config-value.js';

/**
 * Dot-separated sequence of map keys, e.g. `tags.Name`
 */
export type AttributePath = string;

/**
 * Display labels for the two compared sources
 */
export interface SourceLabels {
  /** Live side, e.g. "AWS" */
  a: string;
  /** Declared side, e.g. "Terraform" */
  b: string;
}

export const DEFAULT_SOURCE_LABELS: Readonly<SourceLabels> = Object.freeze({
  a: 'AWS',
  b: 'Terraform'
});

/**
 * One attribute on which the two sources disagree
 */
export interface DriftRecord {
  readonly attribute: AttributePath;
  readonly presentInA: boolean;
  readonly presentInB: boolean;
  readonly valueA?: ConfigValue;
  readonly valueB?: ConfigValue;
}

/**
 * All drift found for one resource
 */
export interface DriftReport {
  readonly resourceId: string;
  readonly generatedAt: Date;
  readonly sources: Readonly<SourceLabels>;
  /** Keyed by attribute, in checklist order */
  readonly records: ReadonlyMap<AttributePath, DriftRecord>;
}

/**
 * Which of the three disagreement cases a record describes
 */
export type DriftKind = 'mismatch' | 'only-in-a' | 'only-in-b';

export function driftKind(record: DriftRecord): DriftKind {
  if (record.presentInA && record.presentInB) return 'mismatch';
  return record.presentInA ? 'only-in-a' : 'only-in-b';
}

/**
 * Strategy for matching list elements during multiset comparison
 */
export type ListMatching = 'bipartite' | 'greedy';

/**
 * Well-known EC2 instance attributes checked when the caller names none
 */
export const DEFAULT_ATTRIBUTES: readonly AttributePath[] = Object.freeze([
  'instance_type',
  'ami',
  'subnet_id',
  'vpc_security_group_ids',
  'associate_public_ip_address',
  'tags',
  'root_block_device',
  'ebs_block_device'
]);
