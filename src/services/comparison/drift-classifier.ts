/**
 * Drift Classifier
 *
 * Walks a checklist of attribute paths over two normalized trees and
 * records every attribute where the trees disagree on presence or value.
 * Attributes outside the checklist are never inspected.
 */

import type { ConfigValue } from '../../models/config-value.js';
import {
  type AttributePath,
  type DriftRecord,
  type DriftReport,
  type ListMatching,
  type SourceLabels,
  DEFAULT_SOURCE_LABELS,
  driftKind
} from '../../models/drift.js';
import { configEquals } from './equality.js';
import { resolvePath } from './path-resolver.js';

/**
 * Per-call configuration for a drift check
 */
export interface DriftCheckOptions {
  /** Attribute paths to compare */
  attributes: readonly AttributePath[];
  /** Labels for the two trees, used by presentation */
  sources?: SourceLabels;
  /** List matching strategy passed to the equality engine */
  listMatching?: ListMatching;
  /** Clock for the report timestamp */
  now?: () => Date;
}

/**
 * Aggregate view of a report
 */
export interface DriftSummary {
  driftCount: number;
  attributes: AttributePath[];
  onlyInA: AttributePath[];
  onlyInB: AttributePath[];
  mismatched: AttributePath[];
}

/**
 * Compares one attribute. Returns null when both sides agree, including
 * when the attribute is absent from both.
 */
export function classifyAttribute(
  attribute: AttributePath,
  treeA: ConfigValue,
  treeB: ConfigValue,
  listMatching?: ListMatching
): DriftRecord | null {
  const a = resolvePath(treeA, attribute);
  const b = resolvePath(treeB, attribute);

  if (!a.found) {
    return b.found
      ? Object.freeze({ attribute, presentInA: false, presentInB: true, valueB: b.value })
      : null;
  }

  if (!b.found) {
    return Object.freeze({ attribute, presentInA: true, presentInB: false, valueA: a.value });
  }

  if (configEquals(a.value, b.value, { listMatching })) {
    return null;
  }

  return Object.freeze({
    attribute,
    presentInA: true,
    presentInB: true,
    valueA: a.value,
    valueB: b.value
  });
}

/**
 * Builds the drift report for one resource.
 *
 * The engine performs no I/O and keeps no state between calls; absence
 * of an attribute on either side is reported as data, never thrown.
 */
export function detectDrift(
  resourceId: string,
  treeA: ConfigValue,
  treeB: ConfigValue,
  options: DriftCheckOptions
): DriftReport {
  const records = new Map<AttributePath, DriftRecord>();

  for (const attribute of options.attributes) {
    if (records.has(attribute)) continue;
    const record = classifyAttribute(attribute, treeA, treeB, options.listMatching);
    if (record) {
      records.set(attribute, record);
    }
  }

  return Object.freeze({
    resourceId,
    generatedAt: (options.now ?? (() => new Date()))(),
    sources: Object.freeze({ ...(options.sources ?? DEFAULT_SOURCE_LABELS) }),
    records
  });
}

/**
 * Summarizes a report by disagreement case
 */
export function summarizeReport(report: DriftReport): DriftSummary {
  const summary: DriftSummary = {
    driftCount: report.records.size,
    attributes: [...report.records.keys()],
    onlyInA: [],
    onlyInB: [],
    mismatched: []
  };

  for (const record of report.records.values()) {
    switch (driftKind(record)) {
      case 'mismatch':
        summary.mismatched.push(record.attribute);
        break;
      case 'only-in-a':
        summary.onlyInA.push(record.attribute);
        break;
      case 'only-in-b':
        summary.onlyInB.push(record.attribute);
        break;
    }
  }

  return summary;
}
