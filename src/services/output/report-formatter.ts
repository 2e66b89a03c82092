/**
 * Report Formatter
 *
 * Renders drift reports as text, JSON or YAML. Output depends only on
 * the report: the timestamp comes from `generatedAt` and map keys are
 * sorted, so equal reports render identically.
 */

import { stringify } from 'yaml';
import type { OutputFormat } from '../../core/schemas.js';
import { describeValue, toPlain, type PlainValue } from '../../models/config-value.js';
import { type DriftRecord, type DriftReport, driftKind } from '../../models/drift.js';
import type { CheckOutcome, RunSummary } from '../runner/drift-runner.js';

/**
 * Structured form shared by the JSON and YAML renderings
 */
export interface ReportDocument {
  resource_id: string;
  drift_found: boolean;
  drift_count: number;
  time_detected: string;
  drifts: Record<string, Record<string, PlainValue>>;
}

/**
 * Turns a display label into a key fragment, e.g. "target state" -> "target_state"
 */
export function slugLabel(label: string): string {
  const slug = label
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return slug || 'source';
}

export function toReportDocument(report: DriftReport): ReportDocument {
  const a = slugLabel(report.sources.a);
  const b = slugLabel(report.sources.b);

  const drifts: ReportDocument['drifts'] = {};
  for (const attribute of [...report.records.keys()].sort()) {
    const record = report.records.get(attribute);
    if (!record) continue;

    const entry: Record<string, PlainValue> = {
      [`in_${a}`]: record.presentInA,
      [`in_${b}`]: record.presentInB
    };
    if (record.valueA !== undefined) {
      entry[`${a}_value`] = toPlain(record.valueA);
    }
    if (record.valueB !== undefined) {
      entry[`${b}_value`] = toPlain(record.valueB);
    }
    drifts[attribute] = entry;
  }

  return {
    resource_id: report.resourceId,
    drift_found: report.records.size > 0,
    drift_count: report.records.size,
    time_detected: report.generatedAt.toISOString(),
    drifts
  };
}

/**
 * Render one report in the given format
 */
export function renderReport(report: DriftReport, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(toReportDocument(report), null, 2);
    case 'yaml':
      return stringify(toReportDocument(report));
    case 'text':
      return renderText(report);
  }
}

/**
 * Render several reports as one output: a JSON array, a YAML sequence,
 * or text blocks separated by a blank line
 */
export function renderReports(reports: readonly DriftReport[], format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(reports.map(toReportDocument), null, 2);
    case 'yaml':
      return stringify(reports.map(toReportDocument));
    case 'text':
      return reports.map(renderText).join('\n');
  }
}

function renderText(report: DriftReport): string {
  const { a, b } = report.sources;
  const lines: string[] = [`Drift Detection Results for resource: ${report.resourceId}`, ''];

  if (report.records.size === 0) {
    lines.push(`No configuration drift detected! ${a} and ${b} configurations are in sync.`);
  } else {
    lines.push(`Found ${report.records.size} attributes with configuration drift:`, '');
    for (const record of report.records.values()) {
      lines.push(...renderRecord(record, a, b), '');
    }
  }

  lines.push(`Detection completed at: ${report.generatedAt.toISOString()}`);
  return `${lines.join('\n')}\n`;
}

function renderRecord(record: DriftRecord, a: string, b: string): string[] {
  const lines = [`--- ${record.attribute} ---`];
  switch (driftKind(record)) {
    case 'mismatch':
      lines.push(`Status: Values differ between ${a} and ${b}`);
      break;
    case 'only-in-a':
      lines.push(`Status: Exists in ${a} but not in ${b}`);
      break;
    case 'only-in-b':
      lines.push(`Status: Exists in ${b} but not in ${a}`);
      break;
  }
  if (record.valueA !== undefined) {
    lines.push(`${a} value: ${describeValue(record.valueA)}`);
  }
  if (record.valueB !== undefined) {
    lines.push(`${b} value: ${describeValue(record.valueB)}`);
  }
  return lines;
}

/**
 * Text footer for a run: totals, then one line per failed or cancelled id
 */
export function renderRunSummary(summary: RunSummary): string {
  const total = summary.outcomes.size;
  const drifted = summary.reports.filter(report => report.records.size > 0).length;
  const lines = [
    `Summary: ${total} resource(s), ${summary.reports.length} checked (${drifted} with drift), ` +
      `${summary.failed.length} failed, ${summary.cancelled.length} cancelled`
  ];

  for (const outcome of summary.outcomes.values()) {
    const line = describeProblem(outcome);
    if (line) lines.push(line);
  }
  return `${lines.join('\n')}\n`;
}

function describeProblem(outcome: CheckOutcome): string | null {
  switch (outcome.status) {
    case 'ok':
      return null;
    case 'failed':
      return `  FAILED ${outcome.resourceId} (${outcome.stage}): ${outcome.error.message}`;
    case 'cancelled':
      return `  CANCELLED ${outcome.resourceId}`;
  }
}
