/**
 * Tests for report rendering
 */

import { describe, it, expect } from 'vitest';
import { parse } from 'yaml';
import {
  renderReport,
  renderReports,
  renderRunSummary,
  slugLabel,
  toReportDocument
} from './report-formatter.js';
import { FetchError } from '../../core/errors.js';
import { detectDrift } from '../comparison/drift-classifier.js';
import { normalizeTree } from '../comparison/normalizer.js';
import type { CheckOutcome, RunSummary } from '../runner/drift-runner.js';

const NOW = new Date('2024-05-01T12:00:00.000Z');
const ATTRIBUTES = ['instance_type', 'ami', 'subnet_id', 'tags', 'vpc_security_group_ids'];

const LIVE = normalizeTree({
  instance_type: 't2.micro',
  ami: 'ami-1',
  tags: { Name: 'web', Env: 'dev' },
  vpc_security_group_ids: ['sg-1']
});

const DECLARED = normalizeTree({
  instance_type: 't2.small',
  subnet_id: 'subnet-1',
  tags: { Name: 'web', Env: 'dev' },
  vpc_security_group_ids: ['sg-1']
});

const drifted = detectDrift('i-1', LIVE, DECLARED, { attributes: ATTRIBUTES, now: () => NOW });
const clean = detectDrift('i-2', LIVE, LIVE, { attributes: ATTRIBUTES, now: () => NOW });

describe('renderReport', () => {
  describe('text', () => {
    it('should describe each presence case', () => {
      expect(renderReport(drifted, 'text')).toBe(
        [
          'Drift Detection Results for resource: i-1',
          '',
          'Found 3 attributes with configuration drift:',
          '',
          '--- instance_type ---',
          'Status: Values differ between AWS and Terraform',
          'AWS value: t2.micro',
          'Terraform value: t2.small',
          '',
          '--- ami ---',
          'Status: Exists in AWS but not in Terraform',
          'AWS value: ami-1',
          '',
          '--- subnet_id ---',
          'Status: Exists in Terraform but not in AWS',
          'Terraform value: subnet-1',
          '',
          'Detection completed at: 2024-05-01T12:00:00.000Z',
          ''
        ].join('\n')
      );
    });

    it('should report a clean resource', () => {
      expect(renderReport(clean, 'text')).toBe(
        [
          'Drift Detection Results for resource: i-2',
          '',
          'No configuration drift detected! AWS and Terraform configurations are in sync.',
          'Detection completed at: 2024-05-01T12:00:00.000Z',
          ''
        ].join('\n')
      );
    });

    it('should render structured values compactly', () => {
      const report = detectDrift(
        'i-3',
        normalizeTree({ tags: { Name: 'web', Size: '8' } }),
        normalizeTree({ tags: { Name: 'web', Size: 8 } }),
        { attributes: ['tags'], now: () => NOW, sources: { a: 'target state', b: 'source state' } }
      );

      const text = renderReport(report, 'text');

      expect(text).toContain('Status: Values differ between target state and source state\n');
      expect(text).toContain('target state value: {Name: "web", Size: "8"}\n');
      expect(text).toContain('source state value: {Name: "web", Size: 8}\n');
    });
  });

  describe('json', () => {
    it('should emit the report document', () => {
      expect(JSON.parse(renderReport(drifted, 'json'))).toEqual({
        resource_id: 'i-1',
        drift_found: true,
        drift_count: 3,
        time_detected: '2024-05-01T12:00:00.000Z',
        drifts: {
          ami: { in_aws: true, in_terraform: false, aws_value: 'ami-1' },
          instance_type: { in_aws: true, in_terraform: true, aws_value: 't2.micro', terraform_value: 't2.small' },
          subnet_id: { in_aws: false, in_terraform: true, terraform_value: 'subnet-1' }
        }
      });
    });

    it('should sort drift keys', () => {
      expect(Object.keys(toReportDocument(drifted).drifts)).toEqual(['ami', 'instance_type', 'subnet_id']);
    });

    it('should be deterministic', () => {
      expect(renderReport(drifted, 'json')).toBe(renderReport(drifted, 'json'));
    });

    it('should report a clean resource', () => {
      expect(JSON.parse(renderReport(clean, 'json'))).toEqual({
        resource_id: 'i-2',
        drift_found: false,
        drift_count: 0,
        time_detected: '2024-05-01T12:00:00.000Z',
        drifts: {}
      });
    });
  });

  describe('yaml', () => {
    it('should carry the same document as json', () => {
      expect(parse(renderReport(drifted, 'yaml'))).toEqual(toReportDocument(drifted));
    });

    it('should start with the resource id', () => {
      expect(renderReport(clean, 'yaml').split('\n')[0]).toBe('resource_id: i-2');
    });
  });
});

describe('renderReports', () => {
  it('should emit a JSON array for several reports', () => {
    const parsed: unknown = JSON.parse(renderReports([drifted, clean], 'json'));

    expect(Array.isArray(parsed)).toBe(true);
    expect(parsed).toEqual([toReportDocument(drifted), toReportDocument(clean)]);
  });

  it('should emit a YAML sequence for several reports', () => {
    expect(parse(renderReports([drifted, clean], 'yaml'))).toEqual([
      toReportDocument(drifted),
      toReportDocument(clean)
    ]);
  });

  it('should separate text reports with a blank line', () => {
    expect(renderReports([clean, clean], 'text')).toBe(`${renderReport(clean, 'text')}\n${renderReport(clean, 'text')}`);
  });
});

describe('slugLabel', () => {
  it('should lower-case and join words', () => {
    expect(slugLabel('AWS')).toBe('aws');
    expect(slugLabel('target state')).toBe('target_state');
    expect(slugLabel('  Terraform (HCL) ')).toBe('terraform_hcl');
    expect(slugLabel('???')).toBe('source');
  });
});

describe('renderRunSummary', () => {
  it('should total outcomes and list problems in submission order', () => {
    const outcomes = new Map<string, CheckOutcome>([
      ['i-1', { status: 'ok', resourceId: 'i-1', report: drifted }],
      [
        'i-bad',
        { status: 'failed', resourceId: 'i-bad', stage: 'fetch', error: new FetchError('instance i-bad not found', 'i-bad') }
      ],
      ['i-2', { status: 'ok', resourceId: 'i-2', report: clean }],
      ['i-4', { status: 'cancelled', resourceId: 'i-4' }]
    ]);
    const summary: RunSummary = {
      outcomes,
      reports: [drifted, clean],
      failed: [],
      cancelled: ['i-4'],
      succeeded: false
    };
    const failed = outcomes.get('i-bad');
    if (failed?.status === 'failed') summary.failed.push(failed);

    expect(renderRunSummary(summary)).toBe(
      [
        'Summary: 4 resource(s), 2 checked (1 with drift), 1 failed, 1 cancelled',
        '  FAILED i-bad (fetch): instance i-bad not found',
        '  CANCELLED i-4',
        ''
      ].join('\n')
    );
  });
});
