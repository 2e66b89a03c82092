/**
 * Tests for the drift command, run against temp state files and an
 * in-memory EC2 API
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { Instance, Volume } from '@aws-sdk/client-ec2';
import { parseMultipleValues, resolveOptions, runDriftCommand, type DriftCommandContext } from './drift.js';
import { ConfigurationError, ValidationError } from '../../core/errors.js';
import { LogLevel, logger } from '../../core/logger.js';
import { DEFAULT_SETTINGS } from '../../services/config/config-service.js';
import type { Ec2Api } from '../../services/live/ec2-api.js';

class MemoryStream {
  chunks: string[] = [];
  isTTY = false;

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  text(): string {
    return this.chunks.join('');
  }
}

class FakeEc2Api implements Ec2Api {
  destroyed = false;

  constructor(private instances: Record<string, Instance>) {}

  async describeInstance(instanceId: string): Promise<Instance | undefined> {
    return this.instances[instanceId];
  }

  async describeVolume(): Promise<Volume | undefined> {
    return undefined;
  }

  destroy(): void {
    this.destroyed = true;
  }
}

function rawState(instances: Array<Record<string, unknown>>): unknown {
  return {
    version: 4,
    resources: [
      {
        mode: 'managed',
        type: 'aws_instance',
        name: 'web',
        instances: instances.map((attributes, index) => ({ index_key: index, attributes }))
      }
    ]
  };
}

describe('drift command', () => {
  let dir: string;
  let stdout: MemoryStream;
  let stderr: MemoryStream;

  async function writeFile(name: string, content: unknown): Promise<string> {
    const file = path.join(dir, name);
    await fs.writeFile(file, typeof content === 'string' ? content : JSON.stringify(content));
    return file;
  }

  function context(extra: Partial<DriftCommandContext> = {}): DriftCommandContext {
    return { stdout, stderr, cwd: dir, ...extra };
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'infra-drift-cli-'));
    stdout = new MemoryStream();
    stderr = new MemoryStream();
  });

  afterEach(async () => {
    logger.setLevel(LogLevel.INFO);
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('simulation mode', () => {
    let source: string;
    let target: string;

    beforeEach(async () => {
      source = await writeFile(
        'source.tfstate',
        rawState([
          { id: 'i-1', instance_type: 't2.micro', ami: 'ami-1' },
          { id: 'i-2', instance_type: 't3.large', ami: 'ami-2' }
        ])
      );
      target = await writeFile(
        'target.tfstate',
        rawState([
          { id: 'i-1', instance_type: 't2.small', ami: 'ami-1' },
          { id: 'i-2', instance_type: 't3.large', ami: 'ami-2' }
        ])
      );
    });

    it('should report drift between two snapshots as JSON', async () => {
      const code = await runDriftCommand(
        {
          instances: ['i-1'],
          state: source,
          targetState: target,
          simulate: true,
          attributes: ['instance_type,ami'],
          output: 'json',
          logLevel: 'silent'
        },
        context()
      );

      expect(code).toBe(0);
      expect(stdout.text().endsWith('\n')).toBe(true);
      const documents = JSON.parse(stdout.text());
      expect(documents).toHaveLength(1);
      expect(documents[0]).toMatchObject({
        resource_id: 'i-1',
        drift_found: true,
        drift_count: 1,
        drifts: {
          instance_type: {
            in_target_state: true,
            in_source_state: true,
            target_state_value: 't2.small',
            source_state_value: 't2.micro'
          }
        }
      });
      expect(stderr.text()).toBe('');
    });

    it('should print a run summary for several resources', async () => {
      const code = await runDriftCommand(
        {
          instances: ['i-1,i-2'],
          state: source,
          targetState: target,
          simulate: true,
          attributes: ['instance_type'],
          logLevel: 'silent'
        },
        context()
      );

      expect(code).toBe(0);
      expect(stdout.text()).toContain('Drift Detection Results for resource: i-1\n');
      expect(stdout.text()).toContain(
        'No configuration drift detected! target state and source state configurations are in sync.\n'
      );
      expect(stderr.text()).toBe('Summary: 2 resource(s), 2 checked (1 with drift), 0 failed, 0 cancelled\n');
    });

    it('should fail the run when a resource is missing from the target', async () => {
      const code = await runDriftCommand(
        {
          instances: ['i-1', 'i-missing'],
          state: source,
          targetState: target,
          simulate: true,
          attributes: ['instance_type'],
          output: 'yaml',
          logLevel: 'silent'
        },
        context()
      );

      expect(code).toBe(1);
      expect(stderr.text()).toBe(
        'Summary: 2 resource(s), 1 checked (1 with drift), 1 failed, 0 cancelled\n' +
          `  FAILED i-missing (fetch): error reading i-missing from target state: aws_instance not found in ${target}: i-missing\n`
      );
    });

    it('should require both state files', async () => {
      await expect(
        runDriftCommand({ instances: ['i-1'], state: source, simulate: true, logLevel: 'silent' }, context())
      ).rejects.toThrow('Both source and target state files are required for simulation mode');
    });

    it('should reject a target state without simulation', async () => {
      await expect(
        runDriftCommand({ instances: ['i-1'], state: source, targetState: target, logLevel: 'silent' }, context())
      ).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should write metrics in Prometheus format', async () => {
      const metricsOut = path.join(dir, 'metrics.prom');

      await runDriftCommand(
        {
          instances: ['i-1'],
          state: source,
          targetState: target,
          simulate: true,
          attributes: ['instance_type'],
          logLevel: 'silent',
          metricsOut
        },
        context()
      );

      const text = await fs.readFile(metricsOut, 'utf-8');
      expect(text).toContain('infra_drift_checks_total 1\n');
      expect(text).toContain('infra_drift_detected_total{attribute="instance_type"} 1\n');
    });
  });

  describe('live mode', () => {
    const INSTANCE: Instance = { InstanceId: 'i-0abc', InstanceType: 't2.micro', ImageId: 'ami-1' };

    it('should compare a live instance with HCL configuration', async () => {
      const config = await writeFile(
        'main.tf',
        [
          'resource "aws_instance" "web" {',
          '  ami           = "ami-1"',
          '  instance_type = "t2.micro"',
          '  tags = {',
          '    Name = "i-0abc"',
          '  }',
          '}',
          ''
        ].join('\n')
      );
      const api = new FakeEc2Api({ 'i-0abc': INSTANCE });

      const code = await runDriftCommand(
        { instances: ['i-0abc'], config, attributes: ['instance_type', 'ami'], logLevel: 'silent' },
        context({ createEc2Api: () => api })
      );

      expect(code).toBe(0);
      expect(stdout.text()).toContain(
        'No configuration drift detected! AWS and Terraform configurations are in sync.\n'
      );
      expect(api.destroyed).toBe(true);
    });

    it('should pass the region to the EC2 client factory', async () => {
      const state = await writeFile('state.tfstate', rawState([{ id: 'i-0abc', instance_type: 't2.micro' }]));
      const regions: Array<string | undefined> = [];

      await runDriftCommand(
        { instances: ['i-0abc'], state, region: 'eu-west-1', attributes: ['instance_type'], logLevel: 'silent' },
        context({
          createEc2Api: region => {
            regions.push(region);
            return new FakeEc2Api({ 'i-0abc': INSTANCE });
          }
        })
      );

      expect(regions).toEqual(['eu-west-1']);
    });

    it('should report a failed fetch with exit code 1', async () => {
      const state = await writeFile('state.tfstate', rawState([{ id: 'i-gone', instance_type: 't2.micro' }]));

      const code = await runDriftCommand(
        { instances: ['i-gone'], state, attributes: ['instance_type'], logLevel: 'silent' },
        context({ createEc2Api: () => new FakeEc2Api({}) })
      );

      expect(code).toBe(1);
      expect(stdout.text()).toBe('');
      expect(stderr.text()).toBe(
        'Summary: 1 resource(s), 0 checked (0 with drift), 1 failed, 0 cancelled\n' +
          '  FAILED i-gone (fetch): instance i-gone not found\n'
      );
    });

    it('should require a declared source', async () => {
      await expect(
        runDriftCommand({ instances: ['i-0abc'], logLevel: 'silent' }, context())
      ).rejects.toThrow('Either Terraform state file or HCL configuration path is required');
    });

    it('should cancel every check when the caller aborts first', async () => {
      const state = await writeFile('state.tfstate', rawState([{ id: 'i-0abc', instance_type: 't2.micro' }]));
      const controller = new AbortController();
      controller.abort();

      const code = await runDriftCommand(
        { instances: ['i-0abc'], state, logLevel: 'silent' },
        context({ createEc2Api: () => new FakeEc2Api({ 'i-0abc': INSTANCE }), signal: controller.signal })
      );

      expect(code).toBe(1);
      expect(stderr.text()).toContain('  CANCELLED i-0abc\n');
    });
  });

  describe('settings', () => {
    it('should take defaults from the settings file', async () => {
      await writeFile('.infra-drift.yaml', 'output: json\nattributes: [ami]\n');
      const state = await writeFile('state.tfstate', rawState([{ id: 'i-0abc', ami: 'ami-2' }]));

      await runDriftCommand(
        { instances: ['i-0abc'], state, logLevel: 'silent' },
        context({ createEc2Api: () => new FakeEc2Api({ 'i-0abc': { InstanceId: 'i-0abc', ImageId: 'ami-1' } }) })
      );

      const [document] = JSON.parse(stdout.text());
      expect(Object.keys(document.drifts)).toEqual(['ami']);
    });

    it('should fail when a named settings file is missing', async () => {
      await expect(
        runDriftCommand(
          { instances: ['i-1'], state: 'state.tfstate', settings: path.join(dir, 'nope.yaml') },
          context()
        )
      ).rejects.toBeInstanceOf(ConfigurationError);
    });
  });
});

describe('resolveOptions', () => {
  it('should fall back to settings for unset flags', () => {
    const options = resolveOptions({ instances: ['i-1'], state: 'a.tfstate' }, { ...DEFAULT_SETTINGS, region: 'us-east-2' });

    expect(options).toEqual({
      instances: ['i-1'],
      statePath: 'a.tfstate',
      simulate: false,
      attributes: [...DEFAULT_SETTINGS.attributes],
      concurrency: 5,
      output: 'text',
      logLevel: 'info',
      region: 'us-east-2',
      progress: true
    });
  });

  it('should accept upper-case output and log level names', () => {
    const options = resolveOptions({ instances: ['i-1'], output: 'JSON', logLevel: 'Debug' }, DEFAULT_SETTINGS);

    expect(options.output).toBe('json');
    expect(options.logLevel).toBe('debug');
  });

  it('should reject a non-positive concurrency', () => {
    try {
      resolveOptions({ instances: ['i-1'], concurrency: '0' }, DEFAULT_SETTINGS);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toHaveProperty('field', 'concurrency');
    }
  });

  it('should reject an unknown output format', () => {
    expect(() => resolveOptions({ instances: ['i-1'], output: 'xml' }, DEFAULT_SETTINGS)).toThrow(
      'Invalid options: output:'
    );
  });

  it('should require at least one instance', () => {
    expect(() => resolveOptions({ instances: [' , '] }, DEFAULT_SETTINGS)).toThrow(
      new ConfigurationError('At least one instance ID is required')
    );
  });
});

describe('parseMultipleValues', () => {
  it('should split commas and drop blanks', () => {
    expect(parseMultipleValues(['i-1,i-2', ' i-3 ', ','])).toEqual(['i-1', 'i-2', 'i-3']);
  });
});
