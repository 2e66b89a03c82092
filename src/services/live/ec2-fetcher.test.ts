/**
 * Tests for the EC2 instance fetcher, run against an in-memory Ec2Api
 */

import { describe, it, expect, vi } from 'vitest';
import type { Instance, Volume } from '@aws-sdk/client-ec2';
import { Ec2InstanceFetcher } from './ec2-fetcher.js';
import type { Ec2Api } from './ec2-api.js';
import { FetchError } from '../../core/errors.js';
import { Logger, LogLevel } from '../../core/logger.js';
import { toPlain } from '../../models/config-value.js';
import { MetricsService } from '../metrics/metrics-service.js';
import { TtlCache } from '../storage/cache.js';
import { detectDrift } from '../comparison/drift-classifier.js';
import { parseHcl } from '../declared/hcl-parser.js';
import { blockToTree } from '../declared/hcl-resolver.js';

const INSTANCE: Instance = {
  InstanceId: 'i-0abc',
  InstanceType: 't2.micro',
  ImageId: 'ami-12345',
  SubnetId: 'subnet-1',
  PublicIpAddress: '203.0.113.10',
  RootDeviceName: '/dev/xvda',
  SecurityGroups: [{ GroupId: 'sg-1', GroupName: 'web' }, { GroupId: 'sg-2', GroupName: 'ssh' }],
  Tags: [{ Key: 'Name', Value: 'web-1' }, { Key: 'Env', Value: 'dev' }],
  BlockDeviceMappings: [
    { DeviceName: '/dev/xvda', Ebs: { VolumeId: 'vol-root', DeleteOnTermination: true } },
    { DeviceName: '/dev/sdb', Ebs: { VolumeId: 'vol-data', DeleteOnTermination: false } }
  ]
};

const VOLUMES: Record<string, Volume> = {
  'vol-root': { VolumeId: 'vol-root', Size: 8, VolumeType: 'gp3', Encrypted: false },
  'vol-data': { VolumeId: 'vol-data', Size: 100, VolumeType: 'io1', Encrypted: true, Iops: 3000 }
};

class FakeEc2Api implements Ec2Api {
  instances = new Map<string, Instance>([['i-0abc', INSTANCE]]);
  volumes = new Map<string, Volume>(Object.entries(VOLUMES));
  instanceFailures: Error[] = [];
  failingVolumes = new Set<string>();
  describeInstanceCalls = 0;

  async describeInstance(instanceId: string): Promise<Instance | undefined> {
    this.describeInstanceCalls++;
    const failure = this.instanceFailures.shift();
    if (failure) throw failure;
    return this.instances.get(instanceId);
  }

  async describeVolume(volumeId: string): Promise<Volume | undefined> {
    if (this.failingVolumes.has(volumeId)) {
      throw new Error('RequestLimitExceeded');
    }
    return this.volumes.get(volumeId);
  }
}

function namedError(name: string, message = name): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

function createFetcher(api: Ec2Api, overrides: { metrics?: MetricsService; sink?: (line: string) => void } = {}) {
  return new Ec2InstanceFetcher({
    api,
    retryPolicy: { maxElapsedMs: 1000, baseDelayMs: 100, multiplier: 2, maxDelayMs: 400 },
    retryTiming: { sleep: async () => undefined },
    metrics: overrides.metrics,
    logger: new Logger({ level: LogLevel.DEBUG, sink: (_level, line) => overrides.sink?.(line) })
  });
}

describe('Ec2InstanceFetcher', () => {
  it('should map an instance onto Terraform attribute names', async () => {
    const fetcher = createFetcher(new FakeEc2Api());

    const tree = await fetcher.fetch('i-0abc');

    expect(toPlain(tree)).toEqual({
      instance_type: 't2.micro',
      ami: 'ami-12345',
      subnet_id: 'subnet-1',
      associate_public_ip_address: true,
      vpc_security_group_ids: ['sg-1', 'sg-2'],
      tags: { Name: 'web-1', Env: 'dev' },
      root_block_device: [
        {
          device_name: '/dev/xvda',
          volume_id: 'vol-root',
          delete_on_termination: true,
          volume_size: 8,
          volume_type: 'gp3',
          encrypted: false
        }
      ],
      ebs_block_device: [
        {
          device_name: '/dev/sdb',
          volume_id: 'vol-data',
          delete_on_termination: false,
          volume_size: 100,
          volume_type: 'io1',
          encrypted: true,
          iops: 3000
        }
      ]
    });
  });

  it('should report no public address and omit unset fields', async () => {
    const api = new FakeEc2Api();
    api.instances.set('i-bare', { InstanceId: 'i-bare', InstanceType: 't3.nano' });
    const fetcher = createFetcher(api);

    const tree = await fetcher.fetch('i-bare');

    expect(toPlain(tree)).toEqual({
      instance_type: 't3.nano',
      associate_public_ip_address: false,
      vpc_security_group_ids: [],
      tags: {},
      ebs_block_device: []
    });
  });

  it('should omit only volume details when a volume lookup fails', async () => {
    const api = new FakeEc2Api();
    api.failingVolumes.add('vol-data');
    const lines: string[] = [];
    const fetcher = createFetcher(api, { sink: line => lines.push(line) });

    const tree = await fetcher.fetch('i-0abc');

    expect(toPlain(tree)).toMatchObject({
      ebs_block_device: [{ device_name: '/dev/sdb', volume_id: 'vol-data', delete_on_termination: false }]
    });
    expect(toPlain(tree)).not.toHaveProperty(['ebs_block_device', 0, 'volume_size']);
    expect(lines).toContain(
      '[drift] [WARN] Failed to get volume information for vol-data: RequestLimitExceeded'
    );
  });

  it('should retry transient DescribeInstances failures', async () => {
    const api = new FakeEc2Api();
    api.instanceFailures.push(namedError('RequestLimitExceeded'), namedError('InternalError'));
    const metrics = new MetricsService();
    const fetcher = createFetcher(api, { metrics });

    const tree = await fetcher.fetch('i-0abc');

    expect(tree.entries.get('ami')).toEqual({ kind: 'string', value: 'ami-12345' });
    expect(api.describeInstanceCalls).toBe(3);
    expect(metrics.getCounter('infra_drift_api_calls_total', { api: 'DescribeInstances', status: 'success' })).toBe(1);
    expect(metrics.getCounter('infra_drift_api_calls_total', { api: 'DescribeVolumes', status: 'success' })).toBe(2);
  });

  it('should not retry not-found errors', async () => {
    const api = new FakeEc2Api();
    api.instanceFailures.push(namedError('InvalidInstanceID.NotFound', "The instance ID 'i-gone' does not exist"));
    const metrics = new MetricsService();
    const fetcher = createFetcher(api, { metrics });

    await expect(fetcher.fetch('i-gone')).rejects.toThrow(
      "error describing instance i-gone: The instance ID 'i-gone' does not exist"
    );
    expect(api.describeInstanceCalls).toBe(1);
    expect(metrics.getCounter('infra_drift_api_calls_total', { api: 'DescribeInstances', status: 'error' })).toBe(1);
  });

  it('should surface an empty response as a FetchError', async () => {
    const fetcher = createFetcher(new FakeEc2Api());

    const failure = fetcher.fetch('i-missing');

    await expect(failure).rejects.toBeInstanceOf(FetchError);
    await expect(failure).rejects.toThrow('instance i-missing not found');
  });

  it('should give up after the retry budget', async () => {
    const api = new FakeEc2Api();
    for (let i = 0; i < 20; i++) {
      api.instanceFailures.push(namedError('Unavailable'));
    }
    let clock = 0;
    const fetcher = new Ec2InstanceFetcher({
      api,
      retryPolicy: { maxElapsedMs: 1000, baseDelayMs: 100, multiplier: 2, maxDelayMs: 400 },
      retryTiming: { now: () => clock, sleep: async (ms: number) => { clock += ms; } },
      logger: new Logger({ level: LogLevel.SILENT })
    });

    await expect(fetcher.fetch('i-0abc')).rejects.toBeInstanceOf(FetchError);
    // sleeps of 100, 200 and 400 fit in the budget, a further 400 does not
    expect(api.describeInstanceCalls).toBe(4);
  });

  it('should serve repeated fetches from the cache', async () => {
    const api = new FakeEc2Api();
    const spy = vi.spyOn(api, 'describeInstance');
    const fetcher = new Ec2InstanceFetcher({
      api,
      cache: new TtlCache({ ttl: 60000 }),
      logger: new Logger({ level: LogLevel.SILENT })
    });

    const [first, second] = await Promise.all([fetcher.fetch('i-0abc'), fetcher.fetch('i-0abc')]);
    const third = await fetcher.fetch('i-0abc');

    expect(second).toBe(first);
    expect(third).toBe(first);
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('should agree with HCL on tags whose keys look like value fields', async () => {
    const fetcher = createFetcher(new FakeEc2Api());
    const live = await fetcher.mapInstance({
      InstanceId: 'i-0abc',
      Tags: [{ Key: 'Name', Value: 'web' }, { Key: 'kind', Value: 'null' }]
    });
    const declared = blockToTree(parseHcl('tags = { Name = "web", kind = "null" }\n'));

    expect(toPlain(live)).toMatchObject({ tags: { Name: 'web', kind: 'null' } });
    expect(detectDrift('i-0abc', live, declared, { attributes: ['tags'] }).records.size).toBe(0);
  });
});
