/**
 * EC2 Instance Fetcher
 *
 * Describes an EC2 instance through the AWS API and maps it onto the
 * attribute names Terraform uses for `aws_instance`, so the two trees
 * can be compared key for key.
 */

import type { EbsInstanceBlockDevice, Instance, InstanceBlockDeviceMapping, Volume } from '@aws-sdk/client-ec2';
import { FetchError, errorMessage } from '../../core/errors.js';
import { logger as rootLogger, type Logger } from '../../core/logger.js';
import type { MapValue } from '../../models/config-value.js';
import { normalizeTree } from '../comparison/normalizer.js';
import type { IMetricsService } from '../metrics/metrics-service.js';
import { TtlCache } from '../storage/cache.js';
import type { Ec2Api } from './ec2-api.js';
import type { LiveResourceFetcher } from './live-fetcher.js';
import { DEFAULT_RETRY_POLICY, retryWithBackoff, type RetryOptions, type RetryPolicy } from './retry.js';

export interface Ec2FetcherOptions {
  api: Ec2Api;
  retryPolicy?: RetryPolicy;
  /** Clock and sleep overrides for the retry loop */
  retryTiming?: Pick<RetryOptions, 'sleep' | 'now'>;
  cache?: TtlCache<MapValue>;
  metrics?: IMetricsService;
  logger?: Logger;
}

type BlockDevice = Record<string, string | number | boolean | undefined>;

/**
 * Error names the EC2 API uses for ids that do not exist. Retrying
 * cannot change the answer.
 */
function isNotFound(error: unknown): boolean {
  return error instanceof Error && /NotFound|Malformed/.test(error.name);
}

export class Ec2InstanceFetcher implements LiveResourceFetcher {
  readonly label = 'AWS';

  private api: Ec2Api;
  private retryPolicy: RetryPolicy;
  private retryTiming: Pick<RetryOptions, 'sleep' | 'now'>;
  private cache: TtlCache<MapValue>;
  private metrics?: IMetricsService;
  private logger: Logger;

  constructor(options: Ec2FetcherOptions) {
    this.api = options.api;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.retryTiming = options.retryTiming ?? {};
    this.cache = options.cache ?? new TtlCache<MapValue>();
    this.metrics = options.metrics;
    this.logger = options.logger ?? rootLogger.child('ec2');
  }

  /**
   * Fetch the instance's configuration tree, from cache when fresh
   */
  async fetch(instanceId: string, signal?: AbortSignal): Promise<MapValue> {
    return this.cache.getOrLoad(instanceId, () => this.load(instanceId, signal));
  }

  private async load(instanceId: string, signal?: AbortSignal): Promise<MapValue> {
    this.logger.info(`Fetching EC2 instance ${instanceId} configuration from AWS`);

    const instance = await this.describeInstance(instanceId, signal);
    if (!instance) {
      throw new FetchError(`instance ${instanceId} not found`, instanceId);
    }

    return this.mapInstance(instance, signal);
  }

  private async describeInstance(instanceId: string, signal?: AbortSignal): Promise<Instance | undefined> {
    const started = Date.now();
    try {
      const instance = await retryWithBackoff(
        () => this.api.describeInstance(instanceId, signal),
        this.retryPolicy,
        {
          ...this.retryTiming,
          signal,
          isRetryable: error => !isNotFound(error),
          onRetry: (error, attempt, delayMs) => {
            this.logger.debug(`DescribeInstances failed for ${instanceId}, retrying`, {
              attempt,
              delayMs,
              error: errorMessage(error)
            });
          }
        }
      );
      this.metrics?.recordApiCall('DescribeInstances', 'success', elapsedSeconds(started));
      return instance;
    } catch (error) {
      this.metrics?.recordApiCall('DescribeInstances', 'error', elapsedSeconds(started));
      throw new FetchError(`error describing instance ${instanceId}: ${errorMessage(error)}`, instanceId, error);
    }
  }

  /**
   * Maps an instance description onto Terraform attribute names.
   * A failed volume lookup drops only that volume's detail keys.
   */
  async mapInstance(instance: Instance, signal?: AbortSignal): Promise<MapValue> {
    const config: Record<string, unknown> = {
      instance_type: instance.InstanceType,
      ami: instance.ImageId,
      subnet_id: instance.SubnetId,
      associate_public_ip_address: instance.PublicIpAddress !== undefined,
      vpc_security_group_ids: (instance.SecurityGroups ?? [])
        .map(group => group.GroupId)
        .filter((id): id is string => id !== undefined)
    };

    const tags: Record<string, string> = {};
    for (const tag of instance.Tags ?? []) {
      if (tag.Key !== undefined) {
        tags[tag.Key] = tag.Value ?? '';
      }
    }
    config.tags = tags;

    const ebsMappings = (instance.BlockDeviceMappings ?? []).filter(
      (mapping): mapping is InstanceBlockDeviceMapping & { Ebs: EbsInstanceBlockDevice } => mapping.Ebs !== undefined
    );
    const devices = await Promise.all(ebsMappings.map(mapping => this.describeBlockDevice(mapping, signal)));

    const rootDevices: BlockDevice[] = [];
    const ebsDevices: BlockDevice[] = [];
    ebsMappings.forEach((mapping, index) => {
      if (instance.RootDeviceName !== undefined && mapping.DeviceName === instance.RootDeviceName) {
        rootDevices.push(devices[index]);
      } else {
        ebsDevices.push(devices[index]);
      }
    });
    config.ebs_block_device = ebsDevices;
    if (rootDevices.length > 0) {
      config.root_block_device = rootDevices;
    }

    return normalizeTree(config);
  }

  private async describeBlockDevice(
    mapping: InstanceBlockDeviceMapping & { Ebs: EbsInstanceBlockDevice },
    signal?: AbortSignal
  ): Promise<BlockDevice> {
    const volumeId = mapping.Ebs.VolumeId;
    const device: BlockDevice = {
      device_name: mapping.DeviceName,
      volume_id: volumeId,
      delete_on_termination: mapping.Ebs.DeleteOnTermination ?? false
    };

    if (volumeId === undefined) {
      return device;
    }

    const started = Date.now();
    try {
      const volume = await this.api.describeVolume(volumeId, signal);
      this.metrics?.recordApiCall('DescribeVolumes', 'success', elapsedSeconds(started));
      if (!volume) {
        this.logger.warn(`Volume ${volumeId} not found, omitting its details`);
        return device;
      }
      return { ...device, ...volumeDetails(volume) };
    } catch (error) {
      this.metrics?.recordApiCall('DescribeVolumes', 'error', elapsedSeconds(started));
      if (signal?.aborted) {
        throw error;
      }
      this.logger.warn(`Failed to get volume information for ${volumeId}: ${errorMessage(error)}`);
      return device;
    }
  }
}

function volumeDetails(volume: Volume): BlockDevice {
  const details: BlockDevice = {
    volume_size: volume.Size,
    volume_type: volume.VolumeType,
    encrypted: volume.Encrypted
  };
  if (volume.Iops !== undefined) {
    details.iops = volume.Iops;
  }
  return details;
}

function elapsedSeconds(started: number): number {
  return (Date.now() - started) / 1000;
}
