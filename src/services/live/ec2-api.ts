// Thin port over the EC2 API, so fetch logic can run against a fake

import {
  DescribeInstancesCommand,
  DescribeVolumesCommand,
  EC2Client,
  type Instance,
  type Volume
} from '@aws-sdk/client-ec2';

/**
 * The two EC2 calls a drift check needs
 */
export interface Ec2Api {
  /** Resolves undefined when the response names no such instance */
  describeInstance(instanceId: string, signal?: AbortSignal): Promise<Instance | undefined>;
  /** Resolves undefined when the response names no such volume */
  describeVolume(volumeId: string, signal?: AbortSignal): Promise<Volume | undefined>;
}

/**
 * Ec2Api backed by the AWS SDK. Credentials and region come from the
 * SDK's default provider chain unless a region is given.
 */
export class SdkEc2Api implements Ec2Api {
  constructor(private readonly client: EC2Client) {}

  static forRegion(region?: string): SdkEc2Api {
    return new SdkEc2Api(new EC2Client(region ? { region } : {}));
  }

  async describeInstance(instanceId: string, signal?: AbortSignal): Promise<Instance | undefined> {
    const output = await this.client.send(
      new DescribeInstancesCommand({ InstanceIds: [instanceId] }),
      { abortSignal: signal }
    );
    return output.Reservations?.[0]?.Instances?.[0];
  }

  async describeVolume(volumeId: string, signal?: AbortSignal): Promise<Volume | undefined> {
    const output = await this.client.send(
      new DescribeVolumesCommand({ VolumeIds: [volumeId] }),
      { abortSignal: signal }
    );
    return output.Volumes?.[0];
  }

  destroy(): void {
    this.client.destroy();
  }
}
