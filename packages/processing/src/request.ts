import type { NetworkConfig, ProcessingInput, ProcessingOutput } from './descriptors.js';
import type { ProcessingJobRequest, Tag } from './types.js';

export interface JobConfiguration {
  role: string;
  imageUri: string;
  instanceCount: number;
  instanceType: string;
  volumeSizeInGb: number;
  volumeKmsKey?: string;
  maxRuntimeInSeconds: number;
  env?: Record<string, string>;
  tags?: Tag[];
  networkConfig?: NetworkConfig;
}

export interface JobRun {
  jobName: string;
  inputs: readonly ProcessingInput[];
  outputs: readonly ProcessingOutput[];
  arguments?: readonly string[];
  entrypoint?: readonly string[];
}

export function buildProcessingJobRequest(config: JobConfiguration, run: JobRun): ProcessingJobRequest {
  const request: ProcessingJobRequest = {
    jobName: run.jobName,
    inputs: run.inputs.map((input) => input.toRequest()),
    outputs: run.outputs.map((output) => output.toRequest()),
    resources: {
      ClusterConfig: {
        InstanceType: config.instanceType,
        InstanceCount: config.instanceCount,
        VolumeSizeInGB: config.volumeSizeInGb,
        ...(config.volumeKmsKey !== undefined && { VolumeKmsKeyId: config.volumeKmsKey }),
      },
    },
    stoppingCondition: { MaxRuntimeInSeconds: config.maxRuntimeInSeconds },
    appSpecification: {
      ImageUri: config.imageUri,
      ...(run.arguments !== undefined && { ContainerArguments: [...run.arguments] }),
      ...(run.entrypoint !== undefined && { ContainerEntrypoint: [...run.entrypoint] }),
    },
    roleArn: config.role,
  };

  if (config.env !== undefined) request.environment = { ...config.env };
  if (config.networkConfig !== undefined) request.networkConfig = config.networkConfig.toRequest();
  if (config.tags !== undefined) request.tags = config.tags.map((tag) => ({ ...tag }));

  return request;
}
