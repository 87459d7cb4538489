import type { DescribeProcessingJobResponse } from '@aws-sdk/client-sagemaker';

export type S3DataType = 'ManifestFile' | 'S3Prefix';
export type S3InputMode = 'File' | 'Pipe';
export type S3DownloadMode = 'StartOfJob' | 'Continuous';
export type S3DataDistributionType = 'FullyReplicated' | 'ShardedByS3Key';
export type S3CompressionType = 'None' | 'Gzip';
export type S3UploadMode = 'Continuous' | 'EndOfJob';

export interface Tag {
  Key: string;
  Value: string;
}

export interface ProcessingInputRequest {
  InputName: string;
  S3Input: {
    S3Uri: string;
    LocalPath: string;
    S3DataType: S3DataType;
    S3InputMode: S3InputMode;
    S3DownloadMode: S3DownloadMode;
    S3DataDistributionType: S3DataDistributionType;
    S3CompressionType: S3CompressionType;
  };
}

export interface ProcessingOutputRequest {
  OutputName: string;
  S3Output: {
    S3Uri: string;
    LocalPath: string;
    S3UploadMode: S3UploadMode;
    KmsKeyId?: string;
  };
}

export interface NetworkConfigRequest {
  EnableNetworkIsolation: boolean;
  EnableInterContainerTrafficEncryption: boolean;
  VpcConfig?: {
    SecurityGroupIds: string[];
    Subnets: string[];
  };
}

export interface ClusterConfigRequest {
  InstanceType: string;
  InstanceCount: number;
  VolumeSizeInGB: number;
  VolumeKmsKeyId?: string;
}

export interface AppSpecificationRequest {
  ImageUri: string;
  ContainerEntrypoint?: string[];
  ContainerArguments?: string[];
}

/** Everything the control plane needs to start one processing job. */
export interface ProcessingJobRequest {
  jobName: string;
  inputs: ProcessingInputRequest[];
  outputs: ProcessingOutputRequest[];
  resources: { ClusterConfig: ClusterConfigRequest };
  stoppingCondition: { MaxRuntimeInSeconds: number };
  appSpecification: AppSpecificationRequest;
  environment?: Record<string, string>;
  networkConfig?: NetworkConfigRequest;
  roleArn: string;
  tags?: Tag[];
}

export type ProcessingJobDescription = DescribeProcessingJobResponse;

export type ProcessingJobStatus = NonNullable<ProcessingJobDescription['ProcessingJobStatus']>;
