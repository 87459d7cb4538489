import { setTimeout as sleep } from 'node:timers/promises';
import {
  CreateProcessingJobCommand,
  DescribeProcessingJobCommand,
  ProcessingInstanceType,
  SageMakerClient,
  StopProcessingJobCommand,
  type CreateProcessingJobCommandInput,
} from '@aws-sdk/client-sagemaker';
import {
  BucketLocationConstraint,
  CreateBucketCommand,
  HeadBucketCommand,
  S3Client,
  type CreateBucketCommandInput,
} from '@aws-sdk/client-s3';
import { GetCallerIdentityCommand, STSClient } from '@aws-sdk/client-sts';
import {
  CloudWatchLogsClient,
  DescribeLogStreamsCommand,
  GetLogEventsCommand,
} from '@aws-sdk/client-cloudwatch-logs';
import { loadConfig, logger, DEFAULT_POLL_INTERVAL_MS } from '@procrun/shared';
import { ProcessingJobFailedError, ProcessingValidationError } from './errors.js';
import type { LogsOptions, ProcessingSession } from './session.js';
import type { ProcessingJobDescription, ProcessingJobRequest } from './types.js';
import { S3Uploader } from './uploader.js';

const log = logger.child({ module: 'aws-session' });

export const PROCESSING_LOG_GROUP = '/aws/sagemaker/ProcessingJobs';

const TERMINAL_STATUSES: ReadonlySet<string> = new Set(['Completed', 'Failed', 'Stopped']);
const SUCCESSFUL_STATUSES: ReadonlySet<string> = new Set(['Completed', 'Stopped']);

/** Receives one formatted line per job log event. */
export type LogSink = (line: string) => void;

export interface AwsProcessingSessionOptions {
  region?: string;
  /** Overrides the account-derived sagemaker-<region>-<account> bucket */
  defaultBucket?: string;
  /** Delay between status polls and log reads (default: 5000) */
  pollIntervalMs?: number;
  logSink?: LogSink;
  sagemaker?: SageMakerClient;
  s3?: S3Client;
  sts?: STSClient;
  logs?: CloudWatchLogsClient;
}

type LogState = 'tailing' | 'job-complete' | 'complete';

function isMember<T extends string>(values: Record<string, T>, value: string): value is T {
  const allowed: readonly string[] = Object.values(values);
  return allowed.includes(value);
}

function errorName(err: unknown): string | undefined {
  return err instanceof Error ? err.name : undefined;
}

function isTerminal(description: ProcessingJobDescription): boolean {
  return TERMINAL_STATUSES.has(description.ProcessingJobStatus ?? '');
}

function assertSuccessful(jobName: string, description: ProcessingJobDescription): void {
  const status = description.ProcessingJobStatus ?? 'Unknown';
  if (!SUCCESSFUL_STATUSES.has(status)) {
    throw new ProcessingJobFailedError({
      jobName,
      status,
      failureReason: description.FailureReason,
    });
  }
}

const stdoutSink: LogSink = (line) => {
  process.stdout.write(`${line}\n`);
};

export class AwsProcessingSession implements ProcessingSession {
  readonly uploader: S3Uploader;
  private readonly sagemaker: SageMakerClient;
  private readonly s3: S3Client;
  private readonly sts: STSClient;
  private readonly logs: CloudWatchLogsClient;
  private readonly region?: string;
  private readonly configuredBucket?: string;
  private readonly pollIntervalMs: number;
  private readonly logSink: LogSink;
  private resolvedBucket?: string;

  constructor(options: AwsProcessingSessionOptions = {}) {
    const clientConfig = { region: options.region };
    this.region = options.region;
    this.configuredBucket = options.defaultBucket;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.logSink = options.logSink ?? stdoutSink;
    this.sagemaker = options.sagemaker ?? new SageMakerClient(clientConfig);
    this.s3 = options.s3 ?? new S3Client(clientConfig);
    this.sts = options.sts ?? new STSClient(clientConfig);
    this.logs = options.logs ?? new CloudWatchLogsClient(clientConfig);
    this.uploader = new S3Uploader({ client: this.s3 });
  }

  static fromEnvironment(
    overrides: Omit<AwsProcessingSessionOptions, 'region' | 'defaultBucket' | 'pollIntervalMs'> = {},
  ): AwsProcessingSession {
    const config = loadConfig();
    return new AwsProcessingSession({
      ...overrides,
      region: config.region,
      defaultBucket: config.defaultBucket,
      pollIntervalMs: config.pollIntervalMs,
    });
  }

  async defaultBucket(): Promise<string> {
    if (this.resolvedBucket) return this.resolvedBucket;

    const region = await this.resolveRegion();
    let bucket = this.configuredBucket;
    if (!bucket) {
      const identity = await this.sts.send(new GetCallerIdentityCommand({}));
      if (!identity.Account) {
        throw new Error('Unable to determine the AWS account id for the default bucket');
      }
      bucket = `sagemaker-${region}-${identity.Account}`;
    }

    await this.ensureBucket(bucket, region);
    this.resolvedBucket = bucket;
    return bucket;
  }

  async createProcessingJob(request: ProcessingJobRequest): Promise<void> {
    const input = toCreateProcessingJobInput(request);
    await this.sagemaker.send(new CreateProcessingJobCommand(input));
    log.info({ jobName: request.jobName }, 'processing job created');
  }

  async describeProcessingJob(jobName: string): Promise<ProcessingJobDescription> {
    return this.sagemaker.send(new DescribeProcessingJobCommand({ ProcessingJobName: jobName }));
  }

  async stopProcessingJob(jobName: string): Promise<void> {
    await this.sagemaker.send(new StopProcessingJobCommand({ ProcessingJobName: jobName }));
  }

  async waitForProcessingJob(jobName: string): Promise<ProcessingJobDescription> {
    for (;;) {
      const description = await this.describeProcessingJob(jobName);
      if (isTerminal(description)) {
        log.info({ jobName, status: description.ProcessingJobStatus }, 'processing job finished');
        assertSuccessful(jobName, description);
        return description;
      }
      log.debug({ jobName, status: description.ProcessingJobStatus }, 'waiting for processing job');
      await sleep(this.pollIntervalMs);
    }
  }

  /**
   * Copies the job's CloudWatch events to the log sink. With `wait`, tails
   * until the job is terminal and then reads once more to pick up the last
   * events before checking the final status.
   */
  async logsForProcessingJob(jobName: string, options: LogsOptions): Promise<ProcessingJobDescription> {
    let description = await this.describeProcessingJob(jobName);
    const positions = new Map<string, string>();
    let state: LogState = options.wait && !isTerminal(description) ? 'tailing' : 'complete';

    for (;;) {
      await this.readNewLogEvents(jobName, positions);
      if (state === 'complete') break;

      await sleep(this.pollIntervalMs);
      if (state === 'job-complete') {
        state = 'complete';
        continue;
      }

      description = await this.describeProcessingJob(jobName);
      if (isTerminal(description)) state = 'job-complete';
    }

    if (options.wait) {
      log.info({ jobName, status: description.ProcessingJobStatus }, 'processing job finished');
      assertSuccessful(jobName, description);
    }
    return description;
  }

  private async resolveRegion(): Promise<string> {
    return this.region ?? this.sagemaker.config.region();
  }

  private async ensureBucket(bucket: string, region: string): Promise<void> {
    try {
      await this.s3.send(new HeadBucketCommand({ Bucket: bucket }));
      return;
    } catch (err) {
      const name = errorName(err);
      if (name !== 'NotFound' && name !== 'NoSuchBucket') throw err;
    }

    const input: CreateBucketCommandInput = { Bucket: bucket };
    if (region !== 'us-east-1') {
      if (!isMember(BucketLocationConstraint, region)) {
        throw new Error(`Cannot create bucket ${bucket}: unknown location constraint ${region}`);
      }
      input.CreateBucketConfiguration = { LocationConstraint: region };
    }

    try {
      await this.s3.send(new CreateBucketCommand(input));
      log.info({ bucket, region }, 'created default bucket');
    } catch (err) {
      const name = errorName(err);
      if (name !== 'BucketAlreadyOwnedByYou' && name !== 'OperationAborted') throw err;
    }
  }

  private async listLogStreams(jobName: string): Promise<string[]> {
    const names: string[] = [];
    let nextToken: string | undefined;
    do {
      const response = await this.logs
        .send(
          new DescribeLogStreamsCommand({
            logGroupName: PROCESSING_LOG_GROUP,
            logStreamNamePrefix: `${jobName}/`,
            nextToken,
          }),
        )
        .catch((err: unknown) => {
          // The group appears with the job's first log line.
          if (errorName(err) === 'ResourceNotFoundException') return null;
          throw err;
        });
      if (!response) return [];
      for (const stream of response.logStreams ?? []) {
        if (stream.logStreamName) names.push(stream.logStreamName);
      }
      nextToken = response.nextToken;
    } while (nextToken);
    return names.sort();
  }

  private async readNewLogEvents(jobName: string, positions: Map<string, string>): Promise<void> {
    const streams = await this.listLogStreams(jobName);
    for (const stream of streams) {
      const label = stream.startsWith(`${jobName}/`) ? stream.slice(jobName.length + 1) : stream;
      for (;;) {
        const previous = positions.get(stream);
        const response = await this.logs.send(
          new GetLogEventsCommand({
            logGroupName: PROCESSING_LOG_GROUP,
            logStreamName: stream,
            startFromHead: true,
            nextToken: previous,
          }),
        );
        const events = response.events ?? [];
        for (const event of events) {
          this.logSink(`[${label}] ${(event.message ?? '').replace(/\n$/, '')}`);
        }
        const next = response.nextForwardToken;
        if (next) positions.set(stream, next);
        if (events.length === 0 || !next || next === previous) break;
      }
    }
  }
}

export function toCreateProcessingJobInput(request: ProcessingJobRequest): CreateProcessingJobCommandInput {
  const cluster = request.resources.ClusterConfig;
  const instanceType = cluster.InstanceType;
  if (!isMember(ProcessingInstanceType, instanceType)) {
    throw new ProcessingValidationError(
      'unsupported_instance_type',
      `Unsupported processing instance type: ${instanceType}`,
      { instanceType },
    );
  }

  const kmsKeys = new Set<string>();
  for (const output of request.outputs) {
    if (output.S3Output.KmsKeyId !== undefined) kmsKeys.add(output.S3Output.KmsKeyId);
  }
  if (kmsKeys.size > 1) {
    throw new ProcessingValidationError(
      'conflicting_output_kms_keys',
      'All outputs of a processing job must use the same KMS key',
      { kmsKeyIds: [...kmsKeys] },
    );
  }
  const [outputKmsKey] = kmsKeys;

  return {
    ProcessingJobName: request.jobName,
    RoleArn: request.roleArn,
    ProcessingInputs: request.inputs.map((input) => ({
      InputName: input.InputName,
      // S3DownloadMode has no counterpart in CreateProcessingJob.
      S3Input: {
        S3Uri: input.S3Input.S3Uri,
        LocalPath: input.S3Input.LocalPath,
        S3DataType: input.S3Input.S3DataType,
        S3InputMode: input.S3Input.S3InputMode,
        S3DataDistributionType: input.S3Input.S3DataDistributionType,
        S3CompressionType: input.S3Input.S3CompressionType,
      },
    })),
    ProcessingOutputConfig:
      request.outputs.length > 0
        ? {
            Outputs: request.outputs.map((output) => ({
              OutputName: output.OutputName,
              S3Output: {
                S3Uri: output.S3Output.S3Uri,
                LocalPath: output.S3Output.LocalPath,
                S3UploadMode: output.S3Output.S3UploadMode,
              },
            })),
            KmsKeyId: outputKmsKey,
          }
        : undefined,
    ProcessingResources: {
      ClusterConfig: {
        InstanceType: instanceType,
        InstanceCount: cluster.InstanceCount,
        VolumeSizeInGB: cluster.VolumeSizeInGB,
        VolumeKmsKeyId: cluster.VolumeKmsKeyId,
      },
    },
    StoppingCondition: { MaxRuntimeInSeconds: request.stoppingCondition.MaxRuntimeInSeconds },
    AppSpecification: {
      ImageUri: request.appSpecification.ImageUri,
      ContainerEntrypoint: request.appSpecification.ContainerEntrypoint,
      ContainerArguments: request.appSpecification.ContainerArguments,
    },
    Environment: request.environment,
    NetworkConfig: request.networkConfig,
    Tags: request.tags,
  };
}
