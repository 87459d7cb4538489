import { z } from 'zod';
import { logger } from '@procrun/shared';
import { AwsProcessingSession } from './aws-session.js';
import { NetworkConfig, ProcessingInput, ProcessingOutput } from './descriptors.js';
import { ProcessingValidationError } from './errors.js';
import { baseNameFromImage, nameFromBase } from './naming.js';
import { ProcessingJob } from './processing-job.js';
import { buildProcessingJobRequest, type JobConfiguration } from './request.js';
import { isRemoteUri, s3Uri } from './s3-uri.js';
import type { ProcessingSession } from './session.js';
import type { Tag } from './types.js';
import { S3Uploader, type Uploader } from './uploader.js';

const log = logger.child({ module: 'processor' });

export const DEFAULT_VOLUME_SIZE_IN_GB = 30;
export const DEFAULT_MAX_RUNTIME_IN_SECONDS = 24 * 60 * 60;

const processorOptionsSchema = z.object({
  role: z.string().min(1),
  imageUri: z.string().min(1),
  instanceCount: z.number().int().positive(),
  instanceType: z.string().min(1),
  entrypoint: z.array(z.string()).optional(),
  volumeSizeInGb: z.number().int().positive().default(DEFAULT_VOLUME_SIZE_IN_GB),
  volumeKmsKey: z.string().min(1).optional(),
  maxRuntimeInSeconds: z.number().int().positive().default(DEFAULT_MAX_RUNTIME_IN_SECONDS),
  baseJobName: z.string().min(1).optional(),
  env: z.record(z.string()).optional(),
  tags: z.array(z.object({ Key: z.string().min(1), Value: z.string() })).optional(),
  networkConfig: z.instanceof(NetworkConfig).optional(),
});

export interface ProcessorOptions {
  /** IAM role the job runs as */
  role: string;
  imageUri: string;
  instanceCount: number;
  /** e.g. ml.m5.xlarge */
  instanceType: string;
  entrypoint?: string[];
  /** Size of the attached storage volume (default: 30) */
  volumeSizeInGb?: number;
  volumeKmsKey?: string;
  /** The service terminates the job after this long (default: one day) */
  maxRuntimeInSeconds?: number;
  /** Prefix for generated job names; the image name is used otherwise */
  baseJobName?: string;
  env?: Record<string, string>;
  tags?: Tag[];
  networkConfig?: NetworkConfig;
  session?: ProcessingSession;
  uploader?: Uploader;
}

export interface RunOptions {
  inputs?: readonly ProcessingInput[];
  outputs?: readonly ProcessingOutput[];
  arguments?: readonly string[];
  /** Block until the job finishes (default: true) */
  wait?: boolean;
  /** Stream job logs while waiting; requires wait (default: true) */
  logs?: boolean;
  jobName?: string;
}

export function assertLogsRequireWait(wait: boolean, logs: boolean): void {
  if (logs && !wait) {
    throw new ProcessingValidationError(
      'logs_require_wait',
      'Logs can only be shown if wait is set to true. Either set wait to true or set logs to false.',
    );
  }
}

function parseProcessorOptions(options: ProcessorOptions) {
  const parsed = processorOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`);
    throw new ProcessingValidationError(
      'invalid_processor_options',
      `Invalid processor options: ${issues.join('; ')}`,
      parsed.error.issues,
    );
  }
  return parsed.data;
}

/** Runs a container image as a processing job. */
export class Processor {
  readonly role: string;
  readonly imageUri: string;
  readonly instanceCount: number;
  readonly instanceType: string;
  readonly volumeSizeInGb: number;
  readonly volumeKmsKey?: string;
  readonly maxRuntimeInSeconds: number;
  readonly baseJobName?: string;
  readonly env?: Record<string, string>;
  readonly tags?: Tag[];
  readonly networkConfig?: NetworkConfig;
  readonly session: ProcessingSession;
  readonly uploader: Uploader;

  entrypoint?: string[];
  arguments?: string[];
  readonly jobs: ProcessingJob[] = [];
  latestJob?: ProcessingJob;

  constructor(options: ProcessorOptions) {
    const config = parseProcessorOptions(options);
    this.role = config.role;
    this.imageUri = config.imageUri;
    this.instanceCount = config.instanceCount;
    this.instanceType = config.instanceType;
    this.entrypoint = config.entrypoint;
    this.volumeSizeInGb = config.volumeSizeInGb;
    this.volumeKmsKey = config.volumeKmsKey;
    this.maxRuntimeInSeconds = config.maxRuntimeInSeconds;
    this.baseJobName = config.baseJobName;
    this.env = config.env;
    this.tags = config.tags;
    this.networkConfig = config.networkConfig;

    const session = options.session ?? AwsProcessingSession.fromEnvironment();
    this.session = session;
    this.uploader =
      options.uploader ?? (session instanceof AwsProcessingSession ? session.uploader : new S3Uploader());
  }

  async run(options: RunOptions = {}): Promise<ProcessingJob> {
    assertLogsRequireWait(options.wait ?? true, options.logs ?? true);
    const jobName = this.generateJobName(options.jobName);
    return this.startJob(jobName, options);
  }

  /** The explicit name, or the base name (or image name) plus a timestamp. */
  generateJobName(jobName?: string, now?: Date): string {
    if (jobName !== undefined) return jobName;
    return nameFromBase(this.baseJobName ?? baseNameFromImage(this.imageUri), { now });
  }

  /**
   * Names every input and uploads local sources to
   * s3://<bucket>/<jobName>/input/<inputName>. Returns new descriptors.
   */
  async normalizeInputs(jobName: string, inputs: readonly ProcessingInput[] = []): Promise<ProcessingInput[]> {
    for (const input of inputs) {
      if (!(input instanceof ProcessingInput)) {
        throw new TypeError('Your inputs must be provided as ProcessingInput objects.');
      }
    }

    const bucket = this.lazyDefaultBucket();
    const normalized: ProcessingInput[] = [];
    for (const [index, input] of inputs.entries()) {
      const inputName = input.inputName ?? `input-${index + 1}`;
      let source = input.source;
      if (!isRemoteUri(source)) {
        const desiredUri = s3Uri(await bucket(), jobName, 'input', inputName);
        source = await this.uploader.upload(source, desiredUri);
        log.debug({ jobName, inputName, localPath: input.source, source }, 'uploaded local input');
      }
      normalized.push(input.with({ inputName, source }));
    }
    return normalized;
  }

  /**
   * Names every output and points non-remote destinations at
   * s3://<bucket>/<jobName>/output/<outputName>. Returns new descriptors.
   */
  async normalizeOutputs(jobName: string, outputs: readonly ProcessingOutput[] = []): Promise<ProcessingOutput[]> {
    for (const output of outputs) {
      if (!(output instanceof ProcessingOutput)) {
        throw new TypeError('Your outputs must be provided as ProcessingOutput objects.');
      }
    }

    const bucket = this.lazyDefaultBucket();
    const normalized: ProcessingOutput[] = [];
    for (const [index, output] of outputs.entries()) {
      const outputName = output.outputName ?? `output-${index + 1}`;
      const destination = isRemoteUri(output.destination)
        ? output.destination
        : s3Uri(await bucket(), jobName, 'output', outputName);
      normalized.push(output.with({ outputName, destination }));
    }
    return normalized;
  }

  protected async startJob(jobName: string, options: RunOptions): Promise<ProcessingJob> {
    const wait = options.wait ?? true;
    const logs = options.logs ?? true;

    const inputs = await this.normalizeInputs(jobName, options.inputs);
    const outputs = await this.normalizeOutputs(jobName, options.outputs);
    this.arguments = options.arguments ? [...options.arguments] : undefined;

    const request = buildProcessingJobRequest(this.jobConfiguration(), {
      jobName,
      inputs,
      outputs,
      arguments: this.arguments,
      entrypoint: this.entrypoint,
    });

    const job = await ProcessingJob.startNew(this.session, request, inputs, outputs);
    this.jobs.push(job);
    this.latestJob = job;

    if (wait) {
      await job.wait({ logs });
    }
    return job;
  }

  protected jobConfiguration(): JobConfiguration {
    return {
      role: this.role,
      imageUri: this.imageUri,
      instanceCount: this.instanceCount,
      instanceType: this.instanceType,
      volumeSizeInGb: this.volumeSizeInGb,
      volumeKmsKey: this.volumeKmsKey,
      maxRuntimeInSeconds: this.maxRuntimeInSeconds,
      env: this.env,
      tags: this.tags,
      networkConfig: this.networkConfig,
    };
  }

  private lazyDefaultBucket(): () => Promise<string> {
    let pending: Promise<string> | undefined;
    return () => {
      pending ??= this.session.defaultBucket();
      return pending;
    };
  }
}
