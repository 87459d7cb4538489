import { logger, withSpan } from '@procrun/shared';
import type { ProcessingInput, ProcessingOutput } from './descriptors.js';
import type { ProcessingSession } from './session.js';
import type { ProcessingJobDescription, ProcessingJobRequest } from './types.js';

const log = logger.child({ module: 'processing-job' });

export interface WaitOptions {
  /** Stream the job's logs while waiting (default: true) */
  logs?: boolean;
}

/** Handle on a submitted job. Status lives server-side; this only tracks the name. */
export class ProcessingJob {
  readonly session: ProcessingSession;
  readonly jobName: string;
  readonly inputs: readonly ProcessingInput[];
  readonly outputs: readonly ProcessingOutput[];

  constructor(
    session: ProcessingSession,
    jobName: string,
    inputs: readonly ProcessingInput[],
    outputs: readonly ProcessingOutput[],
  ) {
    this.session = session;
    this.jobName = jobName;
    this.inputs = inputs;
    this.outputs = outputs;
  }

  static async startNew(
    session: ProcessingSession,
    request: ProcessingJobRequest,
    inputs: readonly ProcessingInput[],
    outputs: readonly ProcessingOutput[],
  ): Promise<ProcessingJob> {
    log.info(
      {
        jobName: request.jobName,
        inputs: request.inputs,
        outputs: request.outputs,
        environment: request.environment,
      },
      'starting processing job',
    );

    await withSpan(
      'procrun.createProcessingJob',
      {
        jobName: request.jobName,
        imageUri: request.appSpecification.ImageUri,
        instanceCount: request.resources.ClusterConfig.InstanceCount,
      },
      () => session.createProcessingJob(request),
    );

    return new ProcessingJob(session, request.jobName, inputs, outputs);
  }

  async wait(options: WaitOptions = {}): Promise<ProcessingJobDescription> {
    if (options.logs ?? true) {
      return this.session.logsForProcessingJob(this.jobName, { wait: true });
    }
    return this.session.waitForProcessingJob(this.jobName);
  }

  async describe(): Promise<ProcessingJobDescription> {
    const description = await this.session.describeProcessingJob(this.jobName);
    log.debug({ jobName: this.jobName, status: description.ProcessingJobStatus }, 'described processing job');
    return description;
  }

  async stop(): Promise<void> {
    await this.session.stopProcessingJob(this.jobName);
    log.info({ jobName: this.jobName }, 'processing job stop requested');
  }
}
