import type { ProcessingJobDescription, ProcessingJobRequest } from './types.js';

export interface LogsOptions {
  /** Keep tailing until the job reaches a terminal status */
  wait: boolean;
}

/**
 * Control-plane operations a processor needs. AwsProcessingSession is the
 * production implementation; tests substitute in-memory fakes.
 */
export interface ProcessingSession {
  defaultBucket(): Promise<string>;
  createProcessingJob(request: ProcessingJobRequest): Promise<void>;
  describeProcessingJob(jobName: string): Promise<ProcessingJobDescription>;
  stopProcessingJob(jobName: string): Promise<void>;
  waitForProcessingJob(jobName: string): Promise<ProcessingJobDescription>;
  logsForProcessingJob(jobName: string, options: LogsOptions): Promise<ProcessingJobDescription>;
}
