export * from './types.js';
export { ProcessingValidationError, ProcessingJobFailedError, type ProcessingValidationCode } from './errors.js';
export {
  ProcessingInput,
  ProcessingOutput,
  NetworkConfig,
  type ProcessingInputOptions,
  type ProcessingOutputOptions,
  type NetworkConfigOptions,
} from './descriptors.js';
export { baseNameFromImage, nameFromBase, jobTimestamp, MAX_JOB_NAME_LENGTH } from './naming.js';
export { isRemoteUri, parseS3Uri, s3Key, s3Uri, type S3Location } from './s3-uri.js';
export { buildProcessingJobRequest, type JobConfiguration, type JobRun } from './request.js';
export type { ProcessingSession, LogsOptions } from './session.js';
export { S3Uploader, type Uploader, type S3UploaderOptions } from './uploader.js';
export {
  AwsProcessingSession,
  toCreateProcessingJobInput,
  PROCESSING_LOG_GROUP,
  type AwsProcessingSessionOptions,
  type LogSink,
} from './aws-session.js';
export { ProcessingJob, type WaitOptions } from './processing-job.js';
export {
  Processor,
  assertLogsRequireWait,
  DEFAULT_VOLUME_SIZE_IN_GB,
  DEFAULT_MAX_RUNTIME_IN_SECONDS,
  type ProcessorOptions,
  type RunOptions,
} from './processor.js';
export {
  ScriptProcessor,
  resolveScriptName,
  scriptContainerPath,
  CODE_CONTAINER_BASE_PATH,
  CODE_CONTAINER_INPUT_NAME,
  type ScriptProcessorOptions,
  type ScriptRunOptions,
} from './script-processor.js';
