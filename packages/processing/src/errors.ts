export type ProcessingValidationCode =
  | 'invalid_processor_options'
  | 'gzip_requires_pipe'
  | 'logs_require_wait'
  | 'script_name_required'
  | 'code_path_not_found'
  | 'invalid_s3_uri'
  | 'unsupported_instance_type'
  | 'conflicting_output_kms_keys';

/** Raised synchronously for bad arguments, before anything reaches the service. */
export class ProcessingValidationError extends Error {
  readonly code: ProcessingValidationCode;
  readonly details?: unknown;

  constructor(code: ProcessingValidationCode, message: string, details?: unknown) {
    super(message);
    this.name = 'ProcessingValidationError';
    this.code = code;
    this.details = details;
  }
}

export class ProcessingJobFailedError extends Error {
  readonly jobName: string;
  readonly status: string;
  readonly failureReason: string | null;

  constructor(options: { jobName: string; status: string; failureReason?: string | null }) {
    const reason = options.failureReason ? `: ${options.failureReason}` : '';
    super(`Processing job ${options.jobName} ended with status ${options.status}${reason}`);
    this.name = 'ProcessingJobFailedError';
    this.jobName = options.jobName;
    this.status = options.status;
    this.failureReason = options.failureReason ?? null;
  }
}
