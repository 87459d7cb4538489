import { stat } from 'node:fs/promises';
import path from 'node:path';
import { logger } from '@procrun/shared';
import { ProcessingInput } from './descriptors.js';
import { ProcessingValidationError } from './errors.js';
import { Processor, assertLogsRequireWait, type ProcessorOptions, type RunOptions } from './processor.js';
import type { ProcessingJob } from './processing-job.js';
import { isRemoteUri, parseS3Uri, s3Uri } from './s3-uri.js';

const log = logger.child({ module: 'script-processor' });

export const CODE_CONTAINER_BASE_PATH = '/input/';
export const CODE_CONTAINER_INPUT_NAME = 'code';

export type ScriptProcessorOptions = Omit<ProcessorOptions, 'entrypoint'>;

export interface ScriptRunOptions extends RunOptions {
  /** Executable plus flags, e.g. ['python3', '-v'] */
  command: readonly string[];
  /** Remote URI, or a local file or directory holding the script */
  code: string;
  /** Required when `code` is a directory */
  scriptName?: string;
}

type CodePathKind = 'file' | 'directory' | 'missing';

async function localPathKind(target: string): Promise<CodePathKind> {
  try {
    const info = await stat(target);
    if (info.isDirectory()) return 'directory';
    if (info.isFile()) return 'file';
    return 'missing';
  } catch (err) {
    if (err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
      return 'missing';
    }
    throw err;
  }
}

function scriptNameRequired(code: string): ProcessingValidationError {
  return new ProcessingValidationError(
    'script_name_required',
    'You provided a directory without providing a script name. Provide the name of a script inside the directory.',
    { code },
  );
}

/** The file name the entrypoint runs, taken from `scriptName` or the code path itself. */
export async function resolveScriptName(code: string, scriptName?: string): Promise<string> {
  if (isRemoteUri(code)) {
    if (scriptName !== undefined) return scriptName;
    const { key } = parseS3Uri(code);
    // An empty key or a trailing slash names a prefix, not a script.
    if (key === '' || key.endsWith('/')) throw scriptNameRequired(code);
    return path.posix.basename(key);
  }

  const kind = await localPathKind(code);
  if (kind === 'directory') {
    if (scriptName === undefined) throw scriptNameRequired(code);
    return scriptName;
  }
  if (kind === 'file') {
    return path.basename(code);
  }
  throw new ProcessingValidationError(
    'code_path_not_found',
    `The file or directory you specified does not exist: ${code}`,
    { code },
  );
}

/** Container path of the script inside the mounted code input. */
export function scriptContainerPath(scriptName: string): string {
  return path.posix.join(CODE_CONTAINER_BASE_PATH, CODE_CONTAINER_INPUT_NAME, scriptName);
}

/** Runs a user script inside a framework image, with the script shipped as an extra input. */
export class ScriptProcessor extends Processor {
  constructor(options: ScriptProcessorOptions) {
    super(options);
  }

  async run(options: ScriptRunOptions): Promise<ProcessingJob> {
    assertLogsRequireWait(options.wait ?? true, options.logs ?? true);
    const jobName = this.generateJobName(options.jobName);

    const scriptName = await resolveScriptName(options.code, options.scriptName);
    const codeUri = await this.uploadCode(jobName, options.code);
    const codeInput = new ProcessingInput({
      source: codeUri,
      destination: path.posix.join(CODE_CONTAINER_BASE_PATH, CODE_CONTAINER_INPUT_NAME),
      inputName: CODE_CONTAINER_INPUT_NAME,
      s3DataType: 'S3Prefix',
    });

    this.entrypoint = [...options.command, scriptContainerPath(scriptName)];
    log.debug({ jobName, codeUri, entrypoint: this.entrypoint }, 'script entrypoint set');

    return this.startJob(jobName, {
      ...options,
      inputs: [...(options.inputs ?? []), codeInput],
    });
  }

  private async uploadCode(jobName: string, code: string): Promise<string> {
    if (isRemoteUri(code)) return code;
    const desiredUri = s3Uri(await this.session.defaultBucket(), jobName, 'input', CODE_CONTAINER_INPUT_NAME);
    return this.uploader.upload(code, desiredUri);
  }
}
