/**
 * Environment configuration.
 *
 * Everything here is optional: the AWS SDK resolves region and credentials on
 * its own when nothing is set, and the default bucket falls back to the
 * account-derived name.
 */
import { z } from 'zod';
import { logger } from './logger.js';

const log = logger.child({ module: 'config' });

export const DEFAULT_POLL_INTERVAL_MS = 5_000;

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const envSchema = z.object({
  AWS_REGION: optionalString,
  AWS_DEFAULT_REGION: optionalString,
  PROCRUN_DEFAULT_BUCKET: optionalString,
  PROCRUN_POLL_INTERVAL_MS: z.coerce.number().int().positive().optional(),
});

export interface ProcrunConfig {
  /** AWS region; undefined lets the SDK's provider chain decide */
  region?: string;
  /** Bucket used for uploads and rewritten outputs */
  defaultBucket?: string;
  /** Delay between status polls while waiting on a job */
  pollIntervalMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ProcrunConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join('.') ?? 'environment';
    throw new Error(`Invalid ${variable}: ${issue?.message ?? 'unknown error'}`);
  }

  const config: ProcrunConfig = {
    region: parsed.data.AWS_REGION ?? parsed.data.AWS_DEFAULT_REGION,
    defaultBucket: parsed.data.PROCRUN_DEFAULT_BUCKET,
    pollIntervalMs: parsed.data.PROCRUN_POLL_INTERVAL_MS ?? DEFAULT_POLL_INTERVAL_MS,
  };

  log.debug(
    { region: config.region ?? 'sdk-default', defaultBucket: config.defaultBucket ?? 'derived', pollIntervalMs: config.pollIntervalMs },
    'config loaded',
  );

  return config;
}
