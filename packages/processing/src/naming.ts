const IMAGE_PATTERN = /^(.+\/)?([^:/]+)(:[^:]+)?$/;

export const MAX_JOB_NAME_LENGTH = 63;

/**
 * Repository part of an image URI.
 *
 * e.g. 123456789012.dkr.ecr.us-west-2.amazonaws.com/my-image:latest → my-image
 */
export function baseNameFromImage(imageUri: string): string {
  const match = IMAGE_PATTERN.exec(imageUri);
  return match?.[2] ?? imageUri;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** UTC timestamp as YYYY-MM-DD-HH-mm-ss-SSS */
export function jobTimestamp(now: Date = new Date()): string {
  return [
    now.getUTCFullYear(),
    pad(now.getUTCMonth() + 1),
    pad(now.getUTCDate()),
    pad(now.getUTCHours()),
    pad(now.getUTCMinutes()),
    pad(now.getUTCSeconds()),
    pad(now.getUTCMilliseconds(), 3),
  ].join('-');
}

export function nameFromBase(
  base: string,
  options: { maxLength?: number; now?: Date } = {},
): string {
  const maxLength = options.maxLength ?? MAX_JOB_NAME_LENGTH;
  const timestamp = jobTimestamp(options.now);
  const trimmed = base.slice(0, Math.max(0, maxLength - timestamp.length - 1));
  return `${trimmed}-${timestamp}`;
}
