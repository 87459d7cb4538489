import { ProcessingValidationError } from './errors.js';

export interface S3Location {
  bucket: string;
  key: string;
}

function uriScheme(value: string): string | null {
  try {
    return new URL(value).protocol.replace(/:$/, '').toLowerCase();
  } catch {
    return null;
  }
}

/** True for `s3://` URIs; local paths (including `C:\...`) are not remote. */
export function isRemoteUri(value: string): boolean {
  return uriScheme(value) === 's3';
}

export function parseS3Uri(uri: string): S3Location {
  const match = /^s3:\/\/([^/]+)\/?(.*)$/i.exec(uri);
  if (!match?.[1]) {
    throw new ProcessingValidationError('invalid_s3_uri', `Not an S3 URI: ${uri}`);
  }
  return { bucket: match[1], key: match[2] ?? '' };
}

/** Joins key segments with single slashes. Dot segments are kept: S3 keys are literal. */
export function s3Key(...segments: string[]): string {
  return segments
    .map((segment) => segment.replace(/^\/+|\/+$/g, ''))
    .filter((segment) => segment.length > 0)
    .join('/');
}

export function s3Uri(bucket: string, ...segments: string[]): string {
  const key = s3Key(...segments);
  return key ? `s3://${bucket}/${key}` : `s3://${bucket}`;
}
