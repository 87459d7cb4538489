import { createReadStream } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { logger, withSpan } from '@procrun/shared';
import { ProcessingValidationError } from './errors.js';
import { parseS3Uri, s3Key, s3Uri } from './s3-uri.js';

const log = logger.child({ module: 'uploader' });

/** Object-storage collaborator: copies local content to a remote URI and returns where it landed. */
export interface Uploader {
  upload(localPath: string, desiredUri: string): Promise<string>;
}

export interface S3UploaderOptions {
  client?: S3Client;
  region?: string;
}

function isMissingPathError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

async function listFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(full)));
    } else if (entry.isFile()) {
      files.push(full);
    }
  }
  return files.sort();
}

export class S3Uploader implements Uploader {
  private readonly client: S3Client;

  constructor(options: S3UploaderOptions = {}) {
    this.client = options.client ?? new S3Client({ region: options.region });
  }

  /**
   * A file lands at `<prefix>/<basename>` and its full URI is returned.
   * A directory is copied file by file below `<prefix>` and the prefix URI is returned.
   */
  async upload(localPath: string, desiredUri: string): Promise<string> {
    const { bucket, key: rawPrefix } = parseS3Uri(desiredUri);
    const prefix = rawPrefix.replace(/\/+$/, '');

    const info = await stat(localPath).catch((err: unknown) => {
      if (isMissingPathError(err)) {
        throw new ProcessingValidationError(
          'code_path_not_found',
          `The file or directory you specified does not exist: ${localPath}`,
        );
      }
      throw err;
    });

    return withSpan('procrun.upload', { localPath, bucket, prefix }, async () => {
      if (info.isFile()) {
        const key = s3Key(prefix, path.basename(localPath));
        await this.putFile(bucket, key, localPath, info.size);
        log.info({ localPath, bucket, key }, 'uploaded file');
        return s3Uri(bucket, key);
      }

      if (info.isDirectory()) {
        const files = await listFiles(localPath);
        for (const file of files) {
          const relative = path.relative(localPath, file).split(path.sep).join('/');
          const { size } = await stat(file);
          await this.putFile(bucket, s3Key(prefix, relative), file, size);
        }
        log.info({ localPath, bucket, prefix, files: files.length }, 'uploaded directory');
        return s3Uri(bucket, prefix);
      }

      throw new ProcessingValidationError(
        'code_path_not_found',
        `Only files and directories can be uploaded: ${localPath}`,
      );
    });
  }

  private async putFile(bucket: string, key: string, file: string, size: number): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: createReadStream(file),
        ContentLength: size,
      }),
    );
  }
}
