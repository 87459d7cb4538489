import { ProcessingValidationError } from './errors.js';
import type {
  NetworkConfigRequest,
  ProcessingInputRequest,
  ProcessingOutputRequest,
  S3CompressionType,
  S3DataDistributionType,
  S3DataType,
  S3DownloadMode,
  S3InputMode,
  S3UploadMode,
} from './types.js';

export interface ProcessingInputOptions {
  /** Remote URI, or a local file or directory that gets uploaded before the job starts */
  source: string;
  /** Path inside the container */
  destination: string;
  /** Generated as input-N when omitted */
  inputName?: string;
  s3DataType?: S3DataType;
  s3InputMode?: S3InputMode;
  s3DownloadMode?: S3DownloadMode;
  s3DataDistributionType?: S3DataDistributionType;
  /** Gzip is only accepted together with Pipe input mode */
  s3CompressionType?: S3CompressionType;
}

function assertCompressionMode(compression: S3CompressionType, mode: S3InputMode): void {
  if (compression === 'Gzip' && mode !== 'Pipe') {
    throw new ProcessingValidationError(
      'gzip_requires_pipe',
      'Data can only be gzipped when the input mode is Pipe.',
      { s3CompressionType: compression, s3InputMode: mode },
    );
  }
}

export class ProcessingInput {
  readonly source: string;
  readonly destination: string;
  readonly inputName?: string;
  readonly s3DataType: S3DataType;
  readonly s3InputMode: S3InputMode;
  readonly s3DownloadMode: S3DownloadMode;
  readonly s3DataDistributionType: S3DataDistributionType;
  readonly s3CompressionType: S3CompressionType;

  constructor(options: ProcessingInputOptions) {
    this.source = options.source;
    this.destination = options.destination;
    this.inputName = options.inputName;
    this.s3DataType = options.s3DataType ?? 'ManifestFile';
    this.s3InputMode = options.s3InputMode ?? 'File';
    this.s3DownloadMode = options.s3DownloadMode ?? 'Continuous';
    this.s3DataDistributionType = options.s3DataDistributionType ?? 'FullyReplicated';
    this.s3CompressionType = options.s3CompressionType ?? 'None';
    assertCompressionMode(this.s3CompressionType, this.s3InputMode);
  }

  with(overrides: { source?: string; inputName?: string }): ProcessingInput {
    return new ProcessingInput({
      source: overrides.source ?? this.source,
      destination: this.destination,
      inputName: overrides.inputName ?? this.inputName,
      s3DataType: this.s3DataType,
      s3InputMode: this.s3InputMode,
      s3DownloadMode: this.s3DownloadMode,
      s3DataDistributionType: this.s3DataDistributionType,
      s3CompressionType: this.s3CompressionType,
    });
  }

  toRequest(): ProcessingInputRequest {
    assertCompressionMode(this.s3CompressionType, this.s3InputMode);
    return {
      InputName: this.inputName ?? '',
      S3Input: {
        S3Uri: this.source,
        LocalPath: this.destination,
        S3DataType: this.s3DataType,
        S3InputMode: this.s3InputMode,
        S3DownloadMode: this.s3DownloadMode,
        S3DataDistributionType: this.s3DataDistributionType,
        S3CompressionType: this.s3CompressionType,
      },
    };
  }
}

export interface ProcessingOutputOptions {
  /** Path inside the container */
  source: string;
  /** Remote URI; anything else is replaced with a location in the default bucket */
  destination: string;
  /** Generated as output-N when omitted */
  outputName?: string;
  kmsKeyId?: string;
  s3UploadMode?: S3UploadMode;
}

export class ProcessingOutput {
  readonly source: string;
  readonly destination: string;
  readonly outputName?: string;
  readonly kmsKeyId?: string;
  readonly s3UploadMode: S3UploadMode;

  constructor(options: ProcessingOutputOptions) {
    this.source = options.source;
    this.destination = options.destination;
    this.outputName = options.outputName;
    this.kmsKeyId = options.kmsKeyId;
    this.s3UploadMode = options.s3UploadMode ?? 'Continuous';
  }

  with(overrides: { destination?: string; outputName?: string }): ProcessingOutput {
    return new ProcessingOutput({
      source: this.source,
      destination: overrides.destination ?? this.destination,
      outputName: overrides.outputName ?? this.outputName,
      kmsKeyId: this.kmsKeyId,
      s3UploadMode: this.s3UploadMode,
    });
  }

  toRequest(): ProcessingOutputRequest {
    return {
      OutputName: this.outputName ?? '',
      S3Output: {
        S3Uri: this.destination,
        LocalPath: this.source,
        S3UploadMode: this.s3UploadMode,
        ...(this.kmsKeyId !== undefined && { KmsKeyId: this.kmsKeyId }),
      },
    };
  }
}

export interface NetworkConfigOptions {
  enableNetworkIsolation?: boolean;
  encryptInterContainerTraffic?: boolean;
  securityGroupIds?: string[];
  subnets?: string[];
}

export class NetworkConfig {
  readonly enableNetworkIsolation: boolean;
  readonly encryptInterContainerTraffic: boolean;
  readonly securityGroupIds?: string[];
  readonly subnets?: string[];

  constructor(options: NetworkConfigOptions = {}) {
    this.enableNetworkIsolation = options.enableNetworkIsolation ?? false;
    this.encryptInterContainerTraffic = options.encryptInterContainerTraffic ?? false;
    this.securityGroupIds = options.securityGroupIds;
    this.subnets = options.subnets;
  }

  toRequest(): NetworkConfigRequest {
    const request: NetworkConfigRequest = {
      EnableNetworkIsolation: this.enableNetworkIsolation,
      EnableInterContainerTrafficEncryption: this.encryptInterContainerTraffic,
    };
    // VpcConfig requires both security groups and subnets.
    if (this.securityGroupIds && this.subnets) {
      request.VpcConfig = {
        SecurityGroupIds: [...this.securityGroupIds],
        Subnets: [...this.subnets],
      };
    }
    return request;
  }
}
