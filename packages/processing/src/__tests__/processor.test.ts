import { describe, it, expect, beforeEach } from 'vitest';
import { NetworkConfig, ProcessingInput, ProcessingOutput } from '../descriptors.js';
import { Processor, type ProcessorOptions } from '../processor.js';
import { FakeSession, FakeUploader, captureError, expectValidationError } from './fakes.js';

const NOW = new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 6));

describe('Processor', () => {
  let session: FakeSession;
  let uploader: FakeUploader;

  function makeProcessor(overrides: Partial<ProcessorOptions> = {}): Processor {
    return new Processor({
      role: 'arn:aws:iam::123456789012:role/TestRole',
      imageUri: '123456789012.dkr.ecr.us-west-2.amazonaws.com/my-image:latest',
      instanceCount: 1,
      instanceType: 'ml.m5.xlarge',
      session,
      uploader,
      ...overrides,
    });
  }

  beforeEach(() => {
    session = new FakeSession();
    uploader = new FakeUploader();
  });

  describe('construction', () => {
    it('applies defaults', () => {
      const processor = makeProcessor();
      expect(processor.volumeSizeInGb).toBe(30);
      expect(processor.maxRuntimeInSeconds).toBe(86400);
      expect(processor.entrypoint).toBeUndefined();
      expect(processor.jobs).toEqual([]);
      expect(processor.latestJob).toBeUndefined();
    });

    it('rejects a non-positive instance count', () => {
      const err = captureError(() => makeProcessor({ instanceCount: 0 }));
      expectValidationError(err, 'invalid_processor_options');
    });

    it('rejects an empty role', () => {
      expect(() => makeProcessor({ role: '' })).toThrow(/^Invalid processor options: role:/);
    });
  });

  describe('generateJobName()', () => {
    it('returns an explicit name unchanged', () => {
      expect(makeProcessor().generateJobName('my-job')).toBe('my-job');
    });

    it('derives the name from the image', () => {
      expect(makeProcessor().generateJobName(undefined, NOW)).toBe('my-image-2024-01-02-03-04-05-006');
    });

    it('prefers the base job name', () => {
      const processor = makeProcessor({ baseJobName: 'nightly' });
      expect(processor.generateJobName(undefined, NOW)).toBe('nightly-2024-01-02-03-04-05-006');
    });
  });

  describe('normalizeInputs()', () => {
    it('names inputs by position and uploads local sources', async () => {
      const inputs = [
        new ProcessingInput({ source: '/local/data.csv', destination: '/opt/ml/processing/input/data' }),
        new ProcessingInput({ source: 's3://other/prefix', destination: '/opt/ml/processing/input/ref' }),
        new ProcessingInput({ source: 'relative/dir', destination: '/opt/ml/processing/input/extra', inputName: 'extra' }),
      ];

      const normalized = await makeProcessor().normalizeInputs('job-1', inputs);

      expect(normalized.map((input) => [input.inputName, input.source])).toEqual([
        ['input-1', 's3://test-bucket/job-1/input/input-1/data.csv'],
        ['input-2', 's3://other/prefix'],
        ['extra', 's3://test-bucket/job-1/input/extra/dir'],
      ]);
      expect(uploader.uploads).toEqual([
        { localPath: '/local/data.csv', desiredUri: 's3://test-bucket/job-1/input/input-1' },
        { localPath: 'relative/dir', desiredUri: 's3://test-bucket/job-1/input/extra' },
      ]);
      expect(session.defaultBucketCalls).toBe(1);
    });

    it('leaves the caller descriptors untouched', async () => {
      const input = new ProcessingInput({ source: '/local/data.csv', destination: '/input' });
      await makeProcessor().normalizeInputs('job-1', [input]);

      expect(input.source).toBe('/local/data.csv');
      expect(input.inputName).toBeUndefined();
    });

    it('skips the bucket lookup when every source is remote', async () => {
      const inputs = [new ProcessingInput({ source: 's3://b/k', destination: '/input' })];
      await makeProcessor().normalizeInputs('job-1', inputs);

      expect(session.defaultBucketCalls).toBe(0);
      expect(uploader.uploads).toEqual([]);
    });

    it('rejects objects that are not ProcessingInput instances', async () => {
      const bogus = { source: '/local', destination: '/input' } as unknown as ProcessingInput;

      await expect(makeProcessor().normalizeInputs('job-1', [bogus])).rejects.toThrow(
        new TypeError('Your inputs must be provided as ProcessingInput objects.'),
      );
      expect(uploader.uploads).toEqual([]);
    });

    it('keeps uploads for a dotted input name under the job prefix', async () => {
      const input = new ProcessingInput({
        source: '/local/data.csv',
        destination: '/input',
        inputName: '../../other-job',
      });

      const [normalized] = await makeProcessor().normalizeInputs('job-1', [input]);

      expect(uploader.uploads).toEqual([
        { localPath: '/local/data.csv', desiredUri: 's3://test-bucket/job-1/input/../../other-job' },
      ]);
      expect(normalized?.source).toBe('s3://test-bucket/job-1/input/../../other-job/data.csv');
    });

    it('returns an empty list without inputs', async () => {
      await expect(makeProcessor().normalizeInputs('job-1')).resolves.toEqual([]);
    });
  });

  describe('normalizeOutputs()', () => {
    it('names outputs by position and rewrites non-remote destinations', async () => {
      const outputs = [
        new ProcessingOutput({ source: '/opt/ml/processing/output/a', destination: 'results' }),
        new ProcessingOutput({ source: '/opt/ml/processing/output/b', destination: 's3://keep/me' }),
        new ProcessingOutput({ source: '/opt/ml/processing/output/c', destination: '', outputName: 'report' }),
      ];

      const normalized = await makeProcessor().normalizeOutputs('job-1', outputs);

      expect(normalized.map((output) => [output.outputName, output.destination])).toEqual([
        ['output-1', 's3://test-bucket/job-1/output/output-1'],
        ['output-2', 's3://keep/me'],
        ['report', 's3://test-bucket/job-1/output/report'],
      ]);
      expect(uploader.uploads).toEqual([]);
    });

    it('keeps a dotted output name under the job prefix', async () => {
      const output = new ProcessingOutput({ source: '/output', destination: 'results', outputName: '..' });

      const [normalized] = await makeProcessor().normalizeOutputs('job-1', [output]);

      expect(normalized?.destination).toBe('s3://test-bucket/job-1/output/..');
    });

    it('rejects objects that are not ProcessingOutput instances', async () => {
      const bogus = { source: '/output', destination: 's3://b/k' } as unknown as ProcessingOutput;

      await expect(makeProcessor().normalizeOutputs('job-1', [bogus])).rejects.toThrow(
        new TypeError('Your outputs must be provided as ProcessingOutput objects.'),
      );
    });
  });

  describe('run()', () => {
    it('rejects logs without wait before uploading or submitting', async () => {
      const processor = makeProcessor();
      const inputs = [new ProcessingInput({ source: '/local/data.csv', destination: '/input' })];

      const err = await processor.run({ inputs, wait: false, logs: true }).then(
        () => undefined,
        (error: unknown) => error,
      );

      expectValidationError(err, 'logs_require_wait');
      expect(uploader.uploads).toEqual([]);
      expect(session.calls).toEqual([]);
      expect(processor.jobs).toEqual([]);
    });

    it('submits a normalized request without waiting', async () => {
      const processor = makeProcessor({
        entrypoint: ['python3', '/opt/program/run.py'],
        env: { STAGE: 'test' },
        tags: [{ Key: 'team', Value: 'data' }],
        networkConfig: new NetworkConfig({ enableNetworkIsolation: true }),
      });

      const job = await processor.run({
        jobName: 'job-1',
        inputs: [new ProcessingInput({ source: '/local/data.csv', destination: '/opt/ml/processing/input' })],
        outputs: [new ProcessingOutput({ source: '/opt/ml/processing/output', destination: 'out' })],
        arguments: ['--verbose'],
        wait: false,
        logs: false,
      });

      expect(job.jobName).toBe('job-1');
      expect(processor.latestJob).toBe(job);
      expect(processor.jobs).toEqual([job]);
      expect(processor.arguments).toEqual(['--verbose']);
      expect(session.calls).toEqual(['create:job-1']);
      expect(session.created).toEqual([
        {
          jobName: 'job-1',
          inputs: [
            {
              InputName: 'input-1',
              S3Input: {
                S3Uri: 's3://test-bucket/job-1/input/input-1/data.csv',
                LocalPath: '/opt/ml/processing/input',
                S3DataType: 'ManifestFile',
                S3InputMode: 'File',
                S3DownloadMode: 'Continuous',
                S3DataDistributionType: 'FullyReplicated',
                S3CompressionType: 'None',
              },
            },
          ],
          outputs: [
            {
              OutputName: 'output-1',
              S3Output: {
                S3Uri: 's3://test-bucket/job-1/output/output-1',
                LocalPath: '/opt/ml/processing/output',
                S3UploadMode: 'Continuous',
              },
            },
          ],
          resources: {
            ClusterConfig: { InstanceType: 'ml.m5.xlarge', InstanceCount: 1, VolumeSizeInGB: 30 },
          },
          stoppingCondition: { MaxRuntimeInSeconds: 86400 },
          appSpecification: {
            ImageUri: '123456789012.dkr.ecr.us-west-2.amazonaws.com/my-image:latest',
            ContainerArguments: ['--verbose'],
            ContainerEntrypoint: ['python3', '/opt/program/run.py'],
          },
          environment: { STAGE: 'test' },
          networkConfig: { EnableNetworkIsolation: true, EnableInterContainerTrafficEncryption: false },
          roleArn: 'arn:aws:iam::123456789012:role/TestRole',
          tags: [{ Key: 'team', Value: 'data' }],
        },
      ]);
    });

    it('streams logs while waiting by default', async () => {
      await makeProcessor().run({ jobName: 'job-1' });
      expect(session.calls).toEqual(['create:job-1', 'logs:job-1:wait']);
    });

    it('polls without logs when logs is false', async () => {
      await makeProcessor().run({ jobName: 'job-1', logs: false });
      expect(session.calls).toEqual(['create:job-1', 'wait:job-1']);
    });

    it('generates a job name from the image when none is given', async () => {
      const job = await makeProcessor().run({ wait: false, logs: false });
      expect(job.jobName).toMatch(/^my-image-\d{4}-\d{2}-\d{2}-\d{2}-\d{2}-\d{2}-\d{3}$/);
    });

    it('records every job it starts', async () => {
      const processor = makeProcessor();
      const first = await processor.run({ jobName: 'job-1', wait: false, logs: false });
      const second = await processor.run({ jobName: 'job-2', wait: false, logs: false });

      expect(processor.jobs).toEqual([first, second]);
      expect(processor.latestJob).toBe(second);
    });

    it('propagates submission errors and records no job', async () => {
      const failure = new Error('AccessDeniedException');
      session.createError = failure;
      const processor = makeProcessor();

      await expect(processor.run({ jobName: 'job-1', wait: false, logs: false })).rejects.toBe(failure);
      expect(processor.jobs).toEqual([]);
    });
  });
});
