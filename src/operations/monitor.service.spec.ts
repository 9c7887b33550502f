import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { GlueService } from '../aws/glue.service';
import { LambdaService } from '../aws/lambda.service';
import { LogsService } from '../aws/logs.service';
import { S3Service } from '../aws/s3.service';
import { buildPipelineConfig } from '../config/pipeline.config';
import { MonitorService } from './monitor.service';

function awsError(name: string, message: string): Error {
  return Object.assign(new Error(message), { name });
}

describe('MonitorService', () => {
  const now = new Date('2026-03-01T12:00:00Z');

  let lambda: { getFunctionConfiguration: jest.Mock };
  let logs: { recentStreams: jest.Mock; events: jest.Mock };
  let glue: { getJob: jest.Mock; getJobRuns: jest.Mock };
  let s3: { listObjects: jest.Mock };

  async function createService(env: Record<string, string> = {}): Promise<MonitorService> {
    const config = buildPipelineConfig(
      { PROJECT_NAME: 'etl-pipeline', ENVIRONMENT: 'dev', ...env },
      '/work',
    );
    const moduleRef = await Test.createTestingModule({
      providers: [
        MonitorService,
        { provide: ConfigService, useValue: new ConfigService({ pipeline: config }) },
        { provide: LambdaService, useValue: lambda },
        { provide: LogsService, useValue: logs },
        { provide: GlueService, useValue: glue },
        { provide: S3Service, useValue: s3 },
      ],
    }).compile();
    return moduleRef.get(MonitorService);
  }

  beforeEach(() => {
    lambda = {
      getFunctionConfiguration: jest
        .fn()
        .mockResolvedValue({ Runtime: 'nodejs20.x', LastModified: '2026-03-01T10:00:00Z' }),
    };
    logs = {
      recentStreams: jest.fn().mockResolvedValue([{ logStreamName: '2026/03/01/[$LATEST]abc' }]),
      events: jest
        .fn()
        .mockResolvedValue([{ timestamp: now.getTime(), message: 'Triggering Glue job\n' }]),
    };
    glue = {
      getJob: jest
        .fn()
        .mockResolvedValue({ GlueVersion: '4.0', NumberOfWorkers: 2, WorkerType: 'G.1X' }),
      getJobRuns: jest.fn().mockResolvedValue([
        { Id: 'jr_2', JobRunState: 'FAILED', ErrorMessage: 'Input path does not exist' },
        { Id: 'jr_1', JobRunState: 'SUCCEEDED', Arguments: { '--source_key': 'input/a.csv' } },
      ]),
    };
    s3 = {
      listObjects: jest.fn().mockResolvedValue([
        { key: 'processed_data/date=20260301_110000/part-00000.snappy.parquet', size: 100 },
        { key: 'processed_data/date=20260301_110000/part-00001.snappy.parquet', size: 50 },
        { key: 'processed_data/date=20260301_110000/_SUCCESS', size: 0 },
      ]),
    };
  });

  it('reports partitioned output when parquet parts exist', async () => {
    const monitor = await createService();

    const report = await monitor.run({ hours: 2, now });

    expect(report).toEqual({
      function: 'ok',
      job: 'ok',
      output: 'ok',
      listing: {
        objectCount: 3,
        totalBytes: 150,
        partitions: ['date=20260301_110000'],
        parquetParts: 2,
      },
      failures: 0,
    });
    expect(s3.listObjects).toHaveBeenCalledWith('etl-pipeline-output-dev', 'processed_data/');
    expect(glue.getJobRuns).toHaveBeenCalledWith('etl-pipeline-etl-job-dev');
  });

  it('reads recent events from the pipeline log group', async () => {
    const monitor = await createService();

    await monitor.run({ hours: 2, now });

    expect(logs.recentStreams).toHaveBeenCalledWith('etl-pipeline-dev');
    expect(logs.events).toHaveBeenCalledWith(
      'etl-pipeline-dev',
      '2026/03/01/[$LATEST]abc',
      now.getTime() - 2 * 3_600_000,
    );
  });

  it('falls back to the default function log group without observability', async () => {
    const monitor = await createService({ CLOUDWATCH_ENABLED: 'false' });

    await monitor.run({ hours: 1, now });

    expect(logs.recentStreams).toHaveBeenCalledWith('/aws/lambda/etl-pipeline-etl-dev');
  });

  it('reports missing resources as absent, not as failures', async () => {
    lambda.getFunctionConfiguration.mockRejectedValue(
      awsError('ResourceNotFoundException', 'Function not found'),
    );
    glue.getJob.mockRejectedValue(awsError('EntityNotFoundException', 'Job not found'));
    s3.listObjects.mockRejectedValue(awsError('NoSuchBucket', 'The bucket does not exist'));
    const monitor = await createService();

    const report = await monitor.run({ hours: 1, now });

    expect(report).toEqual({
      function: 'absent',
      job: 'absent',
      output: 'absent',
      listing: undefined,
      failures: 0,
    });
  });

  it('counts unexpected errors and still runs the remaining checks', async () => {
    glue.getJob.mockRejectedValue(awsError('AccessDeniedException', 'not authorized'));
    const monitor = await createService();

    const report = await monitor.run({ hours: 1, now });

    expect(report.job).toBe('failed');
    expect(report.output).toBe('ok');
    expect(report.failures).toBe(1);
  });

  it('uses the requested output prefix', async () => {
    s3.listObjects.mockResolvedValue([]);
    const monitor = await createService();

    const report = await monitor.run({ hours: 1, prefix: 'curated/', now });

    expect(s3.listObjects).toHaveBeenCalledWith('etl-pipeline-output-dev', 'curated/');
    expect(report.listing?.parquetParts).toBe(0);
  });
});
