import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { isNotFoundError } from '../aws/aws-errors';
import { GlueService } from '../aws/glue.service';
import { LambdaService } from '../aws/lambda.service';
import { LogsService } from '../aws/logs.service';
import { S3Service } from '../aws/s3.service';
import { errorMessage } from '../common/errors';
import { PipelineConfig } from '../config/pipeline-config.interface';
import { DeploymentNames, deploymentNames } from '../naming/resource-naming';
import {
  isPartitionedOutputKey,
  outputPartitionPrefix,
  outputPartitions,
} from '../pipeline/output-layout';

export type CheckOutcome = 'ok' | 'absent' | 'failed';

export interface MonitorOptions {
  hours: number;
  prefix?: string;
  now?: Date;
}

export interface OutputListing {
  objectCount: number;
  totalBytes: number;
  partitions: string[];
  parquetParts: number;
}

export interface MonitorReport {
  function: CheckOutcome;
  job: CheckOutcome;
  output: CheckOutcome;
  listing?: OutputListing;
  failures: number;
}

@Injectable()
export class MonitorService {
  private readonly logger = new Logger(MonitorService.name);
  private readonly config: PipelineConfig;

  constructor(
    private readonly lambdaService: LambdaService,
    private readonly logsService: LogsService,
    private readonly glueService: GlueService,
    private readonly s3Service: S3Service,
    private readonly configService: ConfigService,
  ) {
    this.config = this.configService.getOrThrow<PipelineConfig>('pipeline');
  }

  async run(options: MonitorOptions): Promise<MonitorReport> {
    const names = deploymentNames(this.config, this.config);
    const now = options.now ?? new Date();
    const prefix = options.prefix ?? this.config.outputPrefix;

    this.logger.log(`Monitoring ${this.config.projectName} (${this.config.environment}) in ${this.config.region}`);

    const fn = await this.check('Lambda function', () =>
      this.checkFunction(names, now.getTime() - options.hours * 3_600_000),
    );
    const job = await this.check('Glue job', () => this.checkJob(names.glueJob));

    let listing: OutputListing | undefined;
    const output = await this.check('Destination bucket', async () => {
      listing = await this.checkOutput(names.destinationBucket, prefix);
    });

    const failures = [fn, job, output].filter((outcome) => outcome === 'failed').length;
    return { function: fn, job, output, listing, failures };
  }

  private async check(label: string, action: () => Promise<void>): Promise<CheckOutcome> {
    try {
      await action();
      return 'ok';
    } catch (error) {
      if (isNotFoundError(error)) {
        this.logger.warn(`${label} not found: ${errorMessage(error)}`);
        return 'absent';
      }
      this.logger.error(`${label} check failed: ${errorMessage(error)}`);
      return 'failed';
    }
  }

  private async checkFunction(names: DeploymentNames, since: number): Promise<void> {
    const configuration = await this.lambdaService.getFunctionConfiguration(
      names.lambdaFunction,
    );
    this.logger.log(
      `Lambda ${names.lambdaFunction}: runtime ${configuration?.Runtime ?? 'unknown'}, ` +
        `last modified ${configuration?.LastModified ?? 'unknown'}`,
    );

    const logGroup = this.config.observabilityEnabled
      ? names.logGroup
      : `/aws/lambda/${names.lambdaFunction}`;
    const streams = await this.logsService.recentStreams(logGroup);
    const latest = streams[0]?.logStreamName;
    if (!latest) {
      this.logger.warn(`No log streams in ${logGroup}; the function has not run yet`);
      return;
    }

    const events = await this.logsService.events(logGroup, latest, since);
    this.logger.log(`${events.length} log event(s) in ${logGroup}/${latest}`);
    for (const event of events) {
      const at = event.timestamp ? new Date(event.timestamp).toISOString() : '-';
      this.logger.log(`[${at}] ${(event.message ?? '').trim()}`);
    }
  }

  private async checkJob(jobName: string): Promise<void> {
    const job = await this.glueService.getJob(jobName);
    this.logger.log(
      `Glue job ${jobName}: version ${job?.GlueVersion ?? 'unknown'}, ` +
        `${job?.NumberOfWorkers ?? '?'} x ${job?.WorkerType ?? 'unknown'}`,
    );

    const runs = await this.glueService.getJobRuns(jobName);
    if (runs.length === 0) {
      this.logger.warn(`No runs of ${jobName} yet`);
      return;
    }
    for (const run of runs) {
      const line =
        `Run ${run.Id}: ${run.JobRunState} (started ${run.StartedOn?.toISOString() ?? 'n/a'}, ` +
        `completed ${run.CompletedOn?.toISOString() ?? 'in progress'}) ` +
        `source ${run.Arguments?.['--source_key'] ?? 'n/a'}`;
      if (run.JobRunState === 'FAILED' || run.JobRunState === 'ERROR') {
        this.logger.error(`${line}: ${run.ErrorMessage ?? 'no error message'}`);
      } else {
        this.logger.log(line);
      }
    }
  }

  private async checkOutput(bucket: string, prefix: string): Promise<OutputListing> {
    const objects = await this.s3Service.listObjects(bucket, `${prefix.replace(/\/+$/, '')}/`);
    const keys = objects.map((object) => object.key);
    const listing: OutputListing = {
      objectCount: objects.length,
      totalBytes: objects.reduce((total, object) => total + object.size, 0),
      partitions: outputPartitions(keys, prefix),
      parquetParts: keys.filter((key) => isPartitionedOutputKey(key, prefix)).length,
    };

    if (listing.parquetParts === 0) {
      this.logger.warn(`No partitioned parquet output under s3://${bucket}/${prefix}/ yet`);
    } else {
      const latest = listing.partitions[listing.partitions.length - 1].slice('date='.length);
      this.logger.log(
        `${listing.parquetParts} parquet part(s) across ${listing.partitions.length} ` +
          `partition(s), latest s3://${bucket}/${outputPartitionPrefix(prefix, latest)}`,
      );
    }
    return listing;
  }
}
