import type { LoggerService } from '@nestjs/common';
import { errorMessage } from '../common/errors';
import { SkippedRecord, TriggerEvent } from './interfaces/s3-event.interface';
import { buildJobParameters, toJobArguments } from './job-parameters';
import { JobStarter } from './job-starter';
import { TriggerConfig } from './trigger.config';
import { parseTriggerEvents } from './trigger-event';

export type DispatchResult =
  | {
      status: 'triggered';
      source: string;
      jobName: string;
      jobRunId: string;
    }
  | {
      status: 'failed';
      source: string;
      jobName: string;
      error: string;
    };

export interface DispatchSummary {
  message: string;
  results: DispatchResult[];
  skipped: SkippedRecord[];
}

export class JobStartError extends Error {
  constructor(readonly summary: DispatchSummary) {
    const failed = summary.results.filter((result) => result.status === 'failed');
    super(
      `Failed to start ${failed.length} of ${summary.results.length} Glue job run(s): ` +
        failed.map((result) => result.source).join(', '),
    );
    this.name = 'JobStartError';
  }
}

/**
 * Turns a storage notification into Glue job runs: one StartJobRun per
 * qualifying record, no retries beyond what the job starter's client is
 * configured for, and no state kept between invocations.
 */
export class TriggerDispatcher {
  constructor(
    private readonly jobStarter: JobStarter,
    private readonly config: TriggerConfig,
    private readonly logger: LoggerService,
  ) {}

  async dispatch(payload: unknown): Promise<DispatchSummary> {
    const { events, skipped } = parseTriggerEvents(payload, this.config.filters);

    for (const record of skipped) {
      this.logger.warn(
        `Skipping record ${record.index} (${record.reason}): ${record.detail}`,
      );
    }

    const results: DispatchResult[] = [];
    for (const event of events) {
      results.push(await this.dispatchOne(event));
    }

    const summary: DispatchSummary = {
      message: events.length
        ? 'Glue job runs started'
        : 'No qualifying records in event',
      results,
      skipped,
    };

    if (results.some((result) => result.status === 'failed')) {
      throw new JobStartError(summary);
    }
    return summary;
  }

  private async dispatchOne(event: TriggerEvent): Promise<DispatchResult> {
    const source = `s3://${event.bucketName}/${event.objectKey}`;
    const { jobName } = this.config;
    const args = toJobArguments(buildJobParameters(event, this.config));

    this.logger.log(`Triggering Glue job ${jobName} for ${source}`);
    try {
      const jobRunId = await this.jobStarter.startJobRun(jobName, args);
      this.logger.log(`Started Glue job run ${jobRunId} for ${source}`);
      return { status: 'triggered', source, jobName, jobRunId };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Error triggering Glue job for ${source}: ${message}`);
      return { status: 'failed', source, jobName, error: message };
    }
  }
}
