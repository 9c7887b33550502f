import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GlueService } from '../aws/glue.service';
import { LambdaService } from '../aws/lambda.service';
import { PipelineConfig } from '../config/pipeline-config.interface';
import { deploymentNames } from '../naming/resource-naming';
import { triggerConfigFromPipeline } from './trigger.config';
import { DispatchSummary, TriggerDispatcher } from './trigger-dispatcher';
import { buildS3Event } from './trigger-event';

export interface RunLocalOptions {
  key: string;
  bucket?: string;
  /** Invoke the deployed function instead of dispatching in this process. */
  remote?: boolean;
}

export type RunLocalResult =
  | { mode: 'local'; summary: DispatchSummary }
  | { mode: 'remote'; functionName: string; payload: string };

@Injectable()
export class RunLocalService {
  private readonly logger = new Logger(RunLocalService.name);
  private readonly config: PipelineConfig;

  constructor(
    private readonly glueService: GlueService,
    private readonly lambdaService: LambdaService,
    private readonly configService: ConfigService,
  ) {
    this.config = this.configService.getOrThrow<PipelineConfig>('pipeline');
  }

  // Replays the notification S3 would send for an object that is already in
  // the source bucket, without uploading anything (which would fire the
  // deployed trigger a second time).
  async run(options: RunLocalOptions): Promise<RunLocalResult> {
    const names = deploymentNames(this.config, this.config);
    const bucket = options.bucket ?? names.sourceBucket;
    const event = buildS3Event(bucket, options.key);

    if (options.remote) {
      this.logger.log(`Invoking ${names.lambdaFunction} for s3://${bucket}/${options.key}`);
      const result = await this.lambdaService.invokeFunction(
        names.lambdaFunction,
        event,
        'RequestResponse',
      );
      if (result.functionError) {
        throw new Error(
          `${names.lambdaFunction} returned ${result.functionError}: ${result.payload}`,
        );
      }
      return { mode: 'remote', functionName: names.lambdaFunction, payload: result.payload };
    }

    this.logger.log(`Dispatching s3://${bucket}/${options.key} in-process`);
    const dispatcher = new TriggerDispatcher(
      this.glueService,
      triggerConfigFromPipeline(this.config),
      new Logger(TriggerDispatcher.name),
    );
    const summary = await dispatcher.dispatch(event);
    return { mode: 'local', summary };
  }
}
