import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { S3Client } from '@aws-sdk/client-s3';
import { LambdaClient } from '@aws-sdk/client-lambda';
import { GlueClient } from '@aws-sdk/client-glue';
import { CloudWatchLogsClient } from '@aws-sdk/client-cloudwatch-logs';
import { STSClient } from '@aws-sdk/client-sts';
import {
  GLUE_CLIENT,
  LAMBDA_CLIENT,
  LOGS_CLIENT,
  S3_CLIENT,
  STS_CLIENT,
} from './aws.constants';
import { S3Service } from './s3.service';
import { LambdaService } from './lambda.service';
import { GlueService } from './glue.service';
import { LogsService } from './logs.service';
import { StsService } from './sts.service';
import { PipelineConfig } from '../config/pipeline-config.interface';

@Module({
  providers: [
    {
      provide: S3_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const { region } = configService.getOrThrow<PipelineConfig>('pipeline');
        return new S3Client({ region });
      },
    },
    {
      provide: LAMBDA_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const { region } = configService.getOrThrow<PipelineConfig>('pipeline');
        return new LambdaClient({ region });
      },
    },
    {
      // maxAttempts mirrors the deployed function so local dispatch retries the same way.
      provide: GLUE_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const { region, jobStartMaxAttempts } =
          configService.getOrThrow<PipelineConfig>('pipeline');
        return new GlueClient({ region, maxAttempts: jobStartMaxAttempts });
      },
    },
    {
      provide: LOGS_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const { region } = configService.getOrThrow<PipelineConfig>('pipeline');
        return new CloudWatchLogsClient({ region });
      },
    },
    {
      provide: STS_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const { region } = configService.getOrThrow<PipelineConfig>('pipeline');
        return new STSClient({ region });
      },
    },
    S3Service,
    LambdaService,
    GlueService,
    LogsService,
    StsService,
  ],
  exports: [S3Service, LambdaService, GlueService, LogsService, StsService],
})
export class AwsModule {}
