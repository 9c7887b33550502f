import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AwsModule } from './aws/aws.module';
import { pipelineConfig } from './config/pipeline.config';
import { validateEnvironment } from './config/env.validation';
import { ImporterModule } from './importer/importer.module';
import { OperationsModule } from './operations/operations.module';
import { PackagingModule } from './packaging/packaging.module';
import { PipelineModule } from './pipeline/pipeline.module';
import { StackModule } from './stack/stack.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env'],
      load: [pipelineConfig],
      validate: validateEnvironment,
    }),
    AwsModule,
    PackagingModule,
    ImporterModule,
    StackModule,
    PipelineModule,
    OperationsModule,
  ],
})
export class AppModule {}
