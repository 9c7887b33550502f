import { Module } from '@nestjs/common';
import { AwsModule } from '../aws/aws.module';
import { RunLocalService } from './run-local.service';

@Module({
  imports: [AwsModule],
  providers: [RunLocalService],
  exports: [RunLocalService],
})
export class PipelineModule {}
