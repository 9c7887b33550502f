import { Module } from '@nestjs/common';
import { AwsModule } from '../aws/aws.module';
import { COMMAND_RUNNER, runCommand } from '../common/process-runner';
import { MonitorService } from './monitor.service';
import { SetupService } from './setup.service';
import { UploadService } from './upload.service';

@Module({
  imports: [AwsModule],
  providers: [
    { provide: COMMAND_RUNNER, useValue: runCommand },
    MonitorService,
    SetupService,
    UploadService,
  ],
  exports: [MonitorService, SetupService, UploadService],
})
export class OperationsModule {}
