import { Module } from '@nestjs/common';
import { StackModule } from '../stack/stack.module';
import { PulumiStateBackend } from './pulumi-state.backend';
import { ResourceImporterService } from './resource-importer.service';
import { TRACKED_STATE_BACKEND } from './tracked-state';

@Module({
  imports: [StackModule],
  providers: [
    { provide: TRACKED_STATE_BACKEND, useClass: PulumiStateBackend },
    ResourceImporterService,
  ],
  exports: [ResourceImporterService],
})
export class ImporterModule {}
