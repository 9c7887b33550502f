import { ConfigService } from '@nestjs/config';
import { PipelineConfig } from '../config/pipeline-config.interface';
import { buildImportPlan } from '../importer/import-plan';
import { ResourceImporterService } from '../importer/resource-importer.service';
import { GlobalOptions, withApplication } from './bootstrap';

export function importResourcesCommand(options: GlobalOptions): Promise<void> {
  return withApplication(options, async (app) => {
    const config = app.get(ConfigService).getOrThrow<PipelineConfig>('pipeline');
    const summary = await app.get(ResourceImporterService).run(buildImportPlan(config));

    if (summary.counts.failed > 0) {
      console.log('\nSome resources failed to import. Fix the errors above and run again.');
      return false;
    }
    console.log('\nNext steps:');
    console.log('  1. etl-pipeline stack preview   (review what would change)');
    console.log('  2. etl-pipeline stack up        (create anything still missing)');
  });
}
