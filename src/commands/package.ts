import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { PipelineConfig } from '../config/pipeline-config.interface';
import { buildArtifactPlans, readManifestDependencies } from '../packaging/artifact-plan';
import { PackagerService } from '../packaging/packager.service';
import { GlobalOptions, withApplication } from './bootstrap';

export function packageCommand(options: GlobalOptions): Promise<void> {
  return withApplication(options, async (app) => {
    const logger = new Logger('package');
    const config = app.get(ConfigService).getOrThrow<PipelineConfig>('pipeline');

    const strategy =
      config.packageVariant === 'layered'
        ? `layered (layer dependencies: ${config.layerDependencyScope})`
        : 'bundled (single self-contained function artifact)';
    logger.log(`Packaging strategy: ${strategy}`);

    const plans = buildArtifactPlans(
      config.rootDir,
      config.packageVariant,
      config.layerDependencyScope,
      readManifestDependencies(config.rootDir),
    );
    const artifacts = await app.get(PackagerService).packageAll(plans);

    for (const artifact of artifacts) {
      console.log(`${artifact.name}: ${artifact.archiveRoot} (${artifact.contentHash})`);
    }
  });
}
