import { Logger } from '@nestjs/common';
import {
  PackagedArtifact,
  buildArtifactPlans,
  readManifestDependencies,
} from '../../src/packaging/artifact-plan';
import { NpmDependencyInstaller } from '../../src/packaging/dependency-installer';
import { PackagerService } from '../../src/packaging/packager.service';
import { InfraSettings } from './settings';

export interface TriggerArtifacts {
  fn: PackagedArtifact;
  layer?: PackagedArtifact;
}

// Runs the same packager as `etl-pipeline package`, so a stack update always
// archives freshly built directories.
export async function packageTriggerArtifacts(
  rootDir: string,
  settings: Pick<InfraSettings, 'packageVariant' | 'layerDependencyScope'>,
): Promise<TriggerArtifacts> {
  const plans = buildArtifactPlans(
    rootDir,
    settings.packageVariant,
    settings.layerDependencyScope,
    readManifestDependencies(rootDir),
  );
  new Logger('bundling').log(`Packaging ${plans.map((plan) => plan.name).join(', ')}`);

  const packager = new PackagerService(new NpmDependencyInstaller());
  const [fn, layer] = await packager.packageAll(plans);
  return { fn, layer };
}
