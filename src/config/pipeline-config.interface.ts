import { LayerDependencyScope, PackageVariant } from './defaults';

export interface PipelineConfig {
  projectName: string;
  environment: string;
  region: string;
  sourceBucket?: string;
  destinationBucket?: string;
  glueScriptsBucket?: string;
  inputPrefix: string;
  outputPrefix: string;
  observabilityEnabled: boolean;
  packageVariant: PackageVariant;
  layerDependencyScope: LayerDependencyScope;
  jobStartMaxAttempts: number;
  stackName: string;
  rootDir: string;
}
