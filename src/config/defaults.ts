export type PackageVariant = 'bundled' | 'layered';
export type LayerDependencyScope = 'lightweight' | 'all';

export const PACKAGE_VARIANTS: readonly PackageVariant[] = ['bundled', 'layered'];
export const LAYER_DEPENDENCY_SCOPES: readonly LayerDependencyScope[] = [
  'lightweight',
  'all',
];

export interface PipelineDefaults {
  readonly region: string;
  readonly inputPrefix: string;
  readonly outputPrefix: string;
  readonly observabilityEnabled: boolean;
  readonly packageVariant: PackageVariant;
  readonly layerDependencyScope: LayerDependencyScope;
  readonly jobStartMaxAttempts: number;
  readonly stackName: string;
}

export const PIPELINE_DEFAULTS: PipelineDefaults = {
  region: 'us-east-1',
  inputPrefix: 'input/',
  outputPrefix: 'processed_data',
  observabilityEnabled: true,
  packageVariant: 'bundled',
  layerDependencyScope: 'lightweight',
  jobStartMaxAttempts: 1,
  stackName: 'dev',
};
