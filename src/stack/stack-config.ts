import type { ConfigMap } from '@pulumi/pulumi/automation';
import { PipelineConfig } from '../config/pipeline-config.interface';
import { deploymentNames } from '../naming/resource-naming';

export const STACK_CONFIG_NAMESPACE = 'etl';

// Keys read by infra/src/settings.ts under the `etl:` namespace.
export const STACK_CONFIG_KEYS = {
  projectName: 'projectName',
  environment: 'environment',
  sourceBucketName: 'sourceBucketName',
  destinationBucketName: 'destinationBucketName',
  glueScriptsBucketName: 'glueScriptsBucketName',
  inputPrefix: 'inputPrefix',
  outputPrefix: 'outputPrefix',
  enableCloudwatch: 'enableCloudwatch',
  packageVariant: 'packageVariant',
  layerDependencyScope: 'layerDependencyScope',
  jobStartMaxAttempts: 'jobStartMaxAttempts',
} as const;

export interface StackConfigChanges {
  set: ConfigMap;
  /** Fully qualified keys with no value in the environment; cleared from the stack. */
  unset: string[];
}

function qualified(key: string): string {
  return `${STACK_CONFIG_NAMESPACE}:${key}`;
}

/** Maps the validated environment onto Pulumi stack config. */
export function toStackConfig(config: PipelineConfig): StackConfigChanges {
  // Naming inputs are checked here so nothing reaches Pulumi without them.
  deploymentNames(config, config);

  const K = STACK_CONFIG_KEYS;
  const values: Record<string, string | undefined> = {
    [K.projectName]: config.projectName,
    [K.environment]: config.environment,
    [K.sourceBucketName]: config.sourceBucket,
    [K.destinationBucketName]: config.destinationBucket,
    [K.glueScriptsBucketName]: config.glueScriptsBucket,
    [K.inputPrefix]: config.inputPrefix,
    [K.outputPrefix]: config.outputPrefix,
    [K.enableCloudwatch]: String(config.observabilityEnabled),
    [K.packageVariant]: config.packageVariant,
    [K.layerDependencyScope]: config.layerDependencyScope,
    [K.jobStartMaxAttempts]: String(config.jobStartMaxAttempts),
  };

  const set: ConfigMap = { 'aws:region': { value: config.region } };
  const unset: string[] = [];
  for (const [key, value] of Object.entries(values)) {
    if (value === undefined) {
      unset.push(qualified(key));
    } else {
      set[qualified(key)] = { value };
    }
  }
  return { set, unset };
}
