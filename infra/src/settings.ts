import {
  LAYER_DEPENDENCY_SCOPES,
  LayerDependencyScope,
  PACKAGE_VARIANTS,
  PIPELINE_DEFAULTS,
  PackageVariant,
} from '../../src/config/defaults';
import { oneOf, optional, parseFlag, parsePositiveInt } from '../../src/config/env-values';
import { DeploymentNames, deploymentNames } from '../../src/naming/resource-naming';
import { STACK_CONFIG_KEYS } from '../../src/stack/stack-config';

export const FUNCTION_SETTINGS = {
  runtime: 'nodejs20.x',
  handler: 'index.handler',
  timeoutSeconds: 60,
  memoryMb: 256,
} as const;

export const GLUE_SETTINGS = {
  version: '4.0',
  workerType: 'G.1X',
  numberOfWorkers: 2,
  timeoutMinutes: 60,
  maxRetries: 0,
  scriptKey: 'scripts/etl_job.py',
} as const;

export const LOG_RETENTION_DAYS = 14;
export const DEFAULT_MAX_CONCURRENT_RUNS = 10;

export interface InfraSettings {
  names: DeploymentNames;
  inputPrefix: string;
  outputPrefix: string;
  observabilityEnabled: boolean;
  packageVariant: PackageVariant;
  layerDependencyScope: LayerDependencyScope;
  jobStartMaxAttempts: number;
  maxConcurrentRuns: number;
  tags: Record<string, string>;
}

/** Reads one `etl:<key>` stack config value; `pulumi.Config#get` in the program. */
export type ConfigReader = (key: string) => string | undefined;

export function loadInfraSettings(read: ConfigReader): InfraSettings {
  const K = STACK_CONFIG_KEYS;
  const projectName = optional(read(K.projectName)) ?? '';
  const environment = optional(read(K.environment)) ?? '';

  const names = deploymentNames(
    { projectName, environment },
    {
      sourceBucket: optional(read(K.sourceBucketName)),
      destinationBucket: optional(read(K.destinationBucketName)),
      glueScriptsBucket: optional(read(K.glueScriptsBucketName)),
    },
  );

  return {
    names,
    inputPrefix: optional(read(K.inputPrefix)) ?? PIPELINE_DEFAULTS.inputPrefix,
    outputPrefix: optional(read(K.outputPrefix)) ?? PIPELINE_DEFAULTS.outputPrefix,
    observabilityEnabled: parseFlag(
      read(K.enableCloudwatch),
      PIPELINE_DEFAULTS.observabilityEnabled,
    ),
    packageVariant: oneOf(
      read(K.packageVariant),
      PACKAGE_VARIANTS,
      PIPELINE_DEFAULTS.packageVariant,
    ),
    layerDependencyScope: oneOf(
      read(K.layerDependencyScope),
      LAYER_DEPENDENCY_SCOPES,
      PIPELINE_DEFAULTS.layerDependencyScope,
    ),
    jobStartMaxAttempts: parsePositiveInt(
      read(K.jobStartMaxAttempts),
      PIPELINE_DEFAULTS.jobStartMaxAttempts,
    ),
    maxConcurrentRuns: parsePositiveInt(
      read('glueMaxConcurrentRuns'),
      DEFAULT_MAX_CONCURRENT_RUNS,
    ),
    tags: {
      Project: projectName,
      Environment: environment,
      ManagedBy: 'pulumi',
    },
  };
}
