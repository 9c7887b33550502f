import {
  LAYER_DEPENDENCY_SCOPES,
  PACKAGE_VARIANTS,
  PIPELINE_DEFAULTS,
} from './defaults';
import { oneOf, optional, parseFlag, parsePositiveInt } from './env-values';
import { PipelineConfig } from './pipeline-config.interface';

export type EnvSource = Record<string, string | undefined>;

export function buildPipelineConfig(
  env: EnvSource,
  cwd: string = process.cwd(),
): PipelineConfig {
  const environment = optional(env.ENVIRONMENT) ?? '';
  return {
    projectName: optional(env.PROJECT_NAME) ?? '',
    environment,
    region: optional(env.AWS_REGION) ?? PIPELINE_DEFAULTS.region,
    sourceBucket: optional(env.SOURCE_BUCKET),
    destinationBucket: optional(env.DESTINATION_BUCKET),
    glueScriptsBucket: optional(env.GLUE_SCRIPTS_BUCKET_NAME),
    inputPrefix: optional(env.INPUT_PREFIX) ?? PIPELINE_DEFAULTS.inputPrefix,
    outputPrefix: optional(env.OUTPUT_PREFIX) ?? PIPELINE_DEFAULTS.outputPrefix,
    observabilityEnabled: parseFlag(
      env.CLOUDWATCH_ENABLED,
      PIPELINE_DEFAULTS.observabilityEnabled,
    ),
    packageVariant: oneOf(
      env.LAMBDA_PACKAGE_VARIANT,
      PACKAGE_VARIANTS,
      PIPELINE_DEFAULTS.packageVariant,
    ),
    layerDependencyScope: oneOf(
      env.LAYER_DEPENDENCY_SCOPE,
      LAYER_DEPENDENCY_SCOPES,
      PIPELINE_DEFAULTS.layerDependencyScope,
    ),
    jobStartMaxAttempts: parsePositiveInt(
      env.JOB_START_MAX_ATTEMPTS,
      PIPELINE_DEFAULTS.jobStartMaxAttempts,
    ),
    stackName:
      optional(env.PULUMI_STACK) ||
      environment ||
      PIPELINE_DEFAULTS.stackName,
    rootDir: optional(env.PROJECT_ROOT) ?? cwd,
  };
}

// Read once by ConfigModule after the .env file has been merged into the environment.
export const pipelineConfig = () => ({
  pipeline: buildPipelineConfig(process.env),
});
