import { ConfigurationError } from '../common/errors';
import { PIPELINE_DEFAULTS } from '../config/defaults';
import { optional, parseFlag, parsePositiveInt } from '../config/env-values';
import { PipelineConfig } from '../config/pipeline-config.interface';
import { deploymentNames } from '../naming/resource-naming';
import { triggerFilters, TriggerFilter } from './trigger-filter';

export interface TriggerConfig {
  jobName: string;
  destinationBucket: string;
  outputPrefix: string;
  region: string;
  logGroupName?: string;
  logEnabled: boolean;
  filters: TriggerFilter[];
  maxAttempts: number;
}

function required(env: Record<string, string | undefined>, name: string): string {
  const value = optional(env[name]);
  if (!value) {
    throw new ConfigurationError(`${name} environment variable not set`);
  }
  return value;
}

// Built once per cold start from the variables the Pulumi program sets on the function.
export function loadTriggerConfig(env: Record<string, string | undefined>): TriggerConfig {
  return {
    jobName: required(env, 'GLUE_JOB_NAME'),
    destinationBucket: required(env, 'DESTINATION_BUCKET'),
    outputPrefix: optional(env.OUTPUT_PREFIX) ?? PIPELINE_DEFAULTS.outputPrefix,
    region: optional(env.AWS_REGION) ?? PIPELINE_DEFAULTS.region,
    logGroupName: optional(env.LOG_GROUP_NAME),
    logEnabled: parseFlag(env.LOG_ENABLED, PIPELINE_DEFAULTS.observabilityEnabled),
    filters: triggerFilters(optional(env.INPUT_PREFIX) ?? PIPELINE_DEFAULTS.inputPrefix),
    maxAttempts: parsePositiveInt(
      env.JOB_START_MAX_ATTEMPTS,
      PIPELINE_DEFAULTS.jobStartMaxAttempts,
    ),
  };
}

/** Trigger settings the CLI derives from the deployment's own naming. */
export function triggerConfigFromPipeline(config: PipelineConfig): TriggerConfig {
  const names = deploymentNames(config, config);
  return {
    jobName: names.glueJob,
    destinationBucket: names.destinationBucket,
    outputPrefix: config.outputPrefix,
    region: config.region,
    logGroupName: config.observabilityEnabled ? names.logGroup : undefined,
    logEnabled: config.observabilityEnabled,
    filters: triggerFilters(config.inputPrefix),
    maxAttempts: config.jobStartMaxAttempts,
  };
}

/**
 * Function environment for a trigger config. AWS_REGION is reserved by Lambda
 * and supplied by the runtime, so it is not part of the mapping.
 */
export function toTriggerEnvironment(
  config: Omit<TriggerConfig, 'region'>,
): Record<string, string> {
  const environment: Record<string, string> = {
    GLUE_JOB_NAME: config.jobName,
    DESTINATION_BUCKET: config.destinationBucket,
    OUTPUT_PREFIX: config.outputPrefix,
    INPUT_PREFIX: config.filters[0]?.prefix ?? PIPELINE_DEFAULTS.inputPrefix,
    LOG_ENABLED: String(config.logEnabled),
    JOB_START_MAX_ATTEMPTS: String(config.maxAttempts),
  };
  if (config.logGroupName) {
    environment.LOG_GROUP_NAME = config.logGroupName;
  }
  return environment;
}
