import { ConfigurationError } from '../common/errors';
import { buildPipelineConfig } from '../config/pipeline.config';
import {
  loadTriggerConfig,
  toTriggerEnvironment,
  triggerConfigFromPipeline,
} from './trigger.config';

describe('loadTriggerConfig', () => {
  it('applies defaults to everything but the job and destination', () => {
    const config = loadTriggerConfig({
      GLUE_JOB_NAME: 'etl-pipeline-etl-job-dev',
      DESTINATION_BUCKET: 'etl-pipeline-output-dev',
    });

    expect(config).toEqual({
      jobName: 'etl-pipeline-etl-job-dev',
      destinationBucket: 'etl-pipeline-output-dev',
      outputPrefix: 'processed_data',
      region: 'us-east-1',
      logGroupName: undefined,
      logEnabled: true,
      filters: [
        { prefix: 'input/', suffix: '.csv' },
        { prefix: 'input/', suffix: '.json' },
      ],
      maxAttempts: 1,
    });
  });

  it.each(['GLUE_JOB_NAME', 'DESTINATION_BUCKET'])('requires %s', (name) => {
    const env: Record<string, string> = {
      GLUE_JOB_NAME: 'job',
      DESTINATION_BUCKET: 'bucket',
    };
    env[name] = '  ';

    expect(() => loadTriggerConfig(env)).toThrow(
      new ConfigurationError(`${name} environment variable not set`),
    );
  });

  it('reads the optional settings', () => {
    const config = loadTriggerConfig({
      GLUE_JOB_NAME: 'job',
      DESTINATION_BUCKET: 'bucket',
      OUTPUT_PREFIX: 'curated',
      INPUT_PREFIX: 'landing/',
      AWS_REGION: 'eu-west-1',
      LOG_ENABLED: 'false',
      LOG_GROUP_NAME: 'etl-pipeline-dev',
      JOB_START_MAX_ATTEMPTS: '3',
    });

    expect(config.outputPrefix).toBe('curated');
    expect(config.filters[0]).toEqual({ prefix: 'landing/', suffix: '.csv' });
    expect(config.region).toBe('eu-west-1');
    expect(config.logEnabled).toBe(false);
    expect(config.logGroupName).toBe('etl-pipeline-dev');
    expect(config.maxAttempts).toBe(3);
  });
});

describe('toTriggerEnvironment', () => {
  it('round-trips through loadTriggerConfig', () => {
    const pipeline = buildPipelineConfig(
      { PROJECT_NAME: 'etl-pipeline', ENVIRONMENT: 'dev', AWS_REGION: 'eu-west-1' },
      '/work',
    );
    const config = triggerConfigFromPipeline(pipeline);
    const environment = toTriggerEnvironment(config);

    expect(environment).toEqual({
      GLUE_JOB_NAME: 'etl-pipeline-etl-job-dev',
      DESTINATION_BUCKET: 'etl-pipeline-output-dev',
      OUTPUT_PREFIX: 'processed_data',
      INPUT_PREFIX: 'input/',
      LOG_ENABLED: 'true',
      JOB_START_MAX_ATTEMPTS: '1',
      LOG_GROUP_NAME: 'etl-pipeline-dev',
    });
    expect(loadTriggerConfig({ ...environment, AWS_REGION: 'eu-west-1' })).toEqual(config);
  });

  it('leaves out the log group when observability is off', () => {
    const pipeline = buildPipelineConfig(
      { PROJECT_NAME: 'etl-pipeline', ENVIRONMENT: 'dev', CLOUDWATCH_ENABLED: 'false' },
      '/work',
    );

    const environment = toTriggerEnvironment(triggerConfigFromPipeline(pipeline));

    expect(environment.LOG_ENABLED).toBe('false');
    expect(environment).not.toHaveProperty('LOG_GROUP_NAME');
  });
});
