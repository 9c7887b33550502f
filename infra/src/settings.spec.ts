import { ConfigurationError } from '../../src/common/errors';
import { buildPipelineConfig } from '../../src/config/pipeline.config';
import { toStackConfig } from '../../src/stack/stack-config';
import { loadInfraSettings } from './settings';

function reader(values: Record<string, string>) {
  return (key: string): string | undefined => values[key];
}

describe('loadInfraSettings', () => {
  it('applies the defaults', () => {
    const settings = loadInfraSettings(
      reader({ projectName: 'etl-pipeline', environment: 'dev' }),
    );

    expect(settings).toEqual({
      names: expect.objectContaining({
        sourceBucket: 'etl-pipeline-source-dev',
        lambdaFunction: 'etl-pipeline-etl-dev',
        glueJob: 'etl-pipeline-etl-job-dev',
      }),
      inputPrefix: 'input/',
      outputPrefix: 'processed_data',
      observabilityEnabled: true,
      packageVariant: 'bundled',
      layerDependencyScope: 'lightweight',
      jobStartMaxAttempts: 1,
      maxConcurrentRuns: 10,
      tags: { Project: 'etl-pipeline', Environment: 'dev', ManagedBy: 'pulumi' },
    });
  });

  it('reads back what the stack driver writes', () => {
    const pipeline = buildPipelineConfig(
      {
        PROJECT_NAME: 'etl-pipeline',
        ENVIRONMENT: 'prod',
        DESTINATION_BUCKET: 'curated',
        CLOUDWATCH_ENABLED: 'false',
        LAMBDA_PACKAGE_VARIANT: 'layered',
        LAYER_DEPENDENCY_SCOPE: 'all',
        JOB_START_MAX_ATTEMPTS: '3',
      },
      '/work',
    );
    const values: Record<string, string> = {};
    for (const [key, entry] of Object.entries(toStackConfig(pipeline).set)) {
      values[key.replace(/^etl:/, '')] = entry.value;
    }

    const settings = loadInfraSettings(reader(values));

    expect(settings.names.destinationBucket).toBe('curated');
    expect(settings.names.sourceBucket).toBe('etl-pipeline-source-prod');
    expect(settings.observabilityEnabled).toBe(false);
    expect(settings.packageVariant).toBe('layered');
    expect(settings.layerDependencyScope).toBe('all');
    expect(settings.jobStartMaxAttempts).toBe(3);
  });

  it('fails without a project name', () => {
    expect(() => loadInfraSettings(reader({ environment: 'dev' }))).toThrow(ConfigurationError);
  });
});
