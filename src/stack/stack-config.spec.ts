import { ConfigurationError } from '../common/errors';
import { buildPipelineConfig } from '../config/pipeline.config';
import { toStackConfig } from './stack-config';

describe('toStackConfig', () => {
  it('maps every setting onto the etl namespace', () => {
    const config = buildPipelineConfig(
      {
        PROJECT_NAME: 'etl-pipeline',
        ENVIRONMENT: 'dev',
        AWS_REGION: 'eu-west-1',
        SOURCE_BUCKET: 'raw-uploads',
        LAMBDA_PACKAGE_VARIANT: 'layered',
      },
      '/work',
    );

    expect(toStackConfig(config)).toEqual({
      set: {
        'aws:region': { value: 'eu-west-1' },
        'etl:projectName': { value: 'etl-pipeline' },
        'etl:environment': { value: 'dev' },
        'etl:sourceBucketName': { value: 'raw-uploads' },
        'etl:inputPrefix': { value: 'input/' },
        'etl:outputPrefix': { value: 'processed_data' },
        'etl:enableCloudwatch': { value: 'true' },
        'etl:packageVariant': { value: 'layered' },
        'etl:layerDependencyScope': { value: 'lightweight' },
        'etl:jobStartMaxAttempts': { value: '1' },
      },
      unset: ['etl:destinationBucketName', 'etl:glueScriptsBucketName'],
    });
  });

  it('refuses to configure a stack without naming inputs', () => {
    expect(() => toStackConfig(buildPipelineConfig({ ENVIRONMENT: 'dev' }, '/work'))).toThrow(
      ConfigurationError,
    );
  });
});
