import { buildPipelineConfig } from '../config/pipeline.config';
import { addressKey } from '../naming/managed-resources';
import { buildImportPlan } from './import-plan';

function plan(env: Record<string, string>) {
  return buildImportPlan(
    buildPipelineConfig({ PROJECT_NAME: 'etl-pipeline', ENVIRONMENT: 'dev', ...env }, '/work'),
  );
}

describe('buildImportPlan', () => {
  it('lists parents before children, in a fixed order', () => {
    expect(plan({}).map((entry) => [entry.description, entry.id])).toEqual([
      ['Lambda IAM role', 'etl-pipeline-lambda-role-dev'],
      ['Glue IAM role', 'etl-pipeline-glue-role-dev'],
      ['Lambda inline policy', 'etl-pipeline-lambda-role-dev:etl-pipeline-lambda-policy-dev'],
      ['Glue inline policy', 'etl-pipeline-glue-role-dev:etl-pipeline-glue-policy-dev'],
      [
        'Lambda basic execution attachment',
        'etl-pipeline-lambda-role-dev/arn:aws:iam::aws:policy/service-role/AWSLambdaBasicExecutionRole',
      ],
      [
        'Glue service role attachment',
        'etl-pipeline-glue-role-dev/arn:aws:iam::aws:policy/service-role/AWSGlueServiceRole',
      ],
      ['Source S3 bucket', 'etl-pipeline-source-dev'],
      ['Destination S3 bucket', 'etl-pipeline-output-dev'],
      ['Glue scripts S3 bucket', 'etl-pipeline-glue-scripts-dev'],
      ['Glue ETL job', 'etl-pipeline-etl-job-dev'],
      ['Lambda function', 'etl-pipeline-etl-dev'],
      ['CloudWatch log group', 'etl-pipeline-dev'],
      ['Lambda errors alarm', 'etl-pipeline-errors-alarm-dev'],
    ]);
  });

  it('leaves out observability resources when they are disabled', () => {
    const descriptions = plan({ CLOUDWATCH_ENABLED: 'false' }).map((entry) => entry.description);

    expect(descriptions).toHaveLength(11);
    expect(descriptions).not.toContain('CloudWatch log group');
  });

  it('imports configured bucket names', () => {
    const source = plan({ SOURCE_BUCKET: 'raw-uploads' }).find(
      (entry) => entry.description === 'Source S3 bucket',
    );

    expect(source?.id).toBe('raw-uploads');
  });

  it('uses each address once', () => {
    const keys = plan({}).map((entry) => addressKey(entry.address));

    expect(new Set(keys).size).toBe(keys.length);
  });

  it('names a parent for every policy and attachment', () => {
    const children = plan({}).filter((entry) => entry.parent);

    expect(children.map((entry) => entry.parent && addressKey(entry.parent))).toEqual([
      'aws:iam/role:Role::lambdaRole',
      'aws:iam/role:Role::glueRole',
      'aws:iam/role:Role::lambdaRole',
      'aws:iam/role:Role::glueRole',
    ]);
  });
});
