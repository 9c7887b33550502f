import * as path from 'path';
import * as pulumi from '@pulumi/pulumi';
import * as aws from '@pulumi/aws';
import { MANAGED_POLICY_ARNS, MANAGED_RESOURCES } from '../src/naming/managed-resources';
import { toTriggerEnvironment } from '../src/pipeline/trigger.config';
import { triggerFilters } from '../src/pipeline/trigger-filter';
import { STACK_CONFIG_NAMESPACE } from '../src/stack/stack-config';
import { packageTriggerArtifacts } from './src/bundling';
import { assumeRolePolicy, glueAccessPolicy, lambdaAccessPolicy } from './src/policies';
import {
  FUNCTION_SETTINGS,
  GLUE_SETTINGS,
  LOG_RETENTION_DAYS,
  loadInfraSettings,
} from './src/settings';

const R = MANAGED_RESOURCES;
const rootDir = path.resolve(__dirname, '..');

export = async () => {
  const config = new pulumi.Config(STACK_CONFIG_NAMESPACE);
  const settings = loadInfraSettings((key) => config.get(key));
  const { names, tags } = settings;
  const filters = triggerFilters(settings.inputPrefix);

  const sourceBucket = new aws.s3.BucketV2(R.sourceBucket.name, {
    bucket: names.sourceBucket,
    forceDestroy: true,
    tags: { ...tags, Purpose: 'source' },
  });

  // Glue writes <outputPrefix>/date=<timestamp>/ partitions here.
  const destinationBucket = new aws.s3.BucketV2(R.destinationBucket.name, {
    bucket: names.destinationBucket,
    forceDestroy: true,
    tags: { ...tags, Purpose: 'output' },
  });

  const glueScriptsBucket = new aws.s3.BucketV2(R.glueScriptsBucket.name, {
    bucket: names.glueScriptsBucket,
    forceDestroy: true,
    tags: { ...tags, Purpose: 'glue-scripts' },
  });

  const glueScriptObject = new aws.s3.BucketObjectv2(R.glueScriptObject.name, {
    bucket: glueScriptsBucket.id,
    key: GLUE_SETTINGS.scriptKey,
    source: new pulumi.asset.FileAsset(path.join(rootDir, 'glue', 'etl_job.py')),
  });

  const glueRole = new aws.iam.Role(R.glueRole.name, {
    name: names.glueRole,
    assumeRolePolicy: JSON.stringify(assumeRolePolicy('glue.amazonaws.com')),
    description: 'Role assumed by the Glue job to read source data and write parquet output',
    tags,
  });

  new aws.iam.RolePolicyAttachment(R.glueServiceAttachment.name, {
    role: glueRole.name,
    policyArn: MANAGED_POLICY_ARNS.glueService,
  });

  new aws.iam.RolePolicy(R.gluePolicy.name, {
    name: names.gluePolicy,
    role: glueRole.id,
    policy: pulumi
      .all([sourceBucket.arn, destinationBucket.arn, glueScriptsBucket.arn])
      .apply(([sourceBucketArn, destinationBucketArn, glueScriptsBucketArn]) =>
        JSON.stringify(
          glueAccessPolicy({ sourceBucketArn, destinationBucketArn, glueScriptsBucketArn }),
        ),
      ),
  });

  const glueArguments: Record<string, pulumi.Input<string>> = {
    '--job-language': 'python',
    '--destination_bucket': destinationBucket.bucket,
    '--output_prefix': settings.outputPrefix,
  };
  if (settings.observabilityEnabled) {
    glueArguments['--enable-continuous-cloudwatch-log'] = 'true';
    glueArguments['--enable-metrics'] = 'true';
  }

  // Started by the trigger function with per-object --source_bucket/--source_key.
  const glueJob = new aws.glue.Job(
    R.glueJob.name,
    {
      name: names.glueJob,
      roleArn: glueRole.arn,
      command: {
        name: 'glueetl',
        pythonVersion: '3',
        scriptLocation: pulumi.interpolate`s3://${glueScriptsBucket.bucket}/${GLUE_SETTINGS.scriptKey}`,
      },
      glueVersion: GLUE_SETTINGS.version,
      workerType: GLUE_SETTINGS.workerType,
      numberOfWorkers: GLUE_SETTINGS.numberOfWorkers,
      timeout: GLUE_SETTINGS.timeoutMinutes,
      maxRetries: GLUE_SETTINGS.maxRetries,
      defaultArguments: glueArguments,
      executionProperty: { maxConcurrentRuns: settings.maxConcurrentRuns },
      description: 'Transforms uploaded CSV/JSON objects into date-partitioned parquet',
      tags,
    },
    { dependsOn: [glueScriptObject] },
  );

  const logGroup = settings.observabilityEnabled
    ? new aws.cloudwatch.LogGroup(R.logGroup.name, {
        name: names.logGroup,
        retentionInDays: LOG_RETENTION_DAYS,
        tags,
      })
    : undefined;

  const lambdaRole = new aws.iam.Role(R.lambdaRole.name, {
    name: names.lambdaRole,
    assumeRolePolicy: JSON.stringify(assumeRolePolicy('lambda.amazonaws.com')),
    description: 'Role assumed by the trigger function to start Glue job runs',
    tags,
  });

  new aws.iam.RolePolicyAttachment(R.lambdaBasicExecution.name, {
    role: lambdaRole.name,
    policyArn: MANAGED_POLICY_ARNS.lambdaBasicExecution,
  });

  const logGroupArn: pulumi.Output<string | undefined> = logGroup
    ? logGroup.arn
    : pulumi.output(undefined);

  new aws.iam.RolePolicy(R.lambdaPolicy.name, {
    name: names.lambdaPolicy,
    role: lambdaRole.id,
    policy: pulumi
      .all([sourceBucket.arn, glueJob.arn, logGroupArn])
      .apply(([sourceBucketArn, glueJobArn, groupArn]) =>
        JSON.stringify(
          lambdaAccessPolicy({
            sourceBucketArn,
            inputPrefix: settings.inputPrefix,
            glueJobArn,
            logGroupArn: groupArn,
          }),
        ),
      ),
  });

  const artifacts = await packageTriggerArtifacts(rootDir, settings);

  const layer = artifacts.layer
    ? new aws.lambda.LayerVersion(R.dependencyLayer.name, {
        layerName: names.dependencyLayer,
        code: new pulumi.asset.FileArchive(artifacts.layer.archiveRoot),
        compatibleRuntimes: [FUNCTION_SETTINGS.runtime],
        sourceCodeHash: artifacts.layer.contentHash,
        description: `Trigger function dependencies (${settings.layerDependencyScope})`,
      })
    : undefined;

  const lambdaFn = new aws.lambda.Function(
    R.lambdaFunction.name,
    {
      name: names.lambdaFunction,
      role: lambdaRole.arn,
      runtime: FUNCTION_SETTINGS.runtime,
      handler: FUNCTION_SETTINGS.handler,
      timeout: FUNCTION_SETTINGS.timeoutSeconds,
      memorySize: FUNCTION_SETTINGS.memoryMb,
      code: new pulumi.asset.FileArchive(artifacts.fn.archiveRoot),
      layers: layer ? [layer.arn] : undefined,
      environment: {
        variables: toTriggerEnvironment({
          jobName: names.glueJob,
          destinationBucket: names.destinationBucket,
          outputPrefix: settings.outputPrefix,
          logGroupName: logGroup ? names.logGroup : undefined,
          logEnabled: settings.observabilityEnabled,
          filters,
          maxAttempts: settings.jobStartMaxAttempts,
        }),
      },
      loggingConfig: logGroup ? { logFormat: 'Text', logGroup: logGroup.name } : undefined,
      tags,
    },
    { dependsOn: logGroup ? [logGroup] : [] },
  );

  const lambdaPermission = new aws.lambda.Permission(R.lambdaPermission.name, {
    action: 'lambda:InvokeFunction',
    function: lambdaFn.name,
    principal: 's3.amazonaws.com',
    sourceArn: sourceBucket.arn,
  });

  // One entry per filter, since S3 takes a single prefix/suffix pair per rule.
  new aws.s3.BucketNotification(
    R.sourceNotification.name,
    {
      bucket: sourceBucket.id,
      lambdaFunctions: filters.map((filter) => ({
        lambdaFunctionArn: lambdaFn.arn,
        events: ['s3:ObjectCreated:*'],
        filterPrefix: filter.prefix,
        filterSuffix: filter.suffix,
      })),
    },
    { dependsOn: [lambdaPermission] },
  );

  if (settings.observabilityEnabled) {
    new aws.cloudwatch.MetricAlarm(R.errorsAlarm.name, {
      name: names.errorsAlarm,
      alarmDescription: `Errors reported by ${names.lambdaFunction}`,
      namespace: 'AWS/Lambda',
      metricName: 'Errors',
      dimensions: { FunctionName: lambdaFn.name },
      statistic: 'Sum',
      period: 300,
      evaluationPeriods: 1,
      threshold: 1,
      comparisonOperator: 'GreaterThanOrEqualToThreshold',
      treatMissingData: 'notBreaching',
      tags,
    });
  }

  return {
    region: aws.getRegionOutput().name,
    sourceBucketName: sourceBucket.bucket,
    destinationBucketName: destinationBucket.bucket,
    glueScriptsBucketName: glueScriptsBucket.bucket,
    lambdaFunctionName: lambdaFn.name,
    glueJobName: glueJob.name,
    logGroupName: logGroup ? logGroup.name : 'disabled',
  };
};
