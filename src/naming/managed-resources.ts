// Logical names and type tokens shared by infra/index.ts and the importer.
// Renaming an entry here re-addresses the resource in Pulumi state.

export interface ResourceAddress {
  type: string;
  name: string;
}

export const MANAGED_RESOURCES = {
  sourceBucket: { type: 'aws:s3/bucketV2:BucketV2', name: 'sourceBucket' },
  destinationBucket: {
    type: 'aws:s3/bucketV2:BucketV2',
    name: 'destinationBucket',
  },
  glueScriptsBucket: {
    type: 'aws:s3/bucketV2:BucketV2',
    name: 'glueScriptsBucket',
  },
  glueScriptObject: {
    type: 'aws:s3/bucketObjectv2:BucketObjectv2',
    name: 'glueScriptObject',
  },
  glueRole: { type: 'aws:iam/role:Role', name: 'glueJobRole' },
  glueServiceAttachment: {
    type: 'aws:iam/rolePolicyAttachment:RolePolicyAttachment',
    name: 'glueServiceRoleAttachment',
  },
  gluePolicy: { type: 'aws:iam/rolePolicy:RolePolicy', name: 'glueBucketPolicy' },
  glueJob: { type: 'aws:glue/job:Job', name: 'glueJob' },
  lambdaRole: { type: 'aws:iam/role:Role', name: 'lambdaRole' },
  lambdaBasicExecution: {
    type: 'aws:iam/rolePolicyAttachment:RolePolicyAttachment',
    name: 'lambdaBasicExecution',
  },
  lambdaPolicy: {
    type: 'aws:iam/rolePolicy:RolePolicy',
    name: 'lambdaAccessPolicy',
  },
  dependencyLayer: {
    type: 'aws:lambda/layerVersion:LayerVersion',
    name: 'dependencyLayer',
  },
  lambdaFunction: { type: 'aws:lambda/function:Function', name: 'etlTrigger' },
  lambdaPermission: {
    type: 'aws:lambda/permission:Permission',
    name: 'allowS3Invoke',
  },
  sourceNotification: {
    type: 'aws:s3/bucketNotification:BucketNotification',
    name: 'sourceNotifications',
  },
  logGroup: { type: 'aws:cloudwatch/logGroup:LogGroup', name: 'pipelineLogGroup' },
  errorsAlarm: {
    type: 'aws:cloudwatch/metricAlarm:MetricAlarm',
    name: 'lambdaErrorsAlarm',
  },
} as const satisfies Record<string, ResourceAddress>;

export const MANAGED_POLICY_ARNS = {
  lambdaBasicExecution:
    'arn:aws:iam::aws:policy/service-role/AWSLambdaBasicExecutionRole',
  glueService: 'arn:aws:iam::aws:policy/service-role/AWSGlueServiceRole',
} as const;

export function addressKey(address: ResourceAddress): string {
  return `${address.type}::${address.name}`;
}
