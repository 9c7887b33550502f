import { ConfigurationError } from '../common/errors';

export interface NamingContext {
  projectName: string;
  environment: string;
}

export type ResourceKind =
  | 'lambda-role'
  | 'glue-role'
  | 'lambda-policy'
  | 'glue-policy'
  | 'etl'
  | 'etl-job'
  | 'source'
  | 'output'
  | 'glue-scripts'
  | 'errors-alarm'
  | 'deps';

export interface DeploymentNames {
  lambdaRole: string;
  glueRole: string;
  lambdaPolicy: string;
  gluePolicy: string;
  lambdaFunction: string;
  glueJob: string;
  sourceBucket: string;
  destinationBucket: string;
  glueScriptsBucket: string;
  logGroup: string;
  errorsAlarm: string;
  dependencyLayer: string;
}

export interface BucketNameOverrides {
  sourceBucket?: string;
  destinationBucket?: string;
  glueScriptsBucket?: string;
}

function requireNamingContext(ctx: NamingContext): NamingContext {
  const projectName = ctx.projectName.trim();
  const environment = ctx.environment.trim();
  if (!projectName || !environment) {
    throw new ConfigurationError(
      `PROJECT_NAME and ENVIRONMENT must be set before resources can be named ` +
        `(PROJECT_NAME=${projectName || 'NOT SET'}, ENVIRONMENT=${environment || 'NOT SET'})`,
    );
  }
  return { projectName, environment };
}

export function resourceName(ctx: NamingContext, kind: ResourceKind): string {
  const { projectName, environment } = requireNamingContext(ctx);
  return `${projectName}-${kind}-${environment}`;
}

export function logGroupName(ctx: NamingContext): string {
  const { projectName, environment } = requireNamingContext(ctx);
  return `${projectName}-${environment}`;
}

// Buckets are the only names an operator may pin; everything else is derived.
export function deploymentNames(
  ctx: NamingContext,
  overrides: BucketNameOverrides = {},
): DeploymentNames {
  return {
    lambdaRole: resourceName(ctx, 'lambda-role'),
    glueRole: resourceName(ctx, 'glue-role'),
    lambdaPolicy: resourceName(ctx, 'lambda-policy'),
    gluePolicy: resourceName(ctx, 'glue-policy'),
    lambdaFunction: resourceName(ctx, 'etl'),
    glueJob: resourceName(ctx, 'etl-job'),
    sourceBucket: overrides.sourceBucket ?? resourceName(ctx, 'source'),
    destinationBucket:
      overrides.destinationBucket ?? resourceName(ctx, 'output'),
    glueScriptsBucket:
      overrides.glueScriptsBucket ?? resourceName(ctx, 'glue-scripts'),
    logGroup: logGroupName(ctx),
    errorsAlarm: resourceName(ctx, 'errors-alarm'),
    dependencyLayer: resourceName(ctx, 'deps'),
  };
}
