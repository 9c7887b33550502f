import { PipelineConfig } from '../config/pipeline-config.interface';
import {
  MANAGED_POLICY_ARNS,
  MANAGED_RESOURCES,
} from '../naming/managed-resources';
import { deploymentNames } from '../naming/resource-naming';
import { ManagedResourceDescriptor } from './tracked-state';

/**
 * Every resource that may already exist outside the stack, parents before the
 * children whose ids are derived from them.
 */
export function buildImportPlan(config: PipelineConfig): ManagedResourceDescriptor[] {
  const names = deploymentNames(config, config);
  const R = MANAGED_RESOURCES;

  const plan: ManagedResourceDescriptor[] = [
    { address: R.lambdaRole, id: names.lambdaRole, description: 'Lambda IAM role' },
    { address: R.glueRole, id: names.glueRole, description: 'Glue IAM role' },
    {
      address: R.lambdaPolicy,
      id: `${names.lambdaRole}:${names.lambdaPolicy}`,
      description: 'Lambda inline policy',
      parent: R.lambdaRole,
    },
    {
      address: R.gluePolicy,
      id: `${names.glueRole}:${names.gluePolicy}`,
      description: 'Glue inline policy',
      parent: R.glueRole,
    },
    {
      address: R.lambdaBasicExecution,
      id: `${names.lambdaRole}/${MANAGED_POLICY_ARNS.lambdaBasicExecution}`,
      description: 'Lambda basic execution attachment',
      parent: R.lambdaRole,
    },
    {
      address: R.glueServiceAttachment,
      id: `${names.glueRole}/${MANAGED_POLICY_ARNS.glueService}`,
      description: 'Glue service role attachment',
      parent: R.glueRole,
    },
    { address: R.sourceBucket, id: names.sourceBucket, description: 'Source S3 bucket' },
    {
      address: R.destinationBucket,
      id: names.destinationBucket,
      description: 'Destination S3 bucket',
    },
    {
      address: R.glueScriptsBucket,
      id: names.glueScriptsBucket,
      description: 'Glue scripts S3 bucket',
    },
    { address: R.glueJob, id: names.glueJob, description: 'Glue ETL job' },
    { address: R.lambdaFunction, id: names.lambdaFunction, description: 'Lambda function' },
  ];

  if (config.observabilityEnabled) {
    plan.push(
      { address: R.logGroup, id: names.logGroup, description: 'CloudWatch log group' },
      {
        address: R.errorsAlarm,
        id: names.errorsAlarm,
        description: 'Lambda errors alarm',
      },
    );
  }

  return plan;
}
