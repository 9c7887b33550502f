export interface PolicyStatement {
  Effect: 'Allow' | 'Deny';
  Action: string | string[];
  Resource?: string | string[];
  Principal?: { Service: string };
}

export interface PolicyDocument {
  Version: '2012-10-17';
  Statement: PolicyStatement[];
}

export function assumeRolePolicy(service: 'lambda.amazonaws.com' | 'glue.amazonaws.com'): PolicyDocument {
  return {
    Version: '2012-10-17',
    Statement: [
      {
        Effect: 'Allow',
        Principal: { Service: service },
        Action: 'sts:AssumeRole',
      },
    ],
  };
}

export interface LambdaPolicyInputs {
  sourceBucketArn: string;
  inputPrefix: string;
  glueJobArn: string;
  /** Omitted when observability is off; the basic execution role still covers /aws/lambda/*. */
  logGroupArn?: string;
}

// The function only reads the object that triggered it and starts the job.
export function lambdaAccessPolicy(inputs: LambdaPolicyInputs): PolicyDocument {
  const statements: PolicyStatement[] = [
    {
      Effect: 'Allow',
      Action: ['s3:GetObject'],
      Resource: [`${inputs.sourceBucketArn}/${inputs.inputPrefix}*`],
    },
    {
      Effect: 'Allow',
      Action: ['glue:StartJobRun'],
      Resource: [inputs.glueJobArn],
    },
  ];

  if (inputs.logGroupArn) {
    statements.push({
      Effect: 'Allow',
      Action: ['logs:CreateLogStream', 'logs:PutLogEvents'],
      Resource: [`${inputs.logGroupArn}:*`],
    });
  }

  return { Version: '2012-10-17', Statement: statements };
}

export interface GluePolicyInputs {
  sourceBucketArn: string;
  destinationBucketArn: string;
  glueScriptsBucketArn: string;
}

export function glueAccessPolicy(inputs: GluePolicyInputs): PolicyDocument {
  return {
    Version: '2012-10-17',
    Statement: [
      {
        Effect: 'Allow',
        Action: ['s3:GetObject'],
        Resource: [`${inputs.sourceBucketArn}/*`, `${inputs.glueScriptsBucketArn}/*`],
      },
      {
        Effect: 'Allow',
        Action: ['s3:ListBucket'],
        Resource: [inputs.sourceBucketArn, inputs.destinationBucketArn],
      },
      {
        Effect: 'Allow',
        Action: ['s3:PutObject', 's3:GetObject', 's3:DeleteObject'],
        Resource: [`${inputs.destinationBucketArn}/*`],
      },
    ],
  };
}
