import { plainToInstance } from 'class-transformer';
import {
  IsBooleanString,
  IsIn,
  IsNumberString,
  IsOptional,
  IsString,
  Matches,
  validateSync,
} from 'class-validator';
import { ConfigurationError } from '../common/errors';
import { LAYER_DEPENDENCY_SCOPES, PACKAGE_VARIANTS } from './defaults';

const NAME_PATTERN = /^$|^[a-z0-9][a-z0-9-]*$/;

export class EnvironmentVariables {
  @IsOptional()
  @Matches(NAME_PATTERN, {
    message: 'PROJECT_NAME may only contain lowercase letters, digits and dashes',
  })
  PROJECT_NAME?: string;

  @IsOptional()
  @Matches(NAME_PATTERN, {
    message: 'ENVIRONMENT may only contain lowercase letters, digits and dashes',
  })
  ENVIRONMENT?: string;

  @IsOptional()
  @IsString()
  AWS_REGION?: string;

  @IsOptional()
  @IsString()
  SOURCE_BUCKET?: string;

  @IsOptional()
  @IsString()
  DESTINATION_BUCKET?: string;

  @IsOptional()
  @IsString()
  GLUE_SCRIPTS_BUCKET_NAME?: string;

  @IsOptional()
  @IsString()
  INPUT_PREFIX?: string;

  @IsOptional()
  @IsString()
  OUTPUT_PREFIX?: string;

  @IsOptional()
  @IsBooleanString()
  CLOUDWATCH_ENABLED?: string;

  @IsOptional()
  @IsIn([...PACKAGE_VARIANTS])
  LAMBDA_PACKAGE_VARIANT?: string;

  @IsOptional()
  @IsIn([...LAYER_DEPENDENCY_SCOPES])
  LAYER_DEPENDENCY_SCOPE?: string;

  @IsOptional()
  @IsNumberString({ no_symbols: true })
  JOB_START_MAX_ATTEMPTS?: string;

  @IsOptional()
  @IsString()
  PULUMI_STACK?: string;
}

/** Passed to ConfigModule.forRoot; rejects malformed values before anything runs. */
export function validateEnvironment(
  config: Record<string, unknown>,
): Record<string, unknown> {
  const variables = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(variables, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .flatMap((error) => Object.values(error.constraints ?? {}))
      .join('; ');
    throw new ConfigurationError(`Invalid environment configuration: ${details}`);
  }
  return config;
}
