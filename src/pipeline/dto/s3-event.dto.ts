import { Type } from 'class-transformer';
import {
  IsArray,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';

export class S3BucketDto {
  @IsString()
  @IsNotEmpty()
  name!: string;
}

export class S3ObjectDto {
  @IsString()
  @IsNotEmpty()
  key!: string;

  @IsOptional()
  @IsNumber()
  size?: number;
}

export class S3EntityDto {
  @ValidateNested()
  @Type(() => S3BucketDto)
  bucket!: S3BucketDto;

  @ValidateNested()
  @Type(() => S3ObjectDto)
  object!: S3ObjectDto;
}

export class S3EventRecordDto {
  @IsString()
  eventSource!: string;

  @IsOptional()
  @IsString()
  eventName?: string;

  @ValidateNested()
  @Type(() => S3EntityDto)
  s3!: S3EntityDto;
}

// Only the envelope is validated here; records are validated one by one so a
// single malformed entry does not discard the rest of the batch.
export class S3EventEnvelopeDto {
  @IsArray()
  Records!: unknown[];
}
