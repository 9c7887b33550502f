import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { existsSync, readFileSync } from 'fs';
import { basename, extname } from 'path';
import { S3Service } from '../aws/s3.service';
import { MissingRequiredFileError } from '../common/errors';
import { PipelineConfig } from '../config/pipeline-config.interface';
import { deploymentNames } from '../naming/resource-naming';
import { matchesTriggerFilter, triggerFilters } from '../pipeline/trigger-filter';

const CONTENT_TYPES: Record<string, string> = {
  '.csv': 'text/csv',
  '.json': 'application/json',
};

export interface UploadResult {
  bucket: string;
  key: string;
  triggers: boolean;
}

@Injectable()
export class UploadService {
  private readonly logger = new Logger(UploadService.name);
  private readonly config: PipelineConfig;

  constructor(
    private readonly s3Service: S3Service,
    private readonly configService: ConfigService,
  ) {
    this.config = this.configService.getOrThrow<PipelineConfig>('pipeline');
  }

  async upload(filePath: string, key?: string): Promise<UploadResult> {
    if (!existsSync(filePath)) {
      throw new MissingRequiredFileError(filePath);
    }

    const bucket = deploymentNames(this.config, this.config).sourceBucket;
    const objectKey = key ?? `${this.config.inputPrefix}${basename(filePath)}`;
    const triggers = matchesTriggerFilter(objectKey, triggerFilters(this.config.inputPrefix));
    if (!triggers) {
      this.logger.warn(
        `s3://${bucket}/${objectKey} does not match the trigger filter; no job will start`,
      );
    }

    await this.s3Service.uploadObject({
      bucket,
      key: objectKey,
      body: readFileSync(filePath),
      contentType: CONTENT_TYPES[extname(filePath).toLowerCase()],
      metadata: { 'uploaded-by': 'etl-pipeline-cli' },
    });

    return { bucket, key: objectKey, triggers };
  }
}
