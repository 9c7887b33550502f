import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  PutObjectCommand,
  S3Client,
  paginateListObjectsV2,
} from '@aws-sdk/client-s3';
import { S3_CLIENT } from './aws.constants';

export interface ListedObject {
  key: string;
  size: number;
  lastModified?: Date;
}

@Injectable()
export class S3Service {
  private readonly logger = new Logger(S3Service.name);

  constructor(@Inject(S3_CLIENT) private readonly client: S3Client) {}

  async uploadObject(options: {
    bucket: string;
    key: string;
    body: string | Buffer;
    contentType?: string;
    metadata?: Record<string, string>;
  }): Promise<void> {
    const { bucket, key, body, contentType, metadata } = options;

    await this.client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: typeof body === 'string' ? Buffer.from(body) : body,
        ContentType: contentType ?? 'application/octet-stream',
        Metadata: metadata,
      }),
    );

    this.logger.log(`Uploaded object s3://${bucket}/${key}`);
  }

  async listObjects(bucket: string, prefix: string): Promise<ListedObject[]> {
    const objects: ListedObject[] = [];
    const pages = paginateListObjectsV2(
      { client: this.client },
      { Bucket: bucket, Prefix: prefix },
    );
    for await (const page of pages) {
      for (const item of page.Contents ?? []) {
        if (item.Key) {
          objects.push({
            key: item.Key,
            size: item.Size ?? 0,
            lastModified: item.LastModified,
          });
        }
      }
    }
    return objects;
  }
}
