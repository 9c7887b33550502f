export interface S3EventRecord {
  eventSource: 'aws:s3';
  eventName: string;
  s3: {
    bucket: {
      name: string;
    };
    object: {
      key: string;
      size?: number;
    };
  };
}

export interface S3Event {
  Records: S3EventRecord[];
}

/** Validated, decoded form of one qualifying upload. */
export interface TriggerEvent {
  kind: 'object-created';
  eventSource: 'aws:s3';
  bucketName: string;
  objectKey: string;
}

export type SkipReason = 'malformed-record' | 'unsupported-source' | 'filtered';

export interface SkippedRecord {
  index: number;
  reason: SkipReason;
  detail: string;
}
