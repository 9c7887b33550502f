import { TriggerEvent } from './interfaces/s3-event.interface';

export interface JobInvocationParameters {
  sourceBucket: string;
  sourceKey: string;
  destinationBucket: string;
  outputPrefix: string;
}

export function buildJobParameters(
  event: TriggerEvent,
  target: { destinationBucket: string; outputPrefix: string },
): JobInvocationParameters {
  return {
    sourceBucket: event.bucketName,
    sourceKey: event.objectKey,
    destinationBucket: target.destinationBucket,
    outputPrefix: target.outputPrefix,
  };
}

/** Argument names the Glue script resolves with getResolvedOptions. */
export function toJobArguments(params: JobInvocationParameters): Record<string, string> {
  return {
    '--source_bucket': params.sourceBucket,
    '--source_key': params.sourceKey,
    '--destination_bucket': params.destinationBucket,
    '--output_prefix': params.outputPrefix,
  };
}
