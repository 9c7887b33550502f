import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { TriggerEventValidationError } from '../common/errors';
import { S3EventEnvelopeDto, S3EventRecordDto } from './dto/s3-event.dto';
import {
  S3Event,
  SkippedRecord,
  TriggerEvent,
} from './interfaces/s3-event.interface';
import { matchesTriggerFilter, TriggerFilter } from './trigger-filter';

export interface ParsedTriggerEvents {
  events: TriggerEvent[];
  skipped: SkippedRecord[];
}

function describeErrors(errors: ValidationError[], path = ''): string[] {
  return errors.flatMap((error) => {
    const property = path ? `${path}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (constraint) => `${property}: ${constraint}`,
    );
    return [...own, ...describeErrors(error.children ?? [], property)];
  });
}

// Keys arrive URL-encoded with spaces as '+'.
export function decodeObjectKey(rawKey: string): string {
  return decodeURIComponent(rawKey.replace(/\+/g, ' '));
}

export function parseTriggerEvents(
  payload: unknown,
  filters: readonly TriggerFilter[],
): ParsedTriggerEvents {
  if (typeof payload !== 'object' || payload === null) {
    throw new TriggerEventValidationError('Event payload is not an object');
  }

  const envelope = plainToInstance(S3EventEnvelopeDto, payload);
  const envelopeErrors = validateSync(envelope);
  if (envelopeErrors.length > 0) {
    throw new TriggerEventValidationError(
      `Unrecognized event payload: ${describeErrors(envelopeErrors).join('; ')}`,
    );
  }

  const events: TriggerEvent[] = [];
  const skipped: SkippedRecord[] = [];

  envelope.Records.forEach((raw, index) => {
    if (typeof raw !== 'object' || raw === null) {
      skipped.push({ index, reason: 'malformed-record', detail: 'record is not an object' });
      return;
    }

    const record = plainToInstance(S3EventRecordDto, raw);
    const errors = validateSync(record);
    if (errors.length > 0) {
      skipped.push({
        index,
        reason: 'malformed-record',
        detail: describeErrors(errors).join('; '),
      });
      return;
    }

    if (record.eventSource !== 'aws:s3') {
      skipped.push({
        index,
        reason: 'unsupported-source',
        detail: `event source ${record.eventSource}`,
      });
      return;
    }

    let objectKey: string;
    try {
      objectKey = decodeObjectKey(record.s3.object.key);
    } catch (error) {
      if (!(error instanceof URIError)) {
        throw error;
      }
      skipped.push({
        index,
        reason: 'malformed-record',
        detail: `object key is not valid URL encoding: ${record.s3.object.key}`,
      });
      return;
    }

    if (!matchesTriggerFilter(objectKey, filters)) {
      skipped.push({ index, reason: 'filtered', detail: objectKey });
      return;
    }

    events.push({
      kind: 'object-created',
      eventSource: 'aws:s3',
      bucketName: record.s3.bucket.name,
      objectKey,
    });
  });

  return { events, skipped };
}

/** The notification S3 would deliver for a single created object. */
export function buildS3Event(bucket: string, key: string): S3Event {
  return {
    Records: [
      {
        eventSource: 'aws:s3',
        eventName: 'ObjectCreated:Put',
        s3: {
          bucket: { name: bucket },
          object: { key: encodeURIComponent(key).replace(/%20/g, '+').replace(/%2F/g, '/') },
        },
      },
    ],
  };
}
