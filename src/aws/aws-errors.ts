import { errorName } from '../common/errors';

const NOT_FOUND_NAMES = new Set([
  'NotFound',
  'NoSuchBucket',
  'NoSuchKey',
  'ResourceNotFoundException',
  'EntityNotFoundException',
]);

/** SDK error signalling that the addressed resource does not exist (yet). */
export function isNotFoundError(error: unknown): boolean {
  const name = errorName(error);
  return name !== undefined && NOT_FOUND_NAMES.has(name);
}
