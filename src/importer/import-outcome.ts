export type ImportStatus = 'imported' | 'skipped' | 'absent' | 'failed';

export interface ImportResult {
  description: string;
  address: string;
  id: string;
  status: ImportStatus;
  detail?: string;
}

export interface ImportSummary {
  results: ImportResult[];
  counts: Record<ImportStatus, number>;
}

// Expected on first deployments: nothing to import yet, or the resource is
// tracked by another stack. Anything else is an unexpected failure.
const EXPECTED_ABSENCE_PATTERNS: RegExp[] = [
  /does not exist/i,
  /not found/i,
  /cannot find/i,
  /NoSuchEntity/,
  /NoSuchBucket/,
  /ResourceNotFoundException/,
  /EntityNotFoundException/,
  /\b404\b/,
  /already exists/i,
  /already managed/i,
];

export function isExpectedAbsence(message: string): boolean {
  return EXPECTED_ABSENCE_PATTERNS.some((pattern) => pattern.test(message));
}

export function summarize(results: ImportResult[]): ImportSummary {
  const counts: Record<ImportStatus, number> = {
    imported: 0,
    skipped: 0,
    absent: 0,
    failed: 0,
  };
  for (const result of results) {
    counts[result.status] += 1;
  }
  return { results, counts };
}
