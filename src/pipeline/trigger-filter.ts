export interface TriggerFilter {
  prefix: string;
  suffix: string;
}

export const SUPPORTED_SUFFIXES = ['.csv', '.json'] as const;

// S3 accepts a single suffix per notification rule, so each supported
// extension becomes its own rule under the shared prefix.
export function triggerFilters(inputPrefix: string): TriggerFilter[] {
  return SUPPORTED_SUFFIXES.map((suffix) => ({ prefix: inputPrefix, suffix }));
}

/** Same case-sensitive prefix/suffix test S3 applies before delivering an event. */
export function matchesTriggerFilter(
  key: string,
  filters: readonly TriggerFilter[],
): boolean {
  return filters.some(
    ({ prefix, suffix }) => key.startsWith(prefix) && key.endsWith(suffix),
  );
}
