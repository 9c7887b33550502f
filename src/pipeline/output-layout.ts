function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, '');
}

/** `<prefix>/date=<YYYYMMDD_HHMMSS>/`, where the Glue job writes one run's parts. */
export function outputPartitionPrefix(outputPrefix: string, timestamp: string): string {
  return `${trimSlashes(outputPrefix)}/date=${timestamp}/`;
}

export function isPartitionedOutputKey(key: string, outputPrefix: string): boolean {
  const prefix = `${trimSlashes(outputPrefix)}/`;
  if (!key.startsWith(prefix)) {
    return false;
  }
  return /^date=[^/]+\/part-[^/]*\.parquet$/.test(key.slice(prefix.length));
}

/** Distinct `date=` partitions found among the listed keys, oldest first. */
export function outputPartitions(keys: readonly string[], outputPrefix: string): string[] {
  const prefix = `${trimSlashes(outputPrefix)}/`;
  const partitions = new Set<string>();
  for (const key of keys) {
    if (isPartitionedOutputKey(key, outputPrefix)) {
      partitions.add(key.slice(prefix.length).split('/')[0]);
    }
  }
  return [...partitions].sort();
}
