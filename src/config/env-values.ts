// Helpers shared by every config boundary (CLI, Lambda, Pulumi program).

export function optional(value: string | undefined | null): string | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function parseFlag(value: string | undefined, fallback: boolean): boolean {
  const normalized = optional(value)?.toLowerCase();
  if (normalized === undefined) {
    return fallback;
  }
  return normalized === 'true' || normalized === '1' || normalized === 'yes';
}

export function parsePositiveInt(
  value: string | undefined,
  fallback: number,
): number {
  const normalized = optional(value);
  if (normalized === undefined) {
    return fallback;
  }
  const parsed = Number.parseInt(normalized, 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function oneOf<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  fallback: T,
): T {
  const normalized = optional(value);
  return allowed.find((candidate) => candidate === normalized) ?? fallback;
}
