/** Required settings are missing or malformed. Raised before any cloud call. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class MissingRequiredFileError extends Error {
  constructor(readonly filePath: string) {
    super(`Missing required file: ${filePath}`);
    this.name = 'MissingRequiredFileError';
  }
}

export class DependencyInstallError extends Error {
  constructor(
    message: string,
    readonly exitCode: number | null,
  ) {
    super(message);
    this.name = 'DependencyInstallError';
  }
}

export class TriggerEventValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TriggerEventValidationError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/** Name of an AWS SDK service exception, if the value carries one. */
export function errorName(error: unknown): string | undefined {
  if (error instanceof Error) {
    return error.name;
  }
  return undefined;
}
