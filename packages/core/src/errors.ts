export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ManifestError extends ConfigurationError {
  constructor(
    message: string,
    public readonly manifestPath: string
  ) {
    super(message);
    this.name = "ManifestError";
  }
}

/** A single download or extraction attempt failed; the caller may retry. */
export class TransientFetchError extends Error {
  constructor(
    public readonly accession: string,
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = "TransientFetchError";
  }
}

export class ExtractionError extends Error {
  constructor(
    public readonly accession: string,
    message: string
  ) {
    super(message);
    this.name = "ExtractionError";
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: Error
  ) {
    super(`Failed after ${attempts} attempts: ${lastError.message}`);
    this.name = "RetryExhaustedError";
  }
}

/** A whole stage cannot proceed. Fatal to the run. */
export class StageFailure extends Error {
  constructor(
    public readonly stage: string,
    message: string
  ) {
    super(message);
    this.name = "StageFailure";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
