export type ConfigurationErrorCode =
  | "INVALID_CHUNK_SIZE"
  | "INVALID_CHUNK_OVERLAP"
  | "INVALID_TOP_K"
  | "INVALID_ENVIRONMENT"
  | "INVALID_LEXICON";

/**
 * Raised for caller misuse that must not be silently coerced, such as a
 * non-positive chunk size or a result count below one.
 */
export class ConfigurationError extends Error {
  constructor(
    public readonly code: ConfigurationErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function assertTopK(k: number): void {
  if (!Number.isInteger(k) || k < 1) {
    throw new ConfigurationError("INVALID_TOP_K", `Result count must be a positive integer, got ${k}.`);
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
