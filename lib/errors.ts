/**
 * Pipeline error taxonomy.
 *
 * Only ConfigurationError and ProgressStateError are fatal: they are thrown
 * before any batch work starts. Service errors are thrown inside the
 * structuring client and converted to per-record failures by the driver.
 * Extraction skips, validation failures and integrity anomalies are plain
 * values (see lib/extraction/types.ts and lib/validation/question-validator.ts).
 */

import type { AIErrorCode } from "@/lib/ai/error-utils";

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ProgressStateError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
  ) {
    super(message);
    this.name = "ProgressStateError";
  }
}

export abstract class ServiceError extends Error {
  abstract readonly retryable: boolean;

  constructor(
    message: string,
    readonly code: AIErrorCode,
  ) {
    super(message);
  }
}

/** Rate limit, timeout, network, 5xx, unparseable response. */
export class TransientServiceError extends ServiceError {
  readonly retryable = true;

  constructor(message: string, code: AIErrorCode) {
    super(message, code);
    this.name = "TransientServiceError";
  }
}

/** Malformed request, auth, billing, content policy: retrying cannot help. */
export class PermanentServiceError extends ServiceError {
  readonly retryable = false;

  constructor(message: string, code: AIErrorCode) {
    super(message, code);
    this.name = "PermanentServiceError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
