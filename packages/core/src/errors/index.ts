/**
 * Error Taxonomy
 *
 * Every failure the harness can surface. None of these are retried: a
 * collaborator failure or a mismatch is fatal to the enclosing scenario.
 *
 * @module @dicom-it/core/errors
 */

/**
 * Harness error codes
 */
export type HarnessErrorCode =
  | 'RESOURCE_CREATION_FAILED'
  | 'RESOURCE_DELETION_FAILED'
  | 'FETCH_FAILED'
  | 'ASSERTION_FAILED'
  | 'CONFIGURATION_ERROR'
  | 'INVALID_TRANSITION'
  | 'AUTHENTICATION_FAILED'
  | 'UPSTREAM_ERROR';

/**
 * Base error for all harness failures
 */
export class HarnessError extends Error {
  readonly code: HarnessErrorCode;
  readonly context?: Record<string, unknown>;
  readonly timestamp: Date;

  constructor(
    message: string,
    code: HarnessErrorCode,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'HarnessError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

/**
 * Store creation returned a non-2xx status
 */
export class ResourceCreationError extends HarnessError {
  constructor(
    readonly storeId: string,
    readonly status: number,
    readonly body: string
  ) {
    super(
      `Failed to create DICOM store ${storeId}: HTTP ${status}${body ? ` ${body}` : ''}`,
      'RESOURCE_CREATION_FAILED',
      { storeId, status }
    );
    this.name = 'ResourceCreationError';
  }
}

/**
 * Store deletion returned a non-2xx status
 */
export class ResourceDeletionError extends HarnessError {
  constructor(
    readonly storeId: string,
    readonly status: number,
    readonly body: string
  ) {
    super(
      `Failed to delete DICOM store ${storeId}: HTTP ${status}${body ? ` ${body}` : ''}`,
      'RESOURCE_DELETION_FAILED',
      { storeId, status }
    );
    this.name = 'ResourceDeletionError';
  }
}

/**
 * Ground-truth retrieval failed (non-2xx or a body that is not JSON)
 */
export class FetchError extends HarnessError {
  constructor(
    message: string,
    readonly objectPath: string,
    readonly status: number,
    readonly body: string,
    cause?: unknown
  ) {
    super(message, 'FETCH_FAILED', { objectPath, status }, cause);
    this.name = 'FetchError';
  }
}

/**
 * Observed results differ from expected results
 */
export class AssertionFailure extends HarnessError {
  constructor(
    readonly label: string,
    readonly detail: string,
    readonly actual: unknown,
    readonly expected: unknown
  ) {
    super(`${label}: ${detail}`, 'ASSERTION_FAILED', { label });
    this.name = 'AssertionFailure';
  }
}

/**
 * Configuration could not be parsed
 */
export class ConfigurationError extends HarnessError {
  constructor(
    message: string,
    readonly issues: Array<{ field: string; message: string }> = []
  ) {
    super(message, 'CONFIGURATION_ERROR', { issues });
    this.name = 'ConfigurationError';
  }
}

/**
 * A collaborator answered with something the harness cannot interpret
 */
export class UpstreamError extends HarnessError {
  constructor(
    message: string,
    readonly status: number,
    readonly body: string
  ) {
    super(message, 'UPSTREAM_ERROR', { status });
    this.name = 'UpstreamError';
  }
}

/**
 * No access token could be obtained
 */
export class AuthenticationError extends HarnessError {
  constructor(message: string, cause?: unknown) {
    super(message, 'AUTHENTICATION_FAILED', undefined, cause);
    this.name = 'AuthenticationError';
  }
}

/**
 * Check if an error is a harness error
 */
export function isHarnessError(error: unknown): error is HarnessError {
  return error instanceof HarnessError;
}

/**
 * Get a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
