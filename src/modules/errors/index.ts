/**
 * Error taxonomy
 *
 * Every failure the orchestration core distinguishes has its own class so
 * callers can branch with `instanceof` instead of matching on messages.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'HOSTING_ERROR'
  | 'REMOTE_ERROR'
  | 'AUTH_ERROR'
  | 'CREDENTIAL_ERROR'
  | 'LOCK_CONTENTION'
  | 'TIMEOUT'
  | 'CONFIGURATION_ERROR'
  | 'NOT_FOUND';

/**
 * Base class for all application errors
 */
export class AppError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = 'AppError';
  }
}

/**
 * Malformed catalog data. The offending item is skipped.
 */
export class ValidationError extends AppError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('VALIDATION_ERROR', message);
    this.issues = issues;
    this.name = 'ValidationError';
  }
}

/**
 * Media hosting collaborator failure
 */
export class HostingError extends AppError {
  readonly retryable: boolean;

  constructor(message: string, retryable: boolean, options?: { cause?: unknown }) {
    super('HOSTING_ERROR', message, options);
    this.retryable = retryable;
    this.name = 'HostingError';
  }
}

/**
 * Remote publish API failure
 */
export class RemoteError extends AppError {
  readonly retryable: boolean;
  readonly status?: number;

  constructor(
    message: string,
    retryable: boolean,
    options?: { cause?: unknown; status?: number }
  ) {
    super('REMOTE_ERROR', message, options);
    this.retryable = retryable;
    this.status = options?.status;
    this.name = 'RemoteError';
  }
}

/**
 * Token endpoint failure. Non-retryable means the refresh token was rejected.
 */
export class AuthError extends AppError {
  readonly retryable: boolean;

  constructor(message: string, retryable: boolean, options?: { cause?: unknown }) {
    super('AUTH_ERROR', message, options);
    this.retryable = retryable;
    this.name = 'AuthError';
  }
}

/**
 * No usable access token for this run
 */
export class CredentialError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CREDENTIAL_ERROR', message, options);
    this.name = 'CredentialError';
  }
}

export class LockContentionError extends AppError {
  readonly lockPath: string;

  constructor(lockPath: string) {
    super('LOCK_CONTENTION', `Run lock is held: ${lockPath}`);
    this.lockPath = lockPath;
    this.name = 'LockContentionError';
  }
}

export class TimeoutError extends AppError {
  constructor(message: string) {
    super('TIMEOUT', message);
    this.name = 'TimeoutError';
  }
}

/**
 * Missing or invalid settings, raised at startup before any store access
 */
export class ConfigurationError extends AppError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIGURATION_ERROR', `Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.issues = issues;
    this.name = 'ConfigurationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

/**
 * Normalize a thrown value into a log-friendly message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
