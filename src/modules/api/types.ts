import { z } from 'zod';
import type { Request, Response, NextFunction } from 'express';
import type { CatalogStore, PostAttempt } from '../catalog/types.js';
import type { CredentialStatus } from '../credentials/types.js';
import type { SchedulerState } from '../scheduler/types.js';
import type { RunOptions, RunResult } from '../runner/types.js';

// =============================================================================
// DEPENDENCIES
// =============================================================================

/**
 * What the HTTP surface needs from the rest of the service
 */
export interface ApiDependencies {
  checkHealth(): Promise<boolean>;
  scheduler: {
    getState(): SchedulerState;
    triggerManually(options?: RunOptions): Promise<RunResult | null>;
  };
  credentials: {
    inspect(): Promise<CredentialStatus>;
  };
  store: Pick<CatalogStore, 'recentAttempts'>;
}

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

/**
 * Query params for listing attempts
 */
export const attemptsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).optional().default(20),
});

export type AttemptsQuery = z.infer<typeof attemptsQuerySchema>;

/**
 * Request body for triggering a run
 */
export const runRequestBodySchema = z
  .object({
    dryRun: z.boolean().optional(),
    itemId: z.string().min(1).optional(),
  })
  .strict();

export type RunRequestBody = z.infer<typeof runRequestBodySchema>;

// =============================================================================
// API RESPONSE TYPES
// =============================================================================

export interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  database: 'connected' | 'disconnected';
}

export interface AttemptResponse {
  id: string;
  itemId: string;
  runId: string | null;
  status: string;
  failureReason: string | null;
  publishId: string | null;
  reconciled: boolean;
  errorMessage: string | null;
  createdAt: string;
  completedAt: string | null;
}

export interface AttemptsListResponse {
  attempts: AttemptResponse[];
}

/**
 * Response for GET /api/status
 */
export interface StatusResponse {
  scheduler: {
    isRunning: boolean;
    isRunActive: boolean;
    nextRunTime: string | null;
    totalRuns: number;
    successfulRuns: number;
    failedRuns: number;
    lastRun: {
      runId: string;
      status: string;
      reason: string | null;
      itemId: string | null;
      completedAt: string;
    } | null;
  };
  credentials: {
    state: string;
    expiresAt: string | null;
    accountId: string | null;
    reason: string | null;
  };
  recentAttempts: AttemptResponse[];
}

/**
 * Standard error response
 */
export interface ErrorResponse {
  error: string;
  message: string;
}

export function toAttemptResponse(attempt: PostAttempt): AttemptResponse {
  return {
    id: attempt.id,
    itemId: attempt.itemId,
    runId: attempt.runId,
    status: attempt.status,
    failureReason: attempt.failureReason,
    publishId: attempt.publishId,
    reconciled: attempt.reconciled,
    errorMessage: attempt.errorMessage,
    createdAt: attempt.createdAt.toISOString(),
    completedAt: attempt.completedAt?.toISOString() ?? null,
  };
}

// =============================================================================
// ERROR CLASSES
// =============================================================================

/**
 * Base API error class
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly error: string;

  constructor(statusCode: number, error: string, message: string) {
    super(message);
    this.statusCode = statusCode;
    this.error = error;
    this.name = 'ApiError';
  }

  toJSON(): ErrorResponse {
    return {
      error: this.error,
      message: this.message,
    };
  }
}

/**
 * 400 Bad Request error
 */
export class BadRequestError extends ApiError {
  constructor(message: string) {
    super(400, 'Bad Request', message);
    this.name = 'BadRequestError';
  }
}

/**
 * 409 Conflict error
 */
export class ConflictError extends ApiError {
  constructor(message: string) {
    super(409, 'Conflict', message);
    this.name = 'ConflictError';
  }
}

// =============================================================================
// TYPED REQUEST HANDLERS
// =============================================================================

/**
 * Typed async request handler with error handling
 */
export type AsyncRequestHandler<
  Params = Record<string, string>,
  ResBody = unknown,
  ReqBody = unknown,
  Query = Record<string, unknown>
> = (
  req: Request<Params, ResBody, ReqBody, Query>,
  res: Response<ResBody>,
  next: NextFunction
) => Promise<void>;

/**
 * Wraps an async handler to catch errors and pass them to the error middleware
 */
export function asyncHandler<
  Params = Record<string, string>,
  ResBody = unknown,
  ReqBody = unknown,
  Query = Record<string, unknown>
>(
  fn: AsyncRequestHandler<Params, ResBody, ReqBody, Query>
): (req: Request<Params, ResBody, ReqBody, Query>, res: Response<ResBody>, next: NextFunction) => void {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Format zod issues for a 400 response
 */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues.map((e) => `${e.path.join('.') || 'body'}: ${e.message}`).join('; ');
}
