import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError, ValidationError } from '../errors/index.js';
import { ApiError, type ErrorResponse } from './types.js';

/**
 * Global error handling middleware.
 *
 * Catches all errors and returns JSON in a consistent format. Messages of
 * unexpected errors are replaced unless `exposeDetails` is set.
 */
export function createErrorHandler(options: { exposeDetails: boolean }) {
  return function errorHandler(
    err: Error,
    req: Request,
    res: Response<ErrorResponse>,
    _next: NextFunction
  ): void {
    console.error('[Error]', {
      name: err.name,
      message: err.message,
      stack: err.stack,
      path: req.path,
      timestamp: new Date().toISOString(),
    });

    let statusCode = 500;
    let errorTitle = 'Internal Server Error';
    let errorMessage = options.exposeDetails ? err.message : 'An unexpected error occurred';

    if (err instanceof ApiError) {
      statusCode = err.statusCode;
      errorTitle = err.error;
      errorMessage = err.message;
    } else if (err instanceof ZodError || err instanceof ValidationError) {
      statusCode = 400;
      errorTitle = 'Bad Request';
      errorMessage = 'Validation error: ' + err.message;
    } else if (err instanceof SyntaxError) {
      // Raised by express.json() for unparseable bodies
      statusCode = 400;
      errorTitle = 'Bad Request';
      errorMessage = 'Malformed JSON body';
    } else if (err instanceof AppError && err.code === 'NOT_FOUND') {
      statusCode = 404;
      errorTitle = 'Not Found';
      errorMessage = err.message;
    }

    res.status(statusCode).json({
      error: errorTitle,
      message: errorMessage,
    });
  };
}

/**
 * 404 Not Found handler for undefined routes.
 */
export function notFoundHandler(req: Request, res: Response<ErrorResponse>): void {
  res.status(404).json({
    error: 'Not Found',
    message: `Route ${req.method} ${req.path} not found`,
  });
}

/**
 * Request logging middleware.
 */
export function requestLogger(req: Request, _res: Response, next: NextFunction): void {
  console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);
  next();
}
