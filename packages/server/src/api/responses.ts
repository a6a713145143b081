/**
 * Response helpers shared by the API handlers
 * @module @capbench/server/api/responses
 */

import type { Response } from 'express';
import type { ValidationErrorDetail } from '@capbench/shared';
import {
  ErrorCode,
  ValidationError,
  generateCorrelationId,
  isCapbenchError,
  statusCodeFor,
  type Logger,
} from '@capbench/shared';

/**
 * API error body
 */
export interface ApiErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
  [key: string]: unknown;
}

/**
 * Send a success body; every field of `body` sits beside `success`
 */
export function sendSuccess<T extends object>(res: Response, body: T, statusCode = 200): void {
  res.status(statusCode).json({ success: true, ...body });
}

/**
 * Send an error body
 */
export function sendError(
  res: Response,
  code: string,
  message: string,
  statusCode: number,
  details?: Record<string, unknown>,
  extra: Record<string, unknown> = {},
): void {
  const response: ApiErrorResponse = {
    success: false,
    error: { code, message, ...(details && { details }) },
    ...extra,
  };
  res.status(statusCode).json(response);
}

/**
 * Send field validation errors as a 400
 */
export function sendValidationError(res: Response, errors: ValidationErrorDetail[]): void {
  const error = new ValidationError(errors);
  res.status(error.statusCode).json(error.toJSON());
}

/**
 * Name of an error code as it appears in API bodies
 */
export function errorCodeName(code: number): string {
  return ErrorCode[code] ?? 'INTERNAL_ERROR';
}

/**
 * Send any thrown value, using the error code's status for CapbenchErrors
 */
export function sendFailure(res: Response, error: unknown, fallbackMessage: string): void {
  if (isCapbenchError(error)) {
    sendError(res, errorCodeName(error.code), error.message, error.statusCode);
    return;
  }
  sendError(res, 'INTERNAL_ERROR', fallbackMessage, statusCodeFor(ErrorCode.INTERNAL));
}

/**
 * Correlation ID set by the request logging middleware
 */
export function correlationIdOf(res: Response): string {
  const correlationId: unknown = res.locals?.correlationId;
  return typeof correlationId === 'string' ? correlationId : generateCorrelationId();
}

/**
 * Child logger carrying the request's correlation ID
 */
export function requestLoggerFor(logger: Logger, res: Response): Logger {
  return logger.withCorrelationId(correlationIdOf(res));
}
