/**
 * Validation error class
 * @module @capbench/shared/errors/validation-error
 */

import { CapbenchError, ErrorCode } from './base-error.js';

/**
 * Validation error detail
 */
export interface ValidationErrorDetail {
  /** Field that failed validation */
  field: string;
  /** Error message */
  message: string;
  /** Machine readable rule that failed (REQUIRED, INVALID_TYPE, OUT_OF_RANGE, ...) */
  code: string;
}

/**
 * Field validation failures, sent to clients as a list under
 * `details.errors` so several failures on one field are all kept
 */
export class ValidationError extends CapbenchError {
  public readonly details: ValidationErrorDetail[];

  constructor(details: ValidationErrorDetail[]) {
    super('Validation failed', ErrorCode.VALIDATION_FAILED, {
      fields: [...new Set(details.map((detail) => detail.field))],
    });
    this.name = 'ValidationError';
    this.details = details;
  }

  override toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: this.message,
        details: { errors: this.details },
      },
    };
  }
}

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: ValidationErrorDetail[] };

/**
 * Create a successful validation result
 */
export function validResult<T>(value: T): ValidationResult<T> {
  return { valid: true, value };
}

/**
 * Create a failed validation result
 */
export function invalidResult<T>(errors: ValidationErrorDetail[]): ValidationResult<T> {
  return { valid: false, errors };
}
