/**
 * Runtime safety error utilities.
 *
 * Provides a consistent error type for configuration and registration
 * failures, plus helpers to convert lower-level errors into SafetyError
 * instances that callers can reason about. Runtime alerts (blocking,
 * memory pressure, leaks) are never raised as errors; they are delivered
 * through callbacks and events.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to API consumers.
 */
export type SafetyErrorCode =
  | 'ConfigurationError'
  | 'RegistrationError'
  | 'AnalysisError'
  | 'ValidationError'
  | 'UnknownError';

/**
 * Plain shape of a SafetyError (for JSON responses/logs).
 */
export interface SafetyErrorShape {
  code: SafetyErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class SafetyError extends Error implements SafetyErrorShape {
  public readonly code: SafetyErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: SafetyErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SafetyError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape (for JSON responses/telemetry).
   */
  public toObject(): SafetyErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Map unknown errors into SafetyError instances.
 *
 * @param error - Error thrown by a parser, the file system or a callback
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toSafetyError(
  error: unknown,
  fallbackCode: SafetyErrorCode = 'UnknownError'
): SafetyError {
  if (error instanceof SafetyError) {
    return error;
  }

  if (error instanceof Error) {
    return new SafetyError(fallbackCode, error.message, { cause: error.name });
  }

  return new SafetyError(fallbackCode, `Unknown error: ${String(error)}`);
}

/**
 * Format zod issues as `field message` lines.
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
    return `${field} ${issue.message}`;
  });
}

/**
 * Convert a zod validation error to a SafetyError.
 *
 * @example
 * ```typescript
 * const result = MemoryGuardOptionsSchema.safeParse(options);
 * if (!result.success) {
 *   throw zodErrorToSafetyError(result.error, 'ConfigurationError', 'Invalid memory guard configuration');
 * }
 * // Throws: "Invalid memory guard configuration: warningThresholdBytes must be greater than gcThresholdBytes"
 * ```
 */
export function zodErrorToSafetyError(
  error: ZodError,
  code: SafetyErrorCode = 'ValidationError',
  prefix = 'Validation failed'
): SafetyError {
  const issues = formatZodIssues(error);

  return new SafetyError(code, `${prefix}: ${issues.join('; ')}`, {
    issues: error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
      code: issue.code,
    })),
  });
}
