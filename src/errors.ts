/**
 * Application error hierarchy.
 * Expected domain conditions are reported as result values; these are
 * reserved for misconfiguration, caller misuse and collaborator faults.
 */

import type { ErrorCode } from './types/api.js';

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export class ConflictError extends AppError {
  constructor(
    code: Extract<ErrorCode, 'CONFLICT' | 'PROPOSAL_NOT_ACCEPTED'>,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, details);
  }
}

/** Thrown while building engines; never during a proposal evaluation. */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, details);
  }
}

export class TimeoutError extends AppError {
  constructor(operation: string, timeoutMs: number) {
    super('TIMEOUT', `${operation} timed out after ${timeoutMs}ms`, {
      operation,
      timeoutMs,
    });
  }
}

export class CollaboratorError extends AppError {
  constructor(collaborator: string, message: string) {
    super('COLLABORATOR_ERROR', `${collaborator}: ${message}`, { collaborator });
  }
}

/** Best-effort message extraction for logging caught values. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
