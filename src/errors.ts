import type { OperationKind } from './types/index.js';

/**
 * Raised when an operation would push credits or request counts past a ceiling.
 * The scheduler treats it as a soft stop and returns what it has.
 */
export class BudgetExceededError extends Error {
  constructor(
    message: string,
    public readonly operation: OperationKind,
    public readonly creditsUsed: number,
    public readonly maxCredits: number
  ) {
    super(message);
    this.name = 'BudgetExceededError';
  }
}

export class RecoveryFailedError extends Error {
  constructor(
    message: string,
    public readonly strategiesTried: string[]
  ) {
    super(message);
    this.name = 'RecoveryFailedError';
  }
}

export class ValidationFailedError extends Error {
  constructor(
    message: string,
    public readonly errors: string[]
  ) {
    super(message);
    this.name = 'ValidationFailedError';
  }
}

export class ServiceError extends Error {
  constructor(
    message: string,
    public readonly service: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ServiceError';
  }
}

/** Rate limits, 5xx responses, timeouts and dropped connections. Retried. */
export class TransientServiceError extends ServiceError {
  constructor(message: string, service: string, status?: number, options?: { cause?: unknown }) {
    super(message, service, status, options);
    this.name = 'TransientServiceError';
  }
}

/** Auth failures, exhausted provider credits and other 4xx responses. Not retried. */
export class PermanentServiceError extends ServiceError {
  constructor(message: string, service: string, status?: number, options?: { cause?: unknown }) {
    super(message, service, status, options);
    this.name = 'PermanentServiceError';
  }
}

export type FailureKind = 'transient' | 'permanent';

export function classifyHttpStatus(status: number): FailureKind {
  if (status === 408 || status === 429 || status >= 500) return 'transient';
  return 'permanent';
}

const PERMANENT_MARKERS = ['insufficient credits', 'payment required', 'unauthorized', 'forbidden'];

/**
 * Build a typed service error from an HTTP status and response body.
 * Some providers report exhausted credits with a 200-range or 429 status,
 * so the body text wins over the status code.
 */
export function serviceErrorFromResponse(service: string, status: number, body: string): ServiceError {
  const message = `${service} API error (${status}): ${body.slice(0, 300)}`;
  const lowered = body.toLowerCase();
  if (PERMANENT_MARKERS.some(marker => lowered.includes(marker)) || status === 402) {
    return new PermanentServiceError(message, service, status);
  }
  return classifyHttpStatus(status) === 'transient'
    ? new TransientServiceError(message, service, status)
    : new PermanentServiceError(message, service, status);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
