// ============================================================================
// Base Error Classes
// ============================================================================

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

// ============================================================================
// HTTP Errors
// ============================================================================

export class BadRequestError extends AppError {
  constructor(message: string = 'Bad request') {
    super(message, 400, 'BAD_REQUEST');
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Not found', code: string = 'NOT_FOUND') {
    super(message, 404, code);
  }
}

export class TooManyRequestsError extends AppError {
  public readonly retryAfterMs?: number;

  constructor(message: string = 'Too many requests', retryAfterMs?: number) {
    super(message, 429, 'RATE_LIMITED');
    this.retryAfterMs = retryAfterMs;
  }
}

// ============================================================================
// Session Errors
// ============================================================================

/**
 * Raised when a patient already has an open session. Callers recover by
 * resuming the session carried on the error.
 */
export class ConflictError extends AppError {
  public readonly existingSessionId?: string;

  constructor(message: string = 'Conflict', existingSessionId?: string) {
    super(message, 409, 'CONFLICT');
    this.existingSessionId = existingSessionId;
  }
}

/** Append or close attempted on a session that is no longer open. */
export class InvalidStateError extends AppError {
  constructor(message: string) {
    super(message, 409, 'INVALID_STATE');
  }
}

export class PatientNotFoundError extends NotFoundError {
  constructor(patientId: string) {
    super(`Patient not found: ${patientId}`, 'PATIENT_NOT_FOUND');
  }
}

export class SessionNotFoundError extends NotFoundError {
  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, 'SESSION_NOT_FOUND');
  }
}

// ============================================================================
// External Service Errors
// ============================================================================

export class ExternalServiceError extends AppError {
  public readonly service: string;
  public readonly originalError?: Error;

  constructor(service: string, message: string, originalError?: Error) {
    super(`${service} error: ${message}`, 502, 'EXTERNAL_SERVICE_ERROR');
    this.service = service;
    this.originalError = originalError;
  }
}

export class LanguageServiceError extends ExternalServiceError {
  constructor(message: string, originalError?: Error) {
    super('LanguageService', message, originalError);
  }
}

export class GatewayError extends ExternalServiceError {
  constructor(message: string, originalError?: Error) {
    super('Gateway', message, originalError);
  }
}

// ============================================================================
// Persistence Errors
// ============================================================================

export class DatabaseError extends AppError {
  public readonly originalError?: Error;

  constructor(message: string, originalError?: Error) {
    super(`Database error: ${message}`, 500, 'DATABASE_ERROR', false);
    this.originalError = originalError;
  }
}

/** Checkpoint or flush failure. Logged and retried, never shown to the user. */
export class PersistenceError extends AppError {
  public readonly originalError?: Error;

  constructor(message: string, originalError?: Error) {
    super(`Persistence error: ${message}`, 500, 'PERSISTENCE_ERROR');
    this.originalError = originalError;
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Check if error is retryable (transient)
 */
export function isRetryableError(error: unknown): boolean {
  if (isAppError(error)) {
    if (error.statusCode === 429 || error.statusCode === 503) {
      return true;
    }
    if (error instanceof ExternalServiceError || error instanceof DatabaseError) {
      return true;
    }
    return false;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    const retryablePatterns = [
      'timeout',
      'econnreset',
      'econnrefused',
      'network',
      'temporarily unavailable',
      'rate limit',
      'too many requests',
    ];
    return retryablePatterns.some(pattern => message.includes(pattern));
  }

  return false;
}

/**
 * Retry a function with exponential backoff
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: {
    maxRetries?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    shouldRetry?: (error: unknown) => boolean;
  } = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 10000,
    shouldRetry = isRetryableError,
  } = options;

  let lastError: unknown;
  let delay = initialDelayMs;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt === maxRetries || !shouldRetry(error)) {
        throw error;
      }

      await new Promise(resolve => setTimeout(resolve, delay));

      // Exponential backoff with jitter
      delay = Math.min(delay * 2 + Math.random() * 1000, maxDelayMs);
    }
  }

  throw lastError;
}
