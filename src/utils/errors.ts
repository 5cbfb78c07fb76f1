export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public code?: string
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, code: string = 'VALIDATION_ERROR') {
    super(400, message, code);
    this.name = 'ValidationError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code: string = 'UNIQUE_VIOLATION') {
    super(409, message, code);
    this.name = 'ConflictError';
  }
}

export class VerificationError extends AppError {
  constructor(
    message: string,
    public readonly cause?: unknown,
    code: string = 'VERIFICATION_FAILED'
  ) {
    super(502, message, code);
    this.name = 'VerificationError';
  }
}

export class TransientStoreError extends AppError {
  constructor(
    message: string,
    public readonly cause?: unknown,
    code: string = 'TRANSIENT_STORE_ERROR'
  ) {
    super(503, message, code);
    this.name = 'TransientStoreError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
