export type ErrorCategory = 'validation' | 'authentication' | 'api' | 'storage';

export class AppError extends Error {
  constructor(
    message: string,
    readonly category: ErrorCategory,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'validation', options);
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'authentication', options);
  }
}

export class ApiError extends AppError {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'api', options);
  }
}

export class StorageError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'storage', options);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
