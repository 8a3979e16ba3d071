export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly isOperational: boolean;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends AppError {
  readonly statusCode = 500;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Configuration Error: ${message}`, context);
  }
}

export class PlaylistReadError extends AppError {
  readonly statusCode = 422;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Playlist Read Error: ${message}`, context);
  }
}

export class ExportError extends AppError {
  readonly statusCode = 500;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Export Error: ${message}`, context);
  }
}

export class ValidationError extends AppError {
  readonly statusCode = 400;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Validation Error: ${message}`, context);
  }
}
