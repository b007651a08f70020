/**
 * Error types shared by services and routes. Routes map them to HTTP status
 * codes in `utils/http.ts`.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class InvalidRecordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRecordError';
  }
}

export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

export class InvalidStatusError extends Error {
  constructor(
    public readonly status: string,
    public readonly allowed: readonly string[]
  ) {
    super(`Invalid status "${status}". Expected one of: ${allowed.join(', ')}`);
    this.name = 'InvalidStatusError';
  }
}

export class DocumentShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DocumentShapeError';
  }
}

export class ExternalServiceError extends Error {
  constructor(
    public readonly service: string,
    message: string,
    public readonly statusCode?: number
  ) {
    super(`${service}: ${message}`);
    this.name = 'ExternalServiceError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
