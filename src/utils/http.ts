import { Response } from 'express';
import Joi from 'joi';
import { logger } from '../config/logger';
import { ApiResponse } from '../types';
import {
  ConfigurationError,
  DocumentShapeError,
  ExternalServiceError,
  InvalidRecordError,
  InvalidStatusError,
  RequestValidationError,
  errorMessage,
} from './errors';

export function sendSuccess<T>(res: Response, data: T, message?: string, status: number = 200): Response {
  const body: ApiResponse<T> = {
    success: true,
    data,
    ...(message ? { message } : {}),
    timestamp: new Date().toISOString(),
  };
  return res.status(status).json(body);
}

export function sendNotFound(res: Response, message: string): Response {
  const body: ApiResponse = { success: false, error: message, timestamp: new Date().toISOString() };
  return res.status(404).json(body);
}

export function statusForError(error: unknown): number {
  if (
    error instanceof RequestValidationError ||
    error instanceof InvalidRecordError ||
    error instanceof InvalidStatusError ||
    error instanceof DocumentShapeError
  ) {
    return 400;
  }
  if (error instanceof ExternalServiceError) {
    return 502;
  }
  if (error instanceof ConfigurationError) {
    return 503;
  }
  return 500;
}

/**
 * Log and answer with the error envelope. Unexpected errors get the fallback
 * message instead of their own.
 */
export function sendError(res: Response, error: unknown, fallbackMessage: string): Response {
  const status = statusForError(error);
  if (status >= 500) {
    logger.error(`❌ ${fallbackMessage}:`, error);
  } else {
    logger.warn(`⚠️ ${fallbackMessage}: ${errorMessage(error)}`);
  }

  const body: ApiResponse = {
    success: false,
    error: status === 500 ? fallbackMessage : errorMessage(error),
    timestamp: new Date().toISOString(),
  };
  return res.status(status).json(body);
}

export function validate<T>(schema: Joi.ObjectSchema<T>, input: unknown): T {
  const result = schema.validate(input, { abortEarly: false, stripUnknown: true });
  if (result.error || result.value === undefined) {
    const details = result.error ? result.error.details.map((detail) => detail.message) : ['no value'];
    throw new RequestValidationError(details.join('; '));
  }
  return result.value;
}
