import { ZodError } from 'zod';

import { AppError } from './app-error.js';

export interface ErrorBody {
  statusCode: number;
  code: string;
  message: string;
  details?: unknown;
}

/**
 * Maps any thrown value to the body a transport adapter should return.
 * Internal faults never carry their original message.
 */
export function describeError(error: unknown): ErrorBody {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      return {
        statusCode: error.statusCode,
        code: error.code,
        message: error.message
      };
    }

    const body: ErrorBody = {
      statusCode: error.statusCode,
      code: error.code,
      message: error.message
    };

    if (error.details !== undefined) {
      body.details = error.details;
    }

    return body;
  }

  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      code: 'VALIDATION_ERROR',
      message: 'Request validation failed.',
      details: error.flatten()
    };
  }

  return {
    statusCode: 500,
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred.'
  };
}
