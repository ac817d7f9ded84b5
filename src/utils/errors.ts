import { ZodError } from 'zod';
import type { FastifyRequest } from 'fastify';
import { getRequestId } from './request-id.js';

/**
 * Error codes for structured error responses
 */
export type ErrorCode = 'BAD_INPUT' | 'NOT_FOUND' | 'UPSTREAM_FAILED' | 'INTERNAL';

/**
 * Structured error response (error.v1 schema)
 */
export interface ErrorV1 {
  schema: 'error.v1';
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  request_id?: string;
}

/**
 * Raised by route handlers for expected HTTP failures; the error handler
 * turns it into an error.v1 body with the given code.
 */
export class HttpError extends Error {
  readonly name = 'HttpError';

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
  }
}

/**
 * Build a structured error response
 */
export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ErrorV1 {
  const error: ErrorV1 = {
    schema: 'error.v1',
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (requestId) {
    error.request_id = requestId;
  }

  return error;
}

/**
 * Strip file paths, key/secret assignments and email addresses from a message.
 */
export function sanitizeErrorMessage(message: string): string {
  return message
    .replace(/\/[\w/.@-]+/g, '[path]')
    .replace(/[A-Z_]+_?KEY=\S+/gi, '[KEY_REDACTED]')
    .replace(/[A-Z_]+_?SECRET=\S+/gi, '[SECRET_REDACTED]')
    .replace(/[\w.-]+@[\w.-]+\.\w+/g, '[email]');
}

/**
 * Describe an unknown thrown value as a single line of text.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'An unexpected error occurred';
}

/**
 * Fastify's body-parser and schema errors carry a 4xx statusCode.
 */
function clientStatusOf(error: Error): number | undefined {
  const statusCode: unknown = Reflect.get(error, 'statusCode');
  if (typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500) {
    return statusCode;
  }
  return undefined;
}

/**
 * Convert any error to ErrorV1 (safe, never leaks stack/PII)
 */
export function toErrorV1(error: unknown, request?: FastifyRequest): ErrorV1 {
  const requestId = request ? getRequestId(request) : undefined;

  if (error instanceof ZodError) {
    return buildErrorV1(
      'BAD_INPUT',
      'Validation failed',
      { validation_errors: error.flatten() },
      requestId
    );
  }

  if (error instanceof HttpError) {
    return buildErrorV1(error.code, sanitizeErrorMessage(error.message), error.details, requestId);
  }

  if (error instanceof Error) {
    const status = clientStatusOf(error);
    if (status === 404) {
      return buildErrorV1('NOT_FOUND', 'Not found', undefined, requestId);
    }
    if (status !== undefined) {
      return buildErrorV1('BAD_INPUT', sanitizeErrorMessage(error.message), undefined, requestId);
    }
    return buildErrorV1('INTERNAL', sanitizeErrorMessage(describeError(error)), undefined, requestId);
  }

  if (typeof error === 'string') {
    return buildErrorV1('INTERNAL', sanitizeErrorMessage(error), undefined, requestId);
  }

  return buildErrorV1('INTERNAL', 'An unexpected error occurred', undefined, requestId);
}

/**
 * Get HTTP status code for error code
 */
export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case 'BAD_INPUT':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'UPSTREAM_FAILED':
      return 502;
    case 'INTERNAL':
    default:
      return 500;
  }
}
