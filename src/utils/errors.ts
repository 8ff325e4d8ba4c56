import { ZodError } from 'zod';
import type { FastifyRequest } from 'fastify';
import { getRequestId } from './request-id.js';

/**
 * Error codes for structured error responses
 */
export type ErrorCode =
  | 'BAD_INPUT'
  | 'NOT_FOUND'
  | 'UNSUPPORTED_MEDIA_TYPE'
  | 'RATE_LIMITED'
  | 'INTERNAL';

const ERROR_CODES: ReadonlySet<string> = new Set<ErrorCode>([
  'BAD_INPUT',
  'NOT_FOUND',
  'UNSUPPORTED_MEDIA_TYPE',
  'RATE_LIMITED',
  'INTERNAL',
]);

/**
 * Structured error response (error.v1 schema)
 *
 * Used for envelope-level failures only. Validation outcomes, decode and
 * shape errors of the pipeline payload are regular 200 responses.
 */
export interface ErrorV1 {
  schema: 'error.v1';
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  request_id?: string;
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
 * Convert Zod validation error to ErrorV1
 */
export function zodErrorToErrorV1(error: ZodError, requestId?: string): ErrorV1 {
  return buildErrorV1(
    'BAD_INPUT',
    'Validation failed',
    {
      validation_errors: error.flatten(),
    },
    requestId
  );
}

/**
 * True for a value that already is an error.v1 body, e.g. the object
 * @fastify/rate-limit throws from errorResponseBuilder.
 */
export function isErrorV1(value: unknown): value is ErrorV1 {
  return (
    typeof value === 'object' &&
    value !== null &&
    'schema' in value &&
    value.schema === 'error.v1' &&
    'code' in value &&
    typeof value.code === 'string' &&
    ERROR_CODES.has(value.code) &&
    'message' in value &&
    typeof value.message === 'string' &&
    (!('details' in value) ||
      value.details === undefined ||
      (typeof value.details === 'object' && value.details !== null))
  );
}

function numericProp(error: Error, key: 'statusCode' | 'status'): number | undefined {
  if (!(key in error)) return undefined;
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'number' ? value : undefined;
}

function stringProp(error: Error, key: 'code'): string | undefined {
  if (!(key in error)) return undefined;
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Strip paths, inline secrets and email addresses from a message
 */
export function sanitizeErrorMessage(message: string): string {
  return message
    .replace(/\/[\w/.@-]+/g, '[path]')
    .replace(/[A-Z_]+_?KEY=\S+/gi, '[KEY_REDACTED]')
    .replace(/[A-Z_]+_?SECRET=\S+/gi, '[SECRET_REDACTED]')
    .replace(/[\w.-]+@[\w.-]+\.\w+/g, '[email]');
}

/**
 * Convert any error to ErrorV1 (safe, never leaks stack)
 *
 * Client errors raised by Fastify itself (body parsing, content type,
 * body limit) keep their message; anything else is sanitised.
 */
export function toErrorV1(error: unknown, request?: FastifyRequest): ErrorV1 {
  const requestId = request ? getRequestId(request) : undefined;

  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, requestId);
  }

  if (isErrorV1(error)) {
    return buildErrorV1(error.code, error.message, error.details, error.request_id ?? requestId);
  }

  if (error instanceof Error) {
    const statusCode = numericProp(error, 'statusCode') ?? numericProp(error, 'status');
    const code = stringProp(error, 'code');

    if (statusCode === 429) {
      return buildErrorV1('RATE_LIMITED', 'Too many requests', { retry_after_seconds: 60 }, requestId);
    }

    if (code === 'FST_ERR_CTP_BODY_TOO_LARGE' || statusCode === 413) {
      return buildErrorV1('BAD_INPUT', 'Request body too large', undefined, requestId);
    }

    if (code === 'FST_ERR_CTP_INVALID_MEDIA_TYPE' || statusCode === 415) {
      return buildErrorV1('UNSUPPORTED_MEDIA_TYPE', error.message, undefined, requestId);
    }

    if (statusCode === 404) {
      return buildErrorV1('NOT_FOUND', error.message, undefined, requestId);
    }

    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
      return buildErrorV1('BAD_INPUT', error.message, code ? { fastify_code: code } : undefined, requestId);
    }

    const message = sanitizeErrorMessage(error.message || 'An unexpected error occurred');
    return buildErrorV1('INTERNAL', message, undefined, requestId);
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
    case 'UNSUPPORTED_MEDIA_TYPE':
      return 415;
    case 'RATE_LIMITED':
      return 429;
    case 'INTERNAL':
    default:
      return 500;
  }
}
