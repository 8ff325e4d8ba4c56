import { randomUUID } from 'node:crypto';
import type { IncomingHttpHeaders } from 'node:http';
import type { FastifyRequest } from 'fastify';

/**
 * Request ID header name (standard X-Request-Id)
 */
export const REQUEST_ID_HEADER = 'X-Request-Id';
export const REQUEST_ID_HEADER_LOWER = 'x-request-id';

/**
 * Generate a new request ID (UUID v4)
 */
export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Take the incoming X-Request-Id when it is a non-blank string,
 * otherwise generate a fresh one.
 *
 * Wired into Fastify as `genReqId`, so `request.id` always carries it.
 */
export function getOrGenerateRequestId(headers: IncomingHttpHeaders | undefined): string {
  const incomingId = headers?.[REQUEST_ID_HEADER_LOWER];

  if (typeof incomingId === 'string' && incomingId.trim().length > 0) {
    return incomingId.trim();
  }

  return generateRequestId();
}

/**
 * Get request ID from Fastify request
 */
export function getRequestId(request?: FastifyRequest): string {
  if (!request || !request.id) {
    return 'unknown';
  }

  return request.id;
}
