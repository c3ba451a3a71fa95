import type { ServerResponse } from 'node:http';
import type { HttpResponseParts } from '../shared/protocol.js';
import { errorMeta, type Logger } from '../utils/logger.js';
import type { OutgoingResponseSchema } from './schema.js';

export const FALLBACK_ERROR_BODY = '{"errcode":"M_UNKNOWN","error":"internal server error"}';

const FALLBACK_BYTES = Buffer.from(FALLBACK_ERROR_BODY, 'utf8');

/** The response used whenever a typed response cannot be encoded. */
export const fallbackResponse = (): HttpResponseParts => ({
  status: 500,
  headers: { 'content-type': 'application/json' },
  body: Buffer.from(FALLBACK_BYTES),
});

/**
 * Encodes `value` with its schema. Status and headers are copied as produced;
 * an encoding failure is logged and replaced by the fixed 500 response, the
 * original error never reaches the caller.
 */
export const encodeResponse = <TResponse>(
  schema: OutgoingResponseSchema<TResponse>,
  value: TResponse,
  logger?: Logger,
): HttpResponseParts => {
  try {
    const encoded = schema.tryIntoHttpResponse(value);
    if (!Number.isInteger(encoded.status) || encoded.status < 100 || encoded.status > 599) {
      throw new RangeError(`invalid response status ${encoded.status}`);
    }
    return {
      status: encoded.status,
      headers: { ...encoded.headers },
      body: encoded.body,
    };
  } catch (error) {
    logger?.error('could not encode response', errorMeta(error));
    return fallbackResponse();
  }
};

export const writeResponse = (res: ServerResponse, parts: HttpResponseParts) => {
  res.statusCode = parts.status;
  for (const [name, value] of Object.entries(parts.headers)) {
    res.setHeader(name, value);
  }
  res.setHeader('content-length', parts.body.length);
  res.end(parts.body);
};
