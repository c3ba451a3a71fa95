import { z } from 'zod';
import type { HttpMethod, HttpRequestParts, HttpResponseParts } from '../shared/protocol.js';

export interface RequestMetadata {
  name: string;
  method: HttpMethod;
  /**
   * Path templates this request has been served under, current one first.
   * Placeholders are whole segments written as `:name`.
   */
  paths: readonly string[];
}

export interface IncomingRequestSchema<TRequest> {
  metadata: RequestMetadata;
  tryFromHttpRequest(request: HttpRequestParts, pathArgs: readonly string[]): TRequest;
}

export interface OutgoingResponseSchema<TResponse> {
  tryIntoHttpResponse(value: TResponse): HttpResponseParts;
}

const PLACEHOLDER = /\/:/g;

export const countPathPlaceholders = (template: string) => template.match(PLACEHOLDER)?.length ?? 0;

const JSON_HEADERS = { 'content-type': 'application/json' } as const;

const serialize = (value: unknown): Buffer => {
  const text = JSON.stringify(value);
  if (typeof text !== 'string') {
    throw new TypeError('response body is not JSON serializable');
  }
  return Buffer.from(text, 'utf8');
};

export const jsonResponse = <TResponse>(
  toBody: (value: TResponse) => unknown,
  toStatus: (value: TResponse) => number = () => 200,
): OutgoingResponseSchema<TResponse> => ({
  tryIntoHttpResponse: (value) => ({
    status: toStatus(value),
    headers: { ...JSON_HEADERS },
    body: serialize(toBody(value)),
  }),
});

export const emptyResponse = <TResponse>(status = 200): OutgoingResponseSchema<TResponse> => ({
  tryIntoHttpResponse: () => ({
    status,
    headers: {},
    body: Buffer.alloc(0),
  }),
});

/** Parses a JSON request body; an empty body reads as `{}`. */
export const decodeJsonBody = <TSchema extends z.ZodTypeAny>(schema: TSchema, body: Buffer): z.output<TSchema> => {
  const text = body.length === 0 ? '{}' : body.toString('utf8');
  const parsed: unknown = JSON.parse(text);
  return schema.parse(parsed);
};

const BEARER = /^Bearer\s+(.+)$/i;

/** Access token from `Authorization: Bearer`, falling back to the legacy `access_token` query parameter. */
export const accessToken = (request: HttpRequestParts): string | null => {
  const header = request.headers.get('authorization');
  if (header) {
    const match = header.match(BEARER);
    return match ? match[1].trim() : null;
  }
  return request.url.searchParams.get('access_token');
};
