import type { IncomingHttpHeaders } from 'node:http';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH' | 'HEAD' | 'OPTIONS';

export const HTTP_METHODS: ReadonlySet<string> = new Set<HttpMethod>([
  'GET',
  'POST',
  'PUT',
  'DELETE',
  'PATCH',
  'HEAD',
  'OPTIONS',
]);

export const isHttpMethod = (value: string): value is HttpMethod => HTTP_METHODS.has(value);

/** Router captures: placeholder name -> raw (still percent-encoded) segment, in template order. */
export type RouteParams = Record<string, string>;

/** Everything the binder gets from the transport, before any schema is applied. */
export interface RawHttpRequest {
  method: string;
  /** Request target as the client sent it, path plus query. */
  originalUrl: string;
  headers: IncomingHttpHeaders;
  body: Buffer;
  params: RouteParams;
}

/** Request rebuilt by the binder and handed to a schema decoder. */
export interface HttpRequestParts {
  method: HttpMethod;
  url: URL;
  headers: Headers;
  body: Buffer;
}

export interface HttpResponseParts {
  status: number;
  headers: Record<string, string>;
  body: Buffer;
}

export type MatrixErrorCode =
  | 'M_UNKNOWN'
  | 'M_UNAUTHORIZED'
  | 'M_BAD_JSON'
  | 'M_NOT_JSON'
  | 'M_UNRECOGNIZED'
  | 'M_TOO_LARGE'
  | 'M_FORBIDDEN'
  | 'M_MISSING_TOKEN';

export interface MatrixErrorBody {
  errcode: string;
  error: string;
}
