import type { IncomingHttpHeaders, IncomingMessage } from 'node:http';
import { isHttpMethod, type HttpRequestParts, type RawHttpRequest, type RouteParams } from '../shared/protocol.js';
import { ProtocolError } from './errors.js';
import { countPathPlaceholders, type IncomingRequestSchema } from './schema.js';

const SYNTHETIC_ORIGIN = 'http://appservice.invalid';

/**
 * Buffers the whole request body. A stream error maps to `MissingBody`, a body
 * above `maxBytes` to `PayloadTooLarge`.
 */
export const readRawBody = (req: IncomingMessage, maxBytes: number): Promise<Buffer> => {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let settled = false;

    const fail = (error: ProtocolError) => {
      if (settled) return;
      settled = true;
      reject(error);
    };

    req.on('data', (chunk: Buffer | string) => {
      if (settled) return;
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      size += buffer.length;
      if (size > maxBytes) {
        fail(new ProtocolError('PayloadTooLarge'));
        req.resume();
        return;
      }
      chunks.push(buffer);
    });

    req.on('error', (error) => fail(new ProtocolError('MissingBody', { cause: error })));
    req.on('aborted', () => fail(new ProtocolError('MissingBody')));

    req.on('end', () => {
      if (settled) return;
      settled = true;
      resolve(Buffer.concat(chunks, size));
    });
  });
};

const extractPathArgs = (params: RouteParams): string[] => {
  try {
    return Object.values(params).map((value) => decodeURIComponent(value));
  } catch (error) {
    throw new ProtocolError('Deserialization', { cause: error });
  }
};

/** Pads to the placeholder count of the schema's first path; trailing segments may be optional. */
const padPathArgs = (args: string[], paths: readonly string[]): string[] => {
  const template = paths[0];
  if (template === undefined) return args;
  const expected = countPathPlaceholders(template);
  const padded = [...args];
  while (padded.length < expected) {
    padded.push('');
  }
  return padded;
};

const toHeaders = (incoming: IncomingHttpHeaders): Headers => {
  const headers = new Headers();
  for (const [name, value] of Object.entries(incoming)) {
    if (value === undefined) continue;
    for (const item of Array.isArray(value) ? value : [value]) {
      headers.append(name, item);
    }
  }
  return headers;
};

const rebuildRequest = (raw: RawHttpRequest): HttpRequestParts => {
  const method = raw.method.toUpperCase();
  if (!isHttpMethod(method)) {
    throw new ProtocolError('Deserialization');
  }

  try {
    return {
      method,
      url: new URL(raw.originalUrl, SYNTHETIC_ORIGIN),
      headers: toHeaders(raw.headers),
      body: raw.body,
    };
  } catch (error) {
    throw new ProtocolError('Deserialization', { cause: error });
  }
};

/**
 * Turns a raw request plus the router's loose captures into the typed request
 * of `schema`. Every failure surfaces as a `Deserialization` protocol error
 * whose `cause` holds the underlying problem.
 */
export const bindRequest = <TRequest>(schema: IncomingRequestSchema<TRequest>, raw: RawHttpRequest): TRequest => {
  const pathArgs = padPathArgs(extractPathArgs(raw.params), schema.metadata.paths);
  const request = rebuildRequest(raw);

  try {
    return schema.tryFromHttpRequest(request, pathArgs);
  } catch (error) {
    throw new ProtocolError('Deserialization', { cause: error });
  }
};
