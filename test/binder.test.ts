import { describe, expect, it } from 'vitest';

import { pingRequest, pushEventsRequest } from '../src/appservice/api.js';
import { bindRequest } from '../src/protocol/binder.js';
import { ProtocolError } from '../src/protocol/errors.js';
import type { IncomingRequestSchema } from '../src/protocol/schema.js';
import type { HttpMethod, RawHttpRequest } from '../src/shared/protocol.js';

interface Echo {
  args: readonly string[];
  method: HttpMethod;
  pathname: string;
  query: string | null;
  accept: string | null;
}

const echoSchema = (paths: string[]): IncomingRequestSchema<Echo> => ({
  metadata: { name: 'echo', method: 'GET', paths },
  tryFromHttpRequest: (request, pathArgs) => ({
    args: pathArgs,
    method: request.method,
    pathname: request.url.pathname,
    query: request.url.searchParams.get('q'),
    accept: request.headers.get('accept'),
  }),
});

const raw = (overrides: Partial<RawHttpRequest> = {}): RawHttpRequest => ({
  method: 'GET',
  originalUrl: '/',
  headers: {},
  body: Buffer.alloc(0),
  params: {},
  ...overrides,
});

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
};

describe('request binder', () => {
  it('pads missing captures to the placeholder count of the first template', () => {
    const bound = bindRequest(echoSchema(['/a/:x/:y/:z', '/legacy/:x']), raw({ params: { x: '1' } }));
    expect(bound.args).toEqual(['1', '', '']);
  });

  it('fails with a deserialization error when the decoder rejects a padded value', () => {
    const schema: IncomingRequestSchema<readonly string[]> = {
      metadata: { name: 'strict', method: 'GET', paths: ['/rooms/:room/members/:member'] },
      tryFromHttpRequest: (_request, pathArgs) => {
        if (pathArgs.some((arg) => arg === '')) {
          throw new Error('empty path segment');
        }
        return pathArgs;
      },
    };

    expect(bindRequest(schema, raw({ params: { room: 'r1', member: 'm1' } }))).toEqual(['r1', 'm1']);

    const error = captureError(() => bindRequest(schema, raw({ params: { room: 'r1' } })));
    expect(error).toBeInstanceOf(ProtocolError);
    if (!(error instanceof ProtocolError)) return;
    expect(error.kind).toBe('Deserialization');
    expect(error.cause).toEqual(new Error('empty path segment'));
  });

  it('binds a zero-placeholder template with zero captures', () => {
    const bound = bindRequest(echoSchema(['/ping']), raw());
    expect(bound.args).toEqual([]);
  });

  it('percent-decodes captures in order', () => {
    const bound = bindRequest(
      echoSchema(['/rooms/:room/txn/:txn']),
      raw({ params: { room: '%21abc%3Aexample.org', txn: 'txn%201' } }),
    );
    expect(bound.args).toEqual(['!abc:example.org', 'txn 1']);
  });

  it('rejects captures with malformed percent-encoding', () => {
    const error = captureError(() => bindRequest(echoSchema(['/t/:id']), raw({ params: { id: '%E0%A4%A' } })));
    expect(error).toBeInstanceOf(ProtocolError);
    if (!(error instanceof ProtocolError)) return;
    expect(error.kind).toBe('Deserialization');
    expect(error.status).toBe(400);
    expect(error.toBody()).toEqual({ errcode: 'M_BAD_JSON', error: 'Deserialization error' });
    expect(error.cause).toBeInstanceOf(URIError);
  });

  it('rebuilds method, url and headers for the decoder', () => {
    const bound = bindRequest(
      echoSchema(['/search']),
      raw({ method: 'get', originalUrl: '/search?q=free%20games', headers: { accept: 'application/json' } }),
    );
    expect(bound.method).toBe('GET');
    expect(bound.pathname).toBe('/search');
    expect(bound.query).toBe('free games');
    expect(bound.accept).toBe('application/json');
  });

  it('rejects methods it does not know', () => {
    const error = captureError(() => bindRequest(echoSchema(['/']), raw({ method: 'BREW' })));
    expect(error).toBeInstanceOf(ProtocolError);
  });

  it('wraps decoder failures as deserialization errors with the cause attached', () => {
    const failure = new Error('bad shape');
    const schema: IncomingRequestSchema<never> = {
      metadata: { name: 'failing', method: 'POST', paths: ['/fail'] },
      tryFromHttpRequest: () => {
        throw failure;
      },
    };

    const error = captureError(() => bindRequest(schema, raw({ method: 'POST' })));
    expect(error).toBeInstanceOf(ProtocolError);
    if (!(error instanceof ProtocolError)) return;
    expect(error.kind).toBe('Deserialization');
    expect(error.cause).toBe(failure);
  });
});

describe('appservice request schemas', () => {
  it('reads the bearer token and transaction id of a ping', () => {
    const bound = bindRequest(
      pingRequest,
      raw({
        method: 'POST',
        originalUrl: '/_matrix/app/v1/ping',
        headers: { authorization: 'Bearer secret123' },
        body: Buffer.from('{"transaction_id":"txn-1"}'),
      }),
    );
    expect(bound).toEqual({ accessToken: 'secret123', transactionId: 'txn-1' });
  });

  it('treats an empty ping body as having no transaction id', () => {
    const bound = bindRequest(pingRequest, raw({ method: 'POST', originalUrl: '/_matrix/app/v1/ping' }));
    expect(bound).toEqual({ accessToken: null, transactionId: null });
  });

  it('treats an empty transaction id as no transaction id', () => {
    const bound = bindRequest(
      pingRequest,
      raw({
        method: 'POST',
        originalUrl: '/_matrix/app/v1/ping',
        headers: { authorization: 'Bearer secret123' },
        body: Buffer.from('{"transaction_id":""}'),
      }),
    );
    expect(bound).toEqual({ accessToken: 'secret123', transactionId: null });
  });

  it('falls back to the access_token query parameter', () => {
    const bound = bindRequest(pingRequest, raw({ method: 'POST', originalUrl: '/_matrix/app/v1/ping?access_token=secret123' }));
    expect(bound.accessToken).toBe('secret123');
  });

  it('does not accept a non-bearer authorization header', () => {
    const bound = bindRequest(
      pingRequest,
      raw({
        method: 'POST',
        originalUrl: '/_matrix/app/v1/ping?access_token=secret123',
        headers: { authorization: 'Basic c2VjcmV0MTIz' },
      }),
    );
    expect(bound.accessToken).toBeNull();
  });

  it('rejects a ping body that is not JSON', () => {
    const error = captureError(() =>
      bindRequest(pingRequest, raw({ method: 'POST', originalUrl: '/_matrix/app/v1/ping', body: Buffer.from('{nope') })),
    );
    expect(error).toBeInstanceOf(ProtocolError);
  });

  it('binds a transaction with its decoded id', () => {
    const bound = bindRequest(
      pushEventsRequest,
      raw({
        method: 'PUT',
        originalUrl: '/_matrix/app/v1/transactions/txn%2F1',
        body: Buffer.from('{"events":[{"type":"m.room.message"}]}'),
        params: { txnId: 'txn%2F1' },
      }),
    );
    expect(bound.txnId).toBe('txn/1');
    expect(bound.events).toEqual([{ type: 'm.room.message' }]);
    expect(bound.ephemeral).toEqual([]);
  });

  it('rejects a transaction without an events array', () => {
    const error = captureError(() =>
      bindRequest(
        pushEventsRequest,
        raw({ method: 'PUT', body: Buffer.from('{"events":{}}'), params: { txnId: 'txn1' } }),
      ),
    );
    expect(error).toBeInstanceOf(ProtocolError);
  });
});
