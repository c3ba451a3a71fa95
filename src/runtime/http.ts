import http from 'node:http';
import {
  pingRequest,
  pingResponse,
  pushEventsRequest,
  pushEventsResponse,
} from '../appservice/api.js';
import type { AppserviceHandlers } from '../appservice/handlers.js';
import type { TransactionStore } from '../appservice/transaction-store.js';
import { bindRequest, readRawBody } from '../protocol/binder.js';
import { encodeResponse, fallbackResponse, writeResponse } from '../protocol/encoder.js';
import { isProtocolError, ProtocolError, protocolErrorResponse } from '../protocol/errors.js';
import { jsonResponse, type IncomingRequestSchema, type OutgoingResponseSchema } from '../protocol/schema.js';
import type { HttpResponseParts } from '../shared/protocol.js';
import { createLogger, errorMeta, type Logger } from '../utils/logger.js';
import type { SerialQueue } from '../utils/queue.js';
import type { WebhookHandler } from '../webhook/handler.js';
import { Router, type RouteHandler } from './router.js';

export interface RuntimeServices {
  appserviceId: string;
  appservice: AppserviceHandlers;
  webhook: WebhookHandler;
  transactions: TransactionStore;
  actions: SerialQueue;
}

export interface HttpRuntimeOptions {
  webhookPath: string;
  maxBodyBytes: number;
}

interface HealthBody {
  status: 'ok';
  appserviceId: string;
  pendingTransactions: number;
  queuedActions: number;
}

const healthResponse: OutgoingResponseSchema<HealthBody> = jsonResponse((body) => body);

const toProtocolError = (error: unknown, logger: Logger): ProtocolError => {
  if (isProtocolError(error)) {
    if (error.kind === 'Deserialization') {
      logger.debug('could not bind request', errorMeta(error.cause));
    }
    return error;
  }
  logger.error('request handler failed', errorMeta(error));
  return new ProtocolError('Internal', { cause: error });
};

const protocolFailure = (error: unknown, logger: Logger) =>
  encodeResponse(protocolErrorResponse, toProtocolError(error, logger), logger);

/** Binds with `requestSchema`, runs `handle`, encodes with `responseSchema`. */
const endpoint = <TRequest, TResponse>(
  requestSchema: IncomingRequestSchema<TRequest>,
  responseSchema: OutgoingResponseSchema<TResponse>,
  handle: (request: TRequest) => TResponse | Promise<TResponse>,
  logger: Logger,
): RouteHandler => {
  return async (raw) => {
    try {
      const request = bindRequest(requestSchema, raw);
      const response = await handle(request);
      return encodeResponse(responseSchema, response, logger);
    } catch (error) {
      return protocolFailure(error, logger);
    }
  };
};

const mount = <TRequest, TResponse>(
  router: Router,
  requestSchema: IncomingRequestSchema<TRequest>,
  responseSchema: OutgoingResponseSchema<TResponse>,
  handle: (request: TRequest) => TResponse | Promise<TResponse>,
  logger: Logger,
) => {
  const handler = endpoint(requestSchema, responseSchema, handle, logger);
  for (const template of requestSchema.metadata.paths) {
    router.add(requestSchema.metadata.method, template, handler);
  }
};

const internalText = (): HttpResponseParts => ({
  status: 500,
  headers: { 'content-type': 'text/plain; charset=utf-8' },
  body: Buffer.from('internal server error', 'utf8'),
});

const firstHeader = (value: string | string[] | undefined) => (Array.isArray(value) ? value[0] : value);

export const createRouter = (services: RuntimeServices, options: HttpRuntimeOptions, logger: Logger) => {
  const router = new Router();

  const webhook: RouteHandler = async (raw) => {
    try {
      return await services.webhook.handle(raw.body, firstHeader(raw.headers['content-type']));
    } catch (error) {
      logger.error('webhook handler failed', errorMeta(error));
      return internalText();
    }
  };
  router.add('GET', options.webhookPath, webhook);
  router.add('POST', options.webhookPath, webhook);

  mount(router, pingRequest, pingResponse, (request) => services.appservice.ping(request), logger);
  mount(router, pushEventsRequest, pushEventsResponse, (request) => services.appservice.pushEvents(request), logger);

  router.add('GET', '/health', async () =>
    encodeResponse(
      healthResponse,
      {
        status: 'ok',
        appserviceId: services.appserviceId,
        pendingTransactions: services.transactions.size(),
        queuedActions: services.actions.size(),
      },
      logger,
    ),
  );

  return router;
};

export const createRequestListener = (
  services: RuntimeServices,
  options: HttpRuntimeOptions,
  logger: Logger,
): http.RequestListener => {
  const router = createRouter(services, options, logger);

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    const method = (req.method ?? 'GET').toUpperCase();
    const originalUrl = req.url ?? '/';

    let pathname: string;
    try {
      pathname = new URL(originalUrl, 'http://localhost').pathname;
    } catch (error) {
      req.resume();
      writeResponse(res, protocolFailure(new ProtocolError('Deserialization', { cause: error }), logger));
      return;
    }

    const match = router.match(method, pathname);
    if (match.kind === 'not_found') {
      req.resume();
      writeResponse(res, protocolFailure(new ProtocolError('Unrecognized'), logger));
      return;
    }
    if (match.kind === 'method_not_allowed') {
      req.resume();
      res.setHeader('allow', match.allowed.join(', '));
      writeResponse(res, protocolFailure(new ProtocolError('MethodNotAllowed'), logger));
      return;
    }

    let body: Buffer;
    try {
      body = await readRawBody(req, options.maxBodyBytes);
    } catch (error) {
      writeResponse(res, protocolFailure(error, logger));
      return;
    }

    logger.debug('request', { method, route: match.template });
    const parts = await match.handler({ method, originalUrl, headers: req.headers, body, params: match.params });
    writeResponse(res, parts);
  };

  return (req, res) => {
    handle(req, res).catch((error: unknown) => {
      logger.error('unhandled request failure', errorMeta(error));
      if (!res.headersSent) {
        writeResponse(res, fallbackResponse());
      } else {
        res.end();
      }
    });
  };
};

export const createHttpServer = (
  services: RuntimeServices,
  options: HttpRuntimeOptions & { host: string; port: number },
  logger = createLogger('runtime.http', 'info'),
) => {
  const server = http.createServer(createRequestListener(services, options, logger));

  return new Promise<http.Server>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      const address = server.address();
      const boundPort = typeof address === 'object' && address ? address.port : options.port;
      logger.info(`appservice listening on ${options.host}:${boundPort}`);
      resolve(server);
    });
  });
};
