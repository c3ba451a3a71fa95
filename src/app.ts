import type http from 'node:http';
import { randomUUID } from 'node:crypto';
import { AppserviceHandlers } from './appservice/handlers.js';
import { HomeserverClient, type HomeserverApi } from './appservice/homeserver-client.js';
import { bridgeUserId, type Registration } from './appservice/registration.js';
import { TransactionStore } from './appservice/transaction-store.js';
import type { AppConfig } from './config.js';
import { createHttpServer, type RuntimeServices } from './runtime/http.js';
import { errorMeta, type Logger } from './utils/logger.js';
import { SerialQueue } from './utils/queue.js';
import { WebhookHandler } from './webhook/handler.js';

const ACTION_QUEUE_DEPTH = 256;

export type AppServices = RuntimeServices & { homeserver: HomeserverApi; userId: string };

export interface ServiceOverrides {
  homeserver?: HomeserverApi;
  /** Clock for the ping transaction window. */
  now?: () => number;
}

export const createServices = (
  config: AppConfig,
  registration: Registration,
  logger: Logger,
  overrides: ServiceOverrides = {},
): AppServices => {
  const homeserver =
    overrides.homeserver ??
    new HomeserverClient({
      baseUrl: config.HOMESERVER_URL,
      accessToken: registration.as_token,
      timeoutMs: config.HOMESERVER_TIMEOUT_MS,
    });
  const appserviceLogger = logger.child('appservice');
  const transactions = new TransactionStore({ logger: appserviceLogger.child('ping'), now: overrides.now });
  const actions = new SerialQueue({ maxDepth: ACTION_QUEUE_DEPTH });
  const userId = bridgeUserId(registration, config.HOMESERVER_NAME);

  return {
    appserviceId: registration.id,
    userId,
    homeserver,
    transactions,
    actions,
    appservice: new AppserviceHandlers({
      registration,
      userId,
      transactions,
      homeserver,
      actions,
      logger: appserviceLogger,
    }),
    webhook: new WebhookHandler({ secret: config.WEBHOOK_SECRET, logger: logger.child('webhook') }),
  };
};

/**
 * Asks the homeserver to ping us back. The transaction id is tracked first so
 * the inbound ping is recognised as ours.
 */
export const selfPing = async (services: AppServices, logger: Logger) => {
  const transactionId = randomUUID();
  services.transactions.track(transactionId);
  try {
    const durationMs = await services.homeserver.pingAppservice(services.appserviceId, transactionId);
    logger.info('homeserver reached the appservice', { durationMs });
  } catch (error) {
    logger.warn('self-ping failed; check that the homeserver can reach the registration url', errorMeta(error));
  }
};

/** Drops joins that have not started yet and waits for the one in flight. */
export const stopServices = async (services: AppServices, logger: Logger) => {
  const dropped = services.actions.clear();
  if (dropped.length > 0) {
    logger.warn('dropped queued actions on shutdown', { count: dropped.length, actions: dropped });
  }
  await services.appservice.drain();
};

export const startApp = async (config: AppConfig, services: AppServices, logger: Logger): Promise<http.Server> => {
  const server = await createHttpServer(
    services,
    {
      host: config.WEBHOOK_ADDR.host,
      port: config.WEBHOOK_ADDR.port,
      webhookPath: config.WEBHOOK_PATH,
      maxBodyBytes: config.MAX_BODY_BYTES,
    },
    logger.child('http'),
  );

  if (config.SELF_PING_ON_START) {
    await selfPing(services, logger);
  }

  return server;
};
