import { ProtocolError } from '../protocol/errors.js';
import { safeEqual } from '../security/compare.js';
import { errorMeta, type Logger } from '../utils/logger.js';
import { QueueClearedError, type SerialQueue } from '../utils/queue.js';
import type { PingRequest, PingResponse, PushEventsRequest, PushEventsResponse } from './api.js';
import { classifyEvent, isInviteFor } from './events.js';
import type { HomeserverApi } from './homeserver-client.js';
import type { Registration } from './registration.js';
import type { TransactionStore } from './transaction-store.js';

export interface AppserviceHandlerDeps {
  registration: Registration;
  /** Full user id of the bridge's sender, e.g. `@free-stuff:example.org`. */
  userId: string;
  transactions: TransactionStore;
  homeserver: Pick<HomeserverApi, 'joinRoom'>;
  /** Outbound actions run here, after the transaction has been acknowledged. */
  actions: SerialQueue;
  logger: Logger;
}

const tokensMatch = (presented: string | null, expected: string) => presented !== null && safeEqual(presented, expected);

export class AppserviceHandlers {
  constructor(private readonly deps: AppserviceHandlerDeps) {}

  ping(request: PingRequest): PingResponse {
    if (!tokensMatch(request.accessToken, this.deps.registration.hs_token)) {
      this.deps.logger.warn('rejected ping with bad homeserver token');
      throw new ProtocolError('Unauthorized');
    }

    const observation = this.deps.transactions.observe(request.transactionId);
    this.deps.logger.debug('ping received', { transactionId: request.transactionId, observation });
    return {};
  }

  /**
   * Walks the batch in order. Malformed and unhandled events are skipped;
   * the transaction is acknowledged whatever the individual events did.
   */
  pushEvents(request: PushEventsRequest): PushEventsResponse {
    const { logger } = this.deps;
    logger.debug('transaction received', { txnId: request.txnId, events: request.events.length });

    request.events.forEach((raw, index) => {
      const classified = classifyEvent(raw);
      if (!classified.ok) {
        logger.debug('skipping malformed event', { txnId: request.txnId, index, reason: classified.reason });
        return;
      }

      const event = classified.event;
      if (event.kind === 'membership' && isInviteFor(event, this.deps.userId)) {
        logger.info('invited to room', { roomId: event.roomId, sender: event.sender });
        this.scheduleJoin(event.roomId, request.txnId);
        return;
      }

      logger.debug('unhandled event', {
        txnId: request.txnId,
        index,
        kind: event.kind,
        type: event.kind === 'unrecognized' ? event.type : 'm.room.member',
      });
    });

    return {};
  }

  /** Resolves when every scheduled outbound action has finished. */
  drain() {
    return this.deps.actions.onIdle();
  }

  private scheduleJoin(roomId: string, txnId: string) {
    const { homeserver, logger } = this.deps;
    this.deps.actions
      .enqueue({
        name: `join ${roomId}`,
        run: async () => {
          const joined = await homeserver.joinRoom(roomId);
          logger.info('joined room', { roomId: joined });
        },
      })
      .catch((error: unknown) => {
        if (error instanceof QueueClearedError) return;
        logger.error('failed to join room', { roomId, txnId, ...errorMeta(error) });
      });
  }
}
