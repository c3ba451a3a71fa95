import type { Logger } from '../utils/logger.js';

export const PING_TRANSACTION_TIMEOUT_MS = 15_000;

/**
 * - `untracked`: the ping carried no transaction id
 * - `unknown`: first sighting of the id, now recorded
 * - `confirmed`: matched a record inside the window
 * - `stale`: matched a record older than the window
 */
export type PingObservation = 'untracked' | 'unknown' | 'confirmed' | 'stale';

export interface TransactionStoreOptions {
  timeoutMs?: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * Time-windowed record of ping transaction ids. Every operation is synchronous,
 * so each call runs start to finish on the event loop without interleaving
 * with other requests. Results are advisory and never fail a request.
 */
export class TransactionStore {
  private readonly seen = new Map<string, number>();
  private readonly timeoutMs: number;
  private readonly now: () => number;
  private readonly logger?: Logger;

  constructor(options: TransactionStoreOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? PING_TRANSACTION_TIMEOUT_MS;
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger;
  }

  /** Records an id the bridge itself is about to send with an outbound ping. */
  track(transactionId: string) {
    const now = this.now();
    this.prune(now);
    this.seen.set(transactionId, now);
  }

  observe(transactionId: string | null): PingObservation {
    if (transactionId === null) {
      return 'untracked';
    }

    const now = this.now();
    const firstSeenAt = this.seen.get(transactionId);
    this.seen.delete(transactionId);
    this.prune(now);

    if (firstSeenAt === undefined) {
      this.seen.set(transactionId, now);
      this.logger?.warn('invalid transaction id', { transactionId, reason: 'unknown' });
      return 'unknown';
    }

    const elapsedMs = now - firstSeenAt;
    if (elapsedMs > this.timeoutMs) {
      this.logger?.warn('invalid transaction id', { transactionId, reason: 'stale', elapsedMs });
      return 'stale';
    }

    return 'confirmed';
  }

  has(transactionId: string) {
    const firstSeenAt = this.seen.get(transactionId);
    if (firstSeenAt === undefined) return false;
    if (this.now() - firstSeenAt > this.timeoutMs) {
      this.seen.delete(transactionId);
      return false;
    }
    return true;
  }

  size() {
    this.prune(this.now());
    return this.seen.size;
  }

  private prune(now: number) {
    for (const [transactionId, firstSeenAt] of this.seen.entries()) {
      if (now - firstSeenAt > this.timeoutMs) {
        this.seen.delete(transactionId);
      }
    }
  }
}
