import type { ChainConfig, LogSubscriber, LogSubscription, LogSubscriptionHandlers, RawLog } from '../types.js';
import { logger } from '../logger.js';
import { errorMessage, toConnectionError } from '../errors.js';
import { AsyncChannel } from './channel.js';

export interface FeedOptions {
  signal?: AbortSignal;
  /** Called once the subscription is acknowledged */
  onSubscribed?: () => void;
}

/**
 * One chain's Transfer log stream as an async sequence.
 *
 * Each `start` call opens exactly one subscription and releases it when the
 * sequence ends. Transport failures end the sequence with a ConnectionError;
 * retrying is left to the caller.
 */
export class ChainFeed {
  constructor(private readonly subscriber: LogSubscriber) {}

  async *start(chain: ChainConfig, options: FeedOptions = {}): AsyncGenerator<RawLog, void, undefined> {
    const { signal } = options;
    if (signal?.aborted) return;

    const log = logger.child({ chain: chain.id });
    const channel = new AsyncChannel<RawLog>();
    const onAbort = (): void => channel.close();
    signal?.addEventListener('abort', onAbort, { once: true });

    let subscription: LogSubscription | null = null;

    try {
      try {
        subscription = await this.subscribe(chain, {
          onLogs: (logs) => channel.pushAll(logs),
          onError: (error) => channel.fail(toConnectionError(chain.id, error)),
        }, signal);
      } catch (error) {
        throw toConnectionError(chain.id, error);
      }

      if (subscription === null || channel.isClosed) return;

      log.info({ endpoint: chain.endpoint }, 'chain_feed: subscribed to transfer logs');
      options.onSubscribed?.();

      for (;;) {
        const next = await channel.next();
        if (next.done) return;
        yield next.value;
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (subscription) {
        subscription.unsubscribe();
        log.debug('chain_feed: subscription released');
      }
    }
  }

  /**
   * Subscribe, giving up with null if the signal aborts first. A subscription
   * that completes after the abort is released straight away.
   */
  private subscribe(
    chain: ChainConfig,
    handlers: LogSubscriptionHandlers,
    signal?: AbortSignal
  ): Promise<LogSubscription | null> {
    const pending = this.subscriber.subscribe(chain, handlers);
    if (!signal) return pending;

    return new Promise((resolve, reject) => {
      const onAbort = (): void => {
        resolve(null);
        void pending.then(
          (late) => late.unsubscribe(),
          (error: unknown) =>
            logger.debug(
              { chain: chain.id, error: errorMessage(error) },
              'chain_feed: subscription failed after shutdown'
            )
        );
      };

      if (signal.aborted) {
        onAbort();
        return;
      }

      signal.addEventListener('abort', onAbort, { once: true });
      void pending.then(
        (subscription) => {
          signal.removeEventListener('abort', onAbort);
          resolve(subscription);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }
}
