import type {
  ChainConfig,
  LogSubscriber,
  LogSubscription,
  LogSubscriptionHandlers,
  RawLog,
} from '../types.js';

export class FakeSubscription implements LogSubscription {
  active: boolean = true;

  constructor(
    readonly chainId: string,
    private readonly handlers: LogSubscriptionHandlers
  ) {}

  emit(...logs: RawLog[]): void {
    if (this.active) this.handlers.onLogs(logs);
  }

  fail(error: Error = new Error('socket closed')): void {
    if (this.active) this.handlers.onError(error);
  }

  unsubscribe(): void {
    this.active = false;
  }
}

/**
 * In-process stand-in for the chain subscription boundary
 */
export class FakeLogSubscriber implements LogSubscriber {
  readonly subscriptions: FakeSubscription[] = [];
  private readonly queuedFailures = new Map<string, Error[]>();

  /** Make the next subscribe call for `chainId` reject */
  failNextSubscribe(chainId: string, error: Error = new Error('connection refused')): void {
    const queue = this.queuedFailures.get(chainId) ?? [];
    queue.push(error);
    this.queuedFailures.set(chainId, queue);
  }

  async subscribe(chain: ChainConfig, handlers: LogSubscriptionHandlers): Promise<LogSubscription> {
    const failure = this.queuedFailures.get(chain.id)?.shift();
    if (failure) {
      throw failure;
    }

    const subscription = new FakeSubscription(chain.id, handlers);
    this.subscriptions.push(subscription);
    return subscription;
  }

  count(chainId: string): number {
    return this.subscriptions.filter((s) => s.chainId === chainId).length;
  }

  /** Latest subscription for a chain */
  current(chainId: string): FakeSubscription {
    const matching = this.subscriptions.filter((s) => s.chainId === chainId);
    const latest = matching[matching.length - 1];
    if (!latest) {
      throw new Error(`No subscription for ${chainId}`);
    }
    return latest;
  }
}
