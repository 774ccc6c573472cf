import type { Logger } from 'pino';
import type { BackoffPolicy, ChainConfig, ChainState, RawLog, RejectedChain } from '../types.js';
import type { LabelResolver } from '../labels.js';
import type { AlertSink } from '../alerts/alertSink.js';
import type { ChainFeed } from './chainFeed.js';
import { logger } from '../logger.js';
import { ConfigError, ConnectionError, errorMessage, toConnectionError } from '../errors.js';
import { validateChainConfig } from '../config.js';
import { WhaleFilter } from '../alerts/whaleFilter.js';
import { tryDecodeTransferLog } from '../utils/event.js';
import { computeBackoffDelay } from '../utils/backoff.js';
import { formatAddress } from '../utils/formatting.js';
import { sleep } from '../utils/sleep.js';

export interface MonitorSupervisorOptions {
  chains: readonly ChainConfig[];
  /** Chains file entries that could not be read; reported and kept stopped */
  rejected?: readonly RejectedChain[];
  /** Alert threshold in token base units */
  threshold: bigint;
  labels: LabelResolver;
  sink: AlertSink;
  feed: ChainFeed;
  backoff: BackoffPolicy;
  /** Log dropped malformed logs at warn instead of debug */
  logDecodeErrors: boolean;
  onStateChange?: (chainId: string, state: ChainState) => void;
}

type FeedOutcome =
  | { kind: 'stopped' }
  | { kind: 'failed'; error: ConnectionError; streamed: boolean };

/**
 * Runs one feed loop per chain and keeps each of them alive independently.
 *
 * Per chain: idle -> connecting -> streaming -> failed -> (backoff) -> connecting ...
 * and any state -> stopped on shutdown. A failing chain never touches the
 * state of another one.
 */
export class MonitorSupervisor {
  private readonly controller = new AbortController();
  private readonly states = new Map<string, ChainState>();
  private running: Promise<void> | null = null;

  constructor(private readonly options: MonitorSupervisorOptions) {
    for (const chain of [...options.chains, ...(options.rejected ?? [])]) {
      if (this.states.has(chain.id)) {
        throw new ConfigError(`Duplicate chain id "${chain.id}"`);
      }
      this.states.set(chain.id, { status: 'idle' });
    }
  }

  /**
   * Start every chain task. Resolves once all of them reached `stopped`.
   */
  run(): Promise<void> {
    if (!this.running) {
      this.running = this.superviseAll();
    }
    return this.running;
  }

  /**
   * Abort every read and backoff wait, then wait for all chains to stop
   */
  async stop(): Promise<void> {
    logger.info('supervisor: stopping all chain tasks');
    this.controller.abort();

    if (this.running) {
      await this.running;
    } else {
      for (const chainId of this.states.keys()) {
        this.transition(chainId, { status: 'stopped' });
      }
    }
  }

  getState(chainId: string): ChainState | undefined {
    return this.states.get(chainId);
  }

  getStates(): Map<string, ChainState> {
    return new Map(this.states);
  }

  private async superviseAll(): Promise<void> {
    logger.info(
      {
        chains: this.options.chains.map((chain) => chain.id),
        threshold: this.options.threshold.toString(),
        backoff: this.options.backoff,
      },
      'supervisor: starting chain tasks'
    );

    for (const { id, error } of this.options.rejected ?? []) {
      this.stopMisconfigured(id, error);
    }

    await Promise.all(this.options.chains.map((chain) => this.superviseChain(chain)));

    logger.info('supervisor: all chain tasks stopped');
  }

  private async superviseChain(chain: ChainConfig): Promise<void> {
    const log = logger.child({ chain: chain.id });
    const { signal } = this.controller;

    const invalid = validateChainConfig(chain);
    if (invalid) {
      this.stopMisconfigured(chain.id, invalid);
      return;
    }

    let failures = 0;

    while (!signal.aborted) {
      this.transition(chain.id, { status: 'connecting', attempt: failures + 1 });

      const outcome = await this.runFeed(chain, log);
      if (outcome.kind === 'stopped') break;

      // A chain that got to stream starts over from the shortest delay
      failures = outcome.streamed ? 1 : failures + 1;
      const retryInMs = computeBackoffDelay(failures, this.options.backoff);

      this.transition(chain.id, { status: 'failed', error: outcome.error, failures, retryInMs });
      log.warn(
        { error: outcome.error.message, failures, retryInMs },
        'supervisor: chain feed failed, retrying after backoff'
      );

      await sleep(retryInMs, signal);
    }

    this.transition(chain.id, { status: 'stopped' });
    log.info('supervisor: chain stopped');
  }

  private stopMisconfigured(chainId: string, error: ConfigError): void {
    logger.error(
      { chain: chainId, error: error.message },
      'supervisor: chain is misconfigured, not starting it'
    );
    this.transition(chainId, { status: 'stopped', error });
  }

  private async runFeed(chain: ChainConfig, log: Logger): Promise<FeedOutcome> {
    const { signal } = this.controller;
    const filter = new WhaleFilter(chain, this.options.labels);
    let streamed = false;

    const markStreaming = (): void => {
      if (streamed || signal.aborted) return;
      streamed = true;
      this.transition(chain.id, { status: 'streaming', since: Date.now() });
    };

    try {
      for await (const raw of this.options.feed.start(chain, { signal, onSubscribed: markStreaming })) {
        if (signal.aborted) break;
        markStreaming();
        this.processLog(raw, filter, log);
      }
    } catch (error) {
      if (!(error instanceof ConnectionError)) {
        log.error({ error: errorMessage(error) }, 'supervisor: unexpected error in chain feed');
      }
      return { kind: 'failed', error: toConnectionError(chain.id, error), streamed };
    }

    if (signal.aborted) {
      return { kind: 'stopped' };
    }

    return {
      kind: 'failed',
      error: new ConnectionError(`${chain.id}: log stream ended unexpectedly`, chain.id),
      streamed,
    };
  }

  private processLog(raw: RawLog, filter: WhaleFilter, log: Logger): void {
    const decoded = tryDecodeTransferLog(raw);

    if (!decoded.ok) {
      const level = this.options.logDecodeErrors ? 'warn' : 'debug';
      log[level](
        { txHash: raw.transactionHash, error: decoded.error.message },
        'decoder: dropping malformed transfer log'
      );
      return;
    }

    const alert = filter.evaluate(decoded.event, this.options.threshold);
    if (!alert) return;

    log.info(
      {
        txHash: alert.txHash,
        blockNumber: alert.blockNumber?.toString(),
        from: formatAddress(alert.from, alert.fromLabel),
        to: formatAddress(alert.to, alert.toLabel),
        amount: alert.displayAmount,
      },
      'whale_filter: whale transfer detected'
    );

    this.options.sink.emit(alert);
  }

  private transition(chainId: string, next: ChainState): void {
    const current = this.states.get(chainId);
    if (current?.status === 'stopped') return;

    this.states.set(chainId, next);

    if (this.options.onStateChange) {
      try {
        this.options.onStateChange(chainId, next);
      } catch (error) {
        logger.error(
          { chain: chainId, error: errorMessage(error) },
          'supervisor: state change listener threw'
        );
      }
    }
  }
}
