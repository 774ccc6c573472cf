import type { WhaleAlert } from '../types.js';
import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';

export type AlertWriter = (alert: WhaleAlert) => void | Promise<void>;

/**
 * Fan-in point for every chain's alerts. Writes go through a single promise
 * chain, so each alert is written whole before the next one starts.
 */
export class AlertSink {
  private tail: Promise<void> = Promise.resolve();
  private closed: boolean = false;
  private delivered: number = 0;

  constructor(private readonly writer: AlertWriter) {}

  emit(alert: WhaleAlert): void {
    if (this.closed) {
      logger.warn(
        { chain: alert.chainId, txHash: alert.txHash },
        'alert_sink: sink closed, dropping alert'
      );
      return;
    }

    this.tail = this.tail.then(() => this.write(alert));
  }

  private async write(alert: WhaleAlert): Promise<void> {
    try {
      await this.writer(alert);
      this.delivered++;
    } catch (error) {
      logger.error(
        { chain: alert.chainId, txHash: alert.txHash, error: errorMessage(error) },
        'alert_sink: failed to write alert'
      );
    }
  }

  /**
   * Resolves once every alert emitted so far has been written
   */
  flush(): Promise<void> {
    return this.tail;
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.tail;
    logger.info({ delivered: this.delivered }, 'alert_sink: closed');
  }

  get deliveredCount(): number {
    return this.delivered;
  }
}
