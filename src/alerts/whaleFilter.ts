import type { ChainConfig, TransferEvent, WhaleAlert } from '../types.js';
import type { LabelResolver } from '../labels.js';
import { meetsThreshold, fromBaseUnits } from '../utils/threshold.js';
import { formatUsdAmount } from '../utils/formatting.js';

/**
 * Threshold decision and label enrichment for one chain's transfers
 */
export class WhaleFilter {
  constructor(
    private readonly chain: ChainConfig,
    private readonly labels: LabelResolver
  ) {}

  /**
   * Returns an alert when `event.amount >= threshold` (both in base units), null otherwise
   */
  evaluate(event: TransferEvent, threshold: bigint): WhaleAlert | null {
    if (!meetsThreshold(event.amount, threshold)) {
      return null;
    }

    const { decimals, explorerUrl } = this.chain;

    return {
      chainId: this.chain.id,
      chainName: this.chain.name,
      symbol: this.chain.symbol,
      amountRaw: event.amount,
      amount: fromBaseUnits(event.amount, decimals),
      displayAmount: formatUsdAmount(event.amount, decimals),
      from: event.from,
      fromLabel: this.labels.resolve(event.from),
      to: event.to,
      toLabel: this.labels.resolve(event.to),
      txHash: event.txHash,
      blockNumber: event.blockNumber,
      explorerTxUrl: explorerUrl ? `${explorerUrl.replace(/\/+$/, '')}/tx/${event.txHash}` : undefined,
      timestamp: Date.now(),
    };
  }
}
