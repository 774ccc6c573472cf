import { describe, it, expect, vi, beforeAll, afterEach } from 'vitest';
import chalk from 'chalk';
import { formatWhaleAlert, printWhaleAlert } from './formatter.js';
import type { WhaleAlert } from '../types.js';
import { ALICE, BOB, TX_HASH } from '../testing/fixtures.js';

const alert: WhaleAlert = {
  chainId: 'arbitrum',
  chainName: 'Arbitrum',
  symbol: 'USDC',
  amountRaw: 74_000_000_000n,
  amount: '74000',
  displayAmount: '$74,000.00',
  from: ALICE,
  fromLabel: 'Binance Hot Wallet',
  to: BOB,
  txHash: TX_HASH,
  blockNumber: 19_000_000n,
  explorerTxUrl: `https://arbiscan.io/tx/${TX_HASH}`,
  timestamp: 0,
};

describe('formatWhaleAlert', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should render every field on its own line', () => {
    expect(formatWhaleAlert(alert).split('\n')).toEqual([
      '[1970-01-01T00:00:00.000Z] [ARBITRUM] 🐋 WHALE TRANSFER DETECTED',
      '  Amount: $74,000.00 USDC',
      '  From:   0x1000...0001 (Binance Hot Wallet)',
      '  To:     0x2000...0002 (Unknown)',
      '  Tx:     0xababab...ababab',
      '  Block:  19000000',
      `  Link:   https://arbiscan.io/tx/${TX_HASH}`,
    ]);
  });

  it('should leave out the link and mark an unknown block', () => {
    const lines = formatWhaleAlert({ ...alert, explorerTxUrl: undefined, blockNumber: null }).split('\n');
    expect(lines).toHaveLength(6);
    expect(lines[5]).toBe('  Block:  (unknown)');
  });

  it('should print an alert in a single write', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    printWhaleAlert(alert);

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(`\n${formatWhaleAlert(alert)}`);
  });
});
