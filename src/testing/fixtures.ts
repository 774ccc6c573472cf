import { pad, toHex, type Address, type Hash, type Hex } from 'viem';
import type { ChainConfig, RawLog, TransferEvent } from '../types.js';
import { TRANSFER_TOPIC } from '../utils/event.js';

export const TOKEN: Address = '0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48';
export const ALICE: Address = '0x1000000000000000000000000000000000000001';
export const BOB: Address = '0x2000000000000000000000000000000000000002';
export const TX_HASH: Hash = `0x${'ab'.repeat(32)}`;

/** $74,000 in 6-decimal base units */
export const THRESHOLD = 74_000_000_000n;

export function testChain(overrides: Partial<ChainConfig> = {}): ChainConfig {
  return {
    id: 'ethereum',
    name: 'Ethereum',
    endpoint: 'https://rpc.invalid',
    contractAddress: TOKEN,
    decimals: 6,
    symbol: 'USDC',
    explorerUrl: 'https://etherscan.io',
    ...overrides,
  };
}

export interface TransferLogInput {
  chainId?: string;
  from?: Address;
  to?: Address;
  amount?: bigint;
  txHash?: Hash | null;
  blockNumber?: bigint | null;
  topics?: Hex[];
  data?: Hex;
}

/**
 * A well-formed ERC-20 Transfer log unless `topics`/`data` say otherwise
 */
export function transferLog(input: TransferLogInput = {}): RawLog {
  const from = input.from ?? ALICE;
  const to = input.to ?? BOB;
  return {
    chainId: input.chainId ?? 'ethereum',
    address: TOKEN,
    topics: input.topics ?? [TRANSFER_TOPIC, pad(from), pad(to)],
    data: input.data ?? toHex(input.amount ?? THRESHOLD, { size: 32 }),
    transactionHash: input.txHash === undefined ? TX_HASH : input.txHash,
    blockNumber: input.blockNumber === undefined ? 19_000_000n : input.blockNumber,
    logIndex: 0,
  };
}

export function transferEvent(overrides: Partial<TransferEvent> = {}): TransferEvent {
  return {
    chainId: 'ethereum',
    contractAddress: TOKEN,
    from: ALICE,
    to: BOB,
    amount: THRESHOLD,
    txHash: TX_HASH,
    blockNumber: 19_000_000n,
    logIndex: 0,
    ...overrides,
  };
}
