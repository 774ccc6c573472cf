import type { Address, Hash, Hex } from 'viem';
import type { ConfigError, ConnectionError } from './errors.js';

export interface ChainConfig {
  id: string;
  name: string;
  endpoint: string;
  contractAddress: Address;
  decimals: number;
  symbol: string;
  explorerUrl?: string;
}

/**
 * A log as delivered by the chain subscription, before decoding
 */
export interface RawLog {
  chainId: string;
  address: Address;
  topics: readonly Hex[];
  data: Hex;
  transactionHash: Hash | null;
  blockNumber: bigint | null;
  logIndex: number | null;
}

export interface TransferEvent {
  chainId: string;
  contractAddress: Address;
  from: Address;
  to: Address;
  amount: bigint;
  txHash: Hash;
  blockNumber: bigint | null;
  logIndex: number | null;
}

export interface WhaleAlert {
  chainId: string;
  chainName: string;
  symbol: string;
  amountRaw: bigint;
  /** Full-precision decimal, e.g. "74000.000001" */
  amount: string;
  /** Dollar rendering rounded to cents, e.g. "$74,000.00" */
  displayAmount: string;
  from: Address;
  fromLabel?: string;
  to: Address;
  toLabel?: string;
  txHash: Hash;
  blockNumber: bigint | null;
  explorerTxUrl?: string;
  timestamp: number;
}

export type ChainState =
  | { status: 'idle' }
  | { status: 'connecting'; attempt: number }
  | { status: 'streaming'; since: number }
  | { status: 'failed'; error: ConnectionError; failures: number; retryInMs: number }
  | { status: 'stopped'; error?: ConfigError };

/**
 * A chains file entry that could not be read as a ChainConfig
 */
export interface RejectedChain {
  id: string;
  error: ConfigError;
}

export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface LogSubscriptionHandlers {
  onLogs: (logs: RawLog[]) => void;
  onError: (error: Error) => void;
}

export interface LogSubscription {
  unsubscribe: () => void;
}

/**
 * Chain subscription boundary: one live log stream per call
 */
export interface LogSubscriber {
  subscribe(chain: ChainConfig, handlers: LogSubscriptionHandlers): Promise<LogSubscription>;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AppConfig {
  chains: ChainConfig[];
  /** Entries stopped with their error; they never connect */
  rejectedChains: RejectedChain[];
  threshold: bigint;
  logLevel: LogLevel;
  labels: Record<string, string>;
  backoff: BackoffPolicy;
  pollingIntervalMs: number;
  requestTimeoutMs: number;
  logDecodeErrors: boolean;
}
