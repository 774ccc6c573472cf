import { getAddress, hexToBigInt, isHex, parseAbiItem, slice, type Address, type Hex } from 'viem';
import type { RawLog, TransferEvent } from '../types.js';
import { DecodeError } from '../errors.js';

export const TRANSFER_EVENT = parseAbiItem(
  'event Transfer(address indexed from, address indexed to, uint256 value)'
);

/** keccak256("Transfer(address,address,uint256)") */
export const TRANSFER_TOPIC: Hex =
  '0xddf252ad1be2c89b69c2b068fc378daa952ba7f163c4a11628f55a4df523b3ef';

export type DecodeResult =
  | { ok: true; event: TransferEvent }
  | { ok: false; error: DecodeError };

// 32 bytes as exactly 64 hex digits
function isWord(value: Hex): boolean {
  return isHex(value, { strict: true }) && value.length === 66;
}

function topicToAddress(topic: Hex, log: RawLog, side: 'from' | 'to'): Address {
  if (!isWord(topic) || hexToBigInt(slice(topic, 0, 12)) !== 0n) {
    throw new DecodeError(`${side} topic is not a left-padded address: ${topic}`, log.transactionHash);
  }
  return getAddress(slice(topic, 12));
}

/**
 * Decode an ERC-20 Transfer log (3 topics, one 32-byte data word)
 */
export function decodeTransferLog(log: RawLog): TransferEvent {
  if (log.topics.length !== 3) {
    throw new DecodeError(`expected 3 topics, got ${log.topics.length}`, log.transactionHash);
  }

  const [signature, fromTopic, toTopic] = log.topics;

  if (signature.toLowerCase() !== TRANSFER_TOPIC) {
    throw new DecodeError(`unexpected event signature ${signature}`, log.transactionHash);
  }

  if (!isWord(log.data)) {
    throw new DecodeError(
      `expected a single 32-byte data word, got ${log.data.length} hex chars`,
      log.transactionHash
    );
  }

  if (!log.transactionHash) {
    throw new DecodeError('log has no transaction hash');
  }

  return {
    chainId: log.chainId,
    contractAddress: log.address,
    from: topicToAddress(fromTopic, log, 'from'),
    to: topicToAddress(toTopic, log, 'to'),
    amount: hexToBigInt(log.data),
    txHash: log.transactionHash,
    blockNumber: log.blockNumber,
    logIndex: log.logIndex,
  };
}

/**
 * Result-valued form of decodeTransferLog
 */
export function tryDecodeTransferLog(log: RawLog): DecodeResult {
  try {
    return { ok: true, event: decodeTransferLog(log) };
  } catch (error) {
    if (error instanceof DecodeError) {
      return { ok: false, error };
    }
    throw error;
  }
}
