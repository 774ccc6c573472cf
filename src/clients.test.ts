import { describe, it, expect } from 'vitest';
import { pad } from 'viem';
import { isWebSocketEndpoint, toRawLog } from './clients.js';
import { TRANSFER_TOPIC } from './utils/event.js';
import { ALICE, BOB, TOKEN, TX_HASH } from './testing/fixtures.js';

describe('Clients', () => {
  describe('isWebSocketEndpoint', () => {
    it('should detect ws and wss endpoints', () => {
      expect(isWebSocketEndpoint('ws://localhost:8546')).toBe(true);
      expect(isWebSocketEndpoint('wss://ethereum-rpc.publicnode.com')).toBe(true);
    });

    it('should treat http endpoints as polling', () => {
      expect(isWebSocketEndpoint('http://localhost:8545')).toBe(false);
      expect(isWebSocketEndpoint('https://ethereum-rpc.publicnode.com')).toBe(false);
    });
  });

  describe('toRawLog', () => {
    const viemLog = {
      address: TOKEN,
      topics: [TRANSFER_TOPIC, pad(ALICE), pad(BOB)],
      data: pad('0x01'),
      transactionHash: TX_HASH,
      blockNumber: 19_000_000n,
      logIndex: 3,
    };

    it('should tag the log with its chain', () => {
      expect(toRawLog('base', viemLog)).toEqual({ chainId: 'base', ...viemLog });
    });

    it('should copy the topics', () => {
      const raw = toRawLog('base', viemLog);
      expect(raw.topics).toEqual(viemLog.topics);
      expect(raw.topics).not.toBe(viemLog.topics);
    });

    it('should keep missing pending-log fields as null', () => {
      const raw = toRawLog('base', { ...viemLog, transactionHash: null, blockNumber: null, logIndex: null });
      expect(raw.transactionHash).toBeNull();
      expect(raw.blockNumber).toBeNull();
      expect(raw.logIndex).toBeNull();
    });
  });
});
