import {
  createPublicClient,
  http,
  webSocket,
  type Address,
  type Hash,
  type Hex,
  type PublicClient,
} from 'viem';
import type {
  ChainConfig,
  LogSubscriber,
  LogSubscription,
  LogSubscriptionHandlers,
  RawLog,
} from './types.js';
import { logger } from './logger.js';
import { errorMessage } from './errors.js';
import { TRANSFER_EVENT } from './utils/event.js';

export interface ClientOptions {
  requestTimeoutMs: number;
  /** Log polling interval for http endpoints */
  pollingIntervalMs: number;
}

interface ViemLog {
  address: Address;
  topics: readonly Hex[];
  data: Hex;
  transactionHash: Hash | null;
  blockNumber: bigint | null;
  logIndex: number | null;
}

export function isWebSocketEndpoint(endpoint: string): boolean {
  return endpoint.startsWith('ws://') || endpoint.startsWith('wss://');
}

export function toRawLog(chainId: string, log: ViemLog): RawLog {
  return {
    chainId,
    address: log.address,
    topics: [...log.topics],
    data: log.data,
    transactionHash: log.transactionHash,
    blockNumber: log.blockNumber,
    logIndex: log.logIndex,
  };
}

/**
 * Probe the endpoint, then watch Transfer logs of the chain's token contract
 */
async function watchTransfers(
  client: PublicClient,
  chain: ChainConfig,
  handlers: LogSubscriptionHandlers
): Promise<() => void> {
  const blockNumber = await client.getBlockNumber();
  logger.info(
    { chain: chain.id, blockNumber: blockNumber.toString() },
    'rpc_client: endpoint reachable, watching transfer logs'
  );

  return client.watchEvent({
    address: chain.contractAddress,
    event: TRANSFER_EVENT,
    onLogs: (logs) => handlers.onLogs(logs.map((log) => toRawLog(chain.id, log))),
    onError: (error) => handlers.onError(error),
  });
}

/**
 * Log subscriber backed by viem. WebSocket endpoints use eth_subscribe,
 * http endpoints poll with log filters. Transport-level reconnection is
 * disabled: a broken stream is reported through onError and the
 * supervisor decides when to come back.
 */
export function createViemLogSubscriber(options: ClientOptions): LogSubscriber {
  return {
    async subscribe(chain: ChainConfig, handlers: LogSubscriptionHandlers): Promise<LogSubscription> {
      if (isWebSocketEndpoint(chain.endpoint)) {
        const client = createPublicClient({
          transport: webSocket(chain.endpoint, {
            timeout: options.requestTimeoutMs,
            reconnect: false, // The supervisor handles reconnection
          }),
        });

        const closeSocket = async (): Promise<void> => {
          try {
            const rpcClient = await client.transport.getRpcClient();
            rpcClient.close();
          } catch (error) {
            logger.debug(
              { chain: chain.id, error: errorMessage(error) },
              'rpc_client: failed to close WebSocket'
            );
          }
        };

        let unwatch: () => void;
        try {
          unwatch = await watchTransfers(client, chain, handlers);
        } catch (error) {
          await closeSocket();
          throw error;
        }

        return {
          unsubscribe: () => {
            unwatch();
            void closeSocket();
          },
        };
      }

      const client = createPublicClient({
        transport: http(chain.endpoint, { timeout: options.requestTimeoutMs }),
        pollingInterval: options.pollingIntervalMs,
      });

      const unwatch = await watchTransfers(client, chain, handlers);
      return { unsubscribe: unwatch };
    },
  };
}
