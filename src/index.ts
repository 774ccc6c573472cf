#!/usr/bin/env node
import { initConfig } from './config.js';
import { logger } from './logger.js';
import { createViemLogSubscriber } from './clients.js';
import { ChainFeed } from './watcher/chainFeed.js';
import { MonitorSupervisor } from './watcher/supervisor.js';
import { AlertSink } from './alerts/alertSink.js';
import { LabelResolver } from './labels.js';
import { parseCliArgs } from './cli/parser.js';
import { printBanner, printWhaleAlert, printError, printSuccess, printInfo } from './cli/formatter.js';
import { errorMessage } from './errors.js';

let supervisor: MonitorSupervisor | null = null;
let sink: AlertSink | null = null;
let shuttingDown = false;

/**
 * Cleanup and shutdown gracefully
 */
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;

  logger.info({ signal }, 'Shutdown signal received, cleaning up...');

  try {
    if (supervisor) {
      await supervisor.stop();
    }

    if (sink) {
      await sink.close();
    }

    logger.info('Cleanup complete, exiting');
    process.exit(0);
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'Error during shutdown');
    process.exit(1);
  }
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  try {
    // Parse CLI arguments
    const cliOptions = parseCliArgs();

    // Initialize config with CLI overrides
    const config = initConfig({
      thresholdOverride: cliOptions.threshold,
      demoMode: cliOptions.demo,
      chainIds: cliOptions.chains,
    });

    const labels = LabelResolver.fromRecord(config.labels);

    printBanner({
      chains: config.chains.map((chain) => chain.name),
      threshold: `${config.threshold.toString()} base units`,
      labelCount: labels.size,
      demoMode: cliOptions.demo,
    });

    if (labels.size === 0) {
      printInfo('No address labels loaded. Alerts will show raw addresses only.');
    }

    sink = new AlertSink(printWhaleAlert);

    supervisor = new MonitorSupervisor({
      chains: config.chains,
      rejected: config.rejectedChains,
      threshold: config.threshold,
      labels,
      sink,
      feed: new ChainFeed(
        createViemLogSubscriber({
          requestTimeoutMs: config.requestTimeoutMs,
          pollingIntervalMs: config.pollingIntervalMs,
        })
      ),
      backoff: config.backoff,
      logDecodeErrors: config.logDecodeErrors,
      onStateChange: (chainId, state) => {
        if (state.status === 'streaming') {
          printSuccess(`${chainId}: streaming transfer logs`);
        }
      },
    });

    // Setup signal handlers for graceful shutdown
    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    // Handle uncaught errors
    process.on('uncaughtException', (error) => {
      logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
      printError('Uncaught exception', error);
      process.exit(1);
    });

    process.on('unhandledRejection', (reason: unknown) => {
      logger.error({ reason: errorMessage(reason) }, 'Unhandled promise rejection');
      if (reason instanceof Error) {
        printError('Unhandled promise rejection', reason);
      }
    });

    printSuccess('Monitoring active...');
    await supervisor.run();
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'Fatal error in main');
    printError('Fatal error', error instanceof Error ? error : undefined);
    process.exit(1);
  }
}

// Start the application
void main();
