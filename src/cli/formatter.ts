import chalk from 'chalk';
import type { WhaleAlert } from '../types.js';
import { shortenAddress, shortenTxHash, formatTimestamp } from '../utils/formatting.js';

function formatParty(address: string, label?: string): string {
  return `${shortenAddress(address)} ${label ? chalk.bold(`(${label})`) : chalk.dim('(Unknown)')}`;
}

/**
 * Render one alert as a single multi-line record
 */
export function formatWhaleAlert(alert: WhaleAlert): string {
  const lines = [
    `${chalk.gray(`[${formatTimestamp(alert.timestamp)}]`)} ${chalk.bold.cyan(`[${alert.chainName.toUpperCase()}]`)} 🐋 ${chalk.bold.yellow('WHALE TRANSFER DETECTED')}`,
    `  ${chalk.white('Amount:')} ${chalk.bold.green(`${alert.displayAmount} ${alert.symbol}`)}`,
    `  ${chalk.white('From:  ')} ${formatParty(alert.from, alert.fromLabel)}`,
    `  ${chalk.white('To:    ')} ${formatParty(alert.to, alert.toLabel)}`,
    `  ${chalk.white('Tx:    ')} ${chalk.blue(shortenTxHash(alert.txHash))}`,
    `  ${chalk.white('Block: ')} ${chalk.gray(alert.blockNumber !== null ? alert.blockNumber.toString() : '(unknown)')}`,
  ];

  if (alert.explorerTxUrl) {
    lines.push(`  ${chalk.white('Link:  ')} ${chalk.blue.underline(alert.explorerTxUrl)}`);
  }

  return lines.join('\n');
}

/**
 * Print a whale alert to the console in one write
 */
export function printWhaleAlert(alert: WhaleAlert): void {
  console.log(`\n${formatWhaleAlert(alert)}`);
}

/**
 * Print startup banner with configuration
 */
export function printBanner(config: {
  chains: string[];
  threshold: string;
  labelCount: number;
  demoMode: boolean;
}): void {
  console.log('\n');
  console.log(chalk.bold.cyan('╔═══════════════════════════════════════════════╗'));
  console.log(
    chalk.bold.cyan('║') +
      chalk.bold.white('   🐋  MULTI-CHAIN WHALE TRANSFER MONITOR      ') +
      chalk.bold.cyan('║')
  );
  console.log(chalk.bold.cyan('╚═══════════════════════════════════════════════╝'));
  console.log();
  console.log(`${chalk.gray('Chains:')}          ${chalk.white(config.chains.join(', '))}`);
  console.log(`${chalk.gray('Threshold:')}       ${chalk.white(config.threshold)}`);
  console.log(`${chalk.gray('Known Labels:')}    ${chalk.white(config.labelCount)}`);

  if (config.demoMode) {
    console.log();
    console.log(chalk.bold.yellow('⚠️  DEMO MODE ACTIVE - Using reduced threshold for testing ⚠️'));
  }

  console.log();
}

/**
 * Print error message
 */
export function printError(message: string, error?: Error): void {
  console.log();
  console.log(chalk.red.bold('✗ ERROR: ') + chalk.red(message));
  if (error && error.stack) {
    console.log(chalk.gray(error.stack));
  }
  console.log();
}

/**
 * Print info message
 */
export function printInfo(message: string): void {
  console.log(chalk.blue('ℹ') + ' ' + chalk.white(message));
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  console.log(chalk.green('✓') + ' ' + chalk.white(message));
}
