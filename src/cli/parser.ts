import { Command, InvalidArgumentError } from 'commander';

export interface CLIOptions {
  threshold?: bigint;
  demo: boolean;
  chains?: string[];
}

/**
 * Parse a threshold given in token base units
 */
export function parseBaseUnits(value: string): bigint {
  if (!/^\d+$/.test(value) || BigInt(value) === 0n) {
    throw new InvalidArgumentError('Threshold must be a positive integer in token base units.');
  }
  return BigInt(value);
}

/**
 * Parse a comma-separated list of chain ids
 */
export function parseChainList(value: string): string[] {
  const ids = value
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
  if (ids.length === 0) {
    throw new InvalidArgumentError('Expected at least one chain id.');
  }
  return ids;
}

/**
 * Parse command line arguments
 */
export function parseCliArgs(argv: string[] = process.argv): CLIOptions {
  const program = new Command();

  program
    .name('whale-monitor')
    .description('Multi-chain whale transfer monitor')
    .version('1.0.0')
    .option('-t, --threshold <units>', 'Override alert threshold in token base units', parseBaseUnits)
    .option('-d, --demo', 'Run in demo mode with a 1,000 USDC threshold', false)
    .option('-c, --chains <ids>', 'Only monitor these chain ids (comma separated)', parseChainList)
    .parse(argv);

  const options = program.opts<CLIOptions>();

  return {
    threshold: options.threshold,
    demo: options.demo,
    chains: options.chains,
  };
}
