import { formatUnits, parseUnits } from 'viem';

/**
 * Check if a value meets or exceeds a threshold
 */
export function meetsThreshold(value: bigint, threshold: bigint): boolean {
  return value >= threshold;
}

/**
 * Convert a decimal token amount ("74000.5") to base units
 */
export function toBaseUnits(amount: string, decimals: number): bigint {
  return parseUnits(amount, decimals);
}

/**
 * Convert base units to a full-precision decimal string
 */
export function fromBaseUnits(raw: bigint, decimals: number): string {
  return formatUnits(raw, decimals);
}
