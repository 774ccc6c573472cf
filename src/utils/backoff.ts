import type { BackoffPolicy } from '../types.js';

/**
 * Capped exponential delay for the n-th consecutive failure (n >= 1)
 */
export function computeBackoffDelay(failures: number, policy: BackoffPolicy): number {
  const exponent = Math.max(0, failures - 1);
  return Math.min(policy.baseDelayMs * Math.pow(2, exponent), policy.maxDelayMs);
}
