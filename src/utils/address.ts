import { isAddress } from 'viem';

/**
 * Normalize an address to its lookup key (lowercase)
 */
export function normalizeAddress(address: string): string {
  return address.toLowerCase();
}

/**
 * Accepts checksummed, lowercase and uppercase hex addresses
 */
export function isValidAddress(address: string): boolean {
  return isAddress(address, { strict: false });
}
