/**
 * Insert thousands separators into a string of digits
 */
export function groupThousands(digits: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

/**
 * Render base units as dollars rounded half-up to cents ("$74,000.00").
 * Integer arithmetic only.
 */
export function formatUsdAmount(raw: bigint, decimals: number): string {
  const scale = 10n ** BigInt(decimals);
  const cents = (raw * 100n + scale / 2n) / scale;
  const whole = cents / 100n;
  const fraction = cents % 100n;
  return `$${groupThousands(whole.toString())}.${fraction.toString().padStart(2, '0')}`;
}

/**
 * Format address with optional label
 */
export function formatAddress(address: string, label?: string): string {
  if (label) {
    return `${address} (${label})`;
  }
  return address;
}

/**
 * Shorten address for display (0x1234...5678)
 */
export function shortenAddress(address: string): string {
  if (address.length < 10) return address;
  return `${address.slice(0, 6)}...${address.slice(-4)}`;
}

/**
 * Shorten transaction hash for display
 */
export function shortenTxHash(hash: string): string {
  if (hash.length < 10) return hash;
  return `${hash.slice(0, 8)}...${hash.slice(-6)}`;
}

/**
 * Format timestamp to ISO string
 */
export function formatTimestamp(timestamp: number): string {
  return new Date(timestamp).toISOString();
}
