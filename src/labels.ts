import { normalizeAddress } from './utils/address.js';

/**
 * Read-only address -> label table, shared by every chain task.
 * Lookups are case-insensitive.
 */
export class LabelResolver {
  private readonly table: ReadonlyMap<string, string>;

  constructor(entries: Iterable<readonly [string, string]> = []) {
    const table = new Map<string, string>();
    for (const [address, label] of entries) {
      table.set(normalizeAddress(address), label);
    }
    this.table = table;
  }

  static fromRecord(record: Readonly<Record<string, string>>): LabelResolver {
    return new LabelResolver(Object.entries(record));
  }

  resolve(address: string): string | undefined {
    return this.table.get(normalizeAddress(address));
  }

  get size(): number {
    return this.table.size;
  }
}
