import type { LedgerEntry, ListFilter, NewLedgerEntry } from "./types.js";

/**
 * Catalogue of ledger writes. At most one active entry exists per
 * (bucket, key): inserting at an occupied location retires the old entry.
 */
export interface LedgerIndex {
  insert(entry: NewLedgerEntry): Promise<LedgerEntry>;
  get(id: string): Promise<LedgerEntry | undefined>;
  findActive(bucket: string, key: string): Promise<LedgerEntry | undefined>;
  list(filter?: ListFilter): Promise<LedgerEntry[]>;
  /** Soft-delete the active entry at a location. Returns the number of rows changed. */
  markDeleted(bucket: string, key: string, at: number): Promise<number>;
  close(): void;
}
