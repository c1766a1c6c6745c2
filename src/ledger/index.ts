export { LedgerError, type LedgerErrorCode } from "./errors.js";
export { type Fetcher, HttpFetcher, type HttpFetcherOpts } from "./http-probe.js";
export type { LedgerIndex } from "./index-store.js";
export {
  compactStamp,
  type ExpireOpts,
  kindFromKey,
  Ledger,
  MAX_CONTENT_BYTES,
  type LedgerOptions,
  ownerPath,
  PRIVATE_PREFIX,
  PUBLIC_PREFIX,
  privateKey,
  publicKey,
  safeSegment,
} from "./ledger.js";
export {
  cutoffFor,
  DEFAULT_RETENTION,
  RETENTION,
  type RetentionPolicy,
  retentionFor,
  withOverrides,
} from "./retention.js";
export { SqliteLedgerIndex } from "./sqlite-index.js";
export type {
  ExpireResult,
  LedgerEntry,
  ListFilter,
  NewLedgerEntry,
  PublishResult,
  RecordResult,
} from "./types.js";
