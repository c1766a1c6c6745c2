/**
 * Error codes for ledger operations.
 */
export type LedgerErrorCode =
  | "INVALID_REQUEST" // artifact or argument fails validation
  | "NOT_FOUND" // no catalogue entry with that id
  | "NOT_PUBLISHABLE" // entry is not an active private-versioned artifact
  | "PUBLISH_UNVERIFIED" // public copy exists but could not be fetched anonymously
  | "CONTENT_TOO_LARGE"; // body exceeds the single-request upload limit

/**
 * Custom error class for ledger operations.
 * Enables typed error handling via error.code.
 */
export class LedgerError extends Error {
  constructor(
    public readonly code: LedgerErrorCode,
    message: string,
    public readonly url?: string,
  ) {
    super(message);
    this.name = "LedgerError";
  }
}
