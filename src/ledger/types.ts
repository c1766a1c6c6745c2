import type { ArtifactVisibility } from "../lifecycle/types.js";

/** One catalogued object written by the ledger. */
export interface LedgerEntry {
  id: string;
  owner: string;
  kind: string;
  visibility: ArtifactVisibility;
  bucket: string;
  key: string;
  version_tag?: string;
  content_type: string;
  size: number;
  metadata: Record<string, unknown>;
  /** For a published copy, the private entry it came from. */
  source_id?: string;
  recorded_at: number; // ms since epoch
  deleted_at?: number;
}

export type NewLedgerEntry = Omit<LedgerEntry, "deleted_at">;

export interface ListFilter {
  owner?: string;
  kind?: string;
  visibility?: ArtifactVisibility;
  version_tag?: string;
  include_deleted?: boolean;
  limit?: number; // default 50, max 500
  offset?: number;
}

export interface RecordResult {
  id: string;
  bucket: string;
  key: string;
  visibility: ArtifactVisibility;
  /** Anonymous URL, for public-latest artifacts. */
  url?: string;
}

export interface PublishResult {
  entry: LedgerEntry;
  url: string;
  status: number;
}

export interface ExpireResult {
  deleted: string[];
  kept: number;
  dry_run: boolean;
}
