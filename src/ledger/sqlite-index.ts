import Database, { type Database as DatabaseType, type Statement } from "better-sqlite3";
import { z } from "zod";
import type { LedgerIndex } from "./index-store.js";
import type { LedgerEntry, ListFilter, NewLedgerEntry } from "./types.js";

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

interface SqliteLedgerIndexOptions {
  dbPath: string; // ":memory:" for tests, file path for production
}

const RowSchema = z.object({
  id: z.string(),
  owner: z.string(),
  kind: z.string(),
  visibility: z.enum(["private-versioned", "public-latest"]),
  bucket: z.string(),
  object_key: z.string(),
  version_tag: z.string().nullable(),
  content_type: z.string(),
  size: z.number(),
  metadata_json: z.string(),
  source_id: z.string().nullable(),
  recorded_at: z.number(),
  deleted_at: z.number().nullable(),
});

const MetadataSchema = z.record(z.unknown());

function rowToEntry(raw: unknown): LedgerEntry {
  const row = RowSchema.parse(raw);
  return {
    id: row.id,
    owner: row.owner,
    kind: row.kind,
    visibility: row.visibility,
    bucket: row.bucket,
    key: row.object_key,
    version_tag: row.version_tag ?? undefined,
    content_type: row.content_type,
    size: row.size,
    metadata: MetadataSchema.parse(JSON.parse(row.metadata_json)),
    source_id: row.source_id ?? undefined,
    recorded_at: row.recorded_at,
    deleted_at: row.deleted_at ?? undefined,
  };
}

/**
 * SQLite catalogue of ledger writes. WAL mode; deletes are soft.
 */
export class SqliteLedgerIndex implements LedgerIndex {
  private db: DatabaseType;
  private stmts: {
    fetchById: Statement;
    fetchActiveAt: Statement;
    insertEntry: Statement;
    softDeleteAt: Statement;
  };

  constructor(opts: SqliteLedgerIndexOptions) {
    this.db = new Database(opts.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 3000");
    this.initSchema();
    this.stmts = this.prepareStatements();
  }

  close(): void {
    this.db.close();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ledger_entries (
        id              TEXT PRIMARY KEY,

        -- Identity
        owner           TEXT NOT NULL,
        kind            TEXT NOT NULL,
        visibility      TEXT NOT NULL,
        version_tag     TEXT,

        -- Location
        bucket          TEXT NOT NULL,
        object_key      TEXT NOT NULL,
        content_type    TEXT NOT NULL,
        size            INTEGER NOT NULL,
        metadata_json   TEXT NOT NULL,
        source_id       TEXT,

        -- Lifecycle
        recorded_at     INTEGER NOT NULL,
        deleted_at      INTEGER
      );

      CREATE UNIQUE INDEX IF NOT EXISTS ux_ledger_location ON ledger_entries(bucket, object_key)
        WHERE deleted_at IS NULL;
      CREATE INDEX IF NOT EXISTS idx_ledger_owner_kind ON ledger_entries(owner, kind) WHERE deleted_at IS NULL;
      CREATE INDEX IF NOT EXISTS idx_ledger_version_tag ON ledger_entries(version_tag) WHERE version_tag IS NOT NULL;
      CREATE INDEX IF NOT EXISTS idx_ledger_recorded ON ledger_entries(recorded_at DESC);
    `);
  }

  private prepareStatements() {
    return {
      fetchById: this.db.prepare(`
        SELECT * FROM ledger_entries WHERE id = ?
      `),
      fetchActiveAt: this.db.prepare(`
        SELECT * FROM ledger_entries
        WHERE bucket = ? AND object_key = ? AND deleted_at IS NULL
        LIMIT 1
      `),
      insertEntry: this.db.prepare(`
        INSERT INTO ledger_entries (
          id, owner, kind, visibility, version_tag,
          bucket, object_key, content_type, size, metadata_json, source_id,
          recorded_at
        ) VALUES (
          @id, @owner, @kind, @visibility, @version_tag,
          @bucket, @object_key, @content_type, @size, @metadata_json, @source_id,
          @recorded_at
        )
      `),
      softDeleteAt: this.db.prepare(`
        UPDATE ledger_entries SET deleted_at = ?
        WHERE bucket = ? AND object_key = ? AND deleted_at IS NULL
      `),
    };
  }

  async insert(entry: NewLedgerEntry): Promise<LedgerEntry> {
    const params = {
      id: entry.id,
      owner: entry.owner,
      kind: entry.kind,
      visibility: entry.visibility,
      version_tag: entry.version_tag ?? null,
      bucket: entry.bucket,
      object_key: entry.key,
      content_type: entry.content_type,
      size: entry.size,
      metadata_json: JSON.stringify(entry.metadata),
      source_id: entry.source_id ?? null,
      recorded_at: entry.recorded_at,
    };

    // An overwritten object retires whatever was catalogued at its location.
    const tx = this.db.transaction(() => {
      this.stmts.softDeleteAt.run(entry.recorded_at, entry.bucket, entry.key);
      this.stmts.insertEntry.run(params);
    });
    tx();

    return rowToEntry(this.stmts.fetchById.get(entry.id));
  }

  async get(id: string): Promise<LedgerEntry | undefined> {
    const row = this.stmts.fetchById.get(id);
    return row === undefined ? undefined : rowToEntry(row);
  }

  async findActive(bucket: string, key: string): Promise<LedgerEntry | undefined> {
    const row = this.stmts.fetchActiveAt.get(bucket, key);
    return row === undefined ? undefined : rowToEntry(row);
  }

  async list(filter: ListFilter = {}): Promise<LedgerEntry[]> {
    const limit = Math.min(filter.limit ?? DEFAULT_LIMIT, MAX_LIMIT);
    const offset = filter.offset ?? 0;

    // Build WHERE clause dynamically
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (!filter.include_deleted) {
      conditions.push("deleted_at IS NULL");
    }
    if (filter.owner !== undefined) {
      conditions.push("owner = ?");
      params.push(filter.owner);
    }
    if (filter.kind !== undefined) {
      conditions.push("kind = ?");
      params.push(filter.kind);
    }
    if (filter.visibility !== undefined) {
      conditions.push("visibility = ?");
      params.push(filter.visibility);
    }
    if (filter.version_tag !== undefined) {
      conditions.push("version_tag = ?");
      params.push(filter.version_tag);
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const sql = `
      SELECT * FROM ledger_entries
      ${whereClause}
      ORDER BY recorded_at DESC, id DESC
      LIMIT ? OFFSET ?
    `;
    params.push(limit, offset);

    return this.db
      .prepare(sql)
      .all(...params)
      .map((row) => rowToEntry(row));
  }

  async markDeleted(bucket: string, key: string, at: number): Promise<number> {
    return this.stmts.softDeleteAt.run(at, bucket, key).changes;
  }
}
