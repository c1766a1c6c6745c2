import { errorMessageOf } from "../lifecycle/errors.js";
import { type IdSource, ulidSource } from "../lifecycle/ids.js";
import type {
  ArtifactContent,
  ArtifactSink,
  ArtifactVisibility,
  OwnedArtifact,
} from "../lifecycle/types.js";
import { type Logger, silentLogger } from "../logger.js";
import type { ObjectStore, StoredObject } from "../objects/store.js";
import { LedgerError } from "./errors.js";
import { type Fetcher, HttpFetcher } from "./http-probe.js";
import type { LedgerIndex } from "./index-store.js";
import { cutoffFor, DEFAULT_RETENTION, type RetentionPolicy } from "./retention.js";
import type {
  ExpireResult,
  LedgerEntry,
  ListFilter,
  PublishResult,
  RecordResult,
} from "./types.js";

export const PRIVATE_PREFIX = "artifacts/";
export const PUBLIC_PREFIX = "latest/";

/** S3 single PUT ceiling. */
export const MAX_CONTENT_BYTES = 5 * 1024 ** 3;

export interface LedgerOptions {
  store: ObjectStore;
  index: LedgerIndex;
  privateBucket: string;
  publicBucket: string;
  fetcher?: Fetcher;
  idSource?: IdSource;
  clock?: () => Date;
  logger?: Logger;
  maxContentBytes?: number;
}

export interface ExpireOpts {
  /** Only consider private keys under this prefix. */
  prefix?: string;
  dryRun?: boolean;
}

/** One path segment: anything outside [A-Za-z0-9._-] collapses to "-". */
export function safeSegment(s: string): string {
  const cleaned = s.trim().replace(/[^A-Za-z0-9._-]+/g, "-").replace(/^-+|-+$/g, "");
  return cleaned === "" ? "_" : cleaned;
}

/** Owners may be hierarchical ("r630-02/dumpty"); each level is kept. */
export function ownerPath(owner: string): string {
  return owner.split("/").map(safeSegment).join("/");
}

/** UTC yyyymmddhhmmss. */
export function compactStamp(at: Date): string {
  return at.toISOString().replace(/[-:T]/g, "").slice(0, 14);
}

export function privateKey(owner: string, kind: string, at: Date, id: string): string {
  return `${PRIVATE_PREFIX}${ownerPath(owner)}/${safeSegment(kind)}/${compactStamp(at)}-${id}`;
}

export function publicKey(tag: string, kind: string): string {
  return `${PUBLIC_PREFIX}${ownerPath(tag)}/${safeSegment(kind)}`;
}

function encodeContent(content: ArtifactContent): { body: string | Uint8Array; content_type: string } {
  if (typeof content === "string") return { body: content, content_type: "text/plain; charset=utf-8" };
  if (content instanceof Uint8Array) return { body: content, content_type: "application/octet-stream" };
  return { body: JSON.stringify(content, null, 2), content_type: "application/json" };
}

/** Scalar metadata as S3 user metadata (string values, lower-case keys). */
function objectMetadata(metadata: Record<string, unknown>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(metadata)) {
    if (typeof v === "string" || typeof v === "number" || typeof v === "boolean") {
      out[k.toLowerCase().replace(/[^a-z0-9_-]/g, "_")] = String(v);
    }
  }
  return out;
}

/** Kind of an object under artifacts/<owner...>/<kind>/<stamp>-<id>. */
export function kindFromKey(key: string): string | undefined {
  if (!key.startsWith(PRIVATE_PREFIX)) return undefined;
  const segments = key.slice(PRIVATE_PREFIX.length).split("/");
  return segments.length >= 3 ? segments[segments.length - 2] : undefined;
}

/**
 * Dual-tier artifact store over an ObjectStore: append-only private history
 * plus overwrite-in-place public copies, catalogued in a LedgerIndex.
 */
export class Ledger implements ArtifactSink {
  readonly privateBucket: string;
  readonly publicBucket: string;

  private readonly store: ObjectStore;
  private readonly index: LedgerIndex;
  private readonly fetcher: Fetcher;
  private readonly nextId: IdSource;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private readonly maxContentBytes: number;

  constructor(opts: LedgerOptions) {
    if (opts.privateBucket === opts.publicBucket) {
      throw new LedgerError(
        "INVALID_REQUEST",
        `private and public artifacts need separate buckets; both are ${opts.privateBucket}`,
      );
    }
    this.store = opts.store;
    this.index = opts.index;
    this.privateBucket = opts.privateBucket;
    this.publicBucket = opts.publicBucket;
    this.fetcher = opts.fetcher ?? new HttpFetcher({ timeoutMs: 30_000 });
    this.nextId = opts.idSource ?? ulidSource;
    this.clock = opts.clock ?? (() => new Date());
    this.logger = (opts.logger ?? silentLogger()).child({ module: "ledger" });
    this.maxContentBytes = opts.maxContentBytes ?? MAX_CONTENT_BYTES;
  }

  /**
   * Store an artifact. Private-versioned content always lands on a new key;
   * public-latest content overwrites latest/<version_tag|owner>/<kind>.
   */
  async record(artifact: OwnedArtifact): Promise<RecordResult> {
    const { owner, timestamp } = artifact.metadata;
    if (typeof owner !== "string" || owner.trim() === "" || typeof timestamp !== "string") {
      throw new LedgerError("INVALID_REQUEST", "artifact metadata must include timestamp and owner");
    }
    const at = new Date(timestamp);
    if (Number.isNaN(at.getTime())) {
      throw new LedgerError("INVALID_REQUEST", `metadata.timestamp is not a timestamp: ${timestamp}`);
    }
    if (artifact.kind.trim() === "") {
      throw new LedgerError("INVALID_REQUEST", "artifact kind is required");
    }

    const visibility: ArtifactVisibility = artifact.visibility ?? "private-versioned";
    const id = this.nextId();
    const bucket = visibility === "private-versioned" ? this.privateBucket : this.publicBucket;
    const key =
      visibility === "private-versioned"
        ? privateKey(owner, artifact.kind, at, id)
        : publicKey(artifact.version_tag ?? owner, artifact.kind);

    const { body, content_type } = encodeContent(artifact.content);
    const size = typeof body === "string" ? Buffer.byteLength(body) : body.byteLength;
    if (size > this.maxContentBytes) {
      throw new LedgerError(
        "CONTENT_TOO_LARGE",
        `${artifact.kind} artifact is ${size} bytes; limit is ${this.maxContentBytes}`,
      );
    }
    await this.store.put(bucket, key, body, {
      content_type,
      metadata: objectMetadata({
        ...artifact.metadata,
        kind: artifact.kind,
        visibility,
        version_tag: artifact.version_tag,
        ledger_id: id,
      }),
    });

    const entry = await this.index.insert({
      id,
      owner,
      kind: artifact.kind,
      visibility,
      bucket,
      key,
      version_tag: artifact.version_tag,
      content_type,
      size,
      metadata: artifact.metadata,
      recorded_at: this.clock().getTime(),
    });
    this.logger.info({ id, kind: entry.kind, owner, bucket, key }, "artifact recorded");

    return {
      id,
      bucket,
      key,
      visibility,
      url: visibility === "public-latest" ? this.store.publicUrl(bucket, key) : undefined,
    };
  }

  /**
   * Copy a private artifact to its public-latest location and confirm an
   * anonymous HEAD succeeds. The catalogue only gains the public entry once it does;
   * otherwise the public location is put back as it was.
   */
  async publish(id: string, opts: { version_tag?: string } = {}): Promise<PublishResult> {
    const source = await this.index.get(id);
    if (!source) {
      throw new LedgerError("NOT_FOUND", `no ledger entry ${id}`);
    }
    if (source.visibility !== "private-versioned" || source.deleted_at !== undefined) {
      throw new LedgerError("NOT_PUBLISHABLE", `entry ${id} is not an active private-versioned artifact`);
    }

    const tag = opts.version_tag ?? source.version_tag ?? source.owner;
    const key = publicKey(tag, source.kind);
    const previous = await this.store.get(this.publicBucket, key);
    await this.store.copy(
      { bucket: source.bucket, key: source.key },
      { bucket: this.publicBucket, key },
    );

    const url = this.store.publicUrl(this.publicBucket, key);
    let status: number;
    try {
      status = await this.fetcher.head(url);
    } catch (err) {
      throw await this.unverified(key, previous, `${url} could not be fetched: ${errorMessageOf(err)}`, url);
    }
    if (status < 200 || status >= 300) {
      throw await this.unverified(key, previous, `${url} answered HTTP ${status}`, url);
    }

    const entry = await this.index.insert({
      id: this.nextId(),
      owner: source.owner,
      kind: source.kind,
      visibility: "public-latest",
      bucket: this.publicBucket,
      key,
      version_tag: tag,
      content_type: source.content_type,
      size: source.size,
      metadata: source.metadata,
      source_id: source.id,
      recorded_at: this.clock().getTime(),
    });
    this.logger.info({ id, url }, "artifact published");
    return { entry, url, status };
  }

  /** Remove every public-latest object under a version tag. Private history is untouched. */
  async retract(versionTag: string): Promise<string[]> {
    const prefix = `${PUBLIC_PREFIX}${ownerPath(versionTag)}/`;
    const now = this.clock().getTime();
    const removed: string[] = [];

    for (const object of await this.store.list(this.publicBucket, prefix)) {
      await this.store.delete(this.publicBucket, object.key);
      await this.index.markDeleted(this.publicBucket, object.key, now);
      removed.push(object.key);
    }
    this.logger.info({ version_tag: versionTag, removed: removed.length }, "public artifacts retracted");
    return removed;
  }

  /**
   * Delete private objects last modified before the threshold. Only the
   * private bucket is listed; metadata/ and latest/ keys and folder markers are skipped.
   */
  async expire(olderThan: Date, opts: ExpireOpts = {}): Promise<ExpireResult> {
    return this.sweep(() => olderThan, opts);
  }

  /** expire() with a per-kind threshold from the retention policy. */
  async expireByPolicy(
    policy: RetentionPolicy = DEFAULT_RETENTION,
    opts: ExpireOpts = {},
  ): Promise<ExpireResult> {
    const now = this.clock();
    return this.sweep(async (key) => {
      const entry = await this.index.findActive(this.privateBucket, key);
      return cutoffFor(policy, entry?.kind ?? kindFromKey(key), now);
    }, opts);
  }

  async list(filter: ListFilter = {}): Promise<LedgerEntry[]> {
    return this.index.list(filter);
  }

  /** Catalogue entry plus its stored bytes. */
  async read(id: string): Promise<{ entry: LedgerEntry; body: Uint8Array }> {
    const entry = await this.index.get(id);
    if (!entry || entry.deleted_at !== undefined) {
      throw new LedgerError("NOT_FOUND", `no ledger entry ${id}`);
    }
    const object = await this.store.get(entry.bucket, entry.key);
    if (!object) {
      throw new LedgerError("NOT_FOUND", `object ${entry.bucket}/${entry.key} is gone`);
    }
    return { entry, body: object.body };
  }

  /** Restore (or remove) the public object an unverified publish overwrote. */
  private async unverified(
    key: string,
    previous: StoredObject | undefined,
    message: string,
    url: string,
  ): Promise<LedgerError> {
    try {
      if (previous) {
        await this.store.put(this.publicBucket, key, previous.body, {
          content_type: previous.info.content_type,
          metadata: previous.info.metadata,
        });
      } else {
        await this.store.delete(this.publicBucket, key);
      }
    } catch (err) {
      this.logger.error({ key, err: errorMessageOf(err) }, "unverified public copy left in place");
      return new LedgerError("PUBLISH_UNVERIFIED", `${message}; rollback failed: ${errorMessageOf(err)}`, url);
    }
    this.logger.warn({ key, restored: previous !== undefined }, "unverified public copy rolled back");
    return new LedgerError("PUBLISH_UNVERIFIED", message, url);
  }

  private async sweep(
    cutoff: (key: string) => Date | undefined | Promise<Date | undefined>,
    opts: ExpireOpts,
  ): Promise<ExpireResult> {
    const dryRun = opts.dryRun ?? false;
    const now = this.clock().getTime();
    const deleted: string[] = [];
    let kept = 0;

    for (const object of await this.store.list(this.privateBucket, opts.prefix ?? "")) {
      const { key } = object;
      if (key.startsWith("metadata/") || key.startsWith(PUBLIC_PREFIX) || key.endsWith("/")) continue;
      const threshold = await cutoff(key);
      if (threshold === undefined || object.last_modified >= threshold) {
        kept++;
        continue;
      }
      if (!dryRun) {
        await this.store.delete(this.privateBucket, key);
        await this.index.markDeleted(this.privateBucket, key, now);
      }
      deleted.push(key);
    }
    this.logger.info({ deleted: deleted.length, kept, dry_run: dryRun }, "private artifacts expired");
    return { deleted, kept, dry_run: dryRun };
  }
}
