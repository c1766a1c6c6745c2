import { z } from "zod";
import { ComponentInstance } from "../lifecycle/component.js";
import { resolveConfig } from "../lifecycle/config.js";
import { errorMessageOf } from "../lifecycle/errors.js";
import type { IdSource } from "../lifecycle/ids.js";
import type { ArtifactSink, PhaseContext, PhaseHandlers } from "../lifecycle/types.js";
import type { Logger } from "../logger.js";
import type { ObjectStore } from "./store.js";

export const METADATA_INDEX_KEY = "metadata/index.json";

export const ObjectsConfigSchema = z.object({
  private_bucket: z.string().min(3).default("r630-switchbot-private"),
  public_bucket: z.string().min(3).default("r630-switchbot-public"),
  create_buckets_if_missing: z.boolean().default(false),
  /** Folder markers written into a freshly created bucket. */
  private_folders: z.array(z.string()).default(["isos/", "binaries/", "artifacts/"]),
  public_folders: z.array(z.string()).default(["latest/"]),
  metadata_index: z.boolean().default(true),
});

export type ObjectsConfig = z.output<typeof ObjectsConfigSchema>;
export type ObjectsConfigInput = z.input<typeof ObjectsConfigSchema>;

type BucketRole = "private" | "public";

export interface BucketState {
  name: string;
  exists: boolean;
  objects: number;
}

export interface ObjectsDiscovery {
  private: BucketState & { versioning: boolean };
  public: BucketState & { public_read: boolean };
}

export interface ObjectsProcessing {
  actions: string[];
  created: Record<BucketRole, boolean>;
  folders_created: string[];
}

export interface IndexEntry {
  key: string;
  type: "iso" | "binary" | "artifact" | "other";
  size: number;
  last_modified: string;
  etag?: string;
  metadata: Record<string, string>;
}

export interface ObjectsHousekeeping {
  verification: {
    private_bucket: boolean;
    private_versioning: boolean;
    public_bucket: boolean;
    public_policy: boolean;
  };
  metadata_index: { created: boolean; entries: number; key?: string };
  warnings: string[];
}

export type ObjectsComponent = ComponentInstance<
  ObjectsConfig,
  ObjectsDiscovery,
  ObjectsProcessing,
  ObjectsHousekeeping
>;

export interface ObjectsComponentDeps {
  store: ObjectStore;
  logger?: Logger;
  idSource?: IdSource;
  sink?: ArtifactSink;
  owner?: string;
  clock?: () => Date;
}

export function entryType(key: string): IndexEntry["type"] {
  if (key.startsWith("isos/")) return "iso";
  if (key.startsWith("binaries/")) return "binary";
  if (key.startsWith("artifacts/")) return "artifact";
  return "other";
}

class ObjectsHandlers
  implements PhaseHandlers<ObjectsConfig, ObjectsDiscovery, ObjectsProcessing, ObjectsHousekeeping>
{
  constructor(
    private readonly store: ObjectStore,
    private readonly clock: () => Date,
  ) {}

  async discover(ctx: PhaseContext<ObjectsConfig>): Promise<ObjectsDiscovery> {
    const { private_bucket, public_bucket } = ctx.config;

    const privateExists = await this.store.bucketExists(private_bucket);
    const publicExists = await this.store.bucketExists(public_bucket);

    const discovery: ObjectsDiscovery = {
      private: {
        name: private_bucket,
        exists: privateExists,
        objects: privateExists ? (await this.store.list(private_bucket, "")).length : 0,
        versioning: privateExists && (await this.store.versioningEnabled(private_bucket)),
      },
      public: {
        name: public_bucket,
        exists: publicExists,
        objects: publicExists ? (await this.store.list(public_bucket, "")).length : 0,
        public_read: publicExists && (await this.store.hasPublicReadPolicy(public_bucket)),
      },
    };
    ctx.logger.info(
      { private: discovery.private, public: discovery.public },
      "object store discovered",
    );
    return discovery;
  }

  async process(ctx: PhaseContext<ObjectsConfig>, discovery: ObjectsDiscovery): Promise<ObjectsProcessing> {
    const result: ObjectsProcessing = {
      actions: [],
      created: { private: false, public: false },
      folders_created: [],
    };
    if (!ctx.config.create_buckets_if_missing) {
      ctx.logger.info("bucket creation disabled; leaving buckets as found");
      result.actions.push("skip_bucket_creation");
      return result;
    }

    await this.ensureBucket(ctx, "private", discovery.private.exists, result);
    await this.ensureBucket(ctx, "public", discovery.public.exists, result);

    if (!discovery.private.versioning) {
      await this.store.enableVersioning(ctx.config.private_bucket);
      result.actions.push("enable_versioning_private");
    }
    if (!discovery.public.public_read) {
      await this.store.putPublicReadPolicy(ctx.config.public_bucket);
      result.actions.push("set_public_bucket_policy");
    }
    return result;
  }

  async housekeep(ctx: PhaseContext<ObjectsConfig>): Promise<ObjectsHousekeeping> {
    const { private_bucket, public_bucket } = ctx.config;
    const warnings: string[] = [];
    const result: ObjectsHousekeeping = {
      verification: {
        private_bucket: false,
        private_versioning: false,
        public_bucket: false,
        public_policy: false,
      },
      metadata_index: { created: false, entries: 0 },
      warnings,
    };

    result.verification.private_bucket = await this.store.bucketExists(private_bucket);
    if (result.verification.private_bucket) {
      result.verification.private_versioning = await this.store.versioningEnabled(private_bucket);
      if (!result.verification.private_versioning) {
        warnings.push(`private bucket ${private_bucket} does not have versioning enabled`);
      }
    } else {
      warnings.push(`private bucket ${private_bucket} does not exist`);
    }

    result.verification.public_bucket = await this.store.bucketExists(public_bucket);
    if (result.verification.public_bucket) {
      result.verification.public_policy = await this.store.hasPublicReadPolicy(public_bucket);
      if (!result.verification.public_policy) {
        warnings.push(`public bucket ${public_bucket} has no anonymous read policy`);
      }
    } else {
      warnings.push(`public bucket ${public_bucket} does not exist`);
    }

    if (ctx.config.metadata_index && result.verification.private_bucket) {
      try {
        const entries = await this.buildIndex(private_bucket);
        await this.store.put(
          private_bucket,
          METADATA_INDEX_KEY,
          JSON.stringify(
            {
              created: this.clock().toISOString(),
              bucket: private_bucket,
              total_objects: entries.length,
              objects: entries,
            },
            null,
            2,
          ),
          { content_type: "application/json" },
        );
        result.metadata_index = { created: true, entries: entries.length, key: METADATA_INDEX_KEY };
        ctx.logger.info({ entries: entries.length }, "metadata index written");
      } catch (err) {
        warnings.push(`metadata index creation failed: ${errorMessageOf(err)}`);
      }
    }

    for (const warning of warnings) ctx.logger.warn(warning);
    return result;
  }

  private async ensureBucket(
    ctx: PhaseContext<ObjectsConfig>,
    role: BucketRole,
    exists: boolean,
    result: ObjectsProcessing,
  ): Promise<void> {
    const bucket = role === "private" ? ctx.config.private_bucket : ctx.config.public_bucket;
    if (exists) {
      result.actions.push(`skip_${role}_bucket`);
      return;
    }
    await this.store.createBucket(bucket);
    result.created[role] = true;
    result.actions.push(`create_${role}_bucket`);
    ctx.logger.info({ bucket }, `created ${role} bucket`);

    const folders = role === "private" ? ctx.config.private_folders : ctx.config.public_folders;
    for (const folder of folders) {
      await this.store.put(bucket, folder, "");
      result.folders_created.push(`${bucket}/${folder}`);
    }
  }

  /** Every private object except folder markers and the index itself. */
  private async buildIndex(bucket: string): Promise<IndexEntry[]> {
    const entries: IndexEntry[] = [];
    for (const summary of await this.store.list(bucket, "")) {
      if (summary.key.endsWith("/") || summary.key.startsWith("metadata/")) continue;
      const info = await this.store.head(bucket, summary.key);
      if (!info) continue;
      entries.push({
        key: info.key,
        type: entryType(info.key),
        size: info.size,
        last_modified: info.last_modified.toISOString(),
        etag: info.etag,
        metadata: info.metadata,
      });
    }
    return entries;
  }
}

export function createObjectsComponent(
  input: ObjectsConfigInput,
  deps: ObjectsComponentDeps,
): ObjectsComponent {
  return new ComponentInstance<ObjectsConfig, ObjectsDiscovery, ObjectsProcessing, ObjectsHousekeeping>({
    name: "objects",
    config: resolveConfig("objects", ObjectsConfigSchema, input),
    handlers: new ObjectsHandlers(deps.store, deps.clock ?? (() => new Date())),
    logger: deps.logger,
    idSource: deps.idSource,
    sink: deps.sink,
    owner: deps.owner,
    clock: deps.clock,
  });
}
