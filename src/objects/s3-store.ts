import {
  CopyObjectCommand,
  CreateBucketCommand,
  DeleteObjectCommand,
  GetBucketPolicyCommand,
  GetBucketVersioningCommand,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutBucketPolicyCommand,
  PutBucketVersioningCommand,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { z } from "zod";
import { ComponentError, type ComponentErrorCode } from "../lifecycle/errors.js";
import {
  type ObjectBody,
  type ObjectInfo,
  type ObjectLocation,
  type ObjectStore,
  type ObjectSummary,
  type PutOptions,
  publicReadPolicy,
  type StoredObject,
  toBytes,
} from "./store.js";

export interface S3ObjectStoreOpts {
  /** Host or URL of an S3-compatible endpoint; AWS when absent. */
  endpoint?: string;
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  /** Base for anonymous URLs, path-style: `${base}/${bucket}/${key}`. Defaults to the endpoint. */
  publicBaseUrl?: string;
  timeoutMs: number;
  client?: S3Client;
}

const SdkErrorShape = z.object({
  name: z.string(),
  message: z.string().default(""),
  $metadata: z.object({ httpStatusCode: z.number().optional() }).optional(),
});

const MISSING_NAMES = new Set(["NotFound", "NoSuchKey", "NoSuchBucket", "NoSuchBucketPolicy"]);
const TIMEOUT_NAMES = new Set(["AbortError", "TimeoutError"]);

const PolicySchema = z.object({
  Statement: z.array(
    z.object({
      Effect: z.string(),
      Principal: z.union([z.literal("*"), z.object({ AWS: z.union([z.string(), z.array(z.string())]) })]),
      Action: z.union([z.string(), z.array(z.string())]),
    }),
  ),
});

function statusOf(err: unknown): number | undefined {
  const shape = SdkErrorShape.safeParse(err);
  return shape.success ? shape.data.$metadata?.httpStatusCode : undefined;
}

/** True when the SDK reports a missing object, bucket or policy. */
export function isMissing(err: unknown): boolean {
  const shape = SdkErrorShape.safeParse(err);
  if (!shape.success) return false;
  return shape.data.$metadata?.httpStatusCode === 404 || MISSING_NAMES.has(shape.data.name);
}

/**
 * Map an SDK failure to a ComponentError.
 * Aborts → TIMEOUT, no HTTP status or 401/403 → CONNECTIVITY, anything else → fallback.
 */
export function objectStoreError(
  err: unknown,
  action: string,
  fallback: ComponentErrorCode = "INTERNAL",
): ComponentError {
  if (err instanceof ComponentError) return err;

  const shape = SdkErrorShape.safeParse(err);
  if (!shape.success) {
    return new ComponentError(fallback, `${action}: ${String(err)}`, { cause: err });
  }
  const { name, message } = shape.data;
  const status = statusOf(err);
  if (TIMEOUT_NAMES.has(name)) {
    return new ComponentError("TIMEOUT", `${action}: timed out`, { cause: err });
  }
  if (status === undefined) {
    return new ComponentError("CONNECTIVITY", `${action}: ${message || name}`, { cause: err });
  }
  if (status === 401 || status === 403) {
    return new ComponentError("CONNECTIVITY", `${action}: access denied (HTTP ${status})`, {
      status,
      cause: err,
    });
  }
  return new ComponentError(fallback, `${action}: HTTP ${status} ${name}`, { status, cause: err });
}

export function encodeKey(key: string): string {
  return key.split("/").map(encodeURIComponent).join("/");
}

function withScheme(endpoint: string): string {
  const trimmed = endpoint.replace(/\/+$/, "");
  return /^https?:\/\//.test(trimmed) ? trimmed : `https://${trimmed}`;
}

/** Does the policy document allow anonymous GetObject? */
export function allowsPublicRead(policy: string): boolean {
  let json: unknown;
  try {
    json = JSON.parse(policy);
  } catch {
    return false;
  }
  const parsed = PolicySchema.safeParse(json);
  if (!parsed.success) return false;

  return parsed.data.Statement.some((s) => {
    const principals =
      s.Principal === "*" ? ["*"] : [s.Principal.AWS].flat();
    const actions = [s.Action].flat();
    return (
      s.Effect === "Allow" &&
      principals.includes("*") &&
      (actions.includes("s3:GetObject") || actions.includes("s3:*"))
    );
  });
}

/**
 * ObjectStore over @aws-sdk/client-s3. Path-style addressing for
 * S3-compatible servers; every request carries an abort-signal timeout.
 */
export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;
  private readonly timeoutMs: number;
  private readonly publicBase: string;

  constructor(opts: S3ObjectStoreOpts) {
    const endpoint = opts.endpoint === undefined ? undefined : withScheme(opts.endpoint);
    this.timeoutMs = opts.timeoutMs;
    this.client =
      opts.client ??
      new S3Client({
        region: opts.region,
        endpoint,
        forcePathStyle: true,
        credentials:
          opts.accessKeyId !== undefined && opts.secretAccessKey !== undefined
            ? { accessKeyId: opts.accessKeyId, secretAccessKey: opts.secretAccessKey }
            : undefined,
      });
    this.publicBase = withScheme(
      opts.publicBaseUrl ?? endpoint ?? `https://s3.${opts.region}.amazonaws.com`,
    );
  }

  async put(
    bucket: string,
    key: string,
    body: ObjectBody,
    opts: PutOptions = {},
  ): Promise<{ etag?: string }> {
    try {
      const out = await this.client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: toBytes(body),
          Metadata: opts.metadata,
          ContentType: opts.content_type,
        }),
        this.options(),
      );
      return { etag: out.ETag?.replace(/"/g, "") };
    } catch (err) {
      throw objectStoreError(err, `PUT ${bucket}/${key}`);
    }
  }

  async get(bucket: string, key: string): Promise<StoredObject | undefined> {
    try {
      const out = await this.client.send(
        new GetObjectCommand({ Bucket: bucket, Key: key }),
        this.options(),
      );
      const body = out.Body ? await out.Body.transformToByteArray() : new Uint8Array();
      return {
        body,
        info: {
          key,
          size: out.ContentLength ?? body.byteLength,
          last_modified: out.LastModified ?? new Date(0),
          etag: out.ETag?.replace(/"/g, ""),
          content_type: out.ContentType,
          metadata: out.Metadata ?? {},
        },
      };
    } catch (err) {
      if (isMissing(err)) return undefined;
      throw objectStoreError(err, `GET ${bucket}/${key}`);
    }
  }

  async head(bucket: string, key: string): Promise<ObjectInfo | undefined> {
    try {
      const out = await this.client.send(
        new HeadObjectCommand({ Bucket: bucket, Key: key }),
        this.options(),
      );
      return {
        key,
        size: out.ContentLength ?? 0,
        last_modified: out.LastModified ?? new Date(0),
        etag: out.ETag?.replace(/"/g, ""),
        content_type: out.ContentType,
        metadata: out.Metadata ?? {},
      };
    } catch (err) {
      if (isMissing(err)) return undefined;
      throw objectStoreError(err, `HEAD ${bucket}/${key}`);
    }
  }

  async list(bucket: string, prefix: string): Promise<ObjectSummary[]> {
    const objects: ObjectSummary[] = [];
    let token: string | undefined;
    try {
      do {
        const out = await this.client.send(
          new ListObjectsV2Command({ Bucket: bucket, Prefix: prefix, ContinuationToken: token }),
          this.options(),
        );
        for (const o of out.Contents ?? []) {
          if (o.Key === undefined) continue;
          objects.push({
            key: o.Key,
            size: o.Size ?? 0,
            last_modified: o.LastModified ?? new Date(0),
          });
        }
        token = out.IsTruncated ? out.NextContinuationToken : undefined;
      } while (token !== undefined);
    } catch (err) {
      throw objectStoreError(err, `LIST ${bucket}/${prefix}`);
    }
    return objects;
  }

  async copy(src: ObjectLocation, dst: ObjectLocation): Promise<void> {
    try {
      await this.client.send(
        new CopyObjectCommand({
          Bucket: dst.bucket,
          Key: dst.key,
          CopySource: `${src.bucket}/${encodeKey(src.key)}`,
          MetadataDirective: "COPY",
        }),
        this.options(),
      );
    } catch (err) {
      throw objectStoreError(err, `COPY ${src.bucket}/${src.key} → ${dst.bucket}/${dst.key}`);
    }
  }

  async delete(bucket: string, key: string): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }), this.options());
    } catch (err) {
      if (isMissing(err)) return;
      throw objectStoreError(err, `DELETE ${bucket}/${key}`);
    }
  }

  async bucketExists(bucket: string): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: bucket }), this.options());
      return true;
    } catch (err) {
      if (isMissing(err)) return false;
      throw objectStoreError(err, `HEAD ${bucket}`);
    }
  }

  async createBucket(bucket: string): Promise<void> {
    try {
      await this.client.send(new CreateBucketCommand({ Bucket: bucket }), this.options());
    } catch (err) {
      throw objectStoreError(err, `CREATE ${bucket}`);
    }
  }

  async versioningEnabled(bucket: string): Promise<boolean> {
    try {
      const out = await this.client.send(
        new GetBucketVersioningCommand({ Bucket: bucket }),
        this.options(),
      );
      return out.Status === "Enabled";
    } catch (err) {
      throw objectStoreError(err, `GET ${bucket}?versioning`);
    }
  }

  async enableVersioning(bucket: string): Promise<void> {
    try {
      await this.client.send(
        new PutBucketVersioningCommand({
          Bucket: bucket,
          VersioningConfiguration: { Status: "Enabled" },
        }),
        this.options(),
      );
    } catch (err) {
      throw objectStoreError(err, `PUT ${bucket}?versioning`);
    }
  }

  async hasPublicReadPolicy(bucket: string): Promise<boolean> {
    try {
      const out = await this.client.send(
        new GetBucketPolicyCommand({ Bucket: bucket }),
        this.options(),
      );
      return out.Policy !== undefined && allowsPublicRead(out.Policy);
    } catch (err) {
      if (isMissing(err)) return false;
      throw objectStoreError(err, `GET ${bucket}?policy`);
    }
  }

  async putPublicReadPolicy(bucket: string): Promise<void> {
    try {
      await this.client.send(
        new PutBucketPolicyCommand({ Bucket: bucket, Policy: publicReadPolicy(bucket) }),
        this.options(),
      );
    } catch (err) {
      throw objectStoreError(err, `PUT ${bucket}?policy`);
    }
  }

  publicUrl(bucket: string, key: string): string {
    return `${this.publicBase}/${bucket}/${encodeKey(key)}`;
  }

  private options(): { abortSignal: AbortSignal } {
    return { abortSignal: AbortSignal.timeout(this.timeoutMs) };
  }
}
