export type ObjectBody = string | Uint8Array;

export interface ObjectLocation {
  bucket: string;
  key: string;
}

export interface PutOptions {
  /** User metadata; S3 stores keys lower-cased and values as strings. */
  metadata?: Record<string, string>;
  content_type?: string;
}

export interface ObjectSummary {
  key: string;
  size: number;
  last_modified: Date;
}

export interface ObjectInfo extends ObjectSummary {
  etag?: string;
  content_type?: string;
  metadata: Record<string, string>;
}

export interface StoredObject {
  body: Uint8Array;
  info: ObjectInfo;
}

/**
 * S3-compatible object storage. A missing object is undefined on read, and
 * deleting one is not an error.
 */
export interface ObjectStore {
  put(bucket: string, key: string, body: ObjectBody, opts?: PutOptions): Promise<{ etag?: string }>;
  get(bucket: string, key: string): Promise<StoredObject | undefined>;
  head(bucket: string, key: string): Promise<ObjectInfo | undefined>;
  /** Every object under the prefix, across pages. */
  list(bucket: string, prefix: string): Promise<ObjectSummary[]>;
  /** Server-side copy; content and metadata travel together. */
  copy(src: ObjectLocation, dst: ObjectLocation): Promise<void>;
  delete(bucket: string, key: string): Promise<void>;
  bucketExists(bucket: string): Promise<boolean>;
  createBucket(bucket: string): Promise<void>;
  versioningEnabled(bucket: string): Promise<boolean>;
  enableVersioning(bucket: string): Promise<void>;
  hasPublicReadPolicy(bucket: string): Promise<boolean>;
  /** Anonymous GetObject on every key in the bucket. */
  putPublicReadPolicy(bucket: string): Promise<void>;
  /** URL an anonymous client would fetch the object from. */
  publicUrl(bucket: string, key: string): string;
}

export const MUTATING_OBJECT_METHODS = [
  "put",
  "copy",
  "delete",
  "createBucket",
  "enableVersioning",
  "putPublicReadPolicy",
] as const;

/** Bucket policy granting anonymous reads of every object. */
export function publicReadPolicy(bucket: string): string {
  return JSON.stringify({
    Version: "2012-10-17",
    Statement: [
      {
        Sid: "PublicRead",
        Effect: "Allow",
        Principal: { AWS: ["*"] },
        Action: ["s3:GetObject"],
        Resource: [`arn:aws:s3:::${bucket}/*`],
      },
    ],
  });
}

export function toBytes(body: ObjectBody): Uint8Array {
  return typeof body === "string" ? new TextEncoder().encode(body) : body;
}
