import { describe, expect, test } from "vitest";
import { publicReadPolicy } from "../store.js";
import { allowsPublicRead, encodeKey, isMissing, objectStoreError, S3ObjectStore } from "../s3-store.js";

function sdkError(name: string, status?: number): Error {
  return Object.assign(new Error(`${name} from service`), {
    name,
    $metadata: status === undefined ? {} : { httpStatusCode: status },
  });
}

describe("objectStoreError", () => {
  test("aborted requests are TIMEOUT", () => {
    const err = objectStoreError(sdkError("TimeoutError"), "GET b/k");
    expect(err.code).toBe("TIMEOUT");
    expect(err.message).toBe("GET b/k: timed out");
  });

  test("failures without an HTTP status are CONNECTIVITY", () => {
    const err = objectStoreError(sdkError("ECONNREFUSED"), "HEAD b");
    expect(err.code).toBe("CONNECTIVITY");
    expect(err.message).toBe("HEAD b: ECONNREFUSED from service");
  });

  test("access denied is CONNECTIVITY with the status", () => {
    const err = objectStoreError(sdkError("AccessDenied", 403), "PUT b/k");
    expect(err.code).toBe("CONNECTIVITY");
    expect(err.details?.status).toBe(403);
  });

  test("other service errors use the fallback kind", () => {
    const err = objectStoreError(sdkError("InternalError", 500), "PUT b/k");
    expect(err.code).toBe("INTERNAL");
    expect(err.message).toBe("PUT b/k: HTTP 500 InternalError");
  });
});

describe("isMissing", () => {
  test("recognises 404s and missing-resource names", () => {
    expect(isMissing(sdkError("NotFound", 404))).toBe(true);
    expect(isMissing(sdkError("NoSuchKey"))).toBe(true);
    expect(isMissing(sdkError("AccessDenied", 403))).toBe(false);
    expect(isMissing("nope")).toBe(false);
  });
});

describe("allowsPublicRead", () => {
  test("accepts the policy this project writes", () => {
    expect(allowsPublicRead(publicReadPolicy("isos"))).toBe(true);
  });

  test("accepts a wildcard principal string", () => {
    const policy = JSON.stringify({
      Statement: [{ Effect: "Allow", Principal: "*", Action: "s3:GetObject" }],
    });
    expect(allowsPublicRead(policy)).toBe(true);
  });

  test("rejects deny statements, named principals and junk", () => {
    const deny = JSON.stringify({
      Statement: [{ Effect: "Deny", Principal: "*", Action: "s3:GetObject" }],
    });
    const named = JSON.stringify({
      Statement: [{ Effect: "Allow", Principal: { AWS: "arn:aws:iam::1:root" }, Action: "s3:GetObject" }],
    });
    expect(allowsPublicRead(deny)).toBe(false);
    expect(allowsPublicRead(named)).toBe(false);
    expect(allowsPublicRead("{not json")).toBe(false);
  });
});

describe("S3ObjectStore.publicUrl", () => {
  test("is path-style under the endpoint, with segments encoded", () => {
    const store = new S3ObjectStore({
      endpoint: "scratchy.example.test/",
      region: "us-east-1",
      timeoutMs: 1000,
    });
    expect(store.publicUrl("pub", "latest/4.18/boot iso")).toBe(
      "https://scratchy.example.test/pub/latest/4.18/boot%20iso",
    );
  });

  test("prefers the public base URL", () => {
    const store = new S3ObjectStore({
      endpoint: "http://minio.local:9000",
      publicBaseUrl: "https://cdn.example.test",
      region: "us-east-1",
      timeoutMs: 1000,
    });
    expect(store.publicUrl("pub", "a/b")).toBe("https://cdn.example.test/pub/a/b");
  });

  test("encodeKey keeps slashes", () => {
    expect(encodeKey("artifacts/r630-02/deployment record")).toBe("artifacts/r630-02/deployment%20record");
  });
});
