import { describe, expect, test } from "vitest";
import { cutoffFor, DEFAULT_RETENTION, RETENTION, retentionFor, withOverrides } from "../retention.js";

describe("retention policy", () => {
  test("known kinds use their own retention", () => {
    expect(retentionFor(DEFAULT_RETENTION, "deployment-record")).toBe(RETENTION.AUDIT);
    expect(retentionFor(DEFAULT_RETENTION, "log")).toBe(RETENTION.SHORT);
  });

  test("unknown and missing kinds fall back to the default", () => {
    expect(retentionFor(DEFAULT_RETENTION, "something-else")).toBe(RETENTION.STANDARD);
    expect(retentionFor(DEFAULT_RETENTION, undefined)).toBe(RETENTION.STANDARD);
  });

  test("explicit null keeps a kind forever", () => {
    expect(retentionFor(DEFAULT_RETENTION, "iso")).toBeNull();
    expect(cutoffFor(DEFAULT_RETENTION, "iso", new Date())).toBeUndefined();
  });

  test("cutoff is now minus the retention days", () => {
    const now = new Date("2026-03-31T00:00:00.000Z");
    expect(cutoffFor(DEFAULT_RETENTION, "boot-configuration", now)).toEqual(
      new Date("2026-03-01T00:00:00.000Z"),
    );
  });

  test("overrides merge over the base policy", () => {
    const policy = withOverrides(DEFAULT_RETENTION, { default_days: 5, kinds: { log: 1 } });
    expect(policy.default_days).toBe(5);
    expect(policy.kinds.log).toBe(1);
    expect(policy.kinds["deployment-record"]).toBe(RETENTION.AUDIT);
  });

  test("negative or fractional days are rejected", () => {
    expect(() => withOverrides(DEFAULT_RETENTION, { default_days: -1 })).toThrow(RangeError);
    expect(() => withOverrides(DEFAULT_RETENTION, { kinds: { log: 1.5 } })).toThrow(
      "retention days must be a non-negative integer (got 1.5)",
    );
  });
});
