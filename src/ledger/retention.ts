/** Retention constants in days */
export const RETENTION = {
  SHORT: 7, // scratch output
  STANDARD: 30, // per-run configuration records
  AUDIT: 90, // deployment records
  PERMANENT: null, // never expired by policy
} as const;

export interface RetentionPolicy {
  default_days: number;
  /** Kind → days. null keeps the kind forever; absent falls back to default_days. */
  kinds: Record<string, number | null>;
}

/** Kind → default retention mapping */
export const DEFAULT_RETENTION: RetentionPolicy = {
  default_days: RETENTION.STANDARD,
  kinds: {
    "deployment-record": RETENTION.AUDIT,
    "boot-configuration": RETENTION.STANDARD,
    "iscsi-target": RETENTION.STANDARD,
    iso: RETENTION.PERMANENT,
    log: RETENTION.SHORT,
  },
};

const DAY_MS = 24 * 3600 * 1000;

/**
 * Days a kind is kept.
 * Important: an explicit null (keep forever) is not overridden by the default.
 */
export function retentionFor(policy: RetentionPolicy, kind: string | undefined): number | null {
  if (kind !== undefined && Object.prototype.hasOwnProperty.call(policy.kinds, kind)) {
    const days = policy.kinds[kind];
    return days ?? null;
  }
  return policy.default_days;
}

/** Objects last modified before the cutoff are expired; undefined means never. */
export function cutoffFor(
  policy: RetentionPolicy,
  kind: string | undefined,
  now: Date,
): Date | undefined {
  const days = retentionFor(policy, kind);
  return days === null ? undefined : new Date(now.getTime() - days * DAY_MS);
}

/** Merge overrides into a policy; negative or non-integer days are rejected. */
export function withOverrides(
  policy: RetentionPolicy,
  overrides: Partial<RetentionPolicy>,
): RetentionPolicy {
  const merged: RetentionPolicy = {
    default_days: overrides.default_days ?? policy.default_days,
    kinds: { ...policy.kinds, ...overrides.kinds },
  };
  for (const days of [merged.default_days, ...Object.values(merged.kinds)]) {
    if (days !== null && (!Number.isInteger(days) || days < 0)) {
      throw new RangeError(`retention days must be a non-negative integer (got ${days})`);
    }
  }
  return merged;
}
