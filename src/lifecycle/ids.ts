import { ulid } from "ulid";

/** Source of opaque component identifiers. */
export type IdSource = () => string;

export const ulidSource: IdSource = () => ulid();

/** Deterministic ids for tests: `${prefix}-1`, `${prefix}-2`, ... */
export function sequentialIds(prefix = "id"): IdSource {
  let n = 0;
  return () => {
    n++;
    return `${prefix}-${n}`;
  };
}
