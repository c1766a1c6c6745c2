import { ComponentError, errorMessageOf } from "../lifecycle/errors.js";
import { type Logger, silentLogger } from "../logger.js";
import type { SecretData, SecretsStore } from "./store.js";

export type SecretSource = "store" | "environment";

export interface ResolvedSecret<T> {
  value: T;
  source: SecretSource;
}

export interface SecretReference {
  path: string;
  key?: string;
}

const REFERENCE_PREFIX = "secret:";

/** "secret:bmc/r630-02#password" → { path: "bmc/r630-02", key: "password" }. */
export function parseReference(value: string): SecretReference | undefined {
  if (!value.startsWith(REFERENCE_PREFIX)) return undefined;
  const body = value.slice(REFERENCE_PREFIX.length);
  const hash = body.indexOf("#");
  const path = hash < 0 ? body : body.slice(0, hash);
  const key = hash < 0 ? undefined : body.slice(hash + 1);
  if (path === "") return undefined;
  return key ? { path, key } : { path };
}

/** Environment variable consulted for a path (and key) when the store has no answer. */
export function envKeyFor(path: string, key?: string): string {
  const name = (s: string) => s.replace(/[/-]+/g, "_").replace(/^_+|_+$/g, "").toUpperCase();
  return key ? `${name(path)}_${name(key)}` : name(path);
}

export interface SecretsProviderOpts {
  store?: SecretsStore;
  env?: Record<string, string | undefined>;
  logger?: Logger;
}

/**
 * Reads go to the store first and fall back to environment variables; writes and
 * listings need the store.
 */
export class SecretsProvider {
  private readonly store?: SecretsStore;
  private readonly env: Record<string, string | undefined>;
  private readonly logger: Logger;

  constructor(opts: SecretsProviderOpts = {}) {
    this.store = opts.store;
    this.env = opts.env ?? process.env;
    this.logger = opts.logger ?? silentLogger();
  }

  get hasStore(): boolean {
    return this.store !== undefined;
  }

  async get(path: string): Promise<ResolvedSecret<SecretData | string> | undefined>;
  async get(path: string, key: string): Promise<ResolvedSecret<string> | undefined>;
  async get(path: string, key?: string): Promise<ResolvedSecret<SecretData | string> | undefined> {
    if (this.store) {
      try {
        const data = await this.store.get(path);
        const value = key === undefined ? data : data?.[key];
        if (value !== undefined) return { value, source: "store" };
      } catch (err) {
        this.logger.warn({ path, err: errorMessageOf(err) }, "secrets store read failed; trying environment");
      }
    }
    const envValue = this.env[envKeyFor(path, key)];
    if (envValue !== undefined && envValue !== "") {
      return { value: envValue, source: "environment" };
    }
    return undefined;
  }

  async put(path: string, value: SecretData): Promise<void> {
    await this.requireStore("put").put(path, value);
  }

  async list(prefix: string): Promise<string[]> {
    return this.requireStore("list").list(prefix);
  }

  /** Resolve one "secret:path#key" string. Other strings pass through. */
  async resolveReference(value: string): Promise<string> {
    const ref = parseReference(value);
    if (ref === undefined) return value;
    const resolved = ref.key === undefined ? await this.get(ref.path) : await this.get(ref.path, ref.key);
    if (resolved === undefined) {
      throw new ComponentError("SECRETS_UNAVAILABLE", `unresolved secret reference ${value}`);
    }
    if (typeof resolved.value !== "string") {
      throw new ComponentError(
        "CONFIGURATION",
        `secret reference ${value} names a whole secret; add #key`,
      );
    }
    return resolved.value;
  }

  /** Copy of a configuration tree with every secret reference resolved. */
  async resolveReferences(value: unknown): Promise<unknown> {
    if (typeof value === "string") return this.resolveReference(value);
    if (Array.isArray(value)) {
      const out: unknown[] = [];
      for (const item of value) out.push(await this.resolveReferences(item));
      return out;
    }
    if (value !== null && typeof value === "object") {
      const out: Record<string, unknown> = {};
      for (const [k, v] of Object.entries(value)) out[k] = await this.resolveReferences(v);
      return out;
    }
    return value;
  }

  private requireStore(operation: string): SecretsStore {
    if (!this.store) {
      throw new ComponentError(
        "SECRETS_UNAVAILABLE",
        `secrets ${operation} needs a secrets store; the environment fallback is read-only`,
      );
    }
    return this.store;
  }
}
