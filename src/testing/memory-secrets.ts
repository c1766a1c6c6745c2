import { ComponentError } from "../lifecycle/errors.js";
import type { SecretData, SecretsHealth, SecretsStore, TokenInfo } from "../secrets/store.js";

type Method = keyof SecretsStore;

/** In-memory secrets store keyed by path. Every call is recorded. */
export class MemorySecretsStore implements SecretsStore {
  readonly calls: { method: Method; args: unknown[] }[] = [];
  readonly secrets = new Map<string, SecretData>();
  health_: SecretsHealth = { initialized: true, sealed: false, version: "1.15.0" };
  mounts = ["secret/", "sys/", "cubbyhole/"];
  token: TokenInfo = { ttl_s: 86_400, renewable: true, policies: ["default", "ironboot"] };
  renewedTtl = 86_400;
  unreachable = false;
  readonly failures = new Map<Method, Error>();

  constructor(initial: Record<string, SecretData> = {}) {
    for (const [path, data] of Object.entries(initial)) this.secrets.set(path, { ...data });
  }

  methodsCalled(): Method[] {
    return this.calls.map((c) => c.method);
  }

  async get(path: string): Promise<SecretData | undefined> {
    this.enter("get", [path]);
    const data = this.secrets.get(path);
    return data && { ...data };
  }

  async put(path: string, value: SecretData): Promise<void> {
    this.enter("put", [path, value]);
    this.secrets.set(path, { ...value });
  }

  async delete(path: string): Promise<void> {
    this.enter("delete", [path]);
    this.secrets.delete(path);
  }

  async list(prefix: string): Promise<string[]> {
    this.enter("list", [prefix]);
    const base = prefix === "" || prefix.endsWith("/") ? prefix : `${prefix}/`;
    const names = new Set<string>();
    for (const path of this.secrets.keys()) {
      if (!path.startsWith(base)) continue;
      const rest = path.slice(base.length);
      const slash = rest.indexOf("/");
      names.add(slash < 0 ? rest : rest.slice(0, slash + 1));
    }
    return [...names].sort();
  }

  async health(): Promise<SecretsHealth> {
    this.enter("health", []);
    return { ...this.health_ };
  }

  async listMounts(): Promise<string[]> {
    this.enter("listMounts", []);
    return [...this.mounts];
  }

  async lookupToken(): Promise<TokenInfo> {
    this.enter("lookupToken", []);
    return { ...this.token };
  }

  async renewToken(): Promise<TokenInfo> {
    this.enter("renewToken", []);
    this.token = { ...this.token, ttl_s: this.renewedTtl };
    return { ...this.token };
  }

  private enter(method: Method, args: unknown[]): void {
    this.calls.push({ method, args });
    if (this.unreachable) {
      throw new ComponentError("CONNECTIVITY", `secrets store unreachable (${method})`);
    }
    const failure = this.failures.get(method);
    if (failure) throw failure;
  }
}
