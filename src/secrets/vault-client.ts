import type { AxiosAdapter, AxiosInstance } from "axios";
import { z } from "zod";
import { createHttpClient, isNotFound, parseResponse, toComponentError } from "../http/client.js";
import type { SecretData, SecretsHealth, SecretsStore, TokenInfo } from "./store.js";

export interface VaultClientOpts {
  addr: string;
  token: string;
  mountPoint?: string;
  /** Prepended to every secret path, e.g. "ironboot". */
  pathPrefix?: string;
  namespace?: string;
  timeoutMs: number;
  verifyTls?: boolean;
  adapter?: AxiosAdapter;
}

export interface AppRoleLogin {
  addr: string;
  roleId: string;
  secretId: string;
  namespace?: string;
  timeoutMs: number;
  verifyTls?: boolean;
  adapter?: AxiosAdapter;
}

const Scalar = z.union([z.string(), z.number(), z.boolean()]).transform(String);

const KvReadSchema = z.object({
  data: z.object({ data: z.record(Scalar).nullable() }),
});

const KvListSchema = z.object({ data: z.object({ keys: z.array(z.string()) }) });

const HealthSchema = z.object({
  initialized: z.boolean(),
  sealed: z.boolean(),
  version: z.string().optional(),
});

const TokenLookupSchema = z.object({
  data: z.object({
    ttl: z.number(),
    renewable: z.boolean().default(false),
    policies: z.array(z.string()).default([]),
  }),
});

const TokenAuthSchema = z.object({
  auth: z.object({
    client_token: z.string().optional(),
    lease_duration: z.number(),
    renewable: z.boolean().default(false),
    policies: z.array(z.string()).default([]),
  }),
});

const MountsSchema = z.record(z.unknown());

/** sys/health answers standby, sealed and uninitialised nodes with these codes. */
const HEALTH_STATUSES = new Set([200, 429, 472, 473, 501, 503]);

function joinPath(...parts: (string | undefined)[]): string {
  return parts
    .filter((p): p is string => p !== undefined && p !== "")
    .map((p) => p.replace(/^\/+|\/+$/g, ""))
    .join("/");
}

/**
 * HashiCorp Vault KV v2 client (token auth via X-Vault-Token).
 */
export class VaultClient implements SecretsStore {
  private http: AxiosInstance;
  private readonly mount: string;
  private readonly prefix?: string;

  constructor(opts: VaultClientOpts) {
    this.mount = opts.mountPoint ?? "secret";
    this.prefix = opts.pathPrefix;
    this.http = createHttpClient({
      baseURL: `${opts.addr.replace(/\/+$/, "")}/v1`,
      timeoutMs: opts.timeoutMs,
      headers: {
        "X-Vault-Token": opts.token,
        ...(opts.namespace ? { "X-Vault-Namespace": opts.namespace } : {}),
      },
      verifyTls: opts.verifyTls ?? true,
      adapter: opts.adapter,
    });
  }

  /** Exchange AppRole credentials for a client token. */
  static async loginWithAppRole(login: AppRoleLogin): Promise<string> {
    const http = createHttpClient({
      baseURL: `${login.addr.replace(/\/+$/, "")}/v1`,
      timeoutMs: login.timeoutMs,
      headers: login.namespace ? { "X-Vault-Namespace": login.namespace } : {},
      verifyTls: login.verifyTls ?? true,
      adapter: login.adapter,
    });
    try {
      const response = await http.post("/auth/approle/login", {
        role_id: login.roleId,
        secret_id: login.secretId,
      });
      const { auth } = parseResponse(TokenAuthSchema, response.data, "POST /auth/approle/login");
      if (auth.client_token === undefined) {
        throw new Error("login response carried no client token");
      }
      return auth.client_token;
    } catch (err) {
      throw toComponentError(err, "AppRole login", "SECRETS_UNAVAILABLE");
    }
  }

  async get(path: string): Promise<SecretData | undefined> {
    const url = `/${this.mount}/data/${joinPath(this.prefix, path)}`;
    try {
      const response = await this.http.get(url);
      return parseResponse(KvReadSchema, response.data, `GET ${url}`).data.data ?? undefined;
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw toComponentError(err, `GET ${url}`, "SECRETS_UNAVAILABLE");
    }
  }

  async put(path: string, value: SecretData): Promise<void> {
    const url = `/${this.mount}/data/${joinPath(this.prefix, path)}`;
    try {
      await this.http.post(url, { data: value });
    } catch (err) {
      throw toComponentError(err, `POST ${url}`, "SECRETS_UNAVAILABLE");
    }
  }

  async delete(path: string): Promise<void> {
    const url = `/${this.mount}/metadata/${joinPath(this.prefix, path)}`;
    try {
      await this.http.delete(url);
    } catch (err) {
      if (isNotFound(err)) return;
      throw toComponentError(err, `DELETE ${url}`, "SECRETS_UNAVAILABLE");
    }
  }

  async list(prefix: string): Promise<string[]> {
    const url = `/${this.mount}/metadata/${joinPath(this.prefix, prefix)}`;
    try {
      const response = await this.http.get(url, { params: { list: true } });
      return parseResponse(KvListSchema, response.data, `LIST ${url}`).data.keys;
    } catch (err) {
      if (isNotFound(err)) return [];
      throw toComponentError(err, `LIST ${url}`, "SECRETS_UNAVAILABLE");
    }
  }

  async health(): Promise<SecretsHealth> {
    try {
      const response = await this.http.get("/sys/health", {
        validateStatus: (status) => HEALTH_STATUSES.has(status),
      });
      return parseResponse(HealthSchema, response.data, "GET /sys/health");
    } catch (err) {
      throw toComponentError(err, "GET /sys/health", "CONNECTIVITY");
    }
  }

  async listMounts(): Promise<string[]> {
    try {
      const response = await this.http.get("/sys/mounts");
      const parsed = parseResponse(MountsSchema, response.data, "GET /sys/mounts");
      const table = isRecord(parsed.data) ? parsed.data : parsed;
      return Object.keys(table).filter((k) => k.endsWith("/"));
    } catch (err) {
      throw toComponentError(err, "GET /sys/mounts", "SECRETS_UNAVAILABLE");
    }
  }

  async lookupToken(): Promise<TokenInfo> {
    try {
      const response = await this.http.get("/auth/token/lookup-self");
      const { data } = parseResponse(TokenLookupSchema, response.data, "GET /auth/token/lookup-self");
      return { ttl_s: data.ttl, renewable: data.renewable, policies: data.policies };
    } catch (err) {
      throw toComponentError(err, "GET /auth/token/lookup-self", "SECRETS_UNAVAILABLE");
    }
  }

  async renewToken(): Promise<TokenInfo> {
    try {
      const response = await this.http.post("/auth/token/renew-self", {});
      const { auth } = parseResponse(TokenAuthSchema, response.data, "POST /auth/token/renew-self");
      return { ttl_s: auth.lease_duration, renewable: auth.renewable, policies: auth.policies };
    } catch (err) {
      throw toComponentError(err, "POST /auth/token/renew-self", "SECRETS_UNAVAILABLE");
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}
