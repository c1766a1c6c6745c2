import { z } from "zod";
import { ComponentInstance } from "../lifecycle/component.js";
import { resolveConfig } from "../lifecycle/config.js";
import { ComponentError, errorMessageOf } from "../lifecycle/errors.js";
import type { IdSource } from "../lifecycle/ids.js";
import type { ArtifactSink, PhaseContext, PhaseHandlers } from "../lifecycle/types.js";
import type { Logger } from "../logger.js";
import type { SecretsHealth, SecretsStore, TokenInfo } from "./store.js";

export const SecretsConfigSchema = z.object({
  mount_point: z.string().min(1).default("secret"),
  /** Renew the token during housekeeping when its TTL drops below this. */
  min_token_ttl_s: z.number().int().nonnegative().default(3600),
  /** Write, read back and remove a probe secret to prove the prefix is writable. */
  verify_permissions: z.boolean().default(true),
  probe_path: z.string().min(1).default("_probe"),
});

export type SecretsConfig = z.output<typeof SecretsConfigSchema>;
export type SecretsConfigInput = z.input<typeof SecretsConfigSchema>;

export interface SecretsDiscovery {
  health: SecretsHealth;
  token: TokenInfo;
  mounts: string[];
  mount_readable: boolean;
}

export interface SecretsProcessing {
  permissions_verified: boolean;
  probe_path?: string;
}

export interface SecretsHousekeeping {
  token_ttl_s: number;
  token_renewable: boolean;
  renewed: boolean;
  new_ttl_s?: number;
  probe_removed: boolean;
  warnings: string[];
}

export type SecretsComponent = ComponentInstance<
  SecretsConfig,
  SecretsDiscovery,
  SecretsProcessing,
  SecretsHousekeeping
>;

export interface SecretsComponentDeps {
  store: SecretsStore;
  logger?: Logger;
  idSource?: IdSource;
  sink?: ArtifactSink;
  owner?: string;
}

class SecretsHandlers
  implements PhaseHandlers<SecretsConfig, SecretsDiscovery, SecretsProcessing, SecretsHousekeeping>
{
  private probe?: string;

  constructor(private readonly store: SecretsStore) {}

  async discover(ctx: PhaseContext<SecretsConfig>): Promise<SecretsDiscovery> {
    const health = await this.store.health();
    if (!health.initialized || health.sealed) {
      throw new ComponentError(
        "SECRETS_UNAVAILABLE",
        health.sealed ? "secrets store is sealed" : "secrets store is not initialized",
      );
    }
    const token = await this.store.lookupToken();
    ctx.logger.info({ ttl_s: token.ttl_s, policies: token.policies }, "secrets token valid");

    const mounts = await this.store.listMounts();
    const mount_readable = mounts.includes(`${ctx.config.mount_point}/`);
    if (!mount_readable) {
      ctx.logger.warn({ mount: ctx.config.mount_point }, "configured mount not visible to this token");
    }
    return { health, token, mounts, mount_readable };
  }

  async process(ctx: PhaseContext<SecretsConfig>): Promise<SecretsProcessing> {
    if (!ctx.config.verify_permissions) {
      return { permissions_verified: false };
    }
    const path = `${ctx.config.probe_path}/${ctx.id}`;
    const expected = `probe-${ctx.id}`;

    this.probe = path;
    await this.store.put(path, { value: expected });
    const read = await this.store.get(path);
    if (read?.value !== expected) {
      throw new ComponentError("SECRETS_UNAVAILABLE", `probe secret at ${path} did not read back`);
    }
    ctx.logger.info({ path }, "secrets prefix is writable");
    return { permissions_verified: true, probe_path: path };
  }

  async housekeep(ctx: PhaseContext<SecretsConfig>): Promise<SecretsHousekeeping> {
    const warnings: string[] = [];
    const token = await this.store.lookupToken();
    let renewed = false;
    let new_ttl_s: number | undefined;

    if (token.renewable && token.ttl_s < ctx.config.min_token_ttl_s) {
      try {
        new_ttl_s = (await this.store.renewToken()).ttl_s;
        renewed = true;
        ctx.logger.info({ new_ttl_s }, "renewed secrets token");
      } catch (err) {
        warnings.push(`token renewal failed: ${errorMessageOf(err)}`);
      }
    } else if (!token.renewable && token.ttl_s < ctx.config.min_token_ttl_s) {
      warnings.push(`token expires in ${token.ttl_s}s and cannot be renewed`);
    }

    let probe_removed = false;
    if (this.probe !== undefined) {
      try {
        await this.store.delete(this.probe);
        probe_removed = true;
        this.probe = undefined;
      } catch (err) {
        warnings.push(`could not remove probe secret ${this.probe}: ${errorMessageOf(err)}`);
      }
    }

    for (const warning of warnings) ctx.logger.warn(warning);
    return {
      token_ttl_s: token.ttl_s,
      token_renewable: token.renewable,
      renewed,
      new_ttl_s,
      probe_removed,
      warnings,
    };
  }
}

export function createSecretsComponent(
  input: SecretsConfigInput,
  deps: SecretsComponentDeps,
): SecretsComponent {
  return new ComponentInstance<SecretsConfig, SecretsDiscovery, SecretsProcessing, SecretsHousekeeping>({
    name: "secrets",
    config: resolveConfig("secrets", SecretsConfigSchema, input),
    handlers: new SecretsHandlers(deps.store),
    logger: deps.logger,
    idSource: deps.idSource,
    sink: deps.sink,
    owner: deps.owner,
  });
}
