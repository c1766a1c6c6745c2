import type { AxiosAdapter } from "axios";
import type { Logger } from "../logger.js";
import { SecretsProvider } from "../secrets/provider.js";
import type { SecretsStore } from "../secrets/store.js";
import { VaultClient } from "../secrets/vault-client.js";
import type { Settings } from "./settings.js";

/**
 * Where each credential lives in the secrets store. The provider's environment
 * fallback for these paths is the variable loadSettings already reads
 * (truenas#api_key → TRUENAS_API_KEY).
 */
export const CREDENTIAL_PATHS = {
  appliance_api_key: { path: "truenas", key: "api_key" },
  bmc_password: { path: "idrac", key: "password" },
  objects_access_key: { path: "s3", key: "access_key" },
  objects_secret_key: { path: "s3", key: "secret_key" },
} as const;

/**
 * Vault client for the configured address: token auth when a token is set,
 * otherwise an AppRole login. Undefined when no address is configured.
 */
export async function openSecretsStore(
  settings: Settings,
  adapter?: AxiosAdapter,
): Promise<SecretsStore | undefined> {
  const { addr, token, role_id, secret_id, namespace, mount_point, path_prefix } = settings.secrets;
  if (addr === undefined) return undefined;

  let clientToken = token;
  if (clientToken === undefined && role_id !== undefined && secret_id !== undefined) {
    clientToken = await VaultClient.loginWithAppRole({
      addr,
      roleId: role_id,
      secretId: secret_id,
      namespace,
      timeoutMs: settings.timeout_ms,
      adapter,
    });
  }
  if (clientToken === undefined) return undefined;

  return new VaultClient({
    addr,
    token: clientToken,
    namespace,
    mountPoint: mount_point,
    pathPrefix: path_prefix,
    timeoutMs: settings.timeout_ms,
    adapter,
  });
}

/** Copy of settings with missing credentials filled from the provider. */
export async function resolveCredentials(
  settings: Settings,
  provider: SecretsProvider,
  logger?: Logger,
): Promise<Settings> {
  const lookup = async (
    current: string | undefined,
    ref: { path: string; key: string },
  ): Promise<string | undefined> => {
    if (current !== undefined) return provider.resolveReference(current);
    const found = await provider.get(ref.path, ref.key);
    if (found) logger?.debug({ path: ref.path, key: ref.key, source: found.source }, "credential resolved");
    return found?.value;
  };

  return {
    ...settings,
    appliance: {
      ...settings.appliance,
      api_key: await lookup(settings.appliance.api_key, CREDENTIAL_PATHS.appliance_api_key),
    },
    bmc: {
      ...settings.bmc,
      password: await lookup(settings.bmc.password, CREDENTIAL_PATHS.bmc_password),
    },
    objects: {
      ...settings.objects,
      access_key: await lookup(settings.objects.access_key, CREDENTIAL_PATHS.objects_access_key),
      secret_key: await lookup(settings.objects.secret_key, CREDENTIAL_PATHS.objects_secret_key),
    },
  };
}
