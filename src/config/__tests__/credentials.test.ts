import { describe, expect, test } from "vitest";
import { SecretsProvider } from "../../secrets/provider.js";
import { VaultClient } from "../../secrets/vault-client.js";
import { scriptedAdapter } from "../../testing/http.js";
import { MemorySecretsStore } from "../../testing/memory-secrets.js";
import { openSecretsStore, resolveCredentials } from "../credentials.js";
import { loadSettings } from "../settings.js";

describe("openSecretsStore", () => {
  test("no address means no store", async () => {
    await expect(openSecretsStore(loadSettings({ VAULT_TOKEN: "test-token" }))).resolves.toBeUndefined();
  });

  test("a token opens a client without logging in", async () => {
    const { adapter, requests } = scriptedAdapter(() => ({ status: 500 }));
    const store = await openSecretsStore(
      loadSettings({ VAULT_ADDR: "https://vault.test:8200", VAULT_TOKEN: "test-token" }),
      adapter,
    );
    expect(store).toBeInstanceOf(VaultClient);
    expect(requests).toEqual([]);
  });

  test("AppRole credentials are exchanged for a token", async () => {
    const { adapter, requests } = scriptedAdapter(() => ({
      status: 200,
      data: { auth: { client_token: "test-token", lease_duration: 3600 } },
    }));
    const store = await openSecretsStore(
      loadSettings({
        VAULT_ADDR: "https://vault.test:8200",
        VAULT_ROLE_ID: "test-role",
        VAULT_SECRET_ID: "test-secret",
        VAULT_NAMESPACE: "lab",
      }),
      adapter,
    );

    expect(store).toBeInstanceOf(VaultClient);
    expect(requests.map((r) => r.url)).toEqual(["/auth/approle/login"]);
    expect(requests[0].headers["X-Vault-Namespace"]).toBe("lab");
  });

  test("an address without credentials means no store", async () => {
    await expect(
      openSecretsStore(loadSettings({ VAULT_ADDR: "https://vault.test:8200" })),
    ).resolves.toBeUndefined();
  });
});

describe("resolveCredentials", () => {
  test("fills missing credentials from the environment fallback", async () => {
    const provider = new SecretsProvider({
      env: { IDRAC_PASSWORD: "test-secret", S3_ACCESS_KEY: "test-access" },
    });
    const settings = await resolveCredentials(loadSettings({}), provider);

    expect(settings.bmc.password).toBe("test-secret");
    expect(settings.objects.access_key).toBe("test-access");
    expect(settings.objects.secret_key).toBeUndefined();
    expect(settings.appliance.api_key).toBeUndefined();
  });

  test("prefers the store and resolves references in explicit values", async () => {
    const provider = new SecretsProvider({
      store: new MemorySecretsStore({
        truenas: { api_key: "test-key" },
        idrac: { password: "test-secret" },
      }),
      env: {},
    });
    const settings = await resolveCredentials(
      loadSettings({ TRUENAS_API_KEY: "secret:truenas#api_key", IDRAC_PASSWORD: "given" }),
      provider,
    );

    expect(settings.appliance.api_key).toBe("test-key");
    expect(settings.bmc.password).toBe("given");
  });
});
