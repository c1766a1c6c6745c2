import type { AxiosAdapter } from "axios";
import type { BmcClient } from "./bmc/client.js";
import { RedfishClient } from "./bmc/redfish-client.js";
import { openSecretsStore, resolveCredentials } from "./config/credentials.js";
import type { Settings } from "./config/settings.js";
import { HttpFetcher } from "./ledger/http-probe.js";
import { Ledger } from "./ledger/ledger.js";
import { SqliteLedgerIndex } from "./ledger/sqlite-index.js";
import { ComponentError } from "./lifecycle/errors.js";
import type { Logger } from "./logger.js";
import { S3ObjectStore } from "./objects/s3-store.js";
import type { ObjectStore } from "./objects/store.js";
import { SecretsProvider } from "./secrets/provider.js";
import type { SecretsStore } from "./secrets/store.js";
import { TrueNasClient } from "./storage/truenas-client.js";
import type { StorageApplianceClient } from "./storage/types.js";

export interface RuntimeOpts {
  env?: Record<string, string | undefined>;
  /** Replaces the HTTP transport of every axios-based client. */
  adapter?: AxiosAdapter;
}

function missing(what: string, envVar: string, secret: string): ComponentError {
  return new ComponentError(
    "CONFIGURATION",
    `no ${what}: set ${envVar} or store ${secret} in the secrets store`,
  );
}

/**
 * Remote clients built from settings, with credentials resolved through the
 * secrets provider. Clients are created on first use, so a command only
 * needs the credentials of the systems it touches.
 */
export class Runtime {
  private objectStore?: ObjectStore;
  private ledgerIndex?: SqliteLedgerIndex;
  private openedLedger?: Ledger;

  private constructor(
    readonly settings: Settings,
    readonly logger: Logger,
    readonly secrets: SecretsStore | undefined,
    private readonly adapter: AxiosAdapter | undefined,
  ) {}

  static async open(settings: Settings, logger: Logger, opts: RuntimeOpts = {}): Promise<Runtime> {
    const secrets = await openSecretsStore(settings, opts.adapter);
    const provider = new SecretsProvider({ store: secrets, env: opts.env, logger });
    const resolved = await resolveCredentials(settings, provider, logger);
    logger.debug({ secrets_store: secrets !== undefined }, "runtime opened");
    return new Runtime(resolved, logger, secrets, opts.adapter);
  }

  appliance(): StorageApplianceClient {
    const { host, port, api_key, verify_tls } = this.settings.appliance;
    if (api_key === undefined) throw missing("appliance API key", "TRUENAS_API_KEY", "truenas#api_key");
    return new TrueNasClient({
      host,
      port,
      apiKey: api_key,
      timeoutMs: this.settings.timeout_ms,
      verifyTls: verify_tls,
      adapter: this.adapter,
    });
  }

  bmc(host: string): BmcClient {
    const { user, password, verify_tls } = this.settings.bmc;
    if (password === undefined) throw missing("BMC password", "IDRAC_PASSWORD", "idrac#password");
    return new RedfishClient({
      host,
      username: user,
      password,
      timeoutMs: this.settings.timeout_ms,
      verifyTls: verify_tls,
      adapter: this.adapter,
    });
  }

  objects(): ObjectStore {
    if (this.objectStore === undefined) {
      const { endpoint, region, access_key, secret_key, public_base_url } = this.settings.objects;
      this.objectStore = new S3ObjectStore({
        endpoint,
        region,
        accessKeyId: access_key,
        secretAccessKey: secret_key,
        publicBaseUrl: public_base_url,
        timeoutMs: this.settings.timeout_ms,
      });
    }
    return this.objectStore;
  }

  ledger(): Ledger {
    if (this.openedLedger === undefined) {
      this.ledgerIndex = new SqliteLedgerIndex({ dbPath: this.settings.ledger_db_path });
      this.openedLedger = new Ledger({
        store: this.objects(),
        index: this.ledgerIndex,
        privateBucket: this.settings.objects.private_bucket,
        publicBucket: this.settings.objects.public_bucket,
        fetcher: new HttpFetcher({ timeoutMs: this.settings.timeout_ms, adapter: this.adapter }),
        logger: this.logger,
      });
    }
    return this.openedLedger;
  }

  close(): void {
    this.ledgerIndex?.close();
    this.ledgerIndex = undefined;
    this.openedLedger = undefined;
  }
}
