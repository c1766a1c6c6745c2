import { z } from "zod";
import { type BootComponent, type BootConfigInput, createBootComponent } from "../bmc/boot-component.js";
import { type BmcClient, FIRST_BOOT_DEVICES } from "../bmc/client.js";
import type { Ledger } from "../ledger/ledger.js";
import { resolveConfig } from "../lifecycle/config.js";
import { errorMessageOf } from "../lifecycle/errors.js";
import type { IdSource } from "../lifecycle/ids.js";
import type { OwnedArtifact, PhaseOutcome } from "../lifecycle/types.js";
import { type Logger, silentLogger } from "../logger.js";
import { createObjectsComponent, type ObjectsConfigInput } from "../objects/objects-component.js";
import type { ObjectStore } from "../objects/store.js";
import {
  Orchestrator,
  type RunOpts,
  type Runnable,
  type WorkflowEntry,
  type WorkflowResult,
} from "../orchestrator/orchestrator.js";
import { createSecretsComponent, type SecretsConfigInput } from "../secrets/secrets-component.js";
import type { SecretsStore } from "../secrets/store.js";
import { createIscsiComponent, descriptorOf, type IscsiComponent } from "../storage/iscsi-component.js";
import type { StorageApplianceClient } from "../storage/types.js";

export const ServerSpecSchema = z.object({
  server_id: z.string().min(1),
  hostname: z.string().min(1),
  version: z.string().min(1).default("stable"),
  zvol_size: z.string().default("500G"),
  bmc_host: z.string().min(1),
  nic: z.string().min(1).optional(),
  initiator_name: z.string().min(1).optional(),
  force: z.boolean().default(false),
  reboot: z.boolean().default(true),
  cleanup_unused: z.boolean().default(false),
  /** Put this device kind first in the BIOS boot order after the NIC is configured. */
  first_boot: z.enum(FIRST_BOOT_DEVICES).optional(),
  /** Clear the iSCSI target on the server's other NICs. */
  exclusive_nic: z.boolean().default(false),
  job_wait_timeout_s: z.number().nonnegative().optional(),
  poll_interval_s: z.number().nonnegative().optional(),
  /** Read-only run: verify and report, write nothing anywhere. */
  check_only: z.boolean().default(false),
});

export type ServerSpec = z.output<typeof ServerSpecSchema>;
export type ServerSpecInput = z.input<typeof ServerSpecSchema>;

export interface IscsiBootDeps {
  appliance: StorageApplianceClient;
  bmc: BmcClient;
  /** Address servers use to reach the iSCSI portal. */
  portal_address: string;
  pool?: string;
  /** Adds an optional object storage entry ahead of the storage work. */
  objects?: { store: ObjectStore; config?: ObjectsConfigInput };
  /** Adds an optional secrets store check. */
  secrets?: { store: SecretsStore; config?: SecretsConfigInput };
  /** Components flush artifacts here; the deployment record lands here too. */
  ledger?: Ledger;
  logger?: Logger;
  idSource?: IdSource;
  clock?: () => Date;
}

export interface IscsiBootResult extends WorkflowResult {
  server_id: string;
  hostname: string;
  target_iqn?: string;
  /** Ledger key of the deployment record. */
  deployment_record?: string;
}

/** Artifact owner for a server, e.g. "r630-02/dumpty". */
export function ownerFor(server: Pick<ServerSpec, "server_id" | "hostname">): string {
  return `r630-${server.server_id}/${server.hostname}`;
}

function phaseSummary(outcome: PhaseOutcome | undefined): string | null {
  if (outcome === undefined) return null;
  return outcome.success ? "ok" : outcome.error_kind;
}

/**
 * Provision storage for one server, point its BMC at the new target, and
 * archive what happened.
 */
export class IscsiBootWorkflow implements Runnable {
  constructor(
    readonly server: ServerSpec,
    readonly orchestrator: Orchestrator,
    private readonly iscsi: IscsiComponent,
    readonly boot: BootComponent,
    private readonly ledger: Ledger | undefined,
    private readonly logger: Logger,
    private readonly clock: () => Date,
  ) {}

  async run(opts: RunOpts = {}): Promise<IscsiBootResult> {
    const checkOnly = opts.checkOnly === true || this.server.check_only;
    const result = await this.orchestrator.run({ ...opts, checkOnly });
    const out: IscsiBootResult = {
      ...result,
      server_id: this.server.server_id,
      hostname: this.server.hostname,
      target_iqn: descriptorOf(this.iscsi)?.iqn,
    };
    if (opts.dryRun || checkOnly || this.ledger === undefined) return out;

    try {
      const { key } = await this.ledger.record(this.deploymentRecord(out));
      out.deployment_record = key;
    } catch (err) {
      this.logger.warn({ err }, "deployment record not stored");
      out.warnings = [...out.warnings, `deployment record could not be stored: ${errorMessageOf(err)}`];
    }
    return out;
  }

  private deploymentRecord(result: IscsiBootResult): OwnedArtifact {
    const owner = ownerFor(this.server);
    const components: Record<string, unknown> = {};
    for (const key of result.order) {
      const report = result.components[key];
      components[key] = {
        success: report.success,
        skipped: report.skipped?.reason ?? null,
        discover: phaseSummary(report.phases.discover),
        process: phaseSummary(report.phases.process),
        housekeep: phaseSummary(report.phases.housekeep),
      };
    }

    return {
      kind: "deployment-record",
      owner,
      content: {
        server_id: this.server.server_id,
        hostname: this.server.hostname,
        version: this.server.version,
        zvol_size: this.server.zvol_size,
        target_iqn: result.target_iqn ?? null,
        success: result.success,
        aborted: result.aborted,
        abort_reason: result.abort_reason ?? null,
        components,
        warnings: result.warnings,
      },
      metadata: {
        owner,
        timestamp: this.clock().toISOString(),
        server_id: this.server.server_id,
        hostname: this.server.hostname,
        version: this.server.version,
        success: result.success,
      },
    };
  }
}

export function buildIscsiBootWorkflow(input: ServerSpecInput, deps: IscsiBootDeps): IscsiBootWorkflow {
  const server = resolveConfig("server", ServerSpecSchema, input);
  const owner = ownerFor(server);
  const clock = deps.clock ?? (() => new Date());
  const logger = (deps.logger ?? silentLogger()).child({
    server_id: server.server_id,
    hostname: server.hostname,
  });
  const readOnly = server.check_only;
  const shared = { logger, idSource: deps.idSource, sink: readOnly ? undefined : deps.ledger, owner };

  const iscsi = createIscsiComponent(
    {
      server_id: server.server_id,
      hostname: server.hostname,
      version: server.version,
      zvol_size: server.zvol_size,
      pool: deps.pool,
      portal_address: deps.portal_address,
      force: server.force,
      cleanup_unused: server.cleanup_unused,
      dry_run: readOnly,
    },
    { client: deps.appliance, ...shared },
  );
  const boot = createBootComponent(
    {
      server_id: server.server_id,
      bmc_host: server.bmc_host,
      nic: server.nic,
      initiator_name: server.initiator_name,
      reboot: server.reboot,
      first_boot: server.first_boot,
      exclusive_nic: server.exclusive_nic,
      job_wait_timeout_s: server.job_wait_timeout_s,
      poll_interval_s: server.poll_interval_s,
      check_only: readOnly,
    },
    { client: deps.bmc, descriptor: () => descriptorOf(iscsi), ...shared },
  );

  const entries: WorkflowEntry[] = [];
  if (deps.secrets) {
    entries.push({
      key: "secrets",
      component: createSecretsComponent(deps.secrets.config ?? {}, { store: deps.secrets.store, ...shared }),
      required: false,
    });
  }
  if (deps.objects) {
    const config = readOnly ? { ...deps.objects.config, metadata_index: false } : (deps.objects.config ?? {});
    entries.push({
      key: "objects",
      component: createObjectsComponent(config, { store: deps.objects.store, clock, ...shared }),
      required: false,
    });
  }
  entries.push({ key: "iscsi", component: iscsi });
  entries.push({ key: "boot", component: boot, deps: ["iscsi"] });

  const orchestrator = new Orchestrator(entries, { name: "iscsi-boot", logger });
  return new IscsiBootWorkflow(server, orchestrator, iscsi, boot, deps.ledger, logger, clock);
}

export interface BootOnlyDeps {
  bmc: BmcClient;
  ledger?: Ledger;
  logger?: Logger;
  idSource?: IdSource;
}

/**
 * Boot configuration alone, for a descriptor known up front (targets file or
 * a reset) or a boot order change. The storage side is assumed to be in place.
 */
export function buildBootOnlyWorkflow(config: BootConfigInput, deps: BootOnlyDeps): Orchestrator {
  const logger = (deps.logger ?? silentLogger()).child({
    server_id: config.server_id,
    bmc_host: config.bmc_host,
  });
  const boot = createBootComponent(config, {
    client: deps.bmc,
    logger,
    idSource: deps.idSource,
    sink: deps.ledger,
    owner: config.server_id === undefined ? config.bmc_host : `r630-${config.server_id}`,
  });
  return new Orchestrator([{ key: "boot", component: boot }], { name: "boot-only", logger });
}
