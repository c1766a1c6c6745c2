import { z } from "zod";
import { ComponentInstance } from "../lifecycle/component.js";
import { resolveConfig } from "../lifecycle/config.js";
import { ComponentError, errorMessageOf } from "../lifecycle/errors.js";
import type { IdSource } from "../lifecycle/ids.js";
import type { ArtifactSink, PhaseContext, PhaseHandlers } from "../lifecycle/types.js";
import type { Logger } from "../logger.js";
import type { BootTargetDescriptor } from "../schemas/target.js";
import { type ResourceNames, resourceNames } from "./naming.js";
import {
  IdempotentProvisioner,
  PROVISIONING_STEPS,
  type ProvisionResult,
} from "./provisioner.js";
import { formatGiB, parseSize } from "./size.js";
import type {
  ApplianceInfo,
  Association,
  PoolInfo,
  ResourceRef,
  StorageApplianceClient,
} from "./types.js";

export const IscsiConfigSchema = z.object({
  server_id: z.string().min(1).optional(),
  hostname: z.string().min(1),
  version: z.string().min(1).default("stable"),
  zvol_size: z.string().default("500G"),
  pool: z.string().min(1).default("test"),
  /** Address servers use to reach the iSCSI portal. */
  portal_address: z.string().min(1),
  force: z.boolean().default(false),
  dry_run: z.boolean().default(false),
  /** Delete extents and targets that no association references. */
  cleanup_unused: z.boolean().default(false),
  portal_group: z.number().int().positive().default(1),
  initiator_group: z.number().int().positive().default(1),
});

export type IscsiConfig = z.output<typeof IscsiConfigSchema>;
export type IscsiConfigInput = z.input<typeof IscsiConfigSchema>;

export interface CapacityCheck {
  pool: string;
  free_bytes: number;
  required_bytes: number;
  sufficient: boolean;
}

export interface IscsiDiscovery {
  appliance: ApplianceInfo;
  service_running: boolean;
  names: ResourceNames;
  pools: PoolInfo[];
  volumes: ResourceRef[];
  extents: ResourceRef[];
  targets: ResourceRef[];
  associations: Association[];
  /** undefined when the configured pool does not exist */
  capacity?: CapacityCheck;
  existing: Record<(typeof PROVISIONING_STEPS)[number], boolean>;
}

export interface IscsiProcessing extends ProvisionResult {
  service_started: boolean;
}

export interface IscsiHousekeeping {
  verified: Record<(typeof PROVISIONING_STEPS)[number], boolean>;
  all_verified: boolean;
  service_running: boolean;
  unused_extents: string[];
  unused_targets: string[];
  removed: string[];
  warnings: string[];
}

export type IscsiComponent = ComponentInstance<
  IscsiConfig,
  IscsiDiscovery,
  IscsiProcessing,
  IscsiHousekeeping
>;

export interface IscsiComponentDeps {
  client: StorageApplianceClient;
  logger?: Logger;
  idSource?: IdSource;
  sink?: ArtifactSink;
  owner?: string;
}

class IscsiHandlers
  implements PhaseHandlers<IscsiConfig, IscsiDiscovery, IscsiProcessing, IscsiHousekeeping>
{
  constructor(private readonly client: StorageApplianceClient) {}

  private names(ctx: PhaseContext<IscsiConfig>): ResourceNames {
    const { server_id, version, pool } = ctx.config;
    if (server_id === undefined) {
      ctx.logger.warn("no server_id configured; resource names will use \"unknown\"");
    }
    return resourceNames(server_id ?? "unknown", version, pool);
  }

  async discover(ctx: PhaseContext<IscsiConfig>): Promise<IscsiDiscovery> {
    const appliance = await this.client.systemInfo();
    ctx.logger.info({ hostname: appliance.hostname, version: appliance.version }, "connected to appliance");

    const names = this.names(ctx);
    const service_running = await this.client.iscsiServiceRunning();
    const pools = await this.client.listPools();
    const volumes = await this.client.list("volume");
    const extents = await this.client.list("extent");
    const targets = await this.client.list("target");
    const associations = await this.client.listAssociations();

    const required_bytes = parseSize(ctx.config.zvol_size);
    const pool = pools.find((p) => p.name === ctx.config.pool);
    const capacity = pool && {
      pool: pool.name,
      free_bytes: pool.free_bytes,
      required_bytes,
      sufficient: pool.free_bytes >= required_bytes,
    };
    if (!pool) {
      ctx.logger.warn({ pool: ctx.config.pool }, "configured pool not found");
    } else if (capacity && !capacity.sufficient) {
      ctx.logger.warn(
        { free: formatGiB(pool.free_bytes), required: formatGiB(required_bytes) },
        "pool has insufficient free space",
      );
    }

    const volume = volumes.find((v) => v.name === names.volume);
    const extent = extents.find((e) => e.name === names.extent);
    const target = targets.find((t) => t.name === names.iqn);
    const association =
      volume !== undefined &&
      extent !== undefined &&
      target !== undefined &&
      associations.some((a) => a.target_id === target.id && a.extent_id === extent.id);

    return {
      appliance,
      service_running,
      names,
      pools,
      volumes,
      extents,
      targets,
      associations,
      capacity,
      existing: {
        volume: volume !== undefined,
        extent: extent !== undefined,
        target: target !== undefined,
        association,
      },
    };
  }

  async process(
    ctx: PhaseContext<IscsiConfig>,
    discovery: IscsiDiscovery,
  ): Promise<IscsiProcessing> {
    const { config } = ctx;
    const needsVolume = !config.dry_run && (config.force || !discovery.existing.volume);
    if (needsVolume && discovery.capacity === undefined) {
      throw new ComponentError(
        "PROVISIONING_STEP_FAILED",
        `volume creation failed: pool "${config.pool}" not found`,
        { step: "volume" },
      );
    }
    if (needsVolume && discovery.capacity && !discovery.capacity.sufficient) {
      throw new ComponentError(
        "PROVISIONING_STEP_FAILED",
        `volume creation failed: pool "${config.pool}" has ${formatGiB(discovery.capacity.free_bytes)} free, ${formatGiB(discovery.capacity.required_bytes)} required`,
        { step: "volume" },
      );
    }

    const provisioner = new IdempotentProvisioner(this.client, ctx.logger);
    const result = await provisioner.provision({
      names: discovery.names,
      size_bytes: parseSize(config.zvol_size),
      portal_address: config.portal_address,
      hostname: config.hostname,
      force: config.force,
      dry_run: config.dry_run,
      portal_group: config.portal_group,
      initiator_group: config.initiator_group,
    });

    let service_started = false;
    if (!config.dry_run && !(await this.client.iscsiServiceRunning())) {
      try {
        await this.client.startIscsiService();
        service_started = true;
      } catch (err) {
        ctx.logger.warn({ err: errorMessageOf(err) }, "could not start iSCSI service");
      }
    }

    if (!config.dry_run) {
      ctx.addArtifact({
        kind: "iscsi-resources",
        content: {
          server_id: discovery.names.server_id,
          hostname: config.hostname,
          version: discovery.names.version,
          descriptor: result.descriptor,
          names: discovery.names,
          steps: result.steps,
        },
      });
    }

    return { ...result, service_started };
  }

  async housekeep(ctx: PhaseContext<IscsiConfig>): Promise<IscsiHousekeeping> {
    const names = this.names(ctx);
    const provisioner = new IdempotentProvisioner(this.client, ctx.logger);
    const current = await provisioner.inventory(names);
    const warnings: string[] = [];

    const verified = {
      volume: current.volume !== undefined,
      extent: current.extent !== undefined,
      target: current.target !== undefined,
      association: current.association !== undefined,
    };
    for (const step of PROVISIONING_STEPS) {
      if (!verified[step]) warnings.push(`${step} not found on appliance`);
    }

    const service_running = await this.client.iscsiServiceRunning();
    if (!service_running) warnings.push("iSCSI service is not running");

    const associations = await this.client.listAssociations();
    const extentsInUse = new Set(associations.map((a) => a.extent_id));
    const targetsInUse = new Set(associations.map((a) => a.target_id));
    const unusedExtents = (await this.client.list("extent")).filter((e) => !extentsInUse.has(e.id));
    const unusedTargets = (await this.client.list("target")).filter((t) => !targetsInUse.has(t.id));

    const removed: string[] = [];
    if (ctx.config.cleanup_unused && !ctx.config.dry_run) {
      for (const resource of [...unusedExtents, ...unusedTargets]) {
        try {
          await this.client.destroy(resource.kind, resource.id);
          removed.push(resource.name);
        } catch (err) {
          warnings.push(`could not delete unused ${resource.kind} ${resource.name}: ${errorMessageOf(err)}`);
        }
      }
    }

    for (const warning of warnings) ctx.logger.warn(warning);

    return {
      verified,
      all_verified: Object.values(verified).every(Boolean),
      service_running,
      unused_extents: unusedExtents.map((e) => e.name),
      unused_targets: unusedTargets.map((t) => t.name),
      removed,
      warnings,
    };
  }
}

export function createIscsiComponent(
  input: IscsiConfigInput,
  deps: IscsiComponentDeps,
): IscsiComponent {
  return new ComponentInstance<IscsiConfig, IscsiDiscovery, IscsiProcessing, IscsiHousekeeping>({
    name: "iscsi",
    config: resolveConfig("iscsi", IscsiConfigSchema, input),
    handlers: new IscsiHandlers(deps.client),
    logger: deps.logger,
    idSource: deps.idSource,
    sink: deps.sink,
    owner: deps.owner,
  });
}

/** Descriptor produced by a processed iSCSI component, if any. */
export function descriptorOf(component: IscsiComponent): BootTargetDescriptor | undefined {
  return component.processingResult?.descriptor;
}
