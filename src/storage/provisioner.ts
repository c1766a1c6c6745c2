import { type Logger, silentLogger } from "../logger.js";
import {
  ComponentError,
  type ProvisioningStep,
  errorMessageOf,
  isComponentError,
} from "../lifecycle/errors.js";
import type { BootTargetDescriptor } from "../schemas/target.js";
import { DEFAULT_LUN, ISCSI_PORT, type ResourceNames } from "./naming.js";
import type { Association, ResourceRef, StorageApplianceClient } from "./types.js";

export const PROVISIONING_STEPS: readonly ProvisioningStep[] = [
  "volume",
  "extent",
  "target",
  "association",
];

export interface ProvisionRequest {
  names: ResourceNames;
  size_bytes: number;
  /** Address initiators use to reach the appliance's iSCSI portal. */
  portal_address: string;
  hostname: string;
  /** Destroy existing resources and recreate them. Off by default. */
  force?: boolean;
  /** Query only; report what would be created. */
  dry_run?: boolean;
  lun?: number;
  portal_group?: number;
  initiator_group?: number;
}

export interface StepReport {
  step: ProvisioningStep;
  existed: boolean;
  created: boolean;
  destroyed: boolean;
  id?: string;
}

export interface ProvisionResult {
  descriptor: BootTargetDescriptor;
  steps: StepReport[];
  /** Steps whose resource did not exist when queried. */
  missing_steps: ProvisioningStep[];
  /** Some, but not all, resources already existed. */
  partial: boolean;
  dry_run: boolean;
  volume?: ResourceRef;
  extent?: ResourceRef;
  target?: ResourceRef;
  association?: Association;
}

interface Existing {
  volume?: ResourceRef;
  extent?: ResourceRef;
  target?: ResourceRef;
  association?: Association;
}

/**
 * Create-or-reuse engine for the volume → extent → target → association chain.
 *
 * Every step is queried by its deterministic name first. Existing resources are
 * reused unless force is set; only missing steps are created.
 */
export class IdempotentProvisioner {
  private logger: Logger;

  constructor(
    private readonly client: StorageApplianceClient,
    logger?: Logger,
  ) {
    this.logger = logger ?? silentLogger();
  }

  /** Read-only existence check for every step. */
  async inventory(names: ResourceNames): Promise<Existing> {
    const volume = await this.client.queryByName("volume", names.volume);
    const extent = await this.client.queryByName("extent", names.extent);
    const target = await this.client.queryByName("target", names.iqn);
    const association =
      target && extent ? await this.client.queryAssociation(target.id, extent.id) : undefined;
    return { volume, extent, target, association };
  }

  async provision(req: ProvisionRequest): Promise<ProvisionResult> {
    const lun = req.lun ?? DEFAULT_LUN;
    const existing = await this.inventory(req.names);
    const missing = PROVISIONING_STEPS.filter((step) => existing[step] === undefined);
    const partial = missing.length > 0 && missing.length < PROVISIONING_STEPS.length;

    if (partial) {
      this.logger.warn(
        { missing_steps: missing },
        "partial provisioning detected; completing missing steps only",
      );
    }

    const reports = new Map<ProvisioningStep, StepReport>(
      PROVISIONING_STEPS.map((step) => [
        step,
        {
          step,
          existed: existing[step] !== undefined,
          created: false,
          destroyed: false,
          id: existing[step]?.id,
        },
      ]),
    );

    const descriptor: BootTargetDescriptor = {
      iqn: req.names.iqn,
      portal_address: req.portal_address,
      port: ISCSI_PORT,
      lun,
    };

    if (req.dry_run) {
      for (const step of req.force ? PROVISIONING_STEPS : missing) {
        this.logger.info({ step }, "dry run: would create");
      }
      return {
        descriptor,
        steps: [...reports.values()],
        missing_steps: missing,
        partial,
        dry_run: true,
        ...existing,
      };
    }

    const reuse: Existing = req.force ? {} : existing;
    if (req.force) {
      await this.destroyExisting(existing, reports);
    }

    const volume =
      reuse.volume ??
      (await this.create("volume", reports, () =>
        this.client.createVolume(req.names.volume, req.size_bytes),
      ));
    const extent =
      reuse.extent ??
      (await this.create("extent", reports, () =>
        this.client.createExport(volume, {
          name: req.names.extent,
          comment: `OpenShift ${req.hostname} boot image`,
        }),
      ));
    const target =
      reuse.target ??
      (await this.create("target", reports, () =>
        this.client.createTarget(req.names.iqn, {
          alias: `OpenShift ${req.hostname}`,
          portal_group: req.portal_group ?? 1,
          initiator_group: req.initiator_group ?? 1,
        }),
      ));
    const association =
      reuse.association ??
      (await this.create("association", reports, () =>
        this.client.associate(target, extent, lun),
      ));

    return {
      descriptor,
      steps: [...reports.values()],
      missing_steps: missing,
      partial,
      dry_run: false,
      volume,
      extent,
      target,
      association,
    };
  }

  /** Destroy in reverse dependency order. A failed destroy is RESOURCE_EXISTS for that step. */
  private async destroyExisting(
    existing: Existing,
    reports: Map<ProvisioningStep, StepReport>,
  ): Promise<void> {
    for (const step of [...PROVISIONING_STEPS].reverse()) {
      const resource = existing[step];
      if (!resource) continue;
      try {
        await this.client.destroy(step, resource.id);
      } catch (err) {
        throw new ComponentError(
          "RESOURCE_EXISTS",
          `${step} ${resource.id} exists and could not be destroyed: ${errorMessageOf(err)}`,
          { step, cause: err },
        );
      }
      this.logger.warn({ step, id: resource.id }, "destroyed existing resource (force)");
      const report = reports.get(step);
      if (report) report.destroyed = true;
    }
  }

  private async create<T extends { id: string }>(
    step: ProvisioningStep,
    reports: Map<ProvisioningStep, StepReport>,
    fn: () => Promise<T>,
  ): Promise<T> {
    let created: T;
    try {
      created = await fn();
    } catch (err) {
      if (isComponentError(err) && err.code === "PROVISIONING_STEP_FAILED" && err.details?.step === step) {
        throw err;
      }
      throw new ComponentError(
        "PROVISIONING_STEP_FAILED",
        `${step} creation failed: ${errorMessageOf(err)}`,
        { step, cause: err },
      );
    }
    this.logger.info({ step, id: created.id }, "created");
    const report = reports.get(step);
    if (report) {
      report.created = true;
      report.id = created.id;
    }
    return created;
  }
}
