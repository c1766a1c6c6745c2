import { z } from "zod";
import { ComponentInstance } from "../lifecycle/component.js";
import { resolveConfig } from "../lifecycle/config.js";
import { ComponentError, isRetryableAfterReboot } from "../lifecycle/errors.js";
import type { IdSource } from "../lifecycle/ids.js";
import { sleep } from "../lifecycle/timeout.js";
import type { ArtifactSink, PhaseContext, PhaseHandlers } from "../lifecycle/types.js";
import type { Logger } from "../logger.js";
import {
  type BootTargetDescriptor,
  BootTargetDescriptorSchema,
  parseDescriptor,
} from "../schemas/target.js";
import { type BootPlan, DEFAULT_NIC, planFor, resetPlan } from "./attributes.js";
import { findBootDevice, hasIscsiTarget, withFirst } from "./boot-order.js";
import {
  BootConfigurationStateMachine,
  type BootState,
  type ConfigurationAttempt,
  type ValidationOutcome,
  inferProgress,
  isTerminal,
  pendingGroupOf,
} from "./boot-state-machine.js";
import {
  type AttributeGroup,
  type AttributeValue,
  type BmcClient,
  type BmcSystemInfo,
  type BootDevice,
  type BootOrder,
  FIRST_BOOT_DEVICES,
  type FirstBootDevice,
  type PendingState,
} from "./client.js";

export const BootConfigSchema = z
  .object({
    server_id: z.string().min(1).optional(),
    /** BMC address, for reports only; the client is already bound to it. */
    bmc_host: z.string().min(1),
    nic: z.string().min(1).default(DEFAULT_NIC),
    /** "order" changes only the BIOS boot order and leaves NIC attributes alone. */
    mode: z.enum(["configure", "reset", "order"]).default("configure"),
    /** Known up front for boot-only runs; otherwise supplied by the storage side. */
    descriptor: BootTargetDescriptorSchema.optional(),
    initiator_name: z.string().min(1).optional(),
    initiator_gateway: z.string().min(1).optional(),
    /** Device kind moved to the front of the boot order once the NIC attributes are committed. */
    first_boot: z.enum(FIRST_BOOT_DEVICES).optional(),
    /** Clear the iSCSI target of every other NIC so the boot menu shows one iSCSI device. */
    exclusive_nic: z.boolean().default(false),
    reboot: z.boolean().default(true),
    job_wait_timeout_s: z.number().nonnegative().default(1800),
    poll_interval_s: z.number().nonnegative().default(30),
    check_only: z.boolean().default(false),
    dry_run: z.boolean().default(false),
  })
  .refine((c) => c.mode !== "order" || c.first_boot !== undefined, {
    message: "order mode needs a first boot device",
    path: ["first_boot"],
  });

export type BootConfig = z.output<typeof BootConfigSchema>;
export type BootConfigInput = z.input<typeof BootConfigSchema>;

export interface BootDiscovery {
  system: BmcSystemInfo;
  pending: PendingState;
  attributes: Record<string, AttributeValue | null>;
  boot_devices: BootDevice[];
  boot_order: BootOrder;
  /** Only when the descriptor is known at discovery time. */
  inferred_state?: BootState;
}

/** "planned" is what a dry run would write. */
export type OrderChangeState = "unchanged" | "planned" | "pending" | "committed";

export interface BootOrderChange {
  first_boot: FirstBootDevice;
  device: string;
  before: string[];
  requested: string[];
  state: OrderChangeState;
  job_id?: string;
}

export interface BootProcessing {
  mode: BootConfig["mode"];
  descriptor?: BootTargetDescriptor;
  state: BootState;
  attempts: ConfigurationAttempt[];
  /** Groups still to write when processing stopped, or that a dry run would write. */
  remaining_groups: AttributeGroup[];
  /** Other NICs whose iSCSI target was cleared (or, in a dry run, would be). */
  cleared_nics: string[];
  boot_order?: BootOrderChange;
  requires_reboot: boolean;
  reboots: number;
  dry_run: boolean;
}

export interface BootHousekeeping {
  state: BootState;
  outcome?: ValidationOutcome;
  validated: boolean;
  boot_device?: BootDevice;
  /** Set when a first boot device was requested. */
  boot_order_verified?: boolean;
  /** Other NICs still naming an iSCSI target, when exclusive_nic is set. */
  other_iscsi_nics?: string[];
  requires_reboot: boolean;
  pending_job_ids: string[];
  warnings: string[];
}

export type BootComponent = ComponentInstance<
  BootConfig,
  BootDiscovery,
  BootProcessing,
  BootHousekeeping
>;

export interface BootComponentDeps {
  client: BmcClient;
  /** Called at process time when the config carries no descriptor. */
  descriptor?: () => BootTargetDescriptor | undefined;
  logger?: Logger;
  idSource?: IdSource;
  sink?: ArtifactSink;
  owner?: string;
}

type AttributeCheck = Omit<BootHousekeeping, "boot_order_verified" | "other_iscsi_nics">;

class BootHandlers
  implements PhaseHandlers<BootConfig, BootDiscovery, BootProcessing, BootHousekeeping>
{
  private machine?: BootConfigurationStateMachine;
  private descriptor?: BootTargetDescriptor;

  constructor(
    private readonly client: BmcClient,
    private readonly descriptorSource?: () => BootTargetDescriptor | undefined,
  ) {}

  async discover(ctx: PhaseContext<BootConfig>): Promise<BootDiscovery> {
    const system = await this.client.systemInfo();
    ctx.logger.info(
      { bmc: ctx.config.bmc_host, model: system.model, power_state: system.power_state },
      "connected to BMC",
    );
    const pending = await this.client.readPendingState();
    if (pending.pending) {
      ctx.logger.warn({ job_ids: pending.job_ids }, "BMC has pending configuration jobs");
    }
    const attributes = await this.client.readAttributes(ctx.config.nic);
    const boot_devices = await this.client.readBootDevices();
    const boot_order = await this.client.readBootOrder();
    ctx.logger.debug({ boot_mode: boot_order.boot_mode, order: boot_order.order }, "current boot order");

    const plan = this.planOf(ctx, false);
    return {
      system,
      pending,
      attributes,
      boot_devices,
      boot_order,
      inferred_state: plan && inferProgress(plan, attributes),
    };
  }

  async process(
    ctx: PhaseContext<BootConfig>,
    discovery: BootDiscovery,
  ): Promise<BootProcessing> {
    const { config } = ctx;
    const dryRun = config.dry_run || config.check_only;
    let machine: BootConfigurationStateMachine | undefined;
    let reboots = 0;

    if (config.mode !== "order") {
      const plan = this.planOf(ctx, true);
      if (plan === undefined) {
        throw new ComponentError("CONFIGURATION", "no boot target descriptor to configure", {
          component: ctx.name,
        });
      }
      machine = this.createMachine(ctx, plan, discovery.attributes);
      if (dryRun) {
        ctx.logger.info(
          { state: machine.state, remaining: this.remaining(machine) },
          "dry run: no attributes written",
        );
      } else {
        reboots += await this.writeGroups(ctx, machine);
      }
    }

    const cleared_nics: string[] = [];
    let boot_order: BootOrderChange | undefined;
    let staged = false;
    if (machine?.requiresReboot) {
      if (config.exclusive_nic || config.first_boot !== undefined) {
        ctx.logger.warn("boot order and other NICs left alone until the NIC attributes commit");
      }
    } else {
      if (config.exclusive_nic && config.mode === "configure") {
        const cleared = await this.clearOtherNics(ctx, dryRun);
        cleared_nics.push(...cleared.nics);
        staged = cleared.pending;
      }
      if (config.first_boot !== undefined) {
        boot_order = await this.moveToFront(ctx, config.first_boot, dryRun);
        staged = staged || boot_order.state === "pending";
      }
    }

    if (staged) {
      if (config.reboot) {
        await this.rebootAndWait(ctx, async () => !(await this.client.readPendingState()).pending);
        reboots++;
        staged = false;
        if (boot_order?.state === "pending") boot_order.state = "committed";
      } else {
        ctx.logger.warn("boot order or NIC changes staged; they apply on the next reboot");
      }
    }

    return {
      mode: config.mode,
      descriptor: this.descriptor,
      state: machine?.state ?? "Unconfigured",
      attempts: machine ? [...machine.attempts] : [],
      remaining_groups: machine ? this.remaining(machine) : [],
      cleared_nics,
      boot_order,
      requires_reboot: (machine?.requiresReboot ?? false) || staged,
      reboots,
      dry_run: dryRun,
    };
  }

  async housekeep(
    ctx: PhaseContext<BootConfig>,
    discovery: BootDiscovery | undefined,
  ): Promise<BootHousekeeping> {
    const { config } = ctx;
    const pending = await this.client.readPendingState();
    const { check, failure } = await this.checkAttributes(ctx, discovery, pending);
    const result: BootHousekeeping = { ...check, warnings: [...check.warnings] };

    if (config.first_boot !== undefined) {
      const verdict = await this.verifyBootOrder(config.first_boot);
      result.boot_order_verified = verdict.verified;
      if (verdict.warning !== undefined) result.warnings.push(verdict.warning);
    }
    if (config.exclusive_nic && config.mode === "configure") {
      const others = await this.otherIscsiNics(ctx);
      result.other_iscsi_nics = others;
      for (const nic of others) result.warnings.push(`${nic} still names an iSCSI target`);
    }
    for (const warning of result.warnings.slice(check.warnings.length)) ctx.logger.warn(warning);

    this.record(ctx, result);
    if (failure !== undefined) throw failure;
    return result;
  }

  /** Read-back of the NIC attributes, validating the boot device once every group is committed. */
  private async checkAttributes(
    ctx: PhaseContext<BootConfig>,
    discovery: BootDiscovery | undefined,
    pending: PendingState,
  ): Promise<{ check: AttributeCheck; failure?: unknown }> {
    const { config } = ctx;
    const warnings: string[] = [];
    const plan = this.planOf(ctx, false);

    if (config.mode !== "configure" || plan === undefined || this.descriptor === undefined) {
      if (config.mode === "configure") warnings.push("no boot target descriptor; validation skipped");
      return {
        check: {
          state: this.machine?.state ?? "Unconfigured",
          validated: false,
          requires_reboot: pending.pending,
          pending_job_ids: pending.job_ids,
          warnings,
        },
      };
    }

    const attributes = discovery?.attributes ?? (await this.client.readAttributes(config.nic));
    const machine = this.machine ?? this.createMachine(ctx, plan, attributes);
    const iqn = this.descriptor.iqn;

    if (machine.nextGroup() !== null || machine.requiresReboot || isTerminal(machine.state)) {
      const report = await machine.inspect(iqn);
      if (!isTerminal(machine.state)) {
        warnings.push(`boot configuration incomplete at ${machine.state}`);
      }
      warnings.push(...report.warnings);
      for (const warning of warnings) ctx.logger.warn(warning);
      return {
        check: {
          state: machine.state,
          validated: false,
          boot_device: report.boot_device,
          requires_reboot: pending.pending,
          pending_job_ids: pending.job_ids,
          warnings,
        },
      };
    }

    let failure: unknown;
    let device: BootDevice | undefined;
    try {
      device = (await machine.validate(iqn)).boot_device;
    } catch (err) {
      failure = err;
    }
    warnings.push(...machine.warnings);
    const state = machine.state;
    const outcome =
      state === "Validated" || state === "FallbackToNetworkBoot" || state === "Failed"
        ? state
        : undefined;
    return {
      check: {
        state,
        outcome,
        validated: outcome === "Validated" || outcome === "FallbackToNetworkBoot",
        boot_device: device,
        requires_reboot: pending.pending,
        pending_job_ids: pending.job_ids,
        warnings,
      },
      failure,
    };
  }

  /** Write every remaining group, rebooting to commit each when allowed. Returns the reboot count. */
  private async writeGroups(
    ctx: PhaseContext<BootConfig>,
    machine: BootConfigurationStateMachine,
  ): Promise<number> {
    const { config } = ctx;
    let reboots = 0;
    for (let group = machine.nextGroup(); group !== null; group = machine.nextGroup()) {
      try {
        await machine.write([group]);
      } catch (err) {
        if (!isRetryableAfterReboot(err) || !config.reboot) throw err;
        ctx.logger.warn({ group }, "pending job blocks the write; rebooting to commit it first");
        await this.rebootAndWait(ctx, async () => !(await this.client.readPendingState()).pending);
        reboots++;
        await machine.write([group]);
      }

      if (machine.requiresReboot) {
        if (!config.reboot) {
          ctx.logger.warn(
            { group, state: machine.state },
            "reboot required to commit attributes; rerun after rebooting",
          );
          break;
        }
        await this.rebootAndWait(ctx, () => machine.confirmReboot());
        reboots++;
      }
    }

    if (machine.complete) {
      ctx.logger.info({ state: machine.state, reboots }, "boot attributes committed");
    }
    return reboots;
  }

  /** NICs other than the configured one that name an iSCSI target. */
  private async otherIscsiNics(ctx: PhaseContext<BootConfig>): Promise<string[]> {
    const others: string[] = [];
    for (const nic of await this.client.listNics()) {
      if (nic === ctx.config.nic) continue;
      if (hasIscsiTarget(await this.client.readAttributes(nic))) others.push(nic);
    }
    return others;
  }

  private async clearOtherNics(
    ctx: PhaseContext<BootConfig>,
    dryRun: boolean,
  ): Promise<{ nics: string[]; pending: boolean }> {
    const nics = await this.otherIscsiNics(ctx);
    if (dryRun || nics.length === 0) {
      if (nics.length > 0) ctx.logger.info({ nics }, "dry run: other iSCSI NICs left alone");
      return { nics, pending: false };
    }

    const values = resetPlan().target ?? {};
    let pending = false;
    for (const nic of nics) {
      const result = await this.client.writeAttributeGroup(nic, "target", values);
      if (result.state === "rejected") {
        throw new ComponentError(result.error_kind, `clearing the iSCSI target of ${nic} was rejected: ${result.message}`, {
          group: "target",
        });
      }
      pending = pending || result.state === "pending";
      ctx.logger.info({ nic, state: result.state }, "iSCSI target cleared on other NIC");
    }
    return { nics, pending };
  }

  private async moveToFront(
    ctx: PhaseContext<BootConfig>,
    kind: FirstBootDevice,
    dryRun: boolean,
  ): Promise<BootOrderChange> {
    const device = findBootDevice(await this.client.readBootDevices(), kind);
    if (device === undefined) {
      throw new ComponentError("VALIDATION_FAILED", `no ${kind} boot device to put first`, {
        component: ctx.name,
      });
    }
    const { order: before } = await this.client.readBootOrder();
    const requested = withFirst(before, device.id);
    const change: BootOrderChange = {
      first_boot: kind,
      device: device.id,
      before,
      requested,
      state: "unchanged",
    };
    if (before[0] === device.id) return change;
    if (dryRun) {
      ctx.logger.info({ device: device.id, requested }, "dry run: boot order left alone");
      return { ...change, state: "planned" };
    }

    const result = await this.client.setBootOrder(requested);
    if (result.state === "rejected") {
      throw new ComponentError(result.error_kind, `boot order rejected: ${result.message}`, {
        order: requested,
      });
    }
    ctx.logger.info({ device: device.id, state: result.state, job_id: result.job_id }, "boot order changed");
    return { ...change, state: result.state, job_id: result.job_id };
  }

  private async verifyBootOrder(
    kind: FirstBootDevice,
  ): Promise<{ verified: boolean; warning?: string }> {
    const device = findBootDevice(await this.client.readBootDevices(), kind);
    if (device === undefined) {
      return { verified: false, warning: `no ${kind} boot device present` };
    }
    const { order } = await this.client.readBootOrder();
    if (order[0] === device.id) return { verified: true };
    return {
      verified: false,
      warning: `boot order starts with ${order[0] ?? "nothing"}, not ${device.id} (${kind})`,
    };
  }

  private planOf(ctx: PhaseContext<BootConfig>, resolve: boolean): BootPlan | undefined {
    if (ctx.config.mode === "order") return undefined;
    if (ctx.config.mode === "reset") return resetPlan();
    if (this.descriptor === undefined) {
      const source = ctx.config.descriptor ?? (resolve ? this.descriptorSource?.() : undefined);
      // re-validated: a descriptor from the storage side has not been through the config schema
      if (source !== undefined) this.descriptor = parseDescriptor(source);
    }
    return this.descriptor && planFor(this.descriptor, ctx.config);
  }

  private createMachine(
    ctx: PhaseContext<BootConfig>,
    plan: BootPlan,
    attributes: Record<string, AttributeValue | null>,
  ): BootConfigurationStateMachine {
    const machine = new BootConfigurationStateMachine(this.client, ctx.config.nic, plan, {
      logger: ctx.logger,
    });
    const inferred = inferProgress(plan, attributes);
    if (inferred !== "Unconfigured") machine.resume(inferred);
    this.machine = machine;
    return machine;
  }

  /** Planned groups not yet committed, the one awaiting a reboot included. */
  private remaining(machine: BootConfigurationStateMachine): AttributeGroup[] {
    const from = pendingGroupOf(machine.state) ?? machine.nextGroup();
    if (from === null) return [];
    const groups = machine.groups;
    return groups.slice(groups.indexOf(from));
  }

  /** Reboot, then poll until `committed` answers true or the job wait timeout passes. */
  private async rebootAndWait(
    ctx: PhaseContext<BootConfig>,
    committed: () => Promise<boolean>,
  ): Promise<void> {
    const { reset_type } = await this.client.triggerReboot();
    ctx.logger.info({ reset_type }, "reboot requested");
    const deadline = Date.now() + ctx.config.job_wait_timeout_s * 1000;
    for (;;) {
      await sleep(ctx.config.poll_interval_s * 1000);
      if (await committed()) return;
      if (Date.now() >= deadline) {
        throw new ComponentError(
          "TIMEOUT",
          `configuration job still pending after ${ctx.config.job_wait_timeout_s}s`,
          { component: ctx.name },
        );
      }
    }
  }

  private record(ctx: PhaseContext<BootConfig>, result: BootHousekeeping): void {
    if (ctx.config.dry_run || ctx.config.check_only) return;
    ctx.addArtifact({
      kind: "boot-configuration",
      content: {
        server_id: ctx.config.server_id ?? null,
        bmc_host: ctx.config.bmc_host,
        nic: ctx.config.nic,
        mode: ctx.config.mode,
        target_iqn: this.descriptor?.iqn ?? null,
        state: result.state,
        outcome: result.outcome ?? null,
        boot_device: result.boot_device?.id ?? null,
        first_boot: ctx.config.first_boot ?? null,
        boot_order_verified: result.boot_order_verified ?? null,
        attempts: this.machine ? [...this.machine.attempts] : [],
        warnings: result.warnings,
      },
    });
  }
}

export function createBootComponent(input: BootConfigInput, deps: BootComponentDeps): BootComponent {
  return new ComponentInstance<BootConfig, BootDiscovery, BootProcessing, BootHousekeeping>({
    name: "boot",
    config: resolveConfig("boot", BootConfigSchema, input),
    handlers: new BootHandlers(deps.client, deps.descriptor),
    logger: deps.logger,
    idSource: deps.idSource,
    sink: deps.sink,
    owner: deps.owner,
  });
}
