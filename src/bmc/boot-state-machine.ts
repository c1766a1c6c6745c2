import { ComponentError } from "../lifecycle/errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { type BootPlan, redact } from "./attributes.js";
import {
  ATTRIBUTE_GROUPS,
  type AttributeGroup,
  type AttributeValue,
  type AttributeValues,
  type BmcClient,
  type BootDevice,
} from "./client.js";

export const BOOT_STATES = [
  "Unconfigured",
  "NetworkParamsPending",
  "NetworkParamsCommitted",
  "TargetParamsPending",
  "TargetParamsCommitted",
  "AuthParamsPending",
  "AuthParamsCommitted",
  "Validated",
  "FallbackToNetworkBoot",
  "Failed",
] as const;

export type BootState = (typeof BOOT_STATES)[number];

export type ValidationOutcome = Extract<BootState, "Validated" | "FallbackToNetworkBoot" | "Failed">;

/** Every legal move. Anything else is INVALID_TRANSITION. */
export const TRANSITIONS: Readonly<Record<BootState, readonly BootState[]>> = {
  Unconfigured: ["NetworkParamsPending", "NetworkParamsCommitted"],
  NetworkParamsPending: ["NetworkParamsCommitted"],
  NetworkParamsCommitted: ["TargetParamsPending", "TargetParamsCommitted"],
  TargetParamsPending: ["TargetParamsCommitted"],
  TargetParamsCommitted: [
    "AuthParamsPending",
    "AuthParamsCommitted",
    "Validated",
    "FallbackToNetworkBoot",
    "Failed",
  ],
  AuthParamsPending: ["AuthParamsCommitted"],
  AuthParamsCommitted: ["Validated", "FallbackToNetworkBoot", "Failed"],
  Validated: [],
  FallbackToNetworkBoot: [],
  Failed: [],
};

const PENDING_STATE: Record<AttributeGroup, BootState> = {
  network: "NetworkParamsPending",
  target: "TargetParamsPending",
  auth: "AuthParamsPending",
};

const COMMITTED_STATE: Record<AttributeGroup, BootState> = {
  network: "NetworkParamsCommitted",
  target: "TargetParamsCommitted",
  auth: "AuthParamsCommitted",
};

export type AppliedState = "Pending" | "Committed" | "Rejected";

export interface ConfigurationAttempt {
  attribute_group: AttributeGroup;
  /** Secrets masked. */
  requested_values: AttributeValues;
  applied_state: AppliedState;
  requires_reboot: boolean;
  job_id?: string;
  message?: string;
  at: string;
}

export interface ValidationReport {
  outcome: ValidationOutcome;
  boot_device?: BootDevice;
  warnings: string[];
  attributes: Record<string, AttributeValue | null>;
}

export function pendingGroupOf(state: BootState): AttributeGroup | undefined {
  return ATTRIBUTE_GROUPS.find((g) => PENDING_STATE[g] === state);
}

export function committedGroupOf(state: BootState): AttributeGroup | undefined {
  return ATTRIBUTE_GROUPS.find((g) => COMMITTED_STATE[g] === state);
}

export function isTerminal(state: BootState): boolean {
  return TRANSITIONS[state].length === 0;
}

/**
 * Progress already on the BMC: the last planned group, in order, whose values all read
 * back as requested. Unconfigured when the first group differs.
 */
export function inferProgress(
  plan: BootPlan,
  attributes: Record<string, AttributeValue | null>,
): BootState {
  let state: BootState = "Unconfigured";
  for (const group of ATTRIBUTE_GROUPS) {
    const values = plan[group];
    if (values === undefined) continue;
    const applied = Object.entries(values).every(([k, v]) => attributes[k] === v);
    if (!applied) break;
    state = COMMITTED_STATE[group];
  }
  return state;
}

const ISCSI_WORDS = /iscsi/i;
const NETWORK_BOOT_WORDS = /pxe|network/i;

function describes(device: BootDevice, pattern: RegExp | string): boolean {
  const text = `${device.display_name} ${device.path ?? ""}`;
  return typeof pattern === "string" ? text.includes(pattern) : pattern.test(text);
}

/**
 * Pick the device a server would boot the target from: one naming the IQN, then any
 * iSCSI device, then a generic network-boot device as the fallback.
 */
export function classifyBootDevices(
  devices: readonly BootDevice[],
  expectedIqn: string,
): { outcome: ValidationOutcome; device?: BootDevice } {
  const explicit =
    devices.find((d) => describes(d, expectedIqn)) ?? devices.find((d) => describes(d, ISCSI_WORDS));
  if (explicit) return { outcome: "Validated", device: explicit };
  const fallback = devices.find((d) => describes(d, NETWORK_BOOT_WORDS));
  if (fallback) return { outcome: "FallbackToNetworkBoot", device: fallback };
  return { outcome: "Failed" };
}

export interface StateMachineOpts {
  logger?: Logger;
  clock?: () => Date;
}

/**
 * Drives the NIC boot attributes of one server through network, target and (with CHAP)
 * auth groups. One group per write; a pending BMC job blocks every write until a reboot
 * commits it.
 */
export class BootConfigurationStateMachine {
  private current: BootState = "Unconfigured";
  private readonly history: ConfigurationAttempt[] = [];
  private readonly softWarnings: string[] = [];
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(
    private readonly client: BmcClient,
    private readonly nic: string,
    private readonly plan: BootPlan,
    opts: StateMachineOpts = {},
  ) {
    this.logger = opts.logger ?? silentLogger();
    this.clock = opts.clock ?? (() => new Date());
  }

  get state(): BootState {
    return this.current;
  }

  get attempts(): readonly ConfigurationAttempt[] {
    return this.history;
  }

  get warnings(): readonly string[] {
    return this.softWarnings;
  }

  get requiresReboot(): boolean {
    return pendingGroupOf(this.current) !== undefined;
  }

  /** Groups the plan writes, in order. */
  get groups(): AttributeGroup[] {
    return ATTRIBUTE_GROUPS.filter((g) => this.plan[g] !== undefined);
  }

  /** True once every planned group is committed. */
  get complete(): boolean {
    return this.nextGroup() === null && !this.requiresReboot && this.current !== "Unconfigured";
  }

  /** The next group to write, or null when nothing can be written from this state. */
  nextGroup(): AttributeGroup | null {
    if (this.requiresReboot || isTerminal(this.current)) return null;
    const groups = this.groups;
    const committed = committedGroupOf(this.current);
    const index = committed === undefined ? 0 : groups.indexOf(committed) + 1;
    return groups[index] ?? null;
  }

  /** Seed from progress inferred elsewhere (e.g. attribute read-back). */
  resume(state: BootState): void {
    if (this.current !== "Unconfigured") {
      throw new ComponentError(
        "INVALID_TRANSITION",
        `cannot resume at ${state}: machine already at ${this.current}`,
      );
    }
    this.logger.info({ state }, "resuming boot configuration");
    this.current = state;
  }

  async write(groups: readonly AttributeGroup[]): Promise<ConfigurationAttempt> {
    if (groups.length !== 1) {
      throw new ComponentError(
        "ATTRIBUTE_GROUP_CONFLICT",
        `exactly one attribute group per write, got ${groups.length} (${groups.join(", ")})`,
      );
    }
    const [group] = groups;
    const awaiting = pendingGroupOf(this.current);
    if (awaiting !== undefined) {
      throw new ComponentError(
        "COMMIT_CONFLICT",
        `${awaiting} attributes await a reboot; cannot write ${group} attributes before it commits`,
        { group, pending_group: awaiting },
      );
    }
    const expected = this.nextGroup();
    const values = this.plan[group];
    if (group !== expected || values === undefined) {
      throw new ComponentError(
        "ATTRIBUTE_DEPENDENCY",
        `cannot write ${group} attributes in state ${this.current}; next group is ${expected ?? "none"}`,
        { group },
      );
    }

    const pending = await this.client.readPendingState();
    if (pending.pending) {
      throw new ComponentError(
        "COMMIT_CONFLICT",
        `pending configuration job ${pending.job_ids.join(", ")} must be committed by a reboot first`,
        { group, job_ids: pending.job_ids },
      );
    }

    this.logger.info({ group, nic: this.nic, values: redact(values) }, "writing attribute group");
    const result = await this.client.writeAttributeGroup(this.nic, group, values);
    const base = {
      attribute_group: group,
      requested_values: redact(values),
      at: this.clock().toISOString(),
    };

    if (result.state === "rejected") {
      const attempt: ConfigurationAttempt = {
        ...base,
        applied_state: "Rejected",
        requires_reboot: false,
        message: result.message,
      };
      this.history.push(attempt);
      throw new ComponentError(result.error_kind, `${group} attributes rejected: ${result.message}`, {
        group,
      });
    }

    const attempt: ConfigurationAttempt = {
      ...base,
      applied_state: result.state === "pending" ? "Pending" : "Committed",
      requires_reboot: result.requires_reboot,
      job_id: result.job_id,
    };
    this.history.push(attempt);
    this.transition(result.state === "pending" ? PENDING_STATE[group] : COMMITTED_STATE[group]);
    return attempt;
  }

  /**
   * Called after the caller rebooted the server. Returns false, leaving the state alone,
   * while the BMC still reports a pending job.
   */
  async confirmReboot(): Promise<boolean> {
    const group = pendingGroupOf(this.current);
    if (group === undefined) {
      throw new ComponentError("INVALID_TRANSITION", `nothing awaits a reboot in state ${this.current}`);
    }
    const pending = await this.client.readPendingState();
    if (pending.pending) {
      this.logger.debug({ group, job_ids: pending.job_ids }, "configuration job still pending");
      return false;
    }
    this.transition(COMMITTED_STATE[group]);
    const last = [...this.history].reverse().find((a) => a.attribute_group === group);
    if (last) last.applied_state = "Committed";
    return true;
  }

  /** Read-only check of the NIC attributes and boot devices. Changes no state. */
  async inspect(expectedIqn: string): Promise<ValidationReport> {
    const attributes = await this.client.readAttributes(this.nic);
    const devices = await this.client.readBootDevices();
    const warnings: string[] = [];

    const name = attributes.PrimaryTargetName;
    if (name === undefined || name === null || name === "") {
      warnings.push("PrimaryTargetName is blank on read-back");
    } else if (name !== expectedIqn) {
      warnings.push(`PrimaryTargetName mismatch: expected ${expectedIqn}, got ${String(name)}`);
    }
    for (const field of ["PrimaryTargetIPAddress", "PrimaryLUN"]) {
      const value = attributes[field];
      if (value === undefined || value === null || value === "") {
        warnings.push(`${field} not reported by the BMC`);
      }
    }

    const { outcome, device } = classifyBootDevices(devices, expectedIqn);
    return { outcome, boot_device: device, warnings, attributes };
  }

  /**
   * Move to Validated, FallbackToNetworkBoot or Failed. Read-back mismatches are soft
   * warnings: BMCs often report stale values for attributes that did apply.
   */
  async validate(expectedIqn: string): Promise<ValidationReport> {
    if (!TRANSITIONS[this.current].includes("Validated") || this.nextGroup() !== null) {
      throw new ComponentError(
        "INVALID_TRANSITION",
        `cannot validate in state ${this.current}`,
      );
    }
    const report = await this.inspect(expectedIqn);
    for (const warning of report.warnings) {
      this.softWarnings.push(warning);
      this.logger.warn(warning);
    }
    this.transition(report.outcome);

    if (report.outcome === "FallbackToNetworkBoot") {
      this.logger.info(
        { device: report.boot_device?.id },
        "no explicit iSCSI boot device; server will use network boot",
      );
    } else if (report.outcome === "Failed") {
      throw new ComponentError(
        "VALIDATION_FAILED",
        `no boot device for ${expectedIqn} and no network-boot fallback`,
      );
    }
    return report;
  }

  private transition(to: BootState): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new ComponentError("INVALID_TRANSITION", `${this.current} -> ${to} is not allowed`);
    }
    this.logger.debug({ from: this.current, to }, "boot state transition");
    this.current = to;
  }
}
