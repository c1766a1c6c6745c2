import type { ComponentErrorCode } from "../lifecycle/errors.js";

/** Attribute groups are written one per call, in this order. */
export const ATTRIBUTE_GROUPS = ["network", "target", "auth"] as const;
export type AttributeGroup = (typeof ATTRIBUTE_GROUPS)[number];

export type AttributeValue = string | number | boolean;
export type AttributeValues = Record<string, AttributeValue>;

export type RejectionKind = Extract<
  ComponentErrorCode,
  "COMMIT_CONFLICT" | "ATTRIBUTE_DEPENDENCY" | "ATTRIBUTE_REJECTED"
>;

export type WriteResult =
  | { state: "committed"; requires_reboot: false; job_id?: string }
  | { state: "pending"; requires_reboot: true; job_id?: string }
  | { state: "rejected"; requires_reboot: false; error_kind: RejectionKind; message: string };

export interface PendingState {
  pending: boolean;
  job_ids: string[];
}

export interface BootDevice {
  id: string;
  display_name: string;
  enabled: boolean;
  /** UEFI device path, when the BMC reports one. */
  path?: string;
}

export interface BmcSystemInfo {
  power_state: string;
  model?: string;
  manufacturer?: string;
  bios_version?: string;
  service_tag?: string;
}

export type ResetType = "GracefulRestart" | "On";

export interface BootOrder {
  /** BIOS BootMode, e.g. Uefi or Bios. */
  boot_mode?: string;
  /** Boot option ids, first entry boots first. */
  order: string[];
}

/** Device kinds that can be moved to the front of the boot order. */
export const FIRST_BOOT_DEVICES = ["iscsi", "pxe", "http", "virtualcd", "hdd"] as const;
export type FirstBootDevice = (typeof FIRST_BOOT_DEVICES)[number];

/** Remote management controller of one server. */
export interface BmcClient {
  systemInfo(): Promise<BmcSystemInfo>;
  readPendingState(): Promise<PendingState>;
  readAttributes(nic: string): Promise<Record<string, AttributeValue | null>>;
  readBootDevices(): Promise<BootDevice[]>;
  readBootOrder(): Promise<BootOrder>;
  /** Network device functions (port/partition FQDDs) across every adapter. */
  listNics(): Promise<string[]>;
  writeAttributeGroup(nic: string, group: AttributeGroup, values: AttributeValues): Promise<WriteResult>;
  /** Stage a new BIOS boot order; like attribute writes it applies on the next reboot. */
  setBootOrder(order: readonly string[]): Promise<WriteResult>;
  triggerReboot(): Promise<{ reset_type: ResetType }>;
}

export const MUTATING_BMC_METHODS = ["writeAttributeGroup", "setBootOrder", "triggerReboot"] as const;
