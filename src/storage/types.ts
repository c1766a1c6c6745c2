import type { ProvisioningStep } from "../lifecycle/errors.js";

export type NamedKind = Exclude<ProvisioningStep, "association">;

/** Identity of a remote appliance resource. Ids are strings whatever the wire type. */
export interface ResourceRef {
  kind: NamedKind;
  id: string;
  name: string;
}

export interface Association {
  id: string;
  target_id: string;
  extent_id: string;
  lun: number;
}

export interface ApplianceInfo {
  hostname: string;
  version: string;
  product?: string;
}

export interface PoolInfo {
  name: string;
  free_bytes: number;
  healthy: boolean;
}

export interface ExportOptions {
  name: string;
  comment?: string;
  blocksize?: number;
}

export interface TargetOptions {
  alias: string;
  portal_group: number;
  initiator_group: number;
}

/**
 * Block-storage / iSCSI appliance contract consumed by the provisioning engine.
 * queryByName and the list methods are read-only; everything else mutates.
 */
export interface StorageApplianceClient {
  systemInfo(): Promise<ApplianceInfo>;
  listPools(): Promise<PoolInfo[]>;
  list(kind: NamedKind): Promise<ResourceRef[]>;
  listAssociations(): Promise<Association[]>;
  queryByName(kind: NamedKind, name: string): Promise<ResourceRef | undefined>;
  queryAssociation(targetId: string, extentId: string): Promise<Association | undefined>;
  iscsiServiceRunning(): Promise<boolean>;

  createVolume(name: string, sizeBytes: number): Promise<ResourceRef>;
  createExport(volume: ResourceRef, options: ExportOptions): Promise<ResourceRef>;
  createTarget(iqn: string, options: TargetOptions): Promise<ResourceRef>;
  associate(target: ResourceRef, extent: ResourceRef, lun: number): Promise<Association>;
  destroy(kind: ProvisioningStep, id: string): Promise<void>;
  startIscsiService(): Promise<void>;
}

/** Method names that change appliance state. Tests assert these are never called during discovery. */
export const MUTATING_APPLIANCE_METHODS = [
  "createVolume",
  "createExport",
  "createTarget",
  "associate",
  "destroy",
  "startIscsiService",
] as const satisfies readonly (keyof StorageApplianceClient)[];
