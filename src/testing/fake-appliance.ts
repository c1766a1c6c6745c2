import { ComponentError, type ProvisioningStep } from "../lifecycle/errors.js";
import type {
  ApplianceInfo,
  Association,
  ExportOptions,
  NamedKind,
  PoolInfo,
  ResourceRef,
  StorageApplianceClient,
  TargetOptions,
} from "../storage/types.js";

type Method = keyof StorageApplianceClient;

export interface ApplianceCall {
  method: Method;
  args: unknown[];
}

/**
 * In-memory appliance. Ids are sequential numbers as strings; every call is recorded.
 */
export class FakeStorageAppliance implements StorageApplianceClient {
  readonly calls: ApplianceCall[] = [];
  readonly resources: Record<NamedKind, ResourceRef[]> = {
    volume: [],
    extent: [],
    target: [],
  };
  readonly associations: Association[] = [];
  pools: PoolInfo[] = [{ name: "test", free_bytes: 2 * 1024 ** 4, healthy: true }];
  serviceRunning = true;
  /** When set, every call rejects with a CONNECTIVITY error. */
  unreachable = false;
  /** Per-method failures injected by tests. */
  readonly failures = new Map<Method, Error>();
  private nextId = 1;

  callsTo(method: Method): ApplianceCall[] {
    return this.calls.filter((c) => c.method === method);
  }

  methodsCalled(): Method[] {
    return this.calls.map((c) => c.method);
  }

  seed(kind: NamedKind, name: string): ResourceRef {
    const ref = { kind, id: this.allocate(kind, name), name };
    this.resources[kind].push(ref);
    return ref;
  }

  seedAssociation(target: ResourceRef, extent: ResourceRef, lun = 0): Association {
    const assoc = { id: String(this.nextId++), target_id: target.id, extent_id: extent.id, lun };
    this.associations.push(assoc);
    return assoc;
  }

  async systemInfo(): Promise<ApplianceInfo> {
    this.enter("systemInfo", []);
    return { hostname: "truenas", version: "TrueNAS-SCALE-24.04" };
  }

  async listPools(): Promise<PoolInfo[]> {
    this.enter("listPools", []);
    return this.pools.map((p) => ({ ...p }));
  }

  async list(kind: NamedKind): Promise<ResourceRef[]> {
    this.enter("list", [kind]);
    return this.resources[kind].map((r) => ({ ...r }));
  }

  async listAssociations(): Promise<Association[]> {
    this.enter("listAssociations", []);
    return this.associations.map((a) => ({ ...a }));
  }

  async queryByName(kind: NamedKind, name: string): Promise<ResourceRef | undefined> {
    this.enter("queryByName", [kind, name]);
    const found = this.resources[kind].find((r) => r.name === name);
    return found ? { ...found } : undefined;
  }

  async queryAssociation(targetId: string, extentId: string): Promise<Association | undefined> {
    this.enter("queryAssociation", [targetId, extentId]);
    const found = this.associations.find(
      (a) => a.target_id === targetId && a.extent_id === extentId,
    );
    return found ? { ...found } : undefined;
  }

  async iscsiServiceRunning(): Promise<boolean> {
    this.enter("iscsiServiceRunning", []);
    return this.serviceRunning;
  }

  async createVolume(name: string, sizeBytes: number): Promise<ResourceRef> {
    this.enter("createVolume", [name, sizeBytes]);
    return this.seed("volume", name);
  }

  async createExport(volume: ResourceRef, options: ExportOptions): Promise<ResourceRef> {
    this.enter("createExport", [volume, options]);
    return this.seed("extent", options.name);
  }

  async createTarget(iqn: string, options: TargetOptions): Promise<ResourceRef> {
    this.enter("createTarget", [iqn, options]);
    return this.seed("target", iqn);
  }

  async associate(target: ResourceRef, extent: ResourceRef, lun: number): Promise<Association> {
    this.enter("associate", [target, extent, lun]);
    return this.seedAssociation(target, extent, lun);
  }

  async destroy(kind: ProvisioningStep, id: string): Promise<void> {
    this.enter("destroy", [kind, id]);
    if (kind === "association") {
      const i = this.associations.findIndex((a) => a.id === id);
      if (i >= 0) this.associations.splice(i, 1);
      return;
    }
    this.resources[kind] = this.resources[kind].filter((r) => r.id !== id);
  }

  async startIscsiService(): Promise<void> {
    this.enter("startIscsiService", []);
    this.serviceRunning = true;
  }

  private enter(method: Method, args: unknown[]): void {
    this.calls.push({ method, args });
    if (this.unreachable) {
      throw new ComponentError("CONNECTIVITY", `appliance unreachable (${method})`);
    }
    const failure = this.failures.get(method);
    if (failure) throw failure;
  }

  private allocate(kind: NamedKind, name: string): string {
    // zvols are addressed by dataset name, everything else by number
    return kind === "volume" ? name : String(this.nextId++);
  }
}
