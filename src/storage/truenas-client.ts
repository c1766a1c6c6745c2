import type { AxiosAdapter, AxiosInstance } from "axios";
import { z } from "zod";
import {
  createHttpClient,
  isNotFound,
  parseResponse,
  toComponentError,
} from "../http/client.js";
import type { ProvisioningStep } from "../lifecycle/errors.js";
import type {
  ApplianceInfo,
  Association,
  ExportOptions,
  NamedKind,
  PoolInfo,
  ResourceRef,
  StorageApplianceClient,
  TargetOptions,
} from "./types.js";

export interface TrueNasClientOpts {
  host: string;
  port?: number;
  apiKey: string;
  timeoutMs: number;
  verifyTls?: boolean;
  adapter?: AxiosAdapter;
}

const Id = z.union([z.number(), z.string()]).transform(String);

const SystemInfoSchema = z.object({
  hostname: z.string(),
  version: z.string(),
  system_product: z.string().nullish(),
});

const PoolSchema = z.object({
  name: z.string(),
  free: z.number().nullish(),
  healthy: z.boolean().nullish(),
});

const NamedSchema = z.object({ id: Id, name: z.string() });

const TargetExtentSchema = z.object({
  id: Id,
  target: Id,
  extent: Id,
  lunid: z.number(),
});

const ServiceSchema = z.object({ state: z.string() });

const COLLECTION: Record<NamedKind, string> = {
  volume: "/pool/dataset",
  extent: "/iscsi/extent",
  target: "/iscsi/target",
};

const DELETE_PATH: Record<ProvisioningStep, (id: string) => string> = {
  volume: (id) => `/pool/dataset/id/${id}`,
  extent: (id) => `/iscsi/extent/id/${id}`,
  target: (id) => `/iscsi/target/id/${id}`,
  association: (id) => `/iscsi/targetextent/id/${id}`,
};

function toAssociation(row: z.infer<typeof TargetExtentSchema>): Association {
  return { id: row.id, target_id: row.target, extent_id: row.extent, lun: row.lunid };
}

/**
 * TrueNAS SCALE REST v2.0 client (https://host:444/api/v2.0, bearer API key).
 */
export class TrueNasClient implements StorageApplianceClient {
  private http: AxiosInstance;

  constructor(opts: TrueNasClientOpts) {
    this.http = createHttpClient({
      baseURL: `https://${opts.host}:${opts.port ?? 444}/api/v2.0`,
      timeoutMs: opts.timeoutMs,
      headers: { Authorization: `Bearer ${opts.apiKey}` },
      verifyTls: opts.verifyTls,
      adapter: opts.adapter,
    });
  }

  async systemInfo(): Promise<ApplianceInfo> {
    const data = await this.get("/system/info", "CONNECTIVITY");
    const info = parseResponse(SystemInfoSchema, data, "GET /system/info");
    return {
      hostname: info.hostname,
      version: info.version,
      product: info.system_product ?? undefined,
    };
  }

  async listPools(): Promise<PoolInfo[]> {
    const data = await this.get("/pool");
    return parseResponse(z.array(PoolSchema), data, "GET /pool").map((p) => ({
      name: p.name,
      free_bytes: p.free ?? 0,
      healthy: p.healthy ?? true,
    }));
  }

  async list(kind: NamedKind): Promise<ResourceRef[]> {
    const params = kind === "volume" ? { type: "VOLUME" } : undefined;
    const data = await this.get(COLLECTION[kind], "INTERNAL", params);
    return parseResponse(z.array(NamedSchema), data, `GET ${COLLECTION[kind]}`).map(
      (row) => ({ kind, id: row.id, name: row.name }),
    );
  }

  async listAssociations(): Promise<Association[]> {
    const data = await this.get("/iscsi/targetextent");
    return parseResponse(z.array(TargetExtentSchema), data, "GET /iscsi/targetextent").map(
      toAssociation,
    );
  }

  async queryByName(kind: NamedKind, name: string): Promise<ResourceRef | undefined> {
    if (kind === "volume") {
      let data: unknown;
      try {
        data = (await this.http.get<unknown>(`/pool/dataset/id/${name}`)).data;
      } catch (err) {
        if (isNotFound(err)) return undefined;
        throw toComponentError(err, `GET /pool/dataset/id/${name}`);
      }
      const row = parseResponse(NamedSchema, data, "GET /pool/dataset/id");
      return { kind, id: row.id, name: row.name };
    }

    const data = await this.get(COLLECTION[kind], "INTERNAL", { name });
    const rows = parseResponse(z.array(NamedSchema), data, `GET ${COLLECTION[kind]}`);
    const row = rows.find((r) => r.name === name);
    return row ? { kind, id: row.id, name: row.name } : undefined;
  }

  async queryAssociation(targetId: string, extentId: string): Promise<Association | undefined> {
    const data = await this.get("/iscsi/targetextent", "INTERNAL", {
      target: Number(targetId),
      extent: Number(extentId),
    });
    const rows = parseResponse(z.array(TargetExtentSchema), data, "GET /iscsi/targetextent");
    const row = rows.find((r) => r.target === targetId && r.extent === extentId);
    return row ? toAssociation(row) : undefined;
  }

  async iscsiServiceRunning(): Promise<boolean> {
    const data = await this.get("/service/id/iscsitarget");
    return parseResponse(ServiceSchema, data, "GET /service/id/iscsitarget").state === "RUNNING";
  }

  async createVolume(name: string, sizeBytes: number): Promise<ResourceRef> {
    await this.ensureParentDatasets(name);
    const data = await this.post("/pool/dataset", "volume", {
      name,
      type: "VOLUME",
      volsize: sizeBytes,
      sparse: true,
    });
    const row = parseResponse(NamedSchema, data, "POST /pool/dataset");
    return { kind: "volume", id: row.id, name: row.name };
  }

  async createExport(volume: ResourceRef, options: ExportOptions): Promise<ResourceRef> {
    const data = await this.post("/iscsi/extent", "extent", {
      name: options.name,
      type: "DISK",
      disk: `zvol/${volume.name}`,
      blocksize: options.blocksize ?? 512,
      pblocksize: false,
      comment: options.comment ?? "",
      insecure_tpc: true,
      xen: false,
      rpm: "SSD",
      ro: false,
    });
    const row = parseResponse(NamedSchema, data, "POST /iscsi/extent");
    return { kind: "extent", id: row.id, name: row.name };
  }

  async createTarget(iqn: string, options: TargetOptions): Promise<ResourceRef> {
    const data = await this.post("/iscsi/target", "target", {
      name: iqn,
      alias: options.alias,
      mode: "ISCSI",
      groups: [
        { portal: options.portal_group, initiator: options.initiator_group, auth: null },
      ],
    });
    const row = parseResponse(NamedSchema, data, "POST /iscsi/target");
    return { kind: "target", id: row.id, name: row.name };
  }

  async associate(target: ResourceRef, extent: ResourceRef, lun: number): Promise<Association> {
    const data = await this.post("/iscsi/targetextent", "association", {
      target: Number(target.id),
      extent: Number(extent.id),
      lunid: lun,
    });
    return toAssociation(parseResponse(TargetExtentSchema, data, "POST /iscsi/targetextent"));
  }

  async destroy(kind: ProvisioningStep, id: string): Promise<void> {
    const path = DELETE_PATH[kind](id);
    try {
      await this.http.delete(path);
    } catch (err) {
      throw toComponentError(err, `DELETE ${path}`, "RESOURCE_EXISTS", { step: kind });
    }
  }

  async startIscsiService(): Promise<void> {
    try {
      await this.http.post("/service/start", { service: "iscsitarget" });
    } catch (err) {
      throw toComponentError(err, "POST /service/start");
    }
  }

  /** Create each missing FILESYSTEM dataset above a zvol, pool first. */
  private async ensureParentDatasets(zvolName: string): Promise<void> {
    const parts = zvolName.split("/");
    for (let depth = 2; depth < parts.length; depth++) {
      const path = parts.slice(0, depth).join("/");
      try {
        await this.http.get(`/pool/dataset/id/${path}`);
        continue;
      } catch (err) {
        if (!isNotFound(err)) {
          throw toComponentError(err, `GET /pool/dataset/id/${path}`, "PROVISIONING_STEP_FAILED", {
            step: "volume",
          });
        }
      }
      await this.post("/pool/dataset", "volume", {
        name: path,
        type: "FILESYSTEM",
        compression: "lz4",
      });
    }
  }

  private async get(
    path: string,
    fallback: "CONNECTIVITY" | "INTERNAL" = "INTERNAL",
    params?: Record<string, unknown>,
  ): Promise<unknown> {
    try {
      const res = await this.http.get<unknown>(path, { params });
      return res.data;
    } catch (err) {
      throw toComponentError(err, `GET ${path}`, fallback);
    }
  }

  private async post(path: string, step: ProvisioningStep, body: unknown): Promise<unknown> {
    try {
      const res = await this.http.post<unknown>(path, body);
      return res.data;
    } catch (err) {
      throw toComponentError(err, `POST ${path}`, "PROVISIONING_STEP_FAILED", { step });
    }
  }
}
