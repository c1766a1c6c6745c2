import type { AxiosAdapter, AxiosInstance } from "axios";
import { z } from "zod";
import {
  createHttpClient,
  httpFailure,
  parseResponse,
  toComponentError,
} from "../http/client.js";
import type { ComponentError } from "../lifecycle/errors.js";
import type {
  AttributeGroup,
  AttributeValue,
  AttributeValues,
  BmcClient,
  BmcSystemInfo,
  BootDevice,
  BootOrder,
  PendingState,
  RejectionKind,
  ResetType,
  WriteResult,
} from "./client.js";

export interface RedfishClientOpts {
  host: string;
  username: string;
  password: string;
  timeoutMs: number;
  verifyTls?: boolean;
  adapter?: AxiosAdapter;
}

const SYSTEM = "/Systems/System.Embedded.1";
const ADAPTERS = "/Chassis/System.Embedded.1/NetworkAdapters";
const JOBS = "/Managers/iDRAC.Embedded.1/Jobs";

/** Job states after which a configuration job no longer blocks writes. */
const FINISHED_JOB_STATES = new Set([
  "Completed",
  "CompletedWithErrors",
  "Failed",
  "Aborted",
  "Cancelled",
]);

const SystemSchema = z.object({
  PowerState: z.string().default("Unknown"),
  Model: z.string().nullish(),
  Manufacturer: z.string().nullish(),
  BiosVersion: z.string().nullish(),
  SKU: z.string().nullish(),
});

const JobsSchema = z.object({
  Members: z
    .array(
      z.object({
        Id: z.string(),
        JobState: z.string(),
      }),
    )
    .default([]),
});

const BootOptionsSchema = z.object({
  Members: z
    .array(
      z.object({
        "@odata.id": z.string(),
        Id: z.string().optional(),
        DisplayName: z.string().default("Unknown"),
        BootOptionEnabled: z.boolean().optional(),
        UefiDevicePath: z.string().nullish(),
      }),
    )
    .default([]),
});

const AttributeValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const AttributesSchema = z.object({
  Attributes: z.record(AttributeValueSchema).default({}),
});

const BootSchema = z.object({
  Boot: z.object({ BootOrder: z.array(z.string()).default([]) }).default({}),
});

const BiosSchema = z.object({
  Attributes: z.object({ BootMode: z.string().optional() }).passthrough().default({}),
});

const CollectionSchema = z.object({
  Members: z.array(z.object({ "@odata.id": z.string() })).default([]),
});

const JobCreatedSchema = z.object({ Id: z.string().optional() }).passthrough();

const COMMIT_CONFLICT_TEXT = /pending configuration|already committed|configuration job already/i;
const DEPENDENCY_TEXT = /read-only|depends on other attributes/i;

/** Kind of a BMC refusal, from the text of its error body. */
export function rejectionKind(body: string): RejectionKind {
  if (COMMIT_CONFLICT_TEXT.test(body)) return "COMMIT_CONFLICT";
  if (DEPENDENCY_TEXT.test(body)) return "ATTRIBUTE_DEPENDENCY";
  return "ATTRIBUTE_REJECTED";
}

/** "NIC.Integrated.1-1-1" lives on adapter "NIC.Integrated.1". */
export function adapterOf(nic: string): string {
  return nic.split("-")[0] ?? nic;
}

function attributesPath(nic: string): string {
  return `/Chassis/System.Embedded.1/NetworkAdapters/${adapterOf(nic)}/NetworkDeviceFunctions/${nic}/Oem/Dell/DellNetworkAttributes/${nic}`;
}

function lastSegment(path: string): string {
  return path.split("/").filter(Boolean).pop() ?? path;
}

/**
 * Dell iDRAC Redfish client. NIC attribute changes are staged on the Settings resource
 * and applied by a configuration job that runs on the next reboot.
 */
export class RedfishClient implements BmcClient {
  private http: AxiosInstance;

  constructor(opts: RedfishClientOpts) {
    this.http = createHttpClient({
      baseURL: `https://${opts.host}/redfish/v1`,
      timeoutMs: opts.timeoutMs,
      auth: { username: opts.username, password: opts.password },
      verifyTls: opts.verifyTls,
      adapter: opts.adapter,
    });
  }

  async systemInfo(): Promise<BmcSystemInfo> {
    const data = await this.get(SYSTEM, "CONNECTIVITY");
    const system = parseResponse(SystemSchema, data, `GET ${SYSTEM}`);
    return {
      power_state: system.PowerState,
      model: system.Model ?? undefined,
      manufacturer: system.Manufacturer ?? undefined,
      bios_version: system.BiosVersion ?? undefined,
      service_tag: system.SKU ?? undefined,
    };
  }

  async readPendingState(): Promise<PendingState> {
    const path = `${JOBS}?$expand=*($levels=1)`;
    const jobs = parseResponse(JobsSchema, await this.get(path), `GET ${JOBS}`);
    const job_ids = jobs.Members.filter((j) => !FINISHED_JOB_STATES.has(j.JobState)).map(
      (j) => j.Id,
    );
    return { pending: job_ids.length > 0, job_ids };
  }

  async readAttributes(nic: string): Promise<Record<string, AttributeValue | null>> {
    const path = attributesPath(nic);
    return parseResponse(AttributesSchema, await this.get(path), `GET ${path}`).Attributes;
  }

  async readBootDevices(): Promise<BootDevice[]> {
    const path = `${SYSTEM}/BootOptions?$expand=*($levels=1)`;
    const options = parseResponse(BootOptionsSchema, await this.get(path), `GET ${SYSTEM}/BootOptions`);
    return options.Members.map((m) => ({
      id: m.Id ?? lastSegment(m["@odata.id"]),
      display_name: m.DisplayName,
      enabled: m.BootOptionEnabled ?? true,
      path: m.UefiDevicePath ?? undefined,
    }));
  }

  async readBootOrder(): Promise<BootOrder> {
    const system = parseResponse(BootSchema, await this.get(SYSTEM), `GET ${SYSTEM}`);
    const bios = parseResponse(BiosSchema, await this.get(`${SYSTEM}/Bios`), `GET ${SYSTEM}/Bios`);
    return { boot_mode: bios.Attributes.BootMode, order: system.Boot.BootOrder };
  }

  async listNics(): Promise<string[]> {
    const adapters = parseResponse(CollectionSchema, await this.get(ADAPTERS), `GET ${ADAPTERS}`);
    const nics: string[] = [];
    for (const adapter of adapters.Members) {
      const path = `${ADAPTERS}/${lastSegment(adapter["@odata.id"])}/NetworkDeviceFunctions`;
      const functions = parseResponse(CollectionSchema, await this.get(path), `GET ${path}`);
      nics.push(...functions.Members.map((m) => lastSegment(m["@odata.id"])));
    }
    return nics;
  }

  /**
   * Values already in place are reported committed without a write. Otherwise the values
   * are staged and a configuration job created; the change applies on the next reboot.
   */
  async writeAttributeGroup(
    nic: string,
    group: AttributeGroup,
    values: AttributeValues,
  ): Promise<WriteResult> {
    const current = await this.readAttributes(nic);
    if (Object.entries(values).every(([k, v]) => current[k] === v)) {
      return { state: "committed", requires_reboot: false };
    }
    const settings = `${attributesPath(nic)}/Settings`;
    return this.stage(settings, { Attributes: values }, settings, `PATCH ${group} attributes`, {
      group,
    });
  }

  /** The order is patched on the system resource and applied by a BIOS configuration job. */
  async setBootOrder(order: readonly string[]): Promise<WriteResult> {
    const { order: current } = await this.readBootOrder();
    if (current.length === order.length && current.every((id, i) => id === order[i])) {
      return { state: "committed", requires_reboot: false };
    }
    return this.stage(
      SYSTEM,
      { Boot: { BootOrder: order } },
      `${SYSTEM}/Bios/Settings`,
      "PATCH boot order",
      { order: [...order] },
    );
  }

  private async stage(
    patchPath: string,
    body: unknown,
    settingsPath: string,
    action: string,
    details: ComponentError["details"],
  ): Promise<WriteResult> {
    try {
      await this.http.patch(patchPath, body);
      const response = await this.http.post(JOBS, {
        TargetSettingsURI: `/redfish/v1${settingsPath}`,
      });
      const location: unknown = response.headers["location"];
      const created = JobCreatedSchema.safeParse(response.data);
      const job_id =
        typeof location === "string"
          ? lastSegment(location)
          : created.success
            ? created.data.Id
            : undefined;
      return { state: "pending", requires_reboot: true, job_id };
    } catch (err) {
      const failure = httpFailure(err);
      const status = failure?.status;
      if (failure && status !== undefined && status >= 400 && status < 500 && status !== 401 && status !== 403) {
        return {
          state: "rejected",
          requires_reboot: false,
          error_kind: rejectionKind(failure.body),
          message: `HTTP ${status} ${failure.body}`,
        };
      }
      throw toComponentError(err, action, "INTERNAL", details);
    }
  }

  /** GracefulRestart when the server is on, On when it is off. */
  async triggerReboot(): Promise<{ reset_type: ResetType }> {
    const { power_state } = await this.systemInfo();
    const reset_type: ResetType = power_state === "On" ? "GracefulRestart" : "On";
    const path = `${SYSTEM}/Actions/ComputerSystem.Reset`;
    try {
      await this.http.post(path, { ResetType: reset_type });
    } catch (err) {
      throw toComponentError(err, `POST ${path}`);
    }
    return { reset_type };
  }

  private async get(
    path: string,
    fallback: "CONNECTIVITY" | "INTERNAL" = "INTERNAL",
  ): Promise<unknown> {
    try {
      const response = await this.http.get(path);
      return response.data;
    } catch (err) {
      throw toComponentError(err, `GET ${path}`, fallback);
    }
  }
}
