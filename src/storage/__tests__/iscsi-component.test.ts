import { beforeEach, describe, expect, test } from "vitest";
import { sequentialIds } from "../../lifecycle/ids.js";
import type { ArtifactSink, OwnedArtifact } from "../../lifecycle/types.js";
import { FakeStorageAppliance } from "../../testing/fake-appliance.js";
import { createIscsiComponent, descriptorOf, type IscsiConfigInput } from "../iscsi-component.js";
import { MUTATING_APPLIANCE_METHODS } from "../types.js";

const MUTATING: readonly string[] = MUTATING_APPLIANCE_METHODS;

const INPUT: IscsiConfigInput = {
  server_id: "02",
  hostname: "dumpty",
  version: "4_18",
  zvol_size: "500G",
  pool: "test",
  portal_address: "192.168.2.245",
};

function createSink(): ArtifactSink & { records: OwnedArtifact[] } {
  const records: OwnedArtifact[] = [];
  return {
    records,
    record: async (a) => {
      records.push(a);
      return { key: `artifacts/${a.kind}/${records.length}` };
    },
  };
}

describe("iscsi component", () => {
  let appliance: FakeStorageAppliance;

  beforeEach(() => {
    appliance = new FakeStorageAppliance();
  });

  test("discovery never mutates the appliance, however often it runs", async () => {
    const component = createIscsiComponent(INPUT, { client: appliance });
    await component.discover();
    await component.discover();
    await component.discover();

    expect(appliance.methodsCalled().filter((m) => MUTATING.includes(m))).toEqual([]);
  });

  test("discovery inventories existing resources and capacity", async () => {
    const component = createIscsiComponent(INPUT, { client: appliance });
    const discovery = await component.discover();

    expect(discovery.existing).toEqual({
      volume: false,
      extent: false,
      target: false,
      association: false,
    });
    expect(discovery.capacity).toEqual({
      pool: "test",
      free_bytes: 2 * 1024 ** 4,
      required_bytes: 536870912000,
      sufficient: true,
    });
    expect(discovery.names.iqn).toBe("iqn.2005-10.org.freenas.ctl:iscsi.r630-02.openshift4_18");
  });

  test("unreachable appliance fails discovery with CONNECTIVITY", async () => {
    appliance.unreachable = true;
    const component = createIscsiComponent(INPUT, { client: appliance });

    await expect(component.discover()).rejects.toMatchObject({ code: "CONNECTIVITY" });
    expect(component.status.success).toBe(false);
    expect(component.status.error_kind).toBe("CONNECTIVITY");
  });

  test("fresh provisioning end to end yields the target descriptor", async () => {
    const sink = createSink();
    const component = createIscsiComponent(INPUT, {
      client: appliance,
      sink,
      idSource: sequentialIds("iscsi"),
      owner: "r630-02",
    });

    const result = await component.execute();

    expect(result.success).toBe(true);
    expect(descriptorOf(component)).toEqual({
      iqn: "iqn.2005-10.org.freenas.ctl:iscsi.r630-02.openshift4_18",
      portal_address: "192.168.2.245",
      port: 3260,
      lun: 0,
    });
    expect(result.housekeeping?.all_verified).toBe(true);
    expect(sink.records.map((r) => r.kind)).toEqual(["iscsi-resources"]);
    expect(sink.records[0].metadata.owner).toBe("r630-02");
  });

  test("second component run reuses resources with zero creation calls", async () => {
    const first = createIscsiComponent(INPUT, { client: appliance });
    await first.execute();
    appliance.calls.length = 0;

    const second = createIscsiComponent(INPUT, { client: appliance });
    const result = await second.execute();

    expect(result.success).toBe(true);
    expect(appliance.methodsCalled().filter((m) => MUTATING.includes(m))).toEqual([]);
    expect(descriptorOf(second)).toEqual(descriptorOf(first));
  });

  test("starts the iSCSI service when it is stopped", async () => {
    appliance.serviceRunning = false;
    const component = createIscsiComponent(INPUT, { client: appliance });
    const processing = await component.process();

    expect(processing.service_started).toBe(true);
    expect(appliance.callsTo("startIscsiService")).toHaveLength(1);
  });

  test("insufficient capacity fails the volume step before any write", async () => {
    appliance.pools = [{ name: "test", free_bytes: 1024, healthy: true }];
    const component = createIscsiComponent(INPUT, { client: appliance });

    await expect(component.process()).rejects.toMatchObject({
      code: "PROVISIONING_STEP_FAILED",
      details: { step: "volume" },
    });
    expect(appliance.methodsCalled().filter((m) => MUTATING.includes(m))).toEqual([]);
  });

  test("housekeeping reports missing resources after a failed process", async () => {
    appliance.failures.set("createTarget", new Error("no portal"));
    const component = createIscsiComponent(INPUT, { client: appliance });

    const result = await component.execute(undefined, { continueOnError: true });

    expect(result.success).toBe(false);
    expect(result.error_kind).toBe("PROVISIONING_STEP_FAILED");
    expect(result.housekeeping?.verified).toEqual({
      volume: true,
      extent: true,
      target: false,
      association: false,
    });
    expect(result.housekeeping?.warnings).toEqual([
      "target not found on appliance",
      "association not found on appliance",
    ]);
    expect(result.housekeeping?.unused_extents).toEqual(["openshift_r630_02_4_18_extent"]);
  });

  test("cleanup_unused removes extents and targets without associations", async () => {
    appliance.seed("extent", "stale_extent");
    appliance.seed("target", "iqn.stale");
    const component = createIscsiComponent(
      { ...INPUT, cleanup_unused: true },
      { client: appliance },
    );

    const result = await component.execute();

    expect(result.housekeeping?.removed).toEqual(["stale_extent", "iqn.stale"]);
    expect(appliance.resources.extent.map((e) => e.name)).toEqual([
      "openshift_r630_02_4_18_extent",
    ]);
  });

  test("missing server_id falls back to unknown", async () => {
    const component = createIscsiComponent(
      { hostname: "dumpty", portal_address: "192.168.2.245" },
      { client: appliance },
    );
    const discovery = await component.discover();
    expect(discovery.names.volume).toBe("test/openshift_installations/r630_unknown_stable");
  });

  test("invalid configuration fails at construction", () => {
    expect(() => createIscsiComponent({ ...INPUT, hostname: "" }, { client: appliance })).toThrow(
      /Invalid iscsi configuration: hostname/,
    );
  });
});
