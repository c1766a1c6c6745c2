import { beforeEach, describe, expect, test } from "vitest";
import type { ArtifactSink, OwnedArtifact } from "../../lifecycle/types.js";
import { type BootTargetDescriptorInput, parseDescriptor } from "../../schemas/target.js";
import { FakeBmc } from "../../testing/fake-bmc.js";
import { networkAttributes, targetAttributes } from "../attributes.js";
import { type BootConfigInput, createBootComponent } from "../boot-component.js";
import { MUTATING_BMC_METHODS } from "../client.js";

const MUTATING: readonly string[] = MUTATING_BMC_METHODS;
const IQN = "iqn.2005-10.org.freenas.ctl:iscsi.r630-02.openshift4_18";
const DESCRIPTOR: BootTargetDescriptorInput = { iqn: IQN, portal_address: "192.168.2.245" };

const INPUT: BootConfigInput = {
  server_id: "02",
  bmc_host: "192.168.2.12",
  descriptor: DESCRIPTOR,
  poll_interval_s: 0,
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

describe("boot component", () => {
  let bmc: FakeBmc;

  beforeEach(() => {
    bmc = new FakeBmc();
  });

  test("discovery never mutates the BMC", async () => {
    const component = createBootComponent(INPUT, { client: bmc });
    await component.discover();
    await component.discover();

    expect(bmc.methodsCalled().filter((m) => MUTATING.includes(m))).toEqual([]);
    expect(component.discoveryResult?.inferred_state).toBe("Unconfigured");
  });

  test("unreachable BMC fails discovery with CONNECTIVITY", async () => {
    bmc.unreachable = true;
    const component = createBootComponent(INPUT, { client: bmc });

    await expect(component.discover()).rejects.toMatchObject({ code: "CONNECTIVITY" });
    expect(component.status.error_kind).toBe("CONNECTIVITY");
  });

  test("writes each group, reboots to commit it, then falls back to network boot", async () => {
    const sink = createSink();
    const component = createBootComponent(INPUT, { client: bmc, sink, owner: "r630-02" });

    const result = await component.execute();

    expect(result.success).toBe(true);
    expect(result.processing).toMatchObject({
      mode: "configure",
      state: "TargetParamsCommitted",
      requires_reboot: false,
      reboots: 2,
      remaining_groups: [],
    });
    expect(result.processing?.attempts.map((a) => [a.attribute_group, a.applied_state])).toEqual([
      ["network", "Committed"],
      ["target", "Committed"],
    ]);
    expect(bmc.callsTo("triggerReboot")).toHaveLength(2);
    expect(result.housekeeping).toMatchObject({
      state: "FallbackToNetworkBoot",
      outcome: "FallbackToNetworkBoot",
      validated: true,
      boot_device: { id: "Boot0000" },
      warnings: [],
    });
    expect(sink.records.map((r) => r.kind)).toEqual(["boot-configuration"]);
    expect(sink.records[0].content).toMatchObject({
      target_iqn: IQN,
      outcome: "FallbackToNetworkBoot",
      boot_device: "Boot0000",
    });
  });

  test("without reboot permission it stops at the first pending group", async () => {
    const component = createBootComponent({ ...INPUT, reboot: false }, { client: bmc });

    const result = await component.execute();

    expect(result.success).toBe(true);
    expect(result.processing).toMatchObject({
      state: "NetworkParamsPending",
      requires_reboot: true,
      reboots: 0,
      remaining_groups: ["network", "target"],
    });
    expect(bmc.callsTo("triggerReboot")).toHaveLength(0);
    expect(result.housekeeping).toMatchObject({
      state: "NetworkParamsPending",
      validated: false,
      requires_reboot: true,
      pending_job_ids: ["JID_1"],
    });
    expect(result.housekeeping?.warnings[0]).toBe(
      "boot configuration incomplete at NetworkParamsPending",
    );
  });

  test("an existing pending job is committed by a reboot before writing", async () => {
    bmc.pendingJobs = ["JID_77"];
    const component = createBootComponent(INPUT, { client: bmc });

    const processing = await component.process();

    expect(processing.reboots).toBe(3);
    expect(processing.state).toBe("TargetParamsCommitted");
  });

  test("an existing pending job without reboot permission is a commit conflict", async () => {
    bmc.pendingJobs = ["JID_77"];
    const component = createBootComponent({ ...INPUT, reboot: false }, { client: bmc });

    await expect(component.process()).rejects.toMatchObject({
      code: "COMMIT_CONFLICT",
      details: { job_ids: ["JID_77"] },
    });
    expect(bmc.callsTo("writeAttributeGroup")).toHaveLength(0);
  });

  test("a job that outlives the wait timeout is TIMEOUT", async () => {
    bmc.rebootsToCommit = 5;
    const component = createBootComponent({ ...INPUT, job_wait_timeout_s: 0 }, { client: bmc });

    await expect(component.process()).rejects.toMatchObject({ code: "TIMEOUT" });
  });

  test("progress already on the BMC is resumed without rewriting", async () => {
    const descriptor = parseDescriptor(DESCRIPTOR);
    bmc.attributes = { ...networkAttributes(), ...targetAttributes(descriptor) };
    const component = createBootComponent(INPUT, { client: bmc });

    const result = await component.execute();

    expect(result.discovery?.inferred_state).toBe("TargetParamsCommitted");
    expect(bmc.callsTo("writeAttributeGroup")).toHaveLength(0);
    expect(result.processing?.attempts).toEqual([]);
    expect(result.housekeeping?.outcome).toBe("FallbackToNetworkBoot");
  });

  test("dry run writes nothing and records no artifact", async () => {
    const sink = createSink();
    const component = createBootComponent({ ...INPUT, dry_run: true }, { client: bmc, sink });

    const result = await component.execute();

    expect(result.success).toBe(true);
    expect(result.processing).toMatchObject({
      dry_run: true,
      remaining_groups: ["network", "target"],
    });
    expect(bmc.methodsCalled().filter((m) => MUTATING.includes(m))).toEqual([]);
    expect(sink.records).toEqual([]);
  });

  test("the descriptor can come from the storage side at process time", async () => {
    const component = createBootComponent(
      { bmc_host: "192.168.2.12", poll_interval_s: 0 },
      { client: bmc, descriptor: () => parseDescriptor(DESCRIPTOR) },
    );

    const processing = await component.process();

    expect(processing.descriptor?.iqn).toBe(IQN);
    expect(bmc.attributes.PrimaryTargetName).toBe(IQN);
  });

  test("no descriptor anywhere is a configuration error", async () => {
    const component = createBootComponent({ bmc_host: "192.168.2.12" }, { client: bmc });
    await expect(component.process()).rejects.toMatchObject({ code: "CONFIGURATION" });
  });

  test("a multipath mismatch is rejected before any remote write", async () => {
    const component = createBootComponent(
      { bmc_host: "192.168.2.12" },
      {
        client: bmc,
        descriptor: () => ({
          iqn: IQN,
          portal_address: "192.168.2.245",
          port: 3260,
          lun: 0,
          secondary_iqn: "iqn.2005-10.org.freenas.ctl:iscsi.r630-03.openshift4_18",
          secondary_portal: "192.168.3.245",
        }),
      },
    );

    await expect(component.process()).rejects.toMatchObject({ code: "CONFIGURATION" });
    expect(bmc.methodsCalled().filter((m) => MUTATING.includes(m))).toEqual([]);
  });

  test("a multipath mismatch in configuration fails at construction", () => {
    expect(() =>
      createBootComponent(
        {
          ...INPUT,
          descriptor: { ...DESCRIPTOR, secondary_portal: "192.168.3.245", secondary_lun: 1 },
        },
        { client: bmc },
      ),
    ).toThrow(/Invalid boot configuration: descriptor\.secondary_lun/);
  });

  test("reset mode writes only the groups that differ and skips validation", async () => {
    bmc.commitImmediately = true;
    bmc.attributes = { ...networkAttributes(), ...targetAttributes(parseDescriptor(DESCRIPTOR)) };
    const component = createBootComponent(
      { bmc_host: "192.168.2.12", mode: "reset" },
      { client: bmc },
    );

    const result = await component.execute();

    expect(result.success).toBe(true);
    expect(result.processing?.attempts.map((a) => a.attribute_group)).toEqual(["target"]);
    expect(bmc.attributes.TargetInfoViaDHCP).toBe(true);
    expect(result.housekeeping).toMatchObject({ validated: false, warnings: [] });
  });

  describe("boot order", () => {
    test("puts the PXE device first once the attributes are committed", async () => {
      bmc.commitImmediately = true;
      const component = createBootComponent({ ...INPUT, first_boot: "pxe" }, { client: bmc });

      const result = await component.execute();

      expect(result.success).toBe(true);
      expect(result.processing?.boot_order).toMatchObject({
        first_boot: "pxe",
        device: "Boot0000",
        before: ["Boot0001", "Boot0000"],
        requested: ["Boot0000", "Boot0001"],
        state: "committed",
      });
      expect(bmc.bootOrder).toEqual(["Boot0000", "Boot0001"]);
      expect(bmc.callsTo("triggerReboot")).toHaveLength(0);
      expect(result.housekeeping).toMatchObject({ boot_order_verified: true, warnings: [] });
    });

    test("a staged order change is committed by one more reboot", async () => {
      const component = createBootComponent({ ...INPUT, first_boot: "pxe" }, { client: bmc });

      const processing = await component.process();

      expect(processing.reboots).toBe(3);
      expect(processing.requires_reboot).toBe(false);
      expect(processing.boot_order).toMatchObject({ state: "committed", job_id: "JID_3" });
      expect(bmc.bootOrder).toEqual(["Boot0000", "Boot0001"]);
    });

    test("the order is left alone while NIC attributes await a reboot", async () => {
      const component = createBootComponent(
        { ...INPUT, first_boot: "pxe", reboot: false },
        { client: bmc },
      );

      const processing = await component.process();

      expect(processing.state).toBe("NetworkParamsPending");
      expect(processing.boot_order).toBeUndefined();
      expect(bmc.callsTo("setBootOrder")).toHaveLength(0);
    });

    test("a dry run plans the change and housekeeping reports the current order", async () => {
      const component = createBootComponent(
        { ...INPUT, first_boot: "pxe", dry_run: true },
        { client: bmc },
      );

      const result = await component.execute();

      expect(result.processing?.boot_order?.state).toBe("planned");
      expect(bmc.methodsCalled().filter((m) => MUTATING.includes(m))).toEqual([]);
      expect(bmc.bootOrder).toEqual(["Boot0001", "Boot0000"]);
      expect(result.housekeeping?.boot_order_verified).toBe(false);
      expect(result.housekeeping?.warnings).toContain(
        "boot order starts with Boot0001, not Boot0000 (pxe)",
      );
    });

    test("order mode touches only the boot order", async () => {
      const component = createBootComponent(
        { bmc_host: "192.168.2.12", mode: "order", first_boot: "hdd", poll_interval_s: 0 },
        { client: bmc },
      );

      const result = await component.execute();

      expect(result.success).toBe(true);
      expect(result.processing).toMatchObject({
        mode: "order",
        attempts: [],
        boot_order: { device: "Boot0001", state: "unchanged" },
        requires_reboot: false,
      });
      expect(bmc.methodsCalled().filter((m) => MUTATING.includes(m))).toEqual([]);
      expect(result.housekeeping).toMatchObject({ boot_order_verified: true, warnings: [] });
    });

    test("order mode without a first boot device fails at construction", () => {
      expect(() =>
        createBootComponent({ bmc_host: "192.168.2.12", mode: "order" }, { client: bmc }),
      ).toThrow(
        "Invalid boot configuration: first_boot: order mode needs a first boot device",
      );
    });

    test("a missing device kind is a validation failure", async () => {
      const component = createBootComponent(
        { bmc_host: "192.168.2.12", mode: "order", first_boot: "virtualcd" },
        { client: bmc },
      );

      await expect(component.process()).rejects.toMatchObject({
        code: "VALIDATION_FAILED",
        message: "no virtualcd boot device to put first",
      });
      expect(bmc.callsTo("setBootOrder")).toHaveLength(0);
    });
  });

  describe("exclusive NIC", () => {
    const OTHER = "NIC.Slot.2-1-1";

    beforeEach(() => {
      bmc.nicAttributes.set(OTHER, {
        TargetInfoViaDHCP: false,
        PrimaryTargetName: "iqn.2005-10.org.freenas.ctl:iscsi.r630-05.openshift4_17",
      });
    });

    test("clears the iSCSI target on the other NICs", async () => {
      bmc.commitImmediately = true;
      const component = createBootComponent({ ...INPUT, exclusive_nic: true }, { client: bmc });

      const result = await component.execute();

      expect(result.success).toBe(true);
      expect(result.processing?.cleared_nics).toEqual([OTHER]);
      const writes = bmc.callsTo("writeAttributeGroup").map((c) => [c.args[0], c.args[1]]);
      expect(writes).toEqual([
        ["NIC.Integrated.1-1-1", "network"],
        ["NIC.Integrated.1-1-1", "target"],
        [OTHER, "target"],
      ]);
      expect(bmc.nicAttributes.get(OTHER)).toMatchObject({
        TargetInfoViaDHCP: true,
        PrimaryTargetName: "",
      });
      expect(result.housekeeping?.other_iscsi_nics).toEqual([]);
      expect(bmc.attributes.PrimaryTargetName).toBe(IQN);
    });

    test("check-only reports the other NICs without clearing them", async () => {
      const component = createBootComponent(
        { ...INPUT, exclusive_nic: true, check_only: true },
        { client: bmc },
      );

      const result = await component.execute();

      expect(bmc.methodsCalled().filter((m) => MUTATING.includes(m))).toEqual([]);
      expect(result.housekeeping?.other_iscsi_nics).toEqual([OTHER]);
      expect(result.housekeeping?.warnings).toContain(`${OTHER} still names an iSCSI target`);
    });
  });
});
