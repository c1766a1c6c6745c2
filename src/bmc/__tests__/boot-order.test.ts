import { describe, expect, test } from "vitest";
import { findBootDevice, hasIscsiTarget, withFirst } from "../boot-order.js";
import type { BootDevice } from "../client.js";

const DEVICES: BootDevice[] = [
  { id: "Boot0000", display_name: "PXE Device 1: Integrated NIC 1 Port 1 Partition 1", enabled: true },
  { id: "Boot0001", display_name: "Hard drive C:", enabled: true },
  { id: "Boot0002", display_name: "Virtual Optical Drive", enabled: false },
  { id: "Boot0003", display_name: "UEFI HTTP Device 1", enabled: true },
];

describe("findBootDevice", () => {
  test("matches each device kind by its display name", () => {
    expect(findBootDevice(DEVICES, "pxe")?.id).toBe("Boot0000");
    expect(findBootDevice(DEVICES, "hdd")?.id).toBe("Boot0001");
    expect(findBootDevice(DEVICES, "http")?.id).toBe("Boot0003");
  });

  test("iSCSI settles for PXE when no iSCSI option exists", () => {
    expect(findBootDevice(DEVICES, "iscsi")?.id).toBe("Boot0000");
    const withIscsi = [
      ...DEVICES,
      { id: "Boot0004", display_name: "iSCSI Device 1: Integrated NIC 1 Port 1", enabled: true },
    ];
    expect(findBootDevice(withIscsi, "iscsi")?.id).toBe("Boot0004");
  });

  test("disabled options are never chosen", () => {
    const devices: BootDevice[] = [
      { id: "Boot0002", display_name: "Virtual CD", enabled: false },
    ];
    expect(findBootDevice(devices, "virtualcd")).toBeUndefined();
  });
});

describe("withFirst", () => {
  test("moves the device to the front and keeps the rest in order", () => {
    expect(withFirst(["Boot0001", "Boot0002", "Boot0000"], "Boot0000")).toEqual([
      "Boot0000",
      "Boot0001",
      "Boot0002",
    ]);
  });

  test("adds a device the order did not list", () => {
    expect(withFirst(["Boot0001"], "Boot0003")).toEqual(["Boot0003", "Boot0001"]);
  });
});

describe("hasIscsiTarget", () => {
  test("needs a non-blank target name", () => {
    expect(hasIscsiTarget({ PrimaryTargetName: "iqn.2005-10.org.freenas.ctl:iscsi.r630-02" })).toBe(true);
    expect(hasIscsiTarget({ PrimaryTargetName: " " })).toBe(false);
    expect(hasIscsiTarget({ PrimaryTargetName: null })).toBe(false);
    expect(hasIscsiTarget({})).toBe(false);
  });
});
