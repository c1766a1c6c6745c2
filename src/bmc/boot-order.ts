import type { AttributeValue, BootDevice, FirstBootDevice } from "./client.js";

const DEVICE_PATTERNS: Readonly<Record<FirstBootDevice, RegExp>> = {
  iscsi: /iscsi/i,
  pxe: /pxe|network/i,
  http: /uefihttp|\bhttp/i,
  virtualcd: /virtual\s*(cd|media)|\bvcd\b/i,
  hdd: /hard\s*drive|\bhdd\b|disk/i,
};

function textOf(device: BootDevice): string {
  return `${device.display_name} ${device.path ?? ""}`;
}

/**
 * The enabled boot option a first-boot request names. An iSCSI request settles for a
 * PXE device when the NIC exposes no explicit iSCSI option.
 */
export function findBootDevice(
  devices: readonly BootDevice[],
  kind: FirstBootDevice,
): BootDevice | undefined {
  const enabled = devices.filter((d) => d.enabled);
  const match = enabled.find((d) => DEVICE_PATTERNS[kind].test(textOf(d)));
  if (match !== undefined || kind !== "iscsi") return match;
  return enabled.find((d) => DEVICE_PATTERNS.pxe.test(textOf(d)));
}

/** `first` moved to the front; the rest keep their relative order. */
export function withFirst(order: readonly string[], first: string): string[] {
  return [first, ...order.filter((id) => id !== first)];
}

/** True when a NIC's attributes name a static iSCSI target. */
export function hasIscsiTarget(attributes: Record<string, AttributeValue | null>): boolean {
  const name = attributes.PrimaryTargetName;
  return typeof name === "string" && name.trim() !== "";
}
