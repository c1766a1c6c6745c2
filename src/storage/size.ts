import { ComponentError } from "../lifecycle/errors.js";

const UNITS: Record<string, number> = {
  K: 1024,
  M: 1024 ** 2,
  G: 1024 ** 3,
  T: 1024 ** 4,
};

/** "500G" → bytes, binary multiples. A bare number is already bytes. */
export function parseSize(size: string): number {
  const match = /^\s*(\d+)\s*([KMGT])?i?B?\s*$/i.exec(size);
  if (!match) {
    throw new ComponentError("CONFIGURATION", `Invalid size "${size}" (expected e.g. 500G)`);
  }
  const [, digits, unit] = match;
  return Number(digits) * (unit ? UNITS[unit.toUpperCase()] : 1);
}

export function formatGiB(bytes: number): string {
  return `${(bytes / 1024 ** 3).toFixed(1)} GiB`;
}
