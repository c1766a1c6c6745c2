import { readFile } from "node:fs/promises";
import { ComponentError, errorMessageOf } from "../lifecycle/errors.js";
import {
  type BootTargetDescriptor,
  descriptorFromRecords,
  parseTargetsFile,
  type TargetRecord,
  type TargetsFile,
} from "../schemas/target.js";

export const DEFAULT_TARGETS_FILE = "config/iscsi_targets.json";

/** Parsed JSON from a local file. Unreadable or malformed files are CONFIGURATION errors. */
export async function readJsonFile(path: string, what: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (err) {
    throw new ComponentError("CONFIGURATION", `Cannot read ${what} ${path}: ${errorMessageOf(err)}`, {
      cause: err,
    });
  }

  try {
    return JSON.parse(raw);
  } catch (err) {
    const label = what.charAt(0).toUpperCase() + what.slice(1);
    throw new ComponentError("CONFIGURATION", `${label} ${path} is not valid JSON: ${errorMessageOf(err)}`, {
      cause: err,
    });
  }
}

/** Read and validate a target descriptor file. */
export async function loadTargetsFile(path: string = DEFAULT_TARGETS_FILE): Promise<TargetsFile> {
  return parseTargetsFile(await readJsonFile(path, "targets file"));
}

function findTarget(file: TargetsFile, name: string): TargetRecord {
  const record = file.targets.find((t) => t.name === name);
  if (!record) {
    const available = file.targets.map((t) => t.name).join(", ") || "none";
    throw new ComponentError("CONFIGURATION", `Target "${name}" not found in targets file (available: ${available})`);
  }
  return record;
}

/**
 * Descriptor for the named primary target and, for multipath, a secondary.
 * The pair must share iqn and lun.
 */
export function selectTargets(file: TargetsFile, primary: string, secondary?: string): BootTargetDescriptor {
  const first = findTarget(file, primary);
  const second = secondary === undefined ? undefined : findTarget(file, secondary);
  return descriptorFromRecords(first, second);
}
