import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import type { TargetsFile } from "../../schemas/target.js";
import { loadTargetsFile, selectTargets } from "../targets.js";

const SHIPPED = fileURLToPath(new URL("../../../config/iscsi_targets.json", import.meta.url));
const IQN = "iqn.2005-10.org.freenas.ctl:iscsi.r630-01.openshift4_18";

describe("loadTargetsFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "ironboot-targets-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("reads the shipped example file", async () => {
    const file = await loadTargetsFile(SHIPPED);
    expect(file.targets.map((t) => t.name)).toEqual([
      "r630-01-openshift4_18",
      "r630-01-openshift4_18-path2",
      "r630-02-openshift4_18",
    ]);
  });

  test("fills record defaults", async () => {
    const path = join(dir, "targets.json");
    await writeFile(path, JSON.stringify({ targets: [{ name: "t1", iqn: IQN, ip: "10.0.0.5" }] }));

    const file = await loadTargetsFile(path);
    expect(file.targets[0]).toEqual({
      name: "t1",
      description: "",
      iqn: IQN,
      ip: "10.0.0.5",
      port: 3260,
      lun: 0,
      auth_method: "None",
    });
  });

  test("a missing file is a CONFIGURATION error", async () => {
    await expect(loadTargetsFile(join(dir, "absent.json"))).rejects.toMatchObject({
      code: "CONFIGURATION",
    });
  });

  test("malformed JSON is a CONFIGURATION error", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, "{ targets: ");
    await expect(loadTargetsFile(path)).rejects.toThrow(`Targets file ${path} is not valid JSON`);
  });

  test("CHAP without credentials is rejected", async () => {
    const path = join(dir, "chap.json");
    await writeFile(
      path,
      JSON.stringify({ targets: [{ name: "t1", iqn: IQN, ip: "10.0.0.5", auth_method: "CHAP" }] }),
    );
    await expect(loadTargetsFile(path)).rejects.toThrow(
      "Invalid targets file: targets.0.chap_username: CHAP requires chap_username and chap_secret",
    );
  });

  test("duplicate names are rejected", async () => {
    const path = join(dir, "dup.json");
    const record = { name: "t1", iqn: IQN, ip: "10.0.0.5" };
    await writeFile(path, JSON.stringify({ targets: [record, record] }));
    await expect(loadTargetsFile(path)).rejects.toThrow('Duplicate target name "t1"');
  });
});

describe("selectTargets", () => {
  const file: TargetsFile = {
    targets: [
      { name: "a", description: "", iqn: IQN, ip: "192.168.2.245", port: 3260, lun: 0, auth_method: "None" },
      { name: "b", description: "", iqn: IQN, ip: "192.168.3.245", port: 3261, lun: 0, auth_method: "None" },
      {
        name: "other",
        description: "",
        iqn: "iqn.2005-10.org.freenas.ctl:iscsi.r630-03.openshift4_18",
        ip: "192.168.3.245",
        port: 3260,
        lun: 0,
        auth_method: "CHAP",
        chap_username: "r630-03",
        chap_secret: "test-secret",
      },
    ],
  };

  test("single target", () => {
    expect(selectTargets(file, "a")).toEqual({
      iqn: IQN,
      portal_address: "192.168.2.245",
      port: 3260,
      lun: 0,
    });
  });

  test("multipath pair on the same volume", () => {
    expect(selectTargets(file, "a", "b")).toEqual({
      iqn: IQN,
      portal_address: "192.168.2.245",
      port: 3260,
      lun: 0,
      secondary_iqn: IQN,
      secondary_portal: "192.168.3.245",
      secondary_port: 3261,
      secondary_lun: 0,
    });
  });

  test("a multipath pair on different volumes is rejected", () => {
    expect(() => selectTargets(file, "a", "other")).toThrow(/secondary iqn .* differs from primary/);
  });

  test("CHAP credentials come from the record", () => {
    expect(selectTargets(file, "other")).toMatchObject({
      chap_username: "r630-03",
      chap_secret: "test-secret",
    });
  });

  test("unknown names list what is available", () => {
    expect(() => selectTargets(file, "zzz")).toThrow(
      'Target "zzz" not found in targets file (available: a, b, other)',
    );
  });
});
