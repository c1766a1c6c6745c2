import { describe, expect, test } from "vitest";
import { parseDescriptor } from "../../schemas/target.js";
import { authAttributes, planFor, redact, targetAttributes } from "../attributes.js";

const IQN = "iqn.2005-10.org.freenas.ctl:iscsi.r630-02.openshift4_18";

describe("attribute groups", () => {
  test("single path target", () => {
    const d = parseDescriptor({ iqn: IQN, portal_address: "192.168.2.245" });
    expect(targetAttributes(d)).toEqual({
      TargetInfoViaDHCP: false,
      PrimaryTargetName: IQN,
      PrimaryTargetIPAddress: "192.168.2.245",
      PrimaryTargetTCPPort: 3260,
      PrimaryLUN: 0,
    });
    expect(authAttributes(d)).toBeUndefined();
    expect(Object.keys(planFor(d))).toEqual(["network", "target"]);
  });

  test("multipath adds the secondary portal for the same volume", () => {
    const d = parseDescriptor({
      iqn: IQN,
      portal_address: "192.168.2.245",
      secondary_portal: "192.168.3.245",
    });
    expect(targetAttributes(d, { initiator_name: "iqn.2016-04.com.example:r630-02" })).toEqual({
      TargetInfoViaDHCP: false,
      PrimaryTargetName: IQN,
      PrimaryTargetIPAddress: "192.168.2.245",
      PrimaryTargetTCPPort: 3260,
      PrimaryLUN: 0,
      MultipleConnectionsEnabled: "Enabled",
      SecondaryTargetName: IQN,
      SecondaryTargetIPAddress: "192.168.3.245",
      SecondaryTargetTCPPort: 3260,
      SecondaryLUN: 0,
      InitiatorName: "iqn.2016-04.com.example:r630-02",
      InitiatorNameSource: "ConfiguredViaAPI",
    });
  });

  test("multipath CHAP carries both credential pairs", () => {
    const d = parseDescriptor({
      iqn: IQN,
      portal_address: "192.168.2.245",
      secondary_portal: "192.168.3.245",
      chap_username: "initiator",
      chap_secret: "test-secret",
      secondary_chap_username: "initiator2",
      secondary_chap_secret: "test-secret-2",
    });
    expect(authAttributes(d)).toEqual({
      AuthenticationMethod: "CHAP",
      CHAPUsername: "initiator",
      CHAPSecret: "test-secret",
      SecondaryUsername: "initiator2",
      SecondarySecret: "test-secret-2",
    });
    expect(Object.keys(planFor(d))).toEqual(["network", "target", "auth"]);
  });

  test("redact masks secret-valued keys only", () => {
    expect(redact({ CHAPUsername: "initiator", CHAPSecret: "test-secret", SecondarySecret: "x" })).toEqual({
      CHAPUsername: "initiator",
      CHAPSecret: "********",
      SecondarySecret: "********",
    });
  });
});
