import type { BootTargetDescriptor } from "../schemas/target.js";
import type { AttributeGroup, AttributeValues } from "./client.js";

export const DEFAULT_NIC = "NIC.Integrated.1-1-1";

export interface InitiatorOptions {
  initiator_name?: string;
  initiator_gateway?: string;
}

export function networkAttributes(): AttributeValues {
  return { IPMaskDNSViaDHCP: true, IPAddressType: "IPv4" };
}

export function targetAttributes(d: BootTargetDescriptor, opts: InitiatorOptions = {}): AttributeValues {
  const values: AttributeValues = {
    TargetInfoViaDHCP: false,
    PrimaryTargetName: d.iqn,
    PrimaryTargetIPAddress: d.portal_address,
    PrimaryTargetTCPPort: d.port,
    PrimaryLUN: d.lun,
  };
  if (d.secondary_portal !== undefined) {
    values.MultipleConnectionsEnabled = "Enabled";
    values.SecondaryTargetName = d.secondary_iqn ?? d.iqn;
    values.SecondaryTargetIPAddress = d.secondary_portal;
    values.SecondaryTargetTCPPort = d.secondary_port ?? d.port;
    values.SecondaryLUN = d.secondary_lun ?? d.lun;
  }
  if (opts.initiator_name) {
    values.InitiatorName = opts.initiator_name;
    values.InitiatorNameSource = "ConfiguredViaAPI";
  }
  if (opts.initiator_gateway) {
    values.InitiatorDefaultGateway = opts.initiator_gateway;
  }
  return values;
}

/** CHAP values, or undefined when the descriptor carries no credentials. */
export function authAttributes(d: BootTargetDescriptor): AttributeValues | undefined {
  if (d.chap_username === undefined || d.chap_secret === undefined) return undefined;
  const values: AttributeValues = {
    AuthenticationMethod: "CHAP",
    CHAPUsername: d.chap_username,
    CHAPSecret: d.chap_secret,
  };
  if (d.secondary_chap_username !== undefined && d.secondary_chap_secret !== undefined) {
    values.SecondaryUsername = d.secondary_chap_username;
    values.SecondarySecret = d.secondary_chap_secret;
  }
  return values;
}

/** Values to write per group. A group left out is not part of the plan. */
export type BootPlan = Partial<Record<AttributeGroup, AttributeValues>>;

export function planFor(d: BootTargetDescriptor, opts: InitiatorOptions = {}): BootPlan {
  const plan: BootPlan = {
    network: networkAttributes(),
    target: targetAttributes(d, opts),
  };
  const auth = authAttributes(d);
  if (auth) plan.auth = auth;
  return plan;
}

/** Back to DHCP with no static target. */
export function resetPlan(): BootPlan {
  return {
    network: { IPMaskDNSViaDHCP: true, IPAddressType: "IPv4" },
    target: {
      TargetInfoViaDHCP: true,
      PrimaryTargetName: "",
      PrimaryTargetIPAddress: "0.0.0.0",
      PrimaryTargetTCPPort: 3260,
      PrimaryLUN: 0,
    },
  };
}

const SECRET_KEY = /secret$/i;

/** Copy of the values with every secret masked, for logs and artifacts. */
export function redact(values: AttributeValues): AttributeValues {
  return Object.fromEntries(
    Object.entries(values).map(([k, v]) => [k, SECRET_KEY.test(k) ? "********" : v]),
  );
}
