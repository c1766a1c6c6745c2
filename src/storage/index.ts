export {
  type CapacityCheck,
  createIscsiComponent,
  descriptorOf,
  type IscsiComponent,
  type IscsiComponentDeps,
  type IscsiConfig,
  type IscsiConfigInput,
  IscsiConfigSchema,
  type IscsiDiscovery,
  type IscsiHousekeeping,
  type IscsiProcessing,
} from "./iscsi-component.js";
export {
  DEFAULT_LUN,
  IQN_PREFIX,
  ISCSI_PORT,
  normalizeVersion,
  type ResourceNames,
  resourceNames,
} from "./naming.js";
export {
  IdempotentProvisioner,
  PROVISIONING_STEPS,
  type ProvisionRequest,
  type ProvisionResult,
  type StepReport,
} from "./provisioner.js";
export { formatGiB, parseSize } from "./size.js";
export { TrueNasClient, type TrueNasClientOpts } from "./truenas-client.js";
export * from "./types.js";
