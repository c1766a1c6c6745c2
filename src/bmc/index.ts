export {
  authAttributes,
  type BootPlan,
  DEFAULT_NIC,
  type InitiatorOptions,
  networkAttributes,
  planFor,
  redact,
  resetPlan,
  targetAttributes,
} from "./attributes.js";
export {
  type BootComponent,
  type BootComponentDeps,
  type BootConfig,
  type BootConfigInput,
  BootConfigSchema,
  type BootDiscovery,
  type BootHousekeeping,
  type BootOrderChange,
  type BootProcessing,
  createBootComponent,
  type OrderChangeState,
} from "./boot-component.js";
export { findBootDevice, hasIscsiTarget, withFirst } from "./boot-order.js";
export {
  type AppliedState,
  BOOT_STATES,
  BootConfigurationStateMachine,
  type BootState,
  classifyBootDevices,
  type ConfigurationAttempt,
  inferProgress,
  isTerminal,
  TRANSITIONS,
  type ValidationOutcome,
  type ValidationReport,
} from "./boot-state-machine.js";
export * from "./client.js";
export { adapterOf, RedfishClient, type RedfishClientOpts, rejectionKind } from "./redfish-client.js";
