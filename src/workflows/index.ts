export {
  type BootOnlyDeps,
  buildBootOnlyWorkflow,
  buildIscsiBootWorkflow,
  type IscsiBootDeps,
  type IscsiBootResult,
  IscsiBootWorkflow,
  ownerFor,
  type ServerSpec,
  type ServerSpecInput,
  ServerSpecSchema,
} from "./iscsi-boot.js";
export { DEFAULT_TARGETS_FILE, loadTargetsFile, readJsonFile, selectTargets } from "./targets.js";
