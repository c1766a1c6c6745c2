export { WorkflowError, type WorkflowErrorCode } from "./errors.js";
export { type FleetMember, type FleetMemberResult, type FleetOpts, type FleetResult, runFleet } from "./fleet.js";
export { type GraphNode, topoSort } from "./graph.js";
export {
  type ComponentReport,
  exitCode,
  Orchestrator,
  type RunOpts,
  type Runnable,
  type WorkflowEntry,
  type WorkflowResult,
} from "./orchestrator.js";
