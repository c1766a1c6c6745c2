export { ComponentInstance, type ComponentOptions } from "./component.js";
export { resolveConfig } from "./config.js";
export {
  ComponentError,
  type ComponentErrorCode,
  errorKindOf,
  errorMessageOf,
  isComponentError,
  isConnectivityFailure,
  isRetryableAfterReboot,
  type ProvisioningStep,
} from "./errors.js";
export { type IdSource, sequentialIds, ulidSource } from "./ids.js";
export { type FoldedOutcome, foldOutcomes, outcomeValue } from "./outcome-fold.js";
export { sleep, type TimeoutResult, withTimeout } from "./timeout.js";
export {
  type AggregateResult,
  type ArtifactContent,
  type ArtifactDraft,
  type ArtifactSink,
  type ArtifactVisibility,
  type Component,
  type ComponentStatus,
  type ComponentSummary,
  type ComponentTimestamps,
  type ExecuteOpts,
  type ExecutionMetadata,
  type OwnedArtifact,
  PHASES,
  type PhaseContext,
  type PhaseHandlers,
  type PhaseName,
  type PhaseOutcome,
  type PhaseState,
  type PhaseWindow,
} from "./types.js";
