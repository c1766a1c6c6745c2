import type { Logger } from "../logger.js";
import type { ComponentErrorCode } from "./errors.js";

export const PHASES = ["discover", "process", "housekeep"] as const;
export type PhaseName = (typeof PHASES)[number];

/** Monotonic per-phase flags: once true, never reset for an instance. */
export interface PhaseState {
  discovered: boolean;
  processed: boolean;
  housekept: boolean;
}

export interface ComponentStatus {
  success: boolean;
  error?: string;
  error_kind?: ComponentErrorCode;
  message?: string;
}

export interface PhaseWindow {
  started_at: string;
  ended_at?: string;
}

export interface ComponentTimestamps {
  created_at: string;
  phases: Partial<Record<PhaseName, PhaseWindow>>;
}

export type PhaseOutcome<T = unknown> =
  | { phase: PhaseName; success: true; value: T }
  | {
      phase: PhaseName;
      success: false;
      error_kind: ComponentErrorCode;
      message: string;
      traceback?: string;
    };

export interface ExecutionMetadata {
  component_id: string;
  component_name: string;
  phases_executed: PhaseName[];
  phase_state: PhaseState;
  status: ComponentStatus;
  timestamps: ComponentTimestamps;
  outcomes: PhaseOutcome[];
}

export interface AggregateResult<D = unknown, P = unknown, H = unknown> {
  success: boolean;
  discovery?: D;
  processing?: P;
  housekeeping?: H;
  error?: string;
  error_kind?: ComponentErrorCode;
  traceback?: string;
  metadata: ExecutionMetadata;
}

export interface ExecuteOpts {
  /** Run later phases even after one fails. Off by default. */
  continueOnError?: boolean;
}

export type ArtifactVisibility = "private-versioned" | "public-latest";

export type ArtifactContent = string | Uint8Array | Record<string, unknown>;

/** Artifact produced during process(), persisted during housekeep(). */
export interface ArtifactDraft {
  kind: string;
  content: ArtifactContent;
  metadata?: Record<string, unknown>;
  visibility?: ArtifactVisibility;
  version_tag?: string;
}

/** Artifact ready for the ledger: owner and timestamp are filled in. */
export interface OwnedArtifact extends ArtifactDraft {
  owner: string;
  metadata: Record<string, unknown> & { owner: string; timestamp: string };
}

/** Where components flush artifacts. The ledger implements this. */
export interface ArtifactSink {
  record(artifact: OwnedArtifact): Promise<{ key: string }>;
}

export interface PhaseContext<C> {
  readonly id: string;
  readonly name: string;
  readonly config: Readonly<C>;
  readonly logger: Logger;
  addArtifact(draft: ArtifactDraft): void;
}

/**
 * Backend-specific phase bodies. ComponentInstance owns all bookkeeping;
 * handlers only talk to their external system.
 */
export interface PhaseHandlers<C, D, P, H> {
  discover(ctx: PhaseContext<C>): Promise<D>;
  process(ctx: PhaseContext<C>, discovery: D): Promise<P>;
  /** Must verify remote state itself; never trust the processing result. */
  housekeep(ctx: PhaseContext<C>, discovery: D | undefined): Promise<H>;
}

export interface ComponentSummary {
  component_id: string;
  component_name: string;
  status: ComponentStatus;
  phase_state: PhaseState;
  timestamps: ComponentTimestamps;
  pending_artifacts: number;
  recorded_artifacts: string[];
}

/** Capability interface every component satisfies. */
export interface Component<D = unknown, P = unknown, H = unknown> {
  readonly id: string;
  readonly name: string;
  readonly phaseState: Readonly<PhaseState>;
  readonly status: Readonly<ComponentStatus>;
  readonly discoveryResult: D | undefined;
  readonly processingResult: P | undefined;
  readonly housekeepingResult: H | undefined;
  discover(): Promise<D>;
  process(): Promise<P>;
  housekeep(): Promise<H>;
  execute(
    phases?: readonly PhaseName[],
    opts?: ExecuteOpts,
  ): Promise<AggregateResult<D, P, H>>;
  summary(): ComponentSummary;
}
