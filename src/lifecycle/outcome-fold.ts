import type { ComponentErrorCode } from "./errors.js";
import type { PhaseName, PhaseOutcome } from "./types.js";

export interface FoldedOutcome {
  success: boolean;
  phases_executed: PhaseName[];
  failed_phases: PhaseName[];
  error?: string;
  error_kind?: ComponentErrorCode;
  traceback?: string;
}

/**
 * Fold phase outcomes into an aggregate.
 *
 * Fold rules:
 *   success → AND of every executed phase
 *   error   → last failure wins (matches status semantics)
 *
 * Empty outcomes → success with nothing executed.
 */
export function foldOutcomes(outcomes: readonly PhaseOutcome[]): FoldedOutcome {
  const folded: FoldedOutcome = {
    success: true,
    phases_executed: [],
    failed_phases: [],
  };

  for (const outcome of outcomes) {
    folded.phases_executed.push(outcome.phase);
    if (outcome.success) continue;
    folded.success = false;
    folded.failed_phases.push(outcome.phase);
    folded.error = outcome.message;
    folded.error_kind = outcome.error_kind;
    folded.traceback = outcome.traceback;
  }

  return folded;
}

/** Value of the successful outcome for a phase, if any. */
export function outcomeValue<T>(
  outcomes: readonly PhaseOutcome<T>[],
  phase: PhaseName,
): T | undefined {
  for (const outcome of outcomes) {
    if (outcome.phase === phase && outcome.success) return outcome.value;
  }
  return undefined;
}
