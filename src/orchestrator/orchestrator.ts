import { errorKindOf, errorMessageOf, type ComponentErrorCode } from "../lifecycle/errors.js";
import type { Component, PhaseName, PhaseOutcome } from "../lifecycle/types.js";
import { type Logger, silentLogger } from "../logger.js";
import { topoSort } from "./graph.js";

export interface WorkflowEntry {
  key: string;
  component: Component;
  deps?: readonly string[];
  /** Required unless set to false. */
  required?: boolean;
}

export interface RunOpts {
  /** Stop after discovery. */
  dryRun?: boolean;
  /** Discover and verify; never process. */
  checkOnly?: boolean;
}

export interface ComponentReport {
  key: string;
  component_id: string;
  component_name: string;
  required: boolean;
  phases: Partial<Record<PhaseName, PhaseOutcome>>;
  /** Set when process() was withheld; blocked_by names the upstream that did not succeed. */
  skipped?: { reason: string; blocked_by?: string };
  success: boolean;
}

export interface WorkflowResult {
  success: boolean;
  aborted: boolean;
  abort_reason?: string;
  /** Keys in the order process() was considered. */
  order: string[];
  components: Record<string, ComponentReport>;
  warnings: string[];
}

/** Anything that runs to a WorkflowResult: an Orchestrator or a workflow wrapping one. */
export interface Runnable {
  run(opts?: RunOpts): Promise<WorkflowResult>;
}

export function exitCode(result: Pick<WorkflowResult, "success">): 0 | 1 {
  return result.success ? 0 : 1;
}

/** Housekeeping results that carry a warnings array get them surfaced. */
function warningsOf(value: unknown): string[] {
  if (typeof value !== "object" || value === null || !("warnings" in value)) return [];
  const { warnings } = value;
  return Array.isArray(warnings) ? warnings.filter((w): w is string => typeof w === "string") : [];
}

function isConnectivityKind(kind: ComponentErrorCode): boolean {
  return kind === "CONNECTIVITY" || kind === "TIMEOUT";
}

interface Node {
  entry: WorkflowEntry;
  report: ComponentReport;
}

/**
 * Runs a set of components as one workflow: discover all, process in
 * dependency order, housekeep all in reverse order.
 *
 * Failures of optional components become warnings; everything a required
 * component runs counts towards overall success.
 */
export class Orchestrator implements Runnable {
  readonly name: string;
  private readonly entries: WorkflowEntry[];
  private readonly logger: Logger;

  constructor(entries: readonly WorkflowEntry[], opts: { name?: string; logger?: Logger } = {}) {
    this.entries = topoSort(entries);
    this.name = opts.name ?? "workflow";
    this.logger = (opts.logger ?? silentLogger()).child({ workflow: this.name });
  }

  get order(): string[] {
    return this.entries.map((e) => e.key);
  }

  component(key: string): Component | undefined {
    return this.entries.find((e) => e.key === key)?.component;
  }

  async run(opts: RunOpts = {}): Promise<WorkflowResult> {
    const nodes = new Map<string, Node>();
    for (const entry of this.entries) {
      nodes.set(entry.key, {
        entry,
        report: {
          key: entry.key,
          component_id: entry.component.id,
          component_name: entry.component.name,
          required: entry.required !== false,
          phases: {},
          success: true,
        },
      });
    }
    const ordered = [...nodes.values()];
    const warnings: string[] = [];
    let abortReason: string | undefined;

    for (const node of ordered) {
      const outcome = await this.attempt(node, "discover");
      if (!isFailure(outcome)) continue;
      if (node.report.required && isConnectivityFailureOutcome(outcome) && abortReason === undefined) {
        abortReason = `${node.entry.key}: ${outcome.message}`;
        this.logger.error(
          { key: node.entry.key, error_kind: outcome.error_kind },
          "required component unreachable; aborting",
        );
      }
    }

    if (opts.dryRun) {
      return this.finish(ordered, warnings, abortReason);
    }

    if (abortReason === undefined && !opts.checkOnly) {
      for (const node of ordered) {
        const blocker = this.blocker(node, nodes);
        if (blocker !== undefined) {
          node.report.skipped = blocker;
          this.logger.warn({ key: node.entry.key, ...blocker }, "process skipped");
          continue;
        }
        await this.attempt(node, "process");
      }
    } else if (abortReason !== undefined) {
      for (const node of ordered) {
        node.report.skipped = { reason: `workflow aborted (${abortReason})` };
      }
    }

    for (const node of [...ordered].reverse()) {
      const outcome = await this.attempt(node, "housekeep");
      if (outcome.success) {
        for (const w of warningsOf(outcome.value)) warnings.push(`${node.entry.key}: ${w}`);
      }
    }

    return this.finish(ordered, warnings, abortReason);
  }

  /** Why node may not process: its own discovery failed, or an upstream did not process. */
  private blocker(node: Node, nodes: Map<string, Node>): ComponentReport["skipped"] {
    if (node.report.phases.discover?.success === false) {
      return { reason: "discovery failed" };
    }
    for (const dep of node.entry.deps ?? []) {
      const upstream = nodes.get(dep);
      if (upstream?.report.phases.process?.success !== true) {
        return { reason: `upstream ${dep} did not complete processing`, blocked_by: dep };
      }
    }
    return undefined;
  }

  private async attempt(node: Node, phase: PhaseName): Promise<PhaseOutcome> {
    const { component, key } = node.entry;
    let outcome: PhaseOutcome;
    try {
      const value = await callPhase(component, phase);
      outcome = { phase, success: true, value };
    } catch (err) {
      outcome = {
        phase,
        success: false,
        error_kind: errorKindOf(err),
        message: errorMessageOf(err),
        traceback: err instanceof Error ? err.stack : undefined,
      };
      this.logger.warn({ key, phase, error_kind: outcome.error_kind }, `${key} ${phase} failed`);
    }
    node.report.phases[phase] = outcome;
    return outcome;
  }

  private finish(ordered: Node[], warnings: string[], abortReason: string | undefined): WorkflowResult {
    const components: Record<string, ComponentReport> = {};
    let success = abortReason === undefined;

    for (const { report } of ordered) {
      const failed = Object.values(report.phases).filter(isFailure);
      report.success = failed.length === 0 && report.skipped === undefined;

      if (!report.success) {
        if (report.required) {
          success = false;
        } else if (abortReason === undefined) {
          const why = failed.map((o) => `${o.phase}: ${o.message}`).join("; ");
          warnings.push(`optional component ${report.key} did not succeed${why === "" ? "" : ` (${why})`}`);
        }
      }
      components[report.key] = report;
    }

    const result: WorkflowResult = {
      success,
      aborted: abortReason !== undefined,
      abort_reason: abortReason,
      order: ordered.map((n) => n.entry.key),
      components,
      warnings,
    };
    this.logger.info(
      { success, aborted: result.aborted, warnings: warnings.length },
      "workflow finished",
    );
    return result;
  }
}

type FailedOutcome = Extract<PhaseOutcome, { success: false }>;

function isFailure(outcome: PhaseOutcome | undefined): outcome is FailedOutcome {
  return outcome !== undefined && !outcome.success;
}

function isConnectivityFailureOutcome(outcome: PhaseOutcome): boolean {
  return isFailure(outcome) && isConnectivityKind(outcome.error_kind);
}

function callPhase(component: Component, phase: PhaseName): Promise<unknown> {
  switch (phase) {
    case "discover":
      return component.discover();
    case "process":
      return component.process();
    case "housekeep":
      return component.housekeep();
  }
}
