import { type Logger, silentLogger } from "../logger.js";
import { errorKindOf, errorMessageOf } from "./errors.js";
import { type IdSource, ulidSource } from "./ids.js";
import { foldOutcomes } from "./outcome-fold.js";
import {
  type AggregateResult,
  type ArtifactDraft,
  type ArtifactSink,
  type Component,
  type ComponentStatus,
  type ComponentSummary,
  type ComponentTimestamps,
  type ExecuteOpts,
  type OwnedArtifact,
  PHASES,
  type PhaseContext,
  type PhaseHandlers,
  type PhaseName,
  type PhaseOutcome,
  type PhaseState,
} from "./types.js";

export interface ComponentOptions<C, D, P, H> {
  name: string;
  config: Readonly<C>;
  handlers: PhaseHandlers<C, D, P, H>;
  logger?: Logger;
  /** Caller-supplied id; otherwise one is drawn from idSource. */
  id?: string;
  idSource?: IdSource;
  /** Receives pending artifacts during housekeep(). */
  sink?: ArtifactSink;
  /** Logical owner stamped on artifacts, e.g. "r630-02/dumpty". Defaults to name:id. */
  owner?: string;
  clock?: () => Date;
}

const PHASE_FLAG: Record<PhaseName, keyof PhaseState> = {
  discover: "discovered",
  process: "processed",
  housekeep: "housekept",
};

/**
 * One execution unit bound to one external system.
 *
 * Owns phase bookkeeping (flags, results, status, timestamps, artifacts) and
 * delegates the actual work to injected PhaseHandlers. Phase methods throw;
 * execute() never does.
 */
export class ComponentInstance<C, D, P, H> implements Component<D, P, H> {
  readonly id: string;
  readonly name: string;
  readonly config: Readonly<C>;

  private readonly handlers: PhaseHandlers<C, D, P, H>;
  private readonly logger: Logger;
  private readonly sink?: ArtifactSink;
  private readonly owner: string;
  private readonly clock: () => Date;

  private readonly flags: PhaseState = {
    discovered: false,
    processed: false,
    housekept: false,
  };
  private currentStatus: ComponentStatus = { success: true };
  private readonly times: ComponentTimestamps;
  private discovery?: D;
  private processing?: P;
  private housekeeping?: H;
  private pending: OwnedArtifact[] = [];
  private recorded: string[] = [];

  constructor(opts: ComponentOptions<C, D, P, H>) {
    this.name = opts.name;
    this.config = opts.config;
    this.handlers = opts.handlers;
    this.id = opts.id ?? (opts.idSource ?? ulidSource)();
    this.sink = opts.sink;
    this.owner = opts.owner ?? `${opts.name}:${this.id}`;
    this.clock = opts.clock ?? (() => new Date());
    this.logger = (opts.logger ?? silentLogger()).child({
      component: this.name,
      component_id: this.id,
    });
    this.times = { created_at: this.now(), phases: {} };
  }

  get phaseState(): Readonly<PhaseState> {
    return { ...this.flags };
  }

  get status(): Readonly<ComponentStatus> {
    return { ...this.currentStatus };
  }

  get discoveryResult(): D | undefined {
    return this.discovery;
  }

  get processingResult(): P | undefined {
    return this.processing;
  }

  get housekeepingResult(): H | undefined {
    return this.housekeeping;
  }

  get pendingArtifacts(): readonly OwnedArtifact[] {
    return this.pending;
  }

  async discover(): Promise<D> {
    const value = await this.runPhase("discover", () =>
      this.handlers.discover(this.context()),
    );
    this.discovery = value;
    return value;
  }

  async process(): Promise<P> {
    let discovery = this.discovery;
    if (!this.flags.discovered || discovery === undefined) {
      this.logger.warn("process() called before discover(); running discovery first");
      discovery = await this.discover();
    }
    const current = discovery;
    const value = await this.runPhase("process", () =>
      this.handlers.process(this.context(), current),
    );
    this.processing = value;
    return value;
  }

  async housekeep(): Promise<H> {
    const value = await this.runPhase("housekeep", async () => {
      const result = await this.handlers.housekeep(this.context(), this.discovery);
      await this.flushArtifacts();
      return result;
    });
    this.housekeeping = value;
    return value;
  }

  async execute(
    phases: readonly PhaseName[] = PHASES,
    opts: ExecuteOpts = {},
  ): Promise<AggregateResult<D, P, H>> {
    const outcomes: PhaseOutcome[] = [];

    for (const phase of phases) {
      const outcome = await this.attempt(phase);
      outcomes.push(outcome);
      if (!outcome.success && !opts.continueOnError) break;
    }

    const folded = foldOutcomes(outcomes);
    if (!folded.success && this.pending.length > 0) {
      await this.flushBestEffort();
    }

    return {
      success: folded.success,
      discovery: this.discovery,
      processing: this.processing,
      housekeeping: this.housekeeping,
      error: folded.error,
      error_kind: folded.error_kind,
      traceback: folded.traceback,
      metadata: {
        component_id: this.id,
        component_name: this.name,
        phases_executed: folded.phases_executed,
        phase_state: { ...this.flags },
        status: { ...this.currentStatus },
        timestamps: this.snapshotTimes(),
        outcomes,
      },
    };
  }

  summary(): ComponentSummary {
    return {
      component_id: this.id,
      component_name: this.name,
      status: { ...this.currentStatus },
      phase_state: { ...this.flags },
      timestamps: this.snapshotTimes(),
      pending_artifacts: this.pending.length,
      recorded_artifacts: [...this.recorded],
    };
  }

  /** Run one phase and turn its result or exception into an outcome. */
  private async attempt(phase: PhaseName): Promise<PhaseOutcome> {
    try {
      const value = await this.callPhase(phase);
      return { phase, success: true, value };
    } catch (err) {
      return {
        phase,
        success: false,
        error_kind: errorKindOf(err),
        message: errorMessageOf(err),
        traceback: err instanceof Error ? err.stack : undefined,
      };
    }
  }

  private callPhase(phase: PhaseName): Promise<unknown> {
    switch (phase) {
      case "discover":
        return this.discover();
      case "process":
        return this.process();
      case "housekeep":
        return this.housekeep();
    }
  }

  private async runPhase<T>(phase: PhaseName, body: () => Promise<T>): Promise<T> {
    const window = { started_at: this.now() };
    this.times.phases[phase] = window;
    this.logger.debug({ phase }, "phase started");

    try {
      const value = await body();
      this.flags[PHASE_FLAG[phase]] = true;
      this.currentStatus = { ...this.currentStatus, message: `${phase} completed` };
      this.logger.info({ phase }, "phase completed");
      return value;
    } catch (err) {
      this.currentStatus = {
        success: false,
        error: errorMessageOf(err),
        error_kind: errorKindOf(err),
        message: `${phase} failed`,
      };
      this.logger.error(
        { phase, error_kind: errorKindOf(err), err },
        `${phase} failed`,
      );
      throw err;
    } finally {
      this.times.phases[phase] = { ...window, ended_at: this.now() };
    }
  }

  private context(): PhaseContext<C> {
    return {
      id: this.id,
      name: this.name,
      config: this.config,
      logger: this.logger,
      addArtifact: (draft) => this.addArtifact(draft),
    };
  }

  private addArtifact(draft: ArtifactDraft): void {
    this.pending.push({
      ...draft,
      owner: this.owner,
      metadata: {
        ...draft.metadata,
        owner: this.owner,
        timestamp: this.now(),
        component: this.name,
        component_id: this.id,
      },
    });
  }

  /** Persist pending artifacts; the first failure is rethrown after trying the rest. */
  private async flushArtifacts(): Promise<void> {
    if (!this.sink || this.pending.length === 0) return;

    const failed: OwnedArtifact[] = [];
    let firstError: unknown;
    for (const artifact of this.pending) {
      try {
        const { key } = await this.sink.record(artifact);
        this.recorded.push(key);
      } catch (err) {
        failed.push(artifact);
        firstError ??= err;
      }
    }
    this.pending = failed;
    if (failed.length > 0) throw firstError;
  }

  private async flushBestEffort(): Promise<void> {
    try {
      await this.flushArtifacts();
    } catch (err) {
      this.logger.warn(
        { err, remaining: this.pending.length },
        "could not persist artifacts after failed execution",
      );
    }
  }

  private snapshotTimes(): ComponentTimestamps {
    return { created_at: this.times.created_at, phases: { ...this.times.phases } };
  }

  private now(): string {
    return this.clock().toISOString();
  }
}
