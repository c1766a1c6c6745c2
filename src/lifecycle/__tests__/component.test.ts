import { describe, expect, test, vi } from "vitest";
import { z } from "zod";
import {
  type ArtifactSink,
  ComponentError,
  ComponentInstance,
  type OwnedArtifact,
  type PhaseHandlers,
  type PhaseState,
  resolveConfig,
  sequentialIds,
} from "../index.js";

interface Cfg {
  label: string;
}

function createMockHandlers(
  overrides: Partial<PhaseHandlers<Cfg, string, number, boolean>> = {},
): PhaseHandlers<Cfg, string, number, boolean> {
  return {
    discover: vi.fn(async () => "inventory"),
    process: vi.fn(async () => 42),
    housekeep: vi.fn(async () => true),
    ...overrides,
  };
}

function createComponent(
  handlers = createMockHandlers(),
  extra: { sink?: ArtifactSink } = {},
) {
  return new ComponentInstance<Cfg, string, number, boolean>({
    name: "mock",
    config: { label: "x" },
    handlers,
    idSource: sequentialIds("cmp"),
    clock: () => new Date("2025-01-02T03:04:05.000Z"),
    owner: "r630-02/dumpty",
    ...extra,
  });
}

function createMemorySink(): ArtifactSink & { records: OwnedArtifact[] } {
  const records: OwnedArtifact[] = [];
  return {
    records,
    record: async (artifact) => {
      records.push(artifact);
      return { key: `k${records.length}` };
    },
  };
}

describe("ComponentInstance", () => {
  test("draws its id from the injected source", () => {
    const ids = sequentialIds("cmp");
    const handlers = createMockHandlers();
    const a = new ComponentInstance({ name: "a", config: { label: "a" }, handlers, idSource: ids });
    const b = new ComponentInstance({ name: "b", config: { label: "b" }, handlers, idSource: ids });
    expect(a.id).toBe("cmp-1");
    expect(b.id).toBe("cmp-2");
  });

  test("caller-supplied id wins", () => {
    const c = new ComponentInstance({
      name: "a",
      config: { label: "a" },
      handlers: createMockHandlers(),
      id: "fixed",
    });
    expect(c.id).toBe("fixed");
  });

  test("discover records result and sets flag", async () => {
    const c = createComponent();
    await expect(c.discover()).resolves.toBe("inventory");
    expect(c.discoveryResult).toBe("inventory");
    expect(c.phaseState).toEqual({ discovered: true, processed: false, housekept: false });
    expect(c.status.success).toBe(true);
  });

  test("discover failure sets status and rethrows", async () => {
    const c = createComponent(
      createMockHandlers({
        discover: async () => {
          throw new ComponentError("CONNECTIVITY", "appliance unreachable");
        },
      }),
    );

    await expect(c.discover()).rejects.toThrow("appliance unreachable");
    expect(c.status).toEqual({
      success: false,
      error: "appliance unreachable",
      error_kind: "CONNECTIVITY",
      message: "discover failed",
    });
    expect(c.phaseState.discovered).toBe(false);
  });

  test("process without discover runs discovery implicitly", async () => {
    const handlers = createMockHandlers();
    const c = createComponent(handlers);

    await expect(c.process()).resolves.toBe(42);
    expect(handlers.discover).toHaveBeenCalledTimes(1);
    expect(handlers.process).toHaveBeenCalledWith(expect.anything(), "inventory");
    expect(c.phaseState).toEqual({ discovered: true, processed: true, housekept: false });
  });

  test("process after discover does not rediscover", async () => {
    const handlers = createMockHandlers();
    const c = createComponent(handlers);
    await c.discover();
    await c.process();
    expect(handlers.discover).toHaveBeenCalledTimes(1);
  });

  test("implicit discovery failure aborts process", async () => {
    const handlers = createMockHandlers({
      discover: async () => {
        throw new ComponentError("TIMEOUT", "timed out");
      },
    });
    const c = createComponent(handlers);
    await expect(c.process()).rejects.toThrow("timed out");
    expect(handlers.process).not.toHaveBeenCalled();
  });

  test("housekeep receives discovery result, not processing result", async () => {
    const handlers = createMockHandlers();
    const c = createComponent(handlers);
    await c.discover();
    await c.process();
    await c.housekeep();
    expect(handlers.housekeep).toHaveBeenCalledWith(expect.anything(), "inventory");
  });

  test("phase flags never reset after a later failure", async () => {
    let calls = 0;
    const c = createComponent(
      createMockHandlers({
        discover: async () => {
          calls++;
          if (calls > 1) throw new ComponentError("CONNECTIVITY", "gone");
          return "inventory";
        },
      }),
    );

    const seen: PhaseState[] = [];
    await c.discover();
    seen.push(c.phaseState);
    await expect(c.discover()).rejects.toThrow("gone");
    seen.push(c.phaseState);
    await c.housekeep();
    seen.push(c.phaseState);

    expect(seen.map((s) => s.discovered)).toEqual([true, true, true]);
    expect(c.phaseState.housekept).toBe(true);
  });

  test("records start and end timestamps per phase", async () => {
    const c = createComponent();
    await c.discover();
    expect(c.summary().timestamps).toEqual({
      created_at: "2025-01-02T03:04:05.000Z",
      phases: {
        discover: {
          started_at: "2025-01-02T03:04:05.000Z",
          ended_at: "2025-01-02T03:04:05.000Z",
        },
      },
    });
  });
});

describe("execute", () => {
  test("runs all phases in order and succeeds", async () => {
    const order: string[] = [];
    const c = createComponent(
      createMockHandlers({
        discover: async () => {
          order.push("d");
          return "inv";
        },
        process: async () => {
          order.push("p");
          return 1;
        },
        housekeep: async () => {
          order.push("h");
          return true;
        },
      }),
    );

    const result = await c.execute();
    expect(order).toEqual(["d", "p", "h"]);
    expect(result.success).toBe(true);
    expect(result.discovery).toBe("inv");
    expect(result.processing).toBe(1);
    expect(result.housekeeping).toBe(true);
    expect(result.metadata.phases_executed).toEqual(["discover", "process", "housekeep"]);
    expect(result.metadata.component_id).toBe("cmp-1");
    expect(result.metadata.component_name).toBe("mock");
  });

  test("never throws and stops at the first failure by default", async () => {
    const handlers = createMockHandlers({
      process: async () => {
        throw new ComponentError("PROVISIONING_STEP_FAILED", "extent create failed", {
          step: "extent",
        });
      },
    });
    const c = createComponent(handlers);

    const result = await c.execute();
    expect(result.success).toBe(false);
    expect(result.error).toBe("extent create failed");
    expect(result.error_kind).toBe("PROVISIONING_STEP_FAILED");
    expect(result.traceback).toContain("extent create failed");
    expect(result.metadata.phases_executed).toEqual(["discover", "process"]);
    expect(result.metadata.status.success).toBe(false);
    expect(result.metadata.phase_state).toEqual({
      discovered: true,
      processed: false,
      housekept: false,
    });
    expect(handlers.housekeep).not.toHaveBeenCalled();
  });

  test("continueOnError runs later phases but overall success is the AND", async () => {
    const handlers = createMockHandlers({
      process: async () => {
        throw new Error("boom");
      },
    });
    const c = createComponent(handlers);

    const result = await c.execute(undefined, { continueOnError: true });
    expect(handlers.housekeep).toHaveBeenCalledTimes(1);
    expect(result.success).toBe(false);
    expect(result.error_kind).toBe("INTERNAL");
    expect(result.metadata.outcomes.map((o) => o.success)).toEqual([true, false, true]);
    expect(result.metadata.phase_state.housekept).toBe(true);
  });

  test("runs only the requested phases", async () => {
    const handlers = createMockHandlers();
    const c = createComponent(handlers);
    const result = await c.execute(["discover"]);
    expect(result.metadata.phases_executed).toEqual(["discover"]);
    expect(handlers.process).not.toHaveBeenCalled();
  });
});

describe("artifacts", () => {
  test("artifacts added in process are flushed during housekeep with owner and timestamp", async () => {
    const sink = createMemorySink();
    const c = createComponent(
      createMockHandlers({
        process: async (ctx) => {
          ctx.addArtifact({ kind: "iscsi-resources", content: { iqn: "iqn.x" } });
          return 1;
        },
      }),
      { sink },
    );

    await c.process();
    expect(c.pendingArtifacts).toHaveLength(1);
    expect(sink.records).toHaveLength(0);

    await c.housekeep();
    expect(sink.records).toHaveLength(1);
    expect(sink.records[0].owner).toBe("r630-02/dumpty");
    expect(sink.records[0].metadata).toEqual({
      owner: "r630-02/dumpty",
      timestamp: "2025-01-02T03:04:05.000Z",
      component: "mock",
      component_id: "cmp-1",
    });
    expect(c.summary().recorded_artifacts).toEqual(["k1"]);
    expect(c.pendingArtifacts).toHaveLength(0);
  });

  test("artifacts are still flushed when execution fails after process", async () => {
    const sink = createMemorySink();
    const c = createComponent(
      createMockHandlers({
        process: async (ctx) => {
          ctx.addArtifact({ kind: "log", content: "partial" });
          throw new ComponentError("PROVISIONING_STEP_FAILED", "target failed", {
            step: "target",
          });
        },
      }),
      { sink },
    );

    const result = await c.execute();
    expect(result.success).toBe(false);
    expect(sink.records.map((r) => r.content)).toEqual(["partial"]);
  });

  test("housekeep fails when the sink rejects, keeping the artifact pending", async () => {
    const sink: ArtifactSink = {
      record: async () => {
        throw new Error("bucket missing");
      },
    };
    const c = createComponent(
      createMockHandlers({
        process: async (ctx) => {
          ctx.addArtifact({ kind: "log", content: "x" });
          return 1;
        },
      }),
      { sink },
    );
    await c.process();
    await expect(c.housekeep()).rejects.toThrow("bucket missing");
    expect(c.pendingArtifacts).toHaveLength(1);
    expect(c.phaseState.housekept).toBe(false);
  });
});

describe("resolveConfig", () => {
  const Schema = z.object({
    host: z.string().min(1),
    port: z.number().default(3260),
    tags: z.array(z.string()).default([]),
  });

  test("merges caller values over defaults and freezes", () => {
    const cfg = resolveConfig("demo", Schema, { host: "10.0.0.1" });
    expect(cfg).toEqual({ host: "10.0.0.1", port: 3260, tags: [] });
    expect(Object.isFrozen(cfg)).toBe(true);
    expect(Object.isFrozen(cfg.tags)).toBe(true);
  });

  test("invalid input is a CONFIGURATION error", () => {
    let caught: unknown;
    try {
      resolveConfig("demo", Schema, { host: "" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ComponentError);
    expect(caught).toMatchObject({
      code: "CONFIGURATION",
      message:
        "Invalid demo configuration: host: String must contain at least 1 character(s)",
    });
  });
});
