import { errorMessageOf } from "../lifecycle/errors.js";
import { withTimeout } from "../lifecycle/timeout.js";
import { type Logger, silentLogger } from "../logger.js";
import type { RunOpts, Runnable, WorkflowResult } from "./orchestrator.js";

export interface FleetMember {
  server_id: string;
}

export interface FleetOpts extends RunOpts {
  /** Servers worked on at once. Default 4. */
  concurrency?: number;
  logger?: Logger;
  /**
   * Per-server deadline. A server past it is reported as failed and its
   * permit freed; the workflow itself is not cancelled.
   */
  timeoutMs?: number;
}

export type FleetMemberResult =
  | { server_id: string; success: boolean; result: WorkflowResult }
  | { server_id: string; success: false; error: string };

export interface FleetResult {
  success: boolean;
  /** In input order, whatever order the servers finished in. */
  servers: FleetMemberResult[];
}

/**
 * Map every item through `fn`, keeping at most `limit` calls in flight. Each slot takes
 * the next unstarted item as soon as its current one settles; results keep input order.
 */
async function mapWithLimit<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<R>,
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`fleet concurrency must be a positive integer (got ${limit})`);
  }
  const results: R[] = [];
  let next = 0;
  const slot = async (): Promise<void> => {
    for (let index = next++; index < items.length; index = next++) {
      results[index] = await fn(items[index]);
    }
  };
  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, slot));
  return results;
}

/**
 * Run one independent workflow per server, at most `concurrency` at a time.
 * A server whose workflow cannot even be built is reported, not thrown.
 */
export async function runFleet<S extends FleetMember>(
  servers: readonly S[],
  build: (server: S) => Runnable | Promise<Runnable>,
  opts: FleetOpts = {},
): Promise<FleetResult> {
  const logger = (opts.logger ?? silentLogger()).child({ module: "fleet" });
  const runOpts: RunOpts = { dryRun: opts.dryRun, checkOnly: opts.checkOnly };

  const results = await mapWithLimit(
    servers,
    opts.concurrency ?? 4,
    async (server): Promise<FleetMemberResult> => {
      logger.info({ server_id: server.server_id }, "server workflow started");
      try {
        const workflow = await build(server);
        const running = workflow.run(runOpts);
        let result: WorkflowResult;
        if (opts.timeoutMs === undefined) {
          result = await running;
        } else {
          const raced = await withTimeout(running, opts.timeoutMs);
          if (raced.type === "timeout") {
            logger.error({ server_id: server.server_id, timeout_ms: opts.timeoutMs }, "server workflow timed out");
            return {
              server_id: server.server_id,
              success: false,
              error: `workflow did not finish within ${opts.timeoutMs}ms`,
            };
          }
          result = raced.value;
        }
        logger.info({ server_id: server.server_id, success: result.success }, "server workflow finished");
        return { server_id: server.server_id, success: result.success, result };
      } catch (err) {
        logger.error({ server_id: server.server_id, err }, "server workflow crashed");
        return { server_id: server.server_id, success: false, error: errorMessageOf(err) };
      }
    },
  );

  return { success: results.every((r) => r.success), servers: results };
}
