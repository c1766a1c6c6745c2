#!/usr/bin/env node
import { existsSync, realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { Command, CommanderError } from "commander";
import { z } from "zod";
import type { BootConfigInput } from "./bmc/boot-component.js";
import { type BmcClient, FIRST_BOOT_DEVICES } from "./bmc/client.js";
import { loadSettings, type Settings } from "./config/settings.js";
import type { Ledger } from "./ledger/ledger.js";
import { DEFAULT_RETENTION } from "./ledger/retention.js";
import { resolveConfig } from "./lifecycle/config.js";
import { ComponentError, errorKindOf, errorMessageOf } from "./lifecycle/errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { ObjectStore } from "./objects/store.js";
import { runFleet } from "./orchestrator/fleet.js";
import { exitCode, type RunOpts } from "./orchestrator/orchestrator.js";
import {
  renderExpireResult,
  renderFleetResult,
  renderIscsiBootResult,
  renderLedgerEntries,
  renderPublishResult,
  renderTargets,
  renderWorkflowResult,
} from "./renderers/workflow-report.js";
import { Runtime } from "./runtime.js";
import type { BootTargetDescriptor } from "./schemas/target.js";
import type { SecretsStore } from "./secrets/store.js";
import type { StorageApplianceClient } from "./storage/types.js";
import {
  buildBootOnlyWorkflow,
  buildIscsiBootWorkflow,
  type IscsiBootDeps,
  type ServerSpec,
  ServerSpecSchema,
} from "./workflows/iscsi-boot.js";
import { DEFAULT_TARGETS_FILE, loadTargetsFile, readJsonFile, selectTargets } from "./workflows/targets.js";

const VERSION = "0.1.0";
const DAY_MS = 24 * 3600 * 1000;

/** What commands need from the outside world. Runtime is the production implementation. */
export interface Clients {
  readonly settings: Settings;
  readonly secrets?: SecretsStore;
  appliance(): StorageApplianceClient;
  bmc(host: string): BmcClient;
  objects(): ObjectStore;
  ledger(): Ledger;
  close(): void;
}

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
  env: Record<string, string | undefined>;
  /** Used instead of a stderr logger when set. */
  logger?: Logger;
  openClients(settings: Settings, logger: Logger): Promise<Clients>;
}

export function processIo(): CliIo {
  return {
    out: (text) => process.stdout.write(text),
    err: (text) => process.stderr.write(text),
    env: process.env,
    openClients: (settings, logger) => Runtime.open(settings, logger, { env: process.env }),
  };
}

/** Exit code of the last command action. */
export interface CliStatus {
  code: number;
}

const GlobalOptsSchema = z.object({
  verbose: z.boolean().default(false),
  dryRun: z.boolean().default(false),
  checkOnly: z.boolean().default(false),
});

type GlobalOpts = z.output<typeof GlobalOptsSchema>;

const ProvisionOptsSchema = GlobalOptsSchema.extend({
  serverId: z.string().optional(),
  hostname: z.string().optional(),
  version: z.string().optional(),
  size: z.string().optional(),
  bmc: z.string().optional(),
  nic: z.string().optional(),
  initiatorName: z.string().optional(),
  portal: z.string().optional(),
  pool: z.string().optional(),
  force: z.boolean().default(false),
  reboot: z.boolean().default(true),
  cleanupUnused: z.boolean().default(false),
  firstBoot: z.enum(FIRST_BOOT_DEVICES).optional(),
  exclusiveNic: z.boolean().default(false),
  createBuckets: z.boolean().default(false),
  fleet: z.string().optional(),
  concurrency: z.coerce.number().int().positive().default(4),
  serverTimeout: z.coerce.number().positive().optional(),
});

const BootOptsSchema = GlobalOptsSchema.extend({
  bmc: z.string().min(1),
  serverId: z.string().optional(),
  targetsFile: z.string().default(DEFAULT_TARGETS_FILE),
  target: z.string().optional(),
  secondary: z.string().optional(),
  reset: z.boolean().default(false),
  firstBoot: z.enum(FIRST_BOOT_DEVICES).optional(),
  exclusiveNic: z.boolean().default(false),
  reboot: z.boolean().default(true),
  nic: z.string().optional(),
  initiatorName: z.string().optional(),
});

const ListTargetsOptsSchema = GlobalOptsSchema.extend({
  targetsFile: z.string().default(DEFAULT_TARGETS_FILE),
});

const ExpireOptsSchema = GlobalOptsSchema.extend({
  olderThanDays: z.coerce.number().nonnegative().optional(),
  prefix: z.string().optional(),
});

const ListOptsSchema = GlobalOptsSchema.extend({
  owner: z.string().optional(),
  kind: z.string().optional(),
  limit: z.coerce.number().int().positive().max(500).default(50),
});

const PublishOptsSchema = GlobalOptsSchema.extend({
  tag: z.string().min(1).optional(),
});

function parseOptions<S extends z.ZodTypeAny>(schema: S, values: unknown): z.output<S> {
  const parsed = schema.safeParse(values);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ComponentError("CONFIGURATION", `Invalid options: ${issues}`);
  }
  return parsed.data;
}

/** Settings, logger and lazily opened clients for one command. */
class Session {
  private opened?: Clients;

  constructor(
    private readonly io: CliIo,
    readonly globals: GlobalOpts,
    readonly settings: Settings,
    readonly logger: Logger,
  ) {}

  get runOpts(): RunOpts {
    return { dryRun: this.globals.dryRun, checkOnly: this.globals.checkOnly };
  }

  out(text: string): void {
    this.io.out(`${text}\n`);
  }

  async clients(): Promise<Clients> {
    if (this.opened === undefined) {
      this.opened = await this.io.openClients(this.settings, this.logger);
    }
    return this.opened;
  }

  close(): void {
    this.opened?.close();
  }
}

type Handler<S extends z.ZodTypeAny> = (session: Session, opts: z.output<S>, args: string[]) => Promise<number>;

/**
 * Wraps a command handler: validates options, opens a session and turns any
 * error into a message on stderr and exit code 1.
 */
function action<S extends z.ZodTypeAny>(io: CliIo, status: CliStatus, schema: S, handler: Handler<S>) {
  return async (...received: unknown[]): Promise<void> => {
    const cmd = received[received.length - 1];
    if (!(cmd instanceof Command)) {
      throw new Error("command action called without its command");
    }
    const args = received.slice(0, -2).filter((a): a is string => typeof a === "string");

    let session: Session | undefined;
    try {
      const values = cmd.optsWithGlobals();
      const opts = parseOptions(schema, values);
      const globals = parseOptions(GlobalOptsSchema, values);
      const settings = loadSettings(io.env);
      const logger =
        io.logger ??
        createLogger("ironboot", { level: globals.verbose ? "debug" : settings.log_level, stderr: true });
      session = new Session(io, globals, settings, logger);
      status.code = await handler(session, opts, args);
    } catch (err) {
      session?.logger.debug({ err }, "command failed");
      io.err(`error [${errorKindOf(err)}]: ${errorMessageOf(err)}\n`);
      status.code = 1;
    } finally {
      session?.close();
    }
  };
}

/** Object storage is wired into workflows only when an endpoint or keys are configured. */
function objectStorageConfigured(settings: Settings): boolean {
  return settings.objects.endpoint !== undefined || settings.objects.access_key !== undefined;
}

/** ServerSpecSchema with command-line values filling what an entry leaves out. */
function serverSchemaWith(defaults: Record<string, unknown>) {
  return z.preprocess(
    (entry) => (typeof entry === "object" && entry !== null && !Array.isArray(entry) ? { ...defaults, ...entry } : entry),
    ServerSpecSchema,
  );
}

async function provision(session: Session, opts: z.output<typeof ProvisionOptsSchema>): Promise<number> {
  const { settings, logger } = session;
  const defaults = {
    nic: opts.nic ?? settings.bmc.nic,
    initiator_name: opts.initiatorName,
    force: opts.force,
    reboot: opts.reboot,
    cleanup_unused: opts.cleanupUnused,
    first_boot: opts.firstBoot,
    exclusive_nic: opts.exclusiveNic,
    check_only: session.globals.checkOnly,
  };
  const servers =
    opts.fleet === undefined
      ? [
          resolveConfig("server", serverSchemaWith(defaults), {
            server_id: opts.serverId,
            hostname: opts.hostname,
            version: opts.version,
            zvol_size: opts.size,
            bmc_host: opts.bmc,
          }),
        ]
      : resolveConfig(
          "fleet",
          z.unknown().pipe(z.array(serverSchemaWith(defaults)).min(1)),
          await readJsonFile(opts.fleet, "fleet file"),
        );

  const clients = await session.clients();
  const appliance = clients.appliance();
  const withObjects = objectStorageConfigured(settings);
  const ledger = withObjects ? clients.ledger() : undefined;
  if (!withObjects) logger.warn("object storage not configured; artifacts will not be archived");

  const depsFor = (server: ServerSpec): IscsiBootDeps => ({
    appliance,
    bmc: clients.bmc(server.bmc_host),
    portal_address: opts.portal ?? settings.appliance.host,
    pool: opts.pool ?? settings.appliance.pool,
    objects: withObjects
      ? {
          store: clients.objects(),
          config: {
            private_bucket: settings.objects.private_bucket,
            public_bucket: settings.objects.public_bucket,
            create_buckets_if_missing: opts.createBuckets,
          },
        }
      : undefined,
    secrets:
      clients.secrets === undefined
        ? undefined
        : { store: clients.secrets, config: { mount_point: settings.secrets.mount_point } },
    ledger,
    logger,
  });

  if (opts.fleet === undefined) {
    const [server] = servers;
    const result = await buildIscsiBootWorkflow(server, depsFor(server)).run(session.runOpts);
    session.out(renderIscsiBootResult(result));
    return exitCode(result);
  }

  const fleet = await runFleet(servers, (server) => buildIscsiBootWorkflow(server, depsFor(server)), {
    concurrency: opts.concurrency,
    timeoutMs: opts.serverTimeout === undefined ? undefined : opts.serverTimeout * 1000,
    logger,
    ...session.runOpts,
  });
  for (const member of fleet.servers) {
    if ("result" in member) {
      session.out(renderWorkflowResult(member.result, `Server ${member.server_id}`));
    }
  }
  session.out(renderFleetResult(fleet));
  return fleet.success ? 0 : 1;
}

async function boot(session: Session, opts: z.output<typeof BootOptsSchema>): Promise<number> {
  const { settings, logger } = session;
  let descriptor: BootTargetDescriptor | undefined;
  let mode: BootConfigInput["mode"] = "configure";
  if (opts.reset) {
    mode = "reset";
  } else if (opts.target !== undefined) {
    descriptor = selectTargets(await loadTargetsFile(opts.targetsFile), opts.target, opts.secondary);
  } else if (opts.firstBoot !== undefined) {
    mode = "order";
  } else {
    throw new ComponentError("CONFIGURATION", "--target is required unless --reset or --first-boot is given");
  }

  const clients = await session.clients();
  const workflow = buildBootOnlyWorkflow(
    {
      server_id: opts.serverId,
      bmc_host: opts.bmc,
      nic: opts.nic ?? settings.bmc.nic,
      mode,
      descriptor,
      initiator_name: opts.initiatorName,
      first_boot: opts.firstBoot,
      exclusive_nic: opts.exclusiveNic,
      reboot: opts.reboot,
      dry_run: session.globals.dryRun,
      check_only: session.globals.checkOnly,
    },
    {
      bmc: clients.bmc(opts.bmc),
      ledger: objectStorageConfigured(settings) ? clients.ledger() : undefined,
      logger,
    },
  );
  const result = await workflow.run(session.runOpts);
  session.out(renderWorkflowResult(result, `Boot ${opts.bmc}`));
  return exitCode(result);
}

/** Command tree. Actions report their exit code through status. */
export function createProgram(io: CliIo, status: CliStatus): Command {
  const program = new Command();
  program
    .name("ironboot")
    .description("Provision iSCSI boot volumes and switch server boot configuration")
    .version(VERSION, "-V, --cli-version")
    .option("--verbose", "debug logging")
    .option("--dry-run", "discover only; change nothing")
    .option("--check-only", "discover and verify; change nothing")
    .exitOverride()
    .configureOutput({ writeOut: (text) => io.out(text), writeErr: (text) => io.err(text) });

  program
    .command("provision")
    .description("create the boot volume and target, then point the server at it")
    .option("--server-id <id>", "two-digit server number, e.g. 02")
    .option("--hostname <name>", "server hostname")
    .option("--version <version>", "OS version the volume is for (default: stable)")
    .option("--size <size>", "volume size, e.g. 500G (default: 500G)")
    .option("--bmc <host>", "BMC address")
    .option("--nic <fqdd>", "NIC to configure for iSCSI boot")
    .option("--initiator-name <iqn>", "initiator IQN for the server")
    .option("--portal <address>", "iSCSI portal address (default: appliance host)")
    .option("--pool <pool>", "appliance pool for the volume")
    .option("--force", "re-provision even when resources already exist")
    .option("--no-reboot", "configure without rebooting the server")
    .option("--cleanup-unused", "remove this server's resources not in use")
    .option("--first-boot <device>", `device to boot first: ${FIRST_BOOT_DEVICES.join(", ")}`)
    .option("--exclusive-nic", "clear the iSCSI target on every other NIC")
    .option("--create-buckets", "create missing object storage buckets")
    .option("--fleet <file>", "JSON array of servers to provision in parallel")
    .option("--concurrency <n>", "servers provisioned at once with --fleet", "4")
    .option("--server-timeout <seconds>", "give up on a fleet server after this long")
    .action(action(io, status, ProvisionOptsSchema, provision));

  program
    .command("boot")
    .description("configure iSCSI boot from the targets file, reset it, or change the boot order")
    .requiredOption("--bmc <host>", "BMC address")
    .option("--server-id <id>", "server number, for artifact ownership")
    .option("--targets-file <path>", "target descriptor file", DEFAULT_TARGETS_FILE)
    .option("--target <name>", "primary target name")
    .option("--secondary <name>", "secondary target name, for multipath")
    .option("--reset", "reset iSCSI boot attributes to defaults")
    .option("--first-boot <device>", `device to boot first: ${FIRST_BOOT_DEVICES.join(", ")}`)
    .option("--exclusive-nic", "clear the iSCSI target on every other NIC")
    .option("--no-reboot", "configure without rebooting the server")
    .option("--nic <fqdd>", "NIC to configure")
    .option("--initiator-name <iqn>", "initiator IQN for the server")
    .action(action(io, status, BootOptsSchema, boot));

  program
    .command("list-targets")
    .description("show the targets in the descriptor file")
    .option("--targets-file <path>", "target descriptor file", DEFAULT_TARGETS_FILE)
    .action(
      action(io, status, ListTargetsOptsSchema, async (session, opts) => {
        session.out(renderTargets(await loadTargetsFile(opts.targetsFile)));
        return 0;
      }),
    );

  const ledger = program.command("ledger").description("artifact ledger maintenance");

  ledger
    .command("expire")
    .description("delete private artifacts past their retention")
    .option("--older-than-days <days>", "one threshold for every kind instead of the retention policy")
    .option("--prefix <prefix>", "only keys under this prefix")
    .action(
      action(io, status, ExpireOptsSchema, async (session, opts) => {
        const store = (await session.clients()).ledger();
        const sweep = { prefix: opts.prefix, dryRun: session.globals.dryRun };
        const result =
          opts.olderThanDays === undefined
            ? await store.expireByPolicy(DEFAULT_RETENTION, sweep)
            : await store.expire(new Date(Date.now() - opts.olderThanDays * DAY_MS), sweep);
        session.out(renderExpireResult(result));
        return 0;
      }),
    );

  ledger
    .command("list")
    .description("list catalogued artifacts")
    .option("--owner <owner>", "e.g. r630-02/dumpty")
    .option("--kind <kind>", "artifact kind")
    .option("--limit <n>", "at most this many entries", "50")
    .action(
      action(io, status, ListOptsSchema, async (session, opts) => {
        const entries = await (await session.clients()).ledger().list({
          owner: opts.owner,
          kind: opts.kind,
          limit: opts.limit,
        });
        session.out(renderLedgerEntries(entries));
        return 0;
      }),
    );

  ledger
    .command("publish <id>")
    .description("copy a private artifact to the public bucket")
    .option("--tag <tag>", "version tag; defaults to the artifact's version")
    .action(
      action(io, status, PublishOptsSchema, async (session, opts, [id]) => {
        const result = await (await session.clients()).ledger().publish(id, { version_tag: opts.tag });
        session.out(renderPublishResult(result));
        return 0;
      }),
    );

  ledger
    .command("retract <tag>")
    .description("remove everything published under a version tag")
    .action(
      action(io, status, GlobalOptsSchema, async (session, _opts, [tag]) => {
        const removed = await (await session.clients()).ledger().retract(tag);
        session.out([`Retracted ${removed.length} object(s).`, ...removed.map((key) => `- ${key}`)].join("\n"));
        return 0;
      }),
    );

  return program;
}

export async function main(argv: readonly string[] = process.argv, io: CliIo = processIo()): Promise<number> {
  const status: CliStatus = { code: 0 };
  const program = createProgram(io, status);
  try {
    await program.parseAsync([...argv]);
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    io.err(`error: ${errorMessageOf(err)}\n`);
    return 1;
  }
  return status.code;
}

function invokedDirectly(): boolean {
  const script = process.argv[1];
  return script !== undefined && existsSync(script) && realpathSync(script) === fileURLToPath(import.meta.url);
}

if (invokedDirectly()) {
  void main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`${errorMessageOf(err)}\n`);
      process.exitCode = 1;
    },
  );
}
