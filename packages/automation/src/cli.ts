import { cac } from "cac";
import dotenv from "dotenv";
import { z } from "zod";
import { describeZodError, isMainModule, logger } from "@stratfix/kit";
import { SqliteStore } from "@stratfix/lineage";
import { RunnerValidator } from "@stratfix/remediation";
import { AutomationController } from "./application/automation-controller.js";
import { AutomationWorker } from "./application/automation-worker.js";
import { enqueueJobFile, leaderboardLines } from "./application/commands.js";
import { LOG_LEVELS, loadConfig, type AppConfig } from "./lib/config.js";

const log = logger.createChild("cli");

const GlobalOptionsSchema = z.object({
  config: z.string().optional(),
  db: z.string().optional(),
  workspace: z.string().optional(),
  pollInterval: z.coerce.number().int().positive().optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
});

const LeaderboardOptionsSchema = GlobalOptionsSchema.extend({
  top: z.coerce.number().int().positive().optional(),
  family: z.string().optional(),
  status: z.string().optional(),
});

interface Runtime {
  config: AppConfig;
  store: SqliteStore;
}

function parseOptions<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.output<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) throw new Error(describeZodError("options", parsed.error));
  return parsed.data;
}

function setup(options: z.output<typeof GlobalOptionsSchema>): Runtime {
  const config = loadConfig({
    configPath: options.config,
    overrides: {
      dbPath: options.db,
      workspace: options.workspace,
      pollIntervalMs: options.pollInterval,
      logLevel: options.logLevel,
    },
  });
  logger.setLogConfig(config.logLevels, config.logLevel);
  const store = new SqliteStore({ dbPath: config.dbPath });
  return { config, store };
}

function createController({ config, store }: Runtime): AutomationController {
  const validator = new RunnerValidator({
    runnerPath: config.validator.runnerPath,
    workspace: config.workspace,
    timeoutMs: config.validator.timeoutMs,
  });
  const worker = new AutomationWorker({
    store,
    validator,
    workspace: config.workspace,
    outputsDir: config.outputsDir,
    settings: { ...config.remediation, validatorTimeoutMs: config.validator.timeoutMs },
  });
  return new AutomationController({ store, worker, pollIntervalMs: config.pollIntervalMs });
}

export function buildCli() {
  const cli = cac("stratfix");
  cli.option("--config <path>", "JSON config file (default: ./stratfix.config.json when present)");
  cli.option("--db <path>", "Lineage database path");
  cli.option("--workspace <dir>", "Workspace for templates, data and the runner");
  cli.option("--poll-interval <ms>", "Idle poll interval for run-forever");
  cli.option("--log-level <level>", "Base log level");

  cli.command("run-once", "Claim and execute at most one queued job").action(async (raw: unknown) => {
    const runtime = setup(parseOptions(GlobalOptionsSchema, raw));
    try {
      const processed = await createController(runtime).runOnce();
      if (!processed) log.info({ action: "idle" }, "No queued jobs");
    } finally {
      runtime.store.close();
    }
  });

  cli.command("run-forever", "Process queued jobs until interrupted").action(async (raw: unknown) => {
    const runtime = setup(parseOptions(GlobalOptionsSchema, raw));
    const controller = createController(runtime);
    const shutdown = () => {
      log.info({ action: "shutdown" }, "Stopping after the current job");
      controller.stop();
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
    try {
      await controller.runForever();
    } finally {
      process.off("SIGINT", shutdown);
      process.off("SIGTERM", shutdown);
      runtime.store.close();
    }
  });

  cli.command("enqueue <file>", "Validate a job JSON file and add it to the queue").action((file: string, raw: unknown) => {
    const runtime = setup(parseOptions(GlobalOptionsSchema, raw));
    try {
      console.log(enqueueJobFile(runtime.store, file));
    } finally {
      runtime.store.close();
    }
  });

  cli
    .command("leaderboard", "Print leaderboard rows as JSON lines")
    .option("--top <n>", "Only the best n entries")
    .option("--family <family>", "Filter by strategy family")
    .option("--status <status>", "Filter by entry status")
    .action((raw: unknown) => {
      const options = parseOptions(LeaderboardOptionsSchema, raw);
      const runtime = setup(options);
      try {
        for (const line of leaderboardLines(runtime.store, {
          topN: options.top,
          family: options.family,
          status: options.status,
        })) {
          console.log(line);
        }
      } finally {
        runtime.store.close();
      }
    });

  cli.command("summary", "Print leaderboard statistics as JSON").action((raw: unknown) => {
    const runtime = setup(parseOptions(GlobalOptionsSchema, raw));
    try {
      console.log(JSON.stringify(runtime.store.getLeaderboardSummary(), null, 2));
    } finally {
      runtime.store.close();
    }
  });

  cli.help();
  return cli;
}

async function main(): Promise<void> {
  dotenv.config();
  const cli = buildCli();
  cli.parse(process.argv, { run: false });
  if (!cli.matchedCommand) {
    if (cli.options.help !== true) cli.outputHelp();
    if (cli.args.length > 0) process.exitCode = 1;
    return;
  }
  await cli.runMatchedCommand();
}

if (isMainModule(import.meta.url)) {
  main().catch((err: unknown) => {
    logger.error({ err }, "Fatal error");
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
