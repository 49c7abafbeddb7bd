import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { describeZodError, parseEnv } from "@stratfix/kit";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export const AppConfigSchema = z.object({
  dbPath: z.string().min(1).default("strategy_lineage.db"),
  workspace: z.string().min(1).default("."),
  outputsDir: z.string().min(1).default("automation_outputs"),
  pollIntervalMs: z.number().int().positive().default(5000),
  logLevel: z.enum(LOG_LEVELS).default("info"),
  /** Per-module level overrides, keyed by child logger module name. */
  logLevels: z.record(z.string(), z.enum(LOG_LEVELS)).default({}),
  validator: z
    .object({
      runnerPath: z.string().min(1).default("build/strategy_runner"),
      timeoutMs: z.number().int().positive().default(300_000),
    })
    .default({}),
  remediation: z
    .object({
      maxIterations: z.number().int().nonnegative().default(3),
      biasFloor: z.number().positive().default(0.05),
      successRatio: z.number().positive().max(1).default(0.5),
      selectionBiasThreshold: z.number().positive().default(0.08),
    })
    .default({}),
});

export type AppConfig = z.output<typeof AppConfigSchema>;
export type ConfigLayer = z.input<typeof AppConfigSchema>;

const EnvSchema = z.object({
  STRATFIX_DB: z.string().min(1).optional(),
  STRATFIX_WORKSPACE: z.string().min(1).optional(),
  STRATFIX_OUTPUTS: z.string().min(1).optional(),
  STRATFIX_RUNNER: z.string().min(1).optional(),
  POLL_INTERVAL_MS: z.coerce.number().int().positive().optional(),
  VALIDATOR_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export const DEFAULT_CONFIG_FILE = "stratfix.config.json";

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Later layers win; nested objects merge key by key; undefined never overrides. */
function mergeLayers(...layers: Record<string, unknown>[]): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      const prev = out[key];
      out[key] = isRecord(prev) && isRecord(value) ? mergeLayers(prev, value) : value;
    }
  }
  return out;
}

function readConfigFile(configPath: string | undefined, cwd: string): Record<string, unknown> {
  const file = configPath ? path.resolve(cwd, configPath) : path.join(cwd, DEFAULT_CONFIG_FILE);
  if (!fs.existsSync(file)) {
    if (configPath) throw new ConfigError(`Config file not found: ${file}`);
    return {};
  }
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (err) {
    throw new ConfigError(`Config file ${file} is not valid JSON`, { cause: err });
  }
  if (!isRecord(json)) throw new ConfigError(`Config file ${file} must contain a JSON object`);
  return json;
}

function envLayer(env: NodeJS.ProcessEnv): ConfigLayer {
  let e: z.output<typeof EnvSchema>;
  try {
    e = parseEnv(EnvSchema, env);
  } catch (err) {
    if (err instanceof z.ZodError) throw new ConfigError(describeZodError("environment", err), { cause: err });
    throw err;
  }
  return {
    dbPath: e.STRATFIX_DB,
    workspace: e.STRATFIX_WORKSPACE,
    outputsDir: e.STRATFIX_OUTPUTS,
    pollIntervalMs: e.POLL_INTERVAL_MS,
    logLevel: e.LOG_LEVEL,
    validator: { runnerPath: e.STRATFIX_RUNNER, timeoutMs: e.VALIDATOR_TIMEOUT_MS },
  };
}

/**
 * Builds the application config from, in increasing precedence: built-in
 * defaults, the JSON config file, environment variables, and explicit
 * overrides. Relative paths resolve against the workspace, which itself
 * resolves against `cwd`.
 *
 * @throws {ConfigError} when the file is missing or malformed, or the merged result is invalid
 */
export function loadConfig(
  opts: { configPath?: string; overrides?: ConfigLayer; env?: NodeJS.ProcessEnv; cwd?: string } = {},
): AppConfig {
  const cwd = opts.cwd ?? process.cwd();
  const merged = mergeLayers(readConfigFile(opts.configPath, cwd), envLayer(opts.env ?? process.env), opts.overrides ?? {});

  const parsed = AppConfigSchema.safeParse(merged);
  if (!parsed.success) throw new ConfigError(describeZodError("config", parsed.error));

  const config = parsed.data;
  const workspace = path.resolve(cwd, config.workspace);
  return {
    ...config,
    workspace,
    dbPath: config.dbPath === ":memory:" ? config.dbPath : path.resolve(workspace, config.dbPath),
    outputsDir: path.resolve(workspace, config.outputsDir),
  };
}
