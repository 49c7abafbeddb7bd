import pino from "pino";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

/** Per-module log level overrides, set at runtime via logger.setLogConfig() */
let logLevelOverrides: Record<string, string> = {};
const children = new Map<string, pino.Logger>();

function getBaseLevel(): string {
  return process.env.LOG_LEVEL ?? "info";
}

function createPinoLogger(): pino.Logger {
  if (process.env.VITEST) {
    return pino({ level: "silent" });
  }

  const __dirname = dirname(fileURLToPath(import.meta.url));
  const LOG_DIR = process.env.LOG_DIR || join(__dirname, "../../../logs");

  return pino(
    { level: getBaseLevel() },
    pino.transport({
      targets: [
        { target: "pino/file", level: getBaseLevel(), options: { destination: 1 } },
        {
          target: "pino-roll",
          level: getBaseLevel(),
          options: {
            file: join(LOG_DIR, "stratfix"),
            frequency: "daily",
            dateFormat: "yyyy-MM-dd",
            extension: ".ndjson",
            mkdir: true,
          },
        },
      ],
    }),
  );
}

const pinoInstance = createPinoLogger();

/** Shared logger: base pino instance plus a level-config setter and child factory. */
export const logger = Object.assign(pinoInstance, {
  /** Set the base level and per-module overrides, including for children created earlier. */
  setLogConfig(overrides: Record<string, string>, baseLevel?: string): void {
    logLevelOverrides = overrides;
    if (baseLevel) {
      pinoInstance.level = baseLevel;
    }
    for (const [module, child] of children) {
      child.level = logLevelOverrides[module] ?? pinoInstance.level;
    }
  },

  /** Create a child logger with per-module log level from config */
  createChild(module: string): pino.Logger {
    const existing = children.get(module);
    if (existing) return existing;
    const level = logLevelOverrides[module];
    const child = pinoInstance.child({ module });
    if (level) {
      child.level = level;
    }
    children.set(module, child);
    return child;
  },
});
