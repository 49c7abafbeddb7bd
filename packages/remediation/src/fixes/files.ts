import fs from "node:fs";
import path from "node:path";
import writeFileAtomic from "write-file-atomic";
import { stableStringify } from "@stratfix/kit";
import { cloneConfig, type StrategyConfig } from "../config/strategy-config.js";
import type { FixContext } from "./types.js";

function appendGeneratedFile(config: StrategyConfig, filePath: string): void {
  const existing = config.metadata.generated_files;
  const list = Array.isArray(existing) ? existing.filter((f): f is string => typeof f === "string") : [];
  config.metadata.generated_files = [...list, filePath];
}

export function writeOutput(outputsDir: string, fileName: string, content: string): string {
  fs.mkdirSync(outputsDir, { recursive: true });
  const target = path.join(outputsDir, fileName);
  writeFileAtomic.sync(target, content, "utf8");
  return target;
}

/**
 * Copies the config's source to `<name>_iter<n>_<suffix>` with `header`
 * prepended and points the returned config at the copy. Earlier iterations'
 * copies are never overwritten. Configs without an existing source are
 * returned as they are.
 */
export function writeVariantSource(
  config: StrategyConfig,
  ctx: FixContext,
  suffix: string,
  header: string,
): StrategyConfig {
  if (!config.source || !fs.existsSync(config.source)) return config;

  const original = fs.readFileSync(config.source, "utf8");
  const ext = path.extname(config.source) || ".cpp";
  const target = writeOutput(ctx.outputsDir, `${config.name}_iter${ctx.iteration}_${suffix}${ext}`, header + original);

  const next = cloneConfig(config);
  next.source = target;
  appendGeneratedFile(next, target);
  return next;
}

/** Parameter-range file for batch sweeps. Written for SMA configs that carry bounds. */
export function emitBatchParameters(config: StrategyConfig, outputsDir: string): StrategyConfig {
  const bounds = config.metadata.parameter_bounds;
  if (config.strategy_type !== "sma" || !bounds) return config;

  const target = writeOutput(
    outputsDir,
    `${config.name}_batch_parameters.json`,
    stableStringify(
      { strategy: config.strategy_type.toUpperCase(), parameter_ranges: bounds, generated: new Date().toISOString() },
      2,
    ),
  );
  const next = cloneConfig(config);
  appendGeneratedFile(next, target);
  return next;
}

/**
 * Writes the last `1 - ratio` share of the data file's lines to
 * `oos_<name>`. Files shorter than ten lines are used whole.
 */
export function createOosSplit(dataPath: string, outputsDir: string, ratio = 0.7): string {
  if (!fs.existsSync(dataPath)) {
    throw new Error(`Data file not found: ${dataPath}`);
  }
  const lines = fs.readFileSync(dataPath, "utf8").trim().split(/\r?\n/);
  if (lines.length < 10) return dataPath;

  const cutoff = Math.max(1, Math.floor(lines.length * ratio));
  return writeOutput(outputsDir, `oos_${path.basename(dataPath)}`, lines.slice(cutoff).join("\n") + "\n");
}
