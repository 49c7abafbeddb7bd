import { stableStringify } from "@stratfix/kit";
import type { StrategyConfig } from "../config/strategy-config.js";
import { writeOutput } from "../fixes/files.js";

/** Writes the config as sorted, indented JSON and returns the file path. */
export function writeConfigSnapshot(outputsDir: string, fileName: string, config: StrategyConfig): string {
  return writeOutput(outputsDir, fileName, stableStringify(config, 2) + "\n");
}
