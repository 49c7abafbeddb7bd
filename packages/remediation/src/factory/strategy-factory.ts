import fs from "node:fs";
import path from "node:path";
import { logger, stableStringify } from "@stratfix/kit";
import type { ParamValue, StrategyConfig } from "../config/strategy-config.js";
import { writeOutput } from "../fixes/files.js";
import { seededShuffle } from "./seeded-shuffle.js";
import type { GenerationPolicy, StrategySpec } from "./types.js";

const log = logger.createChild("strategyFactory");

type Combination = Array<readonly [string, ParamValue]>;

/** Cartesian product of the grid, keys in sorted order, last key varying fastest. */
function expandGrid(grid: Record<string, ParamValue[]>): Combination[] {
  let combos: Combination[] = [[]];
  for (const key of Object.keys(grid).sort()) {
    const values = grid[key] ?? [];
    combos = combos.flatMap((combo) => values.map((value) => [...combo, [key, value] as const]));
  }
  return combos;
}

/**
 * Expands a StrategySpec into concrete configs, one per grid combination,
 * each with its own materialized copy of the template source.
 */
export class StrategyFactory {
  private workspace: string;
  private outputDir: string;

  constructor(opts: { workspace: string; outputsDir: string }) {
    this.workspace = opts.workspace;
    this.outputDir = path.join(opts.outputsDir, "generated_strategies");
  }

  /**
   * `grid` keeps enumeration order; `random` shuffles with a seed derived
   * from the base name, so the same spec always yields the same batch.
   * `limit` applies after ordering.
   */
  generate(spec: StrategySpec, policy: GenerationPolicy = "grid"): StrategyConfig[] {
    const templatePath = this.resolveTemplate(spec.template_path);
    const enumerated = expandGrid(spec.parameter_grid).map((combo, i) => ({ combo, gridIndex: i + 1 }));
    const ordered = policy === "random" ? seededShuffle(enumerated, spec.base_name) : enumerated;
    const selected = spec.limit === null ? ordered : ordered.slice(0, spec.limit);

    const configs = selected.map(({ combo, gridIndex }, i) => {
      const name = `${spec.base_name}_${String(i + 1).padStart(3, "0")}`;
      const parameters: Record<string, ParamValue> = { ...spec.base_parameters, ...Object.fromEntries(combo) };
      const source = this.materializeSource(templatePath, name, parameters);
      const metadata = structuredClone(spec.metadata);
      const factory = metadata.factory;
      metadata.factory = {
        ...(typeof factory === "object" && factory !== null ? factory : {}),
        base_strategy_name: spec.base_name,
        template_path: templatePath,
        grid_index: gridIndex,
        policy,
        materialized_source: source,
      };
      return { name, strategy_type: spec.strategy_type, parameters, metadata, source };
    });

    log.info(
      { action: "generate", base: spec.base_name, policy, combinations: enumerated.length, generated: configs.length },
      "Generated strategy batch",
    );
    return configs;
  }

  private resolveTemplate(templatePath: string): string {
    const resolved = path.resolve(this.workspace, templatePath);
    if (!fs.existsSync(resolved)) {
      throw new Error(`Template strategy not found: ${resolved}`);
    }
    return resolved;
  }

  private materializeSource(templatePath: string, name: string, parameters: Record<string, ParamValue>): string {
    const body = fs.readFileSync(templatePath, "utf8");
    const header =
      "// Generated by StrategyFactory\n" +
      `// Variant: ${name}\n` +
      `// Parameters: ${stableStringify(parameters)}\n\n`;
    return writeOutput(this.outputDir, `${name}${path.extname(templatePath) || ".cpp"}`, header + body);
  }
}
