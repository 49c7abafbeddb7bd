import { cloneConfig, metadataSection } from "../config/strategy-config.js";
import { writeVariantSource } from "./files.js";
import type { FixHandler } from "./types.js";

export const multipleTestingCorrection: FixHandler = (config, ctx) => {
  const next = cloneConfig(config);
  next.metadata.statistical_adjustments = {
    ...metadataSection(config, "statistical_adjustments"),
    correction: "bonferroni",
    alpha: 0.01,
  };
  return writeVariantSource(next, ctx, "mt_correction", "// Multiple-testing correction guideline applied\n");
};
