import { cloneConfig, metadataSection } from "../config/strategy-config.js";
import { createOosSplit, writeVariantSource } from "./files.js";
import type { FixHandler } from "./types.js";

/** Holds back the tail of the data file and records it as the out-of-sample set. */
export const outOfSampleEnforcement: FixHandler = (config, ctx) => {
  const dataset = createOosSplit(ctx.dataPath, ctx.outputsDir);
  const next = cloneConfig(config);
  next.metadata.oos_validation = { ...metadataSection(config, "oos_validation"), dataset };
  return writeVariantSource(next, ctx, "oos_enforced", `// Out-of-sample dataset: ${dataset}\n`);
};
