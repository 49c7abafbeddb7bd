export { isMainModule } from "./is-main.js";
export { parseEnv } from "./parse-env.js";
export { formatZodErrors, describeZodError } from "./zod-helpers.js";
export { safeJsonParse } from "./safe-json.js";
export { stableStringify } from "./stable-json.js";
export { formatError } from "./format-error.js";
export { logger } from "./logger.js";
