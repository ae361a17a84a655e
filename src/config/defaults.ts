import { parseConfig, type PolintConfig } from "../config-loader/schema.js";

/** Settings used when no config file exists. */
export const DEFAULT_CONFIG: PolintConfig = parseConfig({});
