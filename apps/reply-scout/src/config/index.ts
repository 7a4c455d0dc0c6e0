import * as dotenv from "dotenv";
import { AppConfig, buildConfig } from "./env";

/**
 * Reads `.env` (when present) over the process environment and validates it.
 */
export function loadConfig(): AppConfig {
  dotenv.config();
  return buildConfig(process.env);
}

export { buildConfig };
export type { AppConfig };
