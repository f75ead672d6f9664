import path from "path";
import dotenv from "dotenv";

export const DEFAULT_DATA_FILE = "grades.json";

export interface AppConfig {
  dataFile: string;
}

/**
 * Resolve runtime settings from the environment (and .env, if present).
 * REPORT_CARD_FILE overrides where the roster is stored; relative
 * paths are taken from the working directory.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  const configured = env.REPORT_CARD_FILE?.trim();
  return {
    dataFile: path.resolve(cwd, configured || DEFAULT_DATA_FILE),
  };
}

export function loadEnv(): void {
  dotenv.config();
}
