import { existsSync } from "node:fs";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import { DEFAULT_CHANGE_TRACKER_PATH } from "./change-tracker";

export const importConfigSchema = z.object({
  POSTGRES_URL: z.string().min(1, "POSTGRES_URL is required"),
  CONGRESS_DATA_DIR: z.string().min(1).default("data/us"),
  CHANGE_TRACKER_DB: z.string().min(1).default(DEFAULT_CHANGE_TRACKER_PATH),
  CURRENT_CONGRESS: z.coerce.number().int().positive().default(119),
});

export type ImportConfig = {
  postgresUrl: string;
  dataDir: string;
  changeTrackerPath: string;
  currentCongress: number;
};

/**
 * Validate importer settings from an environment object.
 *
 * @throws Error listing every invalid or missing setting
 */
export function parseImportConfig(
  env: Record<string, string | undefined>
): ImportConfig {
  const result = importConfigSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid importer configuration: ${problems}`);
  }
  const parsed = result.data;
  return {
    postgresUrl: parsed.POSTGRES_URL,
    dataDir: parsed.CONGRESS_DATA_DIR,
    changeTrackerPath: parsed.CHANGE_TRACKER_DB,
    currentCongress: parsed.CURRENT_CONGRESS,
  };
}

/**
 * Load .env.local (or .env.production.local for --prod) into process.env
 * and return the validated settings.
 */
export function loadImportConfig({ prod }: { prod: boolean }): ImportConfig {
  const envFile = prod ? ".env.production.local" : ".env.local";
  const envResult = loadEnv({ path: envFile, override: true });
  if (envResult.error && existsSync(envFile)) {
    throw new Error(`Error loading ${envFile}: ${envResult.error.message}`);
  }
  return parseImportConfig(process.env);
}
