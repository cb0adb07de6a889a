// src/core/config.ts
import { RunConfigSchema } from "../models/run-config.js";
import type { RunConfig } from "../types/run-config.js";
import { readJsonFile } from "../util/fs.js";

/**
 * Load a run config from a JSON file, or the defaults when no file is given.
 */
export async function loadRunConfig(filePath?: string): Promise<RunConfig> {
  const raw = filePath ? await readJsonFile(filePath) : {};
  const result = RunConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(
      `Invalid run config${filePath ? ` in ${filePath}` : ""}: ${result.error.message}`,
    );
  }
  return result.data;
}
