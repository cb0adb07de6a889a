// src/core/pools.ts
import { readJsonFile } from "../util/fs.js";
import { fileURLToPath } from "url";
import { ValuePoolsSchema } from "../models/pools.js";
import type { ValuePools } from "../types/pools.js";

// Resolves to <root>/data/pools.json from both src/core and dist/core
const POOLS_PATH = fileURLToPath(
  new URL("../../data/pools.json", import.meta.url),
);

/**
 * Load the name and history pools the synthesizer samples from.
 */
export async function loadValuePools(
  filePath: string = POOLS_PATH,
): Promise<ValuePools> {
  const result = ValuePoolsSchema.safeParse(await readJsonFile(filePath));
  if (!result.success) {
    throw new Error(`Invalid value pools in ${filePath}: ${result.error.message}`);
  }
  return result.data;
}
