// src/util/fs.ts
import { readFile, writeFile as fsWriteFile, mkdir } from "fs/promises";
import { dirname, isAbsolute } from "path";

/**
 * Read and parse a JSON file. Callers validate the shape.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  const content = await readFile(filePath, "utf-8");
  return JSON.parse(content);
}

/**
 * Write content to a file, creating directories if needed.
 */
export async function writeFile(
  filePath: string,
  content: string,
): Promise<void> {
  const dir = dirname(filePath);
  await mkdir(dir, { recursive: true });
  await fsWriteFile(filePath, content, "utf-8");
}

/**
 * Write JSON to a file with pretty formatting.
 */
export async function writeJsonFile(
  filePath: string,
  data: unknown,
): Promise<void> {
  await writeFile(filePath, JSON.stringify(data, null, 2));
}

/**
 * Place a relative output path under `prefix/` unless it is already there.
 */
export function prefixPath(
  prefix: string,
  rawOutput?: string,
): string | undefined {
  if (!rawOutput) return undefined;
  if (isAbsolute(rawOutput) || rawOutput.startsWith(`${prefix}/`)) {
    return rawOutput;
  }
  return `${prefix}/${rawOutput}`;
}
