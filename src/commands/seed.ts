// src/commands/seed.ts
import { Command } from "commander";
import { loadRunConfig } from "../core/config.js";
import { loadValuePools } from "../core/pools.js";
import { runSeed, type SeedRunSummary } from "../core/pipeline.js";
import { errorMessage } from "../core/errors.js";
import { MemoryStore } from "../store/memory_store.js";
import { openStore } from "../store/connect.js";
import { prefixPath, writeJsonFile } from "../util/fs.js";
import type { Store } from "../types/store.js";
import type { SeedOptions } from "../types/commands/seed.type.js";

export function seedCmd(): Command {
  const cmd = new Command("seed");

  cmd
    .description(
      "Provision the clinic collections and fill them with synthetic records",
    )
    .option(
      "-c, --connection <url>",
      "PostgreSQL connection string (defaults to DATABASE_URL)",
    )
    .option("--clear", "Delete every existing record before seeding")
    .option(
      "--no-provision",
      "Keep the existing collections instead of recreating them",
    )
    .option("--config <file>", "Path to a run config JSON file")
    .option("--seed <n>", "Random seed (defaults to the config seed, then the clock)")
    .option("--dry-run", "Seed an in-memory store and output the dataset as JSON")
    .option(
      "-o, --output <file>",
      "Dry-run output file (defaults to stdout, auto-prefixes output/ for relative paths)",
    )
    .action(async (options: SeedOptions) => {
      try {
        console.error("📄 Loading run config...");
        const config = await loadRunConfig(options.config);
        const pools = await loadValuePools();
        const seed = parseSeed(options.seed) ?? config.seed ?? Date.now();
        console.error(`   Seed: ${seed}`);

        const memory = options.dryRun ? new MemoryStore() : null;
        const store: Store = memory ?? (await openStore(options.connection));

        const summary = await closeAfter(store, async () => {
          const result = await runSeed(store, {
            config,
            pools,
            seed,
            clear: options.clear,
            provision: options.provision,
          });
          if (memory) {
            await emitSnapshot(memory, prefixPath("output", options.output));
          }
          return result;
        });

        printSummary(summary);
        if (summary.aborted.length > 0) {
          process.exit(1);
        }
      } catch (error) {
        console.error("❌ Seeding failed:", errorMessage(error));
        process.exit(1);
      }
    });

  return cmd;
}

async function closeAfter<T>(store: Store, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } finally {
    await store.close();
  }
}

function parseSeed(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const seed = Number(raw);
  if (!Number.isInteger(seed)) {
    throw new Error(`--seed must be an integer, got "${raw}"`);
  }
  return seed;
}

async function emitSnapshot(
  store: MemoryStore,
  output: string | undefined,
): Promise<void> {
  const snapshot = await store.snapshot();
  if (output) {
    await writeJsonFile(output, snapshot);
    console.error(`✅ Dataset written to ${output}`);
  } else {
    console.log(JSON.stringify(snapshot, null, 2));
  }
}

function printSummary(summary: SeedRunSummary): void {
  console.error("");
  console.error("📋 Seeding summary:");
  console.error(`   Seed: ${summary.seed}`);
  if (summary.cleared) {
    for (const [name, count] of Object.entries(summary.cleared)) {
      console.error(`   ${name}: ${count} cleared`);
    }
  }
  for (const report of summary.reports) {
    const failed = report.failures.length;
    console.error(
      `   ${report.collection}: ${report.created}/${report.attempted} created` +
        (failed > 0 ? `, ${failed} failed` : ""),
    );
  }
  for (const aborted of summary.aborted) {
    console.error(`   ${aborted.collection}: aborted (${aborted.reason})`);
  }
}
