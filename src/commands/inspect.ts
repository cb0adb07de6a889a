// src/commands/inspect.ts
import { Command } from "commander";
import { errorMessage } from "../core/errors.js";
import { COLLECTIONS } from "../schema/collections.js";
import { openStore } from "../store/connect.js";
import { dependencyOrder } from "../util/toposort.js";
import type { StoreOptions } from "../types/commands/store.type.js";

export function inspectCmd(): Command {
  const cmd = new Command("inspect");

  cmd
    .description("Report which collections exist and how many records each holds")
    .option(
      "-c, --connection <url>",
      "PostgreSQL connection string (defaults to DATABASE_URL)",
    )
    .action(async (options: StoreOptions) => {
      try {
        console.error("🔍 Inspecting store...");
        const store = await openStore(options.connection);
        try {
          for (const spec of dependencyOrder(COLLECTIONS)) {
            if (!(await store.collectionExists(spec.name))) {
              console.log(`${spec.name}\tmissing`);
              continue;
            }
            const records = await store.listRecords(spec.name);
            console.log(`${spec.name}\t${records.length} records`);
          }
        } finally {
          await store.close();
        }
      } catch (error) {
        console.error("❌ Inspection failed:", errorMessage(error));
        process.exit(1);
      }
    });

  return cmd;
}
