// src/commands/clear.ts
import { Command } from "commander";
import { clearExistingData } from "../core/ingest.js";
import { errorMessage } from "../core/errors.js";
import { COLLECTIONS } from "../schema/collections.js";
import { openStore } from "../store/connect.js";
import type { StoreOptions } from "../types/commands/store.type.js";

export function clearCmd(): Command {
  const cmd = new Command("clear");

  cmd
    .description(
      "Delete every record, activities first and patients last, keeping the collections",
    )
    .option(
      "-c, --connection <url>",
      "PostgreSQL connection string (defaults to DATABASE_URL)",
    )
    .action(async (options: StoreOptions) => {
      try {
        const store = await openStore(options.connection);
        try {
          const deleted = await clearExistingData(store, COLLECTIONS);
          const total = Object.values(deleted).reduce((a, b) => a + b, 0);
          console.error(`\n✅ Deleted ${total} records`);
        } finally {
          await store.close();
        }
      } catch (error) {
        console.error("❌ Clearing failed:", errorMessage(error));
        process.exit(1);
      }
    });

  return cmd;
}
