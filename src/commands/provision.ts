// src/commands/provision.ts
import { Command } from "commander";
import { provisionCollections } from "../core/provision.js";
import { errorMessage } from "../core/errors.js";
import { COLLECTIONS } from "../schema/collections.js";
import { openStore } from "../store/connect.js";
import type { StoreOptions } from "../types/commands/store.type.js";

export function provisionCmd(): Command {
  const cmd = new Command("provision");

  cmd
    .description("Create (or recreate) the clinic collections without data")
    .option(
      "-c, --connection <url>",
      "PostgreSQL connection string (defaults to DATABASE_URL)",
    )
    .action(async (options: StoreOptions) => {
      try {
        const store = await openStore(options.connection);
        try {
          const results = await provisionCollections(store, COLLECTIONS);
          const recreated = results.filter((r) => r.recreated).length;
          console.error(
            `\n✅ Provisioned ${results.length} collections (${recreated} recreated)`,
          );
        } finally {
          await store.close();
        }
      } catch (error) {
        console.error("❌ Provisioning failed:", errorMessage(error));
        process.exit(1);
      }
    });

  return cmd;
}
