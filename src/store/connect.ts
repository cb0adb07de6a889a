// src/store/connect.ts
import { SetupFailure, errorMessage } from "../core/errors.js";
import { PostgresStore } from "./pg_store.js";

/**
 * Connect to the store named on the command line, or by DATABASE_URL.
 */
export async function openStore(connection?: string): Promise<PostgresStore> {
  const connectionString = connection ?? process.env.DATABASE_URL;
  if (!connectionString) {
    throw new SetupFailure(
      "No store given: pass --connection or set DATABASE_URL",
    );
  }
  try {
    return await PostgresStore.connect(connectionString);
  } catch (error) {
    throw new SetupFailure(`Cannot reach the store: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
