// src/types/commands/store.type.ts

/** Options shared by commands that only need a store connection. */
export type StoreOptions = {
  connection?: string;
};
