// src/types/commands/seed.type.ts

export type SeedOptions = {
  connection?: string;
  clear?: boolean;
  provision: boolean;
  config?: string;
  seed?: string;
  dryRun?: boolean;
  output?: string;
};
