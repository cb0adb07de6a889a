#!/usr/bin/env node
import { Command } from "commander";
import { seedCmd } from "./commands/seed.js";
import { provisionCmd } from "./commands/provision.js";
import { clearCmd } from "./commands/clear.js";
import { inspectCmd } from "./commands/inspect.js";

const program = new Command();

program
  .name("careseed")
  .description("Clinic list-store provisioning and relational synthetic seeding")
  .version("0.1.0");

program.addCommand(seedCmd());
program.addCommand(provisionCmd());
program.addCommand(clearCmd());
program.addCommand(inspectCmd());

await program.parseAsync(process.argv);
