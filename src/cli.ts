#!/usr/bin/env node
import { Command } from "commander";
import { formatCliError } from "./shared/errors.js";
import { registerIndex } from "./features/indexing/commands/index.js";
import { registerChange } from "./features/indexing/commands/change.js";
import { registerSearch } from "./features/search/commands/search.js";
import { registerServe } from "./features/sync/commands/serve.js";
import { registerSettings } from "./features/sync/commands/settings.js";
import { registerCache } from "./features/sync/commands/cache.js";

/** Whether to show full stack traces (set DEBUG=1 in env). */
const DEBUG = Boolean(process.env.DEBUG);

// ── CLI setup ─────────────────────────────────────────────────────────

const program = new Command();

program
  .name("fedsearch")
  .description("Federated search across a governing site and its brand sites")
  .version("0.1.0");

// Indexing
registerIndex(program);
registerChange(program);

// Search
registerSearch(program);

// Sync
registerServe(program);
registerSettings(program);
registerCache(program);

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${formatCliError(err)}`);
  if (DEBUG && err instanceof Error && err.stack) {
    console.error(`\nStack trace:\n${err.stack}`);
  }
  process.exit(1);
});
