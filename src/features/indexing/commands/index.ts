/**
 * `fedsearch index` command — rebuild this site's scope of the shared index.
 *
 * On the governing site `--all` also asks every shared site to rebuild
 * its own scope and reports one line per scope; `--clear` empties the
 * whole shared index first.
 */
import type { Command as Cmd } from "commander";
import { PartialFailureError, type ScopeResult } from "../../../shared/errors.js";
import { withSiteContext } from "../../../site-context.js";
import { summarizeResults } from "../../sync/fan-out.js";

function printResults(results: Record<string, ScopeResult>): void {
  for (const [scope, result] of Object.entries(results)) {
    const mark = result.status === "ok" ? "✓" : "✗";
    console.log(`  ${mark} ${scope}  ${result.message}`);
  }
}

/** Register the `index` subcommand. */
export function registerIndex(program: Cmd): void {
  program
    .command("index")
    .description("Rebuild this site's records in the shared search index")
    .option("-a, --all", "Governing site only: also re-index every shared site")
    .option("--clear", "Governing site only: remove every record from the shared index first")
    .option("--json", "Output as JSON")
    .option("-r, --root <path>", "Override site root")
    .action(async (opts: { all?: boolean; clear?: boolean; json?: boolean; root?: string }) => {
      const outcome = await withSiteContext({ root: opts.root }, async (ctx) => {
        if (ctx.role === "governing") {
          if (opts.clear) await ctx.coordinator.clearIndex();
          if (opts.all) return ctx.coordinator.reindexAll();
        } else if (opts.all || opts.clear) {
          throw new Error(`--${opts.all ? "all" : "clear"} is only available on the governing site`);
        }
        return summarizeResults({ [ctx.config.siteUrl]: await ctx.coordinator.reindexSelf() });
      });

      if (opts.json) {
        console.log(JSON.stringify(outcome, null, 2));
      } else {
        console.log(`\n${outcome.success ? "Done" : "Finished with errors"}:\n`);
        printResults(outcome.results);
        console.log();
      }

      if (!outcome.success) {
        throw new PartialFailureError(outcome.message, outcome.results);
      }
    });
}
