/**
 * `fedsearch cache clear` — drop the cached brand configuration.
 *
 * On a brand the local entry is deleted; on the governing site every
 * shared site is told to drop its entry.
 */
import type { Command as Cmd } from "commander";
import { withSiteContext } from "../../../site-context.js";

/** Register the `cache` command group. */
export function registerCache(program: Cmd): void {
  const cache = program.command("cache").description("Brand configuration cache");

  cache
    .command("clear")
    .description("Clear the cached brand configuration")
    .option("-r, --root <path>", "Override site root")
    .action(async (opts: { root?: string }) => {
      await withSiteContext({ root: opts.root }, async (ctx) => {
        if (ctx.role === "brand") {
          ctx.coordinator.invalidateCache();
          console.log("Brand configuration cache cleared.");
          return;
        }
        const results = await ctx.coordinator.notifyBrands();
        for (const [scope, result] of Object.entries(results)) {
          console.log(`  ${result.status === "ok" ? "✓" : "✗"} ${scope}  ${result.message}`);
        }
      });
    });
}
