/**
 * `fedsearch change <id>` command — replay a status transition of one
 * content item through the change watcher.
 */
import type { Command as Cmd } from "commander";
import { withSiteContext } from "../../../site-context.js";

/** Register the `change` subcommand. */
export function registerChange(program: Cmd): void {
  program
    .command("change <id>")
    .description("Apply a status change of one content item to the shared index")
    .requiredOption("--from <status>", "Status before the change")
    .option("--to <status>", "Status after the change (default: the item's current status)")
    .option("--json", "Output as JSON")
    .option("-r, --root <path>", "Override site root")
    .action(async (id: string, opts: { from: string; to?: string; json?: boolean; root?: string }) => {
      const contentId = parseInt(id, 10);
      if (!Number.isInteger(contentId) || contentId <= 0) {
        throw new Error(`Invalid content id "${id}"`);
      }

      const result = await withSiteContext({ root: opts.root }, async (ctx) => {
        const item = await ctx.source.get(contentId);
        if (!item) {
          throw new Error(`Content item ${contentId} not found`);
        }
        return ctx.watcher.handle({ oldStatus: opts.from, newStatus: opts.to ?? item.status, item });
      });

      if (opts.json) {
        console.log(JSON.stringify(result, null, 2));
      } else {
        const count = result.count !== undefined ? ` (${result.count} record(s))` : "";
        const message = result.message ? ` — ${result.message}` : "";
        console.log(`${result.action}${count}${message}`);
      }

      if (!result.ok) {
        throw new Error(result.message ?? `Change of item ${contentId} failed`);
      }
    });
}
