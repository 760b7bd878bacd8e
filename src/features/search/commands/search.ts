/**
 * `fedsearch search <query>` command — federated search from this site.
 *
 * Searches every scope this site may see and prints the reconstructed
 * documents, as text, JSON or a Markdown results page.
 */
import type { Command as Cmd } from "commander";
import { withSiteContext } from "../../../site-context.js";
import { DEFAULT_PER_PAGE } from "../search-executor.js";
import { renderResultsMarkdown } from "../results-renderer.js";
import { isRemote, permalinkOf, titleOf } from "../search-document.js";

function positiveInt(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined) return fallback;
  const n = parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1) throw new Error(`--${name} must be a positive integer`);
  return n;
}

/** Register the `search` subcommand. */
export function registerSearch(program: Cmd): void {
  program
    .command("search <query>")
    .description("Search this site and every site it may see")
    .option("-t, --type <types>", "Comma-separated content types to include")
    .option("-p, --page <n>", "Result page, starting at 1", "1")
    .option("--per-page <n>", "Results per page", String(DEFAULT_PER_PAGE))
    .option("--no-reconstruct", "Show matching chunks instead of whole remote documents")
    .option("-f, --format <format>", "Output format: text or markdown", "text")
    .option("--json", "Output as JSON")
    .option("-r, --root <path>", "Override site root")
    .action(async (query: string, opts: {
      type?: string;
      page?: string;
      perPage?: string;
      reconstruct?: boolean;
      format?: string;
      json?: boolean;
      root?: string;
    }) => {
      const request = {
        query,
        page: positiveInt(opts.page, 1, "page"),
        perPage: positiveInt(opts.perPage, DEFAULT_PER_PAGE, "per-page"),
        types: opts.type?.split(",").map((t) => t.trim()).filter(Boolean),
      };

      const result = await withSiteContext({ root: opts.root }, (ctx) =>
        ctx.search.search(request, { reconstruct: opts.reconstruct !== false }),
      );

      if (opts.json) {
        console.log(JSON.stringify({ ...result, error: result.error?.message }, null, 2));
      } else if (opts.format === "markdown") {
        console.log(renderResultsMarkdown(result));
      } else if (!result.error) {
        if (result.documents.length === 0) {
          console.log(`\nNo results for "${query}".\n`);
        } else {
          console.log(`\n${result.totalCount} result(s) for "${query}" (page ${result.page}):\n`);
          for (const doc of result.documents) {
            const origin = isRemote(doc) ? `${doc.siteName}, remote` : doc.siteName;
            console.log(`  ${titleOf(doc)}  [${origin}]`);
            console.log(`    ${permalinkOf(doc)}`);
            console.log();
          }
        }
      }

      if (result.error) {
        throw result.error;
      }
    });
}
