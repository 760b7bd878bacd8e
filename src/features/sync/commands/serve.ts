/**
 * `fedsearch serve` command — serve this site's sync endpoints until
 * interrupted.
 */
import type { Command as Cmd } from "commander";
import { loadSiteConfig } from "../../../shared/site-config.js";
import { createSiteContext } from "../../../site-context.js";
import { createSyncServer } from "../http.js";

/** Register the `serve` subcommand. */
export function registerServe(program: Cmd): void {
  program
    .command("serve")
    .description("Serve the sync endpoints of this site")
    .option("--port <n>", "Port to listen on (default: from site.yml)")
    .option("-r, --root <path>", "Override site root")
    .action(async (opts: { port?: string; root?: string }) => {
      const config = loadSiteConfig({ root: opts.root });
      const port = opts.port ? parseInt(opts.port, 10) : config.port;
      if (!Number.isInteger(port) || port < 0) {
        throw new Error(`Invalid port "${opts.port}"`);
      }

      const ctx = createSiteContext(config, { root: opts.root });
      const server = createSyncServer(ctx.routes, ctx.logger);

      await new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(port, () => {
          ctx.logger.info(`Serving ${ctx.role} site ${config.siteUrl} on port ${port}`);
          resolve();
        });
      });

      await new Promise<void>((resolve) => {
        const shutdown = () => {
          ctx.logger.info("Shutting down");
          server.close(() => {
            ctx.close();
            resolve();
          });
        };
        process.once("SIGINT", shutdown);
        process.once("SIGTERM", shutdown);
      });
    });
}
