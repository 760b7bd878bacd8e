/**
 * `fedsearch settings` command group — governing settings.
 *
 * ```yaml
 * sharedSites:
 *   - url: https://brand-a.example.com
 *     name: Brand A
 *     apiKey: brand-a-key
 * indexableEntities:
 *   https://hub.example.com/: [post, page]
 *   https://brand-a.example.com/: [post]
 * searchScopes:
 *   https://hub.example.com/:
 *     enabled: true
 *     searchableScopes: [https://brand-a.example.com/]
 * credentials:
 *   indexName: shared
 *   searchKey: search-key
 * ```
 */
import { resolve } from "node:path";
import type { Command as Cmd } from "commander";
import { readYamlFile, stringifyYaml } from "../../../shared/yaml.js";
import { schemaRegistry } from "../../../shared/schema.js";
import { withSiteContext, type GoverningContext, type SiteContext } from "../../../site-context.js";
import type { GoverningSettingsSnapshot } from "../governing-settings.js";

interface SettingsFile {
  sharedSites?: unknown;
  searchScopes?: unknown;
  indexableEntities?: unknown;
  credentials?: unknown;
}

function requireGoverning(ctx: SiteContext): GoverningContext {
  if (ctx.role !== "governing") {
    throw new Error("Settings are managed on the governing site");
  }
  return ctx;
}

const mask = (secret: string): string => (secret.length <= 4 ? "****" : `****${secret.slice(-4)}`);

function redact(snapshot: GoverningSettingsSnapshot): unknown {
  return {
    ...snapshot,
    sharedSites: snapshot.sharedSites.map((s) => ({ ...s, apiKey: mask(s.apiKey) })),
    credentials: snapshot.credentials
      ? { indexName: snapshot.credentials.indexName, searchKey: mask(snapshot.credentials.searchKey) }
      : null,
  };
}

/** Register the `settings` command group. */
export function registerSettings(program: Cmd): void {
  const settings = program.command("settings").description("Governing site settings");

  settings
    .command("import <file>")
    .description("Apply shared sites, entity map, search scopes and credentials from a YAML file")
    .option("-r, --root <path>", "Override site root")
    .action(async (file: string, opts: { root?: string }) => {
      const data = schemaRegistry().parse<SettingsFile>("settings.schema.json", readYamlFile(resolve(file)), "settings file");

      const notified = await withSiteContext({ root: opts.root }, async (siteCtx) => {
        const { coordinator } = requireGoverning(siteCtx);
        if (data.sharedSites !== undefined) {
          const { sites, removed } = await coordinator.updateSharedSites(data.sharedSites);
          console.log(`Shared sites: ${sites.length}${removed.length ? ` (removed ${removed.join(", ")})` : ""}`);
        }
        if (data.indexableEntities !== undefined) {
          const entities = coordinator.updateIndexableEntities(data.indexableEntities);
          console.log(`Indexable entities: ${Object.keys(entities).length} scope(s)`);
        }
        if (data.searchScopes !== undefined) {
          const scopes = coordinator.updateSearchScopes(data.searchScopes);
          console.log(`Search scopes: ${Object.keys(scopes).length} scope(s)`);
        }
        if (data.credentials !== undefined) {
          coordinator.updateCredentials(data.credentials);
          console.log("Credentials: saved");
        }
        return coordinator.settled();
      });

      for (const [scope, result] of Object.entries(notified)) {
        if (result.status === "error") console.log(`  ! ${scope} was not notified: ${result.message}`);
      }
    });

  settings
    .command("show")
    .description("Print the stored settings (secrets masked)")
    .option("--json", "Output as JSON")
    .option("-r, --root <path>", "Override site root")
    .action(async (opts: { json?: boolean; root?: string }) => {
      const snapshot = await withSiteContext({ root: opts.root }, async (ctx) => requireGoverning(ctx).settings.snapshot());
      const output = redact(snapshot);
      console.log(opts.json ? JSON.stringify(output, null, 2) : stringifyYaml(output));
    });
}
