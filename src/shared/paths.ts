/**
 * Path resolution utilities.
 *
 * Two resolution strategies:
 *
 * 1. **Site paths** (`repoRoot`, `stateDir`, `contentDir`, …) resolve
 *    from `process.cwd()` (or an explicit `--root` override).  This is
 *    the site's directory, where `.fedsearch/` lives.
 *
 * 2. **Package asset paths** (`packageRoot`, `schemaDir`, `templatesDir`,
 *    `dataDir`) resolve from `import.meta.dirname`.  Schemas, templates
 *    and data files ship with the package under `tools/fedsearch/`.
 */
import { existsSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

const ASSETS = join("tools", "fedsearch");

/**
 * Resolve the package installation root.
 *
 * Walks up from `import.meta.dirname` to the first directory holding
 * `tools/fedsearch/`.  This covers `src/shared/` when running from
 * source and `dist/src/shared/` when running the compiled output.
 */
export function packageRoot(): string {
  let dir = import.meta.dirname;
  for (;;) {
    if (existsSync(join(dir, ASSETS))) return dir;
    const parent = dirname(dir);
    if (parent === dir) return resolve(import.meta.dirname, "../..");
    dir = parent;
  }
}

/**
 * Resolve the site root (where `.fedsearch/` lives).
 *
 * Callers can override with an explicit path (the `--root` CLI flag).
 */
export function repoRoot(override?: string): string {
  if (override) return resolve(override);
  return resolve(process.cwd());
}

/** Absolute path to `.fedsearch/`. */
export function stateDir(root?: string): string {
  return join(repoRoot(root), ".fedsearch");
}

/** Absolute path to `.fedsearch/site.yml`. */
export function siteConfigFile(root?: string): string {
  return join(stateDir(root), "site.yml");
}

/** Absolute path to `.fedsearch/content/`. */
export function contentDir(root?: string): string {
  return join(stateDir(root), "content");
}

/** Absolute path to the shared search index database. */
export function indexDbFile(root?: string): string {
  return join(stateDir(root), "index.db");
}

/** Absolute path to the option / cache store database. */
export function storeDbFile(root?: string): string {
  return join(stateDir(root), "store.db");
}

/** Absolute path to `tools/fedsearch/schema/`. */
export function schemaDir(): string {
  return join(packageRoot(), ASSETS, "schema");
}

/** Absolute path to `tools/fedsearch/templates/`. */
export function templatesDir(): string {
  return join(packageRoot(), ASSETS, "templates");
}

/** Absolute path to `tools/fedsearch/data/`. */
export function dataDir(): string {
  return join(packageRoot(), ASSETS, "data");
}
