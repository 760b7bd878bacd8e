/**
 * Barrel export for all shared / cross-cutting modules.
 *
 * Consumers can import from `../shared/index.js` (or just `../shared/`)
 * instead of reaching into individual files.
 */

// ── Types ─────────────────────────────────────────────────────────────
export * from "./types/content.js";
export * from "./types/records.js";

// ── Scopes & filters ──────────────────────────────────────────────────
export { normalizeScopeUrl, scopeKey, documentId, objectId, sameScope, uniqueScopes } from "./scope.js";
export {
  FILTER_FIELDS,
  type Filter,
  type FilterField,
  type FilterValue,
  eq,
  anyOf,
  and,
  or,
  eqAny,
  valuesFor,
  formatFilter,
} from "./filter.js";

// ── Errors ────────────────────────────────────────────────────────────
export {
  FederatedSearchError,
  CredentialsMissingError,
  IndexUnavailableError,
  RemoteUnreachableError,
  RemoteInvalidResponseError,
  RecordOverBudgetError,
  ScopeNotConfiguredError,
  PartialFailureError,
  type FederatedSearchErrorKind,
  type ScopeResult,
  isFederatedSearchError,
  errorMessage,
  toFederatedSearchError,
  formatCliError,
  isYAMLException,
  isNodeSystemError,
} from "./errors.js";

// ── Logging ───────────────────────────────────────────────────────────
export { type Logger, type LogContext, createConsoleLogger, createSilentLogger } from "./logger.js";

// ── Configuration & storage ───────────────────────────────────────────
export {
  type SiteConfig,
  type GoverningSiteConfig,
  type BrandSiteConfig,
  resolveSiteConfig,
  loadSiteConfig,
} from "./site-config.js";
export { type ConfigStore, SqliteConfigStore } from "./config-store.js";
export { SecretBox } from "./crypto.js";
export { SchemaRegistry, schemaRegistry, type SchemaCheck } from "./schema.js";

// ── Path helpers ──────────────────────────────────────────────────────
export {
  repoRoot,
  stateDir,
  siteConfigFile,
  contentDir,
  indexDbFile,
  storeDbFile,
  schemaDir,
  templatesDir,
  dataDir,
} from "./paths.js";

// ── YAML helpers ──────────────────────────────────────────────────────
export { parseYaml, readYamlFile, stringifyYaml } from "./yaml.js";
