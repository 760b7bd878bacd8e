/**
 * Library entry point: the shared kernel plus every component, for
 * hosts that wire their own content source or transport.
 */
export * from "./shared/index.js";

// ── Index backends ────────────────────────────────────────────────────
export {
  type SearchIndexReader,
  type SearchIndexWriter,
  type SearchIndexBackend,
  DEFAULT_INDEX_SETTINGS,
} from "./features/index-backend/types.js";
export { SqliteIndexBackend, type SqliteIndexOptions } from "./features/index-backend/sqlite-backend.js";
export { YamlContentSource } from "./features/content/yaml-source.js";

// ── Indexing ──────────────────────────────────────────────────────────
export { cleanContent } from "./features/indexing/content-cleaner.js";
export {
  RecordBuilder,
  splitContent,
  joinChunks,
  allowedStatuses,
  DEFAULT_RECORD_SIZE_LIMIT,
} from "./features/indexing/record-builder.js";
export { IndexWriter, type IndexAllResult } from "./features/indexing/index-writer.js";
export {
  ChangeWatcher,
  GoverningChangeApplier,
  type ContentChangeEvent,
  type ChangeResult,
} from "./features/indexing/change-watcher.js";

// ── Search ────────────────────────────────────────────────────────────
export { planFilter, effectiveScopes, type SearchScopeConfig, type ScopeResolver } from "./features/search/query-planner.js";
export { SearchExecutor, computeScore, type SearchRequest } from "./features/search/search-executor.js";
export { ResultReconstructor } from "./features/search/result-reconstructor.js";
export { FederatedSearch, type FederatedSearchResult } from "./features/search/federated-search.js";
export * from "./features/search/search-document.js";
export { renderResultsMarkdown } from "./features/search/results-renderer.js";

// ── Sync ──────────────────────────────────────────────────────────────
export * from "./features/sync/protocol.js";
export { SyncClient, fetchTransport, type Transport } from "./features/sync/sync-client.js";
export { BrandConfigCache } from "./features/sync/brand-config-cache.js";
export { GoverningSettings, type SharedSite } from "./features/sync/governing-settings.js";
export { GoverningCoordinator } from "./features/sync/governing-coordinator.js";
export { BrandCoordinator } from "./features/sync/brand-coordinator.js";
export { RemoteIndexReader, RemoteIndexWriter } from "./features/sync/remote-index.js";
export { fanOut, summarizeResults } from "./features/sync/fan-out.js";
export { createSyncServer, dispatch, type Route } from "./features/sync/http.js";

// ── Composition ───────────────────────────────────────────────────────
export { createSiteContext, withSiteContext, type SiteContext } from "./site-context.js";
