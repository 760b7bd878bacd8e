/**
 * Composition root.
 *
 * Wires one site's collaborators from its {@link SiteConfig}: the
 * governing site owns the SQLite index and the settings; a brand reads
 * and writes the index through the governing site and caches its
 * configuration.  CLI commands and the integration tests build their
 * objects here.
 */
import type { ContentSource } from "./shared/types/content.js";
import { SqliteConfigStore } from "./shared/config-store.js";
import { indexDbFile, storeDbFile } from "./shared/paths.js";
import { schemaRegistry, type SchemaRegistry } from "./shared/schema.js";
import { createConsoleLogger, type Logger } from "./shared/logger.js";
import { loadSiteConfig, type BrandSiteConfig, type GoverningSiteConfig, type SiteConfig } from "./shared/site-config.js";
import { YamlContentSource } from "./features/content/yaml-source.js";
import { SqliteIndexBackend } from "./features/index-backend/sqlite-backend.js";
import { RecordBuilder } from "./features/indexing/record-builder.js";
import { IndexWriter } from "./features/indexing/index-writer.js";
import { ChangeWatcher, GoverningChangeApplier } from "./features/indexing/change-watcher.js";
import { SearchExecutor } from "./features/search/search-executor.js";
import { ResultReconstructor } from "./features/search/result-reconstructor.js";
import { FederatedSearch } from "./features/search/federated-search.js";
import type { SearchIndexReader } from "./features/index-backend/types.js";
import { SyncClient, type Transport } from "./features/sync/sync-client.js";
import { GoverningSettings } from "./features/sync/governing-settings.js";
import { GoverningCoordinator } from "./features/sync/governing-coordinator.js";
import { BrandConfigCache } from "./features/sync/brand-config-cache.js";
import { BrandCoordinator } from "./features/sync/brand-coordinator.js";
import { RemoteIndexReader, RemoteIndexWriter } from "./features/sync/remote-index.js";
import { governingRoutes } from "./features/sync/governing-routes.js";
import { brandRoutes } from "./features/sync/brand-routes.js";
import type { Route } from "./features/sync/http.js";

// ── Types ─────────────────────────────────────────────────────────────

export interface SiteContextOptions {
  /** Site root holding `.fedsearch/` (default: cwd). */
  root?: string;
  logger?: Logger;
  transport?: Transport;
  /** Index database (default `.fedsearch/index.db`). */
  indexPath?: string;
  /** Config store database (default `.fedsearch/store.db`). */
  storePath?: string;
  source?: ContentSource;
  registry?: SchemaRegistry;
}

interface SiteContextBase {
  store: SqliteConfigStore;
  source: ContentSource;
  builder: RecordBuilder;
  writer: IndexWriter;
  watcher: ChangeWatcher;
  search: FederatedSearch;
  routes: Route[];
  logger: Logger;
  close(): void;
}

export interface GoverningContext extends SiteContextBase {
  role: "governing";
  config: GoverningSiteConfig;
  index: SqliteIndexBackend;
  settings: GoverningSettings;
  coordinator: GoverningCoordinator;
}

export interface BrandContext extends SiteContextBase {
  role: "brand";
  config: BrandSiteConfig;
  cache: BrandConfigCache;
  coordinator: BrandCoordinator;
}

export type SiteContext = GoverningContext | BrandContext;

// ── Wiring ────────────────────────────────────────────────────────────

export function createSiteContext(config: SiteConfig, options: SiteContextOptions = {}): SiteContext {
  return config.role === "governing" ? createGoverningContext(config, options) : createBrandContext(config, options);
}

function createSearch(
  reader: SearchIndexReader,
  source: ContentSource,
  coordinator: GoverningCoordinator | BrandCoordinator,
  logger: Logger,
): FederatedSearch {
  return new FederatedSearch({
    resolver: coordinator,
    executor: new SearchExecutor({ reader, logger }),
    reconstructor: new ResultReconstructor({ reader, source, siteUrl: coordinator.siteUrl, logger }),
    logger,
  });
}

function createGoverningContext(config: GoverningSiteConfig, options: SiteContextOptions): GoverningContext {
  const logger = options.logger ?? createConsoleLogger();
  const registry = options.registry ?? schemaRegistry();
  const store = new SqliteConfigStore({ path: options.storePath ?? storeDbFile(options.root) });
  const index = new SqliteIndexBackend({ path: options.indexPath ?? indexDbFile(options.root), registry });
  const source = options.source ?? new YamlContentSource({ root: options.root, registry });

  const builder = new RecordBuilder({
    siteUrl: config.siteUrl,
    siteName: config.siteName,
    recordSizeLimit: config.recordSizeLimit,
    logger,
  });
  const writer = new IndexWriter({ index, source, builder, batchSize: config.batchSize, logger });
  const settings = new GoverningSettings({
    store,
    siteUrl: config.siteUrl,
    encryptionKey: config.encryptionKey,
    encryptionSalt: config.encryptionSalt,
    registry,
  });
  const indexableTypes = async (scope: string) => settings.indexableTypes(scope);
  const applier = new GoverningChangeApplier({ writer, indexableTypes, logger });
  const client = new SyncClient({ transport: options.transport, timeoutMs: config.requestTimeoutMs, registry });
  const coordinator = new GoverningCoordinator({ settings, writer, applier, index, client, logger });

  return {
    role: "governing",
    config,
    store,
    index,
    source,
    builder,
    writer,
    settings,
    coordinator,
    watcher: new ChangeWatcher({ role: "governing", applier, builder, indexableTypes, logger }),
    search: createSearch(index, source, coordinator, logger),
    routes: governingRoutes({ config, settings, coordinator, registry }),
    logger,
    close() {
      index.close();
      store.close();
    },
  };
}

function createBrandContext(config: BrandSiteConfig, options: SiteContextOptions): BrandContext {
  const logger = options.logger ?? createConsoleLogger();
  const registry = options.registry ?? schemaRegistry();
  const store = new SqliteConfigStore({ path: options.storePath ?? storeDbFile(options.root) });
  const source = options.source ?? new YamlContentSource({ root: options.root, registry });
  const client = new SyncClient({ transport: options.transport, timeoutMs: config.requestTimeoutMs, registry });
  const remote = { client, governingUrl: config.governingUrl, apiKey: config.apiKey };

  const builder = new RecordBuilder({
    siteUrl: config.siteUrl,
    siteName: config.siteName,
    recordSizeLimit: config.recordSizeLimit,
    logger,
  });
  const writer = new IndexWriter({
    index: new RemoteIndexWriter(remote),
    source,
    builder,
    batchSize: config.batchSize,
    logger,
  });
  const cache = new BrandConfigCache({ store, ...remote, registry, logger });
  const coordinator = new BrandCoordinator({ cache, writer, ...remote, logger });
  const reader = new RemoteIndexReader({ ...remote, credentials: () => coordinator.credentials() });

  return {
    role: "brand",
    config,
    store,
    source,
    builder,
    writer,
    cache,
    coordinator,
    watcher: new ChangeWatcher({
      role: "brand",
      forward: (payload) => coordinator.forwardChange(payload),
      builder,
      indexableTypes: () => coordinator.indexableTypes(),
      logger,
    }),
    search: createSearch(reader, source, coordinator, logger),
    routes: brandRoutes({ config, coordinator }),
    logger,
    close() {
      store.close();
    },
  };
}

/** Load the site at `options.root`, run `fn`, and close the databases. */
export async function withSiteContext<T>(
  options: SiteContextOptions,
  fn: (context: SiteContext) => Promise<T>,
): Promise<T> {
  const config = loadSiteConfig({ root: options.root, registry: options.registry });
  const context = createSiteContext(config, options);
  try {
    return await fn(context);
  } finally {
    context.close();
  }
}
