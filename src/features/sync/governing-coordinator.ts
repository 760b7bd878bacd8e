/**
 * Governing-side coordination.
 *
 * Owns the shared index: rebuilds its own scope, asks every brand to
 * rebuild theirs, ingests brand writes confined to the calling brand's
 * scope, serves scoped reads of the index, and tells brands to drop
 * their cached configuration whenever the settings change.
 */
import type { SearchResponse } from "../../shared/types/records.js";
import { and, eq, eqAny } from "../../shared/filter.js";
import { normalizeScopeUrl } from "../../shared/scope.js";
import {
  CredentialsMissingError,
  IndexUnavailableError,
  ScopeNotConfiguredError,
  errorMessage,
  toFederatedSearchError,
  type ScopeResult,
} from "../../shared/errors.js";
import { createConsoleLogger, type Logger } from "../../shared/logger.js";
import type { SearchIndexBackend } from "../index-backend/types.js";
import type { IndexWriter } from "../indexing/index-writer.js";
import type { ChangeResult, GoverningChangeApplier, ReindexPostPayload } from "../indexing/change-watcher.js";
import type { ScopeResolver } from "../search/query-planner.js";
import { fanOut, summarizeResults, SCOPE_OK_MESSAGE, type FanOutOutcome } from "./fan-out.js";
import {
  ENDPOINTS,
  type ApiResponse,
  type IndexBatchPayload,
  type ReindexResponse,
  type SearchRequestPayload,
} from "./protocol.js";
import {
  safeEqual,
  type GoverningSettings,
  type IndexableEntityMap,
  type SearchScopeMap,
  type SharedSite,
} from "./governing-settings.js";
import type { SyncClient } from "./sync-client.js";

export interface GoverningCoordinatorOptions {
  settings: GoverningSettings;
  writer: IndexWriter;
  applier: GoverningChangeApplier;
  index: SearchIndexBackend;
  client: SyncClient;
  logger?: Logger;
}

export class GoverningCoordinator implements ScopeResolver {
  private readonly settings: GoverningSettings;
  private readonly writer: IndexWriter;
  private readonly applier: GoverningChangeApplier;
  private readonly index: SearchIndexBackend;
  private readonly client: SyncClient;
  private readonly logger: Logger;
  private notification: Promise<Record<string, ScopeResult>> = Promise.resolve({});

  constructor(options: GoverningCoordinatorOptions) {
    this.settings = options.settings;
    this.writer = options.writer;
    this.applier = options.applier;
    this.index = options.index;
    this.client = options.client;
    this.logger = options.logger ?? createConsoleLogger();
  }

  get siteUrl(): string {
    return this.settings.siteUrl;
  }

  async resolveSearchableScopes(): Promise<string[]> {
    return this.settings.searchableScopesFor(this.siteUrl);
  }

  // ── Re-indexing ─────────────────────────────────────────────────────

  async reindexSelf(): Promise<ScopeResult> {
    try {
      const result = await this.writer.indexAll(this.settings.indexableTypes(this.siteUrl), this.siteUrl);
      if (result.success) return { status: "ok", message: SCOPE_OK_MESSAGE };
      return { status: "error", message: `${result.failedBatches} batch(es) failed to write` };
    } catch (err: unknown) {
      this.logger.error(`Failed to re-index ${this.siteUrl}`, { error: errorMessage(err) });
      return { status: "error", message: errorMessage(err) };
    }
  }

  /** Ask every shared site to rebuild its scope, one after the other. */
  async reindexBrands(): Promise<Record<string, ScopeResult>> {
    return fanOut(
      this.settings.getSharedSites(),
      async (site) => {
        const response = await this.client.call<ReindexResponse>({
          baseUrl: site.url,
          path: ENDPOINTS.reindex,
          method: "POST",
          token: site.apiKey,
        });
        return response.message;
      },
      this.logger,
    );
  }

  async reindexAll(): Promise<FanOutOutcome> {
    const self = await this.reindexSelf();
    const brands = await this.reindexBrands();
    return summarizeResults({ [this.siteUrl]: self, ...brands });
  }

  /** Remove every record of every scope from the shared index. */
  async clearIndex(): Promise<void> {
    try {
      await this.index.clear();
    } catch (err: unknown) {
      throw toFederatedSearchError(err, (message, options) => new IndexUnavailableError(message, options));
    }
    this.logger.info("Cleared the shared index");
  }

  // ── Settings ────────────────────────────────────────────────────────

  updateSearchScopes(value: unknown): SearchScopeMap {
    const stored = this.settings.setSearchScopes(value);
    this.scheduleNotification();
    return stored;
  }

  updateIndexableEntities(value: unknown): IndexableEntityMap {
    const stored = this.settings.setIndexableEntities(value);
    this.scheduleNotification();
    return stored;
  }

  /** Replace the brand list; records of removed brands are deleted. */
  async updateSharedSites(value: unknown): Promise<{ sites: SharedSite[]; removed: string[] }> {
    const outcome = this.settings.setSharedSites(value);
    if (outcome.removed.length > 0) {
      await this.writer.deleteScopes(outcome.removed);
      this.logger.info("Removed records of unshared sites", { scopes: outcome.removed });
    }
    this.scheduleNotification();
    return outcome;
  }

  updateCredentials(value: unknown): void {
    this.settings.setCredentials(value);
    this.scheduleNotification();
  }

  /**
   * Send `DELETE /brand-config` to every shared site.  Failures are
   * logged per site; the returned promise never rejects.
   */
  async notifyBrands(): Promise<Record<string, ScopeResult>> {
    return fanOut(
      this.settings.getSharedSites(),
      async (site) => {
        const response = await this.client.call<ApiResponse>({
          baseUrl: site.url,
          path: ENDPOINTS.brandConfig,
          method: "DELETE",
          token: site.apiKey,
        });
        return response.message ?? "Cache cleared.";
      },
      this.logger,
    );
  }

  /** Resolves once the latest cache-bust round has finished. */
  settled(): Promise<Record<string, ScopeResult>> {
    return this.notification;
  }

  private scheduleNotification(): void {
    const previous = this.notification;
    this.notification = previous.then(() => this.notifyBrands());
    void this.notification;
  }

  // ── Brand access ────────────────────────────────────────────────────

  ingestChange(site: SharedSite, payload: ReindexPostPayload): Promise<ChangeResult> {
    this.assertOwnScope(site, payload.site_url);
    return this.applier.apply({
      scopeUrl: site.url,
      contentId: payload.post_id,
      contentType: payload.post_type,
      newStatus: payload.post_status,
      records: payload.records,
    });
  }

  /**
   * Apply a brand's batch: deletes are narrowed to the brand's scope,
   * records of any other scope reject the whole batch.
   */
  async ingestBatch(site: SharedSite, payload: IndexBatchPayload): Promise<{ deleted: boolean; written: number }> {
    const records = payload.records ?? [];
    for (const record of records) this.assertOwnScope(site, record.site_url);

    let deleted = false;
    if (payload.delete_filter) {
      const filter = and(eq("site_url", site.url), payload.delete_filter);
      if (filter) await this.writer.deleteByFilter(filter);
      deleted = true;
    }
    await this.writer.writeBatch(records);
    return { deleted, written: records.length };
  }

  /** Search the shared index on behalf of a brand, limited to what it may see. */
  async searchForBrand(site: SharedSite, searchKey: string | undefined, request: SearchRequestPayload): Promise<SearchResponse> {
    const credentials = this.settings.getCredentials();
    if (!credentials) {
      throw new CredentialsMissingError("No search credentials are configured on the governing site");
    }
    if (!searchKey || !safeEqual(searchKey, credentials.searchKey)) {
      throw new ScopeNotConfiguredError(`Search key rejected for ${site.url}`);
    }

    const scopes = this.settings.searchableScopesFor(site.url);
    if (scopes.length === 0) {
      throw new ScopeNotConfiguredError(`Search is not enabled for ${site.url}`);
    }
    const filter = and(request.params.filter, eqAny("site_url", scopes));
    return this.index.search(request.query, { ...request.params, filter });
  }

  private assertOwnScope(site: SharedSite, scope: string): void {
    if (normalizeScopeUrl(scope) !== site.url) {
      throw new ScopeNotConfiguredError(`${site.url} cannot write records of ${scope}`);
    }
  }
}
