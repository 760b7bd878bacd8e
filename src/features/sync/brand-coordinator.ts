/**
 * Brand-side coordination: cached configuration, scope resolution,
 * self re-index through the governing site and change forwarding.
 */
import { errorMessage, type ScopeResult } from "../../shared/errors.js";
import { createConsoleLogger, type Logger } from "../../shared/logger.js";
import type { IndexWriter } from "../indexing/index-writer.js";
import type { ChangeResult, ReindexPostPayload } from "../indexing/change-watcher.js";
import { effectiveScopes, type ScopeResolver } from "../search/query-planner.js";
import { SCOPE_OK_MESSAGE } from "./fan-out.js";
import { ENDPOINTS, type ApiResponse, type BrandConfig, type IndexCredentials } from "./protocol.js";
import type { BrandConfigCache } from "./brand-config-cache.js";
import type { SyncClient } from "./sync-client.js";

interface ChangeResponse extends ApiResponse {
  action: ChangeResult["action"];
  count?: number;
}

export interface BrandCoordinatorOptions {
  cache: BrandConfigCache;
  /** Writer over the governing site's batch endpoint. */
  writer: IndexWriter;
  client: SyncClient;
  governingUrl: string;
  apiKey: string;
  logger?: Logger;
}

export class BrandCoordinator implements ScopeResolver {
  private readonly cache: BrandConfigCache;
  private readonly writer: IndexWriter;
  private readonly client: SyncClient;
  private readonly governingUrl: string;
  private readonly apiKey: string;
  private readonly logger: Logger;

  constructor(options: BrandCoordinatorOptions) {
    this.cache = options.cache;
    this.writer = options.writer;
    this.client = options.client;
    this.governingUrl = options.governingUrl;
    this.apiKey = options.apiKey;
    this.logger = options.logger ?? createConsoleLogger();
  }

  get siteUrl(): string {
    return this.writer.siteUrl;
  }

  config(): Promise<BrandConfig> {
    return this.cache.getConfig();
  }

  async credentials(): Promise<IndexCredentials | undefined> {
    return (await this.cache.getConfig()).credentials;
  }

  async indexableTypes(): Promise<string[]> {
    return (await this.cache.getConfig()).indexableTypes;
  }

  async resolveSearchableScopes(): Promise<string[]> {
    const config = await this.cache.getConfig();
    return effectiveScopes(this.siteUrl, config.searchScope, config.availableScopes);
  }

  invalidateCache(): void {
    this.cache.invalidate();
    this.logger.info("Brand configuration cache cleared");
  }

  /** Rebuild this brand's scope in the shared index. */
  async reindexSelf(): Promise<ScopeResult> {
    try {
      const types = await this.indexableTypes();
      const result = await this.writer.indexAll(types, this.siteUrl);
      if (result.success) return { status: "ok", message: SCOPE_OK_MESSAGE };
      return { status: "error", message: `${result.failedBatches} batch(es) failed to write` };
    } catch (err: unknown) {
      this.logger.error(`Failed to re-index ${this.siteUrl}`, { error: errorMessage(err) });
      return { status: "error", message: errorMessage(err) };
    }
  }

  /** Send one document change to the governing site. */
  async forwardChange(payload: ReindexPostPayload): Promise<ChangeResult> {
    const response = await this.client.call<ChangeResponse>({
      baseUrl: this.governingUrl,
      path: ENDPOINTS.reindexPost,
      method: "POST",
      token: this.apiKey,
      body: payload,
      schema: "change-response.schema.json",
    });
    return { ok: response.success, action: response.action, count: response.count, message: response.message };
  }
}
