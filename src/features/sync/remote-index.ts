/**
 * Brand-side access to the shared index, proxied by the governing site.
 *
 * Reads need the search key from the brand configuration; writes are
 * confined by the governing site to the brand's own scope.
 */
import type { Filter } from "../../shared/filter.js";
import type { IndexRecord, IndexSettings, SearchParams, SearchResponse } from "../../shared/types/records.js";
import { CredentialsMissingError } from "../../shared/errors.js";
import { normalizeScopeUrl } from "../../shared/scope.js";
import type { SearchIndexReader, SearchIndexWriter } from "../index-backend/types.js";
import {
  ENDPOINTS,
  SEARCH_KEY_HEADER,
  type ApiResponse,
  type IndexBatchPayload,
  type IndexCredentials,
  type SearchRequestPayload,
  type SearchResponsePayload,
} from "./protocol.js";
import type { SyncClient } from "./sync-client.js";

interface RemoteIndexOptions {
  client: SyncClient;
  governingUrl: string;
  /** The brand's shared key. */
  apiKey: string;
}

export interface RemoteIndexReaderOptions extends RemoteIndexOptions {
  credentials: () => Promise<IndexCredentials | undefined>;
}

export class RemoteIndexReader implements SearchIndexReader {
  private readonly client: SyncClient;
  private readonly governingUrl: string;
  private readonly apiKey: string;
  private readonly credentials: () => Promise<IndexCredentials | undefined>;

  constructor(options: RemoteIndexReaderOptions) {
    this.client = options.client;
    this.governingUrl = normalizeScopeUrl(options.governingUrl);
    this.apiKey = options.apiKey;
    this.credentials = options.credentials;
  }

  async search(query: string, params: SearchParams = {}): Promise<SearchResponse> {
    const credentials = await this.credentials();
    if (!credentials) {
      throw new CredentialsMissingError("The governing site has not shared search credentials with this site");
    }

    const body: SearchRequestPayload = { query, params };
    const response = await this.client.call<SearchResponsePayload>({
      baseUrl: this.governingUrl,
      path: ENDPOINTS.indexSearch,
      method: "POST",
      token: this.apiKey,
      headers: { [SEARCH_KEY_HEADER]: credentials.searchKey },
      body,
      schema: "search-response.schema.json",
    });
    return {
      hits: response.hits,
      totalCount: response.totalCount,
      page: response.page,
      hitsPerPage: response.hitsPerPage,
    };
  }
}

export class RemoteIndexWriter implements SearchIndexWriter {
  private readonly client: SyncClient;
  private readonly governingUrl: string;
  private readonly apiKey: string;

  constructor(options: RemoteIndexOptions) {
    this.client = options.client;
    this.governingUrl = normalizeScopeUrl(options.governingUrl);
    this.apiKey = options.apiKey;
  }

  /** Index settings belong to the governing site. */
  async applySettings(_settings: IndexSettings): Promise<void> {}

  async deleteByFilter(filter: Filter): Promise<void> {
    await this.send({ delete_filter: filter });
  }

  async upsertBatch(records: IndexRecord[]): Promise<void> {
    if (records.length === 0) return;
    await this.send({ records });
  }

  private async send(payload: IndexBatchPayload): Promise<void> {
    await this.client.call<ApiResponse>({
      baseUrl: this.governingUrl,
      path: ENDPOINTS.indexBatch,
      method: "POST",
      token: this.apiKey,
      body: payload,
    });
  }
}
