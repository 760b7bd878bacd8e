/**
 * Sync protocol between the governing site and brand sites.
 *
 * JSON over HTTP.  Every request carries {@link TOKEN_HEADER}: a brand's
 * shared key (brand → governing and governing → brand) or the governing
 * admin key.  Every response is an {@link ApiResponse} envelope.
 */
import type { Filter } from "../../shared/filter.js";
import type { IndexRecord, SearchParams, SearchResponse } from "../../shared/types/records.js";
import type { ScopeResult } from "../../shared/errors.js";
import type { SearchScopeConfig } from "../search/query-planner.js";

export const TOKEN_HEADER = "x-fedsearch-token";

/** Search key a brand presents when reading the shared index. */
export const SEARCH_KEY_HEADER = "x-fedsearch-search-key";

export const ENDPOINTS = {
  health: "/health",
  brandConfig: "/brand-config",
  indexableEntities: "/indexable-entities",
  searchSettings: "/search-settings",
  searchableSites: "/searchable-sites",
  sharedSites: "/shared-sites",
  credentials: "/credentials",
  reindex: "/re-index",
  reindexPost: "/reindex-post",
  indexBatch: "/index/batch",
  indexSearch: "/index/search",
} as const;

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface ApiResponse {
  success: boolean;
  message?: string;
}

// ── Brand configuration ───────────────────────────────────────────────

export interface IndexCredentials {
  indexName: string;
  searchKey: string;
}

/** Configuration a brand receives from the governing site. */
export interface BrandConfig {
  credentials?: IndexCredentials;
  searchScope: SearchScopeConfig;
  indexableTypes: string[];
  /** Every scope taking part in federated search. */
  availableScopes: string[];
}

/** Wire form of {@link BrandConfig}. */
export interface BrandConfigWire {
  credentials: { index_name: string; search_key: string } | null;
  search_scope: { enabled: boolean; searchable_scopes: string[] };
  indexable_types: string[];
  available_scopes: string[];
}

export const DISABLED_BRAND_CONFIG: BrandConfig = Object.freeze({
  credentials: undefined,
  searchScope: { enabled: false, searchableScopes: [] },
  indexableTypes: [],
  availableScopes: [],
});

export function brandConfigFromWire(wire: BrandConfigWire): BrandConfig {
  return {
    credentials: wire.credentials
      ? { indexName: wire.credentials.index_name, searchKey: wire.credentials.search_key }
      : undefined,
    searchScope: {
      enabled: wire.search_scope.enabled,
      searchableScopes: [...wire.search_scope.searchable_scopes],
    },
    indexableTypes: [...wire.indexable_types],
    availableScopes: [...wire.available_scopes],
  };
}

// ── Index access ──────────────────────────────────────────────────────

/** `POST /index/batch`: scoped writes of a brand. */
export interface IndexBatchPayload {
  delete_filter?: Filter;
  records?: IndexRecord[];
}

/** `POST /index/search`. */
export interface SearchRequestPayload {
  query: string;
  params: SearchParams;
}

export interface SearchResponsePayload extends ApiResponse, SearchResponse {}

// ── Fan-out ───────────────────────────────────────────────────────────

export interface ReindexResponse extends ApiResponse {
  results?: Record<string, ScopeResult>;
}
