/**
 * Search executor.
 *
 * Runs one federated query against an index reader with the fixed
 * search parameters, then orders the hits by {@link computeScore}.
 * Failures never escape: the result is empty and carries the typed
 * error instead.
 */
import type { SearchHit, SearchParams } from "../../shared/types/records.js";
import {
  IndexUnavailableError,
  ScopeNotConfiguredError,
  toFederatedSearchError,
  type FederatedSearchError,
} from "../../shared/errors.js";
import { formatFilter } from "../../shared/filter.js";
import { createConsoleLogger, type Logger } from "../../shared/logger.js";
import type { SearchIndexReader } from "../index-backend/types.js";
import { planFilter } from "./query-planner.js";

// ── Types ─────────────────────────────────────────────────────────────

export interface SearchRequest {
  query: string;
  /** One-based page (default 1). */
  page?: number;
  perPage?: number;
  types?: readonly string[];
}

export interface ExecutedSearch {
  hits: SearchHit[];
  /** Matching documents across all pages. */
  totalCount: number;
  /** One-based. */
  page: number;
  perPage: number;
  error?: FederatedSearchError;
}

export const DEFAULT_PER_PAGE = 10;

/** Parameters sent with every federated query. */
export const SEARCH_PARAMS: SearchParams = {
  attributesToHighlight: ["post_title", "content", "post_excerpt"],
  distinct: true,
  highlightPreTag: '<span class="fedsearch-highlight">',
  highlightPostTag: "</span>",
  getRankingInfo: true,
  typoTolerance: "min",
  minWordSizefor1Typo: 3,
  minWordSizefor2Typos: 6,
  ignorePlurals: true,
  removeStopWords: true,
  queryType: "prefixAll",
};

// ── Scoring ───────────────────────────────────────────────────────────

/**
 * Relevance of a hit, higher is better: the backend's ranking score
 * when it reports one, otherwise a blend of the ranking signals.
 */
export function computeScore(hit: SearchHit): number {
  const info = hit._rankingInfo;
  if (!info) return 0;
  if (info.rankingScore !== undefined) return info.rankingScore;
  return (
    (info.userScore ?? 0) * 1e6 +
    (info.words ?? 0) * 1e3 -
    (info.nbTypos ?? 0) * 1e4 -
    (info.proximityDistance ?? 0) -
    (info.geoDistance ?? 0) / 1000
  );
}

/** Stable sort by descending score. */
export function sortHits(hits: readonly SearchHit[]): SearchHit[] {
  return hits
    .map((hit, i) => ({ hit, i, score: computeScore(hit) }))
    .sort((a, b) => b.score - a.score || a.i - b.i)
    .map(({ hit }) => hit);
}

// ── Executor ──────────────────────────────────────────────────────────

export interface SearchExecutorOptions {
  reader: SearchIndexReader;
  logger?: Logger;
}

export class SearchExecutor {
  private readonly reader: SearchIndexReader;
  private readonly logger: Logger;

  constructor(options: SearchExecutorOptions) {
    this.reader = options.reader;
    this.logger = options.logger ?? createConsoleLogger();
  }

  /** Backend parameters for a request over the given scopes. */
  buildParams(request: SearchRequest, scopes: readonly string[]): SearchParams {
    const page = Math.max(1, Math.floor(request.page ?? 1));
    return {
      ...SEARCH_PARAMS,
      filter: planFilter({ types: request.types, scopes }),
      page: page - 1,
      hitsPerPage: request.perPage ?? DEFAULT_PER_PAGE,
    };
  }

  async execute(request: SearchRequest, scopes: readonly string[]): Promise<ExecutedSearch> {
    const params = this.buildParams(request, scopes);
    const empty: ExecutedSearch = {
      hits: [],
      totalCount: 0,
      page: (params.page ?? 0) + 1,
      perPage: params.hitsPerPage ?? DEFAULT_PER_PAGE,
    };

    if (scopes.length === 0) {
      return { ...empty, error: new ScopeNotConfiguredError("Search is not enabled for this site") };
    }

    try {
      const response = await this.reader.search(request.query, params);
      return { ...empty, hits: sortHits(response.hits), totalCount: response.totalCount };
    } catch (err: unknown) {
      const error = toFederatedSearchError(err, (message, options) => new IndexUnavailableError(message, options));
      this.logger.error(`Search for "${request.query}" failed`, {
        kind: error.kind,
        error: error.message,
        filter: params.filter ? formatFilter(params.filter) : undefined,
      });
      return { ...empty, error };
    }
  }
}
