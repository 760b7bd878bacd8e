/**
 * Index records and the search wire types shared by every backend.
 */
import type { Filter } from "../filter.js";

// ── Records ───────────────────────────────────────────────────────────

export interface RecordThumbnail {
  url: string;
  width: number;
  height: number;
}

export interface RecordAuthorData {
  author_id: number;
  author_display_name: string;
  author_first_name: string;
  author_last_name: string;
  author_login: string;
  author_posts_url: string;
  author_avatar: string;
}

export interface RecordTerm {
  term_id: number;
  name: string;
  slug: string;
  description: string;
  parent: number;
  count: number;
  term_link: string;
}

/** Fields shared by every chunk of a document. */
export interface BaseRecordFields {
  document_id: string;
  site_url: string;
  site_key: string;
  site_name: string;
  post_id: number;
  post_type: string;
  post_title: string;
  post_name: string;
  post_excerpt: string;
  permalink: string;
  is_sticky: 0 | 1;
  /** Unix seconds. */
  post_date_gmt: number;
  post_modified_gmt: number;
  thumbnail: RecordThumbnail | null;
  post_author_data?: RecordAuthorData;
  taxonomies: Record<string, RecordTerm[]>;
}

/** One chunk of a document as stored in the index. */
export interface IndexRecord extends BaseRecordFields {
  objectID: string;
  content: string;
  chunk_index: number;
  total_chunks: number;
}

// ── Search ────────────────────────────────────────────────────────────

export interface RankingInfo {
  /** Backend-native relevance, higher is better. */
  rankingScore?: number;
  nbTypos?: number;
  words?: number;
  proximityDistance?: number;
  userScore?: number;
  geoDistance?: number;
}

export interface HighlightValue {
  value: string;
}

export interface SearchHit extends IndexRecord {
  _rankingInfo?: RankingInfo;
  _highlightResult?: Record<string, HighlightValue>;
  _snippetResult?: Record<string, HighlightValue>;
}

export interface SearchParams {
  filter?: Filter;
  /** Zero-based. */
  page?: number;
  hitsPerPage?: number;
  /** Collapse hits to one per `document_id`. */
  distinct?: boolean;
  attributesToHighlight?: string[];
  highlightPreTag?: string;
  highlightPostTag?: string;
  typoTolerance?: boolean | "min";
  minWordSizefor1Typo?: number;
  minWordSizefor2Typos?: number;
  ignorePlurals?: boolean;
  removeStopWords?: boolean;
  queryType?: "prefixAll" | "prefixLast" | "prefixNone";
  getRankingInfo?: boolean;
}

export interface SearchResponse {
  hits: SearchHit[];
  /** Number of matching documents (after distinct). */
  totalCount: number;
  page: number;
  hitsPerPage: number;
}

/** Index-wide configuration applied once per writer. */
export interface IndexSettings {
  attributeForDistinct: "document_id";
  distinct: boolean;
  searchableAttributes: string[];
  attributesForFaceting: string[];
  attributesToSnippet: string[];
  snippetEllipsisText: string;
  customRanking: string[];
}
