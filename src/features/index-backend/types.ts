/**
 * Search index backend contracts.
 *
 * The governing site owns the one shared index ({@link SearchIndexBackend}).
 * Brands only ever see a reader and a scoped writer that proxy to the
 * governing site.
 */
import type { Filter } from "../../shared/filter.js";
import type { IndexRecord, IndexSettings, SearchParams, SearchResponse } from "../../shared/types/records.js";

export interface SearchIndexReader {
  search(query: string, params?: SearchParams): Promise<SearchResponse>;
}

export interface SearchIndexWriter {
  applySettings(settings: IndexSettings): Promise<void>;
  deleteByFilter(filter: Filter): Promise<void>;
  upsertBatch(records: IndexRecord[]): Promise<void>;
}

export interface SearchIndexBackend extends SearchIndexReader, SearchIndexWriter {
  /** Remove every record. */
  clear(): Promise<void>;
}

/** Settings every writer applies before its first write. */
export const DEFAULT_INDEX_SETTINGS: IndexSettings = {
  attributeForDistinct: "document_id",
  distinct: true,
  searchableAttributes: ["post_title", "content", "post_excerpt", "post_author_data.author_display_name"],
  attributesForFaceting: ["site_url", "post_type", "document_id", "taxonomies"],
  attributesToSnippet: ["post_title:20", "content:40"],
  snippetEllipsisText: "…",
  customRanking: ["desc(is_sticky)", "desc(post_date_gmt)", "asc(chunk_index)"],
};
