/**
 * Result reconstructor.
 *
 * Turns distinct hits back into documents.  Hits of the local site map
 * to the local content item; hits of other sites become placeholders
 * whose content is rebuilt from every chunk of the document, fetched in
 * batches of {@link CHUNK_BATCH_SIZE} documents.
 */
import type { ContentSource } from "../../shared/types/content.js";
import type { SearchHit } from "../../shared/types/records.js";
import { anyOf } from "../../shared/filter.js";
import { normalizeScopeUrl, sameScope } from "../../shared/scope.js";
import { errorMessage } from "../../shared/errors.js";
import { createConsoleLogger, type Logger } from "../../shared/logger.js";
import type { SearchIndexReader } from "../index-backend/types.js";
import { joinChunks } from "../indexing/record-builder.js";
import { extractHighlights, remoteDocumentFromHit, type SearchDocument } from "./search-document.js";

export const CHUNK_BATCH_SIZE = 20;

/** Chunk rows fetched per batch query. */
const CHUNK_PAGE_SIZE = 1000;

export interface ResultReconstructorOptions {
  reader: SearchIndexReader;
  source: ContentSource;
  /** Scope of the local site. */
  siteUrl: string;
  logger?: Logger;
}

export interface ReconstructOptions {
  /** Fetch all chunks of multi-chunk remote documents (default true). */
  reconstruct?: boolean;
}

export class ResultReconstructor {
  private readonly reader: SearchIndexReader;
  private readonly source: ContentSource;
  private readonly siteUrl: string;
  private readonly logger: Logger;

  constructor(options: ResultReconstructorOptions) {
    this.reader = options.reader;
    this.source = options.source;
    this.siteUrl = normalizeScopeUrl(options.siteUrl);
    this.logger = options.logger ?? createConsoleLogger();
  }

  async reconstruct(hits: readonly SearchHit[], options: ReconstructOptions = {}): Promise<SearchDocument[]> {
    const remote = hits.filter((h) => !sameScope(h.site_url, this.siteUrl));
    const contents =
      options.reconstruct === false
        ? new Map<string, string>()
        : await this.fetchFullContents(remote.filter((h) => h.total_chunks > 1).map((h) => h.document_id));

    const documents: SearchDocument[] = [];
    for (const hit of hits) {
      if (sameScope(hit.site_url, this.siteUrl)) {
        const item = await this.source.get(hit.post_id);
        if (!item) continue;
        documents.push({
          kind: "local",
          item,
          siteUrl: this.siteUrl,
          siteName: hit.site_name,
          highlights: extractHighlights(hit),
        });
        continue;
      }
      documents.push(remoteDocumentFromHit(hit, contents.get(hit.document_id)));
    }
    return documents;
  }

  /**
   * Full content per document id.  Documents of a failed batch, or
   * whose chunk set is incomplete, are missing from the map; callers
   * fall back to the representative hit.
   */
  private async fetchFullContents(documentIds: readonly string[]): Promise<Map<string, string>> {
    const ids = [...new Set(documentIds)];
    const contents = new Map<string, string>();

    for (let i = 0; i < ids.length; i += CHUNK_BATCH_SIZE) {
      const batch = ids.slice(i, i + CHUNK_BATCH_SIZE);
      let chunks: SearchHit[];
      try {
        const response = await this.reader.search("", {
          filter: anyOf("document_id", batch),
          hitsPerPage: CHUNK_PAGE_SIZE,
          page: 0,
          distinct: false,
        });
        chunks = response.hits;
      } catch (err: unknown) {
        this.logger.error("Failed to fetch chunks", { documents: batch, error: errorMessage(err) });
        continue;
      }

      const grouped = new Map<string, SearchHit[]>();
      for (const chunk of chunks) {
        const group = grouped.get(chunk.document_id) ?? [];
        group.push(chunk);
        grouped.set(chunk.document_id, group);
      }
      for (const [docId, group] of grouped) {
        group.sort((a, b) => a.chunk_index - b.chunk_index);
        const expected = group[0]?.total_chunks ?? 0;
        if (group.length !== expected || group.some((c, index) => c.chunk_index !== index)) {
          this.logger.warn("Incomplete chunk set", { documentId: docId, found: group.length, expected });
          continue;
        }
        contents.set(docId, joinChunks(group.map((c) => c.content)));
      }
    }
    return contents;
  }
}
