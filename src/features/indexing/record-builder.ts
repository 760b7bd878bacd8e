/**
 * Record builder.
 *
 * Turns one content item into the size-bounded chunk records stored in
 * the shared index.  Every record of a document repeats the base fields
 * (title, author, taxonomies, …) and carries one slice of the cleaned
 * content; slices after the first start with {@link CONTINUATION_MARKER}.
 *
 * Sizes are measured as UTF-8 bytes of the JSON-encoded record, so
 * characters that JSON escapes count with their escaped length.
 */
import type { ContentItem } from "../../shared/types/content.js";
import type { BaseRecordFields, IndexRecord, RecordTerm } from "../../shared/types/records.js";
import { documentId, objectId, normalizeScopeUrl, scopeKey } from "../../shared/scope.js";
import { RecordOverBudgetError } from "../../shared/errors.js";
import { createConsoleLogger, type Logger } from "../../shared/logger.js";
import { cleanContent } from "./content-cleaner.js";

// ── Constants ─────────────────────────────────────────────────────────

export const DEFAULT_RECORD_SIZE_LIMIT = 9000;

/** Prefix of every chunk after the first. */
export const CONTINUATION_MARKER = "… ";

/** Prefix used instead when a chunk had to be cut inside a word. */
const HARD_CONTINUATION_MARKER = "…";

/** Statuses indexed for every type; attachments are also `inherit`. */
export function allowedStatuses(types: readonly string[]): string[] {
  return types.includes("attachment") ? ["publish", "inherit"] : ["publish"];
}

// ── Size helpers ──────────────────────────────────────────────────────

/** UTF-8 bytes of the JSON encoding of a value. */
export function encodedSize(value: unknown): number {
  return Buffer.byteLength(JSON.stringify(value), "utf8");
}

/** Bytes a string adds inside a JSON string literal. */
function textSize(text: string): number {
  return encodedSize(text) - 2;
}

/**
 * Split text into pieces whose encoded size (marker included) stays
 * within `budget`.  Cuts at the last space that fits; a piece without
 * any space is cut on a character boundary.
 *
 * {@link joinChunks} is the exact inverse.
 */
export function splitContent(text: string, budget: number): string[] {
  if (textSize(text) <= budget) return [text];

  const chunks: string[] = [];
  let rest = text;
  let prefix = "";

  while (textSize(prefix + rest) > budget) {
    const available = budget - textSize(prefix);
    let end = 0;
    let used = 0;
    for (const ch of rest) {
      const size = textSize(ch);
      if (used + size > available) break;
      used += size;
      end += ch.length;
    }
    if (end === 0) {
      throw new RangeError(`Chunk budget of ${budget} bytes cannot hold any content`);
    }

    const space = rest.lastIndexOf(" ", end);
    if (space > 0) {
      chunks.push(prefix + rest.slice(0, space));
      rest = rest.slice(space + 1);
      prefix = CONTINUATION_MARKER;
    } else {
      chunks.push(prefix + rest.slice(0, end));
      rest = rest.slice(end);
      prefix = HARD_CONTINUATION_MARKER;
    }
  }

  chunks.push(prefix + rest);
  return chunks;
}

/** Reassemble chunk contents (in `chunk_index` order) into the original text. */
export function joinChunks(contents: readonly string[]): string {
  let text = "";
  contents.forEach((chunk, i) => {
    if (i === 0) {
      text = chunk;
    } else if (chunk.startsWith(CONTINUATION_MARKER)) {
      text += " " + chunk.slice(CONTINUATION_MARKER.length);
    } else if (chunk.startsWith(HARD_CONTINUATION_MARKER)) {
      text += chunk.slice(HARD_CONTINUATION_MARKER.length);
    } else {
      text += " " + chunk;
    }
  });
  return text;
}

/** Unix seconds of an ISO timestamp (0 when unparsable). */
function unixSeconds(iso: string): number {
  const ms = Date.parse(iso);
  return Number.isNaN(ms) ? 0 : Math.floor(ms / 1000);
}

// ── Builder ───────────────────────────────────────────────────────────

export interface RecordBuilderOptions {
  /** Scope URL of the site owning the content. */
  siteUrl: string;
  siteName: string;
  recordSizeLimit?: number;
  logger?: Logger;
}

export class RecordBuilder {
  readonly siteUrl: string;
  readonly siteName: string;
  readonly recordSizeLimit: number;
  private readonly logger: Logger;

  constructor(options: RecordBuilderOptions) {
    this.siteUrl = normalizeScopeUrl(options.siteUrl);
    this.siteName = options.siteName;
    this.recordSizeLimit = options.recordSizeLimit ?? DEFAULT_RECORD_SIZE_LIMIT;
    this.logger = options.logger ?? createConsoleLogger();
  }

  /** Fields repeated on every chunk of the item. */
  baseFields(item: ContentItem): BaseRecordFields {
    const taxonomies: Record<string, RecordTerm[]> = {};
    for (const [taxonomy, terms] of Object.entries(item.taxonomies)) {
      taxonomies[taxonomy] = terms.map((t) => ({
        term_id: t.termId,
        name: t.name,
        slug: t.slug,
        description: t.description,
        parent: t.parent,
        count: t.count,
        term_link: t.termLink,
      }));
    }

    const fields: BaseRecordFields = {
      document_id: documentId(this.siteUrl, item.id),
      site_url: this.siteUrl,
      site_key: scopeKey(this.siteUrl),
      site_name: this.siteName,
      post_id: item.id,
      post_type: item.type,
      post_title: item.title,
      post_name: item.slug,
      post_excerpt: item.excerpt,
      permalink: item.permalink,
      is_sticky: item.sticky ? 1 : 0,
      post_date_gmt: unixSeconds(item.dateGmt),
      post_modified_gmt: unixSeconds(item.modifiedGmt),
      thumbnail: item.thumbnail ? { ...item.thumbnail } : null,
      taxonomies,
    };

    if (item.author) {
      fields.post_author_data = {
        author_id: item.author.id,
        author_display_name: item.author.displayName,
        author_first_name: item.author.firstName,
        author_last_name: item.author.lastName,
        author_login: item.author.login,
        author_posts_url: item.author.postsUrl,
        author_avatar: item.author.avatarUrl,
      };
    }
    return fields;
  }

  /**
   * Bytes left for content once the base and chunk fields are encoded.
   * Chunk numbers are sized for up to six digits.
   */
  contentBudget(base: BaseRecordFields): number {
    const envelope: IndexRecord = {
      ...base,
      objectID: objectId(base.document_id, 999_999),
      content: "",
      chunk_index: 999_999,
      total_chunks: 999_999,
    };
    return this.recordSizeLimit - encodedSize(envelope);
  }

  /**
   * Build the chunk records of an item.  Returns `[]` (and logs a
   * {@link RecordOverBudgetError}) when the base fields alone exceed the
   * size limit.
   */
  buildRecords(item: ContentItem): IndexRecord[] {
    const base = this.baseFields(item);
    const budget = this.contentBudget(base);
    // Room for the marker plus at least one escaped character.
    if (budget <= textSize(CONTINUATION_MARKER) + 6) {
      const error = new RecordOverBudgetError(
        `Fixed fields of ${base.document_id} leave no room for content within ${this.recordSizeLimit} bytes`,
        base.document_id,
        this.recordSizeLimit - budget,
      );
      this.logger.warn(error.message, { kind: error.kind, documentId: error.documentId, overhead: error.overheadBytes });
      return [];
    }

    const chunks = splitContent(cleanContent(item.content), budget);
    return chunks.map((content, chunkIndex) => ({
      ...base,
      objectID: objectId(base.document_id, chunkIndex),
      content,
      chunk_index: chunkIndex,
      total_chunks: chunks.length,
    }));
  }
}
