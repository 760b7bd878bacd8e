/**
 * Search result documents.
 *
 * A result is either a content item of the local site or a placeholder
 * for a document owned by another site.  Placeholders get negative ids
 * (`−1 − post_id`, authors `−1000 − author_id`) so they never collide
 * with local ids, and carry the display data the record had.
 *
 * The `*Of` helpers resolve display fields for either variant.
 */
import type { ContentItem, TaxonomyTerm } from "../../shared/types/content.js";
import type { RecordTerm, SearchHit } from "../../shared/types/records.js";

// ── Types ─────────────────────────────────────────────────────────────

export interface RemoteAuthor {
  /** Negative placeholder id. */
  id: number;
  originalId: number;
  displayName: string;
  postsUrl: string;
  avatarUrl: string;
}

export interface RemoteDocumentData {
  /** Negative placeholder id. */
  id: number;
  /** Id on the owning site. */
  originalId: number;
  documentId: string;
  type: string;
  status: "publish";
  title: string;
  slug: string;
  excerpt: string;
  content: string;
  permalink: string;
  /** ISO-8601. */
  dateGmt: string;
  modifiedGmt: string;
  author?: RemoteAuthor;
  taxonomies: Record<string, RecordTerm[]>;
  thumbnail: { url: string; width: number; height: number } | null;
  siteUrl: string;
  siteName: string;
}

interface DocumentBase {
  /** Highlighted field values keyed by attribute. */
  highlights: Record<string, string>;
  siteUrl: string;
  siteName: string;
}

export interface LocalDocument extends DocumentBase {
  kind: "local";
  item: ContentItem;
}

export interface RemoteDocument extends DocumentBase {
  kind: "remote";
  data: RemoteDocumentData;
}

export type SearchDocument = LocalDocument | RemoteDocument;

// ── Ids ───────────────────────────────────────────────────────────────

export function remotePostId(postId: number): number {
  return -1 - Math.abs(postId);
}

export function remoteAuthorId(authorId: number): number {
  return -1000 - Math.abs(authorId);
}

/** Id on the owning site of a placeholder id. */
export function originalPostId(placeholderId: number): number {
  return -placeholderId - 1;
}

// ── Construction ──────────────────────────────────────────────────────

/** Highlight values of a hit; snippets fill attributes without a highlight. */
export function extractHighlights(hit: SearchHit): Record<string, string> {
  const highlights: Record<string, string> = {};
  for (const [field, entry] of Object.entries(hit._highlightResult ?? {})) {
    highlights[field] = entry.value;
  }
  for (const [field, entry] of Object.entries(hit._snippetResult ?? {})) {
    if (!highlights[field]) highlights[field] = entry.value;
  }
  return highlights;
}

const isoFromUnix = (seconds: number) => new Date(seconds * 1000).toISOString();

/** Placeholder document for a hit of another site (content as given). */
export function remoteDocumentFromHit(hit: SearchHit, content: string = hit.content): RemoteDocument {
  const author = hit.post_author_data;
  return {
    kind: "remote",
    siteUrl: hit.site_url,
    siteName: hit.site_name,
    highlights: extractHighlights(hit),
    data: {
      id: remotePostId(hit.post_id),
      originalId: hit.post_id,
      documentId: hit.document_id,
      type: hit.post_type,
      status: "publish",
      title: hit.post_title,
      slug: hit.post_name,
      excerpt: hit.post_excerpt,
      content,
      permalink: hit.permalink,
      dateGmt: isoFromUnix(hit.post_date_gmt),
      modifiedGmt: isoFromUnix(hit.post_modified_gmt),
      author: author
        ? {
            id: remoteAuthorId(author.author_id),
            originalId: author.author_id,
            displayName: author.author_display_name,
            postsUrl: author.author_posts_url,
            avatarUrl: author.author_avatar,
          }
        : undefined,
      taxonomies: hit.taxonomies,
      thumbnail: hit.thumbnail,
      siteUrl: hit.site_url,
      siteName: hit.site_name,
    },
  };
}

// ── Display helpers ───────────────────────────────────────────────────

export function isRemote(doc: SearchDocument): doc is RemoteDocument {
  return doc.kind === "remote";
}

export function titleOf(doc: SearchDocument): string {
  return isRemote(doc) ? doc.data.title : doc.item.title;
}

export function excerptOf(doc: SearchDocument): string {
  return isRemote(doc) ? doc.data.excerpt : doc.item.excerpt;
}

export function permalinkOf(doc: SearchDocument): string {
  return isRemote(doc) ? doc.data.permalink : doc.item.permalink;
}

export function authorNameOf(doc: SearchDocument): string {
  return (isRemote(doc) ? doc.data.author?.displayName : doc.item.author?.displayName) ?? "";
}

export function authorLinkOf(doc: SearchDocument): string {
  return (isRemote(doc) ? doc.data.author?.postsUrl : doc.item.author?.postsUrl) ?? "";
}

/** Terms of one taxonomy, in content-item form. */
export function termsOf(doc: SearchDocument, taxonomy: string): TaxonomyTerm[] {
  if (!isRemote(doc)) return doc.item.taxonomies[taxonomy] ?? [];
  return (doc.data.taxonomies[taxonomy] ?? []).map((t) => ({
    termId: t.term_id,
    name: t.name,
    slug: t.slug,
    description: t.description,
    parent: t.parent,
    count: t.count,
    termLink: t.term_link,
  }));
}

/** Link of a term given by id or slug, if the document has it. */
export function termLinkOf(doc: SearchDocument, taxonomy: string, term: number | string): string | undefined {
  const match = termsOf(doc, taxonomy).find((t) => (typeof term === "number" ? t.termId === term : t.slug === term));
  return match?.termLink || undefined;
}
