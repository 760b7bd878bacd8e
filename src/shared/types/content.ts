/**
 * Content items as exposed by a site's content source.
 */

export interface TaxonomyTerm {
  termId: number;
  name: string;
  slug: string;
  description: string;
  parent: number;
  count: number;
  termLink: string;
}

export interface ContentAuthor {
  id: number;
  displayName: string;
  firstName: string;
  lastName: string;
  login: string;
  postsUrl: string;
  avatarUrl: string;
}

export interface ContentThumbnail {
  url: string;
  width: number;
  height: number;
}

export interface ContentItem {
  /** Positive id, unique within the owning site. */
  id: number;
  type: string;
  status: string;
  title: string;
  slug: string;
  excerpt: string;
  /** Raw HTML body. */
  content: string;
  permalink: string;
  sticky: boolean;
  /** ISO-8601 timestamps. */
  dateGmt: string;
  modifiedGmt: string;
  author?: ContentAuthor;
  thumbnail?: ContentThumbnail;
  taxonomies: Record<string, TaxonomyTerm[]>;
}

/** Read access to a site's content. */
export interface ContentSource {
  /** One page (1-based) of items matching any of the types and statuses. */
  listByTypeAndStatus(
    types: readonly string[],
    statuses: readonly string[],
    page: number,
    pageSize: number,
  ): Promise<ContentItem[]>;
  get(id: number): Promise<ContentItem | undefined>;
}
