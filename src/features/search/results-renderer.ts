/**
 * Markdown rendering of a federated search result page.
 *
 * Compiles `tools/fedsearch/templates/results.md.hbs` with a flat view
 * model so the template stays free of local/remote branching.
 */
import { readFileSync } from "node:fs";
import { join } from "node:path";
import Handlebars from "handlebars";
import { templatesDir } from "../../shared/paths.js";
import { cleanContent } from "../indexing/content-cleaner.js";
import type { FederatedSearchResult } from "./federated-search.js";
import {
  authorLinkOf,
  authorNameOf,
  excerptOf,
  isRemote,
  permalinkOf,
  termsOf,
  titleOf,
  type SearchDocument,
} from "./search-document.js";

export interface RenderOptions {
  /** Override templates directory. */
  templateDir?: string;
  /** Taxonomies listed under each result (default `category`, `post_tag`). */
  taxonomies?: string[];
}

interface TermView {
  name: string;
  url: string;
}

interface ResultView {
  position: number;
  title: string;
  permalink: string;
  siteName: string;
  remote: boolean;
  author: string;
  authorLink: string;
  excerpt: string;
  terms: TermView[];
}

/** Register custom Handlebars helpers used by the results template. */
function registerHelpers(hbs: typeof Handlebars): void {
  /** Markdown link, or plain text without a URL. */
  hbs.registerHelper("link", (text: string, url: string): string => (url ? `[${text}](${url})` : text));

  /** Replace highlight markup with Markdown emphasis. */
  hbs.registerHelper("emphasize", (value: string): string =>
    typeof value === "string" ? value.replace(/<span class="fedsearch-highlight">(.*?)<\/span>/g, "**$1**") : "",
  );
}

function excerptFor(doc: SearchDocument): string {
  const highlighted = doc.highlights.content ?? doc.highlights.post_excerpt;
  if (highlighted) return highlighted.replace(/\s+/g, " ").trim();
  const text = excerptOf(doc) || (isRemote(doc) ? doc.data.content : cleanContent(doc.item.content));
  return text.replace(/\s+/g, " ").trim().slice(0, 300);
}

function toView(doc: SearchDocument, position: number, taxonomies: string[]): ResultView {
  return {
    position,
    title: doc.highlights.post_title ?? titleOf(doc),
    permalink: permalinkOf(doc),
    siteName: doc.siteName,
    remote: isRemote(doc),
    author: authorNameOf(doc),
    authorLink: authorLinkOf(doc),
    excerpt: excerptFor(doc),
    terms: taxonomies.flatMap((tax) => termsOf(doc, tax).map((t) => ({ name: t.name, url: t.termLink }))),
  };
}

export function renderResultsMarkdown(result: FederatedSearchResult, options: RenderOptions = {}): string {
  const hbs = Handlebars.create();
  registerHelpers(hbs);
  const source = readFileSync(join(options.templateDir ?? templatesDir(), "results.md.hbs"), "utf-8");
  const template = hbs.compile(source, { noEscape: true });

  const taxonomies = options.taxonomies ?? ["category", "post_tag"];
  const first = (result.page - 1) * result.perPage + 1;
  return template({
    query: result.query,
    totalCount: result.totalCount,
    page: result.page,
    pageCount: Math.max(1, Math.ceil(result.totalCount / result.perPage)),
    error: result.error?.message,
    results: result.documents.map((doc, i) => toView(doc, first + i, taxonomies)),
  });
}
