/**
 * Shared test fixtures: content items, an in-memory content source, a
 * recording logger and an in-process transport that dispatches sync
 * calls straight to route tables.
 */
import type { ContentItem, ContentSource } from "../src/shared/types/content.js";
import type { IndexRecord } from "../src/shared/types/records.js";
import { createSilentLogger, type LogContext, type Logger } from "../src/shared/logger.js";
import { documentId, normalizeScopeUrl, objectId, scopeKey } from "../src/shared/scope.js";
import { dispatch, type Route } from "../src/features/sync/http.js";
import type { Transport, TransportRequest } from "../src/features/sync/sync-client.js";

// ── Content ───────────────────────────────────────────────────────────

export function makeItem(overrides: Partial<ContentItem> & { id: number }): ContentItem {
  return {
    type: "post",
    status: "publish",
    title: `Item ${overrides.id}`,
    slug: `item-${overrides.id}`,
    excerpt: "",
    content: "",
    permalink: `https://example.test/item-${overrides.id}/`,
    sticky: false,
    dateGmt: "2024-01-01T00:00:00Z",
    modifiedGmt: "2024-01-02T00:00:00Z",
    taxonomies: {},
    ...overrides,
  };
}

export class MemoryContentSource implements ContentSource {
  readonly pageRequests: number[] = [];

  constructor(public items: ContentItem[]) {}

  async listByTypeAndStatus(
    types: readonly string[],
    statuses: readonly string[],
    page: number,
    pageSize: number,
  ): Promise<ContentItem[]> {
    this.pageRequests.push(page);
    const matching = this.items.filter((i) => types.includes(i.type) && statuses.includes(i.status));
    return matching.slice((page - 1) * pageSize, page * pageSize);
  }

  async get(id: number): Promise<ContentItem | undefined> {
    return this.items.find((i) => i.id === id);
  }
}

export interface RecordSpec {
  site: string;
  postId: number;
  chunk?: number;
  total?: number;
  type?: string;
  title?: string;
  content?: string;
  sticky?: boolean;
  /** Unix seconds. */
  date?: number;
}

/** A hand-made index record. */
export function makeRecord(spec: RecordSpec): IndexRecord {
  const site = normalizeScopeUrl(spec.site);
  const docId = documentId(site, spec.postId);
  const chunk = spec.chunk ?? 0;
  return {
    objectID: objectId(docId, chunk),
    document_id: docId,
    site_url: site,
    site_key: scopeKey(site),
    site_name: site,
    post_id: spec.postId,
    post_type: spec.type ?? "post",
    post_title: spec.title ?? `Post ${spec.postId}`,
    post_name: `post-${spec.postId}`,
    post_excerpt: "",
    permalink: `${site}post-${spec.postId}/`,
    is_sticky: spec.sticky ? 1 : 0,
    post_date_gmt: spec.date ?? 1_700_000_000,
    post_modified_gmt: spec.date ?? 1_700_000_000,
    thumbnail: null,
    taxonomies: {},
    content: spec.content ?? "",
    chunk_index: chunk,
    total_chunks: spec.total ?? 1,
  };
}

/** Words of the form `w<n>`, space separated, exactly `length` characters. */
export function wordText(length: number): string {
  let text = "";
  for (let n = 0; text.length < length; n++) {
    text += (text ? " " : "") + `w${n}`;
  }
  return text.slice(0, length).trimEnd().padEnd(length, "x");
}

// ── Logging ───────────────────────────────────────────────────────────

export interface LogEntry {
  level: "info" | "warn" | "error";
  message: string;
  context?: LogContext;
}

export function createRecordingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    info: (message, context) => entries.push({ level: "info", message, context }),
    warn: (message, context) => entries.push({ level: "warn", message, context }),
    error: (message, context) => entries.push({ level: "error", message, context }),
  };
}

// ── Transport ─────────────────────────────────────────────────────────

export interface TransportCall {
  method: string;
  url: string;
  headers: Record<string, string>;
}

export interface RouteTransport {
  transport: Transport;
  calls: TransportCall[];
  /** Sites whose calls time out. */
  down: Set<string>;
}

/**
 * Transport over in-process route tables keyed by site URL.  Calls to
 * an unknown site fail like an unreachable host; calls to a site in
 * `down` fail like a timeout.
 */
export function createRouteTransport(sites: Record<string, Route[]>, logger: Logger = createSilentLogger()): RouteTransport {
  const calls: TransportCall[] = [];
  const down = new Set<string>();
  const tables = new Map(Object.entries(sites).map(([url, routes]): [string, Route[]] => [normalizeScopeUrl(url), routes]));

  const transport: Transport = async (url: string, request: TransportRequest) => {
    calls.push({ method: request.method, url, headers: request.headers });
    const target = new URL(url);
    const base = normalizeScopeUrl(target.origin);

    if (down.has(base)) {
      const timeout = new Error("The operation was aborted due to timeout");
      timeout.name = "TimeoutError";
      throw timeout;
    }
    const routes = tables.get(base);
    if (!routes) throw new TypeError("fetch failed");

    const headers: Record<string, string | undefined> = {};
    for (const [name, value] of Object.entries(request.headers)) headers[name.toLowerCase()] = value;

    const response = await dispatch(
      routes,
      {
        method: request.method,
        path: target.pathname,
        headers,
        body: request.body === undefined ? undefined : JSON.parse(request.body),
      },
      logger,
    );
    return { status: response.status, text: async () => JSON.stringify(response.body) };
  };

  return { transport, calls, down };
}
