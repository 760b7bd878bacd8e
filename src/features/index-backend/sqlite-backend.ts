/**
 * SQLite FTS5 search index.
 *
 * The governing site's shared index.  Every chunk record is stored as a
 * JSON body in `records` next to the columns filters and ranking need,
 * and its searchable text goes into the `records_fts` virtual table
 * (porter stemming, so plural and singular forms match).
 *
 * Ranking: bm25 relevance first, then the custom ranking
 * (`is_sticky` desc, `post_date_gmt` desc, `chunk_index` asc).  Distinct
 * collapses hits to the best chunk per `document_id` before paging, and
 * `totalCount` counts documents, not chunks.  Only the first
 * `maxCandidates` ranked chunk rows are read into hits; `totalCount` is
 * counted in SQL over every match.
 *
 * Typo tolerance is not available in FTS5; the parameters are accepted
 * and ignored.
 */
import { readFileSync } from "node:fs";
import { join } from "node:path";
import type { Filter, FilterField, FilterValue } from "../../shared/filter.js";
import type {
  HighlightValue,
  IndexRecord,
  IndexSettings,
  SearchHit,
  SearchParams,
  SearchResponse,
} from "../../shared/types/records.js";
import { openDatabase, type SqliteDatabase } from "../../shared/sqlite.js";
import { dataDir } from "../../shared/paths.js";
import { schemaRegistry, type SchemaRegistry } from "../../shared/schema.js";
import { IndexUnavailableError } from "../../shared/errors.js";
import { DEFAULT_INDEX_SETTINGS, type SearchIndexBackend } from "./types.js";

// ── Types ─────────────────────────────────────────────────────────────

export interface SqliteIndexOptions {
  /** Database file, or `:memory:`. */
  path: string;
  /** Words dropped from multi-word queries when `removeStopWords` is set. */
  stopWords?: readonly string[];
  registry?: SchemaRegistry;
  /** Ranked chunk rows read per search (default 5000). */
  maxCandidates?: number;
}

/** Row returned by the search statements. */
interface HitRow {
  body: string;
  score: number;
  [column: string]: string | number | null;
}

/** FTS5 column positions (column 0 is the unindexed object id). */
const FTS_COLUMNS = {
  post_title: 1,
  content: 2,
  post_excerpt: 3,
} as const;

type TextAttribute = keyof typeof FTS_COLUMNS;

const FILTER_COLUMNS: Record<FilterField, string> = {
  site_url: "site_url",
  post_type: "post_type",
  document_id: "document_id",
  post_id: "post_id",
};

const MAX_CANDIDATES = 5000;

const DEFAULT_HITS_PER_PAGE = 20;

// ── Helpers ───────────────────────────────────────────────────────────

function isTextAttribute(name: string): name is TextAttribute {
  return Object.hasOwn(FTS_COLUMNS, name);
}

/** English stop words shipped in `tools/fedsearch/data/stop-words.json`. */
export function loadStopWords(): string[] {
  const data: unknown = JSON.parse(readFileSync(join(dataDir(), "stop-words.json"), "utf-8"));
  if (typeof data !== "object" || data === null || !("words" in data) || !Array.isArray(data.words)) {
    return [];
  }
  return data.words.filter((w): w is string => typeof w === "string");
}

/**
 * Render a filter as an SQL condition with named parameters.
 *
 * @param prefix  Table alias prepended to column names (e.g. `"r."`).
 */
export function filterToSql(
  filter: Filter | undefined,
  prefix = "",
): { sql: string; params: Record<string, FilterValue> } {
  const params: Record<string, FilterValue> = {};
  let counter = 0;
  const bind = (value: FilterValue) => {
    const name = `f${counter++}`;
    params[name] = value;
    return `@${name}`;
  };

  const render = (f: Filter): string => {
    switch (f.op) {
      case "eq":
        return `${prefix}${FILTER_COLUMNS[f.field]} = ${bind(f.value)}`;
      case "in":
        if (f.values.length === 0) return "0";
        return `${prefix}${FILTER_COLUMNS[f.field]} IN (${f.values.map(bind).join(", ")})`;
      case "and":
        return f.filters.map((c) => `(${render(c)})`).join(" AND ");
      case "or":
        return f.filters.map((c) => `(${render(c)})`).join(" OR ");
    }
  };

  return { sql: filter ? render(filter) : "1", params };
}

/**
 * Turn a user query into an FTS5 MATCH expression, or `undefined` when
 * the query has no searchable tokens (match everything).
 */
export function buildMatchExpression(
  query: string,
  params: Pick<SearchParams, "removeStopWords" | "queryType">,
  stopWords: ReadonlySet<string>,
): string | undefined {
  const tokens = query.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? [];
  if (tokens.length === 0) return undefined;

  let terms: string[] = tokens;
  if (params.removeStopWords) {
    const kept = tokens.filter((t) => !stopWords.has(t));
    if (kept.length > 0) terms = kept;
  }

  const queryType = params.queryType ?? "prefixLast";
  return terms
    .map((term, i) => {
      const prefix = queryType === "prefixAll" || (queryType === "prefixLast" && i === terms.length - 1);
      return prefix ? `"${term}"*` : `"${term}"`;
    })
    .join(" ");
}

/** Statement arguments for a named-parameter object (none when empty). */
function bindArgs(params: Record<string, FilterValue>): [Record<string, FilterValue>] | [] {
  return Object.keys(params).length > 0 ? [params] : [];
}

/** Parse `"content:40"` into attribute and token count. */
function parseSnippetAttribute(spec: string): { attribute: TextAttribute; tokens: number } | undefined {
  const [name, size] = spec.split(":");
  if (!name || !isTextAttribute(name)) return undefined;
  const tokens = Math.min(64, Math.max(1, parseInt(size ?? "10", 10) || 10));
  return { attribute: name, tokens };
}

// ── Backend ───────────────────────────────────────────────────────────

export class SqliteIndexBackend implements SearchIndexBackend {
  private readonly db: SqliteDatabase;
  private readonly stopWords: ReadonlySet<string>;
  private readonly registry: SchemaRegistry;
  private readonly maxCandidates: number;
  private settings: IndexSettings = DEFAULT_INDEX_SETTINGS;

  constructor(options: SqliteIndexOptions) {
    this.db = openDatabase(options.path);
    this.stopWords = new Set(options.stopWords ?? loadStopWords());
    this.registry = options.registry ?? schemaRegistry();
    this.maxCandidates = Math.max(1, options.maxCandidates ?? MAX_CANDIDATES);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS records (
        object_id     TEXT PRIMARY KEY,
        document_id   TEXT NOT NULL,
        site_url      TEXT NOT NULL,
        post_type     TEXT NOT NULL,
        post_id       INTEGER NOT NULL,
        chunk_index   INTEGER NOT NULL,
        is_sticky     INTEGER NOT NULL,
        post_date_gmt INTEGER NOT NULL,
        body          TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS records_document ON records (document_id);
      CREATE INDEX IF NOT EXISTS records_site ON records (site_url);
      CREATE VIRTUAL TABLE IF NOT EXISTS records_fts USING fts5(
        object_id UNINDEXED,
        post_title,
        content,
        post_excerpt,
        author,
        tokenize='porter unicode61'
      );
      CREATE TABLE IF NOT EXISTS index_meta (
        key   TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `);

    const stored = this.db.prepare("SELECT value FROM index_meta WHERE key = 'settings'").get() as
      | { value: string }
      | undefined;
    if (stored) {
      const parsed: unknown = JSON.parse(stored.value);
      const check = this.registry.check<IndexSettings>("index-settings.schema.json", parsed);
      if (check.ok) this.settings = check.value;
    }
  }

  // ── Writes ──────────────────────────────────────────────────────────

  async applySettings(settings: IndexSettings): Promise<void> {
    this.guard("apply settings", () => {
      this.db
        .prepare(
          `INSERT INTO index_meta (key, value) VALUES ('settings', ?)
           ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
        )
        .run(JSON.stringify(settings));
    });
    this.settings = settings;
  }

  async deleteByFilter(filter: Filter): Promise<void> {
    const { sql, params } = filterToSql(filter);
    this.guard("delete records", () => {
      this.db.transaction(() => {
        this.db
          .prepare(`DELETE FROM records_fts WHERE object_id IN (SELECT object_id FROM records WHERE ${sql})`)
          .run(...bindArgs(params));
        this.db.prepare(`DELETE FROM records WHERE ${sql}`).run(...bindArgs(params));
      })();
    });
  }

  async upsertBatch(records: IndexRecord[]): Promise<void> {
    if (records.length === 0) return;

    const removeText = this.db.prepare("DELETE FROM records_fts WHERE object_id = ?");
    const upsert = this.db.prepare(`
      INSERT OR REPLACE INTO records
        (object_id, document_id, site_url, post_type, post_id, chunk_index, is_sticky, post_date_gmt, body)
      VALUES
        (@object_id, @document_id, @site_url, @post_type, @post_id, @chunk_index, @is_sticky, @post_date_gmt, @body)
    `);
    const insertText = this.db.prepare(`
      INSERT INTO records_fts (object_id, post_title, content, post_excerpt, author)
      VALUES (@object_id, @post_title, @content, @post_excerpt, @author)
    `);

    this.guard("write records", () => {
      this.db.transaction((batch: IndexRecord[]) => {
        for (const record of batch) {
          removeText.run(record.objectID);
          upsert.run({
            object_id: record.objectID,
            document_id: record.document_id,
            site_url: record.site_url,
            post_type: record.post_type,
            post_id: record.post_id,
            chunk_index: record.chunk_index,
            is_sticky: record.is_sticky,
            post_date_gmt: record.post_date_gmt,
            body: JSON.stringify(record),
          });
          insertText.run({
            object_id: record.objectID,
            post_title: record.post_title,
            content: record.content,
            post_excerpt: record.post_excerpt,
            author: record.post_author_data?.author_display_name ?? "",
          });
        }
      })(records);
    });
  }

  async clear(): Promise<void> {
    this.guard("clear index", () => {
      this.db.exec("DELETE FROM records_fts; DELETE FROM records;");
    });
  }

  // ── Reads ───────────────────────────────────────────────────────────

  async search(query: string, params: SearchParams = {}): Promise<SearchResponse> {
    const hitsPerPage = params.hitsPerPage ?? DEFAULT_HITS_PER_PAGE;
    const page = Math.max(0, params.page ?? 0);
    const distinct = params.distinct ?? this.settings.distinct;
    const match = buildMatchExpression(query, params, this.stopWords);
    const rows = this.guard("search", () => this.queryRows(match, params));
    const totalCount = this.guard("search", () => this.countMatches(match, params, distinct));

    const hits: SearchHit[] = [];
    const seen = new Set<string>();
    const terms = match ? match.replace(/["*]/g, "").split(" ") : [];

    for (const row of rows) {
      const record = this.parseBody(row.body);
      if (distinct) {
        if (seen.has(record.document_id)) continue;
        seen.add(record.document_id);
      }
      hits.push(this.toHit(record, row, match !== undefined, params, terms));
    }

    return {
      hits: hits.slice(page * hitsPerPage, (page + 1) * hitsPerPage),
      totalCount,
      page,
      hitsPerPage,
    };
  }

  /** Number of stored chunk records, optionally restricted by a filter. */
  count(filter?: Filter): number {
    const { sql, params } = filterToSql(filter);
    const row = this.db.prepare(`SELECT COUNT(*) AS n FROM records WHERE ${sql}`).get(...bindArgs(params)) as { n: number };
    return row.n;
  }

  close(): void {
    this.db.close();
  }

  // ── Internals ───────────────────────────────────────────────────────

  private queryRows(match: string | undefined, params: SearchParams): HitRow[] {
    const filter = filterToSql(params.filter, "r.");
    const order = "r.is_sticky DESC, r.post_date_gmt DESC, r.chunk_index ASC";

    if (match === undefined) {
      return this.db
        .prepare(
          `SELECT r.body AS body, 0 AS score FROM records r
           WHERE ${filter.sql} ORDER BY ${order} LIMIT ${this.maxCandidates}`,
        )
        .all(...bindArgs(filter.params)) as HitRow[];
    }

    const highlightAttrs = (params.attributesToHighlight ?? Object.keys(FTS_COLUMNS)).filter(isTextAttribute);
    const snippetAttrs = this.settings.attributesToSnippet
      .map(parseSnippetAttribute)
      .filter((s): s is NonNullable<typeof s> => s !== undefined);

    const columns = [
      ...highlightAttrs.map((a) => `highlight(records_fts, ${FTS_COLUMNS[a]}, @pre, @post) AS hl_${a}`),
      ...snippetAttrs.map(
        (s) => `snippet(records_fts, ${FTS_COLUMNS[s.attribute]}, @pre, @post, @ellipsis, ${s.tokens}) AS sn_${s.attribute}`,
      ),
    ];

    return this.db
      .prepare(
        `SELECT r.body AS body, bm25(records_fts, 0.0, 10.0, 1.0, 2.0, 1.0) AS score
                ${columns.map((c) => `, ${c}`).join("")}
         FROM records_fts JOIN records r ON r.object_id = records_fts.object_id
         WHERE records_fts MATCH @match AND (${filter.sql})
         ORDER BY score ASC, ${order}
         LIMIT ${this.maxCandidates}`,
      )
      .all({
        ...filter.params,
        match,
        pre: params.highlightPreTag ?? "<em>",
        post: params.highlightPostTag ?? "</em>",
        ellipsis: this.settings.snippetEllipsisText,
      }) as HitRow[];
  }

  /** Matching documents (or chunks without distinct), uncapped. */
  private countMatches(match: string | undefined, params: SearchParams, distinct: boolean): number {
    const filter = filterToSql(params.filter, "r.");
    const counted = distinct ? "COUNT(DISTINCT r.document_id)" : "COUNT(*)";

    const row =
      match === undefined
        ? this.db.prepare(`SELECT ${counted} AS n FROM records r WHERE ${filter.sql}`).get(...bindArgs(filter.params))
        : this.db
            .prepare(
              `SELECT ${counted} AS n
               FROM records_fts JOIN records r ON r.object_id = records_fts.object_id
               WHERE records_fts MATCH @match AND (${filter.sql})`,
            )
            .get({ ...filter.params, match });
    return (row as { n: number }).n;
  }

  private toHit(
    record: IndexRecord,
    row: HitRow,
    matched: boolean,
    params: SearchParams,
    terms: string[],
  ): SearchHit {
    const hit: SearchHit = { ...record };
    if (!matched) return hit;

    const highlights: Record<string, HighlightValue> = {};
    const snippets: Record<string, HighlightValue> = {};
    for (const attribute of Object.keys(FTS_COLUMNS)) {
      const hl = row[`hl_${attribute}`];
      if (typeof hl === "string") highlights[attribute] = { value: hl };
      const sn = row[`sn_${attribute}`];
      if (typeof sn === "string") snippets[attribute] = { value: sn };
    }
    if (Object.keys(highlights).length > 0) hit._highlightResult = highlights;
    if (Object.keys(snippets).length > 0) hit._snippetResult = snippets;

    if (params.getRankingInfo) {
      const text = `${record.post_title} ${record.content} ${record.post_excerpt}`.toLowerCase();
      hit._rankingInfo = {
        rankingScore: -row.score,
        words: terms.filter((t) => text.includes(t)).length,
        nbTypos: 0,
        proximityDistance: 0,
        userScore: 0,
      };
    }
    return hit;
  }

  private parseBody(body: string): IndexRecord {
    const check = this.registry.check<IndexRecord>("record.schema.json", JSON.parse(body));
    if (!check.ok) {
      throw new IndexUnavailableError(`Corrupt index record: ${check.errors.join("; ")}`);
    }
    return check.value;
  }

  /** Run a database operation, converting driver errors. */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err: unknown) {
      if (err instanceof IndexUnavailableError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new IndexUnavailableError(`Search index failed to ${operation}: ${message}`, { cause: err });
    }
  }
}
