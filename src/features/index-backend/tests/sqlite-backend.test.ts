/**
 * Tests for the SQLite FTS5 index backend.
 */
import { mkdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { and, anyOf, eq } from "../../../shared/filter.js";
import { documentId } from "../../../shared/scope.js";
import { IndexUnavailableError } from "../../../shared/errors.js";
import { SqliteIndexBackend, buildMatchExpression, filterToSql } from "../sqlite-backend.js";
import { DEFAULT_INDEX_SETTINGS } from "../types.js";
import { makeRecord } from "../../../../test/fixtures.js";

const TMP = join(tmpdir(), `fedsearch-index-test-${Date.now()}`);
const SITE_A = "https://a.test/";
const SITE_B = "https://b.test/";
const DOC_A1 = documentId(SITE_A, 1);
const DOC_A2 = documentId(SITE_A, 2);
const DOC_B3 = documentId(SITE_B, 3);

let passed = 0;
let failed = 0;

function assert(label: string, condition: boolean, detail?: string) {
  if (condition) {
    console.log(`  OK: ${label}`);
    passed++;
  } else {
    console.error(`FAIL: ${label}${detail ? ` — ${detail}` : ""}`);
    failed++;
  }
}

const RECORDS = [
  makeRecord({ site: SITE_A, postId: 1, chunk: 0, total: 2, title: "Garden tools", content: "Spades and rakes for the garden" }),
  makeRecord({ site: SITE_A, postId: 1, chunk: 1, total: 2, title: "Garden tools", content: "more garden advice" }),
  makeRecord({ site: SITE_A, postId: 2, title: "Kitchen", content: "pots and pans", sticky: true, date: 1_600_000_000 }),
  makeRecord({ site: SITE_B, postId: 3, title: "Notes", content: "a small garden path", date: 1_800_000_000 }),
];

mkdirSync(TMP, { recursive: true });

try {
  console.log("\n=== Filter SQL ===");
  {
    const { sql, params } = filterToSql(and(eq("site_url", SITE_A), anyOf("post_id", [1, 2])), "r.");
    assert("renders nested conditions", sql === "(r.site_url = @f0) AND (r.post_id IN (@f1, @f2))", sql);
    assert("binds values by name", JSON.stringify(params) === `{"f0":"${SITE_A}","f1":1,"f2":2}`);
    assert("no filter matches everything", filterToSql(undefined).sql === "1");
    assert("an empty list matches nothing", filterToSql(anyOf("document_id", [])).sql === "0");
  }

  console.log("\n=== Match expressions ===");
  {
    const stop = new Set(["the", "and"]);
    assert(
      "drops stop words and prefixes the last term",
      buildMatchExpression("The Quick fox", { removeStopWords: true }, stop) === '"quick" "fox"*',
    );
    assert(
      "keeps a query made only of stop words",
      buildMatchExpression("the", { removeStopWords: true }, stop) === '"the"*',
    );
    assert(
      "prefixAll prefixes every term",
      buildMatchExpression("quick fox", { queryType: "prefixAll" }, stop) === '"quick"* "fox"*',
    );
    assert(
      "prefixNone prefixes nothing",
      buildMatchExpression("quick fox", { queryType: "prefixNone" }, stop) === '"quick" "fox"',
    );
    assert("punctuation only means no match expression", buildMatchExpression("?!", {}, stop) === undefined);
  }

  const index = new SqliteIndexBackend({ path: ":memory:", stopWords: ["the", "and"] });
  await index.upsertBatch(RECORDS);

  console.log("\n=== Writes ===");
  {
    assert("stores every chunk", index.count() === 4);
    assert("counts by filter", index.count(eq("site_url", SITE_B)) === 1);

    await index.upsertBatch([makeRecord({ site: SITE_B, postId: 3, title: "Notes", content: "a small garden path", date: 1_800_000_000 })]);
    assert("re-writing an object id replaces it", index.count() === 4);
  }

  console.log("\n=== Search ===");
  {
    const all = await index.search("");
    assert(
      "an empty query orders by sticky, date, then chunk",
      all.hits.map((h) => h.document_id).join(",") === [DOC_A2, DOC_B3, DOC_A1].join(","),
      all.hits.map((h) => h.document_id).join(","),
    );
    assert("an empty query carries no highlights", all.hits.every((h) => h._highlightResult === undefined));
    assert("distinct is the default", all.totalCount === 3);

    const garden = await index.search("garden");
    assert("one hit per document", garden.hits.length === 2 && new Set(garden.hits.map((h) => h.document_id)).size === 2);
    assert("totalCount counts documents", garden.totalCount === 2);
    assert("a title match ranks first", garden.hits[0]?.document_id === DOC_A1, garden.hits[0]?.document_id);

    const chunks = await index.search("garden", { distinct: false });
    assert("distinct: false returns every chunk", chunks.hits.length === 3);

    const scoped = await index.search("garden", { filter: eq("site_url", SITE_B) });
    assert("filters restrict hits", scoped.hits.length === 1 && scoped.hits[0]?.document_id === DOC_B3);

    const plural = await index.search("gardens");
    assert("plural queries match the singular", plural.totalCount === 2);

    const paged = await index.search("garden", { hitsPerPage: 1, page: 1 });
    assert("pages are zero-based", paged.hits.length === 1 && paged.hits[0]?.document_id === DOC_B3);
    assert("paging keeps the total", paged.totalCount === 2);

    const none = await index.search("zebra");
    assert("no match, no hits", none.hits.length === 0 && none.totalCount === 0);
  }

  console.log("\n=== Highlights & ranking info ===");
  {
    const result = await index.search("garden", {
      filter: eq("site_url", SITE_B),
      attributesToHighlight: ["content"],
      highlightPreTag: "<b>",
      highlightPostTag: "</b>",
      getRankingInfo: true,
    });
    const hit = result.hits[0];
    const highlighted = hit?._highlightResult?.content?.value;
    assert("wraps matched words", highlighted === "a small <b>garden</b> path", highlighted);
    assert("only requested attributes are highlighted", hit?._highlightResult?.post_title === undefined);
    assert("snippets follow the index settings", typeof hit?._snippetResult?.content?.value === "string");
    assert("ranking score is positive", (hit?._rankingInfo?.rankingScore ?? 0) > 0);
    assert("counts matched words", hit?._rankingInfo?.words === 1);
  }

  console.log("\n=== Candidate cap ===");
  {
    const capped = new SqliteIndexBackend({ path: ":memory:", maxCandidates: 2 });
    await capped.upsertBatch(RECORDS);

    const chunks = await capped.search("garden", { distinct: false });
    assert("reads at most the capped rows", chunks.hits.length === 2, String(chunks.hits.length));
    assert("counts every matching chunk", chunks.totalCount === 3, String(chunks.totalCount));

    const docs = await capped.search("garden");
    assert("counts every matching document", docs.totalCount === 2, String(docs.totalCount));

    const scoped = await capped.search("", { filter: eq("site_url", SITE_A) });
    assert("an empty query counts filtered documents", scoped.totalCount === 2, String(scoped.totalCount));
    capped.close();
  }

  console.log("\n=== Deletes ===");
  {
    await index.deleteByFilter(eq("document_id", DOC_A1));
    assert("deletes every chunk of a document", index.count() === 2);
    const after = await index.search("garden");
    assert("deleted chunks are not searchable", after.hits.every((h) => h.document_id !== DOC_A1));

    await index.clear();
    assert("clear empties the index", index.count() === 0);
  }
  index.close();

  console.log("\n=== Settings ===");
  {
    const path = join(TMP, "index.db");
    const first = new SqliteIndexBackend({ path });
    await first.applySettings({ ...DEFAULT_INDEX_SETTINGS, distinct: false });
    await first.upsertBatch(RECORDS);
    first.close();

    const reopened = new SqliteIndexBackend({ path });
    const result = await reopened.search("garden");
    assert("stored settings survive reopening", result.hits.length === 3, String(result.hits.length));

    reopened.close();
    let error: unknown;
    try {
      await reopened.search("garden");
    } catch (err: unknown) {
      error = err;
    }
    assert("a closed index is unavailable", error instanceof IndexUnavailableError);
  }
} finally {
  rmSync(TMP, { recursive: true, force: true });
}

console.log(`\n${passed} passed, ${failed} failed`);
if (failed > 0) process.exit(1);
