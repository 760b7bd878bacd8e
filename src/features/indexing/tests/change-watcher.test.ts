/**
 * Tests for content change handling on the governing site and on brands.
 */
import { eq } from "../../../shared/filter.js";
import { createSilentLogger } from "../../../shared/logger.js";
import { SqliteIndexBackend } from "../../index-backend/sqlite-backend.js";
import { IndexWriter } from "../index-writer.js";
import { RecordBuilder } from "../record-builder.js";
import { ChangeWatcher, GoverningChangeApplier, type ReindexPostPayload } from "../change-watcher.js";
import {
  MemoryContentSource,
  createRecordingLogger,
  makeItem,
  makeRecord,
  wordText,
} from "../../../../test/fixtures.js";

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

const SITE = "https://a.test/";
const postsOnly = async () => ["post"];

const index = new SqliteIndexBackend({ path: ":memory:" });
const builder = new RecordBuilder({ siteUrl: SITE, siteName: "A", recordSizeLimit: 600, logger: createSilentLogger() });
const writer = new IndexWriter({ index, source: new MemoryContentSource([]), builder, logger: createSilentLogger() });
const applierLogger = createRecordingLogger();
const applier = new GoverningChangeApplier({ writer, indexableTypes: postsOnly, logger: applierLogger });
const watcher = new ChangeWatcher({ role: "governing", builder, indexableTypes: postsOnly, applier, logger: createSilentLogger() });

const docCount = (postId: number) => index.count(eq("post_id", postId));

console.log("\n=== Governing lifecycle ===");
{
  const item = makeItem({ id: 1, content: "hello world" });
  const published = await watcher.handle({ oldStatus: "draft", newStatus: "publish", item });
  assert("publishing upserts", published.ok && published.action === "upserted" && published.count === 1, JSON.stringify(published));
  assert("the record is in the index", docCount(1) === 1);

  const drafted = await watcher.handle({ oldStatus: "publish", newStatus: "draft", item: { ...item, status: "draft" } });
  assert("unpublishing deletes", drafted.ok && drafted.action === "deleted", JSON.stringify(drafted));
  assert("the record is gone", docCount(1) === 0);

  const trashed = await watcher.handle({ oldStatus: "draft", newStatus: "trash", item: { ...item, status: "trash" } });
  assert("trashing a draft is a delete", trashed.action === "deleted" && trashed.count === undefined);
}

{
  const item = makeItem({ id: 2, content: wordText(1000) });
  await watcher.handle({ oldStatus: "draft", newStatus: "publish", item });
  const chunks = docCount(2);
  assert("long content is stored in chunks", chunks > 1, String(chunks));

  await watcher.handle({ oldStatus: "publish", newStatus: "publish", item: { ...item, content: "short now" } });
  assert("an update replaces every old chunk", docCount(2) === 1, String(docCount(2)));
}

{
  const page = makeItem({ id: 3, type: "page", content: "about us" });
  const result = await watcher.handle({ oldStatus: "draft", newStatus: "publish", item: page });
  assert("types that are not indexed are skipped", result.action === "skip" && result.ok);
  assert("the skip names the type and scope", result.message === `Type "page" is not indexed for ${SITE}`, result.message);
  assert("nothing is written for a skipped type", docCount(3) === 0);
}

console.log("\n=== Governing applier ===");
{
  const result = await applier.apply({
    scopeUrl: "https://A.test",
    contentId: 5,
    contentType: "post",
    newStatus: "publish",
    records: [
      makeRecord({ site: SITE, postId: 5 }),
      makeRecord({ site: "https://b.test/", postId: 5 }),
      makeRecord({ site: SITE, postId: 6 }),
    ],
  });
  assert("keeps only the document's own records", result.action === "upserted" && result.count === 1);
  assert("foreign records never reach the index", docCount(6) === 0 && index.count(eq("site_url", "https://b.test/")) === 0);
  const warning = applierLogger.entries.find((e) => e.level === "warn");
  assert("logs the dropped records", warning?.message === "Dropped 2 foreign record(s) for https://a.test/_5", warning?.message);

  const restricted = new GoverningChangeApplier({ writer, indexableTypes: async () => [], logger: createSilentLogger() });
  const skipped = await restricted.apply({
    scopeUrl: SITE,
    contentId: 5,
    contentType: "post",
    newStatus: "trash",
    records: [],
  });
  assert("the entity map is re-checked on apply", skipped.action === "skip");
  assert("a skipped change leaves the index alone", docCount(5) === 1);

  const onlyForeign = await applier.apply({
    scopeUrl: SITE,
    contentId: 5,
    contentType: "post",
    newStatus: "publish",
    records: [makeRecord({ site: "https://b.test/", postId: 5 })],
  });
  assert("no own records means delete", onlyForeign.action === "deleted" && docCount(5) === 0);
}

console.log("\n=== Sites with similar URLs ===");
{
  const shared = new SqliteIndexBackend({ path: ":memory:" });
  const applierFor = (siteUrl: string) => {
    const siteBuilder = new RecordBuilder({ siteUrl, siteName: siteUrl, logger: createSilentLogger() });
    const siteWriter = new IndexWriter({ index: shared, source: new MemoryContentSource([]), builder: siteBuilder, logger: createSilentLogger() });
    const siteApplier = new GoverningChangeApplier({ writer: siteWriter, indexableTypes: postsOnly, logger: createSilentLogger() });
    return (contentId: number) =>
      siteApplier.apply({
        scopeUrl: siteUrl,
        contentId,
        contentType: "post",
        newStatus: "publish",
        records: siteBuilder.buildRecords(makeItem({ id: contentId, content: "shop news" })),
      });
  };
  const dotted = "https://shop.example.test/";
  const joined = "https://shopexample.test/";

  await applierFor(dotted)(1);
  const published = await applierFor(joined)(1);
  assert("the second site's item is written", published.action === "upserted" && shared.count(eq("site_url", joined)) === 1);
  assert("the first site's item survives", shared.count(eq("site_url", dotted)) === 1, String(shared.count(eq("site_url", dotted))));
  const hits = await shared.search("shop", { hitsPerPage: 10 });
  assert("both documents are found", hits.totalCount === 2, String(hits.totalCount));
  shared.close();
}

console.log("\n=== Brand forwarding ===");
{
  const sent: ReindexPostPayload[] = [];
  const brand = new ChangeWatcher({
    role: "brand",
    builder,
    indexableTypes: postsOnly,
    forward: async (payload) => {
      sent.push(payload);
      return { ok: true, action: payload.records.length > 0 ? "upserted" : "deleted", count: payload.records.length };
    },
    logger: createSilentLogger(),
  });

  const item = makeItem({ id: 7, content: "brand news" });
  const published = await brand.handle({ oldStatus: "draft", newStatus: "publish", item });
  const payload = sent[0];
  assert("forwards the governing response", published.action === "upserted" && published.count === 1);
  assert("payload names the scope and item", payload?.site_url === SITE && payload.post_id === 7 && payload.post_type === "post");
  assert("payload carries both statuses", payload?.old_status === "draft" && payload.post_status === "publish");
  assert("payload carries the built records", payload?.records[0]?.document_id === "https://a.test/_7");
  assert("brands never write locally", docCount(7) === 0);

  await brand.handle({ oldStatus: "publish", newStatus: "private", item: { ...item, status: "private" } });
  assert("unpublishing forwards no records", sent[1]?.records.length === 0 && sent[1].post_status === "private");

  await brand.handle({ oldStatus: "draft", newStatus: "publish", item: makeItem({ id: 8, type: "page" }) });
  assert("skipped types are not forwarded", sent.length === 2);

  const failing = new ChangeWatcher({
    role: "brand",
    builder,
    indexableTypes: postsOnly,
    forward: async () => {
      throw new Error("governing site unreachable");
    },
    logger: createSilentLogger(),
  });
  const result = await failing.handle({ oldStatus: "draft", newStatus: "publish", item });
  assert("a forward failure is an error result", !result.ok && result.action === "error");
  assert("the error message is reported", result.message === "governing site unreachable", result.message);
}

index.close();

console.log(`\n${passed} passed, ${failed} failed`);
if (failed > 0) process.exit(1);
