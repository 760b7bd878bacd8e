/**
 * Tests for content cleaning, chunk splitting and record building.
 */
import { createSilentLogger } from "../../../shared/logger.js";
import { cleanContent } from "../content-cleaner.js";
import {
  CONTINUATION_MARKER,
  RecordBuilder,
  allowedStatuses,
  encodedSize,
  joinChunks,
  splitContent,
} from "../record-builder.js";
import { createRecordingLogger, makeItem, wordText } from "../../../../test/fixtures.js";

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

const textSize = (s: string) => encodedSize(s) - 2;

// ── Cleaning ──────────────────────────────────────────────────────────

console.log("\n=== cleanContent ===");

{
  const cleaned = cleanContent(
    "<p>Hello&nbsp;<b>world</b></p><script>track()</script><p>Again &amp; again</p>",
  );
  assert("strips tags, scripts and entities", cleaned === "Hello world\nAgain & again", JSON.stringify(cleaned));
  assert("drops code blocks", cleanContent("<p>Run</p><pre><code>rm -rf</code></pre><p>Done</p>") === "Run\nDone");
  assert("drops comments", cleanContent("a<!-- hidden -->b") === "ab");
  assert("collapses whitespace", cleanContent("  one \t two \n\n\n three  ") === "one two\nthree");
  assert("line breaks from <br>", cleanContent("a<br/>b<br>c") === "a\nb\nc");
}

// ── Splitting ─────────────────────────────────────────────────────────

console.log("\n=== splitContent / joinChunks ===");

{
  assert("short text is one chunk", JSON.stringify(splitContent("short", 100)) === '["short"]');

  const soft = splitContent("aaaa bbbb cccc", 10);
  assert("cuts at the last space that fits", JSON.stringify(soft) === JSON.stringify(["aaaa bbbb", `${CONTINUATION_MARKER}cccc`]), JSON.stringify(soft));
  assert("soft cuts join back exactly", joinChunks(soft) === "aaaa bbbb cccc");

  const hard = splitContent("abcdefghij", 4);
  assert("cuts inside a word without spaces", hard[0] === "abcd" && hard.length === 7, JSON.stringify(hard));
  assert("hard cuts stay within budget", hard.every((c) => textSize(c) <= 4));
  assert("hard cuts join back exactly", joinChunks(hard) === "abcdefghij");

  const quoted = 'say "hi" to "them" now';
  const escaped = splitContent(quoted, 8);
  assert("escaped characters count with their escaped size", escaped.every((c) => textSize(c) <= 8), JSON.stringify(escaped));
  assert("escaped text joins back exactly", joinChunks(escaped) === quoted);

  let error: unknown;
  try {
    splitContent("abcdef", 2);
  } catch (err: unknown) {
    error = err;
  }
  assert("a budget below the marker size is a RangeError", error instanceof RangeError);
}

// ── Statuses ──────────────────────────────────────────────────────────

console.log("\n=== allowedStatuses ===");

assert("publish only for regular types", JSON.stringify(allowedStatuses(["post", "page"])) === '["publish"]');
assert("attachments also inherit", JSON.stringify(allowedStatuses(["post", "attachment"])) === '["publish","inherit"]');

// ── Builder ───────────────────────────────────────────────────────────

console.log("\n=== RecordBuilder ===");

{
  const builder = new RecordBuilder({ siteUrl: "https://Brand-A.test", siteName: "Brand A", logger: createSilentLogger() });
  const item = makeItem({
    id: 7,
    title: "Long read",
    sticky: true,
    author: {
      id: 3,
      displayName: "Ada Writer",
      firstName: "Ada",
      lastName: "Writer",
      login: "ada",
      postsUrl: "https://brand-a.test/author/ada/",
      avatarUrl: "",
    },
    taxonomies: {
      category: [{ termId: 5, name: "News", slug: "news", description: "", parent: 0, count: 1, termLink: "https://brand-a.test/news/" }],
    },
  });

  const base = builder.baseFields(item);
  assert("document id uses the scope url", base.document_id === "https://brand-a.test/_7", base.document_id);
  assert("site url is normalised", base.site_url === "https://brand-a.test/");
  assert("dates become unix seconds", base.post_date_gmt === 1704067200, String(base.post_date_gmt));
  assert("sticky becomes 1", base.is_sticky === 1);
  assert("author fields are mapped", base.post_author_data?.author_display_name === "Ada Writer");
  assert("terms are mapped", base.taxonomies.category?.[0]?.term_link === "https://brand-a.test/news/");

  const text = wordText(25_000);
  const plain = makeItem({ id: 7, title: "Long read", sticky: true, content: text });
  const budget = builder.contentBudget(builder.baseFields(plain));
  assert(
    "fixture fits three chunks but not two",
    2 * budget < text.length && text.length < 3 * (budget - 20),
    `budget=${budget}`,
  );

  const records = builder.buildRecords(plain);
  assert("25k characters make three records", records.length === 3, String(records.length));
  assert("no record exceeds the size limit", records.every((r) => encodedSize(r) <= 9000));
  assert("chunk indexes run from zero", records.map((r) => r.chunk_index).join(",") === "0,1,2");
  assert("every record knows the total", records.every((r) => r.total_chunks === 3));
  assert("object ids are per chunk", records[2]?.objectID === "https://brand-a.test/_7_2");
  assert("later chunks carry the marker", records.slice(1).every((r) => r.content.startsWith(CONTINUATION_MARKER)));
  assert("chunks reconstruct the content exactly", joinChunks(records.map((r) => r.content)) === text);
  assert("base fields repeat on every chunk", records.every((r) => r.post_title === "Long read" && r.is_sticky === 1));

  const empty = builder.buildRecords(makeItem({ id: 8 }));
  assert("empty content still makes one record", empty.length === 1 && empty[0]?.content === "" && empty[0].total_chunks === 1);

  const html = builder.buildRecords(makeItem({ id: 9, content: "<p>Hi&nbsp;there</p>" }));
  assert("content is cleaned before indexing", html[0]?.content === "Hi there");
}

console.log("\n=== Over budget ===");

{
  const logger = createRecordingLogger();
  const builder = new RecordBuilder({ siteUrl: "https://a.test", siteName: "A", recordSizeLimit: 600, logger });
  const records = builder.buildRecords(makeItem({ id: 1, title: "t".repeat(1000), content: "body" }));
  assert("returns no records", records.length === 0);
  const warning = logger.entries.find((e) => e.level === "warn");
  assert("logs the over-budget document", warning?.context?.kind === "RecordOverBudget" && warning.context.documentId === "https://a.test/_1");
}

console.log(`\n${passed} passed, ${failed} failed`);
if (failed > 0) process.exit(1);
