/**
 * Tests for the brand-side configuration cache.
 */
import { SqliteConfigStore } from "../../../shared/config-store.js";
import { createSilentLogger } from "../../../shared/logger.js";
import { BRAND_CONFIG_CACHE_KEY, BRAND_CONFIG_TTL_SECONDS, BrandConfigCache, sanitizeBrandConfig } from "../brand-config-cache.js";
import { ok, type Route } from "../http.js";
import { DISABLED_BRAND_CONFIG, TOKEN_HEADER, type BrandConfigWire } from "../protocol.js";
import { SyncClient } from "../sync-client.js";
import { createRecordingLogger, createRouteTransport } from "../../../../test/fixtures.js";

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

const HUB = "https://hub.test/";
const BRAND = "https://brand-a.test/";

const WIRE: BrandConfigWire = {
  credentials: { index_name: " shared ", search_key: "test-search-key" },
  search_scope: { enabled: true, searchable_scopes: ["https://Hub.test", HUB, "https://brand-b.test"] },
  indexable_types: ["post", " page ", "post", ""],
  available_scopes: [HUB, BRAND, "https://brand-b.test/"],
};

const brandConfigRoute: Route = {
  method: "GET",
  path: "/brand-config",
  handle: async (request) => {
    if (request.headers[TOKEN_HEADER] !== "brand-a-key") return { status: 401, body: { success: false, message: "Unauthorized" } };
    return ok({ ...WIRE });
  },
};

function setup() {
  let clock = 1_000_000;
  const store = new SqliteConfigStore({ path: ":memory:", now: () => clock });
  const routes = createRouteTransport({ [HUB]: [brandConfigRoute] });
  const logger = createRecordingLogger();
  const cache = new BrandConfigCache({
    store,
    client: new SyncClient({ transport: routes.transport }),
    governingUrl: "https://Hub.test",
    apiKey: "brand-a-key",
    logger,
  });
  return { store, routes, cache, logger, advance: (ms: number) => (clock += ms) };
}

console.log("\n=== sanitizeBrandConfig ===");
{
  const clean = sanitizeBrandConfig(WIRE);
  assert("credentials are trimmed", clean.credentials?.index_name === "shared");
  assert(
    "scopes are normalised and de-duplicated",
    clean.search_scope.searchable_scopes.join(",") === `${HUB},https://brand-b.test/`,
    clean.search_scope.searchable_scopes.join(","),
  );
  assert("types are trimmed, de-duplicated and non-empty", clean.indexable_types.join(",") === "post,page");
}

console.log("\n=== Caching ===");
{
  const { routes, cache } = setup();
  const first = await cache.getConfig();
  assert("fetches from the governing site", routes.calls.length === 1);
  assert("sends the brand key", routes.calls[0]?.headers[TOKEN_HEADER] === "brand-a-key");
  assert("calls the brand-config endpoint", routes.calls[0]?.url === `${HUB}brand-config`, routes.calls[0]?.url);
  assert("maps the wire form", first.credentials?.searchKey === "test-search-key" && first.searchScope.enabled);
  assert("indexable types are sanitised", first.indexableTypes.join(",") === "post,page");

  const second = await cache.getConfig();
  assert("a second read makes no call", routes.calls.length === 1);
  assert("a second read returns the same config", JSON.stringify(second) === JSON.stringify(first));

  cache.invalidate();
  await cache.getConfig();
  await cache.getConfig();
  assert("invalidate causes exactly one refetch", routes.calls.length === 2);
}

{
  const { routes, cache, store, advance } = setup();
  await cache.getConfig();
  assert("cached for a week", store.get(BRAND_CONFIG_CACHE_KEY) !== undefined);
  advance(BRAND_CONFIG_TTL_SECONDS * 1000 + 1);
  await cache.getConfig();
  assert("refetches after expiry", routes.calls.length === 2);
}

{
  const { routes, cache, store } = setup();
  store.set(BRAND_CONFIG_CACHE_KEY, { credentials: "not an object" });
  await cache.getConfig();
  assert("a malformed cache entry is refetched", routes.calls.length === 1);
}

console.log("\n=== Failures ===");
{
  const { routes, cache, store, logger } = setup();
  routes.down.add(HUB);
  const config = await cache.getConfig();
  assert("falls back to the disabled config", JSON.stringify(config) === JSON.stringify(DISABLED_BRAND_CONFIG));
  assert("the fallback is not cached", store.get(BRAND_CONFIG_CACHE_KEY) === undefined);
  assert("logs the failure", logger.entries.some((e) => e.level === "error" && e.message === "Failed to fetch brand configuration"));

  routes.down.delete(HUB);
  const recovered = await cache.getConfig();
  assert("the next read tries again", routes.calls.length === 2 && recovered.searchScope.enabled);
}

{
  const store = new SqliteConfigStore({ path: ":memory:" });
  const routes = createRouteTransport({ [HUB]: [brandConfigRoute] });
  const cache = new BrandConfigCache({
    store,
    client: new SyncClient({ transport: routes.transport }),
    governingUrl: HUB,
    apiKey: "wrong-key",
    logger: createSilentLogger(),
  });
  const config = await cache.getConfig();
  assert("a rejected key is a disabled config", config.searchScope.enabled === false && config.credentials === undefined);
}

console.log(`\n${passed} passed, ${failed} failed`);
if (failed > 0) process.exit(1);
