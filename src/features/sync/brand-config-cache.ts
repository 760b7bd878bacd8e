/**
 * Brand-side cache of the configuration served by the governing site.
 *
 * One entry in the {@link ConfigStore}, kept for a week.  A failed fetch
 * yields {@link DISABLED_BRAND_CONFIG} without caching it, so the next
 * read tries again.  The governing site busts the entry through
 * `DELETE /brand-config` whenever settings change.
 */
import type { ConfigStore } from "../../shared/config-store.js";
import { normalizeScopeUrl, uniqueScopes } from "../../shared/scope.js";
import { errorMessage } from "../../shared/errors.js";
import { schemaRegistry, type SchemaRegistry } from "../../shared/schema.js";
import { createConsoleLogger, type Logger } from "../../shared/logger.js";
import {
  DISABLED_BRAND_CONFIG,
  ENDPOINTS,
  brandConfigFromWire,
  type BrandConfig,
  type BrandConfigWire,
} from "./protocol.js";
import type { SyncClient } from "./sync-client.js";

export const BRAND_CONFIG_CACHE_KEY = "fedsearch_brand_config";

export const BRAND_CONFIG_TTL_SECONDS = 7 * 24 * 60 * 60;

export interface BrandConfigCacheOptions {
  store: ConfigStore;
  client: SyncClient;
  governingUrl: string;
  /** The brand's shared key. */
  apiKey: string;
  registry?: SchemaRegistry;
  logger?: Logger;
}

/** Normalise scope lists and trim type names. */
export function sanitizeBrandConfig(wire: BrandConfigWire): BrandConfigWire {
  return {
    credentials: wire.credentials
      ? { index_name: wire.credentials.index_name.trim(), search_key: wire.credentials.search_key.trim() }
      : null,
    search_scope: {
      enabled: wire.search_scope.enabled,
      searchable_scopes: uniqueScopes(wire.search_scope.searchable_scopes),
    },
    indexable_types: [...new Set(wire.indexable_types.map((t) => t.trim()).filter(Boolean))],
    available_scopes: uniqueScopes(wire.available_scopes),
  };
}

export class BrandConfigCache {
  private readonly store: ConfigStore;
  private readonly client: SyncClient;
  private readonly governingUrl: string;
  private readonly apiKey: string;
  private readonly registry: SchemaRegistry;
  private readonly logger: Logger;

  constructor(options: BrandConfigCacheOptions) {
    this.store = options.store;
    this.client = options.client;
    this.governingUrl = normalizeScopeUrl(options.governingUrl);
    this.apiKey = options.apiKey;
    this.registry = options.registry ?? schemaRegistry();
    this.logger = options.logger ?? createConsoleLogger();
  }

  async getConfig(): Promise<BrandConfig> {
    const cached = this.registry.check<BrandConfigWire>(
      "brand-config.schema.json",
      this.store.get(BRAND_CONFIG_CACHE_KEY),
    );
    if (cached.ok) return brandConfigFromWire(cached.value);

    try {
      const fetched = await this.client.call<BrandConfigWire>({
        baseUrl: this.governingUrl,
        path: ENDPOINTS.brandConfig,
        method: "GET",
        token: this.apiKey,
        schema: "brand-config.schema.json",
      });
      const sanitized = sanitizeBrandConfig(fetched);
      this.store.set(BRAND_CONFIG_CACHE_KEY, sanitized, BRAND_CONFIG_TTL_SECONDS);
      return brandConfigFromWire(sanitized);
    } catch (err: unknown) {
      this.logger.error("Failed to fetch brand configuration", {
        governingUrl: this.governingUrl,
        error: errorMessage(err),
      });
      return structuredClone(DISABLED_BRAND_CONFIG);
    }
  }

  invalidate(): void {
    this.store.delete(BRAND_CONFIG_CACHE_KEY);
  }
}
