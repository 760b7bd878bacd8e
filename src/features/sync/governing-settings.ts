/**
 * Settings owned by the governing site.
 *
 * Stored in the {@link ConfigStore}:
 *
 * - search scopes: per site URL, whether search is enabled and which
 *   other scopes it may see
 * - indexable entities: per site URL, the content types indexed
 * - shared sites: the connected brands and their shared keys
 * - credentials: search index name and search key, encrypted at rest
 *
 * Every setter normalises URLs and returns what it stored.
 */
import { timingSafeEqual } from "node:crypto";
import type { ConfigStore } from "../../shared/config-store.js";
import { SecretBox } from "../../shared/crypto.js";
import { normalizeScopeUrl, uniqueScopes } from "../../shared/scope.js";
import { schemaRegistry, type SchemaRegistry } from "../../shared/schema.js";
import { effectiveScopes, type SearchScopeConfig } from "../search/query-planner.js";
import type { BrandConfigWire, IndexCredentials } from "./protocol.js";

// ── Types ─────────────────────────────────────────────────────────────

export interface SharedSite {
  url: string;
  name: string;
  apiKey: string;
}

export type SearchScopeMap = Record<string, SearchScopeConfig>;

export type IndexableEntityMap = Record<string, string[]>;

export interface GoverningSettingsSnapshot {
  sharedSites: SharedSite[];
  searchScopes: SearchScopeMap;
  indexableEntities: IndexableEntityMap;
  credentials?: IndexCredentials;
}

export const SETTINGS_KEYS = {
  searchScopes: "fedsearch_search_scopes",
  indexableEntities: "fedsearch_indexable_entities",
  sharedSites: "fedsearch_shared_sites",
  credentials: "fedsearch_index_credentials",
} as const;

export interface GoverningSettingsOptions {
  store: ConfigStore;
  /** Scope URL of the governing site. */
  siteUrl: string;
  encryptionKey: string;
  encryptionSalt: string;
  registry?: SchemaRegistry;
}

/** Constant-time string comparison. */
export function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, "utf8");
  const right = Buffer.from(b, "utf8");
  return left.length === right.length && timingSafeEqual(left, right);
}

// ── Settings ──────────────────────────────────────────────────────────

export class GoverningSettings {
  readonly siteUrl: string;
  private readonly store: ConfigStore;
  private readonly box: SecretBox;
  private readonly registry: SchemaRegistry;

  constructor(options: GoverningSettingsOptions) {
    this.store = options.store;
    this.siteUrl = normalizeScopeUrl(options.siteUrl);
    this.box = new SecretBox({ key: options.encryptionKey, salt: options.encryptionSalt });
    this.registry = options.registry ?? schemaRegistry();
  }

  // ── Search scopes ───────────────────────────────────────────────────

  getSearchScopes(): SearchScopeMap {
    const check = this.registry.check<SearchScopeMap>("search-scopes.schema.json", this.store.get(SETTINGS_KEYS.searchScopes));
    return check.ok ? check.value : {};
  }

  setSearchScopes(value: unknown): SearchScopeMap {
    const raw = this.registry.parse<SearchScopeMap>("search-scopes.schema.json", value, "search scopes");
    const sanitized: SearchScopeMap = {};
    for (const [url, config] of Object.entries(raw)) {
      const scope = normalizeScopeUrl(url);
      if (!scope) continue;
      sanitized[scope] = {
        enabled: config.enabled,
        searchableScopes: uniqueScopes(config.searchableScopes),
      };
    }
    this.store.set(SETTINGS_KEYS.searchScopes, sanitized);
    return sanitized;
  }

  /** Scopes `scope` may search (own scope first), `[]` when disabled. */
  searchableScopesFor(scope: string): string[] {
    return effectiveScopes(scope, this.getSearchScopes()[normalizeScopeUrl(scope)], this.availableScopes());
  }

  // ── Indexable entities ──────────────────────────────────────────────

  getIndexableEntities(): IndexableEntityMap {
    const check = this.registry.check<IndexableEntityMap>(
      "indexable-entities.schema.json",
      this.store.get(SETTINGS_KEYS.indexableEntities),
    );
    return check.ok ? check.value : {};
  }

  setIndexableEntities(value: unknown): IndexableEntityMap {
    const raw = this.registry.parse<IndexableEntityMap>("indexable-entities.schema.json", value, "indexable entities");
    const sanitized: IndexableEntityMap = {};
    for (const [url, types] of Object.entries(raw)) {
      const scope = normalizeScopeUrl(url);
      if (scope) sanitized[scope] = [...new Set(types.map((t) => t.trim()).filter(Boolean))];
    }
    this.store.set(SETTINGS_KEYS.indexableEntities, sanitized);
    return sanitized;
  }

  indexableTypes(scope: string): string[] {
    return this.getIndexableEntities()[normalizeScopeUrl(scope)] ?? [];
  }

  // ── Shared sites ────────────────────────────────────────────────────

  getSharedSites(): SharedSite[] {
    const check = this.registry.check<SharedSite[]>("shared-sites.schema.json", this.store.get(SETTINGS_KEYS.sharedSites));
    return check.ok ? check.value : [];
  }

  /**
   * Replace the brand list.  Scopes that were removed are pruned from
   * the scope and entity maps and returned so the caller can delete
   * their records.
   */
  setSharedSites(value: unknown): { sites: SharedSite[]; removed: string[] } {
    const raw = this.registry.parse<SharedSite[]>("shared-sites.schema.json", value, "shared sites");
    const byUrl = new Map<string, SharedSite>();
    for (const site of raw) {
      const url = normalizeScopeUrl(site.url);
      if (url === this.siteUrl) {
        throw new Error(`The governing site ${url} cannot be its own brand`);
      }
      byUrl.set(url, { url, name: site.name.trim(), apiKey: site.apiKey });
    }
    const sites = [...byUrl.values()];

    const removed = this.getSharedSites()
      .map((s) => s.url)
      .filter((url) => !byUrl.has(url));
    this.store.set(SETTINGS_KEYS.sharedSites, sites);
    if (removed.length > 0) this.prune(removed);
    return { sites, removed };
  }

  /** Brand whose shared key is `token`. */
  findSiteByToken(token: string | undefined): SharedSite | undefined {
    if (!token) return undefined;
    return this.getSharedSites().find((site) => safeEqual(site.apiKey, token));
  }

  /** The governing site and every shared site. */
  availableScopes(): string[] {
    return uniqueScopes([this.siteUrl, ...this.getSharedSites().map((s) => s.url)]);
  }

  // ── Credentials ─────────────────────────────────────────────────────

  getCredentials(): IndexCredentials | undefined {
    const check = this.registry.check<IndexCredentials>("credentials.schema.json", this.store.get(SETTINGS_KEYS.credentials));
    if (!check.ok) return undefined;
    const indexName = this.box.decrypt(check.value.indexName);
    const searchKey = this.box.decrypt(check.value.searchKey);
    if (indexName === undefined || searchKey === undefined) return undefined;
    return { indexName, searchKey };
  }

  setCredentials(value: unknown): void {
    const credentials = this.registry.parse<IndexCredentials>("credentials.schema.json", value, "credentials");
    this.store.set(SETTINGS_KEYS.credentials, {
      indexName: this.box.encrypt(credentials.indexName),
      searchKey: this.box.encrypt(credentials.searchKey),
    });
  }

  // ── Aggregates ──────────────────────────────────────────────────────

  /** Configuration served to the brand at `scope`. */
  brandConfigFor(scope: string): BrandConfigWire {
    const url = normalizeScopeUrl(scope);
    const config = this.getSearchScopes()[url];
    const credentials = this.getCredentials();
    return {
      credentials: credentials ? { index_name: credentials.indexName, search_key: credentials.searchKey } : null,
      search_scope: {
        enabled: config?.enabled ?? false,
        searchable_scopes: config?.searchableScopes ?? [],
      },
      indexable_types: this.indexableTypes(url),
      available_scopes: this.availableScopes(),
    };
  }

  snapshot(): GoverningSettingsSnapshot {
    return {
      sharedSites: this.getSharedSites(),
      searchScopes: this.getSearchScopes(),
      indexableEntities: this.getIndexableEntities(),
      credentials: this.getCredentials(),
    };
  }

  private prune(removed: readonly string[]): void {
    const gone = new Set(removed);

    const scopes: SearchScopeMap = {};
    for (const [url, config] of Object.entries(this.getSearchScopes())) {
      if (gone.has(url)) continue;
      scopes[url] = { ...config, searchableScopes: config.searchableScopes.filter((s) => !gone.has(s)) };
    }
    this.store.set(SETTINGS_KEYS.searchScopes, scopes);

    const entities: IndexableEntityMap = {};
    for (const [url, types] of Object.entries(this.getIndexableEntities())) {
      if (!gone.has(url)) entities[url] = types;
    }
    this.store.set(SETTINGS_KEYS.indexableEntities, entities);
  }
}
