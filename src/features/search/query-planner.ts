/**
 * Federated query planner.
 *
 * Decides which scopes a search may see and turns the request into a
 * backend filter.  A site's own scope is always searchable once search
 * is enabled for it.
 */
import { and, eqAny, type Filter } from "../../shared/filter.js";
import { normalizeScopeUrl, uniqueScopes } from "../../shared/scope.js";

export interface SearchScopeConfig {
  enabled: boolean;
  /** Other scopes this site may search. */
  searchableScopes: string[];
}

export interface QueryScope {
  /** Content types to include; empty or absent means all. */
  types?: readonly string[];
  scopes: readonly string[];
}

/** Resolves the scopes the local site may search. */
export interface ScopeResolver {
  resolveSearchableScopes(): Promise<string[]>;
}

/** `(post_type = … OR …) AND (site_url = … OR …)`, empty parts omitted. */
export function planFilter(scope: QueryScope): Filter | undefined {
  return and(eqAny("post_type", scope.types ?? []), eqAny("site_url", uniqueScopes(scope.scopes)));
}

/**
 * Searchable scopes for `ownScope` under `config`: `[]` when disabled,
 * otherwise the own scope followed by the configured ones.  When
 * `available` is non-empty the configured scopes are limited to it.
 */
export function effectiveScopes(
  ownScope: string,
  config: SearchScopeConfig | undefined,
  available: readonly string[] = [],
): string[] {
  if (!config?.enabled) return [];
  const allowed = new Set(uniqueScopes(available));
  const configured = uniqueScopes(config.searchableScopes).filter((s) => allowed.size === 0 || allowed.has(s));
  return uniqueScopes([normalizeScopeUrl(ownScope), ...configured]);
}
