/**
 * Scope URL and key helpers.
 *
 * Every site taking part in federated search is identified by its
 * canonical URL (the *scope URL*).  Records carry it as `site_url` and
 * prefix their document ids with it; the derived *scope key* is a
 * display label only and is not unique.
 */

/**
 * Canonical form of a site URL: trimmed, lower-cased, exactly one
 * trailing slash.  Idempotent.  An empty input stays empty.
 */
export function normalizeScopeUrl(url: string): string {
  const trimmed = url.trim().toLowerCase().replace(/\/+$/, "");
  if (trimmed === "") return "";
  return `${trimmed}/`;
}

/**
 * Compact label of a scope: the normalised URL reduced to `[a-z0-9_-]`.
 * Distinct URLs can share a label, so ids never use it.
 *
 * `https://Brand-A.example.com` → `httpsbrand-aexamplecom`
 */
export function scopeKey(url: string): string {
  return normalizeScopeUrl(url).replace(/[^a-z0-9_-]/g, "");
}

/**
 * Globally unique id of a content item within the shared index.
 *
 * `https://Brand-A.example.com`, 7 → `https://brand-a.example.com/_7`
 */
export function documentId(scopeUrl: string, contentId: number): string {
  return `${normalizeScopeUrl(scopeUrl)}_${contentId}`;
}

/** Id of one chunk record. */
export function objectId(docId: string, chunkIndex: number): string {
  return `${docId}_${chunkIndex}`;
}

/** Whether two URLs name the same scope. */
export function sameScope(a: string, b: string): boolean {
  return normalizeScopeUrl(a) === normalizeScopeUrl(b);
}

/** Normalise, drop empties and de-duplicate while keeping order. */
export function uniqueScopes(urls: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const url of urls) {
    const normalized = normalizeScopeUrl(url);
    if (normalized) seen.add(normalized);
  }
  return [...seen];
}
