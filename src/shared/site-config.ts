/**
 * Site configuration loader.
 *
 * Reads `.fedsearch/site.yml`, validates it against `site.schema.json`
 * (which fills in defaults) and normalises the URLs.
 *
 * ```yaml
 * role: brand
 * siteUrl: https://brand-a.example.com
 * siteName: Brand A
 * governingUrl: https://hub.example.com
 * apiKey: brand-a-key
 * ```
 */
import { readYamlFile } from "./yaml.js";
import { siteConfigFile } from "./paths.js";
import { normalizeScopeUrl } from "./scope.js";
import { schemaRegistry, type SchemaRegistry } from "./schema.js";

// ── Types ─────────────────────────────────────────────────────────────

interface SiteConfigBase {
  /** Normalised scope URL of this site. */
  siteUrl: string;
  siteName: string;
  /** Maximum encoded size of one index record, in bytes. */
  recordSizeLimit: number;
  /** Content items per indexing batch. */
  batchSize: number;
  /** Timeout of every outbound sync call. */
  requestTimeoutMs: number;
  /** Port of `fedsearch serve`. */
  port: number;
}

export interface GoverningSiteConfig extends SiteConfigBase {
  role: "governing";
  /** Key required on admin calls (`PUT /search-settings`, `POST /re-index`). */
  adminKey: string;
  encryptionKey: string;
  encryptionSalt: string;
}

export interface BrandSiteConfig extends SiteConfigBase {
  role: "brand";
  /** Normalised URL of the governing site. */
  governingUrl: string;
  /** Shared secret identifying this brand to the governing site and back. */
  apiKey: string;
}

export type SiteConfig = GoverningSiteConfig | BrandSiteConfig;

/** Shape accepted by `site.schema.json` once defaults are applied. */
interface RawSiteConfig {
  role: "governing" | "brand";
  siteUrl: string;
  siteName: string;
  governingUrl?: string;
  apiKey?: string;
  adminKey?: string;
  encryptionKey?: string;
  encryptionSalt?: string;
  recordSizeLimit: number;
  batchSize: number;
  requestTimeoutMs: number;
  port: number;
}

export interface SiteConfigOptions {
  /** Site root (default: cwd). */
  root?: string;
  /** Explicit config file path. */
  path?: string;
  registry?: SchemaRegistry;
}

// ── Public API ────────────────────────────────────────────────────────

/** Validate an already-parsed config object. */
export function resolveSiteConfig(data: unknown, registry: SchemaRegistry = schemaRegistry()): SiteConfig {
  const raw = registry.parse<RawSiteConfig>("site.schema.json", data, "site configuration");
  const base: SiteConfigBase = {
    siteUrl: normalizeScopeUrl(raw.siteUrl),
    siteName: raw.siteName,
    recordSizeLimit: raw.recordSizeLimit,
    batchSize: raw.batchSize,
    requestTimeoutMs: raw.requestTimeoutMs,
    port: raw.port,
  };

  if (raw.role === "brand") {
    if (!raw.governingUrl || !raw.apiKey) {
      throw new Error("Invalid site configuration: brand sites need governingUrl and apiKey");
    }
    return { ...base, role: "brand", governingUrl: normalizeScopeUrl(raw.governingUrl), apiKey: raw.apiKey };
  }

  if (!raw.adminKey || !raw.encryptionKey) {
    throw new Error("Invalid site configuration: the governing site needs adminKey and encryptionKey");
  }
  return {
    ...base,
    role: "governing",
    adminKey: raw.adminKey,
    encryptionKey: raw.encryptionKey,
    encryptionSalt: raw.encryptionSalt ?? base.siteUrl,
  };
}

/** Load `.fedsearch/site.yml` (or `options.path`). */
export function loadSiteConfig(options: SiteConfigOptions = {}): SiteConfig {
  const path = options.path ?? siteConfigFile(options.root);
  return resolveSiteConfig(readYamlFile(path), options.registry);
}
