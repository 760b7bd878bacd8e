/**
 * Endpoints served by the governing site.
 *
 * Brand calls are authenticated by their shared key, which also fixes
 * the scope they act on.  Settings changes need the admin key.
 */
import { isFederatedSearchError, errorMessage } from "../../shared/errors.js";
import type { SchemaRegistry } from "../../shared/schema.js";
import type { GoverningSiteConfig } from "../../shared/site-config.js";
import type { ReindexPostPayload } from "../indexing/change-watcher.js";
import { HttpError, ok, type Route, type SyncRequest } from "./http.js";
import {
  ENDPOINTS,
  SEARCH_KEY_HEADER,
  TOKEN_HEADER,
  type IndexBatchPayload,
  type SearchRequestPayload,
} from "./protocol.js";
import { safeEqual, type GoverningSettings, type SharedSite } from "./governing-settings.js";
import type { GoverningCoordinator } from "./governing-coordinator.js";

export interface GoverningRoutesOptions {
  config: GoverningSiteConfig;
  settings: GoverningSettings;
  coordinator: GoverningCoordinator;
  registry: SchemaRegistry;
}

export function governingRoutes(options: GoverningRoutesOptions): Route[] {
  const { config, settings, coordinator, registry } = options;

  const isAdmin = (req: SyncRequest): boolean => {
    const token = req.headers[TOKEN_HEADER];
    return token !== undefined && safeEqual(token, config.adminKey);
  };

  const requireAdmin = (req: SyncRequest): void => {
    if (!isAdmin(req)) throw new HttpError(401, "Invalid admin key");
  };

  const requireBrand = (req: SyncRequest): SharedSite => {
    const site = settings.findSiteByToken(req.headers[TOKEN_HEADER]);
    if (!site) throw new HttpError(401, "Unknown site token");
    return site;
  };

  const body = <T>(req: SyncRequest, schema: string): T => {
    const check = registry.check<T>(schema, req.body ?? {});
    if (!check.ok) throw new HttpError(400, `Invalid request body: ${check.errors.join("; ")}`);
    return check.value;
  };

  /** Settings validation failures are the caller's fault. */
  const asBadRequest = async <T>(update: () => T | Promise<T>): Promise<T> => {
    try {
      return await update();
    } catch (err: unknown) {
      if (isFederatedSearchError(err)) throw err;
      throw new HttpError(400, errorMessage(err));
    }
  };

  return [
    {
      method: "GET",
      path: ENDPOINTS.health,
      handle: async () => ok({ role: "governing", site_url: settings.siteUrl }),
    },
    {
      method: "GET",
      path: ENDPOINTS.brandConfig,
      handle: async (req) => ok({ ...settings.brandConfigFor(requireBrand(req).url) }),
    },
    {
      method: "POST",
      path: ENDPOINTS.reindexPost,
      handle: async (req) => {
        const site = requireBrand(req);
        const result = await coordinator.ingestChange(site, body<ReindexPostPayload>(req, "reindex-post.schema.json"));
        return {
          status: result.ok ? 200 : 502,
          body: { success: result.ok, action: result.action, count: result.count, message: result.message },
        };
      },
    },
    {
      method: "POST",
      path: ENDPOINTS.indexBatch,
      handle: async (req) => {
        const site = requireBrand(req);
        const outcome = await coordinator.ingestBatch(site, body<IndexBatchPayload>(req, "index-batch.schema.json"));
        return ok({ ...outcome });
      },
    },
    {
      method: "POST",
      path: ENDPOINTS.indexSearch,
      handle: async (req) => {
        const site = requireBrand(req);
        const request = body<SearchRequestPayload>(req, "search-request.schema.json");
        const response = await coordinator.searchForBrand(site, req.headers[SEARCH_KEY_HEADER], request);
        return ok({ ...response });
      },
    },
    {
      method: "GET",
      path: ENDPOINTS.searchableSites,
      handle: async (req) => {
        if (!isAdmin(req)) requireBrand(req);
        return ok({ sites: settings.availableScopes() });
      },
    },
    {
      method: "GET",
      path: ENDPOINTS.indexableEntities,
      handle: async (req) => {
        requireAdmin(req);
        return ok({ entities: settings.getIndexableEntities() });
      },
    },
    {
      method: "PUT",
      path: ENDPOINTS.indexableEntities,
      handle: async (req) => {
        requireAdmin(req);
        const entities = await asBadRequest(() => coordinator.updateIndexableEntities(req.body));
        return ok({ entities }, "Indexable entities saved.");
      },
    },
    {
      method: "GET",
      path: ENDPOINTS.searchSettings,
      handle: async (req) => {
        requireAdmin(req);
        return ok({ scopes: settings.getSearchScopes() });
      },
    },
    {
      method: "PUT",
      path: ENDPOINTS.searchSettings,
      handle: async (req) => {
        requireAdmin(req);
        const scopes = await asBadRequest(() => coordinator.updateSearchScopes(req.body));
        return ok({ scopes }, "Search settings saved.");
      },
    },
    {
      method: "GET",
      path: ENDPOINTS.sharedSites,
      handle: async (req) => {
        requireAdmin(req);
        const sites = settings.getSharedSites().map(({ url, name }) => ({ url, name }));
        return ok({ sites });
      },
    },
    {
      method: "PUT",
      path: ENDPOINTS.sharedSites,
      handle: async (req) => {
        requireAdmin(req);
        const { sites, removed } = await asBadRequest(() => coordinator.updateSharedSites(req.body));
        return ok({ sites: sites.map(({ url, name }) => ({ url, name })), removed }, "Shared sites saved.");
      },
    },
    {
      method: "PUT",
      path: ENDPOINTS.credentials,
      handle: async (req) => {
        requireAdmin(req);
        await asBadRequest(() => coordinator.updateCredentials(req.body));
        return ok({}, "Credentials saved.");
      },
    },
    {
      method: "POST",
      path: ENDPOINTS.reindex,
      handle: async (req) => {
        requireAdmin(req);
        const outcome = await coordinator.reindexAll();
        return { status: 200, body: { ...outcome } };
      },
    },
  ];
}
