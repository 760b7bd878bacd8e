/**
 * Endpoints served by a brand site.  Both mutating calls come from the
 * governing site and carry this brand's shared key.
 */
import type { BrandSiteConfig } from "../../shared/site-config.js";
import { HttpError, ok, type Route, type SyncRequest } from "./http.js";
import { ENDPOINTS, TOKEN_HEADER } from "./protocol.js";
import { safeEqual } from "./governing-settings.js";
import type { BrandCoordinator } from "./brand-coordinator.js";

export interface BrandRoutesOptions {
  config: BrandSiteConfig;
  coordinator: BrandCoordinator;
}

export function brandRoutes(options: BrandRoutesOptions): Route[] {
  const { config, coordinator } = options;

  const requireGoverning = (req: SyncRequest): void => {
    const token = req.headers[TOKEN_HEADER];
    if (token === undefined || !safeEqual(token, config.apiKey)) {
      throw new HttpError(401, "Invalid site token");
    }
  };

  return [
    {
      method: "GET",
      path: ENDPOINTS.health,
      handle: async () => ok({ role: "brand", site_url: config.siteUrl }),
    },
    {
      method: "DELETE",
      path: ENDPOINTS.brandConfig,
      handle: async (req) => {
        requireGoverning(req);
        coordinator.invalidateCache();
        return ok({}, "Cache cleared.");
      },
    },
    {
      method: "POST",
      path: ENDPOINTS.reindex,
      handle: async (req) => {
        requireGoverning(req);
        const result = await coordinator.reindexSelf();
        if (result.status === "error") {
          return { status: 500, body: { success: false, message: result.message } };
        }
        return ok({}, result.message);
      },
    },
  ];
}
