/**
 * HTTP plumbing for the sync endpoints.
 *
 * Routes are plain handlers over {@link SyncRequest} / {@link SyncResponse}
 * so they can be exercised without a socket; {@link createSyncServer}
 * binds them to `node:http`.
 */
import http, { type IncomingMessage, type ServerResponse } from "node:http";
import { isFederatedSearchError, errorMessage, type FederatedSearchErrorKind } from "../../shared/errors.js";
import type { Logger } from "../../shared/logger.js";
import type { ApiResponse, HttpMethod } from "./protocol.js";

// ── Types ─────────────────────────────────────────────────────────────

export interface SyncRequest {
  method: string;
  path: string;
  /** Lower-cased header names. */
  headers: Record<string, string | undefined>;
  body: unknown;
}

export interface SyncResponse {
  status: number;
  body: ApiResponse & Record<string, unknown>;
}

export interface Route {
  method: HttpMethod;
  path: string;
  handle(request: SyncRequest): Promise<SyncResponse>;
}

/** Error carrying the HTTP status to answer with. */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

const STATUS_BY_KIND: Record<FederatedSearchErrorKind, number> = {
  CredentialsMissing: 503,
  IndexUnavailable: 503,
  RemoteUnreachable: 502,
  RemoteInvalidResponse: 502,
  RecordOverBudget: 422,
  ScopeNotConfigured: 403,
  PartialFailure: 500,
};

const MAX_BODY_SIZE = 16 * 1_048_576;

export function ok(data: Record<string, unknown> = {}, message?: string): SyncResponse {
  return { status: 200, body: { success: true, ...(message ? { message } : {}), ...data } };
}

// ── Dispatch ──────────────────────────────────────────────────────────

/** Route a request and turn thrown errors into error envelopes. */
export async function dispatch(routes: readonly Route[], request: SyncRequest, logger: Logger): Promise<SyncResponse> {
  const path = request.path.replace(/\/+$/, "") || "/";
  const matching = routes.filter((r) => r.path === path);
  if (matching.length === 0) {
    return { status: 404, body: { success: false, message: `No route for ${path}` } };
  }
  const route = matching.find((r) => r.method === request.method.toUpperCase());
  if (!route) {
    return { status: 405, body: { success: false, message: `${request.method} not allowed on ${path}` } };
  }

  try {
    return await route.handle(request);
  } catch (err: unknown) {
    if (err instanceof HttpError) {
      return { status: err.status, body: { success: false, message: err.message } };
    }
    if (isFederatedSearchError(err)) {
      logger.warn(`${route.method} ${path} failed`, { kind: err.kind, error: err.message });
      return { status: STATUS_BY_KIND[err.kind], body: { success: false, message: err.message, kind: err.kind } };
    }
    logger.error(`${route.method} ${path} failed`, { error: errorMessage(err) });
    return { status: 500, body: { success: false, message: errorMessage(err) } };
  }
}

// ── node:http binding ─────────────────────────────────────────────────

export const readJsonBody = async (req: IncomingMessage): Promise<unknown> => {
  return new Promise<unknown>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let total = 0;

    req.on("data", (chunk: Buffer) => {
      total += chunk.length;
      if (total > MAX_BODY_SIZE) {
        reject(new HttpError(413, "Request body too large"));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });

    req.on("end", () => {
      if (chunks.length === 0) {
        resolve(undefined);
        return;
      }
      try {
        resolve(JSON.parse(Buffer.concat(chunks).toString("utf8")));
      } catch {
        reject(new HttpError(400, "Request body is not valid JSON"));
      }
    });

    req.on("error", (error) => {
      reject(error);
    });
  });
};

export const sendJson = (res: ServerResponse, status: number, data: unknown): void => {
  res.writeHead(status, { "Content-Type": "application/json; charset=utf-8" });
  res.end(JSON.stringify(data));
};

function headerMap(req: IncomingMessage): Record<string, string | undefined> {
  const headers: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    headers[name.toLowerCase()] = Array.isArray(value) ? value[0] : value;
  }
  return headers;
}

export function createSyncServer(routes: readonly Route[], logger: Logger): http.Server {
  return http.createServer((req, res) => {
    const handle = async () => {
      const requestUrl = new URL(req.url ?? "/", "http://localhost");
      let body: unknown;
      try {
        body = await readJsonBody(req);
      } catch (err: unknown) {
        const status = err instanceof HttpError ? err.status : 400;
        sendJson(res, status, { success: false, message: errorMessage(err) });
        return;
      }
      const response = await dispatch(
        routes,
        { method: req.method ?? "GET", path: requestUrl.pathname, headers: headerMap(req), body },
        logger,
      );
      sendJson(res, response.status, response.body);
    };

    handle().catch((err: unknown) => {
      logger.error("Unhandled sync request failure", { error: errorMessage(err) });
      if (!res.headersSent) sendJson(res, 500, { success: false, message: "Internal error" });
    });
  });
}
