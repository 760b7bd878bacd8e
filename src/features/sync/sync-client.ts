/**
 * Outbound sync calls.
 *
 * A {@link Transport} performs one HTTP exchange; the default uses the
 * global `fetch` with `AbortSignal.timeout`, tests plug in an in-process
 * transport.  {@link SyncClient} adds the token header, the timeout,
 * JSON decoding, envelope checks and schema validation, and reports
 * failures as typed errors.
 */
import { RemoteInvalidResponseError, RemoteUnreachableError, errorMessage } from "../../shared/errors.js";
import { schemaRegistry, type SchemaRegistry } from "../../shared/schema.js";
import { TOKEN_HEADER, type HttpMethod } from "./protocol.js";

// ── Transport ─────────────────────────────────────────────────────────

export interface TransportRequest {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
}

export interface TransportResponse {
  status: number;
  text(): Promise<string>;
}

export type Transport = (url: string, request: TransportRequest) => Promise<TransportResponse>;

export const fetchTransport: Transport = (url, request) =>
  fetch(url, {
    method: request.method,
    headers: request.headers,
    body: request.body,
    signal: AbortSignal.timeout(request.timeoutMs),
  });

// ── Client ────────────────────────────────────────────────────────────

export interface SyncClientOptions {
  transport?: Transport;
  /** Per-call timeout (default 30 s). */
  timeoutMs?: number;
  registry?: SchemaRegistry;
}

export interface SyncCall {
  /** Base URL of the peer site. */
  baseUrl: string;
  path: string;
  method: HttpMethod;
  token: string;
  body?: unknown;
  headers?: Record<string, string>;
  /** Schema the decoded body must satisfy (default `api-response.schema.json`). */
  schema?: string;
  timeoutMs?: number;
}

function peerMessage(body: unknown): string | undefined {
  if (typeof body === "object" && body !== null && "message" in body && typeof body.message === "string") {
    return body.message;
  }
  return undefined;
}

export class SyncClient {
  private readonly transport: Transport;
  private readonly timeoutMs: number;
  private readonly registry: SchemaRegistry;

  constructor(options: SyncClientOptions = {}) {
    this.transport = options.transport ?? fetchTransport;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.registry = options.registry ?? schemaRegistry();
  }

  /**
   * Perform a call and return the validated body.
   *
   * @throws {RemoteUnreachableError} when the peer cannot be reached in time.
   * @throws {RemoteInvalidResponseError} on error statuses, `success: false`,
   *   undecodable bodies and schema violations.
   */
  async call<T>(call: SyncCall): Promise<T> {
    const url = new URL(call.path.replace(/^\//, ""), call.baseUrl).toString();
    const timeoutMs = call.timeoutMs ?? this.timeoutMs;
    const headers: Record<string, string> = {
      accept: "application/json",
      [TOKEN_HEADER]: call.token,
      ...call.headers,
    };
    if (call.body !== undefined) headers["content-type"] = "application/json";

    let response: TransportResponse;
    let text: string;
    try {
      response = await this.transport(url, {
        method: call.method,
        headers,
        body: call.body === undefined ? undefined : JSON.stringify(call.body),
        timeoutMs,
      });
      text = await response.text();
    } catch (err: unknown) {
      const timedOut = err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
      const reason = timedOut ? `timed out after ${timeoutMs} ms` : errorMessage(err);
      throw new RemoteUnreachableError(`${call.method} ${url} failed: ${reason}`, url, { cause: err });
    }

    let body: unknown;
    try {
      body = text === "" ? {} : JSON.parse(text);
    } catch (err: unknown) {
      throw new RemoteInvalidResponseError(
        `${call.method} ${url} returned a non-JSON body (HTTP ${response.status})`,
        response.status,
        { cause: err },
      );
    }

    if (response.status < 200 || response.status >= 300) {
      const message = peerMessage(body) ?? `HTTP ${response.status}`;
      throw new RemoteInvalidResponseError(`${call.method} ${url}: ${message}`, response.status);
    }

    const check = this.registry.check<T>(call.schema ?? "api-response.schema.json", body);
    if (!check.ok) {
      throw new RemoteInvalidResponseError(
        `${call.method} ${url} returned an unexpected body: ${check.errors.join("; ")}`,
        response.status,
      );
    }
    if (typeof body === "object" && body !== null && "success" in body && body.success === false) {
      throw new RemoteInvalidResponseError(
        `${call.method} ${url}: ${peerMessage(body) ?? "request failed"}`,
        response.status,
      );
    }
    return check.value;
  }
}
