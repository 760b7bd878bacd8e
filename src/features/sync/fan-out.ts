/**
 * Sequential fan-out to peer sites with per-scope outcomes.
 */
import { errorMessage, type ScopeResult } from "../../shared/errors.js";
import { normalizeScopeUrl } from "../../shared/scope.js";
import type { Logger } from "../../shared/logger.js";

export const REINDEX_SUCCESS_MESSAGE = "Re-indexing completed successfully.";

export const SCOPE_OK_MESSAGE = "Re-indexed successfully.";

export interface FanOutOutcome {
  success: boolean;
  message: string;
  results: Record<string, ScopeResult>;
}

/**
 * Call every target in turn.  A failing call is recorded as an `error`
 * result for its scope and does not stop the others.
 */
export async function fanOut<T extends { url: string }>(
  targets: readonly T[],
  call: (target: T) => Promise<string | undefined>,
  logger: Logger,
): Promise<Record<string, ScopeResult>> {
  const results: Record<string, ScopeResult> = {};
  for (const target of targets) {
    const scope = normalizeScopeUrl(target.url);
    try {
      const message = await call(target);
      results[scope] = { status: "ok", message: message || SCOPE_OK_MESSAGE };
    } catch (err: unknown) {
      logger.warn(`Call to ${scope} failed`, { error: errorMessage(err) });
      results[scope] = { status: "error", message: errorMessage(err) };
    }
  }
  return results;
}

/**
 * Aggregate outcome: the success message when every scope succeeded,
 * otherwise one `"<scope>: <message>"` line per scope.
 */
export function summarizeResults(
  results: Record<string, ScopeResult>,
  successMessage: string = REINDEX_SUCCESS_MESSAGE,
): FanOutOutcome {
  const entries = Object.entries(results);
  const success = entries.every(([, r]) => r.status === "ok");
  const message = success ? successMessage : entries.map(([scope, r]) => `${scope}: ${r.message}`).join("\n");
  return { success, message, results };
}
