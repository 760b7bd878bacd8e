/**
 * Error model.
 *
 * Failures that cross a component boundary are {@link FederatedSearchError}
 * subclasses with a discriminating `kind`.  Orchestrating operations
 * (bulk indexing, fan-out, search) catch them and report outcomes;
 * local operations let them propagate.
 *
 * The CLI entry point renders any error with {@link formatCliError}.
 */

// ── Federated search errors ───────────────────────────────────────────

export type FederatedSearchErrorKind =
  | "CredentialsMissing"
  | "IndexUnavailable"
  | "RemoteUnreachable"
  | "RemoteInvalidResponse"
  | "RecordOverBudget"
  | "ScopeNotConfigured"
  | "PartialFailure";

/** Outcome of one scope in a fan-out operation. */
export interface ScopeResult {
  status: "ok" | "error";
  message: string;
}

export abstract class FederatedSearchError extends Error {
  abstract readonly kind: FederatedSearchErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Backend credentials are absent or not usable. */
export class CredentialsMissingError extends FederatedSearchError {
  readonly kind = "CredentialsMissing";
}

/** The search index rejected or failed an operation. */
export class IndexUnavailableError extends FederatedSearchError {
  readonly kind = "IndexUnavailable";
}

/** A peer site could not be reached (connection failure or timeout). */
export class RemoteUnreachableError extends FederatedSearchError {
  readonly kind = "RemoteUnreachable";

  constructor(
    message: string,
    readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** A peer answered with an error status or a body we cannot use. */
export class RemoteInvalidResponseError extends FederatedSearchError {
  readonly kind = "RemoteInvalidResponse";

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** A record's fixed fields alone exceed the size limit. */
export class RecordOverBudgetError extends FederatedSearchError {
  readonly kind = "RecordOverBudget";

  constructor(
    message: string,
    readonly documentId: string,
    readonly overheadBytes: number,
  ) {
    super(message);
  }
}

/** Searching or indexing was requested for a scope that is not set up. */
export class ScopeNotConfiguredError extends FederatedSearchError {
  readonly kind = "ScopeNotConfigured";
}

/** Some scopes in a fan-out failed. */
export class PartialFailureError extends FederatedSearchError {
  readonly kind = "PartialFailure";

  constructor(
    message: string,
    readonly results: Record<string, ScopeResult>,
  ) {
    super(message);
  }
}

export function isFederatedSearchError(err: unknown): err is FederatedSearchError {
  return err instanceof FederatedSearchError;
}

/** Plain message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Keep typed errors as they are and wrap anything else with `wrap`
 * (the original value becomes the `cause`).
 */
export function toFederatedSearchError(
  err: unknown,
  wrap: (message: string, options: { cause: unknown }) => FederatedSearchError,
): FederatedSearchError {
  if (isFederatedSearchError(err)) return err;
  return wrap(errorMessage(err), { cause: err });
}

// ── CLI formatting ────────────────────────────────────────────────────

/**
 * Node.js system error shape (ENOENT, EACCES, EPERM, etc.).
 * Not all Error objects carry these, so we use a type guard.
 */
interface NodeSystemError extends Error {
  code: string;
  path?: string;
  syscall?: string;
}

export function isNodeSystemError(err: unknown): err is NodeSystemError {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

/** js-yaml YAMLException shape, detected by `name`. */
interface YAMLExceptionLike extends Error {
  name: "YAMLException";
  reason?: string;
  mark?: { name?: string | null; line?: number; column?: number; snippet?: string };
}

export function isYAMLException(err: unknown): err is YAMLExceptionLike {
  return err instanceof Error && err.name === "YAMLException";
}

/**
 * Format an error into a CLI message.
 *
 * - YAML parse errors  → "Failed to parse YAML" with location
 * - federated search   → `[Kind] message`
 * - ENOENT / EACCES    → file hints
 * - everything else    → the message without a stack trace
 */
export function formatCliError(err: unknown): string {
  if (isYAMLException(err)) {
    const reason = err.reason ?? "invalid YAML syntax";
    const mark = err.mark;
    if (mark && mark.line != null) {
      const file = mark.name ? `${mark.name} ` : "";
      // js-yaml lines are 0-based
      const location = `line ${mark.line + 1}, column ${(mark.column ?? 0) + 1}`;
      let msg = `Failed to parse YAML: ${reason} (${file}${location})`;
      if (mark.snippet) {
        msg += `\n${mark.snippet}`;
      }
      return msg;
    }
    return `Failed to parse YAML: ${reason}`;
  }

  if (isFederatedSearchError(err)) {
    return `[${err.kind}] ${err.message}`;
  }

  if (isNodeSystemError(err)) {
    const filePath = err.path ? ` "${err.path}"` : "";
    switch (err.code) {
      case "ENOENT":
        return `File not found:${filePath}. Run the command from a site directory or pass --root.`;
      case "EACCES":
      case "EPERM":
        return `Permission denied:${filePath}. Check file permissions.`;
      case "EISDIR":
        return `Expected a file but found a directory:${filePath}.`;
      default:
        return `System error (${err.code}):${filePath} ${err.message}`;
    }
  }

  if (err instanceof Error) {
    return err.message;
  }

  return String(err);
}
