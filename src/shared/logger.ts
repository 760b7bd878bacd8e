/**
 * Minimal structured logger.
 *
 * Components take a {@link Logger} in their options and default to the
 * console implementation; tests pass {@link createSilentLogger} or a
 * recording logger.
 */
export type LogContext = Record<string, unknown>;

export interface Logger {
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const withContext = (message: string, context?: LogContext): unknown[] =>
  context && Object.keys(context).length > 0 ? [message, context] : [message];

/**
 * Console logger.  Everything goes to stderr so that `--json` output on
 * stdout stays machine-readable.
 */
export function createConsoleLogger(prefix = "fedsearch"): Logger {
  const tag = `[${prefix}]`;
  return {
    info(message, context) {
      console.error(tag, ...withContext(message, context));
    },
    warn(message, context) {
      console.warn(tag, ...withContext(message, context));
    },
    error(message, context) {
      console.error(tag, ...withContext(message, context));
    },
  };
}

export function createSilentLogger(): Logger {
  const noop = () => undefined;
  return { info: noop, warn: noop, error: noop };
}
