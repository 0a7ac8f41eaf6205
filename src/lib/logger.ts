import { formatError } from './errors';

export type Logger = {
  debug(message: string): void;
  warn(message: string): void;
  /** Warns with the formatted error; the stack follows when error debugging is on. */
  error(message: string, error: unknown): void;
};

export type LoggerOptions = {
  debug?: boolean;
  /** Print stacks for logged errors. Defaults to the `DEBUG_ERRORS` env var. */
  debugErrors?: boolean;
};

export function isDebugErrorsEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.DEBUG_ERRORS;
  return value === '1' || value === 'true' || value === 'yes';
}

/**
 * Console logger with a `[scope]` prefix. Debug lines are dropped unless enabled.
 * An empty scope logs without a prefix.
 */
export function createLogger(scope: string, options: boolean | LoggerOptions = false): Logger {
  const { debug = false, debugErrors = isDebugErrorsEnabled() } =
    typeof options === 'boolean' ? { debug: options } : options;
  const prefix = scope ? `[${scope}] ` : '';

  return {
    debug(message) {
      if (debug) {
        console.log(`${prefix}${message}`);
      }
    },
    warn(message) {
      console.warn(`${prefix}⚠️ ${message}`);
    },
    error(message, error) {
      console.warn(`${prefix}${message}${formatError(error)}`);
      if (debugErrors && error instanceof Error && error.stack) {
        console.warn(error.stack);
      }
    },
  };
}
