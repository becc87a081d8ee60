type LogFn = (...args: unknown[]) => void;

export interface Logger {
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  debug: LogFn;
}

/**
 * Create a logger whose lines carry an optional `[scope]` tag.
 * All logging goes to stderr to avoid corrupting stdio MCP transport on stdout.
 */
export function createLogger(scope?: string): Logger {
  const tag = scope ? [`[${scope}]`] : [];
  return {
    info: (...args) => console.error('[INFO]', ...tag, ...args),
    warn: (...args) => console.error('[WARN]', ...tag, ...args),
    error: (...args) => console.error('[ERROR]', ...tag, ...args),
    debug: (...args) => {
      if (process.env.DEBUG) console.error('[DEBUG]', ...tag, ...args);
    },
  };
}

export const logger = createLogger();
