export interface Logger {
  debug(message: string, ...rest: unknown[]): void;
  info(message: string, ...rest: unknown[]): void;
  warn(message: string, ...rest: unknown[]): void;
  error(message: string, ...rest: unknown[]): void;
}

/**
 * Console logger with the `[service]` prefix. Debug lines
 * are dropped unless `debug` is set.
 */
export function createLogger(service: string, opts: { debug?: boolean } = {}): Logger {
  const prefix = `[${service}]`;
  return {
    debug: (message, ...rest) => { if (opts.debug) console.debug(`${prefix} ${message}`, ...rest); },
    info: (message, ...rest) => console.log(`${prefix} ${message}`, ...rest),
    warn: (message, ...rest) => console.warn(`${prefix} ${message}`, ...rest),
    error: (message, ...rest) => console.error(`${prefix} ${message}`, ...rest),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
