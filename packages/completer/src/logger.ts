/**
 * Minimal logging seam. The default implementation writes tag-prefixed
 * lines to the console; tests pass their own.
 */
export interface CompleterLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleLogger(tag: string): CompleterLogger {
  return {
    debug: (message) => console.debug(`[${tag}] ${message}`),
    info: (message) => console.info(`[${tag}] ${message}`),
    warn: (message) => console.warn(`[${tag}] ${message}`),
    error: (message) => console.error(`[${tag}] ${message}`),
  };
}

export const silentLogger: CompleterLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
