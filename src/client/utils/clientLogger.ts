/**
 * Minimal logging surface for client-side modules. Defaults to `console`;
 * callers may inject their own sink.
 */
export interface ClientLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
}

/* eslint-disable no-console */
export const consoleLogger: ClientLogger = {
  debug: (message, meta) => console.debug(message, meta ?? {}),
  info: (message, meta) => console.info(message, meta ?? {}),
  warn: (message, meta) => console.warn(message, meta ?? {}),
};
/* eslint-enable no-console */
