/**
 * Logger - Minimal logging seam for core modules
 *
 * Core modules never print. They report through a Logger handed in by the
 * caller; the CLI supplies a chalk-coloured one.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

/** Logger that drops everything */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};
