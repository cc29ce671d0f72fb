/**
 * Minimal logger seam. Ceremonies collapse failures into null/false, so the
 * cause of every collapsed failure goes through here.
 */
export interface PasskeyLogger {
  debug(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

const PREFIX = '[passkeyflow]';

export const consoleLogger: PasskeyLogger = {
  debug: (message, ...meta) => console.debug(`${PREFIX} ${message}`, ...meta),
  warn: (message, ...meta) => console.warn(`${PREFIX} ${message}`, ...meta),
  error: (message, ...meta) => console.error(`${PREFIX} ${message}`, ...meta),
};

export const silentLogger: PasskeyLogger = {
  debug: () => {},
  warn: () => {},
  error: () => {},
};
