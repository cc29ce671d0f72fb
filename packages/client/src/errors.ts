/**
 * Errors raised while talking to the bridge routes, plus the wire shape the
 * server expects for errors thrown by WebAuthn calls.
 *
 * @ai_context The server maps the browser's error `name` onto its own codes
 * (NotAllowedError = declined, AbortError = cancelled), so names must cross
 * the wire unchanged:
 * - SERVER_ERROR: bridge routes returned a non-2xx response
 * - NETWORK_ERROR: fetch failed (offline, DNS, aborted poll)
 * - INVALID_RESPONSE: bridge routes returned unexpected data
 */

export type BridgeClientErrorCode = 'SERVER_ERROR' | 'NETWORK_ERROR' | 'INVALID_RESPONSE';

export class BridgeClientError extends Error {
  readonly code: BridgeClientErrorCode;
  readonly statusCode?: number;

  constructor(code: BridgeClientErrorCode, message: string, statusCode?: number) {
    super(message);
    this.name = 'BridgeClientError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

export interface WireError {
  name: string;
  message: string;
}

/** Flatten anything thrown by a handler to `{ name, message }` */
export function toWireError(err: unknown): WireError {
  if (err instanceof Error) {
    return { name: err.name || 'Error', message: err.message };
  }
  return { name: 'Error', message: String(err) };
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}
