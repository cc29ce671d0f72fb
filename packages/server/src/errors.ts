/**
 * Typed failure for passkey ceremonies.
 *
 * The convenience API flattens every failure to null/false; the `try*` API
 * returns a `CeremonyResult` whose error carries one of these codes:
 * - UNSUPPORTED: the browser cannot run WebAuthn for this page
 * - DECLINED: the user closed or timed out the WebAuthn prompt
 * - NO_SELECTION: conditional (autofill) retrieval ended without a pick
 * - CANCELLED: the caller's signal aborted or the provider was disposed
 * - TRANSPORT_FAULT: the bridge could not be reached or answered garbage
 * - VERIFICATION_REJECTED: the proof did not validate
 */

export type PasskeyErrorCode =
  | 'UNSUPPORTED'
  | 'DECLINED'
  | 'NO_SELECTION'
  | 'CANCELLED'
  | 'TRANSPORT_FAULT'
  | 'VERIFICATION_REJECTED';

export class PasskeyError extends Error {
  readonly code: PasskeyErrorCode;

  constructor(code: PasskeyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PasskeyError';
    this.code = code;
  }

  /** Declines, empty autofill and cancellation are expected outcomes, not faults */
  get isExpected(): boolean {
    return this.code === 'DECLINED' || this.code === 'NO_SELECTION' || this.code === 'CANCELLED';
  }

  /**
   * Classify an error thrown by a browser bridge call. DOMException names
   * from `navigator.credentials` map onto codes; anything else is a fault.
   */
  static fromBridgeError(err: unknown): PasskeyError {
    if (err instanceof PasskeyError) return err;
    if (err instanceof Error) {
      if (err.name === 'NotAllowedError') {
        return new PasskeyError('DECLINED', 'User declined the WebAuthn prompt', { cause: err });
      }
      if (err.name === 'AbortError') {
        return new PasskeyError('CANCELLED', 'WebAuthn ceremony was aborted', { cause: err });
      }
      if (err.name === 'NotSupportedError' || err.name === 'SecurityError') {
        return new PasskeyError('UNSUPPORTED', err.message, { cause: err });
      }
      return new PasskeyError('TRANSPORT_FAULT', err.message, { cause: err });
    }
    return new PasskeyError('TRANSPORT_FAULT', String(err), { cause: err });
  }

  /** Wrap a verifier rejection; cancellations raised while verifying pass through */
  static fromVerifierError(err: unknown): PasskeyError {
    if (err instanceof PasskeyError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new PasskeyError('VERIFICATION_REJECTED', message, { cause: err });
  }
}

export type CeremonyResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: PasskeyError };

export function succeeded<T>(value: T): CeremonyResult<T> {
  return { ok: true, value };
}

export function failed<T>(error: PasskeyError): CeremonyResult<T> {
  return { ok: false, error };
}
