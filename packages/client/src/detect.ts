/**
 * WebAuthn feature detection utilities.
 */

import { browserSupportsWebAuthn, browserSupportsWebAuthnAutofill } from '@simplewebauthn/browser';

/** Check if the browser exposes WebAuthn and the credentials container */
export function arePasskeysSupported(): boolean {
  if (!browserSupportsWebAuthn()) return false;
  const credentials = globalThis.navigator?.credentials;
  return typeof credentials?.create === 'function' && typeof credentials.get === 'function';
}

/** Check if passkeys can be offered through form autofill */
export async function isConditionalMediationAvailable(): Promise<boolean> {
  try {
    return await browserSupportsWebAuthnAutofill();
  } catch {
    return false;
  }
}
