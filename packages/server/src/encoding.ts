/**
 * Byte helpers for the bridge wire format.
 *
 * Every binary field that crosses the browser bridge is unpadded base64url,
 * the same encoding `@simplewebauthn` uses in its JSON types.
 */

import { isoBase64URL } from '@simplewebauthn/server/helpers';

import type { Passkey, PasskeyDescription } from './types.js';

export function toBase64Url(bytes: Uint8Array): string {
  return isoBase64URL.fromBuffer(bytes.slice());
}

export function fromBase64Url(text: string): Uint8Array {
  if (!/^[A-Za-z0-9_-]*$/.test(text)) throw new TypeError('Invalid base64url text');
  return isoBase64URL.toBuffer(text);
}

/**
 * Decode a stored public key kept as text. Accepts base64url (what
 * `describePasskey` produces) and standard base64.
 */
export function decodeKeyText(text: string): Uint8Array {
  const urlSafe = text.trim().replace(/=+$/, '').replace(/\+/g, '-').replace(/\//g, '_');
  if (!/^[A-Za-z0-9_-]+$/.test(urlSafe) || urlSafe.length % 4 === 1) {
    throw new TypeError('Public key is neither base64url nor base64 text');
  }
  return isoBase64URL.toBuffer(urlSafe);
}

/** Constant-time comparison, so a user handle check leaks nothing through timing */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  let result = 0;
  for (let index = 0; index < a.length; index++) {
    result |= (a[index] ?? 0) ^ (b[index] ?? 0);
  }
  return result === 0;
}

/** Persistable fields of a passkey as base64url text */
export function describePasskey(passkey: Passkey): PasskeyDescription {
  return {
    userHandle: toBase64Url(passkey.userHandle),
    credentialId: toBase64Url(passkey.credentialId),
    publicKey: passkey.publicKey ? toBase64Url(passkey.publicKey) : undefined,
  };
}
