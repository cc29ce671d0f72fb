/**
 * User identity normalization.
 *
 * Callers identify users by opaque bytes, text, or UUID. Every ceremony works
 * on one byte form: bytes pass through, text is UTF-8 encoded, and a UUID is
 * rendered to its canonical lower-case hyphenated text before encoding.
 */

import type { UserIdentity } from './types.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
const BARE_UUID_PATTERN = /^[0-9a-f]{32}$/;

const textEncoder = new TextEncoder();

export class Uuid {
  private readonly value: string;

  private constructor(value: string) {
    this.value = value;
  }

  /**
   * Accepts the hyphenated form, optionally wrapped in braces, or 32 bare hex
   * digits. Case-insensitive.
   */
  static parse(text: string): Uuid {
    let candidate = text.trim().toLowerCase();
    if (candidate.startsWith('{') && candidate.endsWith('}')) {
      candidate = candidate.slice(1, -1);
    }
    if (BARE_UUID_PATTERN.test(candidate)) {
      candidate = [
        candidate.slice(0, 8),
        candidate.slice(8, 12),
        candidate.slice(12, 16),
        candidate.slice(16, 20),
        candidate.slice(20),
      ].join('-');
    }
    if (!UUID_PATTERN.test(candidate)) {
      throw new TypeError(`Invalid UUID: ${text}`);
    }
    return new Uuid(candidate);
  }

  /** Random (version 4) UUID */
  static random(): Uuid {
    return new Uuid(crypto.randomUUID());
  }

  equals(other: Uuid): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}

/** Canonical byte form of a user identity */
export function normalizeUserId(id: UserIdentity): Uint8Array {
  if (id instanceof Uint8Array) return id;
  return textEncoder.encode(userIdText(id));
}

/** Text form of a text or UUID identity, used as the default user name */
export function userIdText(id: string | Uuid): string {
  return typeof id === 'string' ? id : id.toString();
}
