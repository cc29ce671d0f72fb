/**
 * Per-ceremony state and the guarded calls into both collaborators.
 *
 *   idle → challenge-issued → awaiting-client → [verifying] → completed
 *                         ↘           ↘              ↘
 *                          cancelled | failed (from any live phase)
 *
 * Registration passes through `verifying`; retrieval completes straight from
 * `awaiting-client`. Verification of a retrieved passkey is stateless and has
 * no ceremony of its own.
 */

import { PasskeyError } from './errors.js';
import { raceAbort } from './lifecycle.js';
import type { PasskeyLogger } from './logger.js';
import type { BrowserBridge, CredentialVerifier } from './types.js';

export type CeremonyKind = 'registration' | 'retrieval' | 'conditional-retrieval';

export type CeremonyPhase =
  | 'idle'
  | 'challenge-issued'
  | 'awaiting-client'
  | 'verifying'
  | 'completed'
  | 'cancelled'
  | 'failed';

const TRANSITIONS: Record<CeremonyPhase, readonly CeremonyPhase[]> = {
  idle: ['challenge-issued', 'cancelled', 'failed'],
  'challenge-issued': ['awaiting-client', 'cancelled', 'failed'],
  'awaiting-client': ['verifying', 'completed', 'cancelled', 'failed'],
  verifying: ['completed', 'cancelled', 'failed'],
  completed: [],
  cancelled: [],
  failed: [],
};

let nextCeremonyId = 1;

export class Ceremony {
  readonly kind: CeremonyKind;
  readonly id: number;
  private current: CeremonyPhase = 'idle';
  private readonly logger: PasskeyLogger;

  constructor(kind: CeremonyKind, logger: PasskeyLogger) {
    this.kind = kind;
    this.id = nextCeremonyId++;
    this.logger = logger;
  }

  get phase(): CeremonyPhase {
    return this.current;
  }

  get isSettled(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  advance(next: CeremonyPhase): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal ${this.kind} transition: ${this.current} -> ${next}`);
    }
    this.logger.debug(`${this.kind}#${this.id}: ${this.current} -> ${next}`);
    this.current = next;
  }

  /** Move to the terminal phase matching a failure. No-op once settled. */
  settle(error: PasskeyError): void {
    if (this.isSettled) return;
    this.advance(error.isExpected ? 'cancelled' : 'failed');
  }
}

/** Everything an orchestrator needs for one ceremony */
export interface CeremonyContext {
  bridge: BrowserBridge;
  verifier: CredentialVerifier;
  ceremony: Ceremony;
  signal: AbortSignal;
}

/** Invoke the browser bridge; an abort wins even if the bridge ignores the signal */
export async function callBridge<T>(call: () => Promise<T>, signal: AbortSignal): Promise<T> {
  try {
    return await raceAbort(new Promise<T>((resolve) => resolve(call())), signal);
  } catch (err) {
    throw PasskeyError.fromBridgeError(err);
  }
}

/** Invoke the credential verifier; anything it throws is a rejection */
export async function callVerifier<T>(call: () => Promise<T>, signal: AbortSignal): Promise<T> {
  try {
    return await raceAbort(new Promise<T>((resolve) => resolve(call())), signal);
  } catch (err) {
    throw PasskeyError.fromVerifierError(err);
  }
}

/** Drop empty ids from an allow/exclude list */
export function nonEmptyDescriptors(ids: Iterable<Uint8Array> | undefined): Uint8Array[] {
  if (!ids) return [];
  return Array.from(ids).filter((id) => id.length > 0);
}
