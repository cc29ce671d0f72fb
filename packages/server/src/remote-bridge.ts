/**
 * BrowserBridge over a message channel to the browser.
 *
 * A server-rendered app reaches page script through some invoke-and-wait
 * channel (a long-poll circuit, a websocket, a framework's JS interop). That
 * channel is a `BridgeInvoker`; this module turns it into a `BrowserBridge`
 * and treats every answer from the browser as untrusted input.
 */

import { z } from 'zod';

import { PasskeyError } from './errors.js';
import type { BrowserBridge, CreationPayload, RetrievalPayload } from './types.js';

export const BRIDGE_PROTOCOL_VERSION = 1;

export const BRIDGE_METHODS = [
  'init',
  'arePasskeysSupported',
  'isConditionalMediationAvailable',
  'createPasskey',
  'getPasskey',
  'getPasskeyConditional',
  'cancel',
] as const;

export type BridgeMethod = (typeof BRIDGE_METHODS)[number];

export interface BridgeInvoker {
  /** Send a call to the browser and wait for its answer */
  invoke(method: BridgeMethod, args: unknown, signal: AbortSignal): Promise<unknown>;
  /** Send a message that expects no answer */
  notify(method: BridgeMethod, args: unknown): void;
  /** Tear the channel down; pending calls reject */
  close?(): void;
}

// ============================================================
// Zod Schemas — browser answers
// ============================================================

const base64url = z.string().regex(/^[A-Za-z0-9_-]*$/, 'expected unpadded base64url');

const transportSchema = z.enum(['ble', 'cable', 'hybrid', 'internal', 'nfc', 'smart-card', 'usb']);

const handshakeSchema = z.object({ protocol: z.number().int() });

const creationPayloadSchema = z.object({
  credentialId: base64url.min(1),
  attestationObject: base64url.min(1),
  clientDataJson: base64url.min(1),
  transports: z.array(transportSchema).optional(),
});

const retrievalPayloadSchema = z.object({
  userHandle: base64url,
  credentialId: base64url.min(1),
  authenticatorData: base64url.min(1),
  clientDataJson: base64url.min(1),
  signature: base64url.min(1),
});

class RemoteBridge implements BrowserBridge {
  private readonly invoker: BridgeInvoker;
  private lastRef = 0;

  constructor(invoker: BridgeInvoker) {
    this.invoker = invoker;
  }

  arePasskeysSupported(signal: AbortSignal): Promise<boolean> {
    return this.call('arePasskeysSupported', {}, z.boolean(), signal);
  }

  isConditionalMediationAvailable(signal: AbortSignal): Promise<boolean> {
    return this.call('isConditionalMediationAvailable', {}, z.boolean(), signal);
  }

  createPasskey(request: unknown, signal: AbortSignal): Promise<CreationPayload> {
    return this.prompt('createPasskey', request, creationPayloadSchema, signal);
  }

  getPasskey(request: unknown, signal: AbortSignal): Promise<RetrievalPayload> {
    return this.prompt('getPasskey', request, retrievalPayloadSchema, signal);
  }

  getPasskeyConditional(request: unknown, signal: AbortSignal): Promise<RetrievalPayload | null> {
    return this.prompt('getPasskeyConditional', request, retrievalPayloadSchema.nullable(), signal);
  }

  async dispose(): Promise<void> {
    this.invoker.close?.();
  }

  /**
   * A call that opens a WebAuthn prompt. Each one carries a `ref` so that
   * aborting it cancels that prompt and no other the page has open.
   */
  private async prompt<T>(
    method: BridgeMethod,
    request: unknown,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal: AbortSignal,
  ): Promise<T> {
    this.lastRef += 1;
    const ref = String(this.lastRef);
    const onAbort = () => this.invoker.notify('cancel', { ref });
    signal.addEventListener('abort', onAbort, { once: true });
    try {
      return await this.call(method, { options: request, ref }, schema, signal);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  private async call<T>(
    method: BridgeMethod,
    args: unknown,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal: AbortSignal,
  ): Promise<T> {
    const raw = await this.invoker.invoke(method, args, signal);
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new PasskeyError('TRANSPORT_FAULT', `Browser returned a malformed ${method} answer`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}

/**
 * Handshake with the browser and return a bridge over `invoker`. Use it as
 * a provider's `loadBridge`. The invoker is closed when the handshake fails.
 */
export async function connectRemoteBridge(
  invoker: BridgeInvoker,
  signal: AbortSignal = new AbortController().signal,
): Promise<BrowserBridge> {
  try {
    const hello = handshakeSchema.safeParse(
      await invoker.invoke('init', { protocol: BRIDGE_PROTOCOL_VERSION }, signal),
    );
    if (!hello.success) {
      throw new PasskeyError('TRANSPORT_FAULT', 'Browser answered the handshake with an unexpected payload', {
        cause: hello.error,
      });
    }
    if (hello.data.protocol !== BRIDGE_PROTOCOL_VERSION) {
      throw new PasskeyError(
        'TRANSPORT_FAULT',
        `Browser speaks bridge protocol ${hello.data.protocol}, expected ${BRIDGE_PROTOCOL_VERSION}`,
      );
    }
  } catch (err) {
    invoker.close?.();
    throw err;
  }
  return new RemoteBridge(invoker);
}
