/**
 * PasskeyBridgeClient — page side of the long-poll bridge.
 *
 * @ai_context Polls the server's bridge routes for calls queued by a
 * PasskeyProvider, runs each one through the handlers and posts the answer
 * back. Calls run concurrently with the poll loop: a `cancel` has to reach
 * the page while the WebAuthn prompt it cancels is still open.
 *
 * Usage:
 *   const bridge = new PasskeyBridgeClient({
 *     serverUrl: '/api/passkey-bridge',
 *     circuitId: sessionCircuitId,
 *   });
 *   bridge.start();
 *   // on page teardown
 *   await bridge.stop();
 */

import { z } from 'zod';

import { BRIDGE_METHODS, createBrowserHandlers } from './browser-handlers.js';
import type { BridgeHandlers } from './browser-handlers.js';
import { BridgeClientError, toWireError } from './errors.js';

export interface PasskeyBridgeClientConfig {
  /**
   * Base URL of the bridge routes.
   * E.g. '/api/passkey-bridge' or 'https://app.example.com/passkey-bridge'
   */
  serverUrl: string;

  /** Circuit this page answers for; the server opens it with `hub.invoker(circuitId)` */
  circuitId: string;

  /**
   * Optional fetch function (e.g. if you need to add auth headers).
   * Defaults to globalThis.fetch.
   */
  fetch?: typeof globalThis.fetch;

  /** Optional headers to include in every request */
  headers?: Record<string, string>;

  /** Pause after a failed poll before polling again. Default: 1000 */
  retryDelayMs?: number;

  /** Defaults to createBrowserHandlers() */
  handlers?: BridgeHandlers;

  /** Poll and reply failures. Defaults to console.error. */
  onError?: (err: unknown) => void;
}

const pollResponseSchema = z.object({
  call: z
    .object({
      callId: z.string().min(1),
      method: z.enum(BRIDGE_METHODS),
      args: z.unknown(),
    })
    .nullable(),
});

type BridgeCall = NonNullable<z.infer<typeof pollResponseSchema>['call']>;

export class PasskeyBridgeClient {
  private serverUrl: string;
  private circuitId: string;
  private fetchFn: typeof globalThis.fetch;
  private headers: Record<string, string>;
  private retryDelayMs: number;
  private handlers: BridgeHandlers;
  private onError: (err: unknown) => void;

  private running = false;
  private loop: Promise<void> | null = null;
  private pollAbort: AbortController | null = null;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(config: PasskeyBridgeClientConfig) {
    this.serverUrl = config.serverUrl.replace(/\/$/, '');
    this.circuitId = config.circuitId;
    this.fetchFn = config.fetch ?? globalThis.fetch.bind(globalThis);
    this.headers = config.headers ?? {};
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.handlers = config.handlers ?? createBrowserHandlers();
    this.onError = config.onError ?? ((err) => console.error('[passkeyflow] Bridge client error:', err));
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Calls whose answer has not been posted yet */
  get pendingCalls(): number {
    return this.inFlight.size;
  }

  /**
   * Fetch one call and start running it. Resolves once the call is
   * dispatched, not when it finishes; false when the poll came back empty.
   */
  async pollOnce(signal?: AbortSignal): Promise<boolean> {
    const data = await this.post('/poll', { circuitId: this.circuitId }, signal);
    const parsed = pollResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new BridgeClientError('INVALID_RESPONSE', 'Bridge poll returned unexpected data');
    }
    if (!parsed.data.call) return false;

    this.dispatch(parsed.data.call);
    return true;
  }

  /** Poll until `stop()` */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.loop = this.run();
  }

  /** End the poll loop. Calls already dispatched keep running; see `drain()`. */
  async stop(): Promise<void> {
    this.running = false;
    this.pollAbort?.abort();
    await this.loop;
    this.loop = null;
  }

  /** Wait until every dispatched call has posted its answer */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  // --- Internal helpers ---

  private async run(): Promise<void> {
    while (this.running) {
      this.pollAbort = new AbortController();
      try {
        await this.pollOnce(this.pollAbort.signal);
      } catch (err) {
        if (!this.running) break;
        this.onError(err);
        await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs));
      }
    }
    this.pollAbort = null;
  }

  private dispatch(call: BridgeCall): void {
    const task: Promise<void> = this.execute(call).then(() => {
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);
  }

  private async execute(call: BridgeCall): Promise<void> {
    const handler = this.handlers[call.method];

    // Cancellation is fire-and-forget on the server side
    if (call.method === 'cancel') {
      try {
        await handler(call.args);
      } catch (err) {
        this.onError(err);
      }
      return;
    }

    let outcome: { ok: true; value: unknown } | { ok: false; error: { name: string; message: string } };
    try {
      outcome = { ok: true, value: (await handler(call.args)) ?? null };
    } catch (err) {
      outcome = { ok: false, error: toWireError(err) };
    }

    try {
      await this.post('/result', { circuitId: this.circuitId, callId: call.callId, outcome });
    } catch (err) {
      this.onError(err);
    }
  }

  private async post(path: string, body: unknown, signal?: AbortSignal): Promise<unknown> {
    let res: Response;
    try {
      res = await this.fetchFn(`${this.serverUrl}${path}`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...this.headers,
        },
        body: JSON.stringify(body),
        signal,
      });
    } catch (err) {
      throw new BridgeClientError('NETWORK_ERROR', err instanceof Error ? err.message : String(err));
    }

    let data: unknown;
    try {
      data = await res.json();
    } catch {
      throw new BridgeClientError('INVALID_RESPONSE', `Bridge ${path} returned a non-JSON body`, res.status);
    }
    if (!res.ok) {
      const message = z.object({ error: z.string() }).safeParse(data);
      throw new BridgeClientError(
        'SERVER_ERROR',
        message.success ? message.data.error : `HTTP ${res.status}`,
        res.status,
      );
    }
    return data;
  }
}
