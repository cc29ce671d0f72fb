/**
 * Long-poll transport between a PasskeyProvider and page script.
 *
 * @ai_context The server cannot call into the browser, so calls are queued
 * per circuit (one circuit per page session) and the page fetches them with
 * `POST /poll`, runs them against `navigator.credentials`, and answers with
 * `POST /result`. `@passkeyflow/client`'s PasskeyBridgeClient is the page
 * side of this exchange.
 *
 * Usage:
 *   const hub = new BridgeHub();
 *   app.use('/api/passkey-bridge', createBridgeRoutes(hub));
 *   const provider = new PasskeyProvider({
 *     options,
 *     loadBridge: (signal) => connectRemoteBridge(hub.invoker(circuitId), signal),
 *   });
 *
 * CORS and sessions are the caller's concern. Anyone who knows a circuit id
 * can answer its calls, so derive circuit ids from something the page
 * session already authenticates.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';

import { PasskeyError } from './errors.js';
import { cancellationError } from './lifecycle.js';
import type { BridgeInvoker, BridgeMethod } from './remote-bridge.js';

/** One call waiting to be picked up by the page */
export interface BridgeCall {
  callId: string;
  method: BridgeMethod;
  args: unknown;
}

/** The page's answer to a call */
export type BridgeOutcome =
  | { ok: true; value?: unknown }
  | { ok: false; error: { name: string; message: string } };

interface PendingCall {
  resolve: (value: unknown) => void;
  reject: (err: unknown) => void;
}

interface Circuit {
  queue: BridgeCall[];
  pending: Map<string, PendingCall>;
  pollers: Array<(call: BridgeCall | null) => void>;
  nextId: number;
}

export interface BridgeHubConfig {
  /** How long `POST /poll` waits for a call before answering with none. Default: 25000 */
  pollTimeoutMs?: number;
}

export class BridgeHub {
  private readonly circuits = new Map<string, Circuit>();
  readonly pollTimeoutMs: number;

  constructor(config: BridgeHubConfig = {}) {
    this.pollTimeoutMs = config.pollTimeoutMs ?? 25_000;
  }

  hasCircuit(circuitId: string): boolean {
    return this.circuits.has(circuitId);
  }

  /** Open (or reuse) a circuit and return the invoker a RemoteBridge talks through */
  invoker(circuitId: string): BridgeInvoker {
    this.open(circuitId);
    return {
      invoke: (method, args, signal) => this.invoke(circuitId, method, args, signal),
      notify: (method, args) => {
        const circuit = this.circuits.get(circuitId);
        if (circuit) this.deliver(circuit, { callId: this.nextCallId(circuit), method, args });
      },
      close: () => this.closeCircuit(circuitId),
    };
  }

  /**
   * Next call for the page. Waits up to `waitMs` when the queue is empty and
   * resolves null if nothing arrives, the circuit is unknown or closes, or
   * `signal` aborts (the poll's client went away).
   */
  take(circuitId: string, waitMs = this.pollTimeoutMs, signal?: AbortSignal): Promise<BridgeCall | null> {
    const circuit = this.circuits.get(circuitId);
    if (!circuit || signal?.aborted) return Promise.resolve(null);

    const queued = circuit.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (waitMs <= 0) return Promise.resolve(null);

    return new Promise((resolve) => {
      const poller = (call: BridgeCall | null) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', withdraw);
        resolve(call);
      };
      const withdraw = () => {
        circuit.pollers = circuit.pollers.filter((p) => p !== poller);
        poller(null);
      };
      const timer = setTimeout(withdraw, waitMs);
      signal?.addEventListener('abort', withdraw, { once: true });
      circuit.pollers.push(poller);
    });
  }

  /**
   * Put back a call taken by a poll whose response never reached the page.
   * It goes to the front of the queue, or to a poll already waiting. A call
   * withdrawn in the meantime is dropped.
   */
  requeue(circuitId: string, call: BridgeCall): void {
    const circuit = this.circuits.get(circuitId);
    if (!circuit) return;
    // Notifications expect no answer, so they have no pending entry
    if (call.method !== 'cancel' && !circuit.pending.has(call.callId)) return;

    const poller = circuit.pollers.shift();
    if (poller) poller(call);
    else circuit.queue.unshift(call);
  }

  /** Hand the page's answer to the waiting call. False when no such call is pending. */
  settle(circuitId: string, callId: string, outcome: BridgeOutcome): boolean {
    const pending = this.circuits.get(circuitId)?.pending.get(callId);
    if (!pending) return false;

    this.circuits.get(circuitId)?.pending.delete(callId);
    if (outcome.ok) {
      pending.resolve(outcome.value ?? null);
    } else {
      const err = new Error(outcome.error.message);
      err.name = outcome.error.name;
      pending.reject(err);
    }
    return true;
  }

  /** Drop a circuit; its pending calls reject with CANCELLED and idle polls end */
  closeCircuit(circuitId: string): void {
    const circuit = this.circuits.get(circuitId);
    if (!circuit) return;
    this.circuits.delete(circuitId);

    const closed = new PasskeyError('CANCELLED', `Bridge circuit ${circuitId} was closed`);
    for (const pending of circuit.pending.values()) pending.reject(closed);
    for (const poller of circuit.pollers) poller(null);
    circuit.pending.clear();
    circuit.pollers = [];
    circuit.queue = [];
  }

  pendingCount(circuitId: string): number {
    return this.circuits.get(circuitId)?.pending.size ?? 0;
  }

  // --- Internal helpers ---

  private open(circuitId: string): Circuit {
    let circuit = this.circuits.get(circuitId);
    if (!circuit) {
      circuit = { queue: [], pending: new Map(), pollers: [], nextId: 0 };
      this.circuits.set(circuitId, circuit);
    }
    return circuit;
  }

  private nextCallId(circuit: Circuit): string {
    circuit.nextId += 1;
    return String(circuit.nextId);
  }

  private deliver(circuit: Circuit, call: BridgeCall): void {
    const poller = circuit.pollers.shift();
    if (poller) poller(call);
    else circuit.queue.push(call);
  }

  private invoke(circuitId: string, method: BridgeMethod, args: unknown, signal: AbortSignal): Promise<unknown> {
    const circuit = this.circuits.get(circuitId);
    if (!circuit) {
      return Promise.reject(new PasskeyError('TRANSPORT_FAULT', `Bridge circuit ${circuitId} is closed`));
    }
    if (signal.aborted) return Promise.reject(cancellationError(signal));

    const call: BridgeCall = { callId: this.nextCallId(circuit), method, args };
    return new Promise((resolve, reject) => {
      const onAbort = () => {
        circuit.queue = circuit.queue.filter((queued) => queued !== call);
        circuit.pending.delete(call.callId);
        reject(cancellationError(signal));
      };
      circuit.pending.set(call.callId, {
        resolve: (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        reject: (err) => {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        },
      });
      signal.addEventListener('abort', onAbort, { once: true });
      this.deliver(circuit, call);
    });
  }
}

// ============================================================
// Zod Schemas — strict input validation for every route
// ============================================================

const pollSchema = z.object({
  circuitId: z.string().min(1),
}).strict();

const resultSchema = z.object({
  circuitId: z.string().min(1),
  callId: z.string().min(1),
  outcome: z.discriminatedUnion('ok', [
    z.object({ ok: z.literal(true), value: z.unknown() }),
    z.object({
      ok: z.literal(false),
      error: z.object({ name: z.string().min(1), message: z.string() }),
    }),
  ]),
}).strict();

/**
 * Create the Express router the page polls.
 *
 * Routes:
 *   POST /poll   — Next queued call for a circuit ({ call: null } after the poll timeout)
 *   POST /result — Answer a call
 */
export function createBridgeRoutes(hub: BridgeHub): Router {
  const router = Router();

  router.post('/poll', async (req: Request, res: Response) => {
    try {
      const parsed = pollSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid request body', details: parsed.error.flatten().fieldErrors });
        return;
      }
      const { circuitId } = parsed.data;

      if (!hub.hasCircuit(circuitId)) {
        res.status(404).json({ error: 'Circuit not found' });
        return;
      }

      const gone = new AbortController();
      res.on('close', () => gone.abort());

      const call = await hub.take(circuitId, hub.pollTimeoutMs, gone.signal);
      if (gone.signal.aborted) {
        if (call) hub.requeue(circuitId, call);
        return;
      }
      res.json({ call });
    } catch (error) {
      console.error('[passkeyflow] Bridge poll error:', error);
      res.status(500).json({ error: 'Failed to poll bridge calls' });
    }
  });

  router.post('/result', async (req: Request, res: Response) => {
    try {
      const parsed = resultSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid request body', details: parsed.error.flatten().fieldErrors });
        return;
      }
      const { circuitId, callId, outcome } = parsed.data;

      if (!hub.settle(circuitId, callId, outcome)) {
        res.status(404).json({ error: 'Call not found' });
        return;
      }

      res.json({ ok: true });
    } catch (error) {
      console.error('[passkeyflow] Bridge result error:', error);
      res.status(500).json({ error: 'Failed to record bridge result' });
    }
  });

  return router;
}
