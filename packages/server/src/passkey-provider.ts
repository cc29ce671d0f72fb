/**
 * PasskeyProvider — server-side entry point for passkey ceremonies.
 *
 * One provider serves one browser session. It opens the browser bridge
 * lazily (once, however many ceremonies race for it) and owns a cancellation
 * scope that every ceremony links into, so `dispose()` stops all of them.
 *
 * Flow:
 *   Registration: createPasskey → browser creates credential → attestation verified inline
 *   Authentication: getPasskey → look up stored public key by credentialId → verifyPasskey
 *
 * Every operation comes in two forms. `try*` returns a CeremonyResult whose
 * error says why it failed; the plain form flattens failures to null/false.
 */

import { runRetrieval } from './assertion.js';
import { Ceremony } from './ceremony.js';
import type { CeremonyContext, CeremonyKind } from './ceremony.js';
import { parsePasskeyOptions } from './config.js';
import { decodeKeyText, toBase64Url } from './encoding.js';
import { PasskeyError, failed, succeeded } from './errors.js';
import type { CeremonyResult } from './errors.js';
import { normalizeUserId, userIdText } from './identity.js';
import { CancellationScope, InitOnce, raceAbort } from './lifecycle.js';
import { consoleLogger } from './logger.js';
import type { PasskeyLogger } from './logger.js';
import { runRegistration } from './registration.js';
import { SimpleWebAuthnVerifier } from './simplewebauthn-verifier.js';
import type {
  BrowserBridge,
  CreatePasskeyOptions,
  CredentialVerifier,
  GetPasskeyOptions,
  Passkey,
  PasskeyOptions,
  PasskeyProviderConfig,
  PasskeyUser,
  UserIdentity,
  VerifiedAssertion,
  VerifyPasskeyOptions,
} from './types.js';
import { runVerification } from './verification.js';

function unwrap<T>(result: CeremonyResult<T>): T | null {
  return result.ok ? result.value : null;
}

export class PasskeyProvider {
  private readonly options: PasskeyOptions;
  private readonly verifier: CredentialVerifier;
  private readonly logger: PasskeyLogger;
  private readonly bridge: InitOnce<BrowserBridge>;
  private readonly scope = new CancellationScope();
  private disposed = false;

  constructor(config: PasskeyProviderConfig) {
    this.options = parsePasskeyOptions(config.options);
    this.verifier = config.verifier ?? new SimpleWebAuthnVerifier();
    this.logger = config.logger ?? consoleLogger;
    this.bridge = new InitOnce(() => config.loadBridge(this.scope.signal));
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  // ============================================================
  // Capability probes
  // ============================================================

  /** False when the browser lacks WebAuthn or the bridge cannot be reached */
  arePasskeysSupported(signal?: AbortSignal): Promise<boolean> {
    return this.probe('arePasskeysSupported', (bridge, s) => bridge.arePasskeysSupported(s), signal);
  }

  /** Whether the browser can offer passkeys through autofill */
  isConditionalMediationAvailable(signal?: AbortSignal): Promise<boolean> {
    return this.probe(
      'isConditionalMediationAvailable',
      (bridge, s) => bridge.isConditionalMediationAvailable(s),
      signal,
    );
  }

  // ============================================================
  // Registration
  // ============================================================

  /**
   * Register a new passkey for a user.
   *
   * Text and UUID ids default the user name to the id's text form; the
   * display name defaults to the user name. The returned passkey's
   * `userHandle`, `credentialId` and `publicKey` are what to store.
   */
  tryCreatePasskey(user: PasskeyUser, opts: CreatePasskeyOptions = {}): Promise<CeremonyResult<Passkey>> {
    const userName =
      user.name ?? (user.id instanceof Uint8Array ? toBase64Url(user.id) : userIdText(user.id));

    return this.runCeremony('registration', opts.signal, (ctx) =>
      runRegistration(ctx, {
        options: opts.options ?? this.options,
        userId: normalizeUserId(user.id),
        userName,
        displayName: user.displayName ?? userName,
        excludeCredentials: opts.excludeCredentials,
      }),
    );
  }

  async createPasskey(user: PasskeyUser, opts?: CreatePasskeyOptions): Promise<Passkey | null> {
    return unwrap(await this.tryCreatePasskey(user, opts));
  }

  // ============================================================
  // Retrieval
  // ============================================================

  /** Prompt the user for a passkey. Verify the result with `verifyPasskey`. */
  tryGetPasskey(opts: GetPasskeyOptions = {}): Promise<CeremonyResult<Passkey>> {
    return this.runCeremony('retrieval', opts.signal, (ctx) =>
      runRetrieval(ctx, {
        options: opts.options ?? this.options,
        allowCredentials: opts.allowCredentials,
        conditional: false,
      }),
    );
  }

  async getPasskey(opts?: GetPasskeyOptions): Promise<Passkey | null> {
    return unwrap(await this.tryGetPasskey(opts));
  }

  /**
   * Offer passkeys through autofill. Fails with NO_SELECTION (null from
   * `getPasskeyConditional`) when the user never picks one.
   */
  tryGetPasskeyConditional(opts: GetPasskeyOptions = {}): Promise<CeremonyResult<Passkey>> {
    return this.runCeremony('conditional-retrieval', opts.signal, (ctx) =>
      runRetrieval(ctx, {
        options: opts.options ?? this.options,
        allowCredentials: opts.allowCredentials,
        conditional: true,
      }),
    );
  }

  async getPasskeyConditional(opts?: GetPasskeyOptions): Promise<Passkey | null> {
    return unwrap(await this.tryGetPasskeyConditional(opts));
  }

  // ============================================================
  // Verification
  // ============================================================

  /**
   * Verify a passkey returned by `getPasskey`/`getPasskeyConditional`.
   *
   * @param expectedUserHandle - The user the stored credential belongs to
   * @param storedPublicKey - Key saved at registration, as bytes or base64/base64url text
   */
  async tryVerifyPasskey(
    passkey: Passkey,
    expectedUserHandle: UserIdentity,
    storedPublicKey: Uint8Array | string,
    opts: VerifyPasskeyOptions = {},
  ): Promise<CeremonyResult<VerifiedAssertion>> {
    if (this.disposed) {
      return this.fail('verification', new PasskeyError('CANCELLED', 'Passkey provider is disposed'));
    }

    let publicKey: Uint8Array;
    try {
      publicKey = typeof storedPublicKey === 'string' ? decodeKeyText(storedPublicKey) : storedPublicKey;
    } catch (err) {
      return this.fail('verification', PasskeyError.fromVerifierError(err));
    }

    const scope = this.scope.child(opts.signal);
    try {
      const verified = await runVerification(
        this.verifier,
        {
          passkey,
          expectedUserHandle: normalizeUserId(expectedUserHandle),
          storedPublicKey: publicKey,
          options: opts.options ?? this.options,
        },
        scope.signal,
      );
      return succeeded(verified);
    } catch (err) {
      return this.fail('verification', PasskeyError.fromVerifierError(err));
    } finally {
      scope.close();
    }
  }

  async verifyPasskey(
    passkey: Passkey,
    expectedUserHandle: UserIdentity,
    storedPublicKey: Uint8Array | string,
    opts?: VerifyPasskeyOptions,
  ): Promise<boolean> {
    return (await this.tryVerifyPasskey(passkey, expectedUserHandle, storedPublicKey, opts)).ok;
  }

  // ============================================================
  // Lifetime
  // ============================================================

  /**
   * Abort every in-flight ceremony and release the bridge. A bridge still
   * loading is awaited and released once it arrives. Ceremonies requested
   * afterwards fail immediately with CANCELLED.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    this.scope.cancel(new PasskeyError('CANCELLED', 'Passkey provider was disposed'));

    const loading = this.bridge.current();
    if (!loading) return;
    let bridge: BrowserBridge;
    try {
      bridge = await loading;
    } catch (err) {
      this.logger.debug('Browser bridge never loaded, nothing to dispose', err);
      return;
    }
    if (!bridge.dispose) return;
    try {
      await bridge.dispose();
    } catch (err) {
      this.logger.warn('Browser bridge failed to dispose', err);
    }
  }

  // --- Internal helpers ---

  private async loadBridge(signal: AbortSignal): Promise<BrowserBridge> {
    try {
      return await raceAbort(this.bridge.get(), signal);
    } catch (err) {
      if (err instanceof PasskeyError) throw err;
      throw new PasskeyError('TRANSPORT_FAULT', 'Browser bridge could not be loaded', { cause: err });
    }
  }

  private async probe(
    name: string,
    call: (bridge: BrowserBridge, signal: AbortSignal) => Promise<boolean>,
    callerSignal: AbortSignal | undefined,
  ): Promise<boolean> {
    if (this.disposed) return false;

    const scope = this.scope.child(callerSignal);
    try {
      const bridge = await this.loadBridge(scope.signal);
      return await raceAbort(call(bridge, scope.signal), scope.signal);
    } catch (err) {
      this.logger.debug(`${name} probe failed, reporting false`, err);
      return false;
    } finally {
      scope.close();
    }
  }

  private async runCeremony<T>(
    kind: CeremonyKind,
    callerSignal: AbortSignal | undefined,
    body: (ctx: CeremonyContext) => Promise<T>,
  ): Promise<CeremonyResult<T>> {
    const ceremony = new Ceremony(kind, this.logger);
    if (this.disposed) {
      return this.fail(kind, new PasskeyError('CANCELLED', 'Passkey provider is disposed'), ceremony);
    }

    const scope = this.scope.child(callerSignal);
    try {
      const bridge = await this.loadBridge(scope.signal);
      const value = await body({ bridge, verifier: this.verifier, ceremony, signal: scope.signal });
      return succeeded(value);
    } catch (err) {
      return this.fail(kind, PasskeyError.fromBridgeError(err), ceremony);
    } finally {
      scope.close();
    }
  }

  private fail<T>(label: string, error: PasskeyError, ceremony?: Ceremony): CeremonyResult<T> {
    ceremony?.settle(error);
    if (error.isExpected) {
      this.logger.debug(`${label} ended (${error.code}): ${error.message}`);
    } else {
      this.logger.warn(`${label} failed (${error.code}): ${error.message}`, error.cause ?? error);
    }
    return failed(error);
  }
}
