/**
 * Type definitions for @passkeyflow/server
 *
 * The two collaborator seams live here: `BrowserBridge` (the WebAuthn API
 * running in the user's browser) and `CredentialVerifier` (FIDO2 proof
 * verification). Apps can swap either one; storage is never touched.
 */

import type {
  AuthenticationResponseJSON,
  AuthenticatorTransportFuture,
  PublicKeyCredentialCreationOptionsJSON,
  PublicKeyCredentialRequestOptionsJSON,
  RegistrationResponseJSON,
} from '@simplewebauthn/server';

import type { Uuid } from './identity.js';
import type { PasskeyLogger } from './logger.js';

export type UserVerificationRequirement = 'required' | 'preferred' | 'discouraged';

/** Relying party settings for one ceremony */
export interface PasskeyOptions {
  /** Relying Party name shown to users (e.g. "My App") */
  appName: string;
  /**
   * Relying Party ID — bare registrable domain (e.g. "example.com").
   * Must be the effective domain of every entry in `origins`; a mismatch is
   * not rejected here, it makes every verification fail.
   */
  domain: string;
  /** Exact scheme + host + port origins (e.g. ["https://example.com"]) */
  origins: string[];
  /** Default: 'preferred'. Only 'required' makes verification demand the UV flag. */
  userVerification?: UserVerificationRequirement;
}

/** Anything that identifies a user: opaque bytes, text, or a UUID */
export type UserIdentity = Uint8Array | string | Uuid;

/** User passed to a registration ceremony. Byte identities need an explicit name. */
export type PasskeyUser =
  | { id: Uint8Array; name: string; displayName?: string }
  | { id: string | Uuid; name?: string; displayName?: string };

/**
 * A passkey produced by a ceremony.
 *
 * `publicKey` is only present on passkeys returned from registration. The
 * proof fields (`challenge`, `authenticatorData`, `clientDataJson`,
 * `signature`) are only present on passkeys returned from retrieval and exist
 * solely for the following `verifyPasskey` call: do not store them.
 */
export interface Passkey {
  /** Empty for non-discoverable credentials: look the owner up by credentialId */
  readonly userHandle: Uint8Array;
  readonly credentialId: Uint8Array;
  readonly publicKey?: Uint8Array;
  readonly challenge?: Uint8Array;
  readonly authenticatorData?: Uint8Array;
  readonly clientDataJson?: Uint8Array;
  readonly signature?: Uint8Array;
}

/** Persistable passkey fields as base64url text */
export interface PasskeyDescription {
  userHandle: string;
  credentialId: string;
  publicKey?: string;
}

/** Result of a successful `verifyPasskey` */
export interface VerifiedAssertion {
  credentialId: Uint8Array;
  /** Counter reported by the authenticator. Not persisted or compared by this library. */
  signatureCounter: number;
}

// ============================================================
// Browser bridge — all binary fields are unpadded base64url
// ============================================================

/** Attestation returned by the browser after `navigator.credentials.create()` */
export interface CreationPayload {
  credentialId: string;
  attestationObject: string;
  clientDataJson: string;
  transports?: AuthenticatorTransportFuture[];
}

/** Assertion returned by the browser after `navigator.credentials.get()` */
export interface RetrievalPayload {
  /** '' when the authenticator did not return a user handle */
  userHandle: string;
  credentialId: string;
  authenticatorData: string;
  clientDataJson: string;
  signature: string;
}

/**
 * Handle to the WebAuthn API in the user's browser.
 *
 * Every call may suspend for as long as the user takes to respond. Calls
 * should honour `signal`, but the provider does not rely on it: an aborted
 * ceremony stops waiting whether or not the bridge notices.
 */
export interface BrowserBridge {
  arePasskeysSupported(signal: AbortSignal): Promise<boolean>;
  isConditionalMediationAvailable(signal: AbortSignal): Promise<boolean>;
  createPasskey(
    request: PublicKeyCredentialCreationOptionsJSON,
    signal: AbortSignal,
  ): Promise<CreationPayload>;
  getPasskey(
    request: PublicKeyCredentialRequestOptionsJSON,
    signal: AbortSignal,
  ): Promise<RetrievalPayload>;
  /** Resolves null when the user never picked a credential from autofill */
  getPasskeyConditional(
    request: PublicKeyCredentialRequestOptionsJSON,
    signal: AbortSignal,
  ): Promise<RetrievalPayload | null>;
  /** Release the handle. Called once when the owning provider is disposed. */
  dispose?(): Promise<void>;
}

// ============================================================
// Credential verifier
// ============================================================

/** What the relying party expects the proof to be bound to */
export interface CeremonyExpectation {
  /** base64url challenge issued for this ceremony */
  challenge: string;
  rpId: string;
  origins: string[];
  requireUserVerification: boolean;
}

export interface MakeNewCredentialParams {
  response: RegistrationResponseJSON;
  request: PublicKeyCredentialCreationOptionsJSON;
  expected: CeremonyExpectation;
  /** Resolve false to reject a credential id that is already registered */
  isCredentialIdUnique: (credentialId: Uint8Array) => Promise<boolean>;
  signal: AbortSignal;
}

export interface NewCredential {
  credentialId: Uint8Array;
  publicKey: Uint8Array;
  signatureCounter: number;
  transports?: AuthenticatorTransportFuture[];
}

export interface MakeAssertionParams {
  response: AuthenticationResponseJSON;
  expected: CeremonyExpectation;
  storedPublicKey: Uint8Array;
  storedSignatureCounter: number;
  /** Called with the assertion's user handle when the authenticator returned one */
  isUserHandleOwnerOfCredentialId: (userHandle: Uint8Array, credentialId: Uint8Array) => Promise<boolean>;
  signal: AbortSignal;
}

export interface AssertionVerdict {
  verified: boolean;
  signatureCounter: number;
}

/**
 * FIDO2 verification primitives. Implementations throw when a proof is
 * rejected (origin, rpId hash, challenge, attestation or signature).
 */
export interface CredentialVerifier {
  makeNewCredential(params: MakeNewCredentialParams): Promise<NewCredential>;
  makeAssertion(params: MakeAssertionParams): Promise<AssertionVerdict>;
}

// ============================================================
// Provider
// ============================================================

/** Configuration for PasskeyProvider */
export interface PasskeyProviderConfig {
  /** Defaults for every ceremony; individual calls may pass their own */
  options: PasskeyOptions;
  /**
   * Opens the browser bridge. Called at most once per successful load.
   * `signal` aborts when the provider is disposed; `dispose()` waits for a
   * load that is still running, so honour it.
   */
  loadBridge: (signal: AbortSignal) => Promise<BrowserBridge>;
  /** Defaults to SimpleWebAuthnVerifier */
  verifier?: CredentialVerifier;
  /** Defaults to consoleLogger */
  logger?: PasskeyLogger;
}

interface CeremonyCallOptions {
  /** Replaces the provider's default options for this call */
  options?: PasskeyOptions;
  /** Aborting it cancels the ceremony, like disposing the provider does */
  signal?: AbortSignal;
}

export interface CreatePasskeyOptions extends CeremonyCallOptions {
  /** Credential ids the user already registered; empty ids are ignored */
  excludeCredentials?: Iterable<Uint8Array>;
}

export interface GetPasskeyOptions extends CeremonyCallOptions {
  /**
   * Restrict the browser to these credential ids (non-discoverable keys).
   * Omit to let the browser offer any discoverable credential.
   */
  allowCredentials?: Iterable<Uint8Array>;
}

export type VerifyPasskeyOptions = CeremonyCallOptions;
