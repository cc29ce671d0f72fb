/**
 * @passkeyflow/server
 *
 * Passkey registration, retrieval and verification for server-rendered apps
 * whose server drives the WebAuthn API in the user's browser.
 *
 * @ai_context Challenges are generated and checked server-side. The browser
 * only ever sees creation/request options and answers with attestations or
 * assertions. Storage is the app's job: persist `userHandle`, `credentialId`
 * and `publicKey` from registration, then hand them back to `verifyPasskey`.
 */

export { PasskeyProvider } from './passkey-provider.js';
export { SimpleWebAuthnVerifier } from './simplewebauthn-verifier.js';
export { connectRemoteBridge, BRIDGE_METHODS, BRIDGE_PROTOCOL_VERSION } from './remote-bridge.js';
export type { BridgeInvoker, BridgeMethod } from './remote-bridge.js';
export { BridgeHub, createBridgeRoutes } from './express-bridge.js';
export type { BridgeCall, BridgeHubConfig, BridgeOutcome } from './express-bridge.js';
export { PasskeyError } from './errors.js';
export type { CeremonyResult, PasskeyErrorCode } from './errors.js';
export { Uuid, normalizeUserId } from './identity.js';
export { generateChallenge, CHALLENGE_LENGTH } from './challenge.js';
export { describePasskey, toBase64Url, fromBase64Url } from './encoding.js';
export { passkeyOptionsSchema, parsePasskeyOptions, passkeyOptionsFromEnv } from './config.js';
export { consoleLogger, silentLogger } from './logger.js';
export type { PasskeyLogger } from './logger.js';
export type { CeremonyKind, CeremonyPhase } from './ceremony.js';
export type {
  PasskeyOptions,
  UserVerificationRequirement,
  UserIdentity,
  PasskeyUser,
  Passkey,
  PasskeyDescription,
  VerifiedAssertion,
  CreationPayload,
  RetrievalPayload,
  BrowserBridge,
  CeremonyExpectation,
  MakeNewCredentialParams,
  NewCredential,
  MakeAssertionParams,
  AssertionVerdict,
  CredentialVerifier,
  PasskeyProviderConfig,
  CreatePasskeyOptions,
  GetPasskeyOptions,
  VerifyPasskeyOptions,
} from './types.js';
