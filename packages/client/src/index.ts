/**
 * @passkeyflow/client
 *
 * Browser side of the passkeyflow bridge: answers WebAuthn calls that
 * @passkeyflow/server queues for this page.
 * Uses @simplewebauthn/browser for the WebAuthn ceremony.
 *
 * @ai_context The page never generates challenges. It runs exactly the
 * options the server sends and hands back the raw attestation/assertion,
 * which the server verifies.
 */

export { PasskeyBridgeClient } from './bridge-client.js';
export type { PasskeyBridgeClientConfig } from './bridge-client.js';
export {
  createBrowserHandlers,
  toCreationPayload,
  toRetrievalPayload,
  BRIDGE_METHODS,
  BRIDGE_PROTOCOL_VERSION,
} from './browser-handlers.js';
export type {
  BridgeHandler,
  BridgeHandlers,
  BridgeMethod,
  CreationPayload,
  RetrievalPayload,
} from './browser-handlers.js';
export { BridgeClientError, toWireError, isAbortError } from './errors.js';
export type { BridgeClientErrorCode, WireError } from './errors.js';
export { arePasskeysSupported, isConditionalMediationAvailable } from './detect.js';
