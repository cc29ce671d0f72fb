/**
 * Runs bridge calls against the WebAuthn API.
 *
 * @ai_context Options arrive exactly as the server generated them
 * (@simplewebauthn JSON, binary fields base64url) and go straight into
 * @simplewebauthn/browser. Answers are flattened to the bridge payloads the
 * server validates: every binary field stays unpadded base64url.
 */

import {
  WebAuthnAbortService,
  startAuthentication,
  startRegistration,
} from '@simplewebauthn/browser';
import { z } from 'zod';

import { arePasskeysSupported, isConditionalMediationAvailable } from './detect.js';
import { isAbortError } from './errors.js';

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

export type BridgeHandler = (args: unknown) => Promise<unknown>;
export type BridgeHandlers = Record<BridgeMethod, BridgeHandler>;

type RegistrationOptionsJSON = Parameters<typeof startRegistration>[0]['optionsJSON'];
type AuthenticationOptionsJSON = Parameters<typeof startAuthentication>[0]['optionsJSON'];
type RegistrationResponse = Awaited<ReturnType<typeof startRegistration>>;
type AuthenticationResponse = Awaited<ReturnType<typeof startAuthentication>>;

export interface CreationPayload {
  credentialId: string;
  attestationObject: string;
  clientDataJson: string;
  transports?: RegistrationResponse['response']['transports'];
}

export interface RetrievalPayload {
  userHandle: string;
  credentialId: string;
  authenticatorData: string;
  clientDataJson: string;
  signature: string;
}

function hasChallenge(value: unknown): boolean {
  return typeof value === 'object' && value !== null && 'challenge' in value && typeof value.challenge === 'string';
}

const creationArgsSchema = z.object({
  options: z.custom<RegistrationOptionsJSON>(hasChallenge, 'expected creation options'),
  ref: z.string().optional(),
});

const requestArgsSchema = z.object({
  options: z.custom<AuthenticationOptionsJSON>(hasChallenge, 'expected request options'),
  ref: z.string().optional(),
});

const cancelArgsSchema = z.object({ ref: z.string() });

export function toCreationPayload(credential: RegistrationResponse): CreationPayload {
  return {
    credentialId: credential.rawId,
    attestationObject: credential.response.attestationObject,
    clientDataJson: credential.response.clientDataJSON,
    transports: credential.response.transports,
  };
}

export function toRetrievalPayload(credential: AuthenticationResponse): RetrievalPayload {
  return {
    userHandle: credential.response.userHandle ?? '',
    credentialId: credential.rawId,
    authenticatorData: credential.response.authenticatorData,
    clientDataJson: credential.response.clientDataJSON,
    signature: credential.response.signature,
  };
}

/** Handlers for every bridge method, backed by @simplewebauthn/browser */
export function createBrowserHandlers(): BridgeHandlers {
  // ref of the prompt on screen; starting a new one replaces the old
  let active: string | undefined;

  async function prompt<T>(ref: string | undefined, run: () => Promise<T>): Promise<T> {
    active = ref;
    try {
      return await run();
    } finally {
      if (active === ref) active = undefined;
    }
  }

  return {
    init: async () => ({ protocol: BRIDGE_PROTOCOL_VERSION }),

    arePasskeysSupported: async () => arePasskeysSupported(),

    isConditionalMediationAvailable: () => isConditionalMediationAvailable(),

    createPasskey: async (args) => {
      const { options, ref } = creationArgsSchema.parse(args);
      return prompt(ref, async () => toCreationPayload(await startRegistration({ optionsJSON: options })));
    },

    getPasskey: async (args) => {
      const { options, ref } = requestArgsSchema.parse(args);
      return prompt(ref, async () => toRetrievalPayload(await startAuthentication({ optionsJSON: options })));
    },

    getPasskeyConditional: async (args) => {
      const { options, ref } = requestArgsSchema.parse(args);
      return prompt(ref, async () => {
        try {
          return toRetrievalPayload(
            await startAuthentication({ optionsJSON: options, useBrowserAutofill: true }),
          );
        } catch (err) {
          // Autofill aborted before the user picked anything
          if (isAbortError(err)) return null;
          throw err;
        }
      });
    },

    cancel: async (args) => {
      const { ref } = cancelArgsSchema.parse(args);
      // A prompt that already ended, or was never shown, leaves the current one alone
      if (ref === active) WebAuthnAbortService.cancelCeremony();
      return null;
    },
  };
}
