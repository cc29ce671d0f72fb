/**
 * Registration ceremony: issue a challenge, let the browser create a
 * credential, verify the attestation inline, and hand back the passkey.
 */

import { generateRegistrationOptions } from '@simplewebauthn/server';
import type {
  PublicKeyCredentialCreationOptionsJSON,
  RegistrationResponseJSON,
} from '@simplewebauthn/server';

import { callBridge, callVerifier, nonEmptyDescriptors } from './ceremony.js';
import type { CeremonyContext } from './ceremony.js';
import { generateChallenge } from './challenge.js';
import { toBase64Url } from './encoding.js';
import type { CreationPayload, Passkey, PasskeyOptions } from './types.js';

/** COSE algorithms offered to the authenticator, most preferred first: ES256, RS256, EdDSA */
export const SUPPORTED_ALGORITHM_IDS: readonly number[] = [-7, -257, -8];

export interface RegistrationInput {
  options: PasskeyOptions;
  /** Normalized user handle */
  userId: Uint8Array;
  userName: string;
  displayName: string;
  excludeCredentials?: Iterable<Uint8Array>;
}

export async function buildCreationRequest(
  input: RegistrationInput,
  challenge: Uint8Array,
): Promise<PublicKeyCredentialCreationOptionsJSON> {
  const exclude = nonEmptyDescriptors(input.excludeCredentials);

  const request = await generateRegistrationOptions({
    rpName: input.options.appName,
    rpID: input.options.domain,
    userID: input.userId.slice(),
    userName: input.userName,
    userDisplayName: input.displayName,
    challenge: challenge.slice(),
    attestationType: 'none',
    supportedAlgorithmIDs: [...SUPPORTED_ALGORITHM_IDS],
    excludeCredentials: exclude.map((id) => ({ id: toBase64Url(id) })),
    authenticatorSelection: {
      residentKey: 'preferred',
      userVerification: input.options.userVerification ?? 'preferred',
    },
  });

  // An empty exclude list is omitted rather than sent
  if (exclude.length === 0) {
    const { excludeCredentials: _omitted, ...withoutExclude } = request;
    return withoutExclude;
  }
  return request;
}

function toRegistrationResponse(payload: CreationPayload): RegistrationResponseJSON {
  return {
    id: payload.credentialId,
    rawId: payload.credentialId,
    type: 'public-key',
    response: {
      clientDataJSON: payload.clientDataJson,
      attestationObject: payload.attestationObject,
      transports: payload.transports,
    },
    clientExtensionResults: {},
  };
}

export async function runRegistration(ctx: CeremonyContext, input: RegistrationInput): Promise<Passkey> {
  const { ceremony, signal } = ctx;
  const { options } = input;

  const request = await buildCreationRequest(input, generateChallenge());
  ceremony.advance('challenge-issued');

  ceremony.advance('awaiting-client');
  const payload = await callBridge(() => ctx.bridge.createPasskey(request, signal), signal);

  ceremony.advance('verifying');
  const credential = await callVerifier(
    () =>
      ctx.verifier.makeNewCredential({
        response: toRegistrationResponse(payload),
        request,
        expected: {
          challenge: request.challenge,
          rpId: options.domain,
          origins: options.origins,
          requireUserVerification: options.userVerification === 'required',
        },
        // Duplicate registrations are the caller's policy, decided against its own store
        isCredentialIdUnique: async () => true,
        signal,
      }),
    signal,
  );

  ceremony.advance('completed');
  return {
    userHandle: input.userId,
    credentialId: credential.credentialId,
    publicKey: credential.publicKey,
  };
}
