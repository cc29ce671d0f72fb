/**
 * Stateless verification of a passkey previously returned by retrieval.
 */

import type { AuthenticationResponseJSON } from '@simplewebauthn/server';

import { callVerifier } from './ceremony.js';
import { bytesEqual, toBase64Url } from './encoding.js';
import { PasskeyError } from './errors.js';
import type { CredentialVerifier, Passkey, PasskeyOptions, VerifiedAssertion } from './types.js';

/**
 * Counters are neither stored nor advanced by this library, so every
 * verification starts from zero and cloned authenticators go undetected.
 */
const STORED_SIGNATURE_COUNTER = 0;

export interface VerificationInput {
  passkey: Passkey;
  expectedUserHandle: Uint8Array;
  storedPublicKey: Uint8Array;
  options: PasskeyOptions;
}

export async function runVerification(
  verifier: CredentialVerifier,
  input: VerificationInput,
  signal: AbortSignal,
): Promise<VerifiedAssertion> {
  const { passkey, options } = input;
  const { challenge, authenticatorData, clientDataJson, signature } = passkey;

  if (!challenge || !authenticatorData || !clientDataJson || !signature) {
    throw new PasskeyError(
      'VERIFICATION_REJECTED',
      'Passkey carries no assertion proof; only passkeys returned by a retrieval can be verified',
    );
  }

  const credentialId = toBase64Url(passkey.credentialId);
  const response: AuthenticationResponseJSON = {
    id: credentialId,
    rawId: credentialId,
    type: 'public-key',
    response: {
      authenticatorData: toBase64Url(authenticatorData),
      clientDataJSON: toBase64Url(clientDataJson),
      signature: toBase64Url(signature),
      userHandle: passkey.userHandle.length > 0 ? toBase64Url(passkey.userHandle) : undefined,
    },
    clientExtensionResults: {},
  };

  const verdict = await callVerifier(
    () =>
      verifier.makeAssertion({
        response,
        expected: {
          challenge: toBase64Url(challenge),
          rpId: options.domain,
          origins: options.origins,
          requireUserVerification: options.userVerification === 'required',
        },
        storedPublicKey: input.storedPublicKey,
        storedSignatureCounter: STORED_SIGNATURE_COUNTER,
        isUserHandleOwnerOfCredentialId: async (userHandle) =>
          bytesEqual(userHandle, input.expectedUserHandle),
        signal,
      }),
    signal,
  );

  if (!verdict.verified) {
    throw new PasskeyError('VERIFICATION_REJECTED', 'Assertion signature did not verify');
  }

  return { credentialId: passkey.credentialId, signatureCounter: verdict.signatureCounter };
}
