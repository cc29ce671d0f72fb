/**
 * Default CredentialVerifier backed by @simplewebauthn/server.
 *
 * @simplewebauthn checks origin, rpId hash, challenge, flags, attestation
 * format and signature. The uniqueness and ownership predicates are applied
 * here around its calls.
 */

import { verifyAuthenticationResponse, verifyRegistrationResponse } from '@simplewebauthn/server';
import { isoBase64URL } from '@simplewebauthn/server/helpers';

import type {
  AssertionVerdict,
  CredentialVerifier,
  MakeAssertionParams,
  MakeNewCredentialParams,
  NewCredential,
} from './types.js';

export class SimpleWebAuthnVerifier implements CredentialVerifier {
  async makeNewCredential(params: MakeNewCredentialParams): Promise<NewCredential> {
    const { response, request, expected, isCredentialIdUnique, signal } = params;
    signal.throwIfAborted();

    const verification = await verifyRegistrationResponse({
      response,
      expectedChallenge: expected.challenge,
      expectedOrigin: expected.origins,
      expectedRPID: expected.rpId,
      requireUserVerification: expected.requireUserVerification,
      supportedAlgorithmIDs: request.pubKeyCredParams.map((param) => param.alg),
    });

    if (!verification.verified || !verification.registrationInfo) {
      throw new Error('Registration verification failed');
    }

    const { credential } = verification.registrationInfo;
    const credentialId = isoBase64URL.toBuffer(credential.id);

    if (!(await isCredentialIdUnique(credentialId))) {
      throw new Error('Credential id is already registered');
    }

    return {
      credentialId,
      publicKey: credential.publicKey,
      signatureCounter: credential.counter,
      transports: credential.transports,
    };
  }

  async makeAssertion(params: MakeAssertionParams): Promise<AssertionVerdict> {
    const { response, expected, storedPublicKey, storedSignatureCounter, signal } = params;
    signal.throwIfAborted();

    const { userHandle } = response.response;
    if (userHandle) {
      const owns = await params.isUserHandleOwnerOfCredentialId(
        isoBase64URL.toBuffer(userHandle),
        isoBase64URL.toBuffer(response.rawId),
      );
      if (!owns) throw new Error('User handle does not own this credential');
    }

    const verification = await verifyAuthenticationResponse({
      response,
      expectedChallenge: expected.challenge,
      expectedOrigin: expected.origins,
      expectedRPID: expected.rpId,
      requireUserVerification: expected.requireUserVerification,
      credential: {
        id: response.id,
        publicKey: storedPublicKey.slice(),
        counter: storedSignatureCounter,
      },
    });

    return {
      verified: verification.verified,
      signatureCounter: verification.authenticationInfo.newCounter,
    };
  }
}
