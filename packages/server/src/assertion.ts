/**
 * Retrieval ceremony: issue a challenge and let the browser produce an
 * assertion. Nothing is verified here; the returned passkey carries the
 * challenge and proof so the caller can look up the stored public key by
 * credential id and call `verifyPasskey` afterwards.
 */

import { generateAuthenticationOptions } from '@simplewebauthn/server';
import type { PublicKeyCredentialRequestOptionsJSON } from '@simplewebauthn/server';

import { callBridge, nonEmptyDescriptors } from './ceremony.js';
import type { CeremonyContext } from './ceremony.js';
import { generateChallenge } from './challenge.js';
import { fromBase64Url, toBase64Url } from './encoding.js';
import { PasskeyError } from './errors.js';
import type { Passkey, PasskeyOptions, RetrievalPayload } from './types.js';

export interface RetrievalInput {
  options: PasskeyOptions;
  allowCredentials?: Iterable<Uint8Array>;
  /** Autofill (conditional mediation) instead of a modal prompt */
  conditional: boolean;
}

export async function buildRequestOptions(
  input: RetrievalInput,
  challenge: Uint8Array,
): Promise<PublicKeyCredentialRequestOptionsJSON> {
  const allow = nonEmptyDescriptors(input.allowCredentials);

  return generateAuthenticationOptions({
    rpID: input.options.domain,
    challenge: challenge.slice(),
    userVerification: input.options.userVerification ?? 'preferred',
    allowCredentials: allow.length > 0 ? allow.map((id) => ({ id: toBase64Url(id) })) : undefined,
  });
}

function toPasskey(payload: RetrievalPayload, challenge: Uint8Array): Passkey {
  try {
    return {
      userHandle: fromBase64Url(payload.userHandle),
      credentialId: fromBase64Url(payload.credentialId),
      challenge,
      authenticatorData: fromBase64Url(payload.authenticatorData),
      clientDataJson: fromBase64Url(payload.clientDataJson),
      signature: fromBase64Url(payload.signature),
    };
  } catch (err) {
    throw new PasskeyError('TRANSPORT_FAULT', 'Browser returned an undecodable assertion', { cause: err });
  }
}

export async function runRetrieval(ctx: CeremonyContext, input: RetrievalInput): Promise<Passkey> {
  const { ceremony, signal } = ctx;

  const challenge = generateChallenge();
  const request = await buildRequestOptions(input, challenge);
  ceremony.advance('challenge-issued');

  ceremony.advance('awaiting-client');
  const payload = input.conditional
    ? await callBridge(() => ctx.bridge.getPasskeyConditional(request, signal), signal)
    : await callBridge(() => ctx.bridge.getPasskey(request, signal), signal);

  if (!payload) {
    throw new PasskeyError('NO_SELECTION', 'No credential was selected');
  }

  const passkey = toPasskey(payload, challenge);
  ceremony.advance('completed');
  return passkey;
}
