import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  WebAuthnAbortService,
  startAuthentication,
  startRegistration,
} from '@simplewebauthn/browser';
import type { AuthenticationResponseJSON, RegistrationResponseJSON } from '@simplewebauthn/browser';
import { createBrowserHandlers } from '../src/browser-handlers.js';

vi.mock('@simplewebauthn/browser', () => ({
  browserSupportsWebAuthn: vi.fn(() => false),
  browserSupportsWebAuthnAutofill: vi.fn(async () => true),
  startRegistration: vi.fn(),
  startAuthentication: vi.fn(),
  WebAuthnAbortService: { cancelCeremony: vi.fn() },
}));

const creationOptions = {
  challenge: 'Y2hhbGxlbmdl',
  rp: { name: 'Test', id: 'localhost' },
  user: { id: 'dXNlci0x', name: 'test', displayName: 'Test' },
  pubKeyCredParams: [{ alg: -7, type: 'public-key' }],
};

const requestOptions = { challenge: 'Y2hhbGxlbmdl', rpId: 'localhost' };

const registration: RegistrationResponseJSON = {
  id: 'bmV3LWNyZWQ',
  rawId: 'bmV3LWNyZWQ',
  type: 'public-key',
  response: {
    clientDataJSON: 'mock-cdj',
    attestationObject: 'mock-ao',
    transports: ['internal'],
  },
  clientExtensionResults: {},
  authenticatorAttachment: 'platform',
};

const assertion: AuthenticationResponseJSON = {
  id: 'Y3JlZC0x',
  rawId: 'Y3JlZC0x',
  type: 'public-key',
  response: {
    clientDataJSON: 'mock-cdj',
    authenticatorData: 'mock-ad',
    signature: 'mock-sig',
    userHandle: 'dXNlci0x',
  },
  clientExtensionResults: {},
};

function namedError(name: string, message: string): Error {
  const err = new Error(message);
  err.name = name;
  return err;
}

describe('createBrowserHandlers', () => {
  beforeEach(() => {
    vi.mocked(startRegistration).mockReset();
    vi.mocked(startAuthentication).mockReset();
    vi.mocked(WebAuthnAbortService.cancelCeremony).mockReset();
  });

  it('answers the handshake with protocol 1', async () => {
    const handlers = createBrowserHandlers();
    expect(await handlers.init({ protocol: 1 })).toEqual({ protocol: 1 });
  });

  it('reports capability probes', async () => {
    const handlers = createBrowserHandlers();
    expect(await handlers.arePasskeysSupported({})).toBe(false);
    expect(await handlers.isConditionalMediationAvailable({})).toBe(true);
  });

  it('createPasskey runs startRegistration and flattens the attestation', async () => {
    vi.mocked(startRegistration).mockResolvedValue(registration);

    const result = await createBrowserHandlers().createPasskey({ options: creationOptions });

    expect(startRegistration).toHaveBeenCalledWith({ optionsJSON: creationOptions });
    expect(result).toEqual({
      credentialId: 'bmV3LWNyZWQ',
      attestationObject: 'mock-ao',
      clientDataJson: 'mock-cdj',
      transports: ['internal'],
    });
  });

  it('createPasskey rejects arguments without options', async () => {
    await expect(createBrowserHandlers().createPasskey({})).rejects.toThrow();
    expect(startRegistration).not.toHaveBeenCalled();
  });

  it('getPasskey runs startAuthentication and flattens the assertion', async () => {
    vi.mocked(startAuthentication).mockResolvedValue(assertion);

    const result = await createBrowserHandlers().getPasskey({ options: requestOptions });

    expect(startAuthentication).toHaveBeenCalledWith({ optionsJSON: requestOptions });
    expect(result).toEqual({
      userHandle: 'dXNlci0x',
      credentialId: 'Y3JlZC0x',
      authenticatorData: 'mock-ad',
      clientDataJson: 'mock-cdj',
      signature: 'mock-sig',
    });
  });

  it('getPasskey reports a missing user handle as empty text', async () => {
    vi.mocked(startAuthentication).mockResolvedValue({
      ...assertion,
      response: { ...assertion.response, userHandle: undefined },
    });

    const result = await createBrowserHandlers().getPasskey({ options: requestOptions });

    expect(result).toMatchObject({ userHandle: '' });
  });

  it('getPasskey lets a declined prompt propagate with its name', async () => {
    vi.mocked(startAuthentication).mockRejectedValue(namedError('NotAllowedError', 'declined'));

    await expect(createBrowserHandlers().getPasskey({ options: requestOptions })).rejects.toMatchObject({
      name: 'NotAllowedError',
    });
  });

  it('getPasskeyConditional uses browser autofill', async () => {
    vi.mocked(startAuthentication).mockResolvedValue(assertion);

    await createBrowserHandlers().getPasskeyConditional({ options: requestOptions });

    expect(startAuthentication).toHaveBeenCalledWith({
      optionsJSON: requestOptions,
      useBrowserAutofill: true,
    });
  });

  it('getPasskeyConditional resolves null when autofill is aborted', async () => {
    vi.mocked(startAuthentication).mockRejectedValue(namedError('AbortError', 'aborted'));

    expect(await createBrowserHandlers().getPasskeyConditional({ options: requestOptions })).toBeNull();
  });

  it('getPasskeyConditional rethrows other failures', async () => {
    vi.mocked(startAuthentication).mockRejectedValue(namedError('SecurityError', 'bad rp id'));

    await expect(
      createBrowserHandlers().getPasskeyConditional({ options: requestOptions }),
    ).rejects.toMatchObject({ name: 'SecurityError' });
  });

  describe('cancel', () => {
    function openPrompt() {
      let finish: () => void = () => {};
      vi.mocked(startAuthentication).mockImplementation(
        () => new Promise((resolve) => { finish = () => resolve(assertion); }),
      );
      return { finish: () => finish() };
    }

    it('aborts the prompt it names', async () => {
      const handlers = createBrowserHandlers();
      const { finish } = openPrompt();
      const pending = handlers.getPasskey({ options: requestOptions, ref: '3' });

      await handlers.cancel({ ref: '3' });

      expect(WebAuthnAbortService.cancelCeremony).toHaveBeenCalledTimes(1);
      finish();
      await pending;
    });

    it('leaves an open autofill prompt alone when another call is cancelled', async () => {
      const handlers = createBrowserHandlers();
      const { finish } = openPrompt();
      const autofill = handlers.getPasskeyConditional({ options: requestOptions, ref: '4' });

      await handlers.cancel({ ref: '2' });

      expect(WebAuthnAbortService.cancelCeremony).not.toHaveBeenCalled();
      finish();
      await autofill;
    });

    it('does nothing once the named prompt has finished', async () => {
      const handlers = createBrowserHandlers();
      vi.mocked(startRegistration).mockResolvedValue(registration);
      await handlers.createPasskey({ options: creationOptions, ref: '1' });

      await handlers.cancel({ ref: '1' });

      expect(WebAuthnAbortService.cancelCeremony).not.toHaveBeenCalled();
    });

    it('rejects a cancel without a ref', async () => {
      await expect(createBrowserHandlers().cancel({ method: 'getPasskey' })).rejects.toThrow();
      expect(WebAuthnAbortService.cancelCeremony).not.toHaveBeenCalled();
    });
  });
});
