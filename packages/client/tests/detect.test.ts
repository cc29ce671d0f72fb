import { afterEach, describe, expect, it, vi } from 'vitest';
import { browserSupportsWebAuthn, browserSupportsWebAuthnAutofill } from '@simplewebauthn/browser';
import { arePasskeysSupported, isConditionalMediationAvailable } from '../src/detect.js';

vi.mock('@simplewebauthn/browser', () => ({
  browserSupportsWebAuthn: vi.fn(() => false),
  browserSupportsWebAuthnAutofill: vi.fn(async () => false),
}));

afterEach(() => {
  vi.unstubAllGlobals();
  vi.mocked(browserSupportsWebAuthn).mockReset().mockReturnValue(false);
  vi.mocked(browserSupportsWebAuthnAutofill).mockReset().mockResolvedValue(false);
});

describe('arePasskeysSupported', () => {
  it('returns false without WebAuthn', () => {
    expect(arePasskeysSupported()).toBe(false);
  });

  it('returns true when WebAuthn and the credentials container exist', () => {
    vi.mocked(browserSupportsWebAuthn).mockReturnValue(true);
    vi.stubGlobal('navigator', { credentials: { create: vi.fn(), get: vi.fn() } });

    expect(arePasskeysSupported()).toBe(true);
  });

  it('returns false when the credentials container lacks get()', () => {
    vi.mocked(browserSupportsWebAuthn).mockReturnValue(true);
    vi.stubGlobal('navigator', { credentials: { create: vi.fn() } });

    expect(arePasskeysSupported()).toBe(false);
  });

  it('returns false when navigator has no credentials container', () => {
    vi.mocked(browserSupportsWebAuthn).mockReturnValue(true);
    vi.stubGlobal('navigator', {});

    expect(arePasskeysSupported()).toBe(false);
  });
});

describe('isConditionalMediationAvailable', () => {
  it('reports what the browser says', async () => {
    vi.mocked(browserSupportsWebAuthnAutofill).mockResolvedValue(true);
    expect(await isConditionalMediationAvailable()).toBe(true);
  });

  it('returns false when the probe throws', async () => {
    vi.mocked(browserSupportsWebAuthnAutofill).mockRejectedValue(new Error('no PublicKeyCredential'));
    expect(await isConditionalMediationAvailable()).toBe(false);
  });
});
