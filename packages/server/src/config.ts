/**
 * Relying party configuration.
 *
 * Only the shape of each field is checked here. Whether `domain` really is
 * the effective domain of every origin is left to verification, where a
 * mismatch makes every ceremony fail.
 */

import { z } from 'zod';

import type { PasskeyOptions } from './types.js';

function isBareOrigin(value: string): boolean {
  try {
    return new URL(value).origin === value;
  } catch {
    return false;
  }
}

export const passkeyOptionsSchema = z.object({
  appName: z.string().trim().min(1),
  domain: z.string().trim().min(1).refine(
    (domain) => !/[/:?#@\s]/.test(domain),
    'domain must be a bare host name (no scheme, port or path)',
  ),
  origins: z.array(
    z.string().refine(isBareOrigin, 'origin must be exactly scheme://host[:port]'),
  ).min(1),
  userVerification: z.enum(['required', 'preferred', 'discouraged']).optional(),
});

/** Validate options handed to the provider. Throws a ZodError when malformed. */
export function parsePasskeyOptions(input: PasskeyOptions): PasskeyOptions {
  return passkeyOptionsSchema.parse(input);
}

/**
 * Read options from the environment:
 *   PASSKEY_APP_NAME, PASSKEY_DOMAIN,
 *   PASSKEY_ORIGINS (comma-separated), PASSKEY_USER_VERIFICATION (optional)
 */
export function passkeyOptionsFromEnv(
  env: Record<string, string | undefined> = process.env,
): PasskeyOptions {
  return passkeyOptionsSchema.parse({
    appName: env.PASSKEY_APP_NAME,
    domain: env.PASSKEY_DOMAIN,
    origins: (env.PASSKEY_ORIGINS ?? '')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    userVerification: env.PASSKEY_USER_VERIFICATION || undefined,
  });
}
