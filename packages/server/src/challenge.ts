/** Length of every WebAuthn challenge issued by this library */
export const CHALLENGE_LENGTH = 32;

/**
 * Fresh challenge for one ceremony, from the platform CSPRNG.
 * Throws if no secure randomness source is available.
 */
export function generateChallenge(): Uint8Array {
  return crypto.getRandomValues(new Uint8Array(CHALLENGE_LENGTH));
}
