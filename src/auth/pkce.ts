import { createHash, randomInt } from 'crypto';

// Unreserved characters allowed in a code verifier (RFC 7636 section 4.1)
export const PKCE_VALID_CHARS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-._~';
export const CODE_VERIFIER_LENGTH = 128;
export const CHALLENGE_METHOD = 'S256';

export function generateCodeVerifier(length: number = CODE_VERIFIER_LENGTH): string {
  let verifier = '';
  for (let i = 0; i < length; i++) {
    verifier += PKCE_VALID_CHARS[randomInt(PKCE_VALID_CHARS.length)];
  }
  return verifier;
}

/**
 * base64url(SHA-256(verifier)) without padding
 */
export function encodeS256(verifier: string): string {
  return createHash('sha256').update(verifier, 'ascii').digest('base64url');
}

export interface PkcePair {
  verifier: string;
  challenge: string;
}

export function generatePkcePair(): PkcePair {
  const verifier = generateCodeVerifier();
  return { verifier, challenge: encodeS256(verifier) };
}
