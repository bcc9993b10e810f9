import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  CODE_VERIFIER_LENGTH,
  PKCE_VALID_CHARS,
  encodeS256,
  generateCodeVerifier,
  generatePkcePair,
} from '../src/auth/pkce.js';

describe('pkce', () => {
  describe('generateCodeVerifier', () => {
    it('should generate 128 characters', () => {
      expect(generateCodeVerifier()).toHaveLength(CODE_VERIFIER_LENGTH);
      expect(Buffer.byteLength(generateCodeVerifier(), 'utf-8')).toBe(128);
    });

    it('should only use unreserved characters', () => {
      expect(generateCodeVerifier()).toMatch(/^[A-Za-z0-9\-._~]{128}$/);
    });

    it('should not repeat itself', () => {
      expect(generateCodeVerifier()).not.toBe(generateCodeVerifier());
    });
  });

  describe('encodeS256', () => {
    it('should match the RFC 7636 appendix B example', () => {
      expect(encodeS256('dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk')).toBe(
        'E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM'
      );
    });
  });

  describe('property-based tests', () => {
    it('every generated pair is well-formed', () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 1000 }), () => {
          const { verifier, challenge } = generatePkcePair();
          expect(verifier).toHaveLength(128);
          for (const char of verifier) {
            expect(PKCE_VALID_CHARS).toContain(char);
          }
          expect(challenge).toHaveLength(43);
          expect(challenge).toMatch(/^[A-Za-z0-9_-]{43}$/);
        }),
        { numRuns: 50 }
      );
    });

    it('challenge of any 128-character verifier is 43 characters', () => {
      fc.assert(
        fc.property(
          fc.stringOf(fc.constantFrom(...PKCE_VALID_CHARS.split('')), { minLength: 128, maxLength: 128 }),
          (verifier) => {
            expect(encodeS256(verifier)).toHaveLength(43);
          }
        ),
        { numRuns: 50 }
      );
    });
  });
});
