/**
 * TokenIssuer Unit Tests
 */

import { describe, it, expect } from 'vitest';

import {
  SHARE_TOKEN_LENGTH,
  createTokenIssuer,
  isWellFormedToken,
} from '@/services/share-token.js';

describe('TokenIssuer', () => {
  describe('issue', () => {
    it('should issue 22-character URL-safe tokens', () => {
      const token = createTokenIssuer().issue();

      expect(token).toHaveLength(SHARE_TOKEN_LENGTH);
      expect(token).toMatch(/^[A-Za-z0-9_-]{22}$/);
    });

    it('should not repeat across many issues', () => {
      const issuer = createTokenIssuer();
      const tokens = new Set<string>();

      for (let i = 0; i < 5000; i++) {
        tokens.add(issuer.issue());
      }

      expect(tokens.size).toBe(5000);
    });

    it('should honour a custom size', () => {
      expect(createTokenIssuer(8).issue()).toHaveLength(8);
    });
  });

  describe('isWellFormedToken', () => {
    it('should accept an issued token', () => {
      expect(isWellFormedToken(createTokenIssuer().issue())).toBe(true);
    });

    it('should reject the wrong length', () => {
      expect(isWellFormedToken('A'.repeat(21))).toBe(false);
      expect(isWellFormedToken('A'.repeat(23))).toBe(false);
      expect(isWellFormedToken('')).toBe(false);
    });

    it('should reject characters outside the alphabet', () => {
      expect(isWellFormedToken(`${'A'.repeat(20)}.%`)).toBe(false);
      expect(isWellFormedToken(`../${'A'.repeat(19)}`)).toBe(false);
    });
  });
});
