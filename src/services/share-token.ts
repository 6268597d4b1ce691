/**
 * Share Token Issuer
 *
 * 22 symbols from nanoid's URL-safe alphabet (A-Za-z0-9_-) give 132 bits of
 * entropy from crypto.getRandomValues. The database still enforces uniqueness.
 */

import { nanoid } from 'nanoid';

export const SHARE_TOKEN_LENGTH = 22;

const TOKEN_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * TokenIssuer interface (injectable for tests)
 */
export interface TokenIssuer {
  issue: () => string;
}

export function createTokenIssuer(size = SHARE_TOKEN_LENGTH): TokenIssuer {
  return {
    issue(): string {
      return nanoid(size);
    },
  };
}

/**
 * Shape check before any database lookup
 */
export function isWellFormedToken(
  token: string,
  size = SHARE_TOKEN_LENGTH
): boolean {
  return token.length === size && TOKEN_PATTERN.test(token);
}
