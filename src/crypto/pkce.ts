import type { CodeChallengeMethod } from '../types/oauth.js';
import { CODE_CHALLENGE_METHOD_PLAIN, CODE_CHALLENGE_METHOD_S256 } from '../config/constants.js';
import { constantTimeEqual, sha256Base64Url } from './hash.js';

const CODE_VERIFIER_PATTERN = /^[A-Za-z0-9\-._~]{43,128}$/;
const S256_CHALLENGE_PATTERN = /^[A-Za-z0-9\-_]{43}$/;

/**
 * Generate a code challenge from a code verifier using S256 method
 * RFC 7636 Section 4.2
 *
 * code_challenge = BASE64URL(SHA256(code_verifier))
 */
export function generateCodeChallenge(codeVerifier: string): string {
  return sha256Base64Url(codeVerifier);
}

/**
 * Verify a code verifier against a stored code challenge
 * RFC 7636 Section 4.6
 *
 * Both methods compare in constant time.
 */
export function verifyCodeChallenge(
  codeVerifier: string,
  codeChallenge: string,
  method: CodeChallengeMethod
): boolean {
  switch (method) {
    case CODE_CHALLENGE_METHOD_S256:
      return constantTimeEqual(generateCodeChallenge(codeVerifier), codeChallenge);
    case CODE_CHALLENGE_METHOD_PLAIN:
      return constantTimeEqual(codeVerifier, codeChallenge);
  }
}

/**
 * Validate code verifier format
 * RFC 7636 Section 4.1
 *
 * code_verifier = high-entropy cryptographic random STRING
 * using the unreserved characters [A-Z] / [a-z] / [0-9] / "-" / "." / "_" / "~"
 * with a minimum length of 43 characters and a maximum length of 128 characters
 */
export function isValidCodeVerifier(codeVerifier: string): boolean {
  return CODE_VERIFIER_PATTERN.test(codeVerifier);
}

/**
 * Validate code challenge format for the given method.
 * S256 challenges are 43 base64url characters; plain challenges follow the verifier grammar.
 */
export function isValidCodeChallenge(codeChallenge: string, method: CodeChallengeMethod): boolean {
  if (method === CODE_CHALLENGE_METHOD_PLAIN) {
    return isValidCodeVerifier(codeChallenge);
  }
  return S256_CHALLENGE_PATTERN.test(codeChallenge);
}
