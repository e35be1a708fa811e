import crypto from 'node:crypto';

import {timingSafeEqualStrings} from './tokens';

// RFC 7636 section 4.1: 43-128 characters from the unreserved set.
const CODE_VERIFIER_PATTERN = /^[A-Za-z0-9\-._~]{43,128}$/u;

export type PkcePair = {
  codeVerifier: string;
  codeChallenge: string;
  codeChallengeMethod: 'S256';
};

export const isValidCodeVerifier = (value: string) => CODE_VERIFIER_PATTERN.test(value);

export const computeCodeChallenge = (codeVerifier: string) => {
  if (!isValidCodeVerifier(codeVerifier)) {
    throw new Error('pkce_verifier_invalid');
  }

  return crypto.createHash('sha256').update(codeVerifier, 'ascii').digest('base64url');
};

export const createPkcePair = (): PkcePair => {
  const codeVerifier = crypto.randomBytes(48).toString('base64url');
  return {
    codeVerifier,
    codeChallenge: computeCodeChallenge(codeVerifier),
    codeChallengeMethod: 'S256'
  };
};

export const verifierMatchesChallenge = ({
  codeVerifier,
  codeChallenge
}: {
  codeVerifier: string;
  codeChallenge: string;
}) => isValidCodeVerifier(codeVerifier) && timingSafeEqualStrings(computeCodeChallenge(codeVerifier), codeChallenge);
