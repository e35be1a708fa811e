import crypto from 'node:crypto';

import type {PskCredential, PskType} from '@ovpn-portal/schemas';

import {err, ok, type AuthResult, type PskErrorCode} from './errors';
import {hashToken, timingSafeEqualStrings} from './tokens';

const PSK_SECRET_PATTERN = /^[A-Za-z0-9_-]{32,128}$/u;
const BEARER_PATTERN = /^Bearer\s+(\S+)$/iu;

export type PskLookup = (secretHash: string) => Promise<PskCredential | null>;

export const generatePskSecret = () => crypto.randomBytes(32).toString('base64url');

export const hashPskSecret = (secret: string) => hashToken(secret);

export const extractBearerCredential = (authorizationHeader: string | undefined) => {
  if (!authorizationHeader) {
    return undefined;
  }

  return BEARER_PATTERN.exec(authorizationHeader.trim())?.[1];
};

const invalidPsk = () => err<PskErrorCode>('invalid', 'Pre-shared key is not valid');

export const validatePsk = async ({
  candidate,
  expectedType,
  lookup,
  now = new Date()
}: {
  candidate: string | undefined;
  expectedType: PskType;
  lookup: PskLookup;
  now?: Date;
}): Promise<AuthResult<PskCredential, PskErrorCode>> => {
  if (!candidate || !PSK_SECRET_PATTERN.test(candidate)) {
    return invalidPsk();
  }

  const candidateHash = hashPskSecret(candidate);
  const record = await lookup(candidateHash);
  if (!record || !timingSafeEqualStrings(record.secretHash, candidateHash)) {
    return invalidPsk();
  }

  if (record.revokedAt !== null) {
    return invalidPsk();
  }

  if (record.expiresAt !== null && new Date(record.expiresAt).getTime() <= now.getTime()) {
    return err('expired', 'Pre-shared key has expired');
  }

  if (record.pskType !== expectedType) {
    return err('wrong_type', `Pre-shared key is not valid for ${expectedType} issuance`);
  }

  return ok(record);
};
