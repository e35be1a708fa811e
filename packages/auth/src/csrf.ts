import crypto from 'node:crypto';

import type {SessionRecord} from '@ovpn-portal/schemas';

import {err, ok, type AuthResult, type CsrfErrorCode} from './errors';
import {timingSafeEqualStrings} from './tokens';

const MAX_SUBMITTED_TOKEN_LENGTH = 256;

// Stable for the lifetime of the session so that several open tabs stay valid.
export const deriveCsrfToken = (session: Pick<SessionRecord, 'sessionId' | 'csrfSecret'>) =>
  crypto.createHmac('sha256', session.csrfSecret).update(`csrf:${session.sessionId}`).digest('base64url');

export const verifyCsrfToken = ({
  session,
  submitted
}: {
  session: Pick<SessionRecord, 'sessionId' | 'csrfSecret'>;
  submitted: string | undefined;
}): AuthResult<true, CsrfErrorCode> => {
  const candidate = submitted?.trim();
  if (!candidate) {
    return err('missing_token', 'CSRF token is missing');
  }

  if (candidate.length > MAX_SUBMITTED_TOKEN_LENGTH || !timingSafeEqualStrings(candidate, deriveCsrfToken(session))) {
    return err('token_mismatch', 'CSRF token is invalid');
  }

  return ok(true);
};
