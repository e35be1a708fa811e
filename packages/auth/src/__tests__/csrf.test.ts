import {describe, expect, it} from 'vitest';

import {deriveCsrfToken, verifyCsrfToken} from '../index';

const session = {
  sessionId: '6d4ad5a4-47a5-4f34-9a07-d8c0a5b8e0b1',
  csrfSecret: 'test-secret-test-secret-test-secret-0001'
};

describe('csrf', () => {
  it('derives a stable token per session', () => {
    const first = deriveCsrfToken(session);

    expect(first).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(deriveCsrfToken(session)).toBe(first);
    expect(deriveCsrfToken({...session, sessionId: 'b0bd1f56-8f9e-4f7c-9a4e-1d4c7b0b3c11'})).not.toBe(first);
  });

  it('accepts the derived token', () => {
    expect(verifyCsrfToken({session, submitted: deriveCsrfToken(session)})).toEqual({ok: true, value: true});
  });

  it('reports a missing token', () => {
    expect(verifyCsrfToken({session, submitted: undefined})).toEqual({
      ok: false,
      error: {code: 'missing_token', message: 'CSRF token is missing'}
    });
    expect(verifyCsrfToken({session, submitted: '   '})).toMatchObject({ok: false, error: {code: 'missing_token'}});
  });

  it('reports a mismatching or oversized token', () => {
    const otherSession = {...session, csrfSecret: 'test-secret-test-secret-test-secret-0002'};

    expect(verifyCsrfToken({session, submitted: deriveCsrfToken(otherSession)})).toEqual({
      ok: false,
      error: {code: 'token_mismatch', message: 'CSRF token is invalid'}
    });
    expect(verifyCsrfToken({session, submitted: 'x'.repeat(257)})).toMatchObject({
      ok: false,
      error: {code: 'token_mismatch'}
    });
  });
});
