import crypto from 'node:crypto';

const MIN_TOKEN_BYTES = 32;
const MAX_TOKEN_BYTES = 64;

export class TokenInputValidationError extends Error {
  code: string;

  constructor(code: string) {
    super(code);
    this.name = 'TokenInputValidationError';
    this.code = code;
  }
}

const assertValidTokenBytes = (tokenBytes: number) => {
  if (!Number.isInteger(tokenBytes) || tokenBytes < MIN_TOKEN_BYTES || tokenBytes > MAX_TOKEN_BYTES) {
    throw new TokenInputValidationError('token_bytes_invalid');
  }
};

export const createOpaqueToken = ({bytes = MIN_TOKEN_BYTES}: {bytes?: number} = {}) => {
  assertValidTokenBytes(bytes);
  return crypto.randomBytes(bytes).toString('base64url');
};

export const createNonce = () => createOpaqueToken({bytes: MIN_TOKEN_BYTES});

export const hashToken = (token: string) => crypto.createHash('sha256').update(token).digest('hex');

export const timingSafeEqualStrings = (left: string, right: string) => {
  const leftBuffer = Buffer.from(left, 'utf8');
  const rightBuffer = Buffer.from(right, 'utf8');
  if (leftBuffer.length !== rightBuffer.length) {
    return false;
  }

  return crypto.timingSafeEqual(leftBuffer, rightBuffer);
};
