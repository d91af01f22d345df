import * as crypto from 'crypto';

/**
 * Header carrying the hex HMAC-SHA256 of the raw request body
 */
export const SIGNATURE_HEADER = 'x-signature';

const SIGNATURE_ALGORITHM = 'sha256';
const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})+$/;

/**
 * Compute the lowercase hex HMAC-SHA256 of a raw body
 */
export function computeSignature(
  rawBody: Buffer,
  secret: string | Buffer,
): string {
  return crypto
    .createHmac(SIGNATURE_ALGORITHM, secret)
    .update(rawBody)
    .digest('hex');
}

/**
 * Verify a declared signature against the raw body.
 *
 * Digests are compared with crypto.timingSafeEqual. Never throws: an empty
 * secret, a missing signature, malformed hex or a length mismatch all
 * return false.
 */
export function verifySignature(
  rawBody: Buffer,
  declaredSignature: string | undefined,
  secret: string | Buffer | undefined,
): boolean {
  if (!secret || secret.length === 0) {
    return false;
  }

  if (!declaredSignature || !HEX_PATTERN.test(declaredSignature)) {
    return false;
  }

  const expected = crypto
    .createHmac(SIGNATURE_ALGORITHM, secret)
    .update(rawBody)
    .digest();
  const provided = Buffer.from(declaredSignature, 'hex');

  if (provided.length !== expected.length) {
    return false;
  }

  return crypto.timingSafeEqual(expected, provided);
}
