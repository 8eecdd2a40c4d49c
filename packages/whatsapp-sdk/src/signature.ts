import { createHmac, timingSafeEqual } from 'node:crypto';

export const SIGNATURE_HEADER = 'x-hub-signature-256';

const SIGNATURE_PREFIX = 'sha256=';
const HEX_DIGEST_PATTERN = /^[a-fA-F0-9]{64}$/;

export type SignatureFailureReason = 'missing' | 'malformed' | 'mismatch';

export type SignatureVerification =
  | { valid: true; secretIndex: number }
  | { valid: false; reason: SignatureFailureReason };

/** Extract the hex digest from an `X-Hub-Signature-256` header value. */
export function parseSignatureHeader(header?: string | null): string | null {
  if (!header) {
    return null;
  }

  const trimmed = header.trim();
  if (!trimmed.startsWith(SIGNATURE_PREFIX)) {
    return null;
  }

  const digest = trimmed.slice(SIGNATURE_PREFIX.length);
  if (!HEX_DIGEST_PATTERN.test(digest)) {
    return null;
  }

  return digest.toLowerCase();
}

export function createSignatureDigest(appSecret: string, payload: string | Buffer): Buffer {
  const hmac = createHmac('sha256', appSecret);
  hmac.update(Buffer.isBuffer(payload) ? payload : Buffer.from(payload, 'utf8'));
  return hmac.digest();
}

export function createSignatureHeader(appSecret: string, payload: string | Buffer): string {
  return `${SIGNATURE_PREFIX}${createSignatureDigest(appSecret, payload).toString('hex')}`;
}

/**
 * Check a webhook body against every configured app secret, in order. One
 * webhook URL can be registered with several Meta apps (test, staging,
 * production), each signing with its own secret, so the index of the secret
 * that matched is reported back for logging.
 */
export function verifyRequestSignature({
  appSecrets,
  signatureHeader,
  payload,
}: {
  appSecrets: readonly string[];
  signatureHeader?: string | null;
  payload: string | Buffer;
}): SignatureVerification {
  if (!signatureHeader) {
    return { valid: false, reason: 'missing' };
  }

  const digest = parseSignatureHeader(signatureHeader);
  if (!digest) {
    return { valid: false, reason: 'malformed' };
  }

  const provided = Buffer.from(digest, 'hex');

  for (const [index, secret] of appSecrets.entries()) {
    if (!secret) {
      continue;
    }

    const expected = createSignatureDigest(secret, payload);
    if (expected.length === provided.length && timingSafeEqual(expected, provided)) {
      return { valid: true, secretIndex: index };
    }
  }

  return { valid: false, reason: 'mismatch' };
}
