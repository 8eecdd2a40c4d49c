import { describe, expect, it } from 'vitest';

import {
  createSignatureDigest,
  createSignatureHeader,
  parseSignatureHeader,
  verifyRequestSignature,
} from '../src/signature';

const SECRET = 'test-secret';
const OTHER_SECRET = 'other-test-secret';
const PAYLOAD = JSON.stringify({ object: 'whatsapp_business_account', entry: [] });

describe('signature helpers', () => {
  it('accepts a body signed with the only secret', () => {
    const header = createSignatureHeader(SECRET, PAYLOAD);

    expect(
      verifyRequestSignature({ appSecrets: [SECRET], signatureHeader: header, payload: PAYLOAD }),
    ).toEqual({ valid: true, secretIndex: 0 });
  });

  it('tries every secret and reports the one that matched', () => {
    const header = createSignatureHeader(OTHER_SECRET, PAYLOAD);

    expect(
      verifyRequestSignature({
        appSecrets: [SECRET, OTHER_SECRET],
        signatureHeader: header,
        payload: Buffer.from(PAYLOAD, 'utf8'),
      }),
    ).toEqual({ valid: true, secretIndex: 1 });
  });

  it('rejects a tampered body', () => {
    const header = createSignatureHeader(SECRET, PAYLOAD);

    expect(
      verifyRequestSignature({
        appSecrets: [SECRET, OTHER_SECRET],
        signatureHeader: header,
        payload: PAYLOAD + ' ',
      }),
    ).toEqual({ valid: false, reason: 'mismatch' });
  });

  it.each([0, 31, 63])('rejects a signature with one hex digit changed at %i', (position) => {
    const digest = createSignatureDigest(SECRET, PAYLOAD).toString('hex');
    const replacement = digest[position] === '0' ? '1' : '0';
    const altered = digest.slice(0, position) + replacement + digest.slice(position + 1);

    expect(
      verifyRequestSignature({
        appSecrets: [SECRET, OTHER_SECRET],
        signatureHeader: `sha256=${altered}`,
        payload: PAYLOAD,
      }),
    ).toEqual({ valid: false, reason: 'mismatch' });
  });

  it('distinguishes missing and malformed headers', () => {
    expect(
      verifyRequestSignature({ appSecrets: [SECRET], signatureHeader: undefined, payload: PAYLOAD }),
    ).toEqual({ valid: false, reason: 'missing' });
    expect(
      verifyRequestSignature({ appSecrets: [SECRET], signatureHeader: 'sha256=zz', payload: PAYLOAD }),
    ).toEqual({ valid: false, reason: 'malformed' });
  });

  it('ignores empty secrets', () => {
    const header = createSignatureHeader('', PAYLOAD);

    expect(
      verifyRequestSignature({ appSecrets: [''], signatureHeader: header, payload: PAYLOAD }),
    ).toEqual({ valid: false, reason: 'mismatch' });
  });

  it('parses valid signature headers', () => {
    const digest = createSignatureDigest(SECRET, PAYLOAD).toString('hex');

    expect(parseSignatureHeader(`sha256=${digest.toUpperCase()}`)).toBe(digest);
  });

  it('returns null for malformed headers', () => {
    expect(parseSignatureHeader(undefined)).toBeNull();
    expect(parseSignatureHeader('badheader')).toBeNull();
    expect(parseSignatureHeader(`sha1=${'a'.repeat(40)}`)).toBeNull();
    expect(parseSignatureHeader(`sha256=${'a'.repeat(63)}`)).toBeNull();
  });
});
