import { describe, expect, it } from 'vitest';

import { createSignatureHeader, parseSignatureHeader, verifyRequestSignature } from './signature';

const SECRET = 'test-secret';
const PAYLOAD = JSON.stringify({ sessionId: 'group-1', sender: { id: 'user-1' }, text: 'hi' });

describe('ingest signature helpers', () => {
  it('accepts a header produced for the same body', () => {
    const header = createSignatureHeader(SECRET, PAYLOAD);

    expect(verifyRequestSignature({ secret: SECRET, signatureHeader: header, payload: PAYLOAD })).toBe(
      true,
    );
  });

  it('accepts buffers and strings alike', () => {
    const header = createSignatureHeader(SECRET, Buffer.from(PAYLOAD, 'utf8'));

    expect(verifyRequestSignature({ secret: SECRET, signatureHeader: header, payload: PAYLOAD })).toBe(
      true,
    );
  });

  it('rejects a tampered body', () => {
    const header = createSignatureHeader(SECRET, PAYLOAD);

    expect(
      verifyRequestSignature({
        secret: SECRET,
        signatureHeader: header,
        payload: PAYLOAD + ' ',
      }),
    ).toBe(false);
  });

  it('rejects a different secret', () => {
    const header = createSignatureHeader('other-secret', PAYLOAD);

    expect(verifyRequestSignature({ secret: SECRET, signatureHeader: header, payload: PAYLOAD })).toBe(
      false,
    );
  });

  it('lower-cases the parsed digest', () => {
    const hex = 'AB'.repeat(32);

    expect(parseSignatureHeader(`sha256=${hex}`)).toBe('ab'.repeat(32));
  });

  it('returns null for malformed headers', () => {
    expect(parseSignatureHeader(undefined)).toBeNull();
    expect(parseSignatureHeader('badheader')).toBeNull();
    expect(parseSignatureHeader('sha1=abc')).toBeNull();
    expect(parseSignatureHeader('sha256=abc')).toBeNull();
  });
});
