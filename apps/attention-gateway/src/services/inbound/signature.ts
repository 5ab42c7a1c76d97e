import { createHmac, timingSafeEqual } from 'node:crypto';

export const SIGNATURE_HEADER = 'x-attention-signature';

const SIGNATURE_PATTERN = /^sha256=([a-fA-F0-9]{64})$/;

/** Extract the hex digest from a `sha256=<hex>` header, or null when malformed. */
export function parseSignatureHeader(header?: string | null): string | null {
  if (!header) {
    return null;
  }

  const match = SIGNATURE_PATTERN.exec(header.trim());
  return match?.[1] ? match[1].toLowerCase() : null;
}

export function createSignatureHeader(secret: string, payload: string | Buffer): string {
  return `sha256=${digest(secret, payload).toString('hex')}`;
}

export function verifyRequestSignature({
  secret,
  signatureHeader,
  payload,
}: {
  secret: string;
  signatureHeader?: string | null;
  payload: string | Buffer;
}): boolean {
  const hash = parseSignatureHeader(signatureHeader);
  if (!hash) {
    return false;
  }

  const expected = digest(secret, payload);
  const provided = Buffer.from(hash, 'hex');

  return expected.length === provided.length && timingSafeEqual(expected, provided);
}

function digest(secret: string, payload: string | Buffer): Buffer {
  return createHmac('sha256', secret)
    .update(Buffer.isBuffer(payload) ? payload : Buffer.from(payload, 'utf8'))
    .digest();
}
