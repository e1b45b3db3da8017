import { createHmac } from 'node:crypto';

/**
 * Header carrying `t=<unix seconds>,v1=<hex hmac>` on inbound webhooks
 */
export const SIGNATURE_HEADER = 'x-signal-signature';

export interface VerifyOptions {
  /** Maximum allowed age of the signed timestamp (default: 300) */
  maxAgeSeconds?: number;
  /** Clock, in unix seconds */
  now?: () => number;
}

export interface VerifyResult {
  valid: boolean;
  error?: string;
}

/**
 * Generate HMAC-SHA256 signature for a payload
 *
 * Signature format: HMAC-SHA256(timestamp.payload). Binding the timestamp
 * into the MAC keeps a captured body from being replayed under a new time.
 */
export function generateSignature(payload: string, timestamp: number, secret: string): string {
  return createHmac('sha256', secret).update(`${timestamp}.${payload}`).digest('hex');
}

/**
 * Build the signature header value for a body
 */
export function signatureHeader(payload: string, secret: string, timestamp: number = unixNow()): string {
  return `t=${timestamp},v1=${generateSignature(payload, timestamp, secret)}`;
}

/**
 * Verify a `t=<timestamp>,v1=<signature>` header against the raw request body
 */
export function verifySignature(
  payload: string,
  header: string,
  secret: string,
  options: VerifyOptions = {},
): VerifyResult {
  const maxAgeSeconds = options.maxAgeSeconds ?? 300;
  const parts = header.split(',').map((part) => part.trim());
  const timestampPart = parts.find((p) => p.startsWith('t='));
  const signaturePart = parts.find((p) => p.startsWith('v1='));

  if (!timestampPart || !signaturePart) {
    return { valid: false, error: 'Invalid signature header format' };
  }

  const timestamp = Number.parseInt(timestampPart.slice(2), 10);
  const signature = signaturePart.slice(3);

  if (Number.isNaN(timestamp)) {
    return { valid: false, error: 'Invalid timestamp in signature header' };
  }

  const age = (options.now ?? unixNow)() - timestamp;
  if (age > maxAgeSeconds) {
    return { valid: false, error: `Timestamp too old: ${age}s > ${maxAgeSeconds}s` };
  }
  // 60s of clock skew into the future
  if (age < -60) {
    return { valid: false, error: 'Timestamp in the future' };
  }

  if (!constantTimeEqual(signature, generateSignature(payload, timestamp, secret))) {
    return { valid: false, error: 'Signature mismatch' };
  }

  return { valid: true };
}

function constantTimeEqual(a: string, b: string): boolean {
  if (a.length !== b.length) {
    return false;
  }

  let result = 0;
  for (let i = 0; i < a.length; i++) {
    result |= a.charCodeAt(i) ^ b.charCodeAt(i);
  }
  return result === 0;
}

function unixNow(): number {
  return Math.floor(Date.now() / 1000);
}
