import { z } from 'zod';
import { type SignalInput, toIsoTimestamp } from '@riskweave/core';

/**
 * Inbound message as posted by mail and SMS gateways. Field names vary by
 * provider, so several aliases are accepted for body and sender.
 */
export const WebhookPayloadSchema = z
  .object({
    text: z.string().optional(),
    message: z.string().optional(),
    body: z.string().optional(),
    from: z.string().optional(),
    sender: z.string().optional(),
    phone: z.string().optional(),
    subject: z.string().optional(),
    url: z.string().optional(),
    timestamp: z.string().optional(),
    metadata: z.record(z.unknown()).optional(),
  })
  .passthrough();
export type WebhookPayload = z.infer<typeof WebhookPayloadSchema>;

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value.trim().length > 0);
}

/**
 * Normalize a webhook payload into a detection signal
 *
 * Body is taken from `text`, `message` or `body`; sender from `from`,
 * `sender` or `phone`; the URL from `url` or `metadata.url`.
 */
export function signalFromWebhook(payload: WebhookPayload): SignalInput {
  const metadataUrl = payload.metadata?.url;
  const signal: SignalInput = {};

  const text = firstNonEmpty(payload.text, payload.message, payload.body);
  const sender = firstNonEmpty(payload.from, payload.sender, payload.phone);
  const url = firstNonEmpty(payload.url, typeof metadataUrl === 'string' ? metadataUrl : undefined);

  if (text !== undefined) signal.emailText = text;
  if (payload.subject !== undefined) signal.emailSubject = payload.subject;
  if (sender !== undefined) signal.sender = sender;
  if (url !== undefined) signal.url = url;
  const timestamp = payload.timestamp === undefined ? undefined : toIsoTimestamp(payload.timestamp);
  if (timestamp !== undefined) signal.timestamp = timestamp;
  if (payload.metadata !== undefined) signal.metadata = payload.metadata;

  return signal;
}

/**
 * Parse an untrusted body and normalize it; returns the zod error on failure
 */
export function parseWebhookPayload(
  body: unknown,
): { success: true; signal: SignalInput } | { success: false; error: z.ZodError } {
  const result = WebhookPayloadSchema.safeParse(body);
  if (!result.success) {
    return { success: false, error: result.error };
  }
  return { success: true, signal: signalFromWebhook(result.data) };
}
