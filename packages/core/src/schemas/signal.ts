import { createHash } from 'node:crypto';
import { z } from 'zod';
import { toIsoTimestamp } from '../utils/time.js';

export const AttachmentSchema = z.object({
  filename: z.string().min(1),
  /** Raw file content, base64 encoded */
  contentBase64: z.string().optional(),
  sha256: z
    .string()
    .regex(/^[a-fA-F0-9]{64}$/, 'sha256 must be 64 hex characters')
    .optional(),
  sizeBytes: z.number().int().min(0).optional(),
});
export type Attachment = z.infer<typeof AttachmentSchema>;

/**
 * Lowercase hex sha256 of the attachment: hashed from its content when
 * present, otherwise the caller-supplied digest
 */
export function attachmentSha256(attachment: Attachment): string | undefined {
  if (attachment.contentBase64 !== undefined) {
    return createHash('sha256').update(Buffer.from(attachment.contentBase64, 'base64')).digest('hex');
  }
  return attachment.sha256?.toLowerCase();
}

/**
 * One multi-modal input signal. Every field is optional; detectors run for
 * whichever of text, url and attachment are populated.
 */
export const SignalInputSchema = z.object({
  emailText: z.string().optional(),
  emailSubject: z.string().optional(),
  url: z.string().optional(),
  attachment: AttachmentSchema.optional(),
  sender: z.string().optional(),
  /** Any parseable date; normalized to UTC ISO-8601 */
  timestamp: z
    .string()
    .transform((value, ctx) => {
      const iso = toIsoTimestamp(value);
      if (iso === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'timestamp must be a parseable date' });
        return z.NEVER;
      }
      return iso;
    })
    .optional(),
  metadata: z.record(z.unknown()).optional(),
});
export type SignalInput = z.infer<typeof SignalInputSchema>;

export type SignalInputKind = 'text' | 'url' | 'attachment';

export function hasText(signal: SignalInput): signal is SignalInput & { emailText: string } {
  return typeof signal.emailText === 'string' && signal.emailText.trim().length > 0;
}

export function hasUrl(signal: SignalInput): signal is SignalInput & { url: string } {
  return typeof signal.url === 'string' && signal.url.trim().length > 0;
}

export function hasAttachment(signal: SignalInput): signal is SignalInput & { attachment: Attachment } {
  return signal.attachment !== undefined;
}

/**
 * Input kinds populated on a signal, in detector execution order
 */
export function populatedInputs(signal: SignalInput): SignalInputKind[] {
  const kinds: SignalInputKind[] = [];
  if (hasText(signal)) kinds.push('text');
  if (hasUrl(signal)) kinds.push('url');
  if (hasAttachment(signal)) kinds.push('attachment');
  return kinds;
}
