export {
  SIGNATURE_HEADER,
  generateSignature,
  signatureHeader,
  verifySignature,
} from './signature.js';
export type { VerifyOptions, VerifyResult } from './signature.js';

export { WebhookPayloadSchema, signalFromWebhook, parseWebhookPayload } from './payload.js';
export type { WebhookPayload } from './payload.js';
