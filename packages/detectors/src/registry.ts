import { DetectorRegistry } from '@riskweave/core';
import { AiTextDetector } from './aiText.js';
import { CredentialExposureDetector } from './credentialExposure.js';
import { EmailPhishingDetector } from './emailPhishing.js';
import { MalwareAttachmentDetector } from './malwareAttachment.js';
import { PromptInjectionDetector } from './promptInjection.js';
import { UrlReputationDetector } from './urlReputation.js';

/**
 * Detector ids, for callers that run one detector directly
 */
export const DETECTOR_IDS = {
  aiText: 'ai-text',
  credentials: 'credential-exposure',
  emailPhishing: 'email-phishing',
  injection: 'prompt-injection',
  url: 'url-reputation',
  malware: 'malware-attachment',
} as const;

/**
 * Create a registry with every built-in detector, text detectors first
 */
export function createDefaultRegistry(): DetectorRegistry {
  const registry = new DetectorRegistry();

  registry.register(new AiTextDetector());
  registry.register(new CredentialExposureDetector());
  registry.register(new EmailPhishingDetector());
  registry.register(new PromptInjectionDetector());
  registry.register(new UrlReputationDetector());
  registry.register(new MalwareAttachmentDetector());

  return registry;
}
