import type { Detector, DetectorMetadata, DetectorOutput, SignalInput } from '@riskweave/core';
import { probabilityConfidence, sentences, signalText, toPercent, words } from './text.js';

/** Urgency and pressure phrases, matched as substrings of the lowercased text */
export const URGENCY_WORDS: readonly string[] = [
  'urgent',
  'immediately',
  'verify',
  'confirm',
  'suspend',
  'expire',
  'click here',
  'act now',
  'limited time',
  'warning',
  'alert',
  'security',
  'account',
  'blocked',
  'unauthorized',
  'suspicious',
  'validate',
  'update',
  'required',
  'action needed',
  'final warning',
  'compromised',
  'flagged',
];

export const PHISHING_FEATURE_NAMES = [
  'urlCount',
  'urgencyCount',
  'exclamationMarks',
  'capsRatio',
  'lengthNorm',
  'specialCharRatio',
  'suspiciousDomains',
  'actionVerbs',
  'financialTerms',
  'grammarScore',
] as const;

export type PhishingFeatures = Record<(typeof PHISHING_FEATURE_NAMES)[number], number>;

/** Feature weights, in PHISHING_FEATURE_NAMES order */
const FEATURE_WEIGHTS = [0.15, 0.25, 0.1, 0.1, 0.05, 0.05, 0.05, 0.15, 0.1, 0];

export interface PhishingScan {
  /** 0-100, one decimal */
  phishingProbability: number;
  isPhishing: boolean;
  confidence: number;
  risk: 'HIGH' | 'MEDIUM' | 'LOW';
  features: PhishingFeatures | Record<string, never>;
}

function isShouted(token: string): boolean {
  return token.length > 2 && token !== token.toLowerCase() && token === token.toUpperCase();
}

function count(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

export function extractPhishingFeatures(text: string): PhishingFeatures {
  const lower = text.toLowerCase();
  const wordCount = words(text).length;
  const characters = [...text];

  const sentenceLengths = sentences(text).map((sentence) => sentence.split(/\s+/).length);
  const avgSentenceLength =
    sentenceLengths.reduce((sum, length) => sum + length, 0) / Math.max(sentenceLengths.length, 1);

  return {
    urlCount: count(lower, /https?:\/\/\S+|www\.\S+/g),
    urgencyCount: URGENCY_WORDS.filter((phrase) => lower.includes(phrase)).length,
    exclamationMarks: count(text, /!/g),
    capsRatio: text.split(/\s+/).filter(isShouted).length / Math.max(wordCount, 1),
    lengthNorm: Math.min(characters.length / 500, 1),
    specialCharRatio:
      characters.filter((char) => !/[\p{L}\p{N}\s]/u.test(char)).length / Math.max(characters.length, 1),
    suspiciousDomains: count(lower, /\b\w+\.\w{2,4}\b/g),
    actionVerbs: count(lower, /\b(?:click|verify|confirm|update|login|log.?in|secure|access)\b/g),
    financialTerms: count(lower, /\b(?:account|bank|credit|payment|invoice|billing|password|credential)\b/g),
    grammarScore: Math.min(avgSentenceLength / 20, 1),
  };
}

export function scanPhishing(text: string): PhishingScan {
  if (!text.trim()) {
    return { phishingProbability: 0, isPhishing: false, confidence: 1, risk: 'LOW', features: {} };
  }

  const features = extractPhishingFeatures(text);
  const weighted = PHISHING_FEATURE_NAMES.reduce(
    (sum, name, i) => sum + features[name] * FEATURE_WEIGHTS[i],
    0,
  );
  const probability = Math.min(weighted, 1);
  const phishingProbability = toPercent(probability);

  return {
    phishingProbability,
    isPhishing: phishingProbability >= 50,
    confidence: probabilityConfidence(probability),
    risk: phishingProbability >= 70 ? 'HIGH' : phishingProbability >= 40 ? 'MEDIUM' : 'LOW',
    features,
  };
}

/**
 * Email phishing detector
 *
 * Weighted sum over ten hand-crafted features: links, urgency wording,
 * shouting, calls to action and financial vocabulary.
 */
export class EmailPhishingDetector implements Detector {
  metadata: DetectorMetadata = {
    id: 'email-phishing',
    name: 'Email Phishing',
    description: 'Scores message text on urgency, link and call-to-action features',
    input: 'text',
    scoreKey: 'email_phishing_score',
    version: '1.0.0',
  };

  detect(signal: SignalInput): DetectorOutput {
    const scan = scanPhishing(signalText(signal));
    return {
      scores: { email_phishing_score: scan.phishingProbability },
      details: { ...scan },
    };
  }
}
