import type { Detector, DetectorMetadata, DetectorOutput, SignalInput } from '@riskweave/core';
import { probabilityConfidence, sentences, signalText, toPercent, words } from './text.js';

/** Stock phrasing common in generated and template mail */
const AI_PHRASES: readonly RegExp[] = [
  /i\s+(?:hope|trust)\s+this\s+(?:email\s+)?(?:finds|message)\s+you\s+well/i,
  /please\s+(?:do\s+not\s+hesitate\s+to\s+)?(?:contact|reach\s+out)/i,
  /as\s+(?:an\s+)?(?:ai|language\s+model)/i,
  /i\s+(?:understand|acknowledge)\s+(?:your|the)/i,
  /it\s+(?:is|has\s+been)\s+brought\s+to\s+(?:our|my)\s+attention/i,
  /we\s+(?:kindly\s+)?(?:request|ask)\s+(?:you\s+to|that\s+you)/i,
  /(?:immediate|urgent)\s+(?:action|attention)\s+(?:is\s+)?required/i,
  /thank\s+you\s+for\s+your\s+(?:prompt\s+)?(?:attention|cooperation|understanding)/i,
  /please\s+be\s+advised\s+that/i,
  /pursuant\s+to\s+(?:our|the)\s+(?:policies|terms|agreement)/i,
  /(?:failure|failure\s+to)\s+(?:comply|respond|verify|confirm)\s+(?:will|may|could)/i,
  /your\s+account\s+(?:has\s+been|will\s+be|may\s+be)\s+(?:suspended|terminated|restricted|blocked)/i,
  /click\s+(?:the\s+)?(?:link|button|here)\s+(?:below\s+)?to\s+(?:verify|confirm|update|secure)/i,
  /this\s+is\s+(?:an?\s+)?(?:automated|official|important|urgent)\s+(?:message|notice|notification)/i,
  /(?:verify|confirm|update)\s+your\s+(?:account|identity|information|details)\s+(?:immediately|now|today)/i,
];

const STRUCTURAL_PATTERNS: readonly RegExp[] = [
  /\b(?:furthermore|moreover|additionally|consequently|nevertheless|notwithstanding)\b/i,
  /\bin\s+(?:conclusion|summary|closing)\b/i,
  /\bit\s+is\s+(?:imperative|essential|crucial)\s+that\b/i,
  /\bplease\s+note\s+that\b/i,
  /\brest\s+assured\b/i,
  /\bwe\s+(?:sincerely\s+)?apologize\b/i,
  /\bat\s+your\s+earliest\s+convenience\b/i,
  /\bshould\s+you\s+(?:have\s+any\s+)?(?:questions|concerns|queries)\b/i,
];

const FORMAL_WORDS = new Set([
  'verification',
  'immediately',
  'confirm',
  'account',
  'security',
  'compliance',
  'credential',
  'authenticate',
  'identity',
  'procedure',
  'notification',
  'official',
  'mandatory',
  'policy',
  'regulation',
]);

export interface AiTextScan {
  /** 0-100, one decimal */
  aiProbability: number;
  isAiGenerated: boolean;
  confidence: number;
  riskLevel: 'HIGH' | 'MEDIUM' | 'LOW';
  phraseHits: number;
  structuralHits: number;
}

/**
 * 0-1 likelihood that text is machine-written.
 *
 * Phrase hits saturate at 5 (weight 0.55), structural hits at 4 (0.20);
 * sentence-length uniformity adds up to 0.10 and formal vocabulary up to 0.15.
 */
export function aiTextProbability(text: string): { probability: number; phraseHits: number; structuralHits: number } {
  const phraseHits = AI_PHRASES.filter((pattern) => pattern.test(text)).length;
  const structuralHits = STRUCTURAL_PATTERNS.filter((pattern) => pattern.test(text)).length;

  let score = Math.min(phraseHits / 5, 1) * 0.55 + Math.min(structuralHits / 4, 1) * 0.2;

  const lengths = sentences(text).map((sentence) => sentence.split(/\s+/).length);
  if (lengths.length >= 3) {
    const avg = lengths.reduce((sum, length) => sum + length, 0) / lengths.length;
    const variance = lengths.reduce((sum, length) => sum + (length - avg) ** 2, 0) / lengths.length;
    score += Math.max(0, 1 - variance / (avg ** 2 + 1)) * 0.1;
  }

  const vocabulary = new Set(words(text));
  const formal = [...vocabulary].filter((word) => FORMAL_WORDS.has(word)).length;
  score += Math.min((formal / Math.max(vocabulary.size, 1)) * 3, 0.15);

  return { probability: Math.min(score, 1), phraseHits, structuralHits };
}

export function scanAiText(text: string): AiTextScan {
  if (!text.trim()) {
    return { aiProbability: 0, isAiGenerated: false, confidence: 1, riskLevel: 'LOW', phraseHits: 0, structuralHits: 0 };
  }

  const { probability, phraseHits, structuralHits } = aiTextProbability(text);
  const aiProbability = toPercent(probability);

  return {
    aiProbability,
    isAiGenerated: aiProbability >= 50,
    confidence: probabilityConfidence(probability),
    riskLevel: aiProbability >= 70 ? 'HIGH' : aiProbability >= 40 ? 'MEDIUM' : 'LOW',
    phraseHits,
    structuralHits,
  };
}

/**
 * AI-generated text detector (phrase and style heuristic)
 */
export class AiTextDetector implements Detector {
  metadata: DetectorMetadata = {
    id: 'ai-text',
    name: 'AI-Generated Text',
    description: 'Estimates whether message text was machine-written from phrasing and style',
    input: 'text',
    scoreKey: 'ai_text_score',
    version: '1.0.0',
  };

  detect(signal: SignalInput): DetectorOutput {
    const scan = scanAiText(signalText(signal));
    return {
      scores: { ai_text_score: scan.aiProbability },
      details: { ...scan },
    };
  }
}
