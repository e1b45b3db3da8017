import { roundTo, type SignalInput } from '@riskweave/core';

export type Risk = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW';

/**
 * Text the text-family detectors analyse: subject and body
 */
export function signalText(signal: SignalInput): string {
  return [signal.emailSubject, signal.emailText].filter((part): part is string => Boolean(part?.trim())).join('\n');
}

/**
 * Words as matched by \b\w+\b on lowercased text
 */
export function words(text: string): string[] {
  return text.toLowerCase().match(/\b\w+\b/g) ?? [];
}

/**
 * Sentences split on terminal punctuation, trimmed, empties dropped
 */
export function sentences(text: string): string[] {
  return text
    .split(/[.!?]+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

/**
 * 0-1 probability → percentage with one decimal
 */
export function toPercent(probability: number): number {
  return roundTo(probability * 100, 1);
}

/**
 * Distance of a 0-1 probability from 0.5, scaled to 0-1
 */
export function probabilityConfidence(probability: number): number {
  return roundTo(Math.abs(probability - 0.5) * 2, 2);
}
