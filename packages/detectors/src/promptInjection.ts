import type { Detector, DetectorMetadata, DetectorOutput, SignalInput } from '@riskweave/core';
import { signalText } from './text.js';

interface InjectionPattern {
  name: string;
  pattern: RegExp;
  description: string;
}

const INJECTION_PATTERNS: readonly InjectionPattern[] = [
  { name: 'ignore_instructions', pattern: /ignore\s+(?:all\s+)?previous\s+instructions/i, description: 'Ignore previous instructions' },
  {
    name: 'system_prompt',
    pattern: /(?:reveal|show|print|display|output)\s+(?:your\s+)?(?:system\s+)?prompt/i,
    description: 'System prompt extraction',
  },
  { name: 'dan_mode', pattern: /\bdan\s*mode\b/i, description: 'DAN mode jailbreak' },
  { name: 'jailbreak', pattern: /\bjailbreak\b/i, description: 'Direct jailbreak request' },
  {
    name: 'forget_instructions',
    pattern: /forget\s+(?:all\s+)?(?:previous\s+|your\s+)?instructions/i,
    description: 'Forget instructions',
  },
  {
    name: 'show_secrets',
    pattern: /show\s+(?:me\s+)?(?:the\s+)?(?:api|key|secret|password|token|credential)/i,
    description: 'Request for secrets',
  },
  { name: 'developer_mode', pattern: /enable\s+developer\s+mode/i, description: 'Enable developer mode' },
  {
    name: 'unrestricted_ai',
    pattern: /you\s+are\s+now\s+(?:an?\s+)?(?:unrestricted|free|evil|unfiltered)\s+(?:ai|bot|assistant|model)/i,
    description: 'Unrestricted AI persona',
  },
  {
    name: 'pretend_no_rules',
    pattern: /pretend\s+(?:you\s+(?:have\s+no|don.t\s+have\s+any)\s+(?:rules|restrictions|filters|guidelines))/i,
    description: 'Pretend no rules',
  },
  {
    name: 'disregard_rules',
    pattern: /disregard\s+(?:all\s+)?(?:previous|prior|your)\s+(?:instructions|rules|guidelines|training)/i,
    description: 'Disregard rules',
  },
  {
    name: 'override_safety',
    pattern: /override\s+(?:all\s+)?(?:safety|restrictions|rules|filters|guidelines)/i,
    description: 'Override safety restrictions',
  },
  { name: 'no_restrictions', pattern: /act\s+as\s+if\s+you\s+have\s+no\s+restrictions/i, description: 'Act without restrictions' },
  {
    name: 'bypass_filter',
    pattern: /bypass\s+(?:all\s+)?(?:content\s+)?(?:filters|restrictions|rules|safety|moderation)/i,
    description: 'Bypass content filters',
  },
  {
    name: 'new_persona',
    pattern: /(?:your\s+new\s+(?:name|persona|role)|you\s+are\s+now\s+called)\s+\w+/i,
    description: 'New AI persona injection',
  },
  {
    name: 'token_manipulation',
    pattern: /<\s*(?:\/?\s*(?:system|human|assistant|user|context|instruction|prompt))\s*>/i,
    description: 'Token/tag manipulation',
  },
  {
    name: 'role_play_harmful',
    pattern: /(?:role.?play|rp)\s+as\s+(?:an?\s+)?(?:evil|hacker|criminal|unethical|malicious)/i,
    description: 'Harmful role-play',
  },
  {
    name: 'base64_injection',
    pattern: /(?:decode|run|execute|eval)\s+(?:this\s+)?(?:base64|b64)/i,
    description: 'Encoded command injection',
  },
  {
    name: 'prompt_leak',
    pattern: /(?:repeat|print|echo|output|show)\s+(?:back\s+)?(?:everything|all|the\s+text)\s+(?:above|before|that\s+came)/i,
    description: 'Prompt leakage attempt',
  },
];

/** Any of these lifts the risk to HIGH on its own */
const HIGH_SEVERITY = new Set(['ignore_instructions', 'dan_mode', 'jailbreak', 'override_safety', 'bypass_filter']);

export interface InjectionScan {
  isInjection: boolean;
  patternsFound: string[];
  patternCount: number;
  risk: 'HIGH' | 'MEDIUM' | 'LOW';
  matchedDetails: Array<{ name: string; description: string }>;
}

export function scanInjection(text: string): InjectionScan {
  const matched = INJECTION_PATTERNS.filter(({ pattern }) => pattern.test(text));
  const patternsFound = matched.map(({ name }) => name);
  const patternCount = patternsFound.length;

  let risk: InjectionScan['risk'] = patternCount >= 2 ? 'HIGH' : patternCount === 1 ? 'MEDIUM' : 'LOW';
  if (patternsFound.some((name) => HIGH_SEVERITY.has(name))) {
    risk = 'HIGH';
  }

  return {
    isInjection: patternCount > 0,
    patternsFound,
    patternCount,
    risk,
    matchedDetails: matched.map(({ name, description }) => ({ name, description })),
  };
}

/**
 * 5 when clean; otherwise 50 (75 at HIGH) plus 10 per pattern, at most +40
 */
export function injectionScore(scan: InjectionScan): number {
  if (!scan.isInjection) return 5;
  const base = scan.risk === 'HIGH' ? 75 : 50;
  return Math.min(base + Math.min(scan.patternCount * 10, 40), 100);
}

/**
 * Prompt injection detector
 */
export class PromptInjectionDetector implements Detector {
  metadata: DetectorMetadata = {
    id: 'prompt-injection',
    name: 'Prompt Injection',
    description: 'Matches jailbreak and prompt-injection phrasing aimed at AI assistants',
    input: 'text',
    scoreKey: 'injection_score',
    version: '1.0.0',
  };

  detect(signal: SignalInput): DetectorOutput {
    const scan = scanInjection(signalText(signal));
    return {
      scores: { injection_score: injectionScore(scan) },
      details: { ...scan },
    };
  }
}
