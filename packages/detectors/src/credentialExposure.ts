import type { Detector, DetectorMetadata, DetectorOutput, SignalInput } from '@riskweave/core';
import { type Risk, signalText } from './text.js';

interface CredentialPattern {
  type: string;
  pattern: RegExp;
  description: string;
}

/**
 * Credential catalogue. Patterns with a capture group report the group.
 */
const CREDENTIAL_PATTERNS: readonly CredentialPattern[] = [
  {
    type: 'api_key_openai',
    pattern: /sk[-_](?:live|test|proj)?[-_]?[a-zA-Z0-9]{20,}/gi,
    description: 'OpenAI / Stripe-style API key',
  },
  { type: 'api_key_aws', pattern: /AKIA[0-9A-Z]{16}/gi, description: 'AWS Access Key ID' },
  {
    type: 'api_key_generic',
    pattern: /(?:api[_\-\s]?key|access[_\-\s]?token|auth[_\-\s]?token)\s*[:=>\s]+['"]?([a-zA-Z0-9_-]{16,})['"]?/gi,
    description: 'Generic API key / token',
  },
  {
    type: 'password',
    pattern: /(?:password|passwd|pwd|pass)\s*[:=\->\s]+['"]?([^\s'"]{6,})['"]?/gi,
    description: 'Exposed password',
  },
  { type: 'credit_card', pattern: /\b\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{4}\b/g, description: 'Credit card number' },
  { type: 'ssn', pattern: /\b\d{3}-\d{2}-\d{4}\b/g, description: 'Social Security Number' },
  {
    type: 'jwt',
    pattern: /eyJ[a-zA-Z0-9_-]+\.eyJ[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/g,
    description: 'JSON Web Token (JWT)',
  },
  {
    type: 'private_key',
    pattern: /-----BEGIN\s+(?:RSA\s+|EC\s+|DSA\s+|OPENSSH\s+)?PRIVATE\s+KEY-----/gi,
    description: 'Private cryptographic key',
  },
  { type: 'github_token', pattern: /gh[pousr]_[A-Za-z0-9_]{36,}/gi, description: 'GitHub Personal Access Token' },
  { type: 'google_api_key', pattern: /AIza[0-9A-Za-z_-]{35}/g, description: 'Google API key' },
  { type: 'slack_token', pattern: /xox[baprs]-[0-9A-Za-z-]{10,}/gi, description: 'Slack token' },
];

const CRITICAL_TYPES = new Set(['api_key_openai', 'api_key_aws', 'private_key', 'credit_card', 'ssn', 'jwt']);
const HIGH_TYPES = new Set(['password', 'api_key_generic', 'github_token', 'google_api_key', 'slack_token']);

const RISK_SCORES: Record<Risk, number> = { CRITICAL: 95, HIGH: 75, MEDIUM: 40, LOW: 5 };

export interface CredentialFinding {
  type: string;
  description: string;
  /** First four and last two characters, the rest masked */
  preview: string;
}

export interface CredentialScan {
  secretsFound: Record<string, number>;
  findings: CredentialFinding[];
  risk: Risk;
  totalCount: number;
}

/**
 * Luhn checksum over the digits of `value`
 */
export function luhnValid(value: string): boolean {
  const digits = value.replace(/\D/g, '');
  let total = 0;
  for (let i = 0; i < digits.length; i++) {
    let digit = Number(digits[digits.length - 1 - i]);
    if (i % 2 === 1) {
      digit *= 2;
      if (digit > 9) digit -= 9;
    }
    total += digit;
  }
  return digits.length > 0 && total % 10 === 0;
}

export function maskSecret(raw: string): string {
  return raw.length > 8 ? `${raw.slice(0, 4)}****${raw.slice(-2)}` : '****';
}

export function scanCredentials(text: string): CredentialScan {
  const secretsFound: Record<string, number> = {};
  const findings: CredentialFinding[] = [];

  for (const { type, pattern, description } of CREDENTIAL_PATTERNS) {
    let matches = [...text.matchAll(pattern)].map((match) => match[1] ?? match[0]);
    if (type === 'credit_card') {
      matches = matches.filter(luhnValid);
    }
    if (matches.length === 0) continue;

    secretsFound[type] = matches.length;
    for (const raw of matches) {
      findings.push({ type, description, preview: maskSecret(raw) });
    }
  }

  const types = Object.keys(secretsFound);
  const totalCount = findings.length;
  let risk: Risk = 'LOW';
  if (types.some((type) => CRITICAL_TYPES.has(type))) {
    risk = 'CRITICAL';
  } else if (types.some((type) => HIGH_TYPES.has(type))) {
    risk = 'HIGH';
  } else if (totalCount > 0) {
    risk = 'MEDIUM';
  }

  return { secretsFound, findings, risk, totalCount };
}

/**
 * Base score by risk, plus 3 per secret (at most 15), capped at 100
 */
export function credentialScore(scan: CredentialScan): number {
  return Math.min(RISK_SCORES[scan.risk] + Math.min(scan.totalCount * 3, 15), 100);
}

/**
 * Credential exposure detector
 *
 * Scans message text for passwords, API keys, tokens, private keys and
 * card/identity numbers. Card numbers must pass the Luhn check.
 */
export class CredentialExposureDetector implements Detector {
  metadata: DetectorMetadata = {
    id: 'credential-exposure',
    name: 'Credential Exposure',
    description: 'Finds passwords, API keys, tokens, card numbers and SSNs in message text',
    input: 'text',
    scoreKey: 'credential_score',
    version: '1.0.0',
  };

  detect(signal: SignalInput): DetectorOutput {
    const scan = scanCredentials(signalText(signal));
    return {
      scores: { credential_score: credentialScore(scan) },
      details: { ...scan },
    };
  }
}
