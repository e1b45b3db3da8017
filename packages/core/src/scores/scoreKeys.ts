/**
 * Canonical score keys, in feature-vector order.
 */
export const SCORE_KEYS = [
  'credential_score',
  'ai_text_score',
  'malware_score',
  'email_phishing_score',
  'url_score',
  'injection_score',
] as const;

export type ScoreKey = (typeof SCORE_KEYS)[number];

/**
 * Normalized score vector: every canonical key present, values in [0, 100].
 */
export type ScoreVector = Readonly<Record<ScoreKey, number>>;

/**
 * Producer-supplied key aliases and the canonical key each resolves to
 */
export const SCORE_KEY_ALIASES: Readonly<Record<string, ScoreKey>> = {
  credential: 'credential_score',
  credentials: 'credential_score',
  ai_text: 'ai_text_score',
  malware: 'malware_score',
  email_phishing: 'email_phishing_score',
  phishing: 'email_phishing_score',
  url: 'url_score',
  injection: 'injection_score',
};

/**
 * Human-readable factor labels used in attributions
 */
export const FACTOR_LABELS: Readonly<Record<ScoreKey, string>> = {
  credential_score: 'Credential Exposure',
  ai_text_score: 'AI-Generated Text',
  malware_score: 'Malware / Attachment',
  email_phishing_score: 'Email Phishing',
  url_score: 'Malicious URL',
  injection_score: 'Prompt Injection',
};

export function isScoreKey(key: string): key is ScoreKey {
  return (SCORE_KEYS as readonly string[]).includes(key);
}

/**
 * Resolve a producer key to its canonical form. Unknown keys come back unchanged.
 */
export function resolveScoreKey(key: string): string {
  return SCORE_KEY_ALIASES[key] ?? key;
}

export function zeroVector(): Record<ScoreKey, number> {
  return {
    credential_score: 0,
    ai_text_score: 0,
    malware_score: 0,
    email_phishing_score: 0,
    url_score: 0,
    injection_score: 0,
  };
}

export function toFeatureArray(vector: ScoreVector): number[] {
  return SCORE_KEYS.map((key) => vector[key]);
}
