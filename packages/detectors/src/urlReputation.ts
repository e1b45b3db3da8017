import type { Detector, DetectorMetadata, DetectorOutput, SignalInput } from '@riskweave/core';
import { type Risk, probabilityConfidence, toPercent } from './text.js';

export const TRUSTED_DOMAINS: ReadonlySet<string> = new Set([
  'google.com',
  'microsoft.com',
  'apple.com',
  'amazon.com',
  'github.com',
  'stackoverflow.com',
  'wikipedia.org',
  'youtube.com',
  'linkedin.com',
  'twitter.com',
  'facebook.com',
  'instagram.com',
  'paypal.com',
  'stripe.com',
  'cloudflare.com',
  'fastly.com',
  'barclays.co.uk',
  'barclays.com',
  'hsbc.com',
  'lloydsbank.com',
  'natwest.com',
  'santander.co.uk',
  'chase.com',
  'wellsfargo.com',
  'bankofamerica.com',
  'citibank.com',
]);

const SUSPICIOUS_TLDS = new Set(['xyz', 'tk', 'ml', 'ga', 'cf', 'gq', 'pw', 'top', 'click', 'link', 'info']);

/** Brand and lure words that suggest impersonation outside trusted domains */
const BRAND_KEYWORDS = [
  'paypal',
  'amazon',
  'microsoft',
  'apple',
  'google',
  'facebook',
  'instagram',
  'twitter',
  'netflix',
  'bank',
  'secure',
  'alert',
  'update',
  'verify',
  'signin',
  'login',
  'account',
  'confirm',
  'barclays',
  'hsbc',
  'natwest',
  'chase',
  'citibank',
];

const SECOND_LEVEL_LABELS = new Set(['co', 'com', 'net', 'org', 'gov']);

export interface UrlFeatures {
  isHttps: number;
  domainLength: number;
  specialInDomain: number;
  subdomainCount: number;
  isIp: number;
  suspiciousTld: number;
  brandHit: number;
  isTrusted: number;
  urlLength: number;
  paramCount: number;
  pathDepth: number;
  numericRatio: number;
}

/** Heuristic weights; negative ones lower the risk */
const FEATURE_WEIGHTS: ReadonlyArray<readonly [keyof UrlFeatures, number]> = [
  ['isHttps', -0.2],
  ['domainLength', 0.1],
  ['specialInDomain', 0.1],
  ['subdomainCount', 0.05],
  ['isIp', 0.2],
  ['suspiciousTld', 0.15],
  ['brandHit', 0.15],
  ['isTrusted', -0.25],
  ['urlLength', 0.05],
  ['paramCount', 0.05],
  ['pathDepth', 0.05],
  ['numericRatio', 0.05],
];

const TRUSTED_CAP = 0.15;

export interface UrlScan {
  /** 0-100, one decimal */
  maliciousProbability: number;
  isMalicious: boolean;
  confidence: number;
  risk: Risk;
  indicators: string[];
  hostname: string;
  baseDomain: string;
}

/**
 * Registrable domain: 'sub.example.co.uk' → 'example.co.uk'
 */
export function baseDomain(hostname: string): string {
  const parts = hostname.toLowerCase().split('.');
  if (parts.length >= 3 && SECOND_LEVEL_LABELS.has(parts[parts.length - 2])) {
    return parts.slice(-3).join('.');
  }
  return parts.length >= 2 ? parts.slice(-2).join('.') : hostname;
}

export function parseUrl(raw: string): URL | null {
  const candidate = raw.includes('://') ? raw : `http://${raw}`;
  return URL.canParse(candidate) ? new URL(candidate) : null;
}

export function extractUrlFeatures(raw: string, parsed: URL): UrlFeatures {
  const hostname = parsed.hostname;
  const base = baseDomain(hostname);
  const trusted = TRUSTED_DOMAINS.has(base);
  const hostLength = Math.max(hostname.length, 1);
  const query = parsed.search.slice(1);

  return {
    isHttps: parsed.protocol === 'https:' ? 1 : 0,
    domainLength: Math.min(hostname.length / 50, 1),
    specialInDomain: (hostname.match(/[-_]/g)?.length ?? 0) / hostLength,
    subdomainCount: Math.max(hostname.split('.').length - 2, 0) / 5,
    isIp: /^\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}$/.test(hostname) ? 1 : 0,
    suspiciousTld: hostname.includes('.') && SUSPICIOUS_TLDS.has(hostname.split('.').pop() ?? '') ? 1 : 0,
    brandHit: !trusted && BRAND_KEYWORDS.some((keyword) => hostname.includes(keyword)) ? 1 : 0,
    isTrusted: trusted ? 1 : 0,
    urlLength: Math.min(raw.length / 200, 1),
    paramCount: query ? query.split('&').length / 10 : 0,
    pathDepth: parsed.pathname.split('/').filter(Boolean).length / 5,
    numericRatio: (hostname.match(/\d/g)?.length ?? 0) / hostLength,
  };
}

function indicatorsFor(features: UrlFeatures): string[] {
  const indicators: string[] = [];
  if (features.isHttps === 0) indicators.push('No HTTPS (unencrypted)');
  if (features.isIp === 1) indicators.push('IP address used as domain');
  if (features.suspiciousTld === 1) indicators.push('Suspicious top-level domain');
  if (features.brandHit === 1) indicators.push('Possible brand impersonation');
  if (features.domainLength > 0.5) indicators.push('Unusually long domain name');
  if (features.subdomainCount > 0.4) indicators.push('Multiple subdomains');
  return indicators;
}

export function scanUrl(url: string): UrlScan {
  const trimmed = url.trim();
  const parsed = trimmed ? parseUrl(trimmed) : null;
  if (!parsed) {
    return {
      maliciousProbability: 0,
      isMalicious: false,
      confidence: 1,
      risk: 'LOW',
      indicators: trimmed ? ['Unparseable URL'] : [],
      hostname: '',
      baseDomain: '',
    };
  }

  const features = extractUrlFeatures(trimmed, parsed);
  const raw = FEATURE_WEIGHTS.reduce((sum, [name, weight]) => sum + features[name] * weight, 0);
  let probability = Math.max(0, Math.min(raw + 0.5, 1));
  if (features.isTrusted === 1) {
    probability = Math.min(probability, TRUSTED_CAP);
  }

  const maliciousProbability = toPercent(probability);
  const hostname = parsed.hostname;

  return {
    maliciousProbability,
    isMalicious: maliciousProbability >= 50,
    confidence: probabilityConfidence(probability),
    risk:
      maliciousProbability >= 80
        ? 'CRITICAL'
        : maliciousProbability >= 60
          ? 'HIGH'
          : maliciousProbability >= 35
            ? 'MEDIUM'
            : 'LOW',
    indicators: indicatorsFor(features),
    hostname,
    baseDomain: baseDomain(hostname),
  };
}

/**
 * URL reputation detector
 *
 * Twelve lexical URL features (scheme, IP host, TLD, brand keywords, ...)
 * combined linearly; trusted base domains are capped at 15.
 */
export class UrlReputationDetector implements Detector {
  metadata: DetectorMetadata = {
    id: 'url-reputation',
    name: 'URL Reputation',
    description: 'Scores a URL on lexical features such as scheme, TLD and brand impersonation',
    input: 'url',
    scoreKey: 'url_score',
    version: '1.0.0',
  };

  detect(signal: SignalInput): DetectorOutput {
    const scan = scanUrl(signal.url ?? '');
    return {
      scores: { url_score: scan.maliciousProbability },
      details: { ...scan },
    };
  }
}
