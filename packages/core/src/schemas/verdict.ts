import { z } from 'zod';

export const RiskBandEnum = z.enum(['CRITICAL', 'HIGH', 'MEDIUM', 'LOW']);
export type RiskBand = z.infer<typeof RiskBandEnum>;

export const RiskActionEnum = z.enum(['BLOCK', 'ESCALATE', 'WARN', 'VERIFY']);
export type RiskAction = z.infer<typeof RiskActionEnum>;

/**
 * Band thresholds on the final clamped score, inclusive lower bounds, highest first
 */
export const RISK_BANDS: ReadonlyArray<{ band: RiskBand; action: RiskAction; minScore: number }> = [
  { band: 'CRITICAL', action: 'BLOCK', minScore: 76 },
  { band: 'HIGH', action: 'ESCALATE', minScore: 51 },
  { band: 'MEDIUM', action: 'WARN', minScore: 21 },
  { band: 'LOW', action: 'VERIFY', minScore: 0 },
];

export function classifyRisk(score: number): { band: RiskBand; action: RiskAction } {
  for (const entry of RISK_BANDS) {
    if (score >= entry.minScore) {
      return { band: entry.band, action: entry.action };
    }
  }
  return { band: 'LOW', action: 'VERIFY' };
}

const BAND_RANK: Record<RiskBand, number> = {
  LOW: 0,
  MEDIUM: 1,
  HIGH: 2,
  CRITICAL: 3,
};

/**
 * True when `band` is at least as severe as `threshold`
 */
export function bandAtLeast(band: RiskBand, threshold: RiskBand): boolean {
  return BAND_RANK[band] >= BAND_RANK[threshold];
}
