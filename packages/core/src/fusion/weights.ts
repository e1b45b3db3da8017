import { InvalidWeightsError } from '../errors.js';
import { SCORE_KEYS, type ScoreKey, type ScoreVector, isScoreKey, zeroVector } from '../scores/scoreKeys.js';

export type FusionWeights = Readonly<Record<ScoreKey, number>>;

/**
 * Default weight table. Tunable through FUSION_WEIGHTS; must sum to 1.
 */
export const DEFAULT_WEIGHTS: FusionWeights = {
  credential_score: 0.3,
  ai_text_score: 0.2,
  malware_score: 0.25,
  email_phishing_score: 0.15,
  url_score: 0.07,
  injection_score: 0.03,
};

const WEIGHT_SUM_TOLERANCE = 1e-6;

/**
 * Check a weight table covers exactly the canonical keys and sums to 1
 *
 * @throws InvalidWeightsError
 */
export function validateWeights(weights: Readonly<Record<string, number>>): FusionWeights {
  const extra = Object.keys(weights).filter((key) => !isScoreKey(key));
  if (extra.length > 0) {
    throw new InvalidWeightsError(`Unknown weight keys: ${extra.join(', ')}`);
  }

  const validated = zeroVector();
  let sum = 0;
  for (const key of SCORE_KEYS) {
    const weight = weights[key];
    if (typeof weight !== 'number' || !Number.isFinite(weight)) {
      throw new InvalidWeightsError(`Missing weight for ${key}`);
    }
    if (weight < 0) {
      throw new InvalidWeightsError(`Weight for ${key} is negative`);
    }
    validated[key] = weight;
    sum += weight;
  }

  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new InvalidWeightsError(`Weights must sum to 1, got ${sum}`);
  }

  return validated;
}

export function weightedAverage(vector: ScoreVector, weights: FusionWeights): number {
  let total = 0;
  let weightSum = 0;
  for (const key of SCORE_KEYS) {
    total += vector[key] * weights[key];
    weightSum += weights[key];
  }
  return total / Math.max(weightSum, 1e-9);
}
