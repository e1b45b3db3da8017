import { InvalidScoreError } from '../errors.js';
import { clamp } from '../utils/round.js';
import { type ScoreKey, type ScoreVector, isScoreKey, resolveScoreKey, zeroVector } from './scoreKeys.js';

/**
 * Scores as producers hand them over: any key, values expected to be numeric
 */
export type RawScores = Readonly<Record<string, unknown>>;

export interface NormalizedScores {
  /** Every canonical key, absent ones at 0 */
  vector: ScoreVector;

  /** Keys outside the alias table, passed through unchanged */
  extensions: Record<string, number>;

  /** Canonical keys that producers actually supplied, in first-seen order */
  provided: ScoreKey[];
}

/**
 * Canonicalize producer scores into a ScoreVector.
 *
 * Aliases resolve to canonical keys; when two producer keys land on the same
 * canonical key the later one wins. Values are clamped to [0, 100].
 *
 * @throws InvalidScoreError when a value is not numeric
 */
export function normalizeScores(raw: RawScores): NormalizedScores {
  const vector = zeroVector();
  const extensions: Record<string, number> = {};
  const provided: ScoreKey[] = [];

  for (const [key, value] of Object.entries(raw)) {
    const numeric = clamp(coerceScore(key, value), 0, 100);
    const canonical = resolveScoreKey(key);

    if (isScoreKey(canonical)) {
      vector[canonical] = numeric;
      if (!provided.includes(canonical)) {
        provided.push(canonical);
      }
    } else {
      extensions[canonical] = numeric;
    }
  }

  return { vector, extensions, provided };
}

function coerceScore(key: string, value: unknown): number {
  if (typeof value === 'number' && !Number.isNaN(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (!Number.isNaN(parsed)) {
      return parsed;
    }
  }
  throw new InvalidScoreError(key, value);
}
