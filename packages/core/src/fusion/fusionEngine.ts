import type { LogFn } from '../logging.js';
import { normalizeScores, type RawScores } from '../scores/normalize.js';
import { SCORE_KEYS, type ScoreKey, zeroVector } from '../scores/scoreKeys.js';
import { type RiskAction, type RiskBand, classifyRisk } from '../schemas/verdict.js';
import { clamp, roundTo } from '../utils/round.js';
import { type Scorer, type ScoringMethod, WeightedAverageScorer } from './scorer.js';
import { DEFAULT_WEIGHTS, type FusionWeights, validateWeights } from './weights.js';

export interface FusionResult {
  /** 0-100, one decimal */
  unifiedRiskScore: number;
  riskBand: RiskBand;
  action: RiskAction;

  /** Distance from the 50 midpoint, 0-1 */
  confidence: number;

  /** score × weight per canonical key, one decimal */
  moduleContributions: Record<ScoreKey, number>;

  weightedAverage: number;

  /** 'none' when nothing was scored */
  method: ScoringMethod | 'none';
}

export interface FusionEngineOptions {
  weights?: Readonly<Record<string, number>>;

  /** Defaults to a weighted-average scorer over `weights` */
  scorer?: Scorer;

  onLog?: LogFn;
}

/**
 * Fusion Engine - combines per-module scores into one verdict
 *
 * Stateless apart from the scorer reference, which `useScorer` replaces
 * whole; `fuse` reads it once per call.
 */
export class FusionEngine {
  readonly weights: FusionWeights;
  private scorer: Scorer;
  private readonly onLog?: LogFn;

  constructor(options: FusionEngineOptions = {}) {
    this.weights = validateWeights(options.weights ?? DEFAULT_WEIGHTS);
    this.scorer = options.scorer ?? new WeightedAverageScorer(this.weights);
    this.onLog = options.onLog;
  }

  get scorerKind(): Scorer['kind'] {
    return this.scorer.kind;
  }

  /**
   * Replace the scorer used by subsequent `fuse` calls
   */
  useScorer(scorer: Scorer): void {
    this.scorer = scorer;
    this.onLog?.('Fusion scorer replaced', 'info', { kind: scorer.kind });
  }

  /**
   * Fuse producer scores into a unified risk verdict.
   *
   * An empty input means no detector ran: the result is 0 / LOW / VERIFY
   * with confidence 1 and no scorer is invoked.
   *
   * @throws InvalidScoreError for a non-numeric score value
   */
  fuse(raw: RawScores): FusionResult {
    if (Object.keys(raw).length === 0) {
      return {
        unifiedRiskScore: 0,
        riskBand: 'LOW',
        action: 'VERIFY',
        confidence: 1,
        moduleContributions: zeroVector(),
        weightedAverage: 0,
        method: 'none',
      };
    }

    const { vector } = normalizeScores(raw);
    const scorer = this.scorer;
    const result = scorer.score(vector);

    const unifiedRiskScore = roundTo(clamp(result.score, 0, 100), 1);
    const { band, action } = classifyRisk(unifiedRiskScore);
    const confidence = roundTo(Math.min(Math.abs(unifiedRiskScore - 50) / 50, 1), 2);

    const moduleContributions = zeroVector();
    for (const key of SCORE_KEYS) {
      moduleContributions[key] = roundTo(vector[key] * this.weights[key], 1);
    }

    return {
      unifiedRiskScore,
      riskBand: band,
      action,
      confidence,
      moduleContributions,
      weightedAverage: roundTo(result.weightedAverage, 1),
      method: result.method,
    };
  }
}
