import type { LogFn } from '../logging.js';
import { type ScoreVector, toFeatureArray } from '../scores/scoreKeys.js';
import type { RiskModel } from './riskModel.js';
import { type FusionWeights, weightedAverage } from './weights.js';

/**
 * How a fused score was produced
 *
 * - 'weighted-average': the baseline scorer
 * - 'trained-model': model prediction blended with the weighted average
 * - 'fallback': the trained model failed and the weighted average was used
 */
export type ScoringMethod = 'weighted-average' | 'trained-model' | 'fallback';

export interface ScorerResult {
  /** Unclamped, unrounded score */
  score: number;
  weightedAverage: number;
  method: ScoringMethod;
  modelPrediction?: number;
}

/**
 * Scoring capability used by the fusion engine
 */
export interface Scorer {
  readonly kind: 'weighted-average' | 'trained-model';
  score(vector: ScoreVector): ScorerResult;
}

export class WeightedAverageScorer implements Scorer {
  readonly kind = 'weighted-average';
  private readonly weights: FusionWeights;

  constructor(weights: FusionWeights) {
    this.weights = weights;
  }

  score(vector: ScoreVector): ScorerResult {
    const average = weightedAverage(vector, this.weights);
    return { score: average, weightedAverage: average, method: 'weighted-average' };
  }
}

export interface TrainedModelScorerOptions {
  model: RiskModel;
  weights: FusionWeights;

  /** Share of the model prediction in the blend (default: 0.7) */
  blend?: number;

  onLog?: LogFn;
}

/**
 * Blends a trained model's prediction with the weighted average.
 *
 * Never throws from `score`: a failing or non-finite prediction degrades to
 * the weighted average.
 */
export class TrainedModelScorer implements Scorer {
  readonly kind = 'trained-model';
  readonly blend: number;
  private model: RiskModel;
  private readonly baseline: WeightedAverageScorer;
  private readonly onLog?: LogFn;

  constructor(options: TrainedModelScorerOptions) {
    const blend = options.blend ?? 0.7;
    if (!(blend >= 0 && blend <= 1)) {
      throw new Error(`Model blend must be within [0, 1], got ${blend}`);
    }
    this.blend = blend;
    this.model = options.model;
    this.baseline = new WeightedAverageScorer(options.weights);
    this.onLog = options.onLog;
  }

  get currentModel(): RiskModel {
    return this.model;
  }

  /**
   * Swap in a retrained model. Calls already inside `score` keep the old one.
   */
  replaceModel(model: RiskModel): void {
    this.model = model;
  }

  score(vector: ScoreVector): ScorerResult {
    const model = this.model;
    const base = this.baseline.score(vector);

    try {
      const prediction = model.predict(toFeatureArray(vector));
      if (!Number.isFinite(prediction)) {
        throw new Error(`Model ${model.id} returned a non-finite prediction`);
      }
      return {
        score: this.blend * prediction + (1 - this.blend) * base.weightedAverage,
        weightedAverage: base.weightedAverage,
        method: 'trained-model',
        modelPrediction: prediction,
      };
    } catch (error) {
      this.onLog?.('Trained scorer failed, using weighted average', 'warn', {
        modelId: model.id,
        error: error instanceof Error ? error.message : String(error),
      });
      return { ...base, method: 'fallback' };
    }
  }
}
