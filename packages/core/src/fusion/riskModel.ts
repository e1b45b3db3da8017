import { z } from 'zod';
import { SCORE_KEYS, toFeatureArray } from '../scores/scoreKeys.js';
import { normalizeScores } from '../scores/normalize.js';
import { solveLinearSystem } from '../utils/linalg.js';

/**
 * A trained scorer over the canonical feature vector (0-100 per feature)
 */
export interface RiskModel {
  readonly id: string;

  /** Predicted risk, expected in [0, 100] */
  predict(features: readonly number[]): number;
}

const featureArray = z.array(z.number()).length(SCORE_KEYS.length);

export const LinearRiskModelSchema = z.object({
  kind: z.literal('linear'),
  version: z.string().min(1),
  intercept: z.number(),
  coefficients: featureArray,
  /** Training-set feature means, the baseline for attributions */
  featureMeans: featureArray,
  sampleCount: z.number().int().min(0),
  trainedAt: z.number().int(),
});
export type LinearRiskModelParams = z.infer<typeof LinearRiskModelSchema>;

export const TrainingSampleSchema = z.object({
  scores: z.record(z.unknown()),
  label: z.number().min(0).max(100),
});
export type TrainingSample = z.infer<typeof TrainingSampleSchema>;

export interface TrainOptions {
  /** Ridge penalty on coefficients (default: 1e-3) */
  ridge?: number;

  /** Version tag stored with the model (default: 'linear-1') */
  version?: string;

  /** Clock used for trainedAt, unix seconds */
  now?: () => number;
}

/**
 * Linear regression risk model: intercept + Σ coefficient_i × feature_i.
 */
export class LinearRiskModel implements RiskModel {
  readonly id: string;
  private readonly params: LinearRiskModelParams;

  constructor(params: LinearRiskModelParams) {
    this.params = params;
    this.id = `linear:${params.version}`;
  }

  get coefficients(): readonly number[] {
    return this.params.coefficients;
  }

  get intercept(): number {
    return this.params.intercept;
  }

  get featureMeans(): readonly number[] {
    return this.params.featureMeans;
  }

  predict(features: readonly number[]): number {
    if (features.length !== SCORE_KEYS.length) {
      throw new Error(`Expected ${SCORE_KEYS.length} features, got ${features.length}`);
    }
    let total = this.params.intercept;
    for (let i = 0; i < features.length; i++) {
      total += this.params.coefficients[i] * features[i];
    }
    return total;
  }

  /**
   * Per-feature additive contributions relative to the training mean
   */
  contributions(features: readonly number[]): number[] {
    return features.map((x, i) => this.params.coefficients[i] * (x - this.params.featureMeans[i]));
  }

  toJSON(): LinearRiskModelParams {
    return { ...this.params };
  }

  static fromJSON(data: unknown): LinearRiskModel {
    return new LinearRiskModel(LinearRiskModelSchema.parse(data));
  }

  /**
   * Fit by ridge-regularized least squares (normal equations).
   *
   * @throws Error when there are no samples
   */
  static train(samples: readonly TrainingSample[], options: TrainOptions = {}): LinearRiskModel {
    if (samples.length === 0) {
      throw new Error('Cannot train a risk model without samples');
    }
    const ridge = options.ridge ?? 1e-3;
    const now = options.now ?? (() => Math.floor(Date.now() / 1000));

    // Column 0 is the intercept; features scaled to [0, 1] for conditioning.
    const rows = samples.map((sample) => [
      1,
      ...toFeatureArray(normalizeScores(sample.scores).vector).map((x) => x / 100),
    ]);
    const labels = samples.map((sample) => sample.label);
    const width = SCORE_KEYS.length + 1;

    const xtx = Array.from({ length: width }, () => new Array<number>(width).fill(0));
    const xty = new Array<number>(width).fill(0);
    for (let r = 0; r < rows.length; r++) {
      for (let i = 0; i < width; i++) {
        xty[i] += rows[r][i] * labels[r];
        for (let j = 0; j < width; j++) {
          xtx[i][j] += rows[r][i] * rows[r][j];
        }
      }
    }
    for (let i = 1; i < width; i++) {
      xtx[i][i] += ridge;
    }

    const solution = solveLinearSystem(xtx, xty);
    const featureMeans = SCORE_KEYS.map(
      (_, i) => rows.reduce((sum, row) => sum + row[i + 1] * 100, 0) / rows.length,
    );

    return new LinearRiskModel({
      kind: 'linear',
      version: options.version ?? 'linear-1',
      intercept: solution[0],
      coefficients: solution.slice(1).map((w) => w / 100),
      featureMeans,
      sampleCount: samples.length,
      trainedAt: now(),
    });
  }
}
