import type { LinearRiskModel } from '../fusion/riskModel.js';
import { type ScoreVector, toFeatureArray } from '../scores/scoreKeys.js';

/**
 * Model-based per-feature importances, one value per canonical score key in
 * feature-vector order. Values may be signed.
 */
export interface ModelExplainer {
  readonly id: string;
  importances(vector: ScoreVector): number[];
}

/**
 * Exact additive attributions of a linear model: coef_i × (x_i − mean_i)
 */
export class LinearModelExplainer implements ModelExplainer {
  readonly id: string;
  private readonly model: LinearRiskModel;

  constructor(model: LinearRiskModel) {
    this.model = model;
    this.id = `explainer:${model.id}`;
  }

  importances(vector: ScoreVector): number[] {
    return this.model.contributions(toFeatureArray(vector));
  }
}
