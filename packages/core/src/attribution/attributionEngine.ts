import type { FusionWeights } from '../fusion/weights.js';
import type { LogFn } from '../logging.js';
import { FACTOR_LABELS, SCORE_KEYS, type ScoreKey, type ScoreVector } from '../scores/scoreKeys.js';
import { classifyRisk } from '../schemas/verdict.js';
import { apportion } from '../utils/apportion.js';
import type { ModelExplainer } from './explainer.js';

export interface RankedFactor {
  key: ScoreKey;
  label: string;
  /** Share of total importance, one decimal */
  percentage: number;
}

export type AttributionMethod = 'model' | 'contribution';

export interface Attribution {
  /** Factor label → percentage; sums to 100 unless every importance is 0 */
  featureImportance: Record<string, number>;

  /** Up to three "Label (N%)" entries with a non-zero share */
  topFactors: string[];

  /** Every factor, highest share first */
  rankedFactors: RankedFactor[];

  narrative: string;
  method: AttributionMethod;
}

export interface AttributionEngineOptions {
  weights: FusionWeights;
  explainer?: ModelExplainer;
  onLog?: LogFn;
}

/**
 * Attribution Engine - explains which score keys drove a verdict
 */
export class AttributionEngine {
  private readonly weights: FusionWeights;
  private explainer?: ModelExplainer;
  private readonly onLog?: LogFn;

  constructor(options: AttributionEngineOptions) {
    this.weights = options.weights;
    this.explainer = options.explainer;
    this.onLog = options.onLog;
  }

  get hasExplainer(): boolean {
    return this.explainer !== undefined;
  }

  /**
   * Replace (or remove) the model explainer used by subsequent calls
   */
  useExplainer(explainer: ModelExplainer | undefined): void {
    this.explainer = explainer;
  }

  explain(vector: ScoreVector, unifiedScore: number): Attribution {
    const { importances, method } = this.importances(vector);

    const total = importances.reduce((sum, value) => sum + value, 0);
    const percentages =
      total > 0
        ? apportion(
            importances.map((value) => (value / total) * 100),
            100,
            1,
          )
        : importances.map(() => 0);

    const rankedFactors = SCORE_KEYS.map((key, i) => ({
      key,
      label: FACTOR_LABELS[key],
      percentage: percentages[i],
    })).sort((a, b) => b.percentage - a.percentage);

    const featureImportance: Record<string, number> = {};
    for (const factor of rankedFactors) {
      featureImportance[factor.label] = factor.percentage;
    }

    const topFactors = rankedFactors
      .filter((factor) => factor.percentage > 0)
      .slice(0, 3)
      .map((factor) => `${factor.label} (${Math.round(factor.percentage)}%)`);

    return {
      featureImportance,
      topFactors,
      rankedFactors,
      narrative: buildNarrative(rankedFactors, unifiedScore, method),
      method,
    };
  }

  private importances(vector: ScoreVector): { importances: number[]; method: AttributionMethod } {
    const explainer = this.explainer;
    if (explainer) {
      try {
        const values = explainer.importances(vector);
        if (values.length !== SCORE_KEYS.length || !values.every(Number.isFinite)) {
          throw new Error(`Explainer ${explainer.id} returned an invalid importance vector`);
        }
        return { importances: values.map(Math.abs), method: 'model' };
      } catch (error) {
        this.onLog?.('Explainer failed, using weighted contributions', 'warn', {
          explainerId: explainer.id,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return {
      importances: SCORE_KEYS.map((key) => vector[key] * this.weights[key]),
      method: 'contribution',
    };
  }
}

function buildNarrative(factors: RankedFactor[], unifiedScore: number, method: AttributionMethod): string {
  const { band } = classifyRisk(unifiedScore);
  const active = factors.filter((factor) => factor.percentage > 1);
  const lines = active.length
    ? active.map((factor) => `  - ${factor.label}: ${Math.round(factor.percentage)}% contribution`).join('\n')
    : '  (none)';
  const source = method === 'model' ? 'Trained model attribution' : 'Weighted contribution analysis';

  let narrative =
    `Risk Score: ${Math.round(unifiedScore)}/100 (${band})\n\n` +
    `Main contributing factors:\n${lines}\n\n` +
    `Explanation: ${source} identified ${active.length} active risk factors.`;

  const dominant = factors[0];
  if (dominant && dominant.percentage > 0) {
    narrative += ` The dominant risk factor is '${dominant.label}' at ${Math.round(dominant.percentage)}% of total risk weight.`;
  }
  return narrative;
}
