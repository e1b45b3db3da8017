import { describe, it, expect, vi } from 'vitest';
import {
  AttributionEngine,
  DEFAULT_WEIGHTS,
  LinearModelExplainer,
  LinearRiskModel,
  normalizeScores,
  type ModelExplainer,
  type RawScores,
} from '../src/index.js';

function vectorOf(raw: RawScores) {
  return normalizeScores(raw).vector;
}

function fixedExplainer(values: number[]): ModelExplainer {
  return { id: 'fixed', importances: () => values };
}

describe('AttributionEngine', () => {
  const engine = new AttributionEngine({ weights: DEFAULT_WEIGHTS });

  it('splits weighted contributions into percentages', () => {
    const attribution = engine.explain(vectorOf({ credential_score: 80, malware_score: 40 }), 34);

    expect(attribution.method).toBe('contribution');
    expect(attribution.featureImportance).toEqual({
      'Credential Exposure': 70.6,
      'Malware / Attachment': 29.4,
      'AI-Generated Text': 0,
      'Email Phishing': 0,
      'Malicious URL': 0,
      'Prompt Injection': 0,
    });
    expect(attribution.topFactors).toEqual(['Credential Exposure (71%)', 'Malware / Attachment (29%)']);
    expect(attribution.narrative).toBe(
      'Risk Score: 34/100 (MEDIUM)\n\n' +
        'Main contributing factors:\n' +
        '  - Credential Exposure: 71% contribution\n' +
        '  - Malware / Attachment: 29% contribution\n\n' +
        'Explanation: Weighted contribution analysis identified 2 active risk factors. ' +
        "The dominant risk factor is 'Credential Exposure' at 71% of total risk weight.",
    );
  });

  it('sums to 100 for any non-zero vector', () => {
    for (const raw of [
      { credential_score: 33, ai_text_score: 33, malware_score: 33 },
      { url: 7, injection: 91, phishing: 13.7 },
      { ai_text: 100 },
    ]) {
      const total = engine
        .explain(vectorOf(raw), 50)
        .rankedFactors.reduce((sum, factor) => sum + factor.percentage, 0);
      expect(total).toBeCloseTo(100, 1);
    }
  });

  it('returns a degenerate distribution for an all-zero vector', () => {
    const attribution = engine.explain(vectorOf({}), 0);

    expect(Object.values(attribution.featureImportance)).toEqual([0, 0, 0, 0, 0, 0]);
    expect(attribution.topFactors).toEqual([]);
    expect(attribution.narrative).toBe(
      'Risk Score: 0/100 (LOW)\n\n' +
        'Main contributing factors:\n  (none)\n\n' +
        'Explanation: Weighted contribution analysis identified 0 active risk factors.',
    );
  });

  it('limits top factors to three', () => {
    const attribution = engine.explain(
      vectorOf({ credential: 50, ai_text: 50, malware: 50, phishing: 50, url: 50 }),
      50,
    );

    expect(attribution.topFactors).toEqual([
      'Credential Exposure (31%)',
      'Malware / Attachment (26%)',
      'AI-Generated Text (21%)',
    ]);
  });

  it('uses absolute model importances when an explainer is configured', () => {
    const withModel = new AttributionEngine({
      weights: DEFAULT_WEIGHTS,
      explainer: fixedExplainer([-30, 10, 0, 0, 0, 0]),
    });
    const attribution = withModel.explain(vectorOf({ url: 90 }), 60);

    expect(attribution.method).toBe('model');
    expect(attribution.featureImportance['Credential Exposure']).toBe(75);
    expect(attribution.featureImportance['AI-Generated Text']).toBe(25);
    expect(attribution.narrative).toContain('Explanation: Trained model attribution identified 2 active risk factors.');
  });

  it('falls back to contributions when the explainer throws', () => {
    const onLog = vi.fn();
    const failing: ModelExplainer = {
      id: 'failing',
      importances: () => {
        throw new Error('explainer offline');
      },
    };
    const withModel = new AttributionEngine({ weights: DEFAULT_WEIGHTS, explainer: failing, onLog });
    const attribution = withModel.explain(vectorOf({ url: 90 }), 6.3);

    expect(attribution.method).toBe('contribution');
    expect(attribution.featureImportance['Malicious URL']).toBe(100);
    expect(onLog).toHaveBeenCalledWith('Explainer failed, using weighted contributions', 'warn', {
      explainerId: 'failing',
      error: 'explainer offline',
    });
  });

  it('falls back when the explainer returns the wrong shape', () => {
    const withModel = new AttributionEngine({ weights: DEFAULT_WEIGHTS, explainer: fixedExplainer([1, 2]) });
    expect(withModel.explain(vectorOf({ url: 90 }), 6.3).method).toBe('contribution');

    withModel.useExplainer(fixedExplainer([0, 0, Number.NaN, 0, 0, 0]));
    expect(withModel.explain(vectorOf({ url: 90 }), 6.3).method).toBe('contribution');

    withModel.useExplainer(undefined);
    expect(withModel.hasExplainer).toBe(false);
  });

  it('explains a linear model relative to its training means', () => {
    const model = new LinearRiskModel({
      kind: 'linear',
      version: 'fixed',
      intercept: 0,
      coefficients: [0.5, 0, 0.25, 0, 0, 0],
      featureMeans: [20, 0, 40, 0, 0, 0],
      sampleCount: 4,
      trainedAt: 0,
    });
    const explainer = new LinearModelExplainer(model);

    expect(explainer.id).toBe('explainer:linear:fixed');
    expect(explainer.importances(vectorOf({ credential: 60, malware: 80 }))).toEqual([20, 0, 10, 0, 0, 0]);
  });
});
