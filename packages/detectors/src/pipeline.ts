import { readFile } from 'node:fs/promises';
import {
  AttributionEngine,
  DEFAULT_WEIGHTS,
  DetectionOrchestrator,
  FusionEngine,
  LinearModelExplainer,
  LinearRiskModel,
  TrainedModelScorer,
  validateWeights,
  type DetectorRegistry,
  type LogFn,
} from '@riskweave/core';
import { createDefaultRegistry } from './registry.js';

export interface DetectionPipelineOptions {
  /** Fusion weight table (default: DEFAULT_WEIGHTS) */
  weights?: Readonly<Record<string, number>>;

  /** Trained model; enables the blended scorer and model attribution */
  model?: LinearRiskModel;

  /** Share of the model prediction in the blend (default: 0.7) */
  modelBlend?: number;

  detectorTimeoutMs?: number;

  /** Defaults to every built-in detector */
  registry?: DetectorRegistry;

  now?: () => Date;
  onLog?: LogFn;
}

/**
 * Assemble fusion, attribution and the orchestrator over a detector registry
 */
export function createDetectionPipeline(options: DetectionPipelineOptions = {}): DetectionOrchestrator {
  const weights = validateWeights(options.weights ?? DEFAULT_WEIGHTS);
  const { model, onLog } = options;

  const fusion = new FusionEngine({
    weights,
    scorer: model ? new TrainedModelScorer({ model, weights, blend: options.modelBlend, onLog }) : undefined,
    onLog,
  });
  const attribution = new AttributionEngine({
    weights,
    explainer: model ? new LinearModelExplainer(model) : undefined,
    onLog,
  });

  return new DetectionOrchestrator({
    registry: options.registry ?? createDefaultRegistry(),
    fusion,
    attribution,
    detectorTimeoutMs: options.detectorTimeoutMs,
    now: options.now,
    onLog,
  });
}

/**
 * Read a serialized LinearRiskModel from a JSON file
 *
 * @throws Error when the file is missing, not JSON, or not a valid model
 */
export async function loadRiskModelFile(path: string): Promise<LinearRiskModel> {
  const raw = await readFile(path, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Risk model file ${path} is not valid JSON`, { cause: error });
  }
  return LinearRiskModel.fromJSON(parsed);
}
