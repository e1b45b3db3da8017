// Score contract
export * from './scores/scoreKeys.js';
export * from './scores/normalize.js';

// Errors and logging
export * from './errors.js';
export type { LogFn, LogLevel } from './logging.js';

// Schemas
export * from './schemas/signal.js';
export * from './schemas/verdict.js';

// Fusion
export * from './fusion/weights.js';
export * from './fusion/scorer.js';
export * from './fusion/riskModel.js';
export * from './fusion/fusionEngine.js';

// Correlation graph
export * from './graph/entityExtraction.js';
export * from './graph/correlationGraph.js';

// Attribution
export * from './attribution/explainer.js';
export * from './attribution/attributionEngine.js';

// Detection
export * from './detection/detector.js';
export * from './detection/orchestrator.js';

// Utilities
export { apportion } from './utils/apportion.js';
export { clamp, roundTo } from './utils/round.js';
export { toIsoTimestamp } from './utils/time.js';
