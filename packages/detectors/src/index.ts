export * from './aiText.js';
export * from './credentialExposure.js';
export * from './emailPhishing.js';
export * from './malwareAttachment.js';
export * from './promptInjection.js';
export * from './urlReputation.js';
export { signalText, type Risk } from './text.js';
export { DETECTOR_IDS, createDefaultRegistry } from './registry.js';
export { createDetectionPipeline, loadRiskModelFile } from './pipeline.js';
export type { DetectionPipelineOptions } from './pipeline.js';
