import { type Attribution, AttributionEngine } from '../attribution/attributionEngine.js';
import { FusionEngine, type FusionResult } from '../fusion/fusionEngine.js';
import type { CampaignReport, CorrelationGraph } from '../graph/correlationGraph.js';
import type { SignalData } from '../graph/entityExtraction.js';
import type { LogFn } from '../logging.js';
import { normalizeScores } from '../scores/normalize.js';
import type { ScoreKey } from '../scores/scoreKeys.js';
import { type SignalInput, attachmentSha256, hasAttachment, hasText, hasUrl, populatedInputs } from '../schemas/signal.js';
import { toIsoTimestamp } from '../utils/time.js';
import type { Detector, DetectorOutput, DetectorRegistry } from './detector.js';

export interface DetectorError {
  detectorId: string;
  error: string;
}

/**
 * Fusion and attribution for one signal, without campaign state
 */
export interface Assessment extends FusionResult {
  /** Canonical scores of the detectors that ran */
  moduleScores: Partial<Record<ScoreKey, number>>;

  /** Non-canonical producer keys, passed through */
  extensionScores: Record<string, number>;

  /** Raw detector output per detector id */
  moduleDetails: Record<string, Record<string, unknown>>;

  detectorErrors: DetectorError[];
  attribution: Attribution;
}

export interface VerdictResult extends Assessment {
  signalId: string;
  campaign: CampaignReport;
  processingTimeMs: number;

  /** ISO-8601 time the verdict was produced */
  timestamp: string;
}

export interface DetectionOrchestratorOptions {
  registry: DetectorRegistry;
  fusion: FusionEngine;
  attribution?: AttributionEngine;

  /** Per-detector time limit in milliseconds (default: 5000) */
  detectorTimeoutMs?: number;

  now?: () => Date;
  onLog?: LogFn;
}

/**
 * Detection Orchestrator - sequences detectors, fusion, correlation and attribution
 *
 * Holds no per-request state. Campaign state lives in the CorrelationGraph the
 * caller passes to `detect`.
 */
export class DetectionOrchestrator {
  readonly registry: DetectorRegistry;
  readonly fusion: FusionEngine;
  readonly attribution: AttributionEngine;
  private readonly detectorTimeoutMs: number;
  private readonly now: () => Date;
  private readonly onLog?: LogFn;

  constructor(options: DetectionOrchestratorOptions) {
    this.registry = options.registry;
    this.fusion = options.fusion;
    this.attribution =
      options.attribution ?? new AttributionEngine({ weights: options.fusion.weights, onLog: options.onLog });
    this.detectorTimeoutMs = options.detectorTimeoutMs ?? 5000;
    this.now = options.now ?? (() => new Date());
    this.onLog = options.onLog;
  }

  /**
   * Full pipeline: detectors → fusion → graph update and correlation → attribution
   */
  async detect(signal: SignalInput, session: CorrelationGraph): Promise<VerdictResult> {
    const startTime = Date.now();
    const assessment = await this.assess(signal);

    let timestamp = this.now().toISOString();
    if (signal.timestamp !== undefined) {
      const iso = toIsoTimestamp(signal.timestamp);
      if (iso === undefined) {
        this.onLog?.('Unparseable signal timestamp, using current time', 'warn', { timestamp: signal.timestamp });
      } else {
        timestamp = iso;
      }
    }
    // No await between add and correlate: the report reflects this signal.
    const signalId = session.addSignal('combined', graphData(signal), timestamp);
    const campaign = session.correlate();

    return {
      ...assessment,
      signalId,
      campaign,
      processingTimeMs: Date.now() - startTime,
      timestamp: this.now().toISOString(),
    };
  }

  /**
   * Detectors, fusion and attribution for a signal; campaign state is untouched
   */
  async assess(signal: SignalInput): Promise<Assessment> {
    const detectors = populatedInputs(signal).flatMap((input) => this.registry.getForInput(input));

    const rawScores: Record<string, number> = {};
    const moduleDetails: Record<string, Record<string, unknown>> = {};
    const detectorErrors: DetectorError[] = [];

    for (const detector of detectors) {
      try {
        const output = await this.runWithTimeout(detector, signal);
        // Reject malformed output before any of it is merged.
        normalizeScores(output.scores);
        Object.assign(rawScores, output.scores);
        moduleDetails[detector.metadata.id] = output.details;
      } catch (e) {
        const error = e instanceof Error ? e.message : String(e);
        detectorErrors.push({ detectorId: detector.metadata.id, error });
        this.onLog?.('Detector failed, continuing without its score', 'warn', {
          detectorId: detector.metadata.id,
          error,
        });
      }
    }

    const fused = this.fusion.fuse(rawScores);
    const normalized = normalizeScores(rawScores);

    const moduleScores: Partial<Record<ScoreKey, number>> = {};
    for (const key of normalized.provided) {
      moduleScores[key] = normalized.vector[key];
    }

    return {
      ...fused,
      moduleScores,
      extensionScores: normalized.extensions,
      moduleDetails,
      detectorErrors,
      attribution: this.attribution.explain(normalized.vector, fused.unifiedRiskScore),
    };
  }

  /**
   * Run one registered detector directly
   *
   * @throws Error when the detector is unknown, fails or times out
   */
  async runDetector(detectorId: string, signal: SignalInput): Promise<DetectorOutput> {
    const detector = this.registry.get(detectorId);
    if (!detector) {
      throw new Error(`Unknown detector: ${detectorId}`);
    }
    return this.runWithTimeout(detector, signal);
  }

  private async runWithTimeout(detector: Detector, signal: SignalInput): Promise<DetectorOutput> {
    let timer: NodeJS.Timeout | undefined;
    try {
      return await Promise.race([
        Promise.resolve(detector.detect(signal)),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new Error(`Detector ${detector.metadata.id} timed out`)),
            this.detectorTimeoutMs,
          );
        }),
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Entity-extraction payload for the correlation graph
 */
export function graphData(signal: SignalInput): SignalData {
  const data: Record<string, string> = {};
  if (signal.sender) data.sender = signal.sender;
  if (hasText(signal)) data.text = signal.emailText;
  if (hasUrl(signal)) data.url = signal.url;
  if (hasAttachment(signal)) {
    data.filename = signal.attachment.filename;
    const sha256 = attachmentSha256(signal.attachment);
    if (sha256) data.sha256 = sha256;
  }
  return data;
}
