import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import pc from 'picocolors';
import { z } from 'zod';
import { parseCsvList, type RiskweaveConfig } from '@riskweave/config';
import {
  CorrelationGraph,
  LinearRiskModel,
  SignalInputSchema,
  TrainingSampleSchema,
  type CampaignReport,
  type DetectionOrchestrator,
  type RiskBand,
  type SignalInput,
  type TrainingSample,
  type VerdictResult,
} from '@riskweave/core';

export type Colors = ReturnType<typeof pc.createColors>;

export interface DetectOptions {
  text?: string;
  subject?: string;
  url?: string;
  sender?: string;
  /** Path of a file to scan as the attachment */
  attachment?: string;
}

/**
 * Build a signal from command-line options, reading the attachment file if given
 */
export async function signalFromOptions(options: DetectOptions): Promise<SignalInput> {
  const signal: SignalInput = {};
  if (options.text) signal.emailText = options.text;
  if (options.subject) signal.emailSubject = options.subject;
  if (options.url) signal.url = options.url;
  if (options.sender) signal.sender = options.sender;
  if (options.attachment) {
    const content = await readFile(options.attachment);
    signal.attachment = {
      filename: basename(options.attachment),
      contentBase64: content.toString('base64'),
      sizeBytes: content.length,
    };
  }
  return signal;
}

/**
 * Parse a JSON array or JSON-lines document, validating each entry
 *
 * @throws Error naming the first entry that fails validation
 */
export function parseRecords<T>(content: string, schema: z.ZodType<T>, what: string): T[] {
  const trimmed = content.trim();
  if (trimmed === '') return [];

  const entries: Array<{ label: string; value: unknown }> = [];
  if (trimmed.startsWith('[')) {
    const parsed: unknown = parseJson(trimmed, `${what} file`);
    if (!Array.isArray(parsed)) {
      throw new Error(`Expected a JSON array of ${what}s`);
    }
    parsed.forEach((value, i) => entries.push({ label: `Entry ${i + 1}`, value }));
  } else {
    trimmed.split(/\r?\n/).forEach((line, i) => {
      if (line.trim() === '') return;
      entries.push({ label: `Line ${i + 1}`, value: parseJson(line, `Line ${i + 1}`) });
    });
  }

  return entries.map(({ label, value }) => {
    const result = schema.safeParse(value);
    if (!result.success) {
      const issue = result.error.issues[0];
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      throw new Error(`${label}: invalid ${what} (${path}${issue.message})`);
    }
    return result.data;
  });
}

function parseJson(text: string, label: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new Error(`${label} is not valid JSON`, { cause: error });
  }
}

export function parseSignals(content: string): SignalInput[] {
  return parseRecords(content, SignalInputSchema, 'signal');
}

export function parseTrainingSamples(content: string): TrainingSample[] {
  return parseRecords(content, TrainingSampleSchema, 'training sample');
}

/**
 * Empty campaign session honouring the configured free-text TLD allow-list
 */
export function sessionGraph(config: RiskweaveConfig): CorrelationGraph {
  return new CorrelationGraph({ textDomainTlds: parseCsvList(config.graph.textDomainTlds) });
}

export interface ReplayResult {
  verdicts: VerdictResult[];
  report: CampaignReport;
}

/**
 * Run signals in order through one session, then correlate
 */
export async function replaySignals(
  orchestrator: DetectionOrchestrator,
  signals: readonly SignalInput[],
  graph: CorrelationGraph = new CorrelationGraph(),
): Promise<ReplayResult> {
  const verdicts: VerdictResult[] = [];
  for (const signal of signals) {
    verdicts.push(await orchestrator.detect(signal, graph));
  }
  return { verdicts, report: graph.correlate() };
}

export interface TrainFusionOptions {
  version?: string;
  ridge?: number;
}

export function trainFusionModel(samples: readonly TrainingSample[], options: TrainFusionOptions = {}): LinearRiskModel {
  return LinearRiskModel.train(samples, { version: options.version, ridge: options.ridge });
}

function bandColor(colors: Colors, band: RiskBand): (text: string) => string {
  switch (band) {
    case 'CRITICAL':
      return (text) => colors.bold(colors.red(text));
    case 'HIGH':
      return colors.red;
    case 'MEDIUM':
      return colors.yellow;
    case 'LOW':
      return colors.green;
  }
}

/**
 * Human-readable verdict lines
 */
export function formatVerdict(verdict: VerdictResult, colors: Colors = pc): string[] {
  const color = bandColor(colors, verdict.riskBand);
  const lines = [
    `${colors.bold('Risk:')} ${color(`${verdict.unifiedRiskScore}/100 ${verdict.riskBand} (${verdict.action})`)}`,
    `${colors.gray('Confidence:')} ${verdict.confidence}  ${colors.gray('Method:')} ${verdict.method}`,
  ];

  const modules = Object.entries(verdict.moduleScores);
  if (modules.length > 0) {
    lines.push(colors.cyan('Module scores:'));
    for (const [key, score] of modules) {
      lines.push(`  ${key}: ${score}`);
    }
  }

  if (verdict.attribution.topFactors.length > 0) {
    lines.push(`${colors.cyan('Top factors:')} ${verdict.attribution.topFactors.join(', ')}`);
  }

  for (const failure of verdict.detectorErrors) {
    lines.push(colors.yellow(`  ! ${failure.detectorId} failed: ${failure.error}`));
  }

  return lines;
}

export function formatCampaign(report: CampaignReport, colors: Colors = pc): string[] {
  const summary = report.isCoordinated ? colors.red(report.summary) : report.summary;
  const lines = [
    `${colors.bold('Campaign:')} ${summary}`,
    `${colors.gray('Signals:')} ${report.signalCount}  ${colors.gray('Components:')} ${report.connectedComponents}  ${colors.gray('Strength:')} ${report.correlationStrength}`,
  ];
  if (report.sharedEntities.length > 0) {
    lines.push(`${colors.gray('Shared entities:')} ${report.sharedEntities.join(', ')}`);
  }
  return lines;
}

/**
 * Effective settings, as KEY/value pairs
 */
export function describeConfig(config: RiskweaveConfig): Array<{ key: string; value: string }> {
  return [
    { key: 'API_HOST', value: config.api.host },
    { key: 'API_PORT', value: config.api.port.toString() },
    { key: 'LOG_LEVEL', value: config.logging.level },
    { key: 'FUSION_WEIGHTS', value: JSON.stringify(config.fusion.weights) },
    { key: 'FUSION_MODEL_BLEND', value: config.fusion.modelBlend.toString() },
    { key: 'FUSION_MODEL_PATH', value: config.fusion.modelPath ?? '(none)' },
    { key: 'GRAPH_TEXT_TLDS', value: parseCsvList(config.graph.textDomainTlds).join(',') || '(none)' },
    { key: 'DETECTOR_TIMEOUT_MS', value: config.detection.detectorTimeoutMs.toString() },
    { key: 'ALERT_FEED_CAPACITY', value: config.alerts.capacity.toString() },
    { key: 'ALERT_MIN_BAND', value: config.alerts.minBand },
    { key: 'WEBHOOK_SECRET', value: config.webhook.secret ? '***' : '(not set, ingestion disabled)' },
  ];
}
