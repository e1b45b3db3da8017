import { createHash } from 'node:crypto';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  CorrelationGraph,
  DetectionOrchestrator,
  DetectorRegistry,
  FusionEngine,
  type Detector,
  type DetectorOutput,
  type SignalInputKind,
  type ScoreKey,
} from '../src/index.js';

function fakeDetector(
  id: string,
  input: SignalInputKind,
  scoreKey: ScoreKey,
  detect: Detector['detect'],
): Detector {
  return {
    metadata: { id, name: id, description: `${id} test detector`, input, scoreKey, version: '1.0.0' },
    detect,
  };
}

function fixed(scores: Record<string, number>, details: Record<string, unknown> = {}): () => DetectorOutput {
  return () => ({ scores, details });
}

const FIXED_NOW = () => new Date('2024-05-01T12:00:00.000Z');

describe('DetectorRegistry', () => {
  it('rejects duplicate ids and selects detectors by input', () => {
    const registry = new DetectorRegistry();
    registry.register(fakeDetector('text-a', 'text', 'ai_text_score', fixed({ ai_text: 1 })));
    registry.register(fakeDetector('url-a', 'url', 'url_score', fixed({ url: 1 })));

    expect(() => registry.register(fakeDetector('url-a', 'url', 'url_score', fixed({})))).toThrow(
      'Detector with ID url-a is already registered',
    );
    expect(registry.getForInput('url').map((d) => d.metadata.id)).toEqual(['url-a']);
    expect(registry.getIds()).toEqual(['text-a', 'url-a']);
    expect(registry.remove('text-a')).toBe(true);
    expect(registry.has('text-a')).toBe(false);
  });
});

describe('DetectionOrchestrator', () => {
  let registry: DetectorRegistry;
  let session: CorrelationGraph;

  beforeEach(() => {
    registry = new DetectorRegistry();
    registry.register(fakeDetector('phish', 'text', 'email_phishing_score', fixed({ phishing: 80 }, { urgent: true })));
    registry.register(fakeDetector('creds', 'text', 'credential_score', fixed({ credentials: 90 })));
    registry.register(fakeDetector('url', 'url', 'url_score', fixed({ url_score: 70 })));
    registry.register(fakeDetector('malware', 'attachment', 'malware_score', fixed({ malware: 96 })));
    session = new CorrelationGraph();
  });

  function orchestrator(options: { detectorTimeoutMs?: number; onLog?: () => void } = {}) {
    return new DetectionOrchestrator({ registry, fusion: new FusionEngine(), now: FIXED_NOW, ...options });
  }

  it('tolerates a signal with nothing populated', async () => {
    const verdict = await orchestrator().detect({}, session);

    expect(verdict.unifiedRiskScore).toBe(0);
    expect(verdict.riskBand).toBe('LOW');
    expect(verdict.action).toBe('VERIFY');
    expect(verdict.method).toBe('none');
    expect(verdict.moduleScores).toEqual({});
    expect(verdict.moduleDetails).toEqual({});
    expect(verdict.attribution.topFactors).toEqual([]);
    expect(verdict.campaign.signalCount).toBe(1);
    expect(verdict.signalId).toBe('combined_0');
    expect(verdict.timestamp).toBe('2024-05-01T12:00:00.000Z');
    expect(verdict.processingTimeMs).toBeGreaterThanOrEqual(0);
  });

  it('runs only the detectors whose inputs are populated', async () => {
    const verdict = await orchestrator().detect({ url: 'http://fake-bank.xyz' }, session);

    expect(Object.keys(verdict.moduleDetails)).toEqual(['url']);
    expect(verdict.moduleScores).toEqual({ url_score: 70 });
    expect(verdict.unifiedRiskScore).toBe(4.9);
    expect(verdict.moduleContributions.url_score).toBe(4.9);
  });

  it('fuses every applicable detector and carries details through', async () => {
    const verdict = await orchestrator().detect(
      {
        emailText: 'Verify your account now',
        url: 'http://fake-bank.xyz',
        attachment: { filename: 'invoice.exe' },
      },
      session,
    );

    // 90×0.30 + 80×0.15 + 70×0.07 + 96×0.25
    expect(verdict.unifiedRiskScore).toBe(67.9);
    expect(verdict.riskBand).toBe('HIGH');
    expect(verdict.action).toBe('ESCALATE');
    expect(verdict.moduleScores).toEqual({
      email_phishing_score: 80,
      credential_score: 90,
      url_score: 70,
      malware_score: 96,
    });
    expect(verdict.moduleDetails.phish).toEqual({ urgent: true });
    expect(verdict.attribution.topFactors[0]).toBe('Credential Exposure (40%)');
  });

  it('isolates a failing detector', async () => {
    const onLog = vi.fn();
    registry.register(
      fakeDetector('broken', 'text', 'ai_text_score', () => {
        throw new Error('model not loaded');
      }),
    );

    const verdict = await orchestrator({ onLog }).detect({ emailText: 'hello' }, session);

    expect(verdict.detectorErrors).toEqual([{ detectorId: 'broken', error: 'model not loaded' }]);
    expect(verdict.moduleScores).toEqual({ email_phishing_score: 80, credential_score: 90 });
    expect(onLog).toHaveBeenCalledWith('Detector failed, continuing without its score', 'warn', {
      detectorId: 'broken',
      error: 'model not loaded',
    });
  });

  it('times out a detector that never answers', async () => {
    registry.register(fakeDetector('slow', 'url', 'url_score', () => new Promise<DetectorOutput>(() => {})));

    const verdict = await orchestrator({ detectorTimeoutMs: 20 }).assess({ url: 'http://slow.example' });

    expect(verdict.detectorErrors).toEqual([{ detectorId: 'slow', error: 'Detector slow timed out' }]);
    expect(verdict.moduleScores).toEqual({ url_score: 70 });
  });

  it('treats non-numeric detector output as a detector failure', async () => {
    registry.remove('url');
    registry.register(fakeDetector('nan', 'url', 'url_score', fixed({ url_score: Number.NaN })));

    const verdict = await orchestrator().assess({ url: 'http://x.example' });

    expect(verdict.detectorErrors).toEqual([
      { detectorId: 'nan', error: 'Score "url_score" must be numeric, got number NaN' },
    ]);
    expect(verdict.method).toBe('none');
  });

  it('leaves campaign state alone in assess', async () => {
    await orchestrator().assess({ emailText: 'hello', sender: 'x@evil.tld' });
    expect(session.state).toBe('empty');
  });

  it('correlates detections made in the same session', async () => {
    const pipeline = orchestrator();
    await pipeline.detect({ sender: 'x@evil.tld' }, session);
    const second = await pipeline.detect({ url: 'http://evil.tld/path' }, session);

    expect(second.campaign.isCoordinated).toBe(true);
    expect(second.campaign.sharedEntities).toEqual(['evil.tld']);

    const other = new CorrelationGraph();
    const isolated = await pipeline.detect({ url: 'http://evil.tld/path' }, other);
    expect(isolated.campaign.isCoordinated).toBe(false);
    expect(session.correlate().signalCount).toBe(2);
  });

  it('orders the campaign timeline across mixed date formats', async () => {
    const pipeline = orchestrator();
    await pipeline.detect({ sender: 'x@evil.tld', timestamp: '2024-01-02T00:00:00Z' }, session);
    await pipeline.detect({ sender: 'y@evil.tld', timestamp: 'Mon, 01 Jan 2024 00:00:00 GMT' }, session);

    expect(session.correlate().timeline.map((entry) => [entry.id, entry.timestamp])).toEqual([
      ['combined_1', '2024-01-01T00:00:00.000Z'],
      ['combined_0', '2024-01-02T00:00:00.000Z'],
    ]);
  });

  it('falls back to the clock for an unparseable timestamp', async () => {
    const onLog = vi.fn();
    await orchestrator({ onLog }).detect({ sender: 'x@evil.tld', timestamp: 'not a date' }, session);

    expect(session.correlate().timeline[0].timestamp).toBe('2024-05-01T12:00:00.000Z');
    expect(onLog).toHaveBeenCalledWith('Unparseable signal timestamp, using current time', 'warn', {
      timestamp: 'not a date',
    });
  });

  it('links attachments with identical content under different names', async () => {
    const pipeline = orchestrator();
    const contentBase64 = Buffer.from('MZ payload').toString('base64');
    await pipeline.detect({ attachment: { filename: 'invoice.exe', contentBase64 } }, session);
    const second = await pipeline.detect({ attachment: { filename: 'receipt.scr', contentBase64 } }, session);

    expect(second.campaign.isCoordinated).toBe(true);
    expect(second.campaign.sharedEntities).toEqual([createHash('sha256').update('MZ payload').digest('hex')]);
  });

  it('runs a single detector directly', async () => {
    const output = await orchestrator().runDetector('url', { url: 'http://x.example' });
    expect(output.scores).toEqual({ url_score: 70 });

    await expect(orchestrator().runDetector('missing', {})).rejects.toThrow('Unknown detector: missing');
  });
});
