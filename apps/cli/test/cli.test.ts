import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import pc from 'picocolors';
import { loadConfig } from '@riskweave/config';
import { CorrelationGraph } from '@riskweave/core';
import { createDetectionPipeline } from '@riskweave/detectors';
import {
  describeConfig,
  formatCampaign,
  formatVerdict,
  parseSignals,
  parseTrainingSamples,
  replaySignals,
  sessionGraph,
  signalFromOptions,
  trainFusionModel,
} from '../src/commands.js';

const plain = pc.createColors(false);

describe('CLI commands', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'riskweave-cli-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('signalFromOptions', () => {
    it('maps options and reads the attachment file', async () => {
      const file = join(dir, 'payload.bin');
      await writeFile(file, Uint8Array.from([0x4d, 0x5a, 0x90, 0x00]));

      expect(await signalFromOptions({ text: 'hello', url: 'http://x.example', attachment: file })).toEqual({
        emailText: 'hello',
        url: 'http://x.example',
        attachment: { filename: 'payload.bin', contentBase64: 'TVqQAA==', sizeBytes: 4 },
      });
    });

    it('omits options that were not given', async () => {
      expect(await signalFromOptions({})).toEqual({});
    });
  });

  describe('parseSignals', () => {
    it('reads a JSON array', () => {
      expect(parseSignals('[{"sender":"x@evil.tld"},{"url":"http://evil.tld/p"}]')).toEqual([
        { sender: 'x@evil.tld' },
        { url: 'http://evil.tld/p' },
      ]);
    });

    it('reads JSON lines and skips blank lines', () => {
      expect(parseSignals('{"sender":"x@evil.tld"}\n\n{"url":"http://evil.tld/p"}\n')).toHaveLength(2);
    });

    it('names the entry that fails validation', () => {
      expect(() => parseSignals('[{"url":"ok"},{"url":5}]')).toThrow(
        'Entry 2: invalid signal (url: Expected string, received number)',
      );
      expect(() => parseSignals('{"url":"ok"}\n{oops')).toThrow('Line 2 is not valid JSON');
      expect(() => parseSignals('[{"url":')).toThrow('signal file is not valid JSON');
    });

    it('treats an empty file as no signals', () => {
      expect(parseSignals('  \n')).toEqual([]);
    });
  });

  describe('replaySignals', () => {
    it('detects a campaign across replayed signals', async () => {
      const { verdicts, report } = await replaySignals(createDetectionPipeline(), [
        { sender: 'x@evil.tld' },
        { url: 'http://evil.tld/path' },
      ]);

      expect(verdicts.map((verdict) => verdict.signalId)).toEqual(['combined_0', 'combined_1']);
      expect(report.isCoordinated).toBe(true);
      expect(formatCampaign(report, plain)).toEqual([
        'Campaign: COORDINATED CAMPAIGN DETECTED: 2 signals share 1 common entity (evil.tld).',
        'Signals: 2  Components: 1  Strength: 1',
        'Shared entities: evil.tld',
      ]);
    });
  });

  describe('sessionGraph', () => {
    const signals = [{ emailText: 'please visit evil.tld today' }, { emailText: 'log in at evil.tld now' }];

    it('links free-text domains under a configured TLD list', async () => {
      const graph = sessionGraph(loadConfig({ GRAPH_TEXT_TLDS: 'tld' }));
      const { report } = await replaySignals(createDetectionPipeline(), signals, graph);

      expect(report.isCoordinated).toBe(true);
      expect(report.sharedEntities).toEqual(['evil.tld']);
    });

    it('ignores TLDs outside the default list', async () => {
      const { report } = await replaySignals(createDetectionPipeline(), signals, sessionGraph(loadConfig({})));

      expect(report.isCoordinated).toBe(false);
      expect(report.connectedComponents).toBe(2);
    });
  });

  describe('formatVerdict', () => {
    it('prints score, modules and top factors', async () => {
      const verdict = await createDetectionPipeline().detect({ url: 'http://fake-bank.xyz' }, new CorrelationGraph());

      expect(formatVerdict(verdict, plain)).toEqual([
        'Risk: 5.9/100 LOW (VERIFY)',
        'Confidence: 0.88  Method: weighted-average',
        'Module scores:',
        '  url_score: 83.9',
        'Top factors: Malicious URL (100%)',
      ]);
    });
  });

  describe('train-fusion', () => {
    it('parses samples and trains a model', () => {
      const lines = [0, 50, 100]
        .flatMap((credential) => [0, 100].map((malware) => ({ credential, malware })))
        .map(({ credential, malware }) =>
          JSON.stringify({ scores: { credential, malware }, label: 10 + 0.5 * credential + 0.3 * malware }),
        )
        .join('\n');

      const samples = parseTrainingSamples(lines);
      const model = trainFusionModel(samples, { version: 'cli-test' });

      expect(samples).toHaveLength(6);
      expect(model.id).toBe('linear:cli-test');
      expect(model.predict([100, 0, 100, 0, 0, 0])).toBeCloseTo(90, 0);
    });

    it('rejects labels outside 0..100', () => {
      expect(() => parseTrainingSamples('[{"scores":{},"label":120}]')).toThrow('Entry 1: invalid training sample');
    });
  });

  describe('describeConfig', () => {
    it('masks the webhook secret', () => {
      const items = describeConfig(
        loadConfig({ WEBHOOK_SECRET: 'test-secret-placeholder-0123456789', GRAPH_TEXT_TLDS: 'XYZ, com' }),
      );

      expect(items).toContainEqual({ key: 'WEBHOOK_SECRET', value: '***' });
      expect(items).toContainEqual({ key: 'GRAPH_TEXT_TLDS', value: 'xyz,com' });
      expect(items).toContainEqual({ key: 'ALERT_MIN_BAND', value: 'HIGH' });
    });
  });
});
