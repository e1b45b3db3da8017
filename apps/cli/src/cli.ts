#!/usr/bin/env node
import { readFile, writeFile } from 'node:fs/promises';
import { Command, InvalidArgumentError } from 'commander';
import pc from 'picocolors';
import { loadConfig, type RiskweaveConfig } from '@riskweave/config';
import { RiskBandEnum, bandAtLeast, type LinearRiskModel, type LogFn } from '@riskweave/core';
import { createDefaultRegistry, createDetectionPipeline, loadRiskModelFile } from '@riskweave/detectors';
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
  type DetectOptions,
} from './commands.js';

const program = new Command();

program.name('riskweave').description('CLI utilities for Riskweave fraud risk fusion').version('0.1.0');

const warn: LogFn = (message, level, context) => {
  const line = `[${level}] ${message}${context ? ` ${JSON.stringify(context)}` : ''}`;
  console.error(level === 'error' ? pc.red(line) : pc.yellow(line));
};

async function pipelineFor(config: RiskweaveConfig) {
  let model: LinearRiskModel | undefined;
  if (config.fusion.modelPath) {
    try {
      model = await loadRiskModelFile(config.fusion.modelPath);
    } catch (err) {
      warn('Trained risk model unavailable, using weighted average', 'warn', {
        path: config.fusion.modelPath,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  return createDetectionPipeline({
    weights: config.fusion.weights,
    model,
    modelBlend: config.fusion.modelBlend,
    detectorTimeoutMs: config.detection.detectorTimeoutMs,
    onLog: warn,
  });
}

function fail(label: string, err: unknown): never {
  console.log(pc.red(`${label}:`));
  console.log(pc.red(`  ${err instanceof Error ? err.message : 'Unknown error'}`));
  process.exit(1);
}

function parseBand(value: string) {
  const band = RiskBandEnum.safeParse(value.toUpperCase());
  if (!band.success) {
    throw new InvalidArgumentError(`Expected one of ${RiskBandEnum.options.join(', ')}`);
  }
  return band.data;
}

function parseNonNegative(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number');
  }
  return parsed;
}

/**
 * Detect command - scores one signal
 */
program
  .command('detect')
  .description('Score a single signal')
  .option('-t, --text <text>', 'Message body')
  .option('-s, --subject <subject>', 'Message subject')
  .option('-u, --url <url>', 'URL to scan')
  .option('--sender <sender>', 'Sender address or caller id')
  .option('-a, --attachment <file>', 'File to scan as an attachment')
  .option('--fail-on <band>', 'Exit with code 2 when the verdict reaches this band', parseBand)
  .option('--json', 'Print the verdict as JSON')
  .action(async (options: DetectOptions & { failOn?: ReturnType<typeof parseBand>; json?: boolean }) => {
    try {
      const config = loadConfig();
      const orchestrator = await pipelineFor(config);
      const verdict = await orchestrator.detect(await signalFromOptions(options), sessionGraph(config));

      if (options.json) {
        console.log(JSON.stringify(verdict, null, 2));
      } else {
        console.log('');
        for (const line of formatVerdict(verdict)) console.log(`  ${line}`);
        console.log('');
        console.log(pc.gray(verdict.attribution.narrative));
      }

      process.exit(options.failOn && bandAtLeast(verdict.riskBand, options.failOn) ? 2 : 0);
    } catch (err) {
      fail('Detection Error', err);
    }
  });

/**
 * Replay command - runs recorded signals through one campaign session
 */
program
  .command('replay')
  .description('Replay a JSON array or JSON-lines file of signals through one session')
  .argument('<file>', 'Signals file')
  .option('--json', 'Print verdicts and the campaign report as JSON')
  .action(async (file: string, options: { json?: boolean }) => {
    try {
      const config = loadConfig();
      const signals = parseSignals(await readFile(file, 'utf8'));
      const orchestrator = await pipelineFor(config);
      const { verdicts, report } = await replaySignals(orchestrator, signals, sessionGraph(config));

      if (options.json) {
        console.log(JSON.stringify({ verdicts, report }, null, 2));
      } else {
        console.log(pc.bold(`\nReplayed ${verdicts.length} signal(s)\n`));
        verdicts.forEach((verdict, i) => {
          console.log(
            `  ${pc.gray(`#${i + 1}`)} ${verdict.signalId}: ${verdict.unifiedRiskScore}/100 ${verdict.riskBand}`,
          );
        });
        console.log('');
        for (const line of formatCampaign(report)) console.log(`  ${line}`);
      }
      process.exit(0);
    } catch (err) {
      fail('Replay Error', err);
    }
  });

/**
 * Train command - fits the linear fusion model from labelled samples
 */
program
  .command('train-fusion')
  .description('Train the linear fusion model from labelled samples')
  .argument('<samples>', 'JSON array or JSON-lines file of { scores, label }')
  .requiredOption('-o, --out <file>', 'Where to write the model JSON')
  .option('--model-version <tag>', 'Version tag stored with the model')
  .option('--ridge <n>', 'Ridge penalty', parseNonNegative)
  .action(async (samplesFile: string, options: { out: string; modelVersion?: string; ridge?: number }) => {
    try {
      const samples = parseTrainingSamples(await readFile(samplesFile, 'utf8'));
      const model = trainFusionModel(samples, { version: options.modelVersion, ridge: options.ridge });
      await writeFile(options.out, `${JSON.stringify(model, null, 2)}\n`);

      console.log(pc.green(`Trained ${model.id} on ${samples.length} sample(s)`));
      console.log(pc.gray(`Written to ${options.out}. Set FUSION_MODEL_PATH to use it.`));
      process.exit(0);
    } catch (err) {
      fail('Training Error', err);
    }
  });

/**
 * Check config command - validates environment configuration
 */
program
  .command('check-config')
  .description('Validate environment configuration')
  .action(() => {
    console.log(pc.bold('\nConfiguration Validation\n'));

    try {
      const config = loadConfig();

      for (const item of describeConfig(config)) {
        console.log(`  ${pc.cyan(item.key)}: ${item.value}`);
      }

      console.log(`\n  ${pc.cyan('Registered Detectors')}:`);
      for (const detector of createDefaultRegistry().getAll()) {
        console.log(`    - ${detector.metadata.id} (${detector.metadata.name}, ${detector.metadata.input})`);
      }

      console.log('');
      console.log(pc.green(pc.bold('Configuration is valid!')));
      process.exit(0);
    } catch (err) {
      fail('Configuration Error', err);
    }
  });

program.parseAsync().catch((err: unknown) => fail('Error', err));
