#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { QcConfig } from './config/qcConfig';
import { loadQcConfigFromEnv, metricsSourceSchema } from './config/qcConfig';
import { loadQcLimits } from './config/qcLimitsFile';
import { ConfigurationError, toErrorMessage } from './errors';
import type { QcProgress } from './types/qc';
import { createDcm2niixConverter } from './services/adapters/dicomConversion';
import { createMcflirtCorrector } from './services/adapters/motionCorrection';
import { exportQcBundle } from './services/exportQcBundle';
import type { QcDirectoryResult } from './services/qcPipeline';
import { runQcDirectory } from './services/qcPipeline';
import { writeQcTrends } from './services/qcTrends';
import { formatMetricValue } from './services/qcSummary';

type AnalyzeCliOptions = { force?: boolean; metricsSource?: string };
type ScannerCliOptions = AnalyzeCliOptions & { sinceMonths?: string };
type TrendsCliOptions = { sinceMonths?: string };
type BundleCliOptions = { images?: boolean };

function printProgress(p: QcProgress): void {
  console.log(`  [${p.stage}] ${p.message}${p.cached ? ' (cached)' : ''}`);
}

function printResult(result: QcDirectoryResult): void {
  if (result.degenerate) {
    console.log(`  Degenerate input: ${result.degenerate}`);
  }
  for (const c of result.checks) {
    const flag = c.status === 'pass' ? 'PASS' : 'FAIL';
    const note = c.inconclusive ? ` (${c.inconclusive})` : '';
    console.log(`  ${flag}  ${c.label}: ${formatMetricValue(c.value)} [${c.lower}, ${c.upper}]${note}`);
  }
  console.log(`  Overall: ${result.passed ? 'PASS' : 'FAIL'}`);
}

function parseMonths(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new ConfigurationError(`--since-months must be a non-negative integer (got ${value})`);
  }
  return n;
}

function loadConfig(opts: AnalyzeCliOptions, dataRootFallback?: string): QcConfig {
  const overrides: Partial<QcConfig> = {};
  if (opts.metricsSource !== undefined) {
    const parsed = metricsSourceSchema.safeParse(opts.metricsSource);
    if (!parsed.success) {
      throw new ConfigurationError(`--metrics-source must be raw or detrended (got ${opts.metricsSource})`);
    }
    overrides.metricsSource = parsed.data;
  }
  const env = { ...process.env };
  if (!env.QC_DATA_ROOT && dataRootFallback) env.QC_DATA_ROOT = dataRootFallback;
  return loadQcConfigFromEnv(env, overrides);
}

async function analyzeDirectory(qcDir: string, config: QcConfig, force: boolean): Promise<QcDirectoryResult> {
  const limits = await loadQcLimits(config.limitsFile);
  return runQcDirectory(qcDir, {
    limits,
    mask: { phaseEncodeAxis: config.phaseEncodeAxis },
    metricsSource: config.metricsSource,
    motionCorrector: createMcflirtCorrector(config.mcflirtCommand, config.debug),
    dicomConverter: createDcm2niixConverter(config.dcm2niixCommand, config.debug),
    force,
    debug: config.debug,
    onProgress: printProgress,
  });
}

function fail(err: unknown): void {
  console.error('Error:', toErrorMessage(err));
  process.exitCode = 1;
}

export const analyzeCommand = () =>
  new Command('analyze')
    .description('Run phantom QC on one analysis directory (<dataRoot>/<scanner>/<YYYYMMDD>)')
    .argument('<dir>', 'analysis directory')
    .option('-f, --force', 'ignore cached stages and recompute')
    .option('--metrics-source <source>', 'series for summary metrics: raw or detrended')
    .action(async (dir: string, opts: AnalyzeCliOptions) => {
      try {
        const qcDir = path.resolve(dir);
        const config = loadConfig(opts, path.dirname(path.dirname(qcDir)));
        console.log(`Analyzing ${qcDir}`);
        printResult(await analyzeDirectory(qcDir, config, opts.force ?? false));
      } catch (err) {
        fail(err);
      }
    });

export const scannerCommand = () =>
  new Command('scanner')
    .description('Analyze every dated directory of one scanner, then update its trend table')
    .argument('<scanner>', 'scanner directory name under the data root')
    .option('-f, --force', 'ignore cached stages and recompute')
    .option('--metrics-source <source>', 'series for summary metrics: raw or detrended')
    .option('--since-months <n>', 'only include dates within this many months in the trend table')
    .action(async (scanner: string, opts: ScannerCliOptions) => {
      try {
        const config = loadConfig(opts);
        const scannerDir = path.join(config.dataRoot, scanner);
        const dates = (await fs.readdir(scannerDir, { withFileTypes: true }))
          .filter((e) => e.isDirectory() && /^\d{8}$/.test(e.name))
          .map((e) => e.name)
          .sort();

        let failures = 0;
        for (const date of dates) {
          console.log(`Analyzing ${scanner}/${date}`);
          try {
            printResult(await analyzeDirectory(path.join(scannerDir, date), config, opts.force ?? false));
          } catch (err) {
            // Continue with the next date.
            failures++;
            console.error(`  Error: ${toErrorMessage(err)}`);
          }
        }

        const { path: trendsPath, rows } = await writeQcTrends(scannerDir, {
          sinceMonths: parseMonths(opts.sinceMonths),
        });
        console.log(`Wrote ${trendsPath} (${rows.length} dates)`);
        if (failures > 0) {
          console.error(`${failures} of ${dates.length} directories failed`);
          process.exitCode = 1;
        }
      } catch (err) {
        fail(err);
      }
    });

export const trendsCommand = () =>
  new Command('trends')
    .description('Collect qc_summary.txt from every dated directory into qc_trends.csv')
    .argument('<scanner>', 'scanner directory name under the data root')
    .option('--since-months <n>', 'only include dates within this many months')
    .action(async (scanner: string, opts: TrendsCliOptions) => {
      try {
        const config = loadConfig({});
        const { path: trendsPath, rows } = await writeQcTrends(path.join(config.dataRoot, scanner), {
          sinceMonths: parseMonths(opts.sinceMonths),
          onSkip: (dir, reason) => console.log(`  skipping ${path.basename(dir)}: ${reason}`),
        });
        console.log(`Wrote ${trendsPath} (${rows.length} dates)`);
      } catch (err) {
        fail(err);
      }
    });

export const bundleCommand = () =>
  new Command('bundle')
    .description('Zip the QC artifacts of one analysis directory')
    .argument('<dir>', 'analysis directory')
    .option('--images', 'include the mean, SD and mask images')
    .action(async (dir: string, opts: BundleCliOptions) => {
      try {
        const outPath = await exportQcBundle(path.resolve(dir), { includeImages: opts.images ?? false });
        console.log(`Wrote ${outPath}`);
      } catch (err) {
        fail(err);
      }
    });

export function createProgram(): Command {
  return new Command('phantom-qc')
    .description('MRI phantom quality-control pipeline')
    .addCommand(analyzeCommand())
    .addCommand(scannerCommand())
    .addCommand(trendsCommand())
    .addCommand(bundleCommand());
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => fail(err));
}
