/**
 * Runs one scan directory end to end:
 *   DICOM → 4D volume → motion correction → temporal mean/SD → region mask
 *   → ROI time series → detrend → metrics → limit checks → summary files.
 *
 * Every stage that writes an image or table is guarded by the stage cache, so
 * re-running a finished directory only re-derives the summary and checks.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import type { MetricsSource } from '../config/qcConfig';
import { DegenerateInputError, InvalidInputError, MissingInputError } from '../errors';
import type {
  MotionParameters,
  QcCheck,
  QcLimit,
  QcMetricRecord,
  QcProgress,
  QcStage,
  RegionMask,
  RoiTimeseries,
  ScanInfo,
  Volume,
} from '../types/qc';
import { debugQcLog } from '../utils/debugQc';
import { computeQcMetrics } from '../utils/metrics/qcMetrics';
import { DEFAULT_QC_LIMITS, evaluateQcLimits, failedChecks, formatChecksTsv } from '../utils/metrics/qcLimits';
import type { RegionMaskOptions } from '../utils/segmentation/regionMask';
import { buildRegionMask, DEFAULT_REGION_MASK_OPTIONS } from '../utils/segmentation/regionMask';
import type { DetrendResult } from '../utils/timeseries/detrend';
import { detrendedTimeseries, detrendTimeseries } from '../utils/timeseries/detrend';
import { extractRoiTimeseries, formatTimeseriesTable, parseTimeseriesTable } from '../utils/timeseries/roiTimeseries';
import { computeTemporalStats } from '../utils/volume/temporalStats';
import type { DicomConverter } from './adapters/dicomConversion';
import { createDcm2niixConverter } from './adapters/dicomConversion';
import type { MotionCorrector } from './adapters/motionCorrection';
import { createMcflirtCorrector, locateMotionOutputs, readMotionParameters } from './adapters/motionCorrection';
import { fileExists, findExisting, writeFileAtomic } from './fileStore';
import { invalidateStage, isStageCurrent, recordStage, stageFingerprint, withDirectoryLock } from './qcCache';
import { formatSummary, SUMMARY_FILE } from './qcSummary';
import { readScanInfo, readScanInfoFromDicomDir, writeScanInfo } from './scanInfo';
import { loadRegionMask, loadVolume, saveRegionMask, saveVolume } from './volumeFiles';

export const QC_FILES = {
  dicomDir: 'dicom',
  rawStem: 'qc',
  motionStem: 'qc_mcf',
  motionParameters: 'qc_mcf.par',
  mean: 'qc_mean.nii',
  sd: 'qc_sd.nii',
  mask: 'qc_mask.nii',
  timeseries: 'qc_timeseries.txt',
  timeseriesDetrend: 'qc_timeseries_detrend.txt',
  summary: SUMMARY_FILE,
  checks: 'qc_checks.tsv',
} as const;

/** Motion correction always registers to the first frame. */
const REFERENCE_VOLUME = 0;

export type QcPipelineOptions = {
  limits?: readonly QcLimit[];
  mask?: Partial<RegionMaskOptions>;
  /** Series the summary metrics are computed from. Defaults to 'raw'. */
  metricsSource?: MetricsSource;
  motionCorrector?: MotionCorrector;
  dicomConverter?: DicomConverter;
  /** Ignore the stage cache and recompute everything. */
  force?: boolean;
  debug?: boolean;
  /** Clock for the analysis date written to the summary. */
  now?: () => Date;
  onProgress?: (p: QcProgress) => void;
};

export type QcDirectoryResult = {
  qcDir: string;
  scanInfo: ScanInfo | null;
  metrics: QcMetricRecord;
  checks: QcCheck[];
  passed: boolean;
  /** Voxel count per label 0..3; absent when masking was degenerate. */
  labelCounts?: [number, number, number, number];
  /** Why masking failed, when it did. */
  degenerate?: string;
  cachedStages: QcStage[];
};

type StageContext = {
  qcDir: string;
  force: boolean;
  debug: boolean;
  cachedStages: QcStage[];
  report: (stage: QcStage, message: string, cached?: boolean) => void;
};

/**
 * Reuse a stage's artifacts when its marker is current, otherwise compute
 * (which must write the artifacts) and record the marker.
 */
async function runCachedStage<T>(
  ctx: StageContext,
  stage: QcStage,
  plan: {
    options?: unknown;
    inputFiles: readonly string[];
    /** Names relative to the QC directory, fixed or derived from the computed value. */
    artifacts: readonly string[] | ((value: T) => readonly string[]);
  },
  load: () => Promise<T>,
  compute: () => Promise<T>
): Promise<T> {
  const fingerprint = await stageFingerprint({ stage, options: plan.options, inputFiles: plan.inputFiles });

  if (!ctx.force && (await isStageCurrent(ctx.qcDir, stage, fingerprint))) {
    ctx.cachedStages.push(stage);
    ctx.report(stage, 'up to date', true);
    return load();
  }

  const t0 = performance.now();
  const value = await compute();
  const artifacts = typeof plan.artifacts === 'function' ? plan.artifacts(value) : plan.artifacts;
  await recordStage(ctx.qcDir, stage, fingerprint, artifacts);
  debugQcLog(stage, { ms: Math.round(performance.now() - t0), artifacts }, ctx.debug);
  ctx.report(stage, 'done');
  return value;
}

function countLabels(mask: RegionMask): [number, number, number, number] {
  const counts: [number, number, number, number] = [0, 0, 0, 0];
  for (const l of mask.labels) {
    if (l <= 3) counts[l]++;
  }
  return counts;
}

async function ensureRawVolume(ctx: StageContext, converter: DicomConverter): Promise<string> {
  const stem = path.join(ctx.qcDir, QC_FILES.rawStem);
  const existing = await findExisting([`${stem}.nii.gz`, `${stem}.nii`]);
  if (existing) {
    ctx.report('convert', `using ${path.basename(existing)}`, true);
    return existing;
  }

  const dicomDir = path.join(ctx.qcDir, QC_FILES.dicomDir);
  if (!(await fileExists(dicomDir))) {
    throw new MissingInputError(`No 4D volume (${QC_FILES.rawStem}.nii[.gz]) and no DICOM directory in ${ctx.qcDir}`, dicomDir);
  }

  ctx.report('convert', 'converting DICOM to NIfTI');
  const written = await converter.convert({ dicomDir, outputDir: ctx.qcDir, outputStem: QC_FILES.rawStem });
  debugQcLog('convert', { written }, ctx.debug);
  return written;
}

async function ensureScanInfo(ctx: StageContext, volumeCount: number): Promise<ScanInfo | null> {
  const existing = await readScanInfo(ctx.qcDir);
  if (existing) {
    ctx.report('scan-info', 'using existing scan info', true);
    return existing;
  }

  const dicomDir = path.join(ctx.qcDir, QC_FILES.dicomDir);
  if (!(await fileExists(dicomDir))) {
    ctx.report('scan-info', 'no scan info available');
    return null;
  }

  const info = await readScanInfoFromDicomDir(dicomDir, volumeCount);
  await writeScanInfo(ctx.qcDir, info);
  ctx.report('scan-info', `scanner ${info.scannerSerial}, acquired ${info.acquisitionDate}`);
  return info;
}

export async function runQcDirectory(qcDir: string, options: QcPipelineOptions = {}): Promise<QcDirectoryResult> {
  const debug = options.debug ?? false;
  const ctx: StageContext = {
    qcDir,
    force: options.force ?? false,
    debug,
    cachedStages: [],
    report: (stage, message, cached) => options.onProgress?.({ stage, message, cached }),
  };

  const limits = options.limits ?? DEFAULT_QC_LIMITS;
  const maskOptions: RegionMaskOptions = { ...DEFAULT_REGION_MASK_OPTIONS, ...options.mask };
  const metricsSource = options.metricsSource ?? 'raw';
  const corrector = options.motionCorrector ?? createMcflirtCorrector('mcflirt', debug);
  const converter = options.dicomConverter ?? createDcm2niixConverter('dcm2niix', debug);
  const now = options.now ?? (() => new Date());

  const file = (name: string) => path.join(qcDir, name);

  return withDirectoryLock(qcDir, async () => {
    const rawPath = await ensureRawVolume(ctx, converter);

    // Motion correction
    const motionStem = file(QC_FILES.motionStem);
    const { volumePath: mcfPath, parametersPath } = await runCachedStage(
      ctx,
      'motion-correction',
      {
        options: { referenceVolume: REFERENCE_VOLUME },
        inputFiles: [rawPath],
        artifacts: (result) => [path.basename(result.volumePath), path.basename(result.parametersPath)],
      },
      () => locateMotionOutputs(motionStem),
      async () => {
        const result = await corrector.correct({
          inputPath: rawPath,
          outputStem: motionStem,
          referenceVolume: REFERENCE_VOLUME,
        });
        if (!(await fileExists(result.volumePath))) {
          throw new MissingInputError(`Motion correction produced no volume: ${result.volumePath}`, result.volumePath);
        }
        return result;
      }
    );
    const motion: MotionParameters = await readMotionParameters(parametersPath);
    const corrected: Volume = await loadVolume(mcfPath);
    if (motion.length !== corrected.dims.nt) {
      throw new InvalidInputError(
        `${path.basename(parametersPath)} has ${motion.length} rows but ${path.basename(mcfPath)} has ${corrected.dims.nt} frames`
      );
    }
    debugQcLog('load', { dims: corrected.dims, voxelSizeMm: corrected.voxelSizeMm, frames: motion.length }, debug);

    const scanInfo = await ensureScanInfo(ctx, corrected.dims.nt);

    // Temporal mean and SD
    const { mean } = await runCachedStage(
      ctx,
      'temporal-stats',
      { inputFiles: [mcfPath], artifacts: [QC_FILES.mean, QC_FILES.sd] },
      async () => ({ mean: await loadVolume(file(QC_FILES.mean)) }),
      async () => {
        const stats = computeTemporalStats(corrected);
        await saveVolume(file(QC_FILES.mean), stats.mean, 'qc temporal mean');
        await saveVolume(file(QC_FILES.sd), stats.sd, 'qc temporal sd');
        return { mean: stats.mean };
      }
    );

    // Region mask
    let mask: RegionMask | null = null;
    let degenerate: string | undefined;
    try {
      mask = await runCachedStage(
        ctx,
        'mask',
        { options: maskOptions, inputFiles: [file(QC_FILES.mean)], artifacts: [QC_FILES.mask] },
        () => loadRegionMask(file(QC_FILES.mask)),
        async () => {
          const result = buildRegionMask(mean, maskOptions);
          debugQcLog('mask', { signalThreshold: result.signalThreshold, labelCounts: result.labelCounts }, debug);
          await saveRegionMask(file(QC_FILES.mask), result.mask);
          return result.mask;
        }
      );
    } catch (err) {
      if (!(err instanceof DegenerateInputError)) throw err;
      degenerate = err.message;
      ctx.report('mask', `degenerate input: ${err.message}`);
      for (const stage of ['mask', 'timeseries'] as const) await invalidateStage(qcDir, stage);
      for (const name of [QC_FILES.mask, QC_FILES.timeseries, QC_FILES.timeseriesDetrend]) {
        await fs.rm(file(name), { force: true });
      }
    }

    // ROI time series and detrending
    let timeseries: RoiTimeseries | undefined;
    let detrend: DetrendResult | undefined;
    if (mask) {
      const regionMask = mask;
      timeseries = await runCachedStage(
        ctx,
        'timeseries',
        { inputFiles: [mcfPath, file(QC_FILES.mask)], artifacts: [QC_FILES.timeseries] },
        async () => parseTimeseriesTable(await fs.readFile(file(QC_FILES.timeseries), 'utf8')),
        async () => {
          const ts = extractRoiTimeseries(corrected, regionMask);
          await writeFileAtomic(file(QC_FILES.timeseries), formatTimeseriesTable(ts));
          return ts;
        }
      );

      detrend = detrendTimeseries(timeseries);
      await writeFileAtomic(file(QC_FILES.timeseriesDetrend), formatTimeseriesTable(detrendedTimeseries(timeseries, detrend)));
      debugQcLog(
        'detrend',
        {
          tau: detrend.phantom.tau,
          residualSd: detrend.phantom.residualSd,
          spikes: [detrend.phantom.spikeCount, detrend.nyquist.spikeCount, detrend.noise.spikeCount],
        },
        debug
      );
      ctx.report('detrend', 'done');
    }

    // Metrics and limit checks
    const metricSeries =
      timeseries && detrend && metricsSource === 'detrended' ? detrendedTimeseries(timeseries, detrend) : timeseries;
    const metrics = computeQcMetrics({
      timeseries: metricSeries,
      timeseriesUnavailableReason: degenerate,
      meanVolume: mean,
      motion,
      detrend,
    });
    const checks = evaluateQcLimits(metrics, limits);
    const passed = checks.every((c) => c.status === 'pass');
    ctx.report('metrics', `${failedChecks(checks).length} of ${checks.length} checks failed`);

    await writeFileAtomic(file(QC_FILES.summary), formatSummary({ metrics, scanInfo, analysisDate: now() }));
    await writeFileAtomic(file(QC_FILES.checks), formatChecksTsv(checks));
    ctx.report('write', `wrote ${QC_FILES.summary} and ${QC_FILES.checks}`);

    return {
      qcDir,
      scanInfo,
      metrics,
      checks,
      passed,
      labelCounts: mask ? countLabels(mask) : undefined,
      degenerate,
      cachedStages: ctx.cachedStages,
    };
  });
}
