export * from './errors';
export * from './types/qc';

export { loadQcConfigFromEnv, qcConfigSchema, DEFAULT_QC_CONFIG } from './config/qcConfig';
export type { QcConfig, MetricsSource } from './config/qcConfig';
export { loadQcLimits } from './config/qcLimitsFile';

export { createVolume, voxelToWorld, frameView } from './utils/volume/volume';
export { buildNifti1, readNifti1 } from './utils/volume/nifti1';
export { computeTemporalStats } from './utils/volume/temporalStats';
export { buildRegionMask, swapHalves, DEFAULT_REGION_MASK_OPTIONS } from './utils/segmentation/regionMask';
export type { RegionMaskOptions, RegionMaskResult, PhaseEncodeAxis } from './utils/segmentation/regionMask';
export { extractRoiTimeseries, formatTimeseriesTable, parseTimeseriesTable } from './utils/timeseries/roiTimeseries';
export { detrendSeries, detrendTimeseries, detrendedTimeseries } from './utils/timeseries/detrend';
export type { DetrendFit, DetrendResult } from './utils/timeseries/detrend';
export { computeQcMetrics } from './utils/metrics/qcMetrics';
export type { QcMetricInputs } from './utils/metrics/qcMetrics';
export { DEFAULT_QC_LIMITS, evaluateQcLimits, parseQcLimitsJson, formatChecksTsv } from './utils/metrics/qcLimits';

export { runQcDirectory, QC_FILES } from './services/qcPipeline';
export type { QcPipelineOptions, QcDirectoryResult } from './services/qcPipeline';
export { createMcflirtCorrector, readMotionParameters, parseMotionParameters } from './services/adapters/motionCorrection';
export type { MotionCorrector, MotionCorrectionRequest, MotionCorrectionResult } from './services/adapters/motionCorrection';
export { createDcm2niixConverter } from './services/adapters/dicomConversion';
export type { DicomConverter, DicomConversionRequest } from './services/adapters/dicomConversion';
export { readScanInfo, writeScanInfo, parseScanInfo, formatScanInfo, scanInfoFromDicom } from './services/scanInfo';
export { collectQcTrends, formatTrendsCsv, writeQcTrends } from './services/qcTrends';
export { buildQcBundle, exportQcBundle } from './services/exportQcBundle';
export { acquireDirectoryLock } from './services/qcCache';
