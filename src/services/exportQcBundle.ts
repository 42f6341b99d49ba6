import JSZip from 'jszip';
import fs from 'node:fs/promises';
import path from 'node:path';
import { MissingInputError } from '../errors';
import { fileExists, writeFileAtomic } from './fileStore';
import { QC_FILES } from './qcPipeline';
import { SCAN_INFO_FILE } from './scanInfo';

export const BUNDLE_FILE = 'qc_bundle.zip';
export const BUNDLE_MANIFEST = 'manifest.json';

export type BundleProgress = {
  stage: 'collecting' | 'zipping' | 'finalizing';
  current: number;
  total: number;
  detail?: string;
};

const TEXT_ARTIFACTS = [
  SCAN_INFO_FILE,
  QC_FILES.summary,
  QC_FILES.checks,
  QC_FILES.timeseries,
  QC_FILES.timeseriesDetrend,
  QC_FILES.motionParameters,
] as const;

const IMAGE_ARTIFACTS = [QC_FILES.mean, QC_FILES.sd, QC_FILES.mask] as const;

export type BundleManifest = {
  exportedAt: string;
  qcDir: string;
  files: string[];
  version: 1;
};

/**
 * Zip a QC directory's artifacts (text tables, optionally the derived images) with a manifest.
 * Artifacts that do not exist are left out; the summary is required.
 */
export async function buildQcBundle(
  qcDir: string,
  options: { includeImages?: boolean; now?: Date; onProgress?: (p: BundleProgress) => void } = {}
): Promise<Buffer> {
  const { onProgress } = options;
  const summaryPath = path.join(qcDir, QC_FILES.summary);
  if (!(await fileExists(summaryPath))) {
    throw new MissingInputError(`No ${QC_FILES.summary} in ${qcDir}; run the analysis first`, summaryPath);
  }

  const candidates: string[] = [...TEXT_ARTIFACTS, ...(options.includeImages ? IMAGE_ARTIFACTS : [])];
  const present: string[] = [];
  for (const name of candidates) {
    if (await fileExists(path.join(qcDir, name))) present.push(name);
  }

  const zip = new JSZip();
  const manifest: BundleManifest = {
    exportedAt: (options.now ?? new Date()).toISOString(),
    qcDir: path.basename(qcDir),
    files: present,
    version: 1,
  };
  zip.file(BUNDLE_MANIFEST, JSON.stringify(manifest, null, 2));

  let current = 0;
  for (const name of present) {
    zip.file(name, await fs.readFile(path.join(qcDir, name)));
    current++;
    onProgress?.({ stage: 'collecting', current, total: Math.max(present.length, 1), detail: name });
  }

  onProgress?.({ stage: 'zipping', current: 0, total: 100 });

  const buffer = await zip.generateAsync(
    { type: 'nodebuffer', compression: 'DEFLATE', compressionOptions: { level: 6 } },
    (metadata) => {
      onProgress?.({ stage: 'zipping', current: Math.round(metadata.percent), total: 100 });
    }
  );

  onProgress?.({ stage: 'finalizing', current: 1, total: 1 });
  return buffer;
}

export async function exportQcBundle(
  qcDir: string,
  options: { includeImages?: boolean; now?: Date; onProgress?: (p: BundleProgress) => void } = {}
): Promise<string> {
  const buffer = await buildQcBundle(qcDir, options);
  const outPath = path.join(qcDir, BUNDLE_FILE);
  await writeFileAtomic(outPath, buffer);
  return outPath;
}
