/**
 * Stage cache and directory lock for one QC analysis directory.
 *
 * Each completed stage leaves `.qc-cache/<stage>.json` with a fingerprint of
 * what it was computed from and the artifacts it produced. A stage is reused
 * only when the fingerprint matches and every artifact is still on disk.
 */

import fs from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { DirectoryLockedError } from '../errors';
import type { QcStage } from '../types/qc';
import { fileExists, sha256File, sha256Text, writeFileAtomic } from './fileStore';

export const QC_CACHE_DIR = '.qc-cache';
export const QC_LOCK_FILE = 'qc.lock';

/** Bump when any stage's numeric output changes for the same inputs. */
export const QC_ALGORITHM_VERSION = '1';

const stageMarkerSchema = z.object({
  stage: z.string(),
  fingerprint: z.string(),
  artifacts: z.array(z.string()),
  completedAt: z.string(),
});

export type StageMarker = z.infer<typeof stageMarkerSchema>;

function markerPath(qcDir: string, stage: QcStage): string {
  return path.join(qcDir, QC_CACHE_DIR, `${stage}.json`);
}

/** JSON with object keys sorted, so equal options always hash equally. */
function stableStringify(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(',')}]`;
  if (value && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

/**
 * sha256 over the algorithm version, the stage name, its options and the content of its input files.
 */
export async function stageFingerprint(params: {
  stage: QcStage;
  options?: unknown;
  inputFiles?: readonly string[];
}): Promise<string> {
  const inputHashes: string[] = [];
  for (const file of params.inputFiles ?? []) {
    inputHashes.push(`${path.basename(file)}:${await sha256File(file)}`);
  }
  return sha256Text(
    stableStringify({
      version: QC_ALGORITHM_VERSION,
      stage: params.stage,
      options: params.options ?? null,
      inputs: inputHashes,
    })
  );
}

export async function readStageMarker(qcDir: string, stage: QcStage): Promise<StageMarker | null> {
  let text: string;
  try {
    text = await fs.readFile(markerPath(qcDir, stage), 'utf8');
  } catch {
    return null;
  }

  try {
    const parsed = stageMarkerSchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : null;
  } catch {
    // A torn or hand-edited marker just means the stage reruns.
    return null;
  }
}

export async function isStageCurrent(qcDir: string, stage: QcStage, fingerprint: string): Promise<boolean> {
  const marker = await readStageMarker(qcDir, stage);
  if (!marker || marker.fingerprint !== fingerprint) return false;

  for (const artifact of marker.artifacts) {
    if (!(await fileExists(path.join(qcDir, artifact)))) return false;
  }
  return true;
}

/** Record a completed stage; artifact names are relative to the QC directory. */
export async function recordStage(
  qcDir: string,
  stage: QcStage,
  fingerprint: string,
  artifacts: readonly string[]
): Promise<void> {
  await fs.mkdir(path.join(qcDir, QC_CACHE_DIR), { recursive: true });
  const marker: StageMarker = {
    stage,
    fingerprint,
    artifacts: [...artifacts],
    completedAt: new Date().toISOString(),
  };
  await writeFileAtomic(markerPath(qcDir, stage), JSON.stringify(marker, null, 2));
}

export async function invalidateStage(qcDir: string, stage: QcStage): Promise<void> {
  await fs.rm(markerPath(qcDir, stage), { force: true });
}

export type DirectoryLock = {
  lockPath: string;
  release: () => Promise<void>;
};

const lockFileSchema = z.object({
  pid: z.number().int().positive(),
  startedAt: z.string(),
});

function errorCode(err: unknown): unknown {
  return err instanceof Error && 'code' in err ? err.code : undefined;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to another user.
    return errorCode(err) !== 'ESRCH';
  }
}

/**
 * A lock is stale when it names a process that no longer exists. Unreadable
 * or partly written lock files count as held.
 */
async function isStaleLock(lockPath: string): Promise<boolean> {
  let text: string;
  try {
    text = await fs.readFile(lockPath, 'utf8');
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return true;
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return false;
  }
  const parsed = lockFileSchema.safeParse(raw);
  return parsed.success && !isProcessAlive(parsed.data.pid);
}

async function openLockFile(lockPath: string): Promise<FileHandle> {
  try {
    return await fs.open(lockPath, 'wx');
  } catch (err) {
    if (errorCode(err) !== 'EEXIST') throw err;
    if (!(await isStaleLock(lockPath))) throw new DirectoryLockedError(lockPath);
  }

  await fs.rm(lockPath, { force: true });
  try {
    return await fs.open(lockPath, 'wx');
  } catch (err) {
    // Another run took over the stale lock first.
    if (errorCode(err) === 'EEXIST') throw new DirectoryLockedError(lockPath);
    throw err;
  }
}

/**
 * Take the advisory lock for a QC directory. The lock file is created
 * exclusively; if it already exists another run holds the directory, unless
 * that run's process has exited, in which case the lock is taken over.
 */
export async function acquireDirectoryLock(qcDir: string): Promise<DirectoryLock> {
  const lockPath = path.join(qcDir, QC_LOCK_FILE);
  const handle = await openLockFile(lockPath);

  try {
    await handle.writeFile(JSON.stringify({ pid: process.pid, startedAt: new Date().toISOString() }));
  } finally {
    await handle.close();
  }

  let released = false;
  return {
    lockPath,
    release: async () => {
      if (released) return;
      released = true;
      await fs.rm(lockPath, { force: true });
    },
  };
}

export async function withDirectoryLock<T>(qcDir: string, fn: () => Promise<T>): Promise<T> {
  const lock = await acquireDirectoryLock(qcDir);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
