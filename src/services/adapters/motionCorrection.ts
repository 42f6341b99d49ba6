import fs from 'node:fs/promises';
import { InvalidInputError, MissingInputError } from '../../errors';
import type { MotionParameters } from '../../types/qc';
import { findExisting } from '../fileStore';
import { runCommand } from './runCommand';

export type MotionCorrectionRequest = {
  inputPath: string;
  /** Output path without extension; the tool adds .nii/.nii.gz and .par. */
  outputStem: string;
  referenceVolume: number;
};

export type MotionCorrectionResult = {
  volumePath: string;
  parametersPath: string;
};

export interface MotionCorrector {
  correct(request: MotionCorrectionRequest): Promise<MotionCorrectionResult>;
}

/**
 * Locate what a corrector left behind for `outputStem`.
 */
export async function locateMotionOutputs(outputStem: string): Promise<MotionCorrectionResult> {
  const volumePath = await findExisting([`${outputStem}.nii.gz`, `${outputStem}.nii`]);
  if (!volumePath) {
    throw new MissingInputError(`Motion-corrected volume not found for ${outputStem}`, `${outputStem}.nii.gz`);
  }
  const parametersPath = `${outputStem}.par`;
  if (!(await findExisting([parametersPath]))) {
    throw new MissingInputError(`Motion parameters not found: ${parametersPath}`, parametersPath);
  }
  return { volumePath, parametersPath };
}

/** MCFLIRT: rigid-body correction to one reference frame, writing `<stem>.par`. */
export function createMcflirtCorrector(command = 'mcflirt', debug = false): MotionCorrector {
  return {
    async correct({ inputPath, outputStem, referenceVolume }) {
      await runCommand(
        command,
        ['-in', inputPath, '-out', outputStem, '-refvol', String(referenceVolume), '-plots'],
        debug
      );
      return locateMotionOutputs(outputStem);
    },
  };
}

/**
 * Whitespace-delimited table, six columns per frame: rx ry rz (radians) tx ty tz (mm).
 */
export function parseMotionParameters(text: string): MotionParameters {
  const rows: Array<[number, number, number, number, number, number]> = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((raw, lineIndex) => {
    const line = raw.trim();
    if (!line || line.startsWith('#')) return;

    const values = line.split(/\s+/).map(Number);
    if (values.length !== 6 || values.some((v) => !Number.isFinite(v))) {
      throw new InvalidInputError(`parseMotionParameters: line ${lineIndex + 1} is not six numbers`);
    }
    const [rx, ry, rz, tx, ty, tz] = values;
    rows.push([rx, ry, rz, tx, ty, tz]);
  });

  return rows;
}

export async function readMotionParameters(filePath: string): Promise<MotionParameters> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new MissingInputError(`Motion parameters not found: ${filePath}`, filePath);
    }
    throw err;
  }
  return parseMotionParameters(text);
}
