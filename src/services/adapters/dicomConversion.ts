import path from 'node:path';
import { MissingInputError } from '../../errors';
import { findExisting } from '../fileStore';
import { runCommand } from './runCommand';

export type DicomConversionRequest = {
  dicomDir: string;
  outputDir: string;
  /** Output filename without extension. */
  outputStem: string;
};

export interface DicomConverter {
  /** Resolves to the path of the written NIfTI volume. */
  convert(request: DicomConversionRequest): Promise<string>;
}

export function createDcm2niixConverter(command = 'dcm2niix', debug = false): DicomConverter {
  return {
    async convert({ dicomDir, outputDir, outputStem }) {
      await runCommand(command, ['-z', 'y', '-f', outputStem, '-o', outputDir, dicomDir], debug);

      const stem = path.join(outputDir, outputStem);
      const written = await findExisting([`${stem}.nii.gz`, `${stem}.nii`]);
      if (!written) {
        throw new MissingInputError(`${command} produced no volume for ${dicomDir}`, `${stem}.nii.gz`);
      }
      return written;
    },
  };
}
