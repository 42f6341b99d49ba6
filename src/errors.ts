export type QcErrorCode =
  | 'missing-input'
  | 'configuration'
  | 'invalid-input'
  | 'degenerate-input'
  | 'numeric-instability'
  | 'directory-locked'
  | 'external-tool';

/**
 * Base class for every error the QC pipeline raises on purpose.
 *
 * `code` is stable and safe to switch on; `message` is for humans.
 */
export class QcError extends Error {
  readonly code: QcErrorCode;

  constructor(code: QcErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** An upstream artifact (4D volume, motion parameters, DICOM stack) is absent. */
export class MissingInputError extends QcError {
  readonly path: string;

  constructor(message: string, path: string) {
    super('missing-input', message);
    this.path = path;
  }
}

export class ConfigurationError extends QcError {
  constructor(message: string) {
    super('configuration', message);
  }
}

export class InvalidInputError extends QcError {
  constructor(message: string) {
    super('invalid-input', message);
  }
}

/** Empty or zero-signal data; callers substitute inconclusive metrics. */
export class DegenerateInputError extends QcError {
  constructor(message: string) {
    super('degenerate-input', message);
  }
}

export class NumericInstabilityError extends QcError {
  constructor(message: string) {
    super('numeric-instability', message);
  }
}

export class DirectoryLockedError extends QcError {
  readonly lockPath: string;

  constructor(lockPath: string) {
    super('directory-locked', `QC directory is locked by another run (${lockPath})`);
    this.lockPath = lockPath;
  }
}

export class ExternalToolError extends QcError {
  readonly command: string;
  readonly exitCode: number | null;

  constructor(command: string, exitCode: number | null, stderr: string) {
    const detail = stderr.trim();
    super('external-tool', `${command} exited with code ${exitCode ?? 'null'}${detail ? `: ${detail}` : ''}`);
    this.command = command;
    this.exitCode = exitCode;
  }
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
