import { AppError } from './logger.js';

export interface DuplicateStemOccurrence {
  lineNo: number;
  sourcePath: string;
}

/**
 * Two input rows share a stem. Fatal: writing only one of them would silently
 * drop a description.
 */
export class DuplicateStemError extends AppError {
  readonly duplicates: Map<string, DuplicateStemOccurrence[]>;

  constructor(duplicates: Map<string, DuplicateStemOccurrence[]>) {
    const lines = [...duplicates.values()]
      .flat()
      .map((occurrence) => `  ${occurrence.lineNo}: ${occurrence.sourcePath}`);
    super(
      `Duplicate file stems found for the following filenames:\n${lines.join('\n')}\n` +
        'Filenames, excluding file type, must be unique.',
      'DUPLICATE_STEM',
      400,
      { stems: [...duplicates.keys()] }
    );
    this.name = 'DuplicateStemError';
    this.duplicates = duplicates;
  }
}

export class MalformedRowError extends AppError {
  constructor(
    readonly lineNo: number,
    readonly line: string,
    detail: string
  ) {
    super(`Error parsing line ${lineNo}: ${detail}`, 'MALFORMED_ROW', 400, { lineNo, line });
    this.name = 'MalformedRowError';
  }
}

export class InvalidSearchRootError extends AppError {
  constructor(readonly rootDir: string, detail: string) {
    super(`Search directory ${detail}: ${rootDir}`, 'INVALID_SEARCH_ROOT', 400, { rootDir });
    this.name = 'InvalidSearchRootError';
  }
}

/**
 * The traversal visited more files than allowed. Raised instead of returning a
 * truncated catalog.
 */
export class ScanLimitExceededError extends AppError {
  constructor(readonly scanLimit: number, readonly rootDir: string) {
    super(`Aborted after scanning ${scanLimit} files.`, 'SCAN_LIMIT_EXCEEDED', 413, {
      scanLimit,
      rootDir,
    });
    this.name = 'ScanLimitExceededError';
  }
}

export class ConfigError extends AppError {
  constructor(readonly errors: string[], source?: string) {
    super(
      `Invalid configuration${source ? ` in ${source}` : ''}: ${errors.join('; ')}`,
      'INVALID_CONFIG',
      400,
      { errors, source }
    );
    this.name = 'ConfigError';
  }
}

export type WriteErrorCode = 'WRITE_FAILED' | 'SIDECAR_APPEARED';

/**
 * A single record could not be written. Recorded against that record only.
 */
export class WriteError extends AppError {
  constructor(
    message: string,
    readonly targetPath: string,
    readonly writeCode: WriteErrorCode = 'WRITE_FAILED',
    readonly underlying?: unknown
  ) {
    super(message, writeCode, 500, { targetPath });
    this.name = 'WriteError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
