/**
 * Writers that put a description into a file's metadata
 *
 * The pipeline only decides *where* a description goes. A DescriptionWriter
 * is handed one target at a time and owns *how* it is written.
 */

import { ExifTool } from 'exiftool-vendored';
import { describeError, WriteError } from './errors.js';
import { logger } from './logger.js';
import type { InspectStatus, WriteAction, WriterStatus } from './media-types.js';

const LOG_CONTEXT = 'DescriptionWriter';

export interface WriteRequest {
  targetPath: string;
  description: string;
  action: WriteAction;
  /** Raw file a new sidecar is created from */
  anchorPath?: string;
}

export interface DescriptionWriter {
  /** Rejects with WriteError when the target cannot be written */
  write(request: WriteRequest): Promise<WriterStatus>;
  /** Read-only: what `write` would do with the same request */
  inspect(request: WriteRequest): Promise<InspectStatus>;
  close(): Promise<void>;
}

export type DescriptionWriterFactory = () => DescriptionWriter | Promise<DescriptionWriter>;

/**
 * Open a writer for the duration of `use` and close it on every exit path.
 */
export async function withDescriptionWriter<T>(
  open: DescriptionWriterFactory,
  use: (writer: DescriptionWriter) => Promise<T>
): Promise<T> {
  const writer = await open();
  try {
    return await use(writer);
  } finally {
    await writer.close();
  }
}

/** The part of exiftool-vendored the writer calls */
export type ExifToolClient = Pick<ExifTool, 'read' | 'write' | 'end'>;

export interface ExifToolWriterOptions {
  /** Replace an existing, different description instead of skipping the file */
  overwriteDescriptions?: boolean;
  /** Skip exiftool's `_original` backup copies */
  overwriteOriginals?: boolean;
  exiftool?: ExifToolClient;
}

/**
 * Writes the XMP Description tag through a single exiftool process.
 *
 * For `create-sidecar` the raw file is used as the source and the new `.xmp`
 * is written with `-out`, so the raw file is only ever read.
 */
export class ExifToolDescriptionWriter implements DescriptionWriter {
  private readonly exiftool: ExifToolClient;
  private readonly overwriteDescriptions: boolean;
  private readonly overwriteOriginals: boolean;

  constructor(options: ExifToolWriterOptions = {}) {
    this.exiftool = options.exiftool ?? new ExifTool();
    this.overwriteDescriptions = options.overwriteDescriptions ?? false;
    this.overwriteOriginals = options.overwriteOriginals ?? false;
  }

  async inspect(request: WriteRequest): Promise<InspectStatus> {
    const sourcePath = this.sourcePathFor(request);
    return (await this.existingDescriptionStatus(sourcePath, request)) ?? 'would-write';
  }

  async write(request: WriteRequest): Promise<WriterStatus> {
    const sourcePath = this.sourcePathFor(request);

    const existingStatus = await this.existingDescriptionStatus(sourcePath, request);
    if (existingStatus) {
      return existingStatus;
    }

    const writeArgs: string[] = [];
    if (this.overwriteOriginals) {
      writeArgs.push('-overwrite_original');
    }
    if (request.action === 'create-sidecar') {
      writeArgs.push('-out', request.targetPath);
      logger.info(`Creating XMP file for ${sourcePath}`, undefined, LOG_CONTEXT);
    }

    try {
      await this.exiftool.write(sourcePath, { Description: request.description }, { writeArgs });
    } catch (error) {
      throw new WriteError(
        `Error writing description for ${request.targetPath}: ${describeError(error)}`,
        request.targetPath,
        'WRITE_FAILED',
        error
      );
    }

    return 'written';
  }

  async close(): Promise<void> {
    await this.exiftool.end();
  }

  private sourcePathFor(request: WriteRequest): string {
    if (request.action !== 'create-sidecar') {
      return request.targetPath;
    }
    if (!request.anchorPath) {
      throw new WriteError(
        `Cannot create ${request.targetPath} without the raw file it belongs to`,
        request.targetPath
      );
    }
    return request.anchorPath;
  }

  /**
   * `unchanged` or `skipped-existing` when an existing description decides
   * the outcome; undefined when the description should be written.
   */
  private async existingDescriptionStatus(
    sourcePath: string,
    request: WriteRequest
  ): Promise<'unchanged' | 'skipped-existing' | undefined> {
    const existing = await this.readDescription(sourcePath, request.targetPath);
    if (existing === undefined || existing.length === 0) {
      return undefined;
    }
    if (existing === request.description) {
      logger.info(`Skipping ${request.targetPath} - matching description already exists`, undefined, LOG_CONTEXT);
      return 'unchanged';
    }
    if (!this.overwriteDescriptions) {
      logger.warn(`Skipping ${request.targetPath} - a nonmatching description already exists`, { existing }, LOG_CONTEXT);
      return 'skipped-existing';
    }
    logger.warn(`Overwriting existing description for ${request.targetPath}`, { existing }, LOG_CONTEXT);
    return undefined;
  }

  private async readDescription(sourcePath: string, targetPath: string): Promise<string | undefined> {
    try {
      const tags = await this.exiftool.read(sourcePath);
      return typeof tags.Description === 'string' ? tags.Description : undefined;
    } catch (error) {
      throw new WriteError(
        `Error reading existing description from ${sourcePath}: ${describeError(error)}`,
        targetPath,
        'WRITE_FAILED',
        error
      );
    }
  }
}

export function createExifToolWriterFactory(options: Omit<ExifToolWriterOptions, 'exiftool'> = {}): DescriptionWriterFactory {
  return () => new ExifToolDescriptionWriter(options);
}
