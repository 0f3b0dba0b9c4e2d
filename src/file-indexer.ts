import { stat } from 'fs/promises';
import { dirname, resolve } from 'path';
import fg from 'fast-glob';
import { InvalidSearchRootError, ScanLimitExceededError } from './errors.js';
import { logger } from './logger.js';
import { classifyPath, comparePaths, extensionOf, stemOf } from './media-formats.js';
import type { CandidateFile, Catalog } from './media-types.js';

const LOG_CONTEXT = 'FileIndexer';

export const DEFAULT_IGNORE_DIRS = ['CaptureOne'] as const;

export interface BuildCatalogOptions {
  rootDir: string;
  /** Maximum number of files the walk may visit */
  scanLimit: number;
  /** Directory names pruned at any depth */
  ignoreDirs?: readonly string[];
  ignoreWritableImages?: boolean;
}

async function assertSearchRoot(rootDir: string): Promise<void> {
  const rootStat = await stat(rootDir).catch(() => null);
  if (!rootStat) {
    throw new InvalidSearchRootError(rootDir, 'is not accessible');
  }
  if (!rootStat.isDirectory()) {
    throw new InvalidSearchRootError(rootDir, 'is not a directory');
  }
}

function toCandidate(
  rootDir: string,
  relativePath: string,
  options: BuildCatalogOptions
): CandidateFile | null {
  const formatClass = classifyPath(relativePath, options);
  if (formatClass === 'unrecognized') {
    return null;
  }

  const path = resolve(rootDir, relativePath);
  return {
    path,
    relativePath,
    directory: dirname(path),
    stem: stemOf(relativePath),
    extension: extensionOf(relativePath),
    formatClass,
  };
}

/**
 * Walk `rootDir` once and group every recognized file by stem.
 *
 * Every visited file counts toward `scanLimit`, recognized or not. Going past
 * the limit throws instead of returning a partial catalog.
 */
export async function buildCatalog(options: BuildCatalogOptions): Promise<Catalog> {
  const rootDir = resolve(options.rootDir);
  const ignoreDirs = options.ignoreDirs ?? DEFAULT_IGNORE_DIRS;
  await assertSearchRoot(rootDir);

  logger.info(`Searching ${rootDir}`, { scanLimit: options.scanLimit, ignoreDirs }, LOG_CONTEXT);

  const stream = fg.stream('**/*', {
    cwd: rootDir,
    onlyFiles: true,
    dot: true,
    followSymbolicLinks: false,
    unique: true,
    absolute: false,
    ignore: ignoreDirs.map((dir) => `**/${fg.escapePath(dir)}/**`),
  });

  const byStem = new Map<string, CandidateFile[]>();
  let filesVisited = 0;
  let filesCatalogued = 0;

  for await (const entry of stream) {
    filesVisited += 1;
    if (filesVisited > options.scanLimit) {
      throw new ScanLimitExceededError(options.scanLimit, rootDir);
    }

    const relativePath = typeof entry === 'string' ? entry : entry.toString('utf8');
    const candidate = toCandidate(rootDir, relativePath, options);
    if (!candidate) {
      logger.debug(`Skipping unavailable type ${relativePath}`, undefined, LOG_CONTEXT);
      continue;
    }

    const group = byStem.get(candidate.stem) ?? [];
    group.push(candidate);
    byStem.set(candidate.stem, group);
    filesCatalogued += 1;
  }

  for (const group of byStem.values()) {
    group.sort((left, right) => comparePaths(left.path, right.path));
  }

  logger.info(
    `Catalogued ${filesCatalogued} of ${filesVisited} files`,
    { stems: byStem.size },
    LOG_CONTEXT
  );

  return {
    rootDir,
    byStem,
    filesVisited,
    filesCatalogued,
    filesSkipped: filesVisited - filesCatalogued,
  };
}
