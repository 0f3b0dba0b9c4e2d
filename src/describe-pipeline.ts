import { parseDescriptionInput } from './description-input.js';
import { withDescriptionWriter, type DescriptionWriterFactory } from './description-writer.js';
import { buildCatalog } from './file-indexer.js';
import { logger } from './logger.js';
import type { Catalog, ExecutionPlan, ExecutionReport } from './media-types.js';
import { buildExecutionPlan } from './plan-builder.js';
import { executePlan } from './plan-executor.js';
import { resolveRecords } from './resolver.js';

const LOG_CONTEXT = 'DescribePipeline';

export interface DescribeRunOptions {
  /** Raw tab-separated input */
  input: string;
  rootDir: string;
  scanLimit: number;
  dryRun: boolean;
  ignoreDirs?: readonly string[];
  ignoreWritableImages?: boolean;
  continueOnError?: boolean;
}

export interface DescribeRunDeps {
  /** Opened once per run with something to write; a dry run only inspects through it */
  openWriter: DescriptionWriterFactory;
}

export interface DescribeRunReport {
  catalog: Pick<Catalog, 'rootDir' | 'filesVisited' | 'filesCatalogued' | 'filesSkipped'>;
  plan: ExecutionPlan;
  execution: ExecutionReport;
  emptyDescriptionStems: string[];
}

/**
 * Parse, index, resolve and plan; then write unless this is a dry run.
 *
 * Run-level errors (duplicate stems, malformed rows, invalid root, scan
 * limit) propagate before anything is written. Everything up to the plan is
 * identical for dry and real runs; a dry run then reads existing descriptions
 * through the writer without writing.
 */
export async function runDescribe(
  options: DescribeRunOptions,
  deps: DescribeRunDeps
): Promise<DescribeRunReport> {
  const { records, emptyDescriptionStems } = parseDescriptionInput(options.input);
  logger.info(`${records.length} descriptions to write`, undefined, LOG_CONTEXT);

  const catalog = await buildCatalog({
    rootDir: options.rootDir,
    scanLimit: options.scanLimit,
    ignoreDirs: options.ignoreDirs,
    ignoreWritableImages: options.ignoreWritableImages,
  });

  const plan = buildExecutionPlan(records, resolveRecords(records, catalog));
  logger.info(
    `Found ${plan.summary.matched}/${plan.summary.total} files to update`,
    { ...plan.summary },
    LOG_CONTEXT
  );

  const executeOptions = { dryRun: options.dryRun, continueOnError: options.continueOnError };
  const execution =
    plan.summary.matched === 0
      ? await executePlan(plan, null, executeOptions)
      : await withDescriptionWriter(deps.openWriter, (writer) => executePlan(plan, writer, executeOptions));

  return {
    catalog: {
      rootDir: catalog.rootDir,
      filesVisited: catalog.filesVisited,
      filesCatalogued: catalog.filesCatalogued,
      filesSkipped: catalog.filesSkipped,
    },
    plan,
    execution,
    emptyDescriptionStems,
  };
}
