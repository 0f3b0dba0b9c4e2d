import { access } from 'fs/promises';
import type { DescriptionWriter, WriteRequest } from './description-writer.js';
import { AppError, logger } from './logger.js';
import { describeError, WriteError } from './errors.js';
import { sidecarSpellings } from './media-formats.js';
import { isWriteAction } from './plan-builder.js';
import type {
  ExecutionPlan,
  ExecutionReport,
  WriteResult,
  WriteResultCounts,
  WriteResultStatus,
} from './media-types.js';

const LOG_CONTEXT = 'PlanExecutor';

export interface ExecutePlanOptions {
  dryRun: boolean;
  /** Keep writing the remaining records after a failure */
  continueOnError?: boolean;
}

function emptyCounts(): WriteResultCounts {
  return {
    written: 0,
    unchanged: 0,
    'skipped-existing': 0,
    'dry-run': 0,
    failed: 0,
    'not-attempted': 0,
    excluded: 0,
  };
}

export function countResults(results: readonly WriteResult[]): WriteResultCounts {
  const counts = emptyCounts();
  for (const result of results) {
    counts[result.status] += 1;
  }
  return counts;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function findExisting(paths: readonly string[]): Promise<string | undefined> {
  for (const path of paths) {
    if (await pathExists(path)) {
      return path;
    }
  }
  return undefined;
}

function toFailure(error: unknown, targetPath: string): WriteError {
  if (error instanceof WriteError) {
    return error;
  }
  return new WriteError(describeError(error), targetPath, 'WRITE_FAILED', error);
}

/**
 * Hand every matched entry to the writer, one at a time and in input order.
 *
 * Ambiguous and not-found entries are reported as `excluded`. In dry-run mode
 * the writer is only asked to `inspect` each target, so entries an existing
 * description would keep come back `unchanged` or `skipped-existing`; without
 * a writer a dry run reports every write action as `dry-run`.
 *
 * Writes already done are never rolled back; a failure stops the remaining
 * writes unless `continueOnError` is set.
 */
export async function executePlan(
  plan: ExecutionPlan,
  writer: DescriptionWriter | null,
  options: ExecutePlanOptions
): Promise<ExecutionReport> {
  if (!options.dryRun && !writer && plan.entries.some(isWriteAction)) {
    throw new AppError('A writer is required unless running in dry-run mode', 'WRITER_REQUIRED', 500);
  }

  const results: WriteResult[] = [];
  let aborted = false;

  for (const entry of plan.entries) {
    if (!isWriteAction(entry)) {
      results.push({ entry, status: 'excluded' });
      continue;
    }

    if (aborted) {
      results.push({ entry, status: 'not-attempted' });
      continue;
    }

    if (!writer) {
      results.push({ entry, status: 'dry-run' });
      continue;
    }

    const { outcome, record } = entry;
    const request: WriteRequest = {
      targetPath: outcome.targetPath,
      description: record.description,
      action: outcome.action,
      anchorPath: outcome.anchorPath,
    };
    try {
      if (options.dryRun) {
        const inspected = await writer.inspect(request);
        results.push({ entry, status: inspected === 'would-write' ? 'dry-run' : inspected });
        continue;
      }

      const appeared =
        outcome.action === 'create-sidecar' ? await findExisting(sidecarSpellings(outcome.targetPath)) : undefined;
      if (appeared) {
        throw new WriteError(
          `Target file ${appeared} appeared after the file scan; refusing to replace it`,
          outcome.targetPath,
          'SIDECAR_APPEARED'
        );
      }

      const status: WriteResultStatus = await writer.write(request);
      results.push({ entry, status });
    } catch (error) {
      const failure = toFailure(error, outcome.targetPath);
      logger.error(failure.message, failure, LOG_CONTEXT);
      results.push({ entry, status: 'failed', error: failure.message, errorCode: failure.writeCode });
      if (!options.continueOnError) {
        aborted = true;
      }
    }
  }

  const counts = countResults(results);
  logger.info(
    options.dryRun ? 'Dry run finished, nothing was written' : `${counts.written} files updated`,
    { ...counts },
    LOG_CONTEXT
  );

  return { dryRun: options.dryRun, results, counts, aborted };
}

const RULE = '───────────────────────────────────────────────────────────────';

export function formatExecutionReport(report: ExecutionReport): string {
  const { counts } = report;
  const lines: string[] = [];

  lines.push(RULE);
  lines.push(report.dryRun ? 'DRY RUN - Nothing was written' : 'DESCRIPTIONS WRITTEN');
  lines.push(RULE);

  if (report.dryRun) {
    lines.push(`Would Write:       ${counts['dry-run']}`);
    lines.push(`Unchanged:         ${counts.unchanged}`);
    lines.push(`Would Keep:        ${counts['skipped-existing']}`);
    lines.push(`Failed:            ${counts.failed}`);
  } else {
    lines.push(`Files Updated:     ${counts.written}`);
    lines.push(`Unchanged:         ${counts.unchanged}`);
    lines.push(`Kept Existing:     ${counts['skipped-existing']}`);
    lines.push(`Failed:            ${counts.failed}`);
    lines.push(`Not Attempted:     ${counts['not-attempted']}`);
  }
  lines.push(`Excluded:          ${counts.excluded}`);

  const failures = report.results.filter((result) => result.status === 'failed');
  if (failures.length > 0) {
    lines.push('');
    lines.push('Errors:');
    for (const failure of failures) {
      lines.push(`  ${failure.entry.record.lineNo}: ${failure.error ?? 'unknown error'}`);
    }
  }

  if (report.aborted) {
    lines.push('');
    lines.push('Stopped after the first failure; use --continue-on-error to write the rest.');
  }

  lines.push(RULE);
  return lines.join('\n');
}
