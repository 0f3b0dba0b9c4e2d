import { relative } from 'path';
import { AppError } from './logger.js';
import type {
  ExecutionPlan,
  InputRecord,
  MatchedOutcome,
  PlanEntry,
  PlanSummary,
  ResolutionOutcome,
} from './media-types.js';

const RULE = '───────────────────────────────────────────────────────────────';
const DOUBLE_RULE = '═══════════════════════════════════════════════════════════════';

export interface PlanReportOptions {
  /** Render targets relative to this directory */
  rootDir?: string;
  dryRun?: boolean;
}

export type PlanEntryJson =
  | {
      line: number;
      stem: string;
      sourcePath: string;
      outcome: 'matched';
      action: 'write-existing' | 'create-sidecar';
      target: string;
      anchor?: string;
    }
  | {
      line: number;
      stem: string;
      sourcePath: string;
      outcome: 'ambiguous';
      reason: string;
      candidates: string[];
    }
  | {
      line: number;
      stem: string;
      sourcePath: string;
      outcome: 'not-found';
    };

export interface PlanJson {
  summary: PlanSummary;
  entries: PlanEntryJson[];
}

/**
 * Two stems can only land on the same path if the outcomes were produced
 * outside the resolver, but a plan with a shared target must never reach the
 * writer.
 */
function rejectSharedTargets(entries: PlanEntry[]): PlanEntry[] {
  const stemsByTarget = new Map<string, string[]>();
  for (const { record, outcome } of entries) {
    if (outcome.kind !== 'matched') continue;
    const stems = stemsByTarget.get(outcome.targetPath) ?? [];
    stems.push(record.stem);
    stemsByTarget.set(outcome.targetPath, stems);
  }

  return entries.map((entry): PlanEntry => {
    const { outcome } = entry;
    if (outcome.kind !== 'matched') return entry;
    const claimants = stemsByTarget.get(outcome.targetPath) ?? [];
    if (claimants.length < 2) return entry;
    return {
      record: entry.record,
      outcome: {
        kind: 'ambiguous',
        reason: 'target claimed by multiple stems',
        candidates: [outcome.targetPath],
      },
    };
  });
}

export function summarizePlan(entries: readonly PlanEntry[]): PlanSummary {
  const summary: PlanSummary = {
    total: entries.length,
    matched: 0,
    writeExisting: 0,
    createSidecar: 0,
    ambiguous: 0,
    notFound: 0,
  };

  for (const { outcome } of entries) {
    switch (outcome.kind) {
      case 'matched':
        summary.matched += 1;
        if (outcome.action === 'create-sidecar') {
          summary.createSidecar += 1;
        } else {
          summary.writeExisting += 1;
        }
        break;
      case 'ambiguous':
        summary.ambiguous += 1;
        break;
      case 'not-found':
        summary.notFound += 1;
        break;
    }
  }

  return summary;
}

export function buildExecutionPlan(
  records: readonly InputRecord[],
  outcomes: readonly ResolutionOutcome[]
): ExecutionPlan {
  if (records.length !== outcomes.length) {
    throw new AppError(
      `Cannot build plan: ${records.length} records but ${outcomes.length} outcomes`,
      'PLAN_SHAPE_MISMATCH',
      500
    );
  }

  const entries = rejectSharedTargets(
    records.map((record, index) => ({ record, outcome: outcomes[index] }))
  );

  return { entries, summary: summarizePlan(entries) };
}

export function isWriteAction(entry: PlanEntry): entry is PlanEntry & { outcome: MatchedOutcome } {
  return entry.outcome.kind === 'matched';
}

function displayPath(path: string, rootDir?: string): string {
  if (!rootDir) return path;
  const rel = relative(rootDir, path);
  return rel.length > 0 && !rel.startsWith('..') ? rel : path;
}

export function describeOutcome(entry: PlanEntry, rootDir?: string): string {
  const { outcome } = entry;
  switch (outcome.kind) {
    case 'matched':
      return outcome.action === 'create-sidecar'
        ? `create sidecar ${displayPath(outcome.targetPath, rootDir)}`
        : `write ${displayPath(outcome.targetPath, rootDir)}`;
    case 'ambiguous':
      return `ambiguous: ${outcome.reason}`;
    case 'not-found':
      return 'not found';
  }
}

export function formatPlanReport(plan: ExecutionPlan, options: PlanReportOptions = {}): string {
  const { summary } = plan;
  const lines: string[] = [];

  lines.push(DOUBLE_RULE);
  lines.push(options.dryRun ? 'DESCRIPTION PLAN (DRY RUN)' : 'DESCRIPTION PLAN');
  lines.push(DOUBLE_RULE);
  if (options.rootDir) {
    lines.push(`Search Dir:    ${options.rootDir}`);
  }
  lines.push('');

  for (const entry of plan.entries) {
    lines.push(`  ${entry.record.lineNo}: ${entry.record.stem} -> ${describeOutcome(entry, options.rootDir)}`);
    if (entry.outcome.kind === 'ambiguous') {
      for (const candidate of entry.outcome.candidates) {
        lines.push(`       ${displayPath(candidate, options.rootDir)}`);
      }
    }
  }

  lines.push('');
  lines.push(RULE);
  lines.push('SUMMARY');
  lines.push(RULE);
  lines.push(`Descriptions:      ${summary.total}`);
  lines.push(`Matched:           ${summary.matched}`);
  lines.push(`  - Write Existing: ${summary.writeExisting}`);
  lines.push(`  - Create Sidecar: ${summary.createSidecar}`);
  lines.push(`Ambiguous:         ${summary.ambiguous}`);
  lines.push(`Not Found:         ${summary.notFound}`);

  return lines.join('\n');
}

export function toPlanJson(plan: ExecutionPlan): PlanJson {
  const entries = plan.entries.map((entry): PlanEntryJson => {
    const base = {
      line: entry.record.lineNo,
      stem: entry.record.stem,
      sourcePath: entry.record.sourcePath,
    };
    const { outcome } = entry;
    switch (outcome.kind) {
      case 'matched':
        return {
          ...base,
          outcome: 'matched',
          action: outcome.action,
          target: outcome.targetPath,
          ...(outcome.anchorPath ? { anchor: outcome.anchorPath } : {}),
        };
      case 'ambiguous':
        return {
          ...base,
          outcome: 'ambiguous',
          reason: outcome.reason,
          candidates: [...outcome.candidates],
        };
      case 'not-found':
        return { ...base, outcome: 'not-found' };
    }
  });

  return { summary: { ...plan.summary }, entries };
}
