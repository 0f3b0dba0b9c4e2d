import { describe, it, expect } from 'vitest';
import {
  buildExecutionPlan,
  describeOutcome,
  formatPlanReport,
  isWriteAction,
  summarizePlan,
  toPlanJson,
} from './plan-builder.js';
import { AppError } from './logger.js';
import type { InputRecord, ResolutionOutcome } from './media-types.js';

function record(lineNo: number, stem: string, sourcePath = `${stem}.jpg`): InputRecord {
  return { lineNo, sourcePath, stem, description: `About ${stem}` };
}

const records: InputRecord[] = [
  record(1, 'IMG_0001', 'IMG_0001.ARW'),
  record(2, 'IMG_0002'),
  record(4, 'IMG_0004'),
  record(5, 'IMG_0009'),
];

const outcomes: ResolutionOutcome[] = [
  {
    kind: 'matched',
    action: 'create-sidecar',
    targetPath: '/shots/IMG_0001.xmp',
    anchorPath: '/shots/IMG_0001.ARW',
  },
  { kind: 'matched', action: 'write-existing', targetPath: '/shots/Selects/IMG_0002.xmp' },
  {
    kind: 'ambiguous',
    reason: 'multiple writable targets for stem',
    candidates: ['/shots/IMG_0004.heic', '/shots/IMG_0004.jpg'],
  },
  { kind: 'not-found' },
];

describe('buildExecutionPlan', () => {
  it('should pair each record with its outcome in input order', () => {
    const plan = buildExecutionPlan(records, outcomes);

    expect(plan.entries.map((entry) => entry.record.lineNo)).toEqual([1, 2, 4, 5]);
    expect(plan.entries.map((entry) => entry.outcome)).toEqual(outcomes);
  });

  it('should count outcomes', () => {
    const plan = buildExecutionPlan(records, outcomes);

    expect(plan.summary).toEqual({
      total: 4,
      matched: 2,
      writeExisting: 1,
      createSidecar: 1,
      ambiguous: 1,
      notFound: 1,
    });
    expect(summarizePlan(plan.entries)).toEqual(plan.summary);
  });

  it('should reject records and outcomes of different lengths', () => {
    let caught: unknown;
    try {
      buildExecutionPlan(records, outcomes.slice(1));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AppError);
    expect(caught).toMatchObject({ code: 'PLAN_SHAPE_MISMATCH' });
  });

  it('should turn a target shared by two stems into ambiguous entries', () => {
    const plan = buildExecutionPlan(
      [record(1, 'A'), record(2, 'B'), record(3, 'C')],
      [
        { kind: 'matched', action: 'write-existing', targetPath: '/shots/shared.jpg' },
        { kind: 'matched', action: 'write-existing', targetPath: '/shots/shared.jpg' },
        { kind: 'matched', action: 'write-existing', targetPath: '/shots/C.jpg' },
      ]
    );

    expect(plan.entries.map((entry) => entry.outcome)).toEqual([
      { kind: 'ambiguous', reason: 'target claimed by multiple stems', candidates: ['/shots/shared.jpg'] },
      { kind: 'ambiguous', reason: 'target claimed by multiple stems', candidates: ['/shots/shared.jpg'] },
      { kind: 'matched', action: 'write-existing', targetPath: '/shots/C.jpg' },
    ]);
    expect(plan.summary.matched).toBe(1);
    expect(plan.summary.ambiguous).toBe(2);
  });

  it('should flag only matched entries as write actions', () => {
    const plan = buildExecutionPlan(records, outcomes);

    expect(plan.entries.map(isWriteAction)).toEqual([true, true, false, false]);
  });
});

describe('plan rendering', () => {
  const plan = buildExecutionPlan(records, outcomes);

  it('should describe outcomes relative to the search directory', () => {
    expect(describeOutcome(plan.entries[0], '/shots')).toBe('create sidecar IMG_0001.xmp');
    expect(describeOutcome(plan.entries[1], '/shots')).toBe('write Selects/IMG_0002.xmp');
    expect(describeOutcome(plan.entries[1])).toBe('write /shots/Selects/IMG_0002.xmp');
    expect(describeOutcome(plan.entries[2])).toBe('ambiguous: multiple writable targets for stem');
    expect(describeOutcome(plan.entries[3])).toBe('not found');
  });

  it('should keep paths outside the search directory absolute', () => {
    expect(describeOutcome(plan.entries[0], '/elsewhere')).toBe('create sidecar /shots/IMG_0001.xmp');
  });

  it('should render the plan report', () => {
    const lines = formatPlanReport(plan, { rootDir: '/shots', dryRun: true }).split('\n');

    expect(lines[1]).toBe('DESCRIPTION PLAN (DRY RUN)');
    expect(lines[3]).toBe('Search Dir:    /shots');
    expect(lines.slice(5, 11)).toEqual([
      '  1: IMG_0001 -> create sidecar IMG_0001.xmp',
      '  2: IMG_0002 -> write Selects/IMG_0002.xmp',
      '  4: IMG_0004 -> ambiguous: multiple writable targets for stem',
      '       IMG_0004.heic',
      '       IMG_0004.jpg',
      '  5: IMG_0009 -> not found',
    ]);
    expect(lines.slice(-6)).toEqual([
      'Descriptions:      4',
      'Matched:           2',
      '  - Write Existing: 1',
      '  - Create Sidecar: 1',
      'Ambiguous:         1',
      'Not Found:         1',
    ]);
  });

  it('should title a real run without the dry-run marker', () => {
    const lines = formatPlanReport(plan).split('\n');

    expect(lines[1]).toBe('DESCRIPTION PLAN');
    expect(lines[3]).toBe('');
  });

  it('should convert the plan to JSON', () => {
    expect(toPlanJson(plan)).toEqual({
      summary: plan.summary,
      entries: [
        {
          line: 1,
          stem: 'IMG_0001',
          sourcePath: 'IMG_0001.ARW',
          outcome: 'matched',
          action: 'create-sidecar',
          target: '/shots/IMG_0001.xmp',
          anchor: '/shots/IMG_0001.ARW',
        },
        {
          line: 2,
          stem: 'IMG_0002',
          sourcePath: 'IMG_0002.jpg',
          outcome: 'matched',
          action: 'write-existing',
          target: '/shots/Selects/IMG_0002.xmp',
        },
        {
          line: 4,
          stem: 'IMG_0004',
          sourcePath: 'IMG_0004.jpg',
          outcome: 'ambiguous',
          reason: 'multiple writable targets for stem',
          candidates: ['/shots/IMG_0004.heic', '/shots/IMG_0004.jpg'],
        },
        { line: 5, stem: 'IMG_0009', sourcePath: 'IMG_0009.jpg', outcome: 'not-found' },
      ],
    });
  });
});
