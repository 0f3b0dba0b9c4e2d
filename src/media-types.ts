/**
 * Shared types for the description matching pipeline
 */

export type FormatClass = 'raw' | 'writable-image' | 'sidecar' | 'unrecognized';

export type CatalogFormatClass = Exclude<FormatClass, 'unrecognized'>;

export interface InputRecord {
  lineNo: number;
  /** Filename column as written in the input */
  sourcePath: string;
  stem: string;
  description: string;
}

export interface CandidateFile {
  /** Absolute path */
  path: string;
  /** Path relative to the search root, always with forward slashes */
  relativePath: string;
  directory: string;
  stem: string;
  /** Lower-cased, including the dot */
  extension: string;
  formatClass: CatalogFormatClass;
}

export interface Catalog {
  rootDir: string;
  byStem: ReadonlyMap<string, readonly CandidateFile[]>;
  filesVisited: number;
  filesCatalogued: number;
  filesSkipped: number;
}

export type WriteAction = 'write-existing' | 'create-sidecar';

export type AmbiguityReason =
  | 'multiple sidecars for stem'
  | 'multiple writable targets for stem'
  | 'raw files for stem span multiple directories'
  | 'target claimed by multiple stems';

export interface MatchedOutcome {
  kind: 'matched';
  action: WriteAction;
  targetPath: string;
  /** Raw file a created sidecar belongs to */
  anchorPath?: string;
}

export interface AmbiguousOutcome {
  kind: 'ambiguous';
  reason: AmbiguityReason;
  candidates: string[];
}

export interface NotFoundOutcome {
  kind: 'not-found';
}

export type ResolutionOutcome = MatchedOutcome | AmbiguousOutcome | NotFoundOutcome;

export interface PlanEntry {
  record: InputRecord;
  outcome: ResolutionOutcome;
}

export interface PlanSummary {
  total: number;
  matched: number;
  writeExisting: number;
  createSidecar: number;
  ambiguous: number;
  notFound: number;
}

export interface ExecutionPlan {
  entries: PlanEntry[];
  summary: PlanSummary;
}

/** What a writer reports for a single successful call */
export type WriterStatus = 'written' | 'unchanged' | 'skipped-existing';

/** What a write would do, found by reading the target only */
export type InspectStatus = 'would-write' | 'unchanged' | 'skipped-existing';

export type WriteResultStatus =
  | WriterStatus
  | 'dry-run'
  | 'failed'
  | 'not-attempted'
  | 'excluded';

export interface WriteResult {
  entry: PlanEntry;
  status: WriteResultStatus;
  error?: string;
  errorCode?: string;
}

export type WriteResultCounts = Record<WriteResultStatus, number>;

export interface ExecutionReport {
  dryRun: boolean;
  results: WriteResult[];
  counts: WriteResultCounts;
  /** True when a failure stopped the remaining writes */
  aborted: boolean;
}
