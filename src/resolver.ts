/**
 * Target selection
 *
 * Decides, for each input stem, which single file receives the description:
 *
 *   1. an existing XMP sidecar,
 *   2. otherwise the one writable image (jpg/heic),
 *   3. otherwise a new sidecar beside the raw file(s).
 *
 * Raw files themselves are never returned as a target. Anything that would
 * require guessing between candidates comes back as `ambiguous`.
 */

import { comparePaths, sidecarPathFor } from './media-formats.js';
import type {
  AmbiguityReason,
  AmbiguousOutcome,
  CandidateFile,
  Catalog,
  CatalogFormatClass,
  InputRecord,
  ResolutionOutcome,
} from './media-types.js';

type PartitionedCandidates = Record<CatalogFormatClass, CandidateFile[]>;

function partition(candidates: readonly CandidateFile[]): PartitionedCandidates {
  const groups: PartitionedCandidates = { raw: [], 'writable-image': [], sidecar: [] };
  for (const candidate of candidates) {
    groups[candidate.formatClass].push(candidate);
  }
  return groups;
}

function ambiguous(reason: AmbiguityReason, candidates: readonly CandidateFile[]): AmbiguousOutcome {
  return {
    kind: 'ambiguous',
    reason,
    candidates: candidates.map((candidate) => candidate.path).sort(comparePaths),
  };
}

function resolveRawOnly(stem: string, raws: CandidateFile[]): ResolutionOutcome {
  const ordered = [...raws].sort((left, right) => comparePaths(left.path, right.path));
  const directories = new Set(ordered.map((raw) => raw.directory));
  if (directories.size > 1) {
    return ambiguous('raw files for stem span multiple directories', ordered);
  }

  // Several raw formats for one shot is normal; the first path anchors the sidecar.
  const anchor = ordered[0];
  return {
    kind: 'matched',
    action: 'create-sidecar',
    targetPath: sidecarPathFor(anchor.directory, stem),
    anchorPath: anchor.path,
  };
}

export function resolveRecord(record: InputRecord, catalog: Catalog): ResolutionOutcome {
  const candidates = catalog.byStem.get(record.stem) ?? [];
  if (candidates.length === 0) {
    return { kind: 'not-found' };
  }

  const groups = partition(candidates);

  if (groups.sidecar.length > 1) {
    return ambiguous('multiple sidecars for stem', groups.sidecar);
  }
  if (groups.sidecar.length === 1) {
    return { kind: 'matched', action: 'write-existing', targetPath: groups.sidecar[0].path };
  }

  if (groups['writable-image'].length > 1) {
    return ambiguous('multiple writable targets for stem', groups['writable-image']);
  }
  if (groups['writable-image'].length === 1) {
    return {
      kind: 'matched',
      action: 'write-existing',
      targetPath: groups['writable-image'][0].path,
    };
  }

  if (groups.raw.length > 0) {
    return resolveRawOnly(record.stem, groups.raw);
  }

  return { kind: 'not-found' };
}

export function resolveRecords(
  records: readonly InputRecord[],
  catalog: Catalog
): ResolutionOutcome[] {
  return records.map((record) => resolveRecord(record, catalog));
}
