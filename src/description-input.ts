/**
 * Tab-separated description list parsing
 *
 * Each line is `<filename-or-path>\t<description>`. Only the stem of the
 * filename column is used for matching, so `Selects/IMG_0001.JPG` and
 * `IMG_0001.ARW` both name the stem `IMG_0001`.
 */

import { DuplicateStemError, type DuplicateStemOccurrence, MalformedRowError } from './errors.js';
import { logger } from './logger.js';
import { stemOf } from './media-formats.js';
import type { InputRecord } from './media-types.js';

const LOG_CONTEXT = 'DescriptionInput';

export interface ParsedDescriptionInput {
  records: InputRecord[];
  /** Stems whose description column was empty */
  emptyDescriptionStems: string[];
}

function parseLine(line: string, lineNo: number): InputRecord {
  const columns = line.split('\t');
  // Spreadsheet exports often leave trailing tabs after the description.
  while (columns.length > 2 && columns[columns.length - 1].trim().length === 0) {
    columns.pop();
  }
  if (columns.length !== 2) {
    throw new MalformedRowError(
      lineNo,
      line,
      `expected 2 tab-separated columns, found ${columns.length}`
    );
  }

  const [fileColumn, descriptionColumn] = columns;
  const sourcePath = fileColumn.trim();
  const stem = stemOf(sourcePath);
  if (stem.length === 0) {
    throw new MalformedRowError(lineNo, line, 'filename column is empty');
  }

  return {
    lineNo,
    sourcePath,
    stem,
    description: descriptionColumn.trim(),
  };
}

export function parseDescriptionInput(text: string): ParsedDescriptionInput {
  const records: InputRecord[] = [];
  const firstByStem = new Map<string, InputRecord>();
  const duplicates = new Map<string, DuplicateStemOccurrence[]>();
  const emptyDescriptionStems: string[] = [];

  text.split('\n').forEach((rawLine, index) => {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (line.trim().length === 0) {
      return;
    }

    const record = parseLine(line, index + 1);
    const first = firstByStem.get(record.stem);
    if (first) {
      const occurrences = duplicates.get(record.stem) ?? [
        { lineNo: first.lineNo, sourcePath: first.sourcePath },
      ];
      occurrences.push({ lineNo: record.lineNo, sourcePath: record.sourcePath });
      duplicates.set(record.stem, occurrences);
      return;
    }

    firstByStem.set(record.stem, record);
    records.push(record);
    if (record.description.length === 0) {
      emptyDescriptionStems.push(record.stem);
      logger.warn(
        `Empty description for ${record.stem} (line ${record.lineNo})`,
        { sourcePath: record.sourcePath },
        LOG_CONTEXT
      );
    }
  });

  if (duplicates.size > 0) {
    throw new DuplicateStemError(duplicates);
  }

  logger.debug(`Parsed ${records.length} descriptions`, undefined, LOG_CONTEXT);
  return { records, emptyDescriptionStems };
}
