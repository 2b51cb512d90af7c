/**
 * Corpus Exports
 *
 * Plain JSON views of a frozen corpus, written beside the summary report.
 */

import { displayName } from '@tempo-consensus/utils';
import { byCodeUnit, type Corpus } from '../store/estimateStore.js';
import { isPresent, readingToBpm, type FileId, type MethodName } from '../types/estimate.js';
import { ValidationError } from '../errors/index.js';
import { RESERVED_RECORD_KEYS } from '../ingestion/resultsDocument.js';

export interface MethodExportEntry {
  file: FileId;
  filename: string;
  bpm: number;
}

export interface CombinedExportRecord {
  file: FileId;
  filename: string;
  [method: string]: string | number | null;
}

/**
 * Present results per method, sorted by BPM ascending (ties by file).
 * Methods without a single present value are left out.
 */
export function exportByMethod(corpus: Corpus): Map<MethodName, MethodExportEntry[]> {
  const exports = new Map<MethodName, MethodExportEntry[]>();

  for (const method of corpus.allMethods()) {
    const entries: MethodExportEntry[] = [];
    for (const [file, reading] of corpus.estimatesForMethod(method)) {
      if (isPresent(reading)) {
        entries.push({ file, filename: displayName(file), bpm: reading.bpm });
      }
    }
    if (entries.length === 0) continue;

    entries.sort((a, b) => a.bpm - b.bpm || byCodeUnit(a.file, b.file));
    exports.set(method, entries);
  }

  return exports;
}

/**
 * One record per file with every corpus method as a key.
 * Methods not run on a file appear as null. A method named like one of the
 * file keys cannot be represented and is rejected.
 */
export function toCombinedRecords(corpus: Corpus): CombinedExportRecord[] {
  const methods = corpus.allMethods();
  for (const method of methods) {
    if (RESERVED_RECORD_KEYS.has(method)) {
      throw new ValidationError('method', `"${method}" clashes with a combined record key`, { method });
    }
  }
  return corpus.allFiles().map((file) => {
    const record: CombinedExportRecord = { file, filename: displayName(file) };
    for (const method of methods) {
      record[method] = readingToBpm(corpus.reading(file, method));
    }
    return record;
  });
}
