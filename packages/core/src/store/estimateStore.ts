/**
 * Estimate Store
 *
 * Append-only table of per-file, per-method BPM readings.
 *
 * Lifecycle:
 *   ingest()* → freeze() → Corpus (read-only)
 *
 * Rules:
 * - A (file, method) pair may be ingested once
 * - Present BPM values must be finite and > 0
 * - Nothing can be ingested after freeze()
 * - A pair that was never ingested reads as absent
 */

import { createLogger, isNonEmptyString, isPositiveFinite } from '@tempo-consensus/utils';
import {
  DuplicateEstimateError,
  EmptyCorpusError,
  FrozenStoreError,
  InvalidBpmError,
  UnknownFileError,
  UnknownMethodError,
  ValidationError,
} from '../errors/index.js';
import {
  ABSENT,
  present,
  type BpmReading,
  type FileId,
  type MethodName,
  type TempoEstimate,
} from '../types/estimate.js';

const logger = createLogger({ module: 'estimate-store' });

type ReadingTable = Map<FileId, Map<MethodName, BpmReading>>;

/**
 * Locale-independent string order
 */
export function byCodeUnit(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Frozen, read-only view over ingested estimates.
 * Every accessor returns the same data on every call.
 */
export class Corpus {
  private readonly byFile: ReadonlyMap<FileId, ReadonlyMap<MethodName, BpmReading>>;
  private readonly byMethod: ReadonlyMap<MethodName, ReadonlyMap<FileId, BpmReading>>;
  private readonly files: readonly FileId[];
  private readonly methods: readonly MethodName[];

  constructor(table: ReadingTable) {
    const byFile = new Map<FileId, ReadonlyMap<MethodName, BpmReading>>();
    const byMethod = new Map<MethodName, Map<FileId, BpmReading>>();

    for (const [fileId, readings] of table) {
      byFile.set(fileId, new Map(readings));
      for (const [method, reading] of readings) {
        let column = byMethod.get(method);
        if (!column) {
          column = new Map();
          byMethod.set(method, column);
        }
        column.set(fileId, reading);
      }
    }

    this.byFile = byFile;
    this.byMethod = byMethod;
    this.files = Object.freeze([...byFile.keys()].sort(byCodeUnit));
    this.methods = Object.freeze([...byMethod.keys()].sort(byCodeUnit));
  }

  /** Number of distinct files */
  get size(): number {
    return this.files.length;
  }

  allFiles(): readonly FileId[] {
    return this.files;
  }

  allMethods(): readonly MethodName[] {
    return this.methods;
  }

  /**
   * Readings recorded for one file, keyed by method.
   * Methods that were never run on the file are not in the map.
   */
  estimatesForFile(fileId: FileId): ReadonlyMap<MethodName, BpmReading> {
    const readings = this.byFile.get(fileId);
    if (!readings) {
      throw new UnknownFileError(fileId);
    }
    return readings;
  }

  /**
   * Readings recorded for one method, keyed by file
   */
  estimatesForMethod(method: MethodName): ReadonlyMap<FileId, BpmReading> {
    const readings = this.byMethod.get(method);
    if (!readings) {
      throw new UnknownMethodError(method);
    }
    return readings;
  }

  /**
   * Reading for one pair; absent when the pair was never ingested
   */
  reading(fileId: FileId, method: MethodName): BpmReading {
    if (!this.byMethod.has(method)) {
      throw new UnknownMethodError(method);
    }
    return this.estimatesForFile(fileId).get(method) ?? ABSENT;
  }
}

export class EstimateStore {
  private readonly table: ReadingTable = new Map();
  private recordCount = 0;
  private corpus: Corpus | null = null;

  get isFrozen(): boolean {
    return this.corpus !== null;
  }

  /** Number of ingested records */
  get count(): number {
    return this.recordCount;
  }

  /**
   * Append one record. `bpm: null` records a detection failure.
   */
  ingest(fileId: FileId, method: MethodName, bpm: number | null): void {
    if (this.corpus) {
      throw new FrozenStoreError(fileId, method);
    }
    if (!isNonEmptyString(fileId)) {
      throw new ValidationError('fileId', 'must be a non-empty string', { fileId, method });
    }
    if (!isNonEmptyString(method)) {
      throw new ValidationError('method', 'must be a non-empty string', { fileId, method });
    }
    if (bpm !== null && !isPositiveFinite(bpm)) {
      throw new InvalidBpmError(fileId, method, bpm);
    }

    let readings = this.table.get(fileId);
    if (!readings) {
      readings = new Map();
      this.table.set(fileId, readings);
    }
    if (readings.has(method)) {
      throw new DuplicateEstimateError(fileId, method);
    }

    readings.set(method, bpm === null ? ABSENT : present(bpm));
    this.recordCount++;
  }

  ingestAll(estimates: Iterable<TempoEstimate>): void {
    for (const estimate of estimates) {
      this.ingest(estimate.fileId, estimate.method, estimate.bpm);
    }
  }

  /**
   * Stop accepting records and hand out the read-only Corpus.
   * Repeated calls return the same Corpus.
   */
  freeze(): Corpus {
    if (this.corpus) {
      return this.corpus;
    }
    if (this.recordCount === 0) {
      throw new EmptyCorpusError();
    }

    this.corpus = new Corpus(this.table);
    logger.debug({
      files: this.corpus.size,
      methods: this.corpus.allMethods().length,
      records: this.recordCount,
    }, 'Estimate store frozen');

    return this.corpus;
  }
}

/**
 * Ingest every estimate into a fresh store and freeze it
 */
export function buildCorpus(estimates: Iterable<TempoEstimate>): Corpus {
  const store = new EstimateStore();
  store.ingestAll(estimates);
  return store.freeze();
}

