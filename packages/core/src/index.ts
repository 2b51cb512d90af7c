/**
 * @tempo-consensus/core
 * 
 * Core package containing:
 * - Estimate types (tagged BPM readings)
 * - Estimate store and frozen corpus
 * - Results-document ingestion
 * - Analysis options
 * - Corpus exports
 * - Error handling
 */

// Types
export {
  ABSENT,
  present,
  isPresent,
  readingToBpm,
} from './types/estimate.js';

export type {
  FileId,
  MethodName,
  BpmReading,
  PresentReading,
  AbsentReading,
  TempoEstimate,
} from './types/estimate.js';

// Store
export {
  EstimateStore,
  Corpus,
  buildCorpus,
  byCodeUnit,
} from './store/estimateStore.js';

// Ingestion
export {
  parseResultsDocument,
  parseResultsJson,
  RESERVED_RECORD_KEYS,
  type CombinedRecord,
} from './ingestion/resultsDocument.js';

// Config
export {
  analysisOptionsSchema,
  resolveAnalysisOptions,
  DEFAULT_TOLERANCE_BPM,
  DEFAULT_VARIANCE_THRESHOLD_BPM,
  DEFAULT_HIGHLIGHT_LIMIT,
  type AnalysisOptions,
  type AnalysisOptionsInput,
} from './config/analysisOptions.js';

// Exports
export {
  exportByMethod,
  toCombinedRecords,
  type MethodExportEntry,
  type CombinedExportRecord,
} from './exports/corpusExports.js';

// Errors
export {
  TempoConsensusError,
  ValidationError,
  DuplicateEstimateError,
  InvalidBpmError,
  FrozenStoreError,
  EmptyCorpusError,
  UnknownMethodError,
  UnknownFileError,
  InputFormatError,
  isTempoConsensusError,
} from './errors/index.js';
