/**
 * @tempo-consensus/analysis
 *
 * Cross-method tempo analysis over a frozen corpus:
 * - Octave-aware comparator
 * - Per-method statistics
 * - High-variance flagging
 * - Pairwise agreement matrix
 * - Text and JSON reports
 */

export { agree, compareReadings } from './comparator.js';

export {
  computeStatistics,
  computeMethodStatistics,
  coverage,
  type MethodStatistics,
  type BpmSummary,
} from './statistics.js';

export {
  computeVarianceRecord,
  computeVarianceRecords,
  flagHighVariance,
  compareBySpread,
  type VarianceRecord,
} from './varianceFlagger.js';

export {
  computeAgreementMatrix,
  computePairAgreement,
  compareByAgreement,
  type AgreementResult,
  type MethodPairAgreement,
} from './agreementMatrix.js';

export { analyzeCorpus, type AnalysisResult } from './analyzer.js';

export {
  renderTextReport,
  formatAgreementLine,
  formatBpm,
  REPORT_TITLE,
  NO_DATA,
  NO_RESULT,
} from './report/textReport.js';

export { buildJsonReport, renderJsonReport, type JsonReport } from './report/jsonReport.js';
