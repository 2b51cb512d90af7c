/**
 * Corpus Analyzer
 *
 * Runs the aggregator, flagger and agreement matrix over one frozen corpus
 * and bundles their outputs for the report formatter.
 */

import {
  resolveAnalysisOptions,
  type AnalysisOptions,
  type AnalysisOptionsInput,
  type Corpus,
  type MethodName,
} from '@tempo-consensus/core';
import { createLogger } from '@tempo-consensus/utils';
import { computeStatistics, type MethodStatistics } from './statistics.js';
import { computeVarianceRecords, type VarianceRecord } from './varianceFlagger.js';
import { computeAgreementMatrix, type MethodPairAgreement } from './agreementMatrix.js';

const logger = createLogger({ module: 'corpus-analyzer' });

export interface AnalysisResult {
  totalFiles: number;
  methods: readonly MethodName[];
  statistics: MethodStatistics[];
  // Every file with two or more present readings, spread-descending
  varianceRecords: VarianceRecord[];
  // Subset of varianceRecords above the threshold, same order
  highVariance: VarianceRecord[];
  agreement: MethodPairAgreement[];
  options: AnalysisOptions;
}

export function analyzeCorpus(corpus: Corpus, input: AnalysisOptionsInput = {}): AnalysisResult {
  const options = resolveAnalysisOptions(input);

  const statistics = computeStatistics(corpus);
  const varianceRecords = computeVarianceRecords(corpus);
  const highVariance = varianceRecords.filter(
    (record) => record.spread > options.varianceThresholdBpm
  );
  const agreement = computeAgreementMatrix(corpus, options.toleranceBpm);

  logger.info({
    files: corpus.size,
    methods: corpus.allMethods().length,
    highVariance: highVariance.length,
    pairs: agreement.length,
  }, 'Corpus analysis complete');

  return {
    totalFiles: corpus.size,
    methods: corpus.allMethods(),
    statistics,
    varianceRecords,
    highVariance,
    agreement,
    options,
  };
}
