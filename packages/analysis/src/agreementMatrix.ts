/**
 * Pairwise Agreement Matrix
 *
 * For each unordered method pair, the share of files where both methods
 * produced a value and the comparator calls them equal. Files where either
 * side is absent are outside the denominator.
 */

import {
  DEFAULT_TOLERANCE_BPM,
  ValidationError,
  byCodeUnit,
  isPresent,
  type Corpus,
  type FileId,
  type MethodName,
} from '@tempo-consensus/core';
import { agree } from './comparator.js';

export interface AgreementResult {
  fileId: FileId;
  a: number;
  b: number;
  agree: boolean;
}

export interface MethodPairAgreement {
  // methodA < methodB in code-unit order
  methodA: MethodName;
  methodB: MethodName;
  matched: number;
  compared: number;
  // 0-100, null when nothing could be compared
  percentage: number | null;
  results: AgreementResult[];
}

/**
 * Percentage descending, pairs without overlap last, then by method names
 */
export function compareByAgreement(a: MethodPairAgreement, b: MethodPairAgreement): number {
  if (a.percentage !== b.percentage) {
    if (a.percentage === null) return 1;
    if (b.percentage === null) return -1;
    return b.percentage - a.percentage;
  }
  return byCodeUnit(a.methodA, b.methodA) || byCodeUnit(a.methodB, b.methodB);
}

export function computePairAgreement(
  corpus: Corpus,
  methodA: MethodName,
  methodB: MethodName,
  tolerance: number = DEFAULT_TOLERANCE_BPM
): MethodPairAgreement {
  if (methodA === methodB) {
    throw new ValidationError('method', `cannot compare "${methodA}" with itself`, { method: methodA });
  }
  const [first, second] = byCodeUnit(methodA, methodB) < 0
    ? [methodA, methodB]
    : [methodB, methodA];

  const results: AgreementResult[] = [];
  for (const fileId of corpus.allFiles()) {
    const a = corpus.reading(fileId, first);
    const b = corpus.reading(fileId, second);
    if (!isPresent(a) || !isPresent(b)) continue;

    results.push({ fileId, a: a.bpm, b: b.bpm, agree: agree(a.bpm, b.bpm, tolerance) });
  }

  const matched = results.filter((result) => result.agree).length;
  const compared = results.length;

  return {
    methodA: first,
    methodB: second,
    matched,
    compared,
    percentage: compared === 0 ? null : (matched / compared) * 100,
    results,
  };
}

/**
 * Every unordered pair of distinct corpus methods, ordered by agreement
 */
export function computeAgreementMatrix(
  corpus: Corpus,
  tolerance: number = DEFAULT_TOLERANCE_BPM
): MethodPairAgreement[] {
  const methods = corpus.allMethods();
  const pairs: MethodPairAgreement[] = [];

  for (let i = 0; i < methods.length; i++) {
    for (let j = i + 1; j < methods.length; j++) {
      pairs.push(computePairAgreement(corpus, methods[i]!, methods[j]!, tolerance));
    }
  }

  return pairs.sort(compareByAgreement);
}
