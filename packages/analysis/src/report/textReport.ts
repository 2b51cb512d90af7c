/**
 * Text Report
 *
 * Renders an AnalysisResult. Pure layout: every number shown here was
 * computed upstream. Same input, same bytes.
 */

import type { AnalysisResult } from '../analyzer.js';
import type { MethodStatistics } from '../statistics.js';
import type { VarianceRecord } from '../varianceFlagger.js';
import type { MethodPairAgreement } from '../agreementMatrix.js';

export const REPORT_TITLE = 'BPM Detection Summary Report';
export const NO_DATA = 'no data';
export const NO_RESULT = 'no result';

const HEAVY_RULE = '='.repeat(80);
const SECTION_RULE = '-'.repeat(40);
const WIDE_RULE = '-'.repeat(60);

export function formatBpm(value: number): string {
  return value.toFixed(1);
}

function statisticsBlock(stats: MethodStatistics): string[] {
  const { summary } = stats;
  return [
    `${stats.method}:`,
    `  Average BPM: ${summary ? formatBpm(summary.mean) : NO_DATA}`,
    `  Range: ${summary ? `${formatBpm(summary.min)} - ${formatBpm(summary.max)}` : NO_DATA}`,
    `  Files processed: ${stats.count}/${stats.totalFiles}`,
    '',
  ];
}

function varianceBlock(record: VarianceRecord, methods: readonly string[]): string[] {
  const lines = ['', `${record.fileId}:`];
  for (const method of methods) {
    const bpm = record.bpmByMethod.get(method);
    lines.push(`  ${method}: ${bpm === undefined ? NO_RESULT : `${formatBpm(bpm)} BPM`}`);
  }
  lines.push(`  Spread: ${formatBpm(record.spread)} BPM`);
  return lines;
}

export function formatAgreementLine(pair: MethodPairAgreement): string {
  const share = pair.percentage === null
    ? NO_DATA
    : `${pair.percentage.toFixed(1)}% agreement`;
  return `${pair.methodA} vs ${pair.methodB}: ${share} (${pair.matched}/${pair.compared} files)`;
}

export function renderTextReport(result: AnalysisResult): string {
  const lines: string[] = [
    REPORT_TITLE,
    HEAVY_RULE,
    '',
    `Total files analyzed: ${result.totalFiles}`,
    `Methods used: ${result.methods.join(', ')}`,
    '',
    'Method Statistics:',
    SECTION_RULE,
  ];

  for (const stats of result.statistics) {
    lines.push(...statisticsBlock(stats));
  }

  lines.push(
    '',
    `Files with High Variance (>${result.options.varianceThresholdBpm} BPM difference):`,
    WIDE_RULE
  );
  if (result.highVariance.length === 0) {
    lines.push('No files with high variance found.');
  } else {
    for (const record of result.highVariance) {
      lines.push(...varianceBlock(record, result.methods));
    }
  }

  lines.push('', '', 'Method Agreement Analysis:', SECTION_RULE);
  if (result.agreement.length === 0) {
    lines.push('Only one method in corpus; nothing to compare.');
  } else {
    for (const pair of result.agreement) {
      lines.push(formatAgreementLine(pair));
    }
  }

  lines.push('', HEAVY_RULE);
  return lines.join('\n') + '\n';
}
