/**
 * Output Formatter
 * 
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import { formatBpm, type AnalysisResult } from '@tempo-consensus/analysis';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printTable(data: Record<string, unknown>[]): void {
  if (data.length === 0) {
    printInfo('No data to display');
    return;
  }
  console.table(data);
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${value}`);
}

/**
 * Highlight lines shown after the report files are written.
 * Plain strings so they can be asserted without terminal colours.
 */
export function highlightLines(result: AnalysisResult): string[] {
  const { highVariance, options } = result;
  if (highVariance.length === 0) {
    return [];
  }

  return [
    `Files with high BPM variance (>${options.varianceThresholdBpm} BPM): ${highVariance.length}`,
    ...highVariance
      .slice(0, options.highlightLimit)
      .map((record) => `  - ${record.fileId}: ${formatBpm(record.spread)} BPM difference`),
  ];
}

export function printSummary(result: AnalysisResult): void {
  printHeader('BPM DETECTION SUMMARY');
  printKeyValue('Files analyzed', result.totalFiles);
  printKeyValue('Methods used', result.methods.join(', '));

  const lines = highlightLines(result);
  if (lines.length > 0) {
    console.log();
    const [heading, ...rest] = lines;
    console.log(chalk.yellow(heading));
    for (const line of rest) {
      console.log(line);
    }
  }
  console.log();
}
