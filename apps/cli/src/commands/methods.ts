/**
 * Methods Command
 * 
 * List the methods found in results documents with their coverage.
 */

import { computeStatistics, coverage, formatBpm, NO_DATA } from '@tempo-consensus/analysis';
import { loadCorpus } from '../lib/inputs.js';
import { printError, printHeader, printKeyValue, printTable } from '../lib/output.js';

export type MethodRow = {
  method: string;
  files: string;
  coverage: string;
  average: string;
};

export async function listMethods(inputs: string[]): Promise<{ totalFiles: number; rows: MethodRow[] }> {
  const corpus = await loadCorpus(inputs);

  const rows = computeStatistics(corpus).map((stats) => ({
    method: stats.method,
    files: `${stats.count}/${stats.totalFiles}`,
    coverage: `${(coverage(stats) * 100).toFixed(1)}%`,
    average: stats.summary ? formatBpm(stats.summary.mean) : NO_DATA,
  }));

  return { totalFiles: corpus.size, rows };
}

export async function methodsCommand(inputs: string[]): Promise<void> {
  try {
    const { totalFiles, rows } = await listMethods(inputs);

    printHeader('Methods');
    printKeyValue('Files', totalFiles);
    console.log();
    printTable(rows);
  } catch (error) {
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exit(1);
  }
}
