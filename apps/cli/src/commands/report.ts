/**
 * Report Command
 * 
 * Analyze one or more results documents and render the summary report.
 */

import ora from 'ora';
import { artifactPath, writeJsonFile, safeWriteFile } from '@tempo-consensus/utils';
import {
  ValidationError,
  exportByMethod,
  toCombinedRecords,
  type Corpus,
} from '@tempo-consensus/core';
import {
  analyzeCorpus,
  renderJsonReport,
  renderTextReport,
  type AnalysisResult,
} from '@tempo-consensus/analysis';
import { loadCliConfig, type CliConfig } from '../config/index.js';
import { loadCorpus } from '../lib/inputs.js';
import { printError, printSuccess, printSummary, printWarning } from '../lib/output.js';

export interface ReportOptions {
  tolerance?: number;
  threshold?: number;
  top?: number;
  output?: string;
  outDir?: string;
  json?: boolean;
  export?: boolean;
}

export interface ReportRun {
  analysis: AnalysisResult;
  rendered: string;
  // Paths written, in write order; empty when the report went to stdout
  written: string[];
}

interface Artifact {
  owner: string;
  path: string;
  write: () => Promise<void>;
}

/**
 * Distinct method names can sanitize to the same file name; refuse to write
 * anything rather than let one export overwrite another.
 */
function assertDistinctPaths(artifacts: Artifact[]): void {
  const owners = new Map<string, string>();
  for (const artifact of artifacts) {
    const existing = owners.get(artifact.path);
    if (existing !== undefined) {
      throw new ValidationError(
        'output',
        `${existing} and ${artifact.owner} would both be written to ${artifact.path}`,
        { path: artifact.path, owners: [existing, artifact.owner] }
      );
    }
    owners.set(artifact.path, artifact.owner);
  }
}

async function writeArtifacts(
  corpus: Corpus,
  rendered: string,
  options: ReportOptions,
  config: CliConfig
): Promise<string[]> {
  const outputDir = options.outDir ?? config.outputDir;
  const prefix = options.output ?? config.outputPrefix;
  const artifacts: Artifact[] = [];

  if (options.export) {
    const combined = toCombinedRecords(corpus);
    const combinedPath = artifactPath(outputDir, prefix, 'all_methods.json');
    artifacts.push({
      owner: 'combined export',
      path: combinedPath,
      write: () => writeJsonFile(combinedPath, combined),
    });

    for (const [method, entries] of exportByMethod(corpus)) {
      const methodPath = artifactPath(outputDir, prefix, `${method}.json`);
      artifacts.push({
        owner: `method "${method}"`,
        path: methodPath,
        write: () => writeJsonFile(methodPath, entries),
      });
    }
  }

  const summaryPath = artifactPath(outputDir, prefix, options.json ? 'summary.json' : 'summary.txt');
  artifacts.push({
    owner: 'summary',
    path: summaryPath,
    write: () => safeWriteFile(summaryPath, rendered),
  });

  assertDistinctPaths(artifacts);

  for (const artifact of artifacts) {
    await artifact.write();
  }
  return artifacts.map((artifact) => artifact.path);
}

/**
 * Load, analyze and render. Files are written only when an output prefix or
 * --export is given.
 */
export async function runReport(
  inputs: string[],
  options: ReportOptions,
  config: CliConfig
): Promise<ReportRun> {
  const corpus = await loadCorpus(inputs);

  const analysis = analyzeCorpus(corpus, {
    toleranceBpm: options.tolerance ?? config.analysis.toleranceBpm,
    varianceThresholdBpm: options.threshold ?? config.analysis.varianceThresholdBpm,
    highlightLimit: options.top ?? config.analysis.highlightLimit,
  });

  const rendered = options.json ? renderJsonReport(analysis) : renderTextReport(analysis);
  const toFiles = options.output !== undefined || options.export === true;
  const written = toFiles ? await writeArtifacts(corpus, rendered, options, config) : [];

  return { analysis, rendered, written };
}

export async function reportCommand(
  inputs: string[],
  options: ReportOptions
): Promise<void> {
  const spinner = ora('Analyzing tempo estimates...').start();
  let config: CliConfig | undefined;

  try {
    config = loadCliConfig();
    const run = await runReport(inputs, options, config);
    spinner.stop();

    for (const stats of run.analysis.statistics) {
      if (stats.summary === null) {
        printWarning(`${stats.method} produced no BPM values (0/${stats.totalFiles} files)`);
      }
    }

    if (run.written.length === 0) {
      process.stdout.write(run.rendered);
      return;
    }

    for (const path of run.written) {
      printSuccess(`Saved ${path}`);
    }
    printSummary(run.analysis);
  } catch (error) {
    spinner.fail('Analysis failed');
    printError(error instanceof Error ? error.message : 'Unknown error');
    if (config?.debug && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exit(1);
  }
}
