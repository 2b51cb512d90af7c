import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ValidationError } from '@tempo-consensus/core';
import type { CliConfig } from '../config/index.js';
import { runReport } from './report.js';

describe('runReport', () => {
  let dir: string;
  let input: string;
  let config: CliConfig;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tempo-report-'));
    input = join(dir, 'results.json');
    await writeFile(input, JSON.stringify([
      { file: 'set/A.mp3', filename: 'A.mp3', duration: null, offset: null, method1: 100, method2: 102 },
      { file: 'set/B.mp3', filename: 'B.mp3', duration: null, offset: null, method1: 70, method2: 140 },
      { file: 'set/C.mp3', filename: 'C.mp3', duration: null, offset: null, method1: null, method2: 90 },
    ]));
    config = {
      analysis: {},
      outputDir: join(dir, 'out'),
      outputPrefix: 'bpm_results',
      debug: false,
      configFile: join(dir, '.tempo-consensus.json'),
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('renders to memory when no output is requested', async () => {
    const run = await runReport([input], {}, config);

    expect(run.written).toEqual([]);
    expect(run.rendered.split('\n')).toContain('method1 vs method2: 100.0% agreement (2/2 files)');
    expect(run.rendered.split('\n')).toContain('  Files processed: 2/3');
  });

  it('writes the summary under the output prefix', async () => {
    const run = await runReport([input], { output: 'session' }, config);
    const summary = join(dir, 'out', 'session_summary.txt');

    expect(run.written).toEqual([summary]);
    expect(await readFile(summary, 'utf8')).toBe(run.rendered);
  });

  it('writes combined and per-method exports', async () => {
    const run = await runReport([input], { export: true, outDir: join(dir, 'exports') }, config);

    expect(run.written).toEqual([
      join(dir, 'exports', 'bpm_results_all_methods.json'),
      join(dir, 'exports', 'bpm_results_method1.json'),
      join(dir, 'exports', 'bpm_results_method2.json'),
      join(dir, 'exports', 'bpm_results_summary.txt'),
    ]);

    const method1 = JSON.parse(await readFile(join(dir, 'exports', 'bpm_results_method1.json'), 'utf8'));
    expect(method1).toEqual([
      { file: 'set/B.mp3', filename: 'B.mp3', bpm: 70 },
      { file: 'set/A.mp3', filename: 'A.mp3', bpm: 100 },
    ]);
  });

  it('refuses exports whose method names map to the same file', async () => {
    const clashing = join(dir, 'clashing.json');
    await writeFile(clashing, JSON.stringify({
      estimates: [
        { fileId: 'set/A.mp3', method: 'lib/onset', bpm: 120 },
        { fileId: 'set/A.mp3', method: 'lib_onset', bpm: 121 },
      ],
    }));
    const outDir = join(dir, 'clash-out');

    await expect(runReport([clashing], { export: true, outDir }, config)).rejects.toThrow(
      ValidationError
    );
    await expect(runReport([clashing], { export: true, outDir }, config)).rejects.toThrow(
      `method "lib/onset" and method "lib_onset" would both be written to ${join(outDir, 'bpm_results_lib_onset.json')}`
    );
    await expect(readdir(outDir)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('lets flags override the configured options', async () => {
    const run = await runReport(
      [input],
      { tolerance: 1, threshold: 100, top: 1 },
      { ...config, analysis: { toleranceBpm: 8, varianceThresholdBpm: 10 } }
    );

    expect(run.analysis.options).toEqual({ toleranceBpm: 1, varianceThresholdBpm: 100, highlightLimit: 1 });
    expect(run.analysis.highVariance).toEqual([]);
    expect(run.analysis.agreement[0]).toMatchObject({ matched: 1, compared: 2 });
  });

  it('uses configured options when no flag is given', async () => {
    const run = await runReport([input], {}, { ...config, analysis: { varianceThresholdBpm: 10 } });
    expect(run.analysis.highVariance.map((record) => record.fileId)).toEqual(['set/B.mp3']);
  });

  it('renders JSON on request', async () => {
    const run = await runReport([input], { json: true, output: 'run' }, config);

    expect(run.written).toEqual([join(dir, 'out', 'run_summary.json')]);
    expect(JSON.parse(run.rendered).agreement).toEqual([
      { methodA: 'method1', methodB: 'method2', matched: 2, compared: 2, percentage: 100 },
    ]);
  });

  it('produces the same report twice', async () => {
    const first = await runReport([input], {}, config);
    const second = await runReport([input], {}, config);
    expect(second.rendered).toBe(first.rendered);
  });
});
