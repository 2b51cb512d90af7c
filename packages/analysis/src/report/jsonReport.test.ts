import { describe, it, expect } from 'vitest';
import { buildCorpus } from '@tempo-consensus/core';
import { analyzeCorpus } from '../analyzer.js';
import { buildJsonReport, renderJsonReport } from './jsonReport.js';

describe('buildJsonReport', () => {
  const corpus = buildCorpus([
    { fileId: 'A', method: 'm1', bpm: 100 },
    { fileId: 'A', method: 'ghost', bpm: null },
    { fileId: 'A', method: 'm2', bpm: 150 },
    { fileId: 'B', method: 'm1', bpm: 110 },
  ]);

  it('keeps undefined statistics as null', () => {
    const report = buildJsonReport(analyzeCorpus(corpus));

    expect(report.totalFiles).toBe(2);
    expect(report.methods).toEqual(['ghost', 'm1', 'm2']);
    expect(report.statistics[0]).toEqual({
      method: 'ghost',
      count: 0,
      totalFiles: 2,
      mean: null,
      min: null,
      max: null,
    });
    expect(report.agreement).toEqual([
      { methodA: 'm1', methodB: 'm2', matched: 0, compared: 1, percentage: 0 },
      { methodA: 'ghost', methodB: 'm1', matched: 0, compared: 0, percentage: null },
      { methodA: 'ghost', methodB: 'm2', matched: 0, compared: 0, percentage: null },
    ]);
  });

  it('lists every method for flagged files', () => {
    const report = buildJsonReport(analyzeCorpus(corpus));
    expect(report.highVariance).toEqual([
      { fileId: 'A', bpmByMethod: { ghost: null, m1: 100, m2: 150 }, spread: 50 },
    ]);
  });

  it('serializes with a trailing newline', () => {
    const text = renderJsonReport(analyzeCorpus(corpus));
    expect(text.endsWith('}\n')).toBe(true);
    expect(JSON.parse(text)).toEqual(buildJsonReport(analyzeCorpus(corpus)));
  });
});
