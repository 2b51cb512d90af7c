import { describe, it, expect } from 'vitest';
import { buildCorpus, type TempoEstimate } from '@tempo-consensus/core';
import { analyzeCorpus } from '@tempo-consensus/analysis';
import { highlightLines } from './output.js';

function spreadFile(fileId: string, spread: number): TempoEstimate[] {
  return [
    { fileId, method: 'low', bpm: 100 },
    { fileId, method: 'high', bpm: 100 + spread },
  ];
}

describe('highlightLines', () => {
  it('lists the widest spreads up to the limit', () => {
    const corpus = buildCorpus([
      ...spreadFile('a.mp3', 30),
      ...spreadFile('b.mp3', 45),
      ...spreadFile('c.mp3', 25),
      ...spreadFile('d.mp3', 5),
    ]);

    expect(highlightLines(analyzeCorpus(corpus, { highlightLimit: 2 }))).toEqual([
      'Files with high BPM variance (>20 BPM): 3',
      '  - b.mp3: 45.0 BPM difference',
      '  - a.mp3: 30.0 BPM difference',
    ]);
  });

  it('is empty when nothing is flagged', () => {
    const corpus = buildCorpus(spreadFile('a.mp3', 5));
    expect(highlightLines(analyzeCorpus(corpus))).toEqual([]);
  });
});
