import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DuplicateEstimateError, InputFormatError, ValidationError } from '@tempo-consensus/core';
import { loadCorpus } from './inputs.js';

describe('loadCorpus', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tempo-inputs-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('merges several documents into one corpus', async () => {
    const combined = join(dir, 'combined.json');
    const triples = join(dir, 'triples.json');
    await writeFile(combined, JSON.stringify([
      { file: 'tunes/a.mp3', filename: 'a.mp3', duration: null, offset: null, onset: 112.35 },
    ]));
    await writeFile(triples, JSON.stringify({
      estimates: [{ fileId: 'tunes/a.mp3', method: 'percival', bpm: null }],
    }));

    const corpus = await loadCorpus([combined, triples]);

    expect(corpus.allFiles()).toEqual(['tunes/a.mp3']);
    expect(corpus.allMethods()).toEqual(['onset', 'percival']);
  });

  it('treats a pair repeated across documents as a duplicate', async () => {
    const first = join(dir, 'first.json');
    const second = join(dir, 'second.json');
    await writeFile(first, JSON.stringify([{ file: 'a.mp3', onset: 100 }]));
    await writeFile(second, JSON.stringify([{ file: 'a.mp3', onset: 101 }]));

    await expect(loadCorpus([first, second])).rejects.toThrow(DuplicateEstimateError);
  });

  it('fails on a missing file', async () => {
    await expect(loadCorpus([join(dir, 'nope.json')])).rejects.toThrow(/file not found/);
  });

  it('fails on a malformed document', async () => {
    const path = join(dir, 'bad.json');
    await writeFile(path, JSON.stringify({ rows: [] }));
    await expect(loadCorpus([path])).rejects.toThrow(InputFormatError);
  });

  it('requires at least one input', async () => {
    await expect(loadCorpus([])).rejects.toThrow(ValidationError);
  });
});
