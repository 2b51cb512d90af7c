/**
 * Input Loading
 *
 * Reads results documents from disk and ingests them into one store.
 * Duplicate (file, method) pairs across documents are still duplicates.
 */

import { resolve } from 'node:path';
import { safeReadFile, createLogger } from '@tempo-consensus/utils';
import {
  EstimateStore,
  ValidationError,
  parseResultsJson,
  type Corpus,
} from '@tempo-consensus/core';

const logger = createLogger({ module: 'cli-inputs' });

export async function loadCorpus(paths: string[]): Promise<Corpus> {
  if (paths.length === 0) {
    throw new ValidationError('input', 'at least one results file is required');
  }

  const store = new EstimateStore();
  for (const path of paths) {
    const text = await safeReadFile(resolve(path));
    if (text === null) {
      throw new ValidationError('input', `file not found: ${path}`, { path });
    }

    const estimates = parseResultsJson(text, path);
    store.ingestAll(estimates);
    logger.debug({ path, estimates: estimates.length }, 'Results document ingested');
  }

  return store.freeze();
}
