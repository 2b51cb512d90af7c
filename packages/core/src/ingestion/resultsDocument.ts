/**
 * Results Document Parsing
 *
 * Two accepted shapes:
 *
 * 1. Combined results, one record per file:
 *    [{ "file": "music/a.mp3", "filename": "a.mp3", "duration": null,
 *       "offset": null, "librosa_onset": 121.3, "essentia": null }]
 *
 * 2. Triples:
 *    { "estimates": [{ "fileId": "music/a.mp3", "method": "essentia", "bpm": null }] }
 *
 * Value checks (positive BPM, duplicates) belong to the store; this module only
 * checks structure.
 */

import { z } from 'zod';
import { isObject } from '@tempo-consensus/utils';
import { InputFormatError } from '../errors/index.js';
import type { TempoEstimate } from '../types/estimate.js';

/** Record keys that describe the file rather than a method */
export const RESERVED_RECORD_KEYS: ReadonlySet<string> = new Set([
  'file',
  'filename',
  'duration',
  'offset',
]);

const combinedRecordSchema = z
  .object({
    file: z.string().min(1),
    filename: z.string().optional(),
    duration: z.number().nullable().optional(),
    offset: z.number().nullable().optional(),
  })
  .catchall(z.number().nullable());

const combinedDocumentSchema = z.array(combinedRecordSchema);

const triplesDocumentSchema = z.object({
  estimates: z.array(
    z.object({
      fileId: z.string().min(1),
      method: z.string().min(1),
      bpm: z.number().nullable(),
    })
  ),
});

export type CombinedRecord = z.infer<typeof combinedRecordSchema>;

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

function fromCombined(records: CombinedRecord[]): TempoEstimate[] {
  const estimates: TempoEstimate[] = [];
  for (const record of records) {
    for (const [key, value] of Object.entries(record)) {
      if (RESERVED_RECORD_KEYS.has(key)) continue;
      if (typeof value === 'number' || value === null) {
        estimates.push({ fileId: record.file, method: key, bpm: value });
      }
    }
  }
  return estimates;
}

/**
 * Turn a parsed JSON value into estimates.
 * `source` names the document in error messages.
 */
export function parseResultsDocument(json: unknown, source: string = 'document'): TempoEstimate[] {
  if (Array.isArray(json)) {
    const parsed = combinedDocumentSchema.safeParse(json);
    if (!parsed.success) {
      throw new InputFormatError(source, describeIssues(parsed.error));
    }
    return fromCombined(parsed.data);
  }

  if (isObject(json) && 'estimates' in json) {
    const parsed = triplesDocumentSchema.safeParse(json);
    if (!parsed.success) {
      throw new InputFormatError(source, describeIssues(parsed.error));
    }
    return parsed.data.estimates.map(({ fileId, method, bpm }) => ({ fileId, method, bpm }));
  }

  throw new InputFormatError(source, [
    '(root): expected an array of file records or an object with "estimates"',
  ]);
}

/**
 * Parse JSON text, then the document inside it
 */
export function parseResultsJson(text: string, source: string = 'document'): TempoEstimate[] {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new InputFormatError(source, [
      `(root): ${error instanceof Error ? error.message : 'invalid JSON'}`,
    ]);
  }
  return parseResultsDocument(json, source);
}
