/**
 * Structured Report
 *
 * JSON-ready form of an AnalysisResult. Undefined statistics stay null.
 */

import type { AnalysisResult } from '../analyzer.js';

export interface JsonReport {
  totalFiles: number;
  methods: string[];
  options: {
    toleranceBpm: number;
    varianceThresholdBpm: number;
  };
  statistics: Array<{
    method: string;
    count: number;
    totalFiles: number;
    mean: number | null;
    min: number | null;
    max: number | null;
  }>;
  highVariance: Array<{
    fileId: string;
    bpmByMethod: Record<string, number | null>;
    spread: number;
  }>;
  agreement: Array<{
    methodA: string;
    methodB: string;
    matched: number;
    compared: number;
    percentage: number | null;
  }>;
}

export function buildJsonReport(result: AnalysisResult): JsonReport {
  return {
    totalFiles: result.totalFiles,
    methods: [...result.methods],
    options: {
      toleranceBpm: result.options.toleranceBpm,
      varianceThresholdBpm: result.options.varianceThresholdBpm,
    },
    statistics: result.statistics.map((stats) => ({
      method: stats.method,
      count: stats.count,
      totalFiles: stats.totalFiles,
      mean: stats.summary?.mean ?? null,
      min: stats.summary?.min ?? null,
      max: stats.summary?.max ?? null,
    })),
    highVariance: result.highVariance.map((record) => {
      const bpmByMethod: Record<string, number | null> = {};
      for (const method of result.methods) {
        bpmByMethod[method] = record.bpmByMethod.get(method) ?? null;
      }
      return { fileId: record.fileId, bpmByMethod, spread: record.spread };
    }),
    agreement: result.agreement.map(({ methodA, methodB, matched, compared, percentage }) => ({
      methodA,
      methodB,
      matched,
      compared,
      percentage,
    })),
  };
}

export function renderJsonReport(result: AnalysisResult): string {
  return JSON.stringify(buildJsonReport(result), null, 2) + '\n';
}
