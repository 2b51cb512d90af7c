/**
 * CLI Configuration
 *
 * Precedence: command-line flags > environment > .tempo-consensus.json > defaults.
 */

import { z } from 'zod';
import { join } from 'node:path';
import { existsSync, readFileSync } from 'node:fs';
import { ValidationError, type AnalysisOptionsInput } from '@tempo-consensus/core';

export const CONFIG_FILE_NAME = '.tempo-consensus.json';

// Blank values (e.g. `TEMPO_TOLERANCE_BPM=` in .env) count as unset
const optionalEnvNumber = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.coerce.number().min(0).optional()
);

// Environment schema
const envSchema = z.object({
  TEMPO_TOLERANCE_BPM: optionalEnvNumber,
  TEMPO_VARIANCE_THRESHOLD_BPM: optionalEnvNumber,
  TEMPO_OUTPUT_DIR: z.string().min(1).optional(),
  TEMPO_DEBUG: z.string().optional(),
});

// Config file schema
const configFileSchema = z.object({
  toleranceBpm: z.number().min(0).optional(),
  varianceThresholdBpm: z.number().min(0).optional(),
  highlightLimit: z.number().int().positive().optional(),
  outputDir: z.string().min(1).default('bpm-results'),
  outputPrefix: z.string().min(1).default('bpm_results'),
});

type ConfigFile = z.infer<typeof configFileSchema>;

export interface CliConfig {
  analysis: AnalysisOptionsInput;
  outputDir: string;
  outputPrefix: string;
  debug: boolean;
  configFile: string;
}

function describe(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

// Load config from file; a missing file means defaults
function loadConfigFile(configFile: string): ConfigFile {
  if (!existsSync(configFile)) {
    return configFileSchema.parse({});
  }

  let content: unknown;
  try {
    content = JSON.parse(readFileSync(configFile, 'utf-8'));
  } catch (error) {
    throw new ValidationError(
      'config',
      `${configFile} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = configFileSchema.safeParse(content);
  if (!parsed.success) {
    throw new ValidationError('config', `${configFile}: ${describe(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Merge environment and config file for one working directory
 */
export function loadCliConfig(
  cwd: string = process.cwd(),
  environment: NodeJS.ProcessEnv = process.env
): CliConfig {
  const env = envSchema.safeParse(environment);
  if (!env.success) {
    throw new ValidationError('environment', describe(env.error));
  }

  const configFile = join(cwd, CONFIG_FILE_NAME);
  const fileConfig = loadConfigFile(configFile);

  return {
    analysis: {
      toleranceBpm: env.data.TEMPO_TOLERANCE_BPM ?? fileConfig.toleranceBpm,
      varianceThresholdBpm: env.data.TEMPO_VARIANCE_THRESHOLD_BPM ?? fileConfig.varianceThresholdBpm,
      highlightLimit: fileConfig.highlightLimit,
    },
    outputDir: env.data.TEMPO_OUTPUT_DIR ?? fileConfig.outputDir,
    outputPrefix: fileConfig.outputPrefix,
    debug: env.data.TEMPO_DEBUG === 'true',
    configFile,
  };
}

export type { ConfigFile };
