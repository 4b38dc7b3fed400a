/**
 * Pipeline configuration
 * Centralized access to environment variables with type safety
 */

import fs from 'fs';
import path from 'path';
import { ConfigError, getErrorMessage } from '../utils/errors';
import { exclusionKeywordsSchema, pipelineEnvSchema } from '../schemas/pipeline-schemas';

// 1. Running from sources (tsx, ts-jest)
// 2. Running from dist/ after a build
const KEYWORD_FILE_CANDIDATES = [
  path.resolve(__dirname, '../../../data/exclusion-keywords.json'),
  path.resolve(__dirname, '../../../../data/exclusion-keywords.json'),
];

export const DEFAULT_EXCLUSION_KEYWORDS_FILE =
  KEYWORD_FILE_CANDIDATES.find((candidate) => fs.existsSync(candidate)) ??
  KEYWORD_FILE_CANDIDATES[0];

export interface PipelineConfig {
  probe: {
    timeout: number;
    retries: number;
    retryDelayMs: number;
  };
  requireDns: boolean;
  requireHttp: boolean;
  concurrency: number;
  wpscan: {
    enabled: boolean;
    binaryPath: string;
    timeout: number;
  };
  exclusionKeywordsFile: string;
}

/**
 * Parse pipeline settings from the environment
 */
export function loadPipelineConfig(source: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsed = pipelineEnvSchema.safeParse(source);

  if (!parsed.success) {
    const invalid = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))];
    throw new ConfigError(`Invalid environment variables: ${invalid.join(', ')}`, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const env = parsed.data;

  return {
    probe: {
      timeout: env.PROBE_TIMEOUT_MS,
      retries: env.PROBE_RETRIES,
      retryDelayMs: env.PROBE_RETRY_DELAY_MS,
    },
    requireDns: env.REQUIRE_DNS,
    requireHttp: env.REQUIRE_HTTP,
    concurrency: env.PIPELINE_CONCURRENCY,
    wpscan: {
      enabled: env.WPSCAN_ENABLED,
      binaryPath: env.WPSCAN_PATH,
      timeout: env.WPSCAN_TIMEOUT_MS,
    },
    exclusionKeywordsFile: env.EXCLUSION_KEYWORDS_FILE
      ? path.resolve(env.EXCLUSION_KEYWORDS_FILE)
      : DEFAULT_EXCLUSION_KEYWORDS_FILE,
  };
}

/**
 * Read the exclusion keyword list (JSON array of strings)
 */
export function loadExclusionKeywords(filePath: string = DEFAULT_EXCLUSION_KEYWORDS_FILE): string[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Could not read exclusion keywords from ${filePath}`, {
      cause: getErrorMessage(error),
    });
  }

  const parsed = exclusionKeywordsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Exclusion keywords in ${filePath} must be an array of non-empty strings`);
  }

  return [...new Set(parsed.data.map((keyword) => keyword.toLowerCase()))];
}
