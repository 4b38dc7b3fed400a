import { z } from 'zod';

const emptyToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const intVar = (fallback: number, min: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().min(min).default(fallback));

const flagVar = (fallback: boolean) =>
  z.preprocess(
    emptyToUndefined,
    z
      .string()
      .transform((value) => value.trim().toLowerCase())
      .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
      .transform((value) => value === 'true' || value === '1' || value === 'yes')
      .optional()
      .transform((value) => value ?? fallback)
  );

export const pipelineEnvSchema = z.object({
  PROBE_TIMEOUT_MS: intVar(5000, 1),
  PROBE_RETRIES: intVar(2, 1),
  PROBE_RETRY_DELAY_MS: intVar(500, 0),
  REQUIRE_DNS: flagVar(true),
  REQUIRE_HTTP: flagVar(true),
  PIPELINE_CONCURRENCY: intVar(1, 1),
  WPSCAN_ENABLED: flagVar(false),
  WPSCAN_PATH: z.preprocess(emptyToUndefined, z.string().default('wpscan')),
  WPSCAN_TIMEOUT_MS: intVar(30000, 1),
  EXCLUSION_KEYWORDS_FILE: z.preprocess(emptyToUndefined, z.string().optional()),
});

export const exclusionKeywordsSchema = z.array(z.string().trim().min(1));

const optionalText = z.preprocess(
  (value) => (value === undefined || value === null ? '' : value),
  z.coerce.string().trim()
);

export const businessRecordSchema = z.object({
  name: z.string().trim().min(1, 'Business name is required'),
  address: optionalText,
  phone: optionalText,
  website: optionalText.transform((value) => value || undefined),
});

