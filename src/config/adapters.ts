import { z } from 'zod';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const AdaptersConfigSchema = z.object({
  aviationstack: z.object({
    apiKey: optionalString,
    baseUrl: z.string().url().default('https://api.aviationstack.com/v1'),
    timeoutMs: z.coerce.number().min(100).default(10000),
  }),
  warehouse: z.object({
    databaseUrl: optionalString,
    minFlights: z.coerce.number().int().min(1).default(10),
    timeoutMs: z.coerce.number().min(100).default(15000),
  }),
  llm: z.object({
    baseUrl: optionalString,
    apiKey: optionalString,
    model: z.string().default('gpt-4o-mini'),
    timeoutMs: z.coerce.number().min(100).default(3000),
  }),
});

export type AdaptersConfig = z.infer<typeof AdaptersConfigSchema>;

/**
 * Backend adapter settings. A missing AviationStack key or DATABASE_URL
 * leaves that adapter unconfigured; the language-model classifier needs both
 * LLM_PROVIDER_BASEURL and LLM_API_KEY.
 */
export function loadAdaptersConfig(env: NodeJS.ProcessEnv = process.env): AdaptersConfig {
  return AdaptersConfigSchema.parse({
    aviationstack: {
      apiKey: env.AVIATIONSTACK_API_KEY,
      baseUrl: env.AVIATIONSTACK_BASE_URL || undefined,
      timeoutMs: env.AVIATIONSTACK_TIMEOUT_MS || undefined,
    },
    warehouse: {
      databaseUrl: env.DATABASE_URL,
      minFlights: env.WAREHOUSE_MIN_FLIGHTS || undefined,
      timeoutMs: env.WAREHOUSE_TIMEOUT_MS || undefined,
    },
    llm: {
      baseUrl: env.LLM_PROVIDER_BASEURL,
      apiKey: env.LLM_API_KEY,
      model: env.LLM_MODEL || undefined,
      timeoutMs: env.LLM_CLASSIFIER_TIMEOUT_MS || undefined,
    },
  });
}

export function llmConfigured(cfg: AdaptersConfig['llm']): cfg is AdaptersConfig['llm'] & { baseUrl: string; apiKey: string } {
  return Boolean(cfg.baseUrl && cfg.apiKey);
}
