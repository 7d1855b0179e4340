import { z } from 'zod';
import { loadAdaptersConfig, type AdaptersConfig } from './adapters.js';
import { loadSessionConfig, type SessionConfig } from './session.js';

const ServerConfigSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(3000),
});

export interface AppConfig extends AdaptersConfig {
  session: SessionConfig;
  server: z.infer<typeof ServerConfigSchema>;
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    ...loadAdaptersConfig(env),
    session: loadSessionConfig(env),
    server: ServerConfigSchema.parse({ port: env.PORT || undefined }),
  };
}

/** Human-readable notes for adapters that will answer "unavailable". */
export function missingConfigWarnings(cfg: AdaptersConfig): string[] {
  const out: string[] = [];
  if (!cfg.aviationstack.apiKey) out.push('AVIATIONSTACK_API_KEY is not set: flight status lookups are disabled.');
  if (!cfg.warehouse.databaseUrl) out.push('DATABASE_URL is not set: flight analytics are disabled.');
  if (!cfg.llm.baseUrl || !cfg.llm.apiKey) {
    out.push('LLM_PROVIDER_BASEURL / LLM_API_KEY are not set: ambiguous questions use pattern matching only.');
  }
  return out;
}
