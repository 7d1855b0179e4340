import { z } from 'zod';

const SessionConfigSchema = z.object({
  ttlSec: z.coerce.number().min(60).default(3600),
  maxSessions: z.coerce.number().int().min(1).default(1000),
});

export type SessionConfig = z.infer<typeof SessionConfigSchema>;

export function loadSessionConfig(env: NodeJS.ProcessEnv = process.env): SessionConfig {
  return SessionConfigSchema.parse({
    ttlSec: env.SESSION_TTL_SEC || undefined,
    maxSessions: env.SESSION_MAX || undefined,
  });
}
