import pino from 'pino';
import { scrubMessage, scrubSecrets } from './redact.js';

export type Logger = pino.Logger;

/**
 * Creates a pino logger with secret redaction unless LOG_LEVEL=debug.
 */
export function createLogger(opts: { level?: string; name?: string } = {}): Logger {
  const level = opts.level ?? process.env.LOG_LEVEL ?? 'info';
  const redactEnabled = level !== 'debug';

  return pino({
    level,
    ...(opts.name ? { name: opts.name } : {}),
    hooks: {
      logMethod(inputArgs, method) {
        for (let i = 0; i < inputArgs.length; i++) {
          const arg = inputArgs[i];
          inputArgs[i] = typeof arg === 'string'
            ? scrubMessage(arg, redactEnabled)
            : scrubSecrets(arg, redactEnabled);
        }
        method.apply(this, inputArgs);
      },
    },
  });
}
