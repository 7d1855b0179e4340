import 'dotenv/config';
import { loadAppConfig, missingConfigWarnings } from '../config/app.js';
import { createServices } from '../core/services.js';
import { SessionRegistry } from '../core/session_store.js';
import { createLogger } from '../util/logging.js';
import { createApp } from './app.js';

const log = createLogger({ name: 'skyroute-api' });
const config = loadAppConfig();

for (const warning of missingConfigWarnings(config)) {
  log.warn(warning);
}

const services = createServices(config, log);
const sessions = new SessionRegistry(services.routerFactory, config.session);
const app = createApp({
  sessions,
  log,
  adapters: {
    status: services.statusLookup !== undefined,
    analytics: services.warehouse !== undefined,
    llm: services.classifier.hasFallback,
  },
});

const server = app.listen(config.server.port, () => {
  log.info({ port: config.server.port, ttlSec: config.session.ttlSec }, 'http_listening');
});

function shutdown(signal: string): void {
  log.info({ signal }, 'http_shutdown');
  server.close(() => {
    services.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err: err instanceof Error ? err.message : String(err) }, 'shutdown_failed');
        process.exit(1);
      },
    );
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
