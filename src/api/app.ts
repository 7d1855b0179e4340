import express from 'express';
import type { SessionRegistry } from '../core/session_store.js';
import type { Logger } from '../util/logging.js';
import { router } from './routes.js';

export interface AppDeps {
  sessions: SessionRegistry;
  log: Logger;
  adapters: { status: boolean; analytics: boolean; llm: boolean };
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  app.use(express.json({ limit: '64kb' }));

  app.use((req, res, next) => {
    const start = Date.now();
    deps.log.debug({ method: req.method, path: req.path }, 'req_start');
    res.on('finish', () => {
      deps.log.debug({ method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - start }, 'req_done');
    });
    next();
  });

  app.use(router(deps.sessions, deps.log, deps.adapters));
  return app;
}
