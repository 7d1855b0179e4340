import type { Router } from 'express';
import express from 'express';
import { ChatInput } from '../schemas/chat.js';
import { SessionBusyError, type SessionRegistry } from '../core/session_store.js';
import { formatResponse } from '../presentation/format.js';
import type { Logger } from '../util/logging.js';
import { getAllBreakerStats } from '../util/circuit.js';
import { getAllLimiterStats } from '../util/limiter.js';
import { getPrometheusText, metricsContentType } from '../util/metrics.js';

export const router = (sessions: SessionRegistry, log: Logger, adapters: { status: boolean; analytics: boolean; llm: boolean }): Router => {
  const r = express.Router();

  r.post('/chat', async (req, res) => {
    const parsed = ChatInput.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    try {
      const { sessionId, response } = await sessions.runTurn(parsed.data.sessionId, parsed.data.message);
      return res.json({ sessionId, reply: formatResponse(response), response });
    } catch (err: unknown) {
      if (err instanceof SessionBusyError) {
        return res.status(409).json({ error: 'session_busy', sessionId: err.sessionId });
      }
      log.error({ err: err instanceof Error ? err.message : String(err) }, 'chat_failed');
      return res.status(500).json({ error: 'internal_error' });
    }
  });

  r.delete('/chat/:sessionId', (req, res) => {
    const removed = sessions.delete(req.params.sessionId);
    return res.status(removed ? 204 : 404).end();
  });

  r.get('/healthz', (_req, res) => {
    res.json({
      ok: true,
      sessions: sessions.size,
      adapters,
      breakers: getAllBreakerStats(),
      limiters: getAllLimiterStats(),
    });
  });

  r.get('/metrics', async (_req, res) => {
    res.setHeader('Content-Type', metricsContentType());
    res.send(await getPrometheusText());
  });

  return r;
};
