import type { Pool } from 'pg';
import { llmConfigured, type AdaptersConfig } from '../config/adapters.js';
import { asSqlClient, createPool, getConnectionInfo } from '../db/pool.js';
import { createAviationstackLookup } from '../tools/aviationstack.js';
import { createFareWarehouse } from '../tools/fare_warehouse.js';
import type { Logger } from '../util/logging.js';
import type { FareAnalyticsWarehouse, FlightStatusLookup } from './adapters.js';
import { IntentClassifier } from './classifier.js';
import { chatCompletion, createLlmIntentClassifier } from './llm.js';
import type { ConversationMemory } from './memory.js';
import { Router } from './router.js';
import type { RouterFactory } from './session_store.js';

export interface Services {
  statusLookup?: FlightStatusLookup;
  warehouse?: FareAnalyticsWarehouse;
  classifier: IntentClassifier;
  routerFactory: RouterFactory;
  close(): Promise<void>;
}

/**
 * Builds the adapters the configuration allows and a factory for
 * per-session routers sharing them.
 */
export function createServices(cfg: AdaptersConfig, log: Logger): Services {
  const { aviationstack, warehouse: wh, llm } = cfg;

  const statusLookup = aviationstack.apiKey
    ? createAviationstackLookup({ ...aviationstack, apiKey: aviationstack.apiKey }, log)
    : undefined;

  let pool: Pool | undefined;
  let warehouse: FareAnalyticsWarehouse | undefined;
  if (wh.databaseUrl) {
    pool = createPool(wh.databaseUrl, { statementTimeoutMs: wh.timeoutMs });
    pool.on('error', (err) => log.error({ err: err.message }, 'pg_pool_error'));
    log.info(getConnectionInfo(wh.databaseUrl), 'warehouse_configured');
    warehouse = createFareWarehouse(asSqlClient(pool), { minFlights: wh.minFlights, log });
  }

  const classifier = new IntentClassifier({
    llm: llmConfigured(llm)
      ? createLlmIntentClassifier({ complete: chatCompletion({ baseUrl: llm.baseUrl, apiKey: llm.apiKey, model: llm.model }, log) })
      : undefined,
    timeoutMs: llm.timeoutMs,
    log,
  });

  const routerFactory = (memory: ConversationMemory): Router =>
    new Router({
      memory,
      classifier,
      statusLookup,
      warehouse,
      log,
      statusTimeoutMs: aviationstack.timeoutMs,
      analyticsTimeoutMs: wh.timeoutMs,
      minFlights: wh.minFlights,
    });

  return {
    statusLookup,
    warehouse,
    classifier,
    routerFactory,
    async close() {
      await pool?.end();
    },
  };
}
