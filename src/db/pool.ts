import { Pool, type PoolConfig } from 'pg';

/**
 * The narrow query surface the warehouse needs, backed by a `pg.Pool` in
 * production and a fake in tests.
 */
export interface SqlClient {
  query(text: string, values: unknown[], signal?: AbortSignal): Promise<{ rows: unknown[] }>;
}

export class QueryAbortedError extends Error {
  constructor() {
    super('query_aborted');
    this.name = 'QueryAbortedError';
  }
}

function parseDbHost(connectionString: string): string {
  try {
    return new URL(connectionString).hostname;
  } catch {
    return 'unknown';
  }
}

export function getConnectionInfo(connectionString: string): { host: string; ssl: boolean } {
  return {
    host: parseDbHost(connectionString),
    ssl: connectionString.includes('sslmode=require'),
  };
}

/**
 * Read-only pool for the flight performance warehouse. `statement_timeout`
 * stops the server side of a query the router has already given up on.
 */
export function createPool(connectionString: string, opts: { statementTimeoutMs?: number; max?: number } = {}): Pool {
  const config: PoolConfig = {
    connectionString,
    max: opts.max ?? 5,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    ...(opts.statementTimeoutMs !== undefined ? { statement_timeout: opts.statementTimeoutMs } : {}),
  };
  return new Pool(config);
}

export function asSqlClient(pool: Pool): SqlClient {
  return {
    // pg cannot cancel a running statement from here; statement_timeout
    // bounds it on the server once the caller has stopped waiting.
    async query(text, values, signal) {
      if (signal?.aborted) throw new QueryAbortedError();
      const result = await pool.query(text, values);
      if (signal?.aborted) throw new QueryAbortedError();
      return { rows: result.rows };
    },
  };
}
