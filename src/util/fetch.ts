import { setTimeout as delay } from 'node:timers/promises';
import { fetch as undiciFetch } from 'undici';
import { createLogger } from './logging.js';
import { scheduleWithLimit } from './limiter.js';
import { CircuitOpenError, withBreaker } from './circuit.js';

const log = createLogger();

interface FetchResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

type FetchLike = (
  url: string,
  init: { signal: AbortSignal; headers?: Record<string, string> },
) => Promise<FetchResponseLike>;

// Use standard fetch in test environment so tests can stub globalThis.fetch
function getFetch(): FetchLike {
  return process.env.NODE_ENV === 'test' ? globalThis.fetch : undiciFetch;
}

const ALLOWLIST = new Set<string>([
  'api.aviationstack.com',
  ...(process.env.FETCH_EXTRA_HOSTS ?? '').split(',').map((h) => h.trim()).filter(Boolean),
]);

export type ExternalFetchErrorKind = 'timeout' | 'http' | 'network';

export class ExternalFetchError extends Error {
  kind: ExternalFetchErrorKind;
  status?: number;
  constructor(kind: ExternalFetchErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'ExternalFetchError';
    this.kind = kind;
    this.status = status;
  }
}

const BASE_DELAY = 200;
const MAX_DELAY = 10000;
const JITTER_FACTOR = 0.25;

async function backoff(attempt: number): Promise<void> {
  const expDelay = BASE_DELAY * Math.pow(1.5, attempt);
  const jitter = expDelay * JITTER_FACTOR * (Math.random() * 2 - 1);
  await delay(Math.min(expDelay + jitter, MAX_DELAY));
}

function isRetryable(err: unknown): boolean {
  if (!(err instanceof ExternalFetchError)) return false;
  if (err.kind !== 'http') return true;
  return err.status === 429 || (err.status !== undefined && err.status >= 500);
}

/**
 * Fetches JSON with a per-attempt timeout, host rate limiting and a circuit
 * breaker. Retries 429/5xx/network failures with jittered backoff when
 * `retries` > 0.
 */
export async function fetchJSON(
  url: string,
  opts: {
    timeoutMs?: number;
    retries?: number;
    target?: string;
    headers?: Record<string, string>;
    signal?: AbortSignal;
  } = {},
): Promise<unknown> {
  const timeoutMs = opts.timeoutMs ?? 4000;
  const retries = opts.retries ?? 0;
  const target = opts.target ?? 'unknown';

  let host: string;
  try {
    host = new URL(url).hostname;
  } catch {
    throw new ExternalFetchError('network', 'invalid_url');
  }
  if (!ALLOWLIST.has(host)) {
    throw new ExternalFetchError('network', 'host_not_allowed');
  }

  const exec = async (): Promise<unknown> => {
    if (opts.signal?.aborted) throw new ExternalFetchError('timeout', 'timeout');
    const ac = new AbortController();
    const timer = setTimeout(() => ac.abort(), timeoutMs);
    const onAbort = (): void => ac.abort();
    opts.signal?.addEventListener('abort', onAbort, { once: true });
    try {
      const res = await getFetch()(url, { signal: ac.signal, headers: opts.headers });
      log.debug({ target, status: res.status }, 'fetch_response');

      if (!res.ok) {
        throw new ExternalFetchError('http', `HTTP_${res.status}`, res.status);
      }

      const body = await res.text();
      try {
        return JSON.parse(body);
      } catch {
        log.debug({ target, body: body.slice(0, 500) }, 'fetch_json_parse_error');
        throw new ExternalFetchError('network', 'json_parse_error');
      }
    } catch (err: unknown) {
      if (err instanceof ExternalFetchError) throw err;
      if (err instanceof Error && err.name === 'AbortError') {
        throw new ExternalFetchError('timeout', 'timeout');
      }
      log.debug({ target, err: err instanceof Error ? err.message : String(err) }, 'fetch_network_error');
      throw new ExternalFetchError('network', 'network_error');
    } finally {
      clearTimeout(timer);
      opts.signal?.removeEventListener('abort', onAbort);
    }
  };

  let lastErr: unknown;
  for (let attempt = 0; attempt <= retries; attempt++) {
    const start = Date.now();
    try {
      const out = await scheduleWithLimit(host, () => withBreaker(host, exec));
      log.debug({ target, attempt: attempt + 1, ms: Date.now() - start }, 'fetch_ok');
      return out;
    } catch (err: unknown) {
      if (err instanceof CircuitOpenError) {
        throw new ExternalFetchError('network', 'circuit_open');
      }
      lastErr = err;
      if (!isRetryable(err) || attempt === retries || opts.signal?.aborted) break;
      log.debug({ target, attempt: attempt + 1, maxAttempts: retries + 1 }, 'fetch_retry');
      await backoff(attempt);
    }
  }

  log.warn({ target, attempts: retries + 1, err: lastErr instanceof Error ? lastErr.message : String(lastErr) }, 'fetch_failed');
  throw lastErr;
}
