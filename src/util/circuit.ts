import CircuitBreaker from 'opossum';

type Task = () => Promise<void>;

interface BreakerStats {
  state: 'closed' | 'open' | 'halfOpen';
  opens: number;
  timeouts: number;
  failures: number;
  rejects: number;
  successes: number;
}

const breakers = new Map<string, CircuitBreaker<[Task], void>>();
const stats = new Map<string, BreakerStats>();

function envNumber(name: string, fallback: number): number {
  const n = Number(process.env[name]);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function getConfig(host: string): CircuitBreaker.Options {
  // Per-host overrides, e.g. BREAK_RESET_MS_API_AVIATIONSTACK_COM
  const hostKey = host.replace(/[.-]/g, '_').toUpperCase();
  return {
    timeout: envNumber(`BREAK_TIMEOUT_MS_${hostKey}`, envNumber('EXT_BREAKER_TIMEOUT_MS', 12000)),
    resetTimeout: envNumber(`BREAK_RESET_MS_${hostKey}`, envNumber('EXT_BREAKER_RESET_MS', 15000)),
    errorThresholdPercentage: envNumber(`BREAK_ERROR_PCT_${hostKey}`, envNumber('EXT_BREAKER_ERROR_PCT', 50)),
    volumeThreshold: envNumber(`BREAK_VOLUME_${hostKey}`, envNumber('EXT_BREAKER_VOLUME', 10)),
    rollingCountTimeout: 10000,
  };
}

export function getBreaker(host: string): CircuitBreaker<[Task], void> {
  const existing = breakers.get(host);
  if (existing) return existing;

  const breaker = new CircuitBreaker<[Task], void>(async (task: Task) => task(), getConfig(host));
  const hostStats: BreakerStats = { state: 'closed', opens: 0, timeouts: 0, failures: 0, rejects: 0, successes: 0 };
  stats.set(host, hostStats);

  breaker.on('open', () => {
    hostStats.state = 'open';
    hostStats.opens++;
  });
  breaker.on('halfOpen', () => {
    hostStats.state = 'halfOpen';
  });
  breaker.on('close', () => {
    hostStats.state = 'closed';
  });
  breaker.on('reject', () => {
    hostStats.rejects++;
  });
  breaker.on('timeout', () => {
    hostStats.timeouts++;
  });
  breaker.on('failure', () => {
    hostStats.failures++;
  });
  breaker.on('success', () => {
    hostStats.successes++;
  });

  breakers.set(host, breaker);
  return breaker;
}

export class CircuitOpenError extends Error {
  constructor(host: string) {
    super(`Circuit breaker is open for ${host}`);
    this.name = 'CircuitBreakerOpenError';
  }
}

/**
 * Runs `fn` through the host's breaker. Rejections from `fn` count as
 * breaker failures; an open breaker rejects with CircuitOpenError.
 */
export async function withBreaker<T>(host: string, fn: () => Promise<T>): Promise<T> {
  const breaker = getBreaker(host);
  if (breaker.opened) {
    throw new CircuitOpenError(host);
  }
  return new Promise<T>((resolve, reject) => {
    breaker.fire(async () => {
      resolve(await fn());
    }).catch(reject);
  });
}

export function getAllBreakerStats(): Record<string, BreakerStats> {
  const result: Record<string, BreakerStats> = {};
  for (const [host, hostStats] of stats.entries()) {
    result[host] = { ...hostStats };
  }
  return result;
}

export function shutdownBreakers(): void {
  for (const breaker of breakers.values()) {
    breaker.shutdown();
  }
  breakers.clear();
  stats.clear();
}
