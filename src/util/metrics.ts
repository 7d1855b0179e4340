import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

/**
 * Process-wide Prometheus registry. Default Node metrics are only collected
 * when METRICS=prom so tests and the CLI stay quiet.
 */
export const registry = new Registry();

if ((process.env.METRICS ?? '').toLowerCase() === 'prom') {
  collectDefaultMetrics({ register: registry });
}

const turns = new Counter({
  name: 'skyroute_turns_total',
  help: 'Routed turns by resolved intent and outcome',
  labelNames: ['intent', 'outcome'] as const,
  registers: [registry],
});

const classifierFallbacks = new Counter({
  name: 'skyroute_classifier_fallback_total',
  help: 'Language-model classifier fallbacks by result',
  labelNames: ['result'] as const,
  registers: [registry],
});

const adapterLatency = new Histogram({
  name: 'skyroute_adapter_latency_ms',
  help: 'Backend adapter latency in milliseconds',
  labelNames: ['adapter', 'status'] as const,
  buckets: [25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000],
  registers: [registry],
});

export function incTurn(intent: string, outcome: string): void {
  turns.inc({ intent, outcome });
}

export function incClassifierFallback(result: 'accepted' | 'rejected' | 'failed'): void {
  classifierFallbacks.inc({ result });
}

export function observeAdapter(adapter: string, status: 'ok' | 'not_found' | 'empty' | 'error', ms: number): void {
  adapterLatency.observe({ adapter, status }, ms);
}

export async function getPrometheusText(): Promise<string> {
  return registry.metrics();
}

export function metricsContentType(): string {
  return registry.contentType;
}
