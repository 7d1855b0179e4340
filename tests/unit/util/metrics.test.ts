import { getPrometheusText, incClassifierFallback, incTurn, observeAdapter } from '../../../src/util/metrics.js';

describe('metrics', () => {
  it('exposes turn, fallback and adapter series', async () => {
    incTurn('FlightStatus', 'flight_status');
    incClassifierFallback('failed');
    observeAdapter('flight_status', 'ok', 120);

    const text = await getPrometheusText();
    expect(text).toContain('skyroute_turns_total{intent="FlightStatus",outcome="flight_status"}');
    expect(text).toContain('skyroute_classifier_fallback_total{result="failed"}');
    expect(text).toContain('skyroute_adapter_latency_ms_count{adapter="flight_status",status="ok"}');
  });
});
