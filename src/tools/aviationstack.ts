import { z } from 'zod';
import type { FlightStatusLookup, FlightStatusLookupResult } from '../core/adapters.js';
import { FlightState, type FlightEndpointT, type FlightStatusRecordT } from '../schemas/query.js';
import { ExternalFetchError, fetchJSON } from '../util/fetch.js';
import type { Logger } from '../util/logging.js';

const nullableString = z.string().nullish().transform((v) => v ?? null);

const AviationstackEndpoint = z
  .object({
    airport: nullableString,
    iata: nullableString,
    gate: nullableString,
    scheduled: nullableString,
    estimated: nullableString,
    actual: nullableString,
  })
  .nullish();

const AviationstackFlight = z.object({
  flight_status: nullableString,
  airline: z.object({ name: nullableString }).nullish(),
  flight: z.object({ iata: nullableString }).nullish(),
  departure: AviationstackEndpoint,
  arrival: AviationstackEndpoint,
});

const AviationstackResponse = z.object({
  data: z.array(AviationstackFlight).nullish(),
  error: z.object({ code: nullableString, message: nullableString }).nullish(),
});

type AviationstackEndpointT = z.infer<typeof AviationstackEndpoint>;
type AviationstackFlightT = z.infer<typeof AviationstackFlight>;

function toEndpoint(ep: AviationstackEndpointT): FlightEndpointT {
  return {
    station: ep?.airport ?? null,
    iata: ep?.iata ?? null,
    gate: ep?.gate ?? null,
    scheduled: ep?.scheduled ?? null,
    estimated: ep?.estimated ?? null,
    actual: ep?.actual ?? null,
  };
}

function toFlightStatusRecord(flightNumber: string, flight: AviationstackFlightT): FlightStatusRecordT {
  let status: FlightStatusRecordT['status'] = null;
  if (flight.flight_status) {
    const known = FlightState.safeParse(flight.flight_status.toLowerCase());
    status = known.success ? known.data : 'unknown';
  }
  return {
    flightNumber: flight.flight?.iata ?? flightNumber,
    carrierName: flight.airline?.name ?? null,
    status,
    departure: toEndpoint(flight.departure),
    arrival: toEndpoint(flight.arrival),
  };
}

/**
 * Live flight status from AviationStack `/flights?flight_iata=`. The first
 * returned flight wins; the API lists the most recent leg first.
 */
export function createAviationstackLookup(
  config: { apiKey: string; baseUrl: string; timeoutMs: number },
  log?: Logger,
): FlightStatusLookup {
  const base = config.baseUrl.replace(/\/$/, '');

  return {
    async lookup(flightNumber: string, signal?: AbortSignal): Promise<FlightStatusLookupResult> {
      const flightIata = flightNumber.trim().toUpperCase();
      const params = new URLSearchParams({ access_key: config.apiKey, flight_iata: flightIata });

      let raw: unknown;
      try {
        raw = await fetchJSON(`${base}/flights?${params.toString()}`, {
          timeoutMs: config.timeoutMs,
          retries: 0,
          target: 'aviationstack',
          signal,
        });
      } catch (err: unknown) {
        if (err instanceof ExternalFetchError) {
          return { ok: false, reason: 'transport_error', message: err.message };
        }
        throw err;
      }

      const parsed = AviationstackResponse.safeParse(raw);
      if (!parsed.success) {
        log?.warn({ flightNumber: flightIata, issues: parsed.error.issues.length }, 'aviationstack_unexpected_payload');
        return { ok: false, reason: 'transport_error', message: 'unexpected_payload' };
      }

      const apiError = parsed.data.error;
      if (apiError) {
        log?.warn({ flightNumber: flightIata, code: apiError.code }, 'aviationstack_api_error');
        return { ok: false, reason: 'transport_error', message: apiError.message ?? apiError.code ?? 'api_error' };
      }

      const first = parsed.data.data?.[0];
      if (!first) return { ok: false, reason: 'not_found' };
      return { ok: true, record: toFlightStatusRecord(flightIata, first) };
    },
  };
}
