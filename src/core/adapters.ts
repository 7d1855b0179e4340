import type { AirlineOnTimeRowT, DayOfWeekDelayRowT, FlightStatusRecordT } from '../schemas/query.js';

export type FlightStatusLookupResult =
  | { ok: true; record: FlightStatusRecordT }
  | { ok: false; reason: 'not_found' }
  | { ok: false; reason: 'transport_error'; message: string };

export interface FlightStatusLookup {
  lookup(flightNumber: string, signal?: AbortSignal): Promise<FlightStatusLookupResult>;
}

/**
 * Aggregate queries over historical flight performance. Groups with fewer
 * than `minFlights` flights are left out of both result sets. An aborted
 * `signal` must keep a query from starting and discard one that finishes late.
 */
export interface FareAnalyticsWarehouse {
  rankAirlinesByOnTime(
    origin: string,
    destination: string,
    year?: number,
    minFlights?: number,
    signal?: AbortSignal,
  ): Promise<AirlineOnTimeRowT[]>;
  delaysByDayOfWeek(
    origin: string,
    destination: string,
    year?: number,
    minFlights?: number,
    signal?: AbortSignal,
  ): Promise<DayOfWeekDelayRowT[]>;
}
