import { z } from 'zod';

export const Intent = z.enum(['FlightStatus', 'FareAnalytics', 'Unknown']);
export type IntentT = z.infer<typeof Intent>;

export const AnalysisType = z.enum(['on-time-ranking', 'day-of-week-delay', 'unknown']);
export type AnalysisTypeT = z.infer<typeof AnalysisType>;

export const AirportCode = z.string().regex(/^[A-Z]{3}$/);
export const FlightNumber = z.string().regex(/^[A-Z]{2,3}\d{1,4}$/);

/**
 * Best-effort parameters pulled from a single utterance. Every field is
 * independently optional; an absent key means "not mentioned".
 */
export interface ExtractedParametersT {
  originAirport?: string;
  destinationAirport?: string;
  // Codes that could not be placed on either side of the route.
  airportCandidates?: string[];
  flightNumber?: string;
  year?: number;
  analysisType?: AnalysisTypeT;
}

export const StatusParameters = z.object({
  flightNumber: FlightNumber,
});
export type StatusParametersT = z.infer<typeof StatusParameters>;

export const AnalyticsParameters = z.object({
  originAirport: AirportCode,
  destinationAirport: AirportCode,
  year: z.number().int().min(2000).max(2099).optional(),
  analysisType: z.enum(['on-time-ranking', 'day-of-week-delay']),
});
export type AnalyticsParametersT = z.infer<typeof AnalyticsParameters>;

/** Parameters the memory keeps between turns: the dispatchable subset of an extraction. */
export type RememberedParameters = Omit<ExtractedParametersT, 'airportCandidates'>;

export type ResolvedQuery =
  | { intent: 'FlightStatus'; parameters: StatusParametersT }
  | { intent: 'FareAnalytics'; parameters: AnalyticsParametersT };

export interface ConversationState {
  intent: IntentT | null;
  parameters: RememberedParameters;
  turn: number;
  updatedAt: number | null;
}

export const FLIGHT_STATES = ['scheduled', 'active', 'landed', 'cancelled', 'incident', 'diverted', 'unknown'] as const;
export const FlightState = z.enum(FLIGHT_STATES);
export type FlightStateT = z.infer<typeof FlightState>;

export const FlightEndpoint = z.object({
  station: z.string().nullable(),
  iata: z.string().nullable(),
  gate: z.string().nullable(),
  scheduled: z.string().nullable(),
  estimated: z.string().nullable(),
  actual: z.string().nullable(),
});
export type FlightEndpointT = z.infer<typeof FlightEndpoint>;

export const FlightStatusRecord = z.object({
  flightNumber: z.string(),
  carrierName: z.string().nullable(),
  status: FlightState.nullable(),
  departure: FlightEndpoint,
  arrival: FlightEndpoint,
});
export type FlightStatusRecordT = z.infer<typeof FlightStatusRecord>;

// pg hands back NUMERIC and BIGINT aggregates as strings.
const numeric = z.coerce.number();

export const AirlineOnTimeRow = z.object({
  carrierCode: z.string(),
  carrierName: z.string(),
  avgDepartureDelay: numeric,
  avgArrivalDelay: numeric,
  avgOverallDelay: numeric,
  onTimePct: numeric,
  flightCount: numeric,
});
export type AirlineOnTimeRowT = z.infer<typeof AirlineOnTimeRow>;

export const DayOfWeekDelayRow = z.object({
  isoDay: numeric,
  dayOfWeek: z.string(),
  avgDepartureDelay: numeric,
  avgArrivalDelay: numeric,
  avgOverallDelay: numeric,
  onTimePct: numeric,
  flightCount: numeric,
});
export type DayOfWeekDelayRowT = z.infer<typeof DayOfWeekDelayRow>;

export type AnalyticsResult =
  | { analysisType: 'on-time-ranking'; rows: AirlineOnTimeRowT[] }
  | { analysisType: 'day-of-week-delay'; rows: DayOfWeekDelayRowT[] };

export const IntentLabel = z.object({
  label: Intent,
  confidence: z.number().min(0).max(1),
});
export type IntentLabelT = z.infer<typeof IntentLabel>;
