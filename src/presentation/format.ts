import type { RouterResponse } from '../core/router.js';
import type { TurnError } from '../core/errors.js';
import type { AnalyticsResult, FlightEndpointT, FlightStatusRecordT } from '../schemas/query.js';

const FIELD_LABELS: Record<string, string> = {
  originAirport: 'the departure airport',
  destinationAirport: 'the arrival airport',
  flightNumber: 'the flight number (for example AA123)',
  utterance: 'a question',
};

function endpointLine(label: string, ep: FlightEndpointT): string {
  const where = [ep.station, ep.iata ? `(${ep.iata})` : null].filter(Boolean).join(' ') || 'unknown airport';
  const times = [
    ep.scheduled ? `scheduled ${ep.scheduled}` : null,
    ep.estimated ? `estimated ${ep.estimated}` : null,
    ep.actual ? `actual ${ep.actual}` : null,
  ].filter(Boolean);
  const gate = ep.gate ? `, gate ${ep.gate}` : '';
  return `- **${label}:** ${where}${gate}${times.length ? ` (${times.join(', ')})` : ''}`;
}

export function formatFlightStatus(record: FlightStatusRecordT): string {
  const carrier = record.carrierName ?? 'Unknown airline';
  const status = record.status ?? 'unknown';
  return [
    `**${record.flightNumber}** (${carrier}): ${status}`,
    '',
    endpointLine('Departure', record.departure),
    endpointLine('Arrival', record.arrival),
  ].join('\n');
}

function fixed(n: number): string {
  return n.toFixed(1);
}

export function formatAnalytics(origin: string, destination: string, result: AnalyticsResult, year?: number): string {
  const scope = `${origin} → ${destination}${year !== undefined ? ` in ${year}` : ''}`;
  if (result.analysisType === 'on-time-ranking') {
    const lines = [
      `Airlines ranked by on-time arrivals, ${scope}:`,
      '',
      '| # | Airline | On time | Avg arrival delay | Flights |',
      '|---|---------|---------|-------------------|---------|',
      ...result.rows.map(
        (r, i) => `| ${i + 1} | ${r.carrierName} (${r.carrierCode}) | ${fixed(r.onTimePct)}% | ${fixed(r.avgArrivalDelay)} min | ${r.flightCount} |`,
      ),
    ];
    return lines.join('\n');
  }
  const best = result.rows[0];
  return [
    `Delays by day of week, ${scope}. Least delayed: **${best.dayOfWeek}**.`,
    '',
    '| Day | Avg delay | On time | Flights |',
    '|-----|-----------|---------|---------|',
    ...result.rows.map((r) => `| ${r.dayOfWeek} | ${fixed(r.avgOverallDelay)} min | ${fixed(r.onTimePct)}% | ${r.flightCount} |`),
  ].join('\n');
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

export function formatError(error: TurnError): string {
  switch (error.code) {
    case 'ValidationFailed': {
      const missing = stringList(error.details?.missing).map((f) => FIELD_LABELS[f] ?? f);
      return missing.length ? `I need ${missing.join(' and ')} to answer that.` : 'Could you rephrase that?';
    }
    case 'ExtractionAmbiguous': {
      const candidates = stringList(error.details?.candidates);
      return `I found ${candidates.join(', ')} but can't tell the route. Try "from ${candidates[0] ?? 'JFK'} to ${candidates[1] ?? 'ATL'}".`;
    }
    case 'UnknownIntent':
      return 'I can check a flight status (e.g. "status of AA123") or compare airlines on a route (e.g. "most on-time airlines from JFK to ATL").';
    case 'AdapterNotFound':
      return `Sorry, ${error.message}.`;
    case 'AdapterEmptyResult':
      return `Sorry, there isn't enough data for that: ${error.message}.`;
    case 'AdapterUnavailable':
      return `Sorry, ${error.message} right now.`;
    case 'AdapterTransportError':
      return `Sorry, the lookup failed (${error.message}). Please try again.`;
  }
}

/** Markdown for one router response. */
export function formatResponse(res: RouterResponse): string {
  switch (res.kind) {
    case 'flight_status':
      return formatFlightStatus(res.result);
    case 'analytics': {
      const p = res.query.parameters;
      return formatAnalytics(p.originAirport, p.destinationAirport, res.result, p.year);
    }
    case 'clarification':
    case 'error':
      return formatError(res.error);
  }
}
