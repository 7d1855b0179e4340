import type { z } from 'zod';
import {
  AnalyticsParameters,
  StatusParameters,
  type AnalyticsParametersT,
  type ConversationState,
  type ExtractedParametersT,
  type RememberedParameters,
  type ResolvedQuery,
} from '../schemas/query.js';
import type { Classification } from './classifier.js';
import { isFollowUpPhrase } from './extractor.js';
import type { RememberedKey } from './memory.js';
import { turnError, type TurnError } from './errors.js';

export type DispatchIntent = ResolvedQuery['intent'];

const FAMILY_FIELDS: Record<DispatchIntent, ReadonlyArray<keyof ExtractedParametersT>> = {
  FlightStatus: ['flightNumber'],
  FareAnalytics: ['originAirport', 'destinationAirport', 'airportCandidates', 'year', 'analysisType'],
};

export const DEFAULT_ANALYSIS_TYPE: AnalyticsParametersT['analysisType'] = 'on-time-ranking';

function presentFields(params: ExtractedParametersT): Array<keyof ExtractedParametersT> {
  const keys: Array<keyof ExtractedParametersT> = [
    'originAirport',
    'destinationAirport',
    'airportCandidates',
    'flightNumber',
    'year',
    'analysisType',
  ];
  return keys.filter((k) => params[k] !== undefined);
}

function isDispatchIntent(intent: ConversationState['intent']): intent is DispatchIntent {
  return intent === 'FlightStatus' || intent === 'FareAnalytics';
}

/**
 * A turn with no intent of its own continues the previous one when all it
 * mentions belongs to that intent's parameters and it either mentions
 * something or reads as a follow-up ("what about …").
 */
export function resolveIntent(
  classification: Classification,
  params: ExtractedParametersT,
  state: ConversationState,
  utterance: string,
): Classification {
  if (classification.intent !== 'Unknown') return classification;

  const previous = state.intent;
  if (!isDispatchIntent(previous)) return classification;

  const fields = presentFields(params);
  const allowed = FAMILY_FIELDS[previous];
  if (!fields.every((f) => allowed.includes(f))) return classification;
  if (fields.length === 0 && !isFollowUpPhrase(utterance)) return classification;

  return {
    intent: previous,
    source: 'continuation',
    ...(classification.note ? { note: classification.note } : {}),
  };
}

export interface MergeResult {
  parameters: RememberedParameters;
  inherited: RememberedKey[];
}

/**
 * Current-turn values win field by field. Stored values fill the gaps only
 * when the stored intent is the one being resolved now.
 */
export function mergeParameters(intent: DispatchIntent, current: ExtractedParametersT, state: ConversationState): MergeResult {
  const stored: RememberedParameters = state.intent === intent ? state.parameters : {};
  const inherited: RememberedKey[] = [];

  const take = <K extends RememberedKey>(key: K): ExtractedParametersT[K] => {
    if (current[key] !== undefined) return current[key];
    if (stored[key] !== undefined) inherited.push(key);
    return stored[key];
  };

  if (intent === 'FlightStatus') {
    const flightNumber = take('flightNumber');
    return { parameters: flightNumber ? { flightNumber } : {}, inherited };
  }

  let originAirport = take('originAirport');
  let destinationAirport = take('destinationAirport');
  const year = take('year');
  const analysisType = take('analysisType');

  // A remembered airport never overrides the side the user just named.
  if (originAirport && originAirport === destinationAirport) {
    if (inherited.includes('originAirport')) {
      originAirport = undefined;
      inherited.splice(inherited.indexOf('originAirport'), 1);
    } else {
      destinationAirport = undefined;
      inherited.splice(inherited.indexOf('destinationAirport'), 1);
    }
  }

  const parameters: RememberedParameters = {};
  if (originAirport) parameters.originAirport = originAirport;
  if (destinationAirport) parameters.destinationAirport = destinationAirport;
  if (year !== undefined) parameters.year = year;
  if (analysisType) parameters.analysisType = analysisType;
  return { parameters, inherited };
}

export type ValidationResult =
  | { ok: true; query: ResolvedQuery }
  | { ok: false; error: TurnError };

export function validateQuery(intent: DispatchIntent, merged: RememberedParameters, extracted: ExtractedParametersT): ValidationResult {
  if (intent === 'FlightStatus') {
    if (!merged.flightNumber) {
      return {
        ok: false,
        error: turnError('ValidationFailed', 'flight status needs a flight number', { missing: ['flightNumber'] }),
      };
    }
    const parsed = StatusParameters.safeParse({ flightNumber: merged.flightNumber });
    if (!parsed.success) return { ok: false, error: invalidParameters(parsed.error) };
    return { ok: true, query: { intent, parameters: parsed.data } };
  }

  if (extracted.airportCandidates && extracted.airportCandidates.length > 0) {
    return {
      ok: false,
      error: turnError('ExtractionAmbiguous', 'airports could not be placed as origin and destination', {
        candidates: extracted.airportCandidates,
      }),
    };
  }

  const { originAirport, destinationAirport } = merged;
  if (!originAirport || !destinationAirport) {
    const missing = [
      ...(originAirport ? [] : ['originAirport']),
      ...(destinationAirport ? [] : ['destinationAirport']),
    ];
    return { ok: false, error: turnError('ValidationFailed', 'analytics needs an origin and a destination', { missing }) };
  }

  const analysisType = merged.analysisType && merged.analysisType !== 'unknown' ? merged.analysisType : DEFAULT_ANALYSIS_TYPE;
  const parsed = AnalyticsParameters.safeParse({
    originAirport,
    destinationAirport,
    analysisType,
    ...(merged.year !== undefined ? { year: merged.year } : {}),
  });
  if (!parsed.success) return { ok: false, error: invalidParameters(parsed.error) };
  return { ok: true, query: { intent, parameters: parsed.data } };
}

function invalidParameters(error: z.ZodError): TurnError {
  const invalid = [...new Set(error.issues.map((i) => String(i.path[0] ?? 'parameters')))];
  return turnError('ValidationFailed', `invalid ${invalid.join(', ')}`, { invalid });
}
