import { z } from 'zod';
import stoplistJson from '../data/airport_stoplist.json';
import type { AnalysisTypeT, ExtractedParametersT } from '../schemas/query.js';

/*
 * Rules run over the trimmed, upper-cased utterance in this order:
 *   1. flight number      first `XX123` / `XXX1234` token, left to right
 *   2. airports (paren)   every `(XXX)` code; when present the bare scan is skipped
 *   3. airports (bare)    three-letter tokens minus the stoplist, de-duplicated
 *   4. route assignment   see assignRoute()
 *   5. year               first 20xx token
 *   6. analysis type      first matching keyword set in ANALYSIS_KEYWORDS order
 */

const AIRPORT_STOPLIST: ReadonlySet<string> = new Set(z.array(z.string().length(3)).parse(stoplistJson));

const FLIGHT_NUMBER = /\b[A-Z]{2,3}\d{2,4}\b/;
const PAREN_AIRPORT = /\(([A-Z]{3})\)/g;
const BARE_AIRPORT = /\b[A-Z]{3}\b/g;
const YEAR = /\b20\d{2}\b/;

const CONNECTOR_BETWEEN = /\b(?:TO|FROM)\b|→|->/;
// Keyword right before a bare code, or before an airport name ending in "(XXX)".
const CONNECTOR_BEFORE_BARE = /(?:\b(FROM|TO)|(→|->))\s*$/;
const CONNECTOR_BEFORE_NAMED = /(?:\b(FROM|TO)|(→|->))\s+[^()]*$/;

const ANALYSIS_KEYWORDS: ReadonlyArray<{ type: Exclude<AnalysisTypeT, 'unknown'>; phrases: string[] }> = [
  {
    type: 'on-time-ranking',
    phrases: [
      'most on-time',
      'on-time',
      'most on time',
      'on time airlines',
      'on time performance',
      'on time ranking',
      'on time rate',
      'best airline',
      'most punctual',
    ],
  },
  {
    type: 'day-of-week-delay',
    phrases: ['day of week', 'day of the week', 'which day', 'fewer delays on', 'best day', 'weekday'],
  },
];

const ANALYTICS_VOCABULARY = [
  'on-time',
  'most on time',
  'on time airlines',
  'on time performance',
  'punctual',
  'performance',
  'ranking',
  'ranked',
  'rank',
  'compare',
  'comparison',
  'analytics',
  'analysis',
  'statistics',
  'stats',
  'average',
  'historical',
  'history',
  'airlines',
  'best airline',
  'worst airline',
  'day of week',
  'day of the week',
  'weekday',
  'which day',
  'best day',
  'fewer delays',
  'fewest delays',
  'least delays',
  'most delays',
  'delays by',
  'usually delayed',
];

// Wording specific enough to outrank a flight number in the same utterance.
const RANKING_VOCABULARY = [
  'on-time',
  'most on time',
  'on time airlines',
  'on time performance',
  'punctual',
  'ranking',
  'ranked',
  'statistics',
  'stats',
  'average',
  'historical',
  'best airline',
  'worst airline',
  'day of week',
  'day of the week',
  'which day',
  'fewest delays',
  'least delays',
  'most delays',
  'delays by',
  'usually delayed',
];

const FOLLOW_UP_PHRASES = [
  'what about',
  'how about',
  'and for',
  'what if',
  'same for',
  'and from',
  'and to',
  'try again',
  'retry',
];

interface CodeHit {
  code: string;
  start: number;
  end: number;
  named: boolean;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function containsPhrase(lower: string, phrase: string): boolean {
  return new RegExp(`(?:^|[^a-z])${escapeRegExp(phrase)}(?:$|[^a-z])`).test(lower);
}

function scanAirports(upper: string): CodeHit[] {
  const named = [...upper.matchAll(PAREN_AIRPORT)].map((m) => ({
    code: m[1],
    start: m.index ?? 0,
    end: (m.index ?? 0) + m[0].length,
    named: true,
  }));
  const hits = named.length > 0
    ? named
    : [...upper.matchAll(BARE_AIRPORT)]
      .filter((m) => !AIRPORT_STOPLIST.has(m[0]))
      .map((m) => ({ code: m[0], start: m.index ?? 0, end: (m.index ?? 0) + m[0].length, named: false }));

  const seen = new Set<string>();
  return hits.filter((h) => {
    if (seen.has(h.code)) return false;
    seen.add(h.code);
    return true;
  });
}

function connectorBefore(upper: string, hit: CodeHit): 'from' | 'to' | undefined {
  const before = upper.slice(0, hit.start);
  const m = (hit.named ? CONNECTOR_BEFORE_NAMED : CONNECTOR_BEFORE_BARE).exec(before);
  if (!m) return undefined;
  return m[1] === 'FROM' ? 'from' : 'to';
}

/**
 * Two codes joined by a directional keyword read left to right as
 * origin → destination. A lone code takes the side named by the keyword in
 * front of it. Anything else stays unassigned.
 */
function assignRoute(upper: string, hits: CodeHit[]): Pick<ExtractedParametersT, 'originAirport' | 'destinationAirport' | 'airportCandidates'> {
  if (hits.length === 2) {
    const [first, second] = hits;
    if (CONNECTOR_BETWEEN.test(upper.slice(first.end, second.start))) {
      return { originAirport: first.code, destinationAirport: second.code };
    }
  }

  if (hits.length === 1) {
    const side = connectorBefore(upper, hits[0]);
    if (side === 'from') return { originAirport: hits[0].code };
    if (side === 'to') return { destinationAirport: hits[0].code };
  }

  return hits.length > 0 ? { airportCandidates: hits.map((h) => h.code) } : {};
}

export function detectAnalysisType(utterance: string): Exclude<AnalysisTypeT, 'unknown'> | undefined {
  const lower = utterance.toLowerCase();
  for (const { type, phrases } of ANALYSIS_KEYWORDS) {
    if (phrases.some((p) => containsPhrase(lower, p))) return type;
  }
  return undefined;
}

export function hasAnalyticsKeyword(utterance: string): boolean {
  const lower = utterance.toLowerCase();
  return ANALYTICS_VOCABULARY.some((p) => containsPhrase(lower, p));
}

export function hasRankingKeyword(utterance: string): boolean {
  const lower = utterance.toLowerCase();
  return RANKING_VOCABULARY.some((p) => containsPhrase(lower, p));
}

export function isFollowUpPhrase(utterance: string): boolean {
  const lower = utterance.toLowerCase();
  return FOLLOW_UP_PHRASES.some((p) => containsPhrase(lower, p));
}

/**
 * Pulls airport codes, flight number, year and analysis type out of one
 * utterance. Never throws; unmatched fields are simply absent.
 */
export function extractParameters(utterance: string): ExtractedParametersT {
  const upper = utterance.trim().toUpperCase();
  const out: ExtractedParametersT = {};

  const flight = FLIGHT_NUMBER.exec(upper);
  if (flight) out.flightNumber = flight[0];

  Object.assign(out, assignRoute(upper, scanAirports(upper)));

  const year = YEAR.exec(upper);
  if (year) out.year = Number(year[0]);

  const analysisType = detectAnalysisType(utterance);
  if (analysisType) out.analysisType = analysisType;

  return out;
}
