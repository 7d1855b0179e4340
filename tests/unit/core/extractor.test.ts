import { detectAnalysisType, extractParameters, hasAnalyticsKeyword, hasRankingKeyword, isFollowUpPhrase } from '../../../src/core/extractor.js';

describe('extractParameters', () => {
  it('reads an analytics route left to right', () => {
    expect(extractParameters('on-time airlines from JFK to ATL')).toEqual({
      originAirport: 'JFK',
      destinationAirport: 'ATL',
      analysisType: 'on-time-ranking',
    });
  });

  it('drops stoplisted words that look like airport codes', () => {
    expect(extractParameters('THE flight from LAX to DEN')).toEqual({
      originAirport: 'LAX',
      destinationAirport: 'DEN',
    });
  });

  it('finds a flight number case-insensitively', () => {
    expect(extractParameters("What's the status of AA123?")).toEqual({ flightNumber: 'AA123' });
    expect(extractParameters('status of ua456 please')).toEqual({ flightNumber: 'UA456' });
  });

  it('keeps the first flight number when several appear', () => {
    expect(extractParameters('AA123 or DL456').flightNumber).toBe('AA123');
  });

  it('prefers parenthesized codes over the bare scan', () => {
    expect(extractParameters('Flights from O.R Tambo Int. Airport (JNB) to Heathrow (LHR)')).toEqual({
      originAirport: 'JNB',
      destinationAirport: 'LHR',
    });
  });

  it('accepts arrows as connectors', () => {
    expect(extractParameters('JFK → LAX')).toEqual({ originAirport: 'JFK', destinationAirport: 'LAX' });
    expect(extractParameters('SFO -> SEA')).toEqual({ originAirport: 'SFO', destinationAirport: 'SEA' });
  });

  it('places a lone code by the keyword in front of it', () => {
    expect(extractParameters('and from BOS?')).toEqual({ originAirport: 'BOS' });
    expect(extractParameters('and to ORD')).toEqual({ destinationAirport: 'ORD' });
  });

  it('leaves codes without a connector unassigned', () => {
    expect(extractParameters('compare JFK and LAX')).toEqual({ airportCandidates: ['JFK', 'LAX'] });
    expect(extractParameters('what about BOS')).toEqual({ airportCandidates: ['BOS'] });
  });

  it('takes a year in the 2000s', () => {
    expect(extractParameters('on-time airlines from JFK to ATL in 2023')).toEqual({
      originAirport: 'JFK',
      destinationAirport: 'ATL',
      year: 2023,
      analysisType: 'on-time-ranking',
    });
    expect(extractParameters('back in 1999').year).toBeUndefined();
  });

  it('returns nothing for small talk', () => {
    expect(extractParameters('hello there')).toEqual({});
    expect(extractParameters('')).toEqual({});
  });
});

describe('detectAnalysisType', () => {
  it('maps on-time phrases before day-of-week phrases', () => {
    expect(detectAnalysisType('which is the best airline')).toBe('on-time-ranking');
    expect(detectAnalysisType('which day has the fewest delays')).toBe('day-of-week-delay');
    expect(detectAnalysisType('on-time by day of week')).toBe('on-time-ranking');
    expect(detectAnalysisType('status of AA123')).toBeUndefined();
  });

  it('accepts on time without the hyphen', () => {
    expect(detectAnalysisType('and the most on time airlines?')).toBe('on-time-ranking');
    expect(detectAnalysisType('on time performance from JFK to ATL')).toBe('on-time-ranking');
    expect(detectAnalysisType('Is UA456 on time?')).toBeUndefined();
  });
});

describe('hasRankingKeyword', () => {
  it('ignores carrier names and loose words', () => {
    expect(hasRankingKeyword('status of United Airlines UA456')).toBe(false);
    expect(hasRankingKeyword('compare the history of UA456')).toBe(false);
    expect(hasRankingKeyword('airlines ranked by delay')).toBe(true);
  });
});

describe('hasAnalyticsKeyword', () => {
  it('does not treat a plain delay question as analytics', () => {
    expect(hasAnalyticsKeyword('Is AA123 delayed?')).toBe(false);
    expect(hasAnalyticsKeyword('compare airlines on this route')).toBe(true);
    expect(hasAnalyticsKeyword('average delay')).toBe(true);
  });
});

describe('isFollowUpPhrase', () => {
  it('recognizes follow-up openers', () => {
    expect(isFollowUpPhrase('What about tomorrow?')).toBe(true);
    expect(isFollowUpPhrase('try again')).toBe(true);
    expect(isFollowUpPhrase('thanks')).toBe(false);
  });
});
