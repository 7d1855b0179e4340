import chalk from 'chalk';
import { turnError } from '../../../src/core/errors.js';
import { Router } from '../../../src/core/router.js';
import { formatAnalytics, formatError, formatFlightStatus, formatResponse } from '../../../src/presentation/format.js';
import { renderMarkdownToTerminal } from '../../../src/presentation/terminal.js';
import { dayRows, fakeWarehouse, flightRecord, onTimeRows, silentLog } from '../../helpers/fakes.js';

describe('formatFlightStatus', () => {
  it('renders a flight card', () => {
    expect(formatFlightStatus(flightRecord('AA123'))).toBe(
      [
        '**AA123** (American Airlines): active',
        '',
        '- **Departure:** John F Kennedy International (JFK), gate B22 (scheduled 2024-05-01T08:00:00+00:00, actual 2024-05-01T08:12:00+00:00)',
        '- **Arrival:** Hartsfield-Jackson Atlanta International (ATL) (scheduled 2024-05-01T10:30:00+00:00)',
      ].join('\n'),
    );
  });
});

describe('formatAnalytics', () => {
  it('renders the on-time ranking as a table', () => {
    const text = formatAnalytics('JFK', 'ATL', { analysisType: 'on-time-ranking', rows: onTimeRows }, 2023);
    expect(text.split('\n')).toEqual([
      'Airlines ranked by on-time arrivals, JFK → ATL in 2023:',
      '',
      '| # | Airline | On time | Avg arrival delay | Flights |',
      '|---|---------|---------|-------------------|---------|',
      '| 1 | Delta Air Lines (DL) | 82.1% | 4.3 min | 412 |',
      '| 2 | JetBlue Airways (B6) | 71.4% | 11.5 min | 198 |',
    ]);
  });

  it('names the least delayed weekday', () => {
    const text = formatAnalytics('JFK', 'ORD', { analysisType: 'day-of-week-delay', rows: dayRows });
    expect(text.split('\n')[0]).toBe('Delays by day of week, JFK → ORD. Least delayed: **Tuesday**.');
    expect(text.split('\n')[5]).toBe('| Friday | 17.5 min | 64.0% | 72 |');
  });
});

describe('formatError', () => {
  it('asks for missing fields by name', () => {
    expect(formatError(turnError('ValidationFailed', 'x', { missing: ['originAirport', 'destinationAirport'] }))).toBe(
      'I need the departure airport and the arrival airport to answer that.',
    );
  });

  it('suggests a route for ambiguous airports', () => {
    expect(formatError(turnError('ExtractionAmbiguous', 'x', { candidates: ['JFK', 'LAX'] }))).toBe(
      'I found JFK, LAX but can\'t tell the route. Try "from JFK to LAX".',
    );
  });

  it('apologizes for adapter failures', () => {
    expect(formatError(turnError('AdapterNotFound', 'no flight found for AA123'))).toBe('Sorry, no flight found for AA123.');
    expect(formatError(turnError('AdapterUnavailable', 'flight analytics is not configured'))).toBe(
      'Sorry, flight analytics is not configured right now.',
    );
  });
});

describe('formatResponse', () => {
  it('formats a routed analytics answer', async () => {
    const router = new Router({ warehouse: fakeWarehouse(), log: silentLog });
    const res = await router.handle('on-time airlines from JFK to ATL');
    expect(formatResponse(res).split('\n')[0]).toBe('Airlines ranked by on-time arrivals, JFK → ATL:');
  });
});

describe('renderMarkdownToTerminal', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('strips markup and decodes entities', () => {
    expect(renderMarkdownToTerminal('**AA123** (Delta & partners): active')).toBe('AA123 (Delta & partners): active');
  });

  it('renders tables as pipe-separated rows', () => {
    expect(renderMarkdownToTerminal('| Day | Flights |\n|---|---|\n| Monday | 12 |')).toBe('Day | Flights\nMonday | 12');
  });
});
