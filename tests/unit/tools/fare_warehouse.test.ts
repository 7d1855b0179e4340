import { QueryAbortedError, type SqlClient } from '../../../src/db/pool.js';
import { TemplateLoader, createFareWarehouse } from '../../../src/tools/fare_warehouse.js';

function fakeSql(rows: unknown[]) {
  const query = jest.fn<Promise<{ rows: unknown[] }>, [string, unknown[]]>(async () => ({ rows }));
  const client: SqlClient = { query };
  return { client, query };
}

describe('createFareWarehouse', () => {
  it('ranks airlines with placeholders only and coerces numeric strings', async () => {
    const { client, query } = fakeSql([
      {
        carrierCode: 'DL',
        carrierName: 'Delta Air Lines',
        avgDepartureDelay: '8.50',
        avgArrivalDelay: '4.25',
        avgOverallDelay: '6.38',
        onTimePct: '82.10',
        flightCount: '412',
      },
    ]);
    const warehouse = createFareWarehouse(client);

    await expect(warehouse.rankAirlinesByOnTime('JFK', 'ATL')).resolves.toEqual([
      {
        carrierCode: 'DL',
        carrierName: 'Delta Air Lines',
        avgDepartureDelay: 8.5,
        avgArrivalDelay: 4.25,
        avgOverallDelay: 6.38,
        onTimePct: 82.1,
        flightCount: 412,
      },
    ]);

    const [text, values] = query.mock.calls[0];
    expect(values).toEqual(['JFK', 'ATL', null, 10]);
    expect(text).toContain('HAVING COUNT(*) >= $4');
    expect(text).toContain('arr_delay_minutes <= 15');
    expect(text).not.toContain('JFK');
  });

  it('passes the year and an explicit minimum', async () => {
    const { client, query } = fakeSql([]);
    await createFareWarehouse(client).rankAirlinesByOnTime('JFK', 'ATL', 2023, 25);
    expect(query.mock.calls[0][1]).toEqual(['JFK', 'ATL', 2023, 25]);
  });

  it('names ISO weekdays and uses the configured minimum', async () => {
    const { client, query } = fakeSql([
      { isoDay: 2, avgDepartureDelay: '5', avgArrivalDelay: '2', avgOverallDelay: '3.5', onTimePct: '88', flightCount: '60' },
      { isoDay: 7, avgDepartureDelay: '9', avgArrivalDelay: '7', avgOverallDelay: '8', onTimePct: '80', flightCount: '41' },
    ]);
    const rows = await createFareWarehouse(client, { minFlights: 5 }).delaysByDayOfWeek('SFO', 'SEA');
    expect(rows.map((r) => [r.dayOfWeek, r.avgOverallDelay])).toEqual([
      ['Tuesday', 3.5],
      ['Sunday', 8],
    ]);
    expect(query.mock.calls[0][1]).toEqual(['SFO', 'SEA', null, 5]);
    expect(query.mock.calls[0][0]).toContain('EXTRACT(ISODOW FROM flight_date)');
  });

  it('does not start a query once the caller has given up', async () => {
    const { client, query } = fakeSql([]);
    const ac = new AbortController();
    ac.abort();
    await expect(createFareWarehouse(client).delaysByDayOfWeek('JFK', 'ATL', undefined, 10, ac.signal)).rejects.toBeInstanceOf(
      QueryAbortedError,
    );
    expect(query).not.toHaveBeenCalled();
  });

  it('discards rows that arrive after an abort', async () => {
    const ac = new AbortController();
    const query = jest.fn<Promise<{ rows: unknown[] }>, [string, unknown[], AbortSignal?]>(async () => {
      ac.abort();
      return { rows: [] };
    });
    await expect(createFareWarehouse({ query }).rankAirlinesByOnTime('JFK', 'ATL', undefined, 10, ac.signal)).rejects.toThrow(
      'query_aborted',
    );
    expect(query.mock.calls[0][2]).toBe(ac.signal);
  });

  it('rejects rows it cannot read', async () => {
    const { client } = fakeSql([{ carrierCode: 'DL' }]);
    await expect(createFareWarehouse(client).rankAirlinesByOnTime('JFK', 'ATL')).rejects.toThrow(
      /^unexpected rows from rank_airlines_on_time/,
    );
  });
});

describe('TemplateLoader', () => {
  it('fails for a missing template directory', () => {
    const loader = new TemplateLoader('/nonexistent/sql');
    expect(() => loader.load('rank_airlines_on_time')).toThrow('SQL template file not found: /nonexistent/sql/rank_airlines_on_time.sql');
  });
});
