jest.mock('../../../src/util/fetch.js', () => ({
  ...jest.requireActual('../../../src/util/fetch.js'),
  fetchJSON: jest.fn(),
}));

import { createAviationstackLookup } from '../../../src/tools/aviationstack.js';
import { ExternalFetchError, fetchJSON } from '../../../src/util/fetch.js';
import { flightRecord } from '../../helpers/fakes.js';

const mockedFetch = jest.mocked(fetchJSON);

const lookup = createAviationstackLookup({
  apiKey: 'test-secret',
  baseUrl: 'https://api.aviationstack.com/v1/',
  timeoutMs: 10000,
});

const apiFlight = {
  flight_status: 'active',
  airline: { name: 'American Airlines' },
  flight: { iata: 'AA123' },
  departure: {
    airport: 'John F Kennedy International',
    iata: 'JFK',
    gate: 'B22',
    scheduled: '2024-05-01T08:00:00+00:00',
    estimated: null,
    actual: '2024-05-01T08:12:00+00:00',
  },
  arrival: {
    airport: 'Hartsfield-Jackson Atlanta International',
    iata: 'ATL',
    scheduled: '2024-05-01T10:30:00+00:00',
  },
};

describe('createAviationstackLookup', () => {
  beforeEach(() => {
    mockedFetch.mockReset();
  });

  it('maps the first flight to a status record', async () => {
    mockedFetch.mockResolvedValueOnce({ data: [apiFlight] });
    await expect(lookup.lookup('aa123')).resolves.toEqual({ ok: true, record: flightRecord('AA123') });
    expect(mockedFetch).toHaveBeenCalledWith(
      'https://api.aviationstack.com/v1/flights?access_key=test-secret&flight_iata=AA123',
      expect.objectContaining({ timeoutMs: 10000, retries: 0, target: 'aviationstack' }),
    );
  });

  it('keeps unknown and missing fields nullable', async () => {
    mockedFetch.mockResolvedValueOnce({ data: [{ flight_status: 'en-route' }] });
    await expect(lookup.lookup('UA456')).resolves.toEqual({
      ok: true,
      record: {
        flightNumber: 'UA456',
        carrierName: null,
        status: 'unknown',
        departure: { station: null, iata: null, gate: null, scheduled: null, estimated: null, actual: null },
        arrival: { station: null, iata: null, gate: null, scheduled: null, estimated: null, actual: null },
      },
    });
  });

  it('reports an empty result as not found', async () => {
    mockedFetch.mockResolvedValueOnce({ data: [] });
    await expect(lookup.lookup('AA123')).resolves.toEqual({ ok: false, reason: 'not_found' });
  });

  it('surfaces API errors as transport errors', async () => {
    mockedFetch.mockResolvedValueOnce({ error: { code: 'invalid_access_key', message: 'You have not supplied a valid API Access Key.' } });
    await expect(lookup.lookup('AA123')).resolves.toEqual({
      ok: false,
      reason: 'transport_error',
      message: 'You have not supplied a valid API Access Key.',
    });
  });

  it('surfaces fetch failures as transport errors', async () => {
    mockedFetch.mockRejectedValueOnce(new ExternalFetchError('timeout', 'timeout'));
    await expect(lookup.lookup('AA123')).resolves.toEqual({ ok: false, reason: 'transport_error', message: 'timeout' });
  });

  it('rejects a payload of the wrong shape', async () => {
    mockedFetch.mockResolvedValueOnce({ data: 'nope' });
    await expect(lookup.lookup('AA123')).resolves.toEqual({ ok: false, reason: 'transport_error', message: 'unexpected_payload' });
  });

  it('passes the turn signal through', async () => {
    mockedFetch.mockResolvedValueOnce({ data: [] });
    const ac = new AbortController();
    await lookup.lookup('AA123', ac.signal);
    expect(mockedFetch.mock.calls[0][1]).toMatchObject({ signal: ac.signal });
  });
});
