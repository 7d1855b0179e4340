import { ConversationMemory } from '../../../src/core/memory.js';

describe('ConversationMemory', () => {
  let now = 1_000;
  const clock = () => now;

  beforeEach(() => {
    now = 1_000;
  });

  it('starts empty', () => {
    expect(new ConversationMemory(clock).current()).toEqual({ intent: null, parameters: {}, turn: 0, updatedAt: null });
  });

  it('replaces the whole state on update', () => {
    const memory = new ConversationMemory(clock);
    memory.update('FareAnalytics', { originAirport: 'JFK', destinationAirport: 'ATL', analysisType: 'on-time-ranking' });
    now = 2_000;
    expect(memory.update('FlightStatus', { flightNumber: 'AA123' })).toBe(true);
    expect(memory.current()).toEqual({
      intent: 'FlightStatus',
      parameters: { flightNumber: 'AA123' },
      turn: 2,
      updatedAt: 2_000,
    });
  });

  it('ignores an identical update', () => {
    const memory = new ConversationMemory(clock);
    memory.update('FareAnalytics', { originAirport: 'JFK', destinationAirport: 'ATL', analysisType: 'on-time-ranking' });
    const before = memory.current();
    now = 5_000;
    expect(
      memory.update('FareAnalytics', { analysisType: 'on-time-ranking', destinationAirport: 'ATL', originAirport: 'JFK' }),
    ).toBe(false);
    expect(memory.current()).toEqual(before);
  });

  it('drops undefined fields', () => {
    const memory = new ConversationMemory(clock);
    memory.update('FareAnalytics', { originAirport: 'JFK', year: undefined });
    expect(memory.current().parameters).toEqual({ originAirport: 'JFK' });
    expect(Object.keys(memory.current().parameters)).toEqual(['originAirport']);
  });

  it('hands out copies', () => {
    const memory = new ConversationMemory(clock);
    memory.update('FlightStatus', { flightNumber: 'AA123' });
    memory.current().parameters.flightNumber = 'ZZ999';
    expect(memory.current().parameters.flightNumber).toBe('AA123');
  });

  it('clears back to the initial state', () => {
    const memory = new ConversationMemory(clock);
    memory.update('FlightStatus', { flightNumber: 'AA123' });
    memory.clear();
    expect(memory.current()).toEqual({ intent: null, parameters: {}, turn: 0, updatedAt: null });
  });
});
