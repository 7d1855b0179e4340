import type { ConversationState, IntentT, RememberedParameters } from '../schemas/query.js';

export const REMEMBERED_KEYS = ['originAirport', 'destinationAirport', 'flightNumber', 'year', 'analysisType'] as const;
export type RememberedKey = (typeof REMEMBERED_KEYS)[number];

function compact(parameters: RememberedParameters): RememberedParameters {
  const out: RememberedParameters = {};
  if (parameters.originAirport !== undefined) out.originAirport = parameters.originAirport;
  if (parameters.destinationAirport !== undefined) out.destinationAirport = parameters.destinationAirport;
  if (parameters.flightNumber !== undefined) out.flightNumber = parameters.flightNumber;
  if (parameters.year !== undefined) out.year = parameters.year;
  if (parameters.analysisType !== undefined) out.analysisType = parameters.analysisType;
  return out;
}

function sameParameters(a: RememberedParameters, b: RememberedParameters): boolean {
  return REMEMBERED_KEYS.every((key) => a[key] === b[key]);
}

/**
 * Last resolved intent and parameters of one session. Single owner, in
 * process only. `update` replaces the whole state; merging across turns
 * happens before dispatch, never here.
 */
export class ConversationMemory {
  private state: ConversationState = { intent: null, parameters: {}, turn: 0, updatedAt: null };

  constructor(private readonly now: () => number = Date.now) {}

  current(): ConversationState {
    return { ...this.state, parameters: { ...this.state.parameters } };
  }

  /**
   * Returns false (and leaves the state untouched) when the intent and
   * parameters equal what is already stored.
   */
  update(intent: IntentT, parameters: RememberedParameters): boolean {
    const next = compact(parameters);
    if (this.state.intent === intent && sameParameters(this.state.parameters, next)) {
      return false;
    }
    this.state = { intent, parameters: next, turn: this.state.turn + 1, updatedAt: this.now() };
    return true;
  }

  clear(): void {
    this.state = { intent: null, parameters: {}, turn: 0, updatedAt: null };
  }
}
