import { TimeoutStrategy, timeout } from 'cockatiel';
import type {
  AnalyticsParametersT,
  AnalyticsResult,
  FlightStatusRecordT,
  IntentT,
  RememberedParameters,
  ResolvedQuery,
} from '../schemas/query.js';
import type { FareAnalyticsWarehouse, FlightStatusLookup } from './adapters.js';
import { IntentClassifier, type Classification } from './classifier.js';
import { toTurnError, turnError, type TurnError } from './errors.js';
import { extractParameters } from './extractor.js';
import { ConversationMemory, type RememberedKey } from './memory.js';
import { mergeParameters, resolveIntent, validateQuery } from './resolve.js';
import type { Logger } from '../util/logging.js';
import { incTurn, observeAdapter } from '../util/metrics.js';

export type TurnStage = 'AwaitingInput' | 'Extracted' | 'Classified' | 'Resolved' | 'Dispatched' | 'Responded';

type StatusQuery = Extract<ResolvedQuery, { intent: 'FlightStatus' }>;
type AnalyticsQuery = Extract<ResolvedQuery, { intent: 'FareAnalytics' }>;

interface ResponseBase {
  classification: Classification;
  trace: TurnStage[];
  // Fields taken from memory rather than from this utterance.
  inherited: RememberedKey[];
  memoryUpdated: boolean;
}

export type RouterResponse =
  | (ResponseBase & { kind: 'flight_status'; intent: 'FlightStatus'; query: StatusQuery; result: FlightStatusRecordT })
  | (ResponseBase & { kind: 'analytics'; intent: 'FareAnalytics'; query: AnalyticsQuery; result: AnalyticsResult })
  | (ResponseBase & {
      kind: 'clarification';
      intent: IntentT;
      query: null;
      parameters: RememberedParameters;
      error: TurnError;
    })
  | (ResponseBase & { kind: 'error'; intent: IntentT; query: ResolvedQuery; error: TurnError });

export interface RouterDeps {
  statusLookup?: FlightStatusLookup;
  warehouse?: FareAnalyticsWarehouse;
  classifier?: IntentClassifier;
  memory?: ConversationMemory;
  log?: Logger;
  statusTimeoutMs?: number;
  analyticsTimeoutMs?: number;
  minFlights?: number;
}

type Dispatched<T> = { ok: true; result: T } | { ok: false; error: TurnError; keepParameters: boolean };

/**
 * One conversation's turn handler. Turns must not overlap: callers await
 * `handle` before sending the next utterance.
 */
export class Router {
  private readonly memory: ConversationMemory;
  private readonly classifier: IntentClassifier;
  private readonly statusLookup?: FlightStatusLookup;
  private readonly warehouse?: FareAnalyticsWarehouse;
  private readonly log?: Logger;
  private readonly statusTimeoutMs: number;
  private readonly analyticsTimeoutMs: number;
  private readonly minFlights: number;

  constructor(deps: RouterDeps = {}) {
    this.memory = deps.memory ?? new ConversationMemory();
    this.classifier = deps.classifier ?? new IntentClassifier({ log: deps.log });
    this.statusLookup = deps.statusLookup;
    this.warehouse = deps.warehouse;
    this.log = deps.log;
    this.statusTimeoutMs = deps.statusTimeoutMs ?? 10000;
    this.analyticsTimeoutMs = deps.analyticsTimeoutMs ?? 15000;
    this.minFlights = deps.minFlights ?? 10;
  }

  async handle(utterance: string): Promise<RouterResponse> {
    const trace: TurnStage[] = ['AwaitingInput'];
    const text = utterance.trim();

    if (!text) {
      return this.finish({
        kind: 'clarification',
        intent: 'Unknown',
        query: null,
        parameters: {},
        error: turnError('ValidationFailed', 'empty utterance', { missing: ['utterance'] }),
        classification: { intent: 'Unknown', source: 'none' },
        trace,
        inherited: [],
        memoryUpdated: false,
      });
    }

    const extracted = extractParameters(text);
    trace.push('Extracted');
    this.log?.debug({ extracted }, 'router_extracted');

    const state = this.memory.current();
    const primary = await this.classifier.classify(text, extracted);
    const classification = resolveIntent(primary, extracted, state, text);
    trace.push('Classified');
    this.log?.debug({ intent: classification.intent, source: classification.source }, 'turn_classified');

    const { intent } = classification;
    if (intent === 'Unknown') {
      return this.finish({
        kind: 'clarification',
        intent,
        query: null,
        parameters: {},
        error: turnError('UnknownIntent', 'could not tell whether this is a flight status or an analytics question'),
        classification,
        trace,
        inherited: [],
        memoryUpdated: false,
      });
    }

    const merged = mergeParameters(intent, extracted, state);
    const validation = validateQuery(intent, merged.parameters, extracted);
    trace.push('Resolved');

    if (!validation.ok) {
      return this.finish({
        kind: 'clarification',
        intent,
        query: null,
        parameters: merged.parameters,
        error: validation.error,
        classification,
        trace,
        inherited: merged.inherited,
        memoryUpdated: false,
      });
    }

    const base = { classification, trace, inherited: merged.inherited };
    const { query } = validation;

    if (query.intent === 'FlightStatus') {
      if (!this.statusLookup) {
        return this.finish({ ...base, kind: 'error', intent: query.intent, query, error: unavailable('flight status'), memoryUpdated: false });
      }
      trace.push('Dispatched');
      const outcome = await this.dispatchStatus(this.statusLookup, query.parameters.flightNumber);
      if (outcome.ok) {
        const memoryUpdated = this.memory.update(query.intent, query.parameters);
        return this.finish({ ...base, kind: 'flight_status', intent: query.intent, query, result: outcome.result, memoryUpdated });
      }
      const memoryUpdated = outcome.keepParameters ? this.memory.update(query.intent, query.parameters) : false;
      return this.finish({ ...base, kind: 'error', intent: query.intent, query, error: outcome.error, memoryUpdated });
    }

    if (!this.warehouse) {
      return this.finish({ ...base, kind: 'error', intent: query.intent, query, error: unavailable('flight analytics'), memoryUpdated: false });
    }
    trace.push('Dispatched');
    const outcome = await this.dispatchAnalytics(this.warehouse, query.parameters);
    // The route is valid whatever the warehouse said; keep it for the next turn.
    const memoryUpdated = this.memory.update(query.intent, query.parameters);
    if (outcome.ok) {
      return this.finish({ ...base, kind: 'analytics', intent: query.intent, query, result: outcome.result, memoryUpdated });
    }
    return this.finish({ ...base, kind: 'error', intent: query.intent, query, error: outcome.error, memoryUpdated });
  }

  private async dispatchStatus(lookup: FlightStatusLookup, flightNumber: string): Promise<Dispatched<FlightStatusRecordT>> {
    const started = Date.now();
    try {
      const res = await timeout(this.statusTimeoutMs, TimeoutStrategy.Aggressive).execute(({ signal }) =>
        lookup.lookup(flightNumber, signal),
      );
      if (res.ok) {
        observeAdapter('flight_status', 'ok', Date.now() - started);
        return { ok: true, result: res.record };
      }
      if (res.reason === 'not_found') {
        observeAdapter('flight_status', 'not_found', Date.now() - started);
        return {
          ok: false,
          error: turnError('AdapterNotFound', `no flight found for ${flightNumber}`, { adapter: 'flight_status' }),
          keepParameters: false,
        };
      }
      observeAdapter('flight_status', 'error', Date.now() - started);
      this.log?.warn({ flightNumber, err: res.message }, 'flight_status_failed');
      return {
        ok: false,
        error: turnError('AdapterTransportError', res.message, { adapter: 'flight_status' }),
        keepParameters: true,
      };
    } catch (err: unknown) {
      observeAdapter('flight_status', 'error', Date.now() - started);
      const error = toTurnError(err, 'flight_status');
      this.log?.warn({ flightNumber, err: error.message }, 'flight_status_failed');
      return { ok: false, error, keepParameters: true };
    }
  }

  private async dispatchAnalytics(warehouse: FareAnalyticsWarehouse, params: AnalyticsParametersT): Promise<Dispatched<AnalyticsResult>> {
    const { originAirport, destinationAirport, year, analysisType } = params;
    const started = Date.now();
    try {
      const result = await timeout(this.analyticsTimeoutMs, TimeoutStrategy.Aggressive).execute(
        async ({ signal }): Promise<AnalyticsResult> => {
          if (analysisType === 'on-time-ranking') {
            const rows = await warehouse.rankAirlinesByOnTime(originAirport, destinationAirport, year, this.minFlights, signal);
            return { analysisType, rows };
          }
          const rows = await warehouse.delaysByDayOfWeek(originAirport, destinationAirport, year, this.minFlights, signal);
          return { analysisType, rows };
        },
      );
      if (result.rows.length === 0) {
        observeAdapter('analytics', 'empty', Date.now() - started);
        return {
          ok: false,
          error: turnError('AdapterEmptyResult', `no ${analysisType} data for ${originAirport} to ${destinationAirport}`, {
            adapter: 'analytics',
            minFlights: this.minFlights,
          }),
          keepParameters: true,
        };
      }
      observeAdapter('analytics', 'ok', Date.now() - started);
      return { ok: true, result };
    } catch (err: unknown) {
      observeAdapter('analytics', 'error', Date.now() - started);
      const error = toTurnError(err, 'analytics');
      this.log?.warn({ originAirport, destinationAirport, analysisType, err: error.message }, 'analytics_failed');
      return { ok: false, error, keepParameters: true };
    }
  }

  private finish(response: RouterResponse): RouterResponse {
    response.trace.push('Responded');
    const outcome = response.kind === 'clarification' || response.kind === 'error' ? response.error.code : response.kind;
    incTurn(response.intent, outcome);
    this.log?.debug({ trace: response.trace }, 'turn_trace');
    this.log?.info({ intent: response.intent, kind: response.kind, outcome }, 'turn_responded');
    return response;
  }
}

function unavailable(what: string): TurnError {
  return turnError('AdapterUnavailable', `${what} is not configured`);
}
