import { TaskCancelledError, TimeoutStrategy, timeout } from 'cockatiel';
import { IntentLabel, type ExtractedParametersT, type IntentLabelT, type IntentT } from '../schemas/query.js';
import { hasAnalyticsKeyword, hasRankingKeyword } from './extractor.js';
import type { ClassifierNoteCode } from './errors.js';
import { incClassifierFallback } from '../util/metrics.js';
import type { Logger } from '../util/logging.js';

/**
 * Optional language-model collaborator. Implementations may reject; the
 * classifier treats any rejection as a non-fatal miss.
 */
export interface LLMIntentClassifier {
  classify(utterance: string, signal: AbortSignal): Promise<IntentLabelT>;
}

export type ClassificationSource = 'patterns' | 'llm' | 'continuation' | 'none';

export interface Classification {
  intent: IntentT;
  source: ClassificationSource;
  confidence?: number;
  note?: { code: ClassifierNoteCode; message: string };
}

/**
 * Deterministic primary path. A flight number wins unless the utterance
 * also asks for a ranking or a statistic; broader words such as "airlines"
 * only count when no flight number is present.
 */
export function classifyByPatterns(utterance: string, params: ExtractedParametersT): IntentT {
  if (params.flightNumber && params.analysisType === undefined && !hasRankingKeyword(utterance)) {
    return 'FlightStatus';
  }

  const analyticsKeyword = params.analysisType !== undefined || hasAnalyticsKeyword(utterance);

  const bothAirports = Boolean(params.originAirport && params.destinationAirport);
  const ambiguousPair = (params.airportCandidates?.length ?? 0) >= 2;
  if (analyticsKeyword || bothAirports || ambiguousPair || params.year !== undefined) {
    return 'FareAnalytics';
  }

  return 'Unknown';
}

export class IntentClassifier {
  private readonly llm?: LLMIntentClassifier;
  private readonly timeoutMs: number;
  private readonly log?: Logger;

  constructor(opts: { llm?: LLMIntentClassifier; timeoutMs?: number; log?: Logger } = {}) {
    this.llm = opts.llm;
    this.timeoutMs = opts.timeoutMs ?? 3000;
    this.log = opts.log;
  }

  get hasFallback(): boolean {
    return this.llm !== undefined;
  }

  async classify(utterance: string, params: ExtractedParametersT): Promise<Classification> {
    const intent = classifyByPatterns(utterance, params);
    if (intent !== 'Unknown') {
      return { intent, source: 'patterns' };
    }

    if (!this.llm) {
      return {
        intent: 'Unknown',
        source: 'none',
        note: { code: 'ClassifierUnavailable', message: 'no language-model classifier configured' },
      };
    }

    return this.classifyWithLlm(this.llm, utterance);
  }

  private async classifyWithLlm(llm: LLMIntentClassifier, utterance: string): Promise<Classification> {
    const policy = timeout(this.timeoutMs, TimeoutStrategy.Aggressive);
    try {
      const raw = await policy.execute(({ signal }) => llm.classify(utterance, signal));
      const parsed = IntentLabel.safeParse(raw);
      if (!parsed.success) {
        incClassifierFallback('rejected');
        this.log?.warn({ issues: parsed.error.issues.length }, 'llm_classifier_unrecognized');
        return failed('unrecognized label');
      }
      incClassifierFallback('accepted');
      this.log?.debug({ label: parsed.data.label, confidence: parsed.data.confidence }, 'llm_classifier_label');
      return { intent: parsed.data.label, source: 'llm', confidence: parsed.data.confidence };
    } catch (err: unknown) {
      incClassifierFallback('failed');
      const message = err instanceof TaskCancelledError
        ? `timed out after ${this.timeoutMs}ms`
        : err instanceof Error ? err.message : String(err);
      this.log?.warn({ err: message }, 'llm_classifier_failed');
      return failed(message);
    }
  }
}

function failed(message: string): Classification {
  return { intent: 'Unknown', source: 'none', note: { code: 'ClassifierFailed', message } };
}
