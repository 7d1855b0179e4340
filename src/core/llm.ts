import { fetch as undiciFetch } from 'undici';
import { z } from 'zod';
import type { IntentLabelT, IntentT } from '../schemas/query.js';
import type { LLMIntentClassifier } from './classifier.js';
import { getPrompt, renderPrompt } from './prompts.js';
import type { Logger } from '../util/logging.js';

export type CompleteFn = (prompt: string, signal: AbortSignal) => Promise<string>;

const ChatCompletion = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().optional() }) }))
    .min(1),
});

/**
 * One chat-completions call against an OpenAI-compatible provider. Throws on
 * HTTP failure, malformed payload or empty content; the caller owns the
 * timeout through `signal`.
 */
export async function callLLM(
  prompt: string,
  opts: { baseUrl: string; apiKey: string; model: string; signal: AbortSignal; log?: Logger },
): Promise<string> {
  const url = `${opts.baseUrl.replace(/\/$/, '')}/chat/completions`;
  const started = Date.now();
  const res = await undiciFetch(url, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${opts.apiKey}`,
    },
    body: JSON.stringify({
      model: opts.model,
      messages: [{ role: 'user', content: prompt }],
      temperature: 0,
      max_tokens: 60,
      response_format: { type: 'json_object' },
    }),
    signal: opts.signal,
  });

  if (!res.ok) {
    const errorText = await res.text();
    opts.log?.debug({ status: res.status, body: errorText.slice(0, 200) }, 'llm_http_error');
    throw new Error(`HTTP ${res.status}`);
  }

  const parsed = ChatCompletion.safeParse(await res.json());
  if (!parsed.success) throw new Error('llm_malformed_response');
  const content = parsed.data.choices[0].message.content?.trim() ?? '';
  if (!content) throw new Error('llm_empty_content');

  opts.log?.debug({ model: opts.model, ms: Date.now() - started }, 'llm_ok');
  return content;
}

export function safeExtractJson(text: string): unknown {
  const m = text.match(/\{[\s\S]*\}/);
  if (!m) return undefined;
  try {
    return JSON.parse(m[0]);
  } catch {
    return undefined;
  }
}

const LABEL_ALIASES: Record<string, IntentT> = {
  flightstatus: 'FlightStatus',
  status: 'FlightStatus',
  fareanalytics: 'FareAnalytics',
  analytics: 'FareAnalytics',
  delay: 'FareAnalytics',
  unknown: 'Unknown',
};

const RawLabel = z.object({
  label: z.string(),
  confidence: z.coerce.number().min(0).max(1).optional(),
});

function normalizeLabel(raw: string): IntentT | undefined {
  const key = raw.trim().toLowerCase().replace(/[^a-z]/g, '');
  return LABEL_ALIASES[key];
}

/**
 * Reads a model reply as `{label, confidence}` JSON or as a bare label such
 * as "status" or "delay". Returns undefined for anything else.
 */
export function parseIntentLabel(reply: string): IntentLabelT | undefined {
  const json = RawLabel.safeParse(safeExtractJson(reply));
  if (json.success) {
    const label = normalizeLabel(json.data.label);
    return label ? { label, confidence: json.data.confidence ?? 0.5 } : undefined;
  }
  const bare = normalizeLabel(reply);
  return bare ? { label: bare, confidence: 0.5 } : undefined;
}

export function createLlmIntentClassifier(deps: { complete: CompleteFn }): LLMIntentClassifier {
  return {
    async classify(utterance: string, signal: AbortSignal): Promise<IntentLabelT> {
      const prompt = renderPrompt(await getPrompt('intent_classifier'), { utterance });
      const reply = await deps.complete(prompt, signal);
      const label = parseIntentLabel(reply);
      if (!label) throw new Error('llm_unrecognized_label');
      return label;
    },
  };
}

export function chatCompletion(cfg: { baseUrl: string; apiKey: string; model: string }, log?: Logger): CompleteFn {
  return (prompt, signal) => callLLM(prompt, { ...cfg, signal, log });
}
