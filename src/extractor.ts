import OpenAI from 'openai';
import { DateTime } from 'luxon';
import { z } from 'zod';
import { isExtractionCandidate, scoreSchedulingSignals, SignalResult } from './classifier';
import { ExtractionFailure } from './errors';
import { logDebug } from './logger';
import { EventExtractor, RawMessage, ScheduleEvent } from './types';

/** Sends one prompt and returns the model's raw text answer. */
export interface CompletionClient {
  complete(prompt: string, signal?: AbortSignal): Promise<string>;
}

export function createOpenAICompletionClient(client: OpenAI, model: string): CompletionClient {
  return {
    async complete(prompt: string, signal?: AbortSignal): Promise<string> {
      const response = await client.chat.completions.create(
        {
          model,
          temperature: 0,
          response_format: { type: 'json_object' },
          messages: [{ role: 'user', content: prompt }],
        },
        { signal }
      );
      return response.choices[0]?.message?.content ?? '';
    },
  };
}

const ExtractedItem = z.object({
  index: z.number().int().min(0),
  kind: z.enum(['interview', 'reschedule', 'none']),
  company: z.string().nullish(),
  datetime: z.string().nullish(),
  stage: z.enum(['OA', 'Interview']).nullish(),
  subject: z.string().nullish(),
  window_start: z.string().nullish(),
  window_end: z.string().nullish(),
  confidence: z.number().min(0).max(1).default(0.6),
});

const ExtractionResponse = z.object({
  results: z.array(ExtractedItem).default([]),
});

type ExtractedItemShape = z.infer<typeof ExtractedItem>;

export interface ExtractorOptions {
  timezone: string;
  minConfidence: number;
  /** Messages with no scheduling signal skip the model call. */
  prefilter?: boolean;
}

interface Candidate {
  message: RawMessage;
  position: number;
  signals: SignalResult;
}

function buildPrompt(candidates: Candidate[], timezone: string): string {
  const items = candidates
    .map(({ message, signals }, index) =>
      [
        `### MESSAGE ${index}`,
        `keyword hint: ${signals.hint ?? 'none'}`,
        `received: ${message.receivedAt}`,
        `from: ${message.from}`,
        `subject: ${message.subject}`,
        message.body.slice(0, 4000),
      ].join('\n')
    )
    .join('\n\n');

  return `
You classify student emails and extract scheduling events.
For each message return exactly one result object with its "index".
- "interview": a company interview or online assessment invitation. Fill "company",
  "datetime" (ISO 8601) and "stage" ("OA" for online assessments/tests, otherwise "Interview").
- "reschedule": a class moved to a new time. Fill "subject" (course name or code) and the
  requested "window_start"/"window_end" (ISO 8601).
- "none": anything else.
Each message carries a "keyword hint" from a keyword scan; it may be wrong.
Resolve relative dates against the message's received time. Times without an offset are in ${timezone}.
Give "confidence" between 0 and 1.
Respond ONLY with JSON: {"results":[{"index":0,"kind":"...","company":null,"datetime":null,"stage":null,"subject":null,"window_start":null,"window_end":null,"confidence":0.0}]}

${items}
`.trim();
}

/** Extract a JSON object from a response that might include prose or code fences. */
export function extractJsonBlock(s: string): string {
  const trimmed = s.trim();
  if (trimmed.startsWith('{') && trimmed.endsWith('}')) return trimmed;

  const fenceMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  if (fenceMatch) return fenceMatch[1].trim();

  const first = trimmed.indexOf('{');
  const last = trimmed.lastIndexOf('}');
  if (first >= 0 && last > first) return trimmed.slice(first, last + 1).trim();

  return trimmed;
}

function toUtcIso(value: string, timezone: string): string | null {
  const parsed = DateTime.fromISO(value.trim(), { zone: timezone });
  return parsed.isValid ? parsed.toUTC().toISO({ suppressMilliseconds: true }) : null;
}

export function toScheduleEvent(
  item: ExtractedItemShape | undefined,
  options: Pick<ExtractorOptions, 'timezone' | 'minConfidence'>
): ScheduleEvent {
  if (!item || item.kind === 'none') {
    return { kind: 'none', reason: item ? 'no scheduling content' : 'missing from extraction result' };
  }
  if (item.confidence < options.minConfidence) {
    return { kind: 'none', reason: `low confidence ${item.confidence}` };
  }

  if (item.kind === 'interview') {
    const company = item.company?.trim();
    const datetime = item.datetime ? toUtcIso(item.datetime, options.timezone) : null;
    if (!company || !datetime) {
      return { kind: 'none', reason: 'interview without company or valid datetime' };
    }
    return {
      kind: 'interview',
      company,
      datetime,
      stage: item.stage ?? 'Interview',
      confidence: item.confidence,
    };
  }

  const subject = item.subject?.trim();
  const start = item.window_start ? toUtcIso(item.window_start, options.timezone) : null;
  const end = item.window_end ? toUtcIso(item.window_end, options.timezone) : null;
  if (!subject || !start || !end || Date.parse(end) <= Date.parse(start)) {
    return { kind: 'none', reason: 'reschedule without subject or valid window' };
  }
  return {
    kind: 'reschedule',
    subject,
    requestedWindow: { start, end },
    confidence: item.confidence,
  };
}

/**
 * One model call per batch. Results are matched back to their messages by
 * index; anything the model leaves out becomes a `none` event.
 */
export class LlmEventExtractor implements EventExtractor {
  constructor(
    private readonly client: CompletionClient,
    private readonly options: ExtractorOptions
  ) {}

  async extract(batch: RawMessage[], signal?: AbortSignal): Promise<ScheduleEvent[]> {
    const events: ScheduleEvent[] = batch.map(() => ({ kind: 'none', reason: 'no scheduling signal' }));
    const candidates = batch
      .map((message, position): Candidate => ({ message, position, signals: scoreSchedulingSignals(message) }))
      .filter(({ signals }) => this.options.prefilter === false || isExtractionCandidate(signals));

    if (candidates.length === 0) {
      return events;
    }

    let parsed: z.infer<typeof ExtractionResponse>;
    try {
      const text = await this.client.complete(buildPrompt(candidates, this.options.timezone), signal);
      parsed = ExtractionResponse.parse(JSON.parse(extractJsonBlock(text)));
    } catch (error) {
      throw new ExtractionFailure('Extraction call failed', { cause: error });
    }

    const byIndex = new Map<number, ExtractedItemShape>();
    for (const item of parsed.results) {
      if (!byIndex.has(item.index)) byIndex.set(item.index, item);
    }

    candidates.forEach(({ position }, index) => {
      events[position] = toScheduleEvent(byIndex.get(index), this.options);
    });

    logDebug('Extraction batch done', {
      size: batch.length,
      sent: candidates.length,
      reasons: candidates.map(({ signals }) => signals.reasons),
      events: events.filter((e) => e.kind !== 'none').length,
    });

    return events;
  }
}
