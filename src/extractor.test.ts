import { ExtractionFailure } from './errors';
import { CompletionClient, extractJsonBlock, LlmEventExtractor, toScheduleEvent } from './extractor';
import { makeMessage } from './testing';

class FakeCompletionClient implements CompletionClient {
  readonly prompts: string[] = [];
  readonly signals: Array<AbortSignal | undefined> = [];

  constructor(private readonly answer: string | Error) {}

  async complete(prompt: string, signal?: AbortSignal): Promise<string> {
    this.prompts.push(prompt);
    this.signals.push(signal);
    if (this.answer instanceof Error) throw this.answer;
    return this.answer;
  }
}

const interviewMail = makeMessage('s1', {
  subject: 'Interview invitation: Acme Corp',
  from: 'placement-cell@college.edu',
  body: 'You have been shortlisted for the online assessment on Monday at 10:00.',
});

const newsletter = makeMessage('s1', {
  subject: 'Campus newsletter',
  from: 'news@college.edu',
  body: 'Read about the new library wing.',
});

const rescheduleMail = makeMessage('s1', {
  subject: 'DBMS class rescheduled',
  from: 'cse-dept@college.edu',
  body: 'The DBMS lecture is moved to Friday 14:00-15:00.',
});

const options = { timezone: 'Asia/Kolkata', minConfidence: 0.5 };

describe('LlmEventExtractor', () => {
  it('should not call the model when no message carries a scheduling signal', async () => {
    const client = new FakeCompletionClient('{"results":[]}');
    const extractor = new LlmEventExtractor(client, options);

    const events = await extractor.extract([newsletter]);

    expect(client.prompts).toHaveLength(0);
    expect(events).toEqual([{ kind: 'none', reason: 'no scheduling signal' }]);
  });

  it('should send candidates in one call and map results back to batch positions', async () => {
    const answer = [
      'Here you go:',
      '```json',
      JSON.stringify({
        results: [
          { index: 0, kind: 'interview', company: 'Acme Corp', datetime: '2024-05-06T10:00:00', stage: 'OA', confidence: 0.9 },
          {
            index: 1,
            kind: 'reschedule',
            subject: 'DBMS',
            window_start: '2024-05-10T14:00',
            window_end: '2024-05-10T15:00',
            confidence: 0.8,
          },
        ],
      }),
      '```',
    ].join('\n');
    const client = new FakeCompletionClient(answer);
    const extractor = new LlmEventExtractor(client, options);

    const events = await extractor.extract([interviewMail, newsletter, rescheduleMail]);

    expect(client.prompts).toHaveLength(1);
    expect(client.prompts[0]).toContain('### MESSAGE 1');
    expect(client.prompts[0]).not.toContain('### MESSAGE 2');
    expect(client.prompts[0]).toContain('Times without an offset are in Asia/Kolkata.');
    expect(events).toEqual([
      { kind: 'interview', company: 'Acme Corp', datetime: '2024-05-06T04:30:00Z', stage: 'OA', confidence: 0.9 },
      { kind: 'none', reason: 'no scheduling signal' },
      {
        kind: 'reschedule',
        subject: 'DBMS',
        requestedWindow: { start: '2024-05-10T08:30:00Z', end: '2024-05-10T09:30:00Z' },
        confidence: 0.8,
      },
    ]);
  });

  it('should label each message with its keyword hint and forward the abort signal', async () => {
    const client = new FakeCompletionClient('{"results":[]}');
    const extractor = new LlmEventExtractor(client, options);
    const controller = new AbortController();

    await extractor.extract([interviewMail, rescheduleMail], controller.signal);

    expect(client.prompts[0]).toContain('### MESSAGE 0\nkeyword hint: interview\n');
    expect(client.prompts[0]).toContain('### MESSAGE 1\nkeyword hint: reschedule\n');
    expect(client.signals).toHaveLength(1);
    expect(client.signals[0]).toBe(controller.signal);
  });

  it('should turn results the model left out into none events', async () => {
    const client = new FakeCompletionClient(
      '{"results":[{"index":1,"kind":"none","confidence":0.9}]}'
    );
    const extractor = new LlmEventExtractor(client, options);

    const events = await extractor.extract([interviewMail, rescheduleMail]);

    expect(events).toEqual([
      { kind: 'none', reason: 'missing from extraction result' },
      { kind: 'none', reason: 'no scheduling content' },
    ]);
  });

  it('should send every message when the prefilter is off', async () => {
    const client = new FakeCompletionClient('{"results":[]}');
    const extractor = new LlmEventExtractor(client, { ...options, prefilter: false });

    const events = await extractor.extract([newsletter]);

    expect(client.prompts).toHaveLength(1);
    expect(events).toEqual([{ kind: 'none', reason: 'missing from extraction result' }]);
  });

  it('should wrap unparseable answers in ExtractionFailure', async () => {
    const extractor = new LlmEventExtractor(new FakeCompletionClient('not json at all'), options);

    await expect(extractor.extract([interviewMail])).rejects.toThrow(ExtractionFailure);
  });

  it('should wrap client errors in ExtractionFailure', async () => {
    const extractor = new LlmEventExtractor(new FakeCompletionClient(new Error('rate limited')), options);

    await expect(extractor.extract([interviewMail])).rejects.toThrow('Extraction call failed');
  });
});

describe('toScheduleEvent', () => {
  const utc = { timezone: 'UTC', minConfidence: 0.5 };

  it('should default the stage to Interview', () => {
    expect(
      toScheduleEvent(
        { index: 0, kind: 'interview', company: ' Globex ', datetime: '2024-06-03T09:30:00Z', confidence: 0.7 },
        utc
      )
    ).toEqual({ kind: 'interview', company: 'Globex', datetime: '2024-06-03T09:30:00Z', stage: 'Interview', confidence: 0.7 });
  });

  it('should drop results below the confidence floor', () => {
    expect(
      toScheduleEvent({ index: 0, kind: 'interview', company: 'Globex', datetime: '2024-06-03T09:30:00Z', confidence: 0.3 }, utc)
    ).toEqual({ kind: 'none', reason: 'low confidence 0.3' });
  });

  it('should reject an interview without a parseable datetime', () => {
    expect(
      toScheduleEvent({ index: 0, kind: 'interview', company: 'Globex', datetime: 'next Tuesday', confidence: 0.9 }, utc)
    ).toEqual({ kind: 'none', reason: 'interview without company or valid datetime' });
  });

  it('should reject a reschedule whose window ends before it starts', () => {
    expect(
      toScheduleEvent(
        {
          index: 0,
          kind: 'reschedule',
          subject: 'DBMS',
          window_start: '2024-05-10T15:00:00Z',
          window_end: '2024-05-10T14:00:00Z',
          confidence: 0.9,
        },
        utc
      )
    ).toEqual({ kind: 'none', reason: 'reschedule without subject or valid window' });
  });
});

describe('extractJsonBlock', () => {
  it('should return bare JSON unchanged', () => {
    expect(extractJsonBlock(' {"a":1} ')).toBe('{"a":1}');
  });

  it('should unwrap fenced JSON', () => {
    expect(extractJsonBlock('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it('should cut the object out of surrounding prose', () => {
    expect(extractJsonBlock('Sure! {"a":{"b":2}} Hope that helps.')).toBe('{"a":{"b":2}}');
  });
});
