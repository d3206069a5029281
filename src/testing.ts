import { DatabaseManager } from './database';
import { fingerprintOf } from './gmail-client';
import { EventExtractor, Identity, MailboxSession, MessageRef, MessageSource, RawMessage, ScheduleEvent } from './types';

// In-process stand-ins for the mailbox and the model, shared by the test suites.

export function makeIdentity(studentId: string): Identity {
  return { studentId, mailboxAddress: `${studentId}@example.edu`, credentialsHandle: `${studentId}-handle` };
}

let sequence = 0;

export function makeMessage(studentId: string, overrides: Partial<RawMessage> = {}): RawMessage {
  sequence += 1;
  const sourceId = overrides.sourceId ?? `msg-${sequence}`;
  const receivedAt = overrides.receivedAt ?? new Date(Date.UTC(2024, 4, 1, 8, sequence % 60)).toISOString();
  return {
    studentId,
    sourceId,
    receivedAt,
    fingerprint: fingerprintOf(sourceId, receivedAt),
    subject: 'Hello',
    from: 'someone@example.com',
    body: '',
    ...overrides,
  };
}

/**
 * Mailboxes held in memory. `failures` counts how many connects to reject per
 * student. Listing ignores abort signals, so a timed-out listing keeps its
 * session open until `listDelayMs` has passed.
 */
export class FakeMessageSource implements MessageSource {
  readonly mailboxes = new Map<string, RawMessage[]>();
  readonly failures = new Map<string, number>();
  readonly markedRead: string[] = [];
  /** Source ids whose full content was downloaded. */
  readonly downloaded: string[] = [];
  connects = 0;
  openSessions = 0;
  peakSessions = 0;
  listDelayMs = 0;
  /** When set, listing waits for it to settle. */
  gate: Promise<void> | undefined;

  deliver(message: RawMessage): void {
    const inbox = this.mailboxes.get(message.studentId) ?? [];
    inbox.push(message);
    this.mailboxes.set(message.studentId, inbox);
  }

  async connect(identity: Identity): Promise<MailboxSession> {
    this.connects += 1;
    const remainingFailures = this.failures.get(identity.studentId) ?? 0;
    if (remainingFailures > 0) {
      this.failures.set(identity.studentId, remainingFailures - 1);
      throw new Error(`connection refused for ${identity.studentId}`);
    }

    this.openSessions += 1;
    this.peakSessions = Math.max(this.peakSessions, this.openSessions);
    let open = true;

    return {
      listUnread: async () => {
        if (this.gate) {
          await this.gate;
        }
        if (this.listDelayMs > 0) {
          await new Promise((resolve) => setTimeout(resolve, this.listDelayMs));
        }
        return (this.mailboxes.get(identity.studentId) ?? []).map(
          ({ sourceId, receivedAt, fingerprint }): MessageRef => ({ sourceId, receivedAt, fingerprint })
        );
      },
      fetchMessages: async (refs) => {
        const inbox = this.mailboxes.get(identity.studentId) ?? [];
        const messages: RawMessage[] = [];
        for (const ref of refs) {
          const message = inbox.find((m) => m.sourceId === ref.sourceId);
          if (message) {
            this.downloaded.push(message.sourceId);
            messages.push(message);
          }
        }
        return messages;
      },
      markRead: async (message) => {
        this.markedRead.push(message.sourceId);
        const inbox = this.mailboxes.get(identity.studentId) ?? [];
        this.mailboxes.set(
          identity.studentId,
          inbox.filter((m) => m.sourceId !== message.sourceId)
        );
      },
      close: async () => {
        if (open) {
          open = false;
          this.openSessions -= 1;
        }
      },
    };
  }
}

/** Maps each message to an event with `decide`; records every batch it sees. */
export class ScriptedExtractor implements EventExtractor {
  readonly batches: string[][] = [];

  constructor(private readonly decide: (message: RawMessage) => ScheduleEvent) {}

  async extract(batch: RawMessage[]): Promise<ScheduleEvent[]> {
    this.batches.push(batch.map((m) => m.sourceId));
    return batch.map((message) => this.decide(message));
  }
}

export const CAMPUS_SLOTS = [
  { day: 'Mon' as const, start: '14:00', end: '15:00' },
  { day: 'Wed' as const, start: '09:00', end: '10:00' },
  { day: 'Wed' as const, start: '14:00', end: '15:00' },
  { day: 'Fri' as const, start: '14:00', end: '15:00', capacity: 2 },
];

/**
 * Three students enrolled in DBMS (Mon 09:00) and Operating Systems
 * (Wed 09:00), plus four weekly slots; slot ids follow CAMPUS_SLOTS order.
 */
export function seedCampus(db: DatabaseManager): void {
  for (const studentId of ['s1', 's2', 's3']) {
    const identity = makeIdentity(studentId);
    db.upsertStudent({
      student_id: studentId,
      name: `Student ${studentId}`,
      mailbox_address: identity.mailboxAddress,
      credentials_handle: identity.credentialsHandle,
    });
  }
  db.upsertSubject({ subject_id: 'CS301', subject_name: 'DBMS' });
  db.upsertSubject({ subject_id: 'CS302', subject_name: 'Operating Systems' });
  db.addSubjectSchedule('CS301', 'Mon', '09:00', '10:00');
  db.addSubjectSchedule('CS302', 'Wed', '09:00', '10:00');
  for (const studentId of ['s1', 's2', 's3']) {
    db.enrollStudent(studentId, 'CS301');
    db.enrollStudent(studentId, 'CS302');
  }
  db.seedWeeklySlots(CAMPUS_SLOTS);
}
