import crypto from 'crypto';
import { DateTime } from 'luxon';
import { PersistenceConflictError, SlotFullError } from './errors';
import { logDebug, logInfo, logWarn } from './logger';
import { SlotAllocator, searchRange } from './slot-allocator';
import {
  InterviewEvent,
  NewCompanyDrive,
  NewNotification,
  NewRescheduledClass,
  PersistenceGateway,
  RawMessage,
  ReconciliationOutcome,
  RescheduleEvent,
  ScheduleEvent,
  SlotOccurrence,
} from './types';

const MAX_PLAN_ATTEMPTS = 3;

type NotificationDraft = Pick<NewNotification, 'studentId' | 'type' | 'message'>;

/**
 * The minimal set of writes one message needs. `noop` carries the outcome
 * directly; every other variant is applied as one transaction.
 */
export type WriteSet =
  | { kind: 'noop'; outcome: ReconciliationOutcome }
  | { kind: 'interview'; drive: NewCompanyDrive; notification: NotificationDraft }
  | {
      kind: 'reschedule';
      rescheduledClass: NewRescheduledClass;
      capacity: number;
      studentId: string;
      requestKey: string;
      notification: NotificationDraft;
    }
  | { kind: 'no_slot'; subjectId: string; notification: NewNotification };

export function companyKeyOf(company: string): string {
  return company.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function requestKeyOf(subjectId: string, start: string, end: string): string {
  return crypto.createHash('sha256').update(`${subjectId}|${start}|${end}`).digest('hex');
}

function toUtcInstant(value: string, timezone: string): string | null {
  const parsed = DateTime.fromISO(value, { zone: timezone });
  return parsed.isValid ? parsed.toUTC().toISO({ suppressMilliseconds: true }) : null;
}

export class ReconciliationEngine {
  constructor(
    private readonly gateway: PersistenceGateway,
    private readonly allocator: SlotAllocator,
    private readonly options: { timezone: string }
  ) {}

  /**
   * Plans and applies the writes for one message. A slot that fills up
   * between planning and writing is re-planned against the new load.
   */
  async reconcile(message: RawMessage, event: ScheduleEvent): Promise<ReconciliationOutcome> {
    for (let attempt = 1; ; attempt += 1) {
      const writeSet = await this.plan(message, event);
      try {
        return await this.apply(writeSet);
      } catch (error) {
        if (!(error instanceof SlotFullError) || attempt >= MAX_PLAN_ATTEMPTS) {
          throw error;
        }
        logInfo('Slot filled up before write, re-planning', {
          studentId: message.studentId,
          attempt,
          detail: error.message,
        });
      }
    }
  }

  async plan(message: RawMessage, event: ScheduleEvent): Promise<WriteSet> {
    switch (event.kind) {
      case 'none':
        return { kind: 'noop', outcome: { kind: 'no_event', reason: event.reason } };
      case 'interview':
        return this.planInterview(message, event);
      case 'reschedule':
        return this.planReschedule(message, event);
    }
  }

  async apply(writeSet: WriteSet): Promise<ReconciliationOutcome> {
    try {
      return await this.applyInTransaction(writeSet);
    } catch (error) {
      if (error instanceof PersistenceConflictError) {
        logInfo('Idempotence key already present, treating as processed', {
          writeSet: writeSet.kind,
          detail: error.message,
        });
        return { kind: 'duplicate', detail: error.message };
      }
      throw error;
    }
  }

  private async planInterview(message: RawMessage, event: InterviewEvent): Promise<WriteSet> {
    const driveDatetime = toUtcInstant(event.datetime, this.options.timezone);
    if (!driveDatetime) {
      return { kind: 'noop', outcome: { kind: 'no_event', reason: `invalid interview datetime ${event.datetime}` } };
    }

    const companyKey = companyKeyOf(event.company);
    const existing = await this.gateway.findCompanyDrive({
      studentId: message.studentId,
      companyKey,
      driveDatetime,
    });
    if (existing) {
      return {
        kind: 'noop',
        outcome: { kind: 'duplicate', detail: `company drive ${existing.record_id} already recorded` },
      };
    }

    return {
      kind: 'interview',
      drive: {
        studentId: message.studentId,
        companyName: event.company.trim(),
        companyKey,
        stage: event.stage,
        driveDatetime,
        sourceFingerprint: message.fingerprint,
      },
      notification: {
        studentId: message.studentId,
        type: 'interview',
        message: `Upcoming ${event.stage} at ${event.company.trim()} on ${this.formatInstant(driveDatetime)}`,
      },
    };
  }

  private async planReschedule(message: RawMessage, event: RescheduleEvent): Promise<WriteSet> {
    const subject = await this.gateway.resolveSubject(event.subject);
    if (!subject) {
      logWarn('Reschedule for unknown subject', { studentId: message.studentId, subject: event.subject });
      return { kind: 'noop', outcome: { kind: 'unknown_subject', subject: event.subject } };
    }

    const start = toUtcInstant(event.requestedWindow.start, this.options.timezone);
    const end = toUtcInstant(event.requestedWindow.end, this.options.timezone);
    if (!start || !end || end <= start) {
      return { kind: 'noop', outcome: { kind: 'no_event', reason: 'invalid reschedule window' } };
    }

    const requestKey = requestKeyOf(subject.subject_id, start, end);
    const assigned = await this.gateway.findAssignment(message.studentId, requestKey);
    if (assigned) {
      return {
        kind: 'noop',
        outcome: { kind: 'duplicate', detail: `already assigned to rescheduled class ${assigned.reschedule_id}` },
      };
    }

    const window = { start, end };
    const range = searchRange(window, this.options.timezone);
    const state = await this.gateway.loadSlotState(message.studentId, subject.subject_id, range.from, range.to);
    const allocation = this.allocator.allocate(subject.subject_id, window, state);

    if (!allocation.ok) {
      logWarn('No slot available for reschedule', {
        studentId: message.studentId,
        subject: subject.subject_id,
        window,
      });
      return {
        kind: 'no_slot',
        subjectId: subject.subject_id,
        notification: {
          studentId: message.studentId,
          type: 'reschedule_unavailable',
          message: `No free slot found to reschedule ${subject.subject_name} near ${this.formatWindow(start, end)}; manual scheduling needed`,
          dedupeKey: `no-slot:${message.studentId}:${requestKey}`,
        },
      };
    }

    const occurrence = allocation.occurrence;
    logDebug('Slot allocated', {
      studentId: message.studentId,
      subject: subject.subject_id,
      slotId: occurrence.slot.id,
      date: occurrence.date,
      load: allocation.load,
    });

    return {
      kind: 'reschedule',
      rescheduledClass: {
        subjectId: subject.subject_id,
        slotId: occurrence.slot.id,
        classDate: occurrence.date,
        start: occurrence.start,
        end: occurrence.end,
      },
      capacity: allocation.capacity,
      studentId: message.studentId,
      requestKey,
      notification: {
        studentId: message.studentId,
        type: 'reschedule',
        message: `Your ${subject.subject_name} class has been rescheduled to ${this.formatOccurrence(occurrence)}`,
      },
    };
  }

  private async applyInTransaction(writeSet: WriteSet): Promise<ReconciliationOutcome> {
    switch (writeSet.kind) {
      case 'noop':
        return writeSet.outcome;

      case 'interview':
        return this.gateway.transaction((uow): ReconciliationOutcome => {
          const drive = uow.upsertCompanyDrive(writeSet.drive);
          if (!drive.created) {
            throw new PersistenceConflictError(`company drive ${drive.id} already recorded`);
          }
          const notificationId = uow.insertNotification({
            ...writeSet.notification,
            driveId: drive.id,
            dedupeKey: `drive:${drive.id}`,
          });
          return { kind: 'interview_recorded', driveId: drive.id, notificationId };
        });

      case 'reschedule':
        return this.gateway.transaction((uow): ReconciliationOutcome => {
          const { slotId, classDate } = writeSet.rescheduledClass;
          const load = uow.countOccurrenceLoad(slotId, classDate);
          if (load >= writeSet.capacity) {
            throw new SlotFullError(`slot ${slotId} on ${classDate} is full (${load}/${writeSet.capacity})`);
          }
          const rescheduled = uow.upsertRescheduledClass(writeSet.rescheduledClass);
          uow.assignStudent({
            rescheduleId: rescheduled.id,
            studentId: writeSet.studentId,
            requestKey: writeSet.requestKey,
          });
          uow.recordAttendance(writeSet.studentId, rescheduled.id);
          const notificationId = uow.insertNotification({
            ...writeSet.notification,
            rescheduleId: rescheduled.id,
            dedupeKey: `reschedule:${rescheduled.id}:${writeSet.studentId}`,
          });
          return {
            kind: 'class_rescheduled',
            rescheduleId: rescheduled.id,
            notificationId,
            classCreated: rescheduled.created,
          };
        });

      case 'no_slot':
        return this.gateway.transaction((uow): ReconciliationOutcome => {
          const notificationId = uow.insertNotification(writeSet.notification);
          return { kind: 'no_slot', subjectId: writeSet.subjectId, notificationId };
        });
    }
  }

  private formatInstant(iso: string): string {
    return DateTime.fromISO(iso, { zone: 'utc' }).setZone(this.options.timezone).toFormat('yyyy-MM-dd HH:mm');
  }

  private formatWindow(start: string, end: string): string {
    const from = DateTime.fromISO(start, { zone: 'utc' }).setZone(this.options.timezone);
    const to = DateTime.fromISO(end, { zone: 'utc' }).setZone(this.options.timezone);
    return `${from.toFormat('ccc yyyy-MM-dd HH:mm', { locale: 'en-US' })}-${to.toFormat('HH:mm')}`;
  }

  private formatOccurrence(occurrence: SlotOccurrence): string {
    return `${occurrence.slot.day} ${occurrence.date} ${occurrence.start}-${occurrence.end}`;
  }
}
