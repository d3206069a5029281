// ---------- Pipeline domain ----------

export interface Identity {
  studentId: string;
  mailboxAddress: string;
  credentialsHandle: string;
}

export interface RawMessage {
  studentId: string;
  sourceId: string;
  receivedAt: string;
  fingerprint: string;
  subject: string;
  from: string;
  body: string;
}

export type DriveStage = 'OA' | 'Interview';

export interface TimeWindow {
  start: string;
  end: string;
}

export interface InterviewEvent {
  kind: 'interview';
  company: string;
  datetime: string;
  stage: DriveStage;
  confidence: number;
}

export interface RescheduleEvent {
  kind: 'reschedule';
  subject: string;
  requestedWindow: TimeWindow;
  confidence: number;
}

export interface NoEvent {
  kind: 'none';
  reason?: string;
}

export type ScheduleEvent = InterviewEvent | RescheduleEvent | NoEvent;

export type Weekday = 'Mon' | 'Tue' | 'Wed' | 'Thu' | 'Fri' | 'Sat' | 'Sun';

export const WEEKDAYS: readonly Weekday[] = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'];

export interface WeeklySlot {
  id: number;
  day: Weekday;
  start: string;
  end: string;
  capacity?: number;
}

export interface WeeklyCommitment {
  day: Weekday;
  start: string;
  end: string;
}

export interface DatedCommitment {
  date: string;
  start: string;
  end: string;
}

export interface SlotLoad {
  slotId: number;
  date: string;
  students: number;
}

export interface SlotBookings {
  load: SlotLoad[];
  weeklyCommitments: WeeklyCommitment[];
  datedCommitments: DatedCommitment[];
}

export interface SlotState extends SlotBookings {
  weeklySlots: WeeklySlot[];
}

export interface SlotOccurrence {
  slot: WeeklySlot;
  date: string;
  start: string;
  end: string;
}

export type Allocation =
  | { ok: true; occurrence: SlotOccurrence; load: number; capacity: number }
  | { ok: false; reason: 'exhausted' };

// ---------- External capabilities ----------

/** An unread message as known from a metadata-only listing. */
export interface MessageRef {
  sourceId: string;
  receivedAt: string;
  fingerprint: string;
}

/**
 * Listing returns references only; bodies are downloaded with
 * `fetchMessages` for the references the caller has not seen before.
 */
export interface MailboxSession {
  listUnread(signal?: AbortSignal): Promise<MessageRef[]>;
  fetchMessages(refs: MessageRef[], signal?: AbortSignal): Promise<RawMessage[]>;
  markRead(message: RawMessage, signal?: AbortSignal): Promise<void>;
  close(): Promise<void>;
}

export interface MessageSource {
  connect(identity: Identity, signal?: AbortSignal): Promise<MailboxSession>;
}

export interface EventExtractor {
  extract(batch: RawMessage[], signal?: AbortSignal): Promise<ScheduleEvent[]>;
}

// ---------- Persistence rows ----------

export type RecordStatus = 'pending' | 'done';

export type RescheduleStatus = RecordStatus | 'superseded';

export type NotificationType = 'interview' | 'reschedule' | 'reschedule_unavailable';

export interface StudentRow {
  student_id: string;
  name: string | null;
  mailbox_address: string;
  credentials_handle: string;
}

export interface SubjectRow {
  subject_id: string;
  subject_name: string;
}

export interface CompanyDriveRow {
  record_id: number;
  student_id: string;
  company_name: string;
  company_key: string;
  drive_stage: DriveStage;
  drive_datetime: string;
  status: RecordStatus;
  source_fingerprint: string | null;
  created_at: string;
}

export interface RescheduledClassRow {
  reschedule_id: number;
  subject_id: string;
  slot_id: number;
  class_date: string;
  start_time: string;
  end_time: string;
  status: RescheduleStatus;
  created_at: string;
}

export interface AssignmentRow {
  reschedule_id: number;
  student_id: string;
  request_key: string;
  status: RecordStatus;
  assigned_at: string;
}

export interface AttendanceRow {
  attendance_id: number;
  student_id: string;
  schedule_id: number | null;
  reschedule_id: number | null;
  status: 'present' | 'absent';
}

export interface NotificationRow {
  notification_id: number;
  student_id: string;
  type: NotificationType;
  message: string;
  drive_id: number | null;
  reschedule_id: number | null;
  dedupe_key: string;
  created_at: string;
}

export interface NewCompanyDrive {
  studentId: string;
  companyName: string;
  companyKey: string;
  stage: DriveStage;
  driveDatetime: string;
  sourceFingerprint: string;
}

export interface NewRescheduledClass {
  subjectId: string;
  slotId: number;
  classDate: string;
  start: string;
  end: string;
}

export interface NewAssignment {
  rescheduleId: number;
  studentId: string;
  requestKey: string;
}

export interface NewNotification {
  studentId: string;
  type: NotificationType;
  message: string;
  driveId?: number;
  rescheduleId?: number;
  dedupeKey: string;
}

export interface UpsertResult {
  id: number;
  created: boolean;
}

export interface DriveKey {
  studentId: string;
  companyKey: string;
  driveDatetime: string;
}

export interface UnitOfWork {
  upsertCompanyDrive(drive: NewCompanyDrive): UpsertResult;
  upsertRescheduledClass(rescheduledClass: NewRescheduledClass): UpsertResult;
  assignStudent(assignment: NewAssignment): void;
  recordAttendance(studentId: string, rescheduleId: number): void;
  countOccurrenceLoad(slotId: number, classDate: string): number;
  insertNotification(notification: NewNotification): number;
}

export interface PersistenceGateway {
  listIdentities(): Promise<Identity[]>;
  findCompanyDrive(key: DriveKey): Promise<CompanyDriveRow | undefined>;
  findAssignment(studentId: string, requestKey: string): Promise<AssignmentRow | undefined>;
  resolveSubject(nameOrId: string): Promise<SubjectRow | undefined>;
  loadSlotState(studentId: string, subjectId: string, fromDate: string, toDate: string): Promise<SlotState>;
  listNotifications(studentId: string): Promise<NotificationRow[]>;
  transaction<T>(work: (uow: UnitOfWork) => T): Promise<T>;
}

// ---------- Outcomes & reports ----------

export type ReconciliationOutcome =
  | { kind: 'interview_recorded'; driveId: number; notificationId: number }
  | { kind: 'class_rescheduled'; rescheduleId: number; notificationId: number; classCreated: boolean }
  | { kind: 'no_slot'; subjectId: string; notificationId: number }
  | { kind: 'duplicate'; detail: string }
  | { kind: 'unknown_subject'; subject: string }
  | { kind: 'no_event'; reason?: string };

export type OutcomeKind = ReconciliationOutcome['kind'];

export interface MessageReport {
  fingerprint: string;
  receivedAt: string;
  event: ScheduleEvent['kind'];
  outcome?: OutcomeKind;
  error?: string;
}

export type IdentityStatus = 'succeeded' | 'failed' | 'skipped';

export interface IdentityReport {
  studentId: string;
  status: IdentityStatus;
  attempts: number;
  fetched: number;
  duplicates: number;
  extracted: number;
  messages: MessageReport[];
  error?: string;
}

export type RunStatus = 'idle' | 'running' | 'completed' | 'cancelled' | 'halted' | 'error';

export interface RunReport {
  runId: string;
  status: RunStatus;
  startedAt: string;
  completedAt: string | null;
  identities: IdentityReport[];
  totals: Record<OutcomeKind, number>;
  message?: string;
}
