import fs from 'fs';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { PersistenceConflictError, PersistenceUnavailableError } from './errors';
import {
  AssignmentRow,
  AttendanceRow,
  CompanyDriveRow,
  DatedCommitment,
  DriveKey,
  Identity,
  NewAssignment,
  NewCompanyDrive,
  NewNotification,
  NewRescheduledClass,
  NotificationRow,
  PersistenceGateway,
  RescheduledClassRow,
  SlotLoad,
  SlotState,
  StudentRow,
  SubjectRow,
  UnitOfWork,
  UpsertResult,
  WEEKDAYS,
  Weekday,
  WeeklyCommitment,
  WeeklySlot,
} from './types';

const UNAVAILABLE_CODES = ['SQLITE_CANTOPEN', 'SQLITE_IOERR', 'SQLITE_FULL', 'SQLITE_READONLY', 'SQLITE_NOTADB', 'SQLITE_CORRUPT'];

const CONFLICT_CODES = ['SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY'];

const weeklySlotTemplateSchema = z.array(
  z.object({
    day: z.enum(['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun']),
    start: z.string().regex(/^\d{2}:\d{2}$/),
    end: z.string().regex(/^\d{2}:\d{2}$/),
    capacity: z.number().int().positive().optional(),
  })
);

export type WeeklySlotTemplate = z.infer<typeof weeklySlotTemplateSchema>;

export function readWeeklySlotTemplate(filePath: string): WeeklySlotTemplate {
  return weeklySlotTemplateSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
}

function sqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isWeekday(value: string): value is Weekday {
  return WEEKDAYS.some((day) => day === value);
}

function toWeekday(value: string): Weekday {
  if (!isWeekday(value)) {
    throw new Error(`Unknown weekday "${value}" in schedule table`);
  }
  return value;
}

export interface ScheduleStats {
  students: number;
  company_drives: number;
  rescheduled_classes: number;
  assignments: number;
  notifications: number;
  pending_manual_reschedules: number;
}

interface SlotRow {
  slot_id: number;
  day: string;
  start_time: string;
  end_time: string;
  capacity: number | null;
}

interface TimeRow {
  day: string;
  start_time: string;
  end_time: string;
}

export class DatabaseManager implements PersistenceGateway {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma('foreign_keys = ON');
    this.initDatabase();
  }

  private initDatabase(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS students (
        student_id TEXT PRIMARY KEY,
        name TEXT,
        mailbox_address TEXT,
        credentials_handle TEXT
      );

      CREATE TABLE IF NOT EXISTS subjects (
        subject_id TEXT PRIMARY KEY,
        subject_name TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS subject_schedule (
        schedule_id INTEGER PRIMARY KEY AUTOINCREMENT,
        subject_id TEXT NOT NULL REFERENCES subjects(subject_id),
        day TEXT NOT NULL,
        start_time TEXT NOT NULL,
        end_time TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS student_subject (
        student_id TEXT NOT NULL REFERENCES students(student_id),
        subject_id TEXT NOT NULL REFERENCES subjects(subject_id),
        PRIMARY KEY (student_id, subject_id)
      );

      CREATE TABLE IF NOT EXISTS weekly_slots (
        slot_id INTEGER PRIMARY KEY AUTOINCREMENT,
        day TEXT NOT NULL,
        start_time TEXT NOT NULL,
        end_time TEXT NOT NULL,
        capacity INTEGER
      );

      CREATE TABLE IF NOT EXISTS company_drives (
        record_id INTEGER PRIMARY KEY AUTOINCREMENT,
        student_id TEXT NOT NULL REFERENCES students(student_id),
        company_name TEXT NOT NULL,
        company_key TEXT NOT NULL,
        drive_stage TEXT NOT NULL CHECK (drive_stage IN ('OA', 'Interview')),
        drive_datetime TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'done')),
        source_fingerprint TEXT,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        UNIQUE (student_id, company_key, drive_datetime)
      );

      CREATE TABLE IF NOT EXISTS rescheduled_classes (
        reschedule_id INTEGER PRIMARY KEY AUTOINCREMENT,
        subject_id TEXT NOT NULL REFERENCES subjects(subject_id),
        slot_id INTEGER NOT NULL REFERENCES weekly_slots(slot_id),
        class_date TEXT NOT NULL,
        start_time TEXT NOT NULL,
        end_time TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'done', 'superseded')),
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        UNIQUE (subject_id, slot_id, class_date)
      );

      CREATE TABLE IF NOT EXISTS rescheduled_class_students (
        reschedule_id INTEGER NOT NULL REFERENCES rescheduled_classes(reschedule_id),
        student_id TEXT NOT NULL REFERENCES students(student_id),
        request_key TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'done')),
        assigned_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        PRIMARY KEY (reschedule_id, student_id),
        UNIQUE (student_id, request_key)
      );

      CREATE TABLE IF NOT EXISTS attendance (
        attendance_id INTEGER PRIMARY KEY AUTOINCREMENT,
        student_id TEXT NOT NULL REFERENCES students(student_id),
        schedule_id INTEGER REFERENCES subject_schedule(schedule_id),
        reschedule_id INTEGER REFERENCES rescheduled_classes(reschedule_id),
        status TEXT NOT NULL CHECK (status IN ('present', 'absent'))
      );

      CREATE TABLE IF NOT EXISTS notifications (
        notification_id INTEGER PRIMARY KEY AUTOINCREMENT,
        student_id TEXT NOT NULL REFERENCES students(student_id),
        type TEXT NOT NULL CHECK (type IN ('interview', 'reschedule', 'reschedule_unavailable')),
        message TEXT NOT NULL,
        drive_id INTEGER REFERENCES company_drives(record_id),
        reschedule_id INTEGER REFERENCES rescheduled_classes(reschedule_id),
        dedupe_key TEXT UNIQUE NOT NULL,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      );

      CREATE INDEX IF NOT EXISTS idx_notifications_student ON notifications(student_id, created_at);
      CREATE INDEX IF NOT EXISTS idx_rescheduled_date ON rescheduled_classes(class_date);
      CREATE INDEX IF NOT EXISTS idx_assignments_student ON rescheduled_class_students(student_id);
    `);
  }

  /** Runs `operation`, mapping SQLite failures onto the pipeline's error taxonomy. */
  private guard<T>(operation: () => T): T {
    if (!this.db.open) {
      throw new PersistenceUnavailableError('Database connection is closed');
    }
    try {
      return operation();
    } catch (error) {
      const code = sqliteCode(error);
      if (code && CONFLICT_CODES.includes(code)) {
        throw new PersistenceConflictError(error instanceof Error ? error.message : code, { cause: error });
      }
      if (code && UNAVAILABLE_CODES.some((prefix) => code.startsWith(prefix))) {
        throw new PersistenceUnavailableError(error instanceof Error ? error.message : code, { cause: error });
      }
      throw error;
    }
  }

  // ---------- Reference data ----------

  upsertStudent(student: StudentRow): void {
    this.db
      .prepare(
        `INSERT INTO students (student_id, name, mailbox_address, credentials_handle)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(student_id) DO UPDATE SET
           name = excluded.name,
           mailbox_address = excluded.mailbox_address,
           credentials_handle = excluded.credentials_handle`
      )
      .run(student.student_id, student.name, student.mailbox_address, student.credentials_handle);
  }

  upsertSubject(subject: SubjectRow): void {
    this.db
      .prepare(
        `INSERT INTO subjects (subject_id, subject_name) VALUES (?, ?)
         ON CONFLICT(subject_id) DO UPDATE SET subject_name = excluded.subject_name`
      )
      .run(subject.subject_id, subject.subject_name);
  }

  addSubjectSchedule(subjectId: string, day: Weekday, start: string, end: string): number {
    const result = this.db
      .prepare('INSERT INTO subject_schedule (subject_id, day, start_time, end_time) VALUES (?, ?, ?, ?)')
      .run(subjectId, day, start, end);
    return Number(result.lastInsertRowid);
  }

  enrollStudent(studentId: string, subjectId: string): void {
    this.db
      .prepare('INSERT OR IGNORE INTO student_subject (student_id, subject_id) VALUES (?, ?)')
      .run(studentId, subjectId);
  }

  /** Inserts the template only when no weekly slots exist yet. Returns the number inserted. */
  seedWeeklySlots(template: WeeklySlotTemplate): number {
    const existing = this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM weekly_slots').get();
    if (existing && existing.count > 0) {
      return 0;
    }

    const stmt = this.db.prepare('INSERT INTO weekly_slots (day, start_time, end_time, capacity) VALUES (?, ?, ?, ?)');
    const insert = this.db.transaction((slots: WeeklySlotTemplate) => {
      for (const slot of slots) {
        stmt.run(slot.day, slot.start, slot.end, slot.capacity ?? null);
      }
    });
    insert(template);
    return template.length;
  }

  listWeeklySlots(): WeeklySlot[] {
    const rows = this.db
      .prepare<[], SlotRow>('SELECT slot_id, day, start_time, end_time, capacity FROM weekly_slots ORDER BY slot_id')
      .all();
    return rows.map((row) => ({
      id: row.slot_id,
      day: toWeekday(row.day),
      start: row.start_time,
      end: row.end_time,
      ...(row.capacity !== null ? { capacity: row.capacity } : {}),
    }));
  }

  // ---------- PersistenceGateway reads ----------

  async listIdentities(): Promise<Identity[]> {
    return this.guard(() =>
      this.db
        .prepare<[], StudentRow>(
          `SELECT * FROM students
           WHERE mailbox_address IS NOT NULL AND credentials_handle IS NOT NULL
           ORDER BY student_id`
        )
        .all()
        .map((row) => ({
          studentId: row.student_id,
          mailboxAddress: row.mailbox_address,
          credentialsHandle: row.credentials_handle,
        }))
    );
  }

  async findCompanyDrive(key: DriveKey): Promise<CompanyDriveRow | undefined> {
    return this.guard(() =>
      this.db
        .prepare<[string, string, string], CompanyDriveRow>(
          `SELECT * FROM company_drives
           WHERE student_id = ? AND company_key = ? AND drive_datetime = ?`
        )
        .get(key.studentId, key.companyKey, key.driveDatetime)
    );
  }

  async findAssignment(studentId: string, requestKey: string): Promise<AssignmentRow | undefined> {
    return this.guard(() =>
      this.db
        .prepare<[string, string], AssignmentRow>(
          'SELECT * FROM rescheduled_class_students WHERE student_id = ? AND request_key = ?'
        )
        .get(studentId, requestKey)
    );
  }

  async resolveSubject(nameOrId: string): Promise<SubjectRow | undefined> {
    const needle = nameOrId.trim();
    return this.guard(() =>
      this.db
        .prepare<[string, string], SubjectRow>(
          `SELECT * FROM subjects
           WHERE subject_id = ? COLLATE NOCASE OR subject_name = ? COLLATE NOCASE
           ORDER BY subject_id
           LIMIT 1`
        )
        .get(needle, needle)
    );
  }

  async loadSlotState(studentId: string, subjectId: string, fromDate: string, toDate: string): Promise<SlotState> {
    return this.guard(() => {
      const weeklySlots = this.listWeeklySlots();

      const load = this.db
        .prepare<[string, string], { slot_id: number; class_date: string; students: number }>(
          `SELECT rc.slot_id, rc.class_date, COUNT(rcs.student_id) as students
           FROM rescheduled_classes rc
           LEFT JOIN rescheduled_class_students rcs ON rcs.reschedule_id = rc.reschedule_id
           WHERE rc.class_date BETWEEN ? AND ? AND rc.status != 'superseded'
           GROUP BY rc.slot_id, rc.class_date`
        )
        .all(fromDate, toDate)
        .map((row): SlotLoad => ({ slotId: row.slot_id, date: row.class_date, students: row.students }));

      // the class being moved does not block its own replacement
      const weeklyCommitments = this.db
        .prepare<[string, string], TimeRow>(
          `SELECT ss.day, ss.start_time, ss.end_time
           FROM subject_schedule ss
           JOIN student_subject st ON st.subject_id = ss.subject_id
           WHERE st.student_id = ? AND ss.subject_id != ?`
        )
        .all(studentId, subjectId)
        .map((row): WeeklyCommitment => ({ day: toWeekday(row.day), start: row.start_time, end: row.end_time }));

      const datedCommitments = this.db
        .prepare<[string, string, string], { class_date: string; start_time: string; end_time: string }>(
          `SELECT rc.class_date, rc.start_time, rc.end_time
           FROM rescheduled_classes rc
           JOIN rescheduled_class_students rcs ON rcs.reschedule_id = rc.reschedule_id
           WHERE rcs.student_id = ? AND rc.class_date BETWEEN ? AND ? AND rc.status != 'superseded'`
        )
        .all(studentId, fromDate, toDate)
        .map((row): DatedCommitment => ({ date: row.class_date, start: row.start_time, end: row.end_time }));

      return { weeklySlots, load, weeklyCommitments, datedCommitments };
    });
  }

  async listNotifications(studentId: string): Promise<NotificationRow[]> {
    return this.guard(() =>
      this.db
        .prepare<[string], NotificationRow>(
          `SELECT * FROM notifications
           WHERE student_id = ?
           ORDER BY created_at DESC, notification_id DESC`
        )
        .all(studentId)
    );
  }

  // ---------- Writes ----------

  async transaction<T>(work: (uow: UnitOfWork) => T): Promise<T> {
    return this.guard(() => {
      const run = this.db.transaction(() => work(this.unitOfWork()));
      return run();
    });
  }

  private unitOfWork(): UnitOfWork {
    return {
      upsertCompanyDrive: (drive) => this.upsertCompanyDrive(drive),
      upsertRescheduledClass: (rescheduledClass) => this.upsertRescheduledClass(rescheduledClass),
      assignStudent: (assignment) => this.assignStudent(assignment),
      recordAttendance: (studentId, rescheduleId) => this.recordAttendance(studentId, rescheduleId),
      countOccurrenceLoad: (slotId, classDate) => this.countOccurrenceLoad(slotId, classDate),
      insertNotification: (notification) => this.insertNotification(notification),
    };
  }

  upsertCompanyDrive(drive: NewCompanyDrive): UpsertResult {
    const result = this.db
      .prepare(
        `INSERT INTO company_drives
         (student_id, company_name, company_key, drive_stage, drive_datetime, source_fingerprint)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(student_id, company_key, drive_datetime) DO NOTHING`
      )
      .run(drive.studentId, drive.companyName, drive.companyKey, drive.stage, drive.driveDatetime, drive.sourceFingerprint);

    if (result.changes > 0) {
      return { id: Number(result.lastInsertRowid), created: true };
    }
    const existing = this.db
      .prepare<[string, string, string], { record_id: number }>(
        'SELECT record_id FROM company_drives WHERE student_id = ? AND company_key = ? AND drive_datetime = ?'
      )
      .get(drive.studentId, drive.companyKey, drive.driveDatetime);
    if (!existing) {
      throw new Error(`Company drive for ${drive.studentId}/${drive.companyKey} vanished during upsert`);
    }
    return { id: existing.record_id, created: false };
  }

  upsertRescheduledClass(rescheduledClass: NewRescheduledClass): UpsertResult {
    const { subjectId, slotId, classDate, start, end } = rescheduledClass;
    const result = this.db
      .prepare(
        `INSERT INTO rescheduled_classes (subject_id, slot_id, class_date, start_time, end_time)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(subject_id, slot_id, class_date) DO NOTHING`
      )
      .run(subjectId, slotId, classDate, start, end);

    if (result.changes > 0) {
      return { id: Number(result.lastInsertRowid), created: true };
    }
    const existing = this.db
      .prepare<[string, number, string], { reschedule_id: number }>(
        'SELECT reschedule_id FROM rescheduled_classes WHERE subject_id = ? AND slot_id = ? AND class_date = ?'
      )
      .get(subjectId, slotId, classDate);
    if (!existing) {
      throw new Error(`Rescheduled class ${subjectId}@${classDate} vanished during upsert`);
    }
    return { id: existing.reschedule_id, created: false };
  }

  countOccurrenceLoad(slotId: number, classDate: string): number {
    const row = this.db
      .prepare<[number, string], { students: number }>(
        `SELECT COUNT(rcs.student_id) as students
         FROM rescheduled_classes rc
         JOIN rescheduled_class_students rcs ON rcs.reschedule_id = rc.reschedule_id
         WHERE rc.slot_id = ? AND rc.class_date = ? AND rc.status != 'superseded'`
      )
      .get(slotId, classDate);
    return row?.students ?? 0;
  }

  assignStudent(assignment: NewAssignment): void {
    this.db
      .prepare('INSERT INTO rescheduled_class_students (reschedule_id, student_id, request_key) VALUES (?, ?, ?)')
      .run(assignment.rescheduleId, assignment.studentId, assignment.requestKey);
  }

  recordAttendance(studentId: string, rescheduleId: number): void {
    this.db
      .prepare(`INSERT INTO attendance (student_id, schedule_id, reschedule_id, status) VALUES (?, NULL, ?, 'absent')`)
      .run(studentId, rescheduleId);
  }

  insertNotification(notification: NewNotification): number {
    const result = this.db
      .prepare(
        `INSERT INTO notifications (student_id, type, message, drive_id, reschedule_id, dedupe_key)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(
        notification.studentId,
        notification.type,
        notification.message,
        notification.driveId ?? null,
        notification.rescheduleId ?? null,
        notification.dedupeKey
      );
    return Number(result.lastInsertRowid);
  }

  // ---------- Read models ----------

  listCompanyDrives(studentId: string): CompanyDriveRow[] {
    return this.db
      .prepare<[string], CompanyDriveRow>('SELECT * FROM company_drives WHERE student_id = ? ORDER BY drive_datetime')
      .all(studentId);
  }

  listRescheduledClasses(subjectId?: string): RescheduledClassRow[] {
    if (subjectId) {
      return this.db
        .prepare<[string], RescheduledClassRow>(
          'SELECT * FROM rescheduled_classes WHERE subject_id = ? ORDER BY class_date, start_time'
        )
        .all(subjectId);
    }
    return this.db
      .prepare<[], RescheduledClassRow>('SELECT * FROM rescheduled_classes ORDER BY class_date, start_time')
      .all();
  }

  listAssignments(rescheduleId: number): AssignmentRow[] {
    return this.db
      .prepare<[number], AssignmentRow>(
        'SELECT * FROM rescheduled_class_students WHERE reschedule_id = ? ORDER BY student_id'
      )
      .all(rescheduleId);
  }

  listAttendance(studentId: string): AttendanceRow[] {
    return this.db
      .prepare<[string], AttendanceRow>('SELECT * FROM attendance WHERE student_id = ? ORDER BY attendance_id')
      .all(studentId);
  }

  countRows(table: 'company_drives' | 'rescheduled_classes' | 'rescheduled_class_students' | 'notifications' | 'students'): number {
    const result = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`).get();
    return result ? result.count : 0;
  }

  getStats(): ScheduleStats {
    const manual = this.db
      .prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM notifications WHERE type = 'reschedule_unavailable'`)
      .get();
    return {
      students: this.countRows('students'),
      company_drives: this.countRows('company_drives'),
      rescheduled_classes: this.countRows('rescheduled_classes'),
      assignments: this.countRows('rescheduled_class_students'),
      notifications: this.countRows('notifications'),
      pending_manual_reschedules: manual ? manual.count : 0,
    };
  }

  close(): void {
    this.db.close();
  }
}
