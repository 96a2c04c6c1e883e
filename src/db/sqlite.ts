import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import {
  Appointment,
  AppointmentStatus,
  AvailabilityException,
  AvailabilityExceptionKind,
  AvailabilityRule,
  IdempotencyRecord,
  Interval,
} from '../types/index.js';
import { CommitOutcome, SchedulingStore, TransientStoreError } from '../scheduling/store.js';

export type SqliteDatabase = Database.Database;

export interface OpenDatabaseOptions {
  /** How long a writer waits for the lock before SQLITE_BUSY. */
  busyTimeoutMs: number;
}

const OVERLAP_MESSAGE = 'APPOINTMENT_OVERLAP';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS appointments (
    id TEXT PRIMARY KEY,
    veterinarian_id TEXT NOT NULL,
    pet_id TEXT NOT NULL,
    start_at TEXT NOT NULL,
    end_at TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'scheduled',
    version INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    CHECK (start_at < end_at)
  );

  CREATE INDEX IF NOT EXISTS idx_appointments_vet_timeline
  ON appointments(veterinarian_id, status, start_at);

  CREATE TRIGGER IF NOT EXISTS appointments_no_overlap_insert
  BEFORE INSERT ON appointments
  WHEN NEW.status = 'scheduled' AND EXISTS (
    SELECT 1 FROM appointments
    WHERE veterinarian_id = NEW.veterinarian_id
      AND status = 'scheduled'
      AND start_at < NEW.end_at
      AND NEW.start_at < end_at
  )
  BEGIN
    SELECT RAISE(ABORT, '${OVERLAP_MESSAGE}');
  END;

  CREATE TRIGGER IF NOT EXISTS appointments_no_overlap_update
  BEFORE UPDATE OF start_at, end_at, status ON appointments
  WHEN NEW.status = 'scheduled' AND EXISTS (
    SELECT 1 FROM appointments
    WHERE id <> NEW.id
      AND veterinarian_id = NEW.veterinarian_id
      AND status = 'scheduled'
      AND start_at < NEW.end_at
      AND NEW.start_at < end_at
  )
  BEGIN
    SELECT RAISE(ABORT, '${OVERLAP_MESSAGE}');
  END;

  CREATE TABLE IF NOT EXISTS availability_rules (
    id TEXT PRIMARY KEY,
    veterinarian_id TEXT NOT NULL,
    day_of_week INTEGER NOT NULL CHECK (day_of_week BETWEEN 0 AND 6),
    start_time TEXT NOT NULL,
    end_time TEXT NOT NULL,
    effective_from TEXT NOT NULL,
    effective_until TEXT,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_rules_vet ON availability_rules(veterinarian_id);

  CREATE TABLE IF NOT EXISTS availability_exceptions (
    id TEXT PRIMARY KEY,
    veterinarian_id TEXT NOT NULL,
    date TEXT NOT NULL,
    kind TEXT NOT NULL CHECK (kind IN ('added', 'removed')),
    start_time TEXT NOT NULL,
    end_time TEXT NOT NULL,
    reason TEXT,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_exceptions_vet_date ON availability_exceptions(veterinarian_id, date);

  CREATE TABLE IF NOT EXISTS idempotency_keys (
    idempotency_key TEXT PRIMARY KEY,
    request_hash TEXT NOT NULL,
    response_status INTEGER NOT NULL,
    response_body TEXT NOT NULL,
    created_at TEXT DEFAULT CURRENT_TIMESTAMP
  );

  CREATE INDEX IF NOT EXISTS idx_idempotency_created ON idempotency_keys(created_at);
`;

export function openDatabase(filename: string, options: OpenDatabaseOptions): SqliteDatabase {
  if (filename !== ':memory:') {
    const dataDir = path.dirname(filename);
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  const db = new Database(filename, { timeout: options.busyTimeoutMs });
  db.pragma('journal_mode = WAL');
  db.exec(SCHEMA);
  return db;
}

interface AppointmentRow {
  id: string;
  veterinarian_id: string;
  pet_id: string;
  start_at: string;
  end_at: string;
  status: string;
  version: number;
  created_at: string;
  updated_at: string;
}

interface RuleRow {
  id: string;
  veterinarian_id: string;
  day_of_week: number;
  start_time: string;
  end_time: string;
  effective_from: string;
  effective_until: string | null;
  created_at: string;
}

interface ExceptionRow {
  id: string;
  veterinarian_id: string;
  date: string;
  kind: string;
  start_time: string;
  end_time: string;
  reason: string | null;
  created_at: string;
}

const STATUSES: readonly AppointmentStatus[] = ['scheduled', 'completed', 'cancelled', 'no_show'];
const EXCEPTION_KINDS: readonly AvailabilityExceptionKind[] = ['added', 'removed'];

function parseStatus(value: string): AppointmentStatus {
  const status = STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new Error(`Unknown appointment status in storage: ${value}`);
  }
  return status;
}

function parseExceptionKind(value: string): AvailabilityExceptionKind {
  const kind = EXCEPTION_KINDS.find((candidate) => candidate === value);
  if (!kind) {
    throw new Error(`Unknown availability exception kind in storage: ${value}`);
  }
  return kind;
}

function toAppointment(row: AppointmentRow): Appointment {
  return {
    id: row.id,
    veterinarianId: row.veterinarian_id,
    petId: row.pet_id,
    start: new Date(row.start_at),
    end: new Date(row.end_at),
    status: parseStatus(row.status),
    version: row.version,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function toAppointmentRow(appointment: Appointment): AppointmentRow {
  return {
    id: appointment.id,
    veterinarian_id: appointment.veterinarianId,
    pet_id: appointment.petId,
    start_at: appointment.start.toISOString(),
    end_at: appointment.end.toISOString(),
    status: appointment.status,
    version: appointment.version,
    created_at: appointment.createdAt.toISOString(),
    updated_at: appointment.updatedAt.toISOString(),
  };
}

function toRule(row: RuleRow): AvailabilityRule {
  return {
    id: row.id,
    veterinarianId: row.veterinarian_id,
    dayOfWeek: row.day_of_week,
    startTime: row.start_time,
    endTime: row.end_time,
    effectiveFrom: row.effective_from,
    effectiveUntil: row.effective_until,
    createdAt: new Date(row.created_at),
  };
}

function toException(row: ExceptionRow): AvailabilityException {
  return {
    id: row.id,
    veterinarianId: row.veterinarian_id,
    date: row.date,
    kind: parseExceptionKind(row.kind),
    startTime: row.start_time,
    endTime: row.end_time,
    reason: row.reason,
    createdAt: new Date(row.created_at),
  };
}

function isOverlapViolation(error: unknown): boolean {
  return error instanceof Database.SqliteError && error.message.includes(OVERLAP_MESSAGE);
}

function isBusy(error: unknown): boolean {
  return (
    error instanceof Database.SqliteError &&
    (error.code.startsWith('SQLITE_BUSY') || error.code.startsWith('SQLITE_LOCKED'))
  );
}

function prepareStatements(db: SqliteDatabase) {
  return {
    getAppointmentById: db.prepare<[string], AppointmentRow>(`
      SELECT * FROM appointments WHERE id = ?
    `),

    findScheduledOverlap: db.prepare<[string, string, string, string], AppointmentRow>(`
      SELECT * FROM appointments
      WHERE veterinarian_id = ?
        AND status = 'scheduled'
        AND start_at < ?
        AND end_at > ?
        AND id <> ?
      ORDER BY start_at
    `),

    insertAppointment: db.prepare<AppointmentRow>(`
      INSERT INTO appointments (id, veterinarian_id, pet_id, start_at, end_at, status, version, created_at, updated_at)
      VALUES (@id, @veterinarian_id, @pet_id, @start_at, @end_at, @status, @version, @created_at, @updated_at)
    `),

    updateAppointment: db.prepare<[string, string, string, number, string, string, number]>(`
      UPDATE appointments
      SET start_at = ?, end_at = ?, status = ?, version = ?, updated_at = ?
      WHERE id = ? AND version = ?
    `),

    getRulesByVet: db.prepare<[string], RuleRow>(`
      SELECT * FROM availability_rules WHERE veterinarian_id = ? ORDER BY day_of_week, start_time
    `),

    insertRule: db.prepare<RuleRow>(`
      INSERT INTO availability_rules (id, veterinarian_id, day_of_week, start_time, end_time, effective_from, effective_until, created_at)
      VALUES (@id, @veterinarian_id, @day_of_week, @start_time, @end_time, @effective_from, @effective_until, @created_at)
    `),

    deleteRule: db.prepare<[string, string]>(`
      DELETE FROM availability_rules WHERE id = ? AND veterinarian_id = ?
    `),

    getExceptionsByVet: db.prepare<[string, string, string], ExceptionRow>(`
      SELECT * FROM availability_exceptions
      WHERE veterinarian_id = ? AND date BETWEEN ? AND ?
      ORDER BY date, start_time
    `),

    insertException: db.prepare<ExceptionRow>(`
      INSERT INTO availability_exceptions (id, veterinarian_id, date, kind, start_time, end_time, reason, created_at)
      VALUES (@id, @veterinarian_id, @date, @kind, @start_time, @end_time, @reason, @created_at)
    `),

    deleteException: db.prepare<[string, string]>(`
      DELETE FROM availability_exceptions WHERE id = ? AND veterinarian_id = ?
    `),

    getIdempotencyKey: db.prepare<[string], IdempotencyRecord>(`
      SELECT * FROM idempotency_keys WHERE idempotency_key = ?
    `),

    insertIdempotencyKey: db.prepare<[string, string, number, string]>(`
      INSERT OR IGNORE INTO idempotency_keys (idempotency_key, request_hash, response_status, response_body)
      VALUES (?, ?, ?, ?)
    `),
  };
}

type Statements = ReturnType<typeof prepareStatements>;

/**
 * SQLite implementation of the scheduling port.
 *
 * Conditional writes run in `BEGIN IMMEDIATE` transactions so the overlap
 * re-check and the write hold the single writer lock together. The overlap
 * triggers reject any scheduled row that slips past another code path.
 */
export class SqliteSchedulingStore implements SchedulingStore {
  private readonly statements: Statements;
  private readonly insertIfFree: Database.Transaction<(row: AppointmentRow) => CommitOutcome>;
  private readonly updateIfCurrent: Database.Transaction<
    (row: AppointmentRow, expectedVersion: number, requireFree: boolean) => CommitOutcome
  >;

  constructor(db: SqliteDatabase) {
    this.statements = prepareStatements(db);

    this.insertIfFree = db.transaction((row: AppointmentRow): CommitOutcome => {
      const clash = this.statements.findScheduledOverlap.get(
        row.veterinarian_id,
        row.end_at,
        row.start_at,
        row.id
      );
      if (clash) {
        return 'conflict';
      }
      this.statements.insertAppointment.run(row);
      return 'committed';
    });

    this.updateIfCurrent = db.transaction(
      (row: AppointmentRow, expectedVersion: number, requireFree: boolean): CommitOutcome => {
        const stored = this.statements.getAppointmentById.get(row.id);
        if (!stored) {
          return 'not_found';
        }
        if (stored.version !== expectedVersion) {
          return 'version_mismatch';
        }
        if (requireFree) {
          const clash = this.statements.findScheduledOverlap.get(
            row.veterinarian_id,
            row.end_at,
            row.start_at,
            row.id
          );
          if (clash) {
            return 'conflict';
          }
        }
        const result = this.statements.updateAppointment.run(
          row.start_at,
          row.end_at,
          row.status,
          row.version,
          row.updated_at,
          row.id,
          expectedVersion
        );
        return result.changes === 1 ? 'committed' : 'version_mismatch';
      }
    );
  }

  async findAppointment(id: string): Promise<Appointment | null> {
    const row = this.statements.getAppointmentById.get(id);
    return row ? toAppointment(row) : null;
  }

  async findScheduledOverlapping(
    veterinarianId: string,
    interval: Interval,
    excludeAppointmentId = ''
  ): Promise<Appointment[]> {
    return this.statements.findScheduledOverlap
      .all(veterinarianId, interval.end.toISOString(), interval.start.toISOString(), excludeAppointmentId)
      .map(toAppointment);
  }

  async findRules(veterinarianId: string): Promise<AvailabilityRule[]> {
    return this.statements.getRulesByVet.all(veterinarianId).map(toRule);
  }

  async findExceptions(veterinarianId: string, from: string, to: string): Promise<AvailabilityException[]> {
    return this.statements.getExceptionsByVet.all(veterinarianId, from, to).map(toException);
  }

  async insertRule(rule: AvailabilityRule): Promise<void> {
    this.statements.insertRule.run({
      id: rule.id,
      veterinarian_id: rule.veterinarianId,
      day_of_week: rule.dayOfWeek,
      start_time: rule.startTime,
      end_time: rule.endTime,
      effective_from: rule.effectiveFrom,
      effective_until: rule.effectiveUntil,
      created_at: rule.createdAt.toISOString(),
    });
  }

  async insertException(exception: AvailabilityException): Promise<void> {
    this.statements.insertException.run({
      id: exception.id,
      veterinarian_id: exception.veterinarianId,
      date: exception.date,
      kind: exception.kind,
      start_time: exception.startTime,
      end_time: exception.endTime,
      reason: exception.reason,
      created_at: exception.createdAt.toISOString(),
    });
  }

  async deleteRule(veterinarianId: string, ruleId: string): Promise<boolean> {
    return this.statements.deleteRule.run(ruleId, veterinarianId).changes > 0;
  }

  async deleteException(veterinarianId: string, exceptionId: string): Promise<boolean> {
    return this.statements.deleteException.run(exceptionId, veterinarianId).changes > 0;
  }

  async insertAppointmentIfFree(appointment: Appointment): Promise<CommitOutcome> {
    return this.commit(() => this.insertIfFree.immediate(toAppointmentRow(appointment)));
  }

  async updateAppointmentIfCurrent(
    next: Appointment,
    expectedVersion: number,
    options: { requireFree: boolean }
  ): Promise<CommitOutcome> {
    return this.commit(() =>
      this.updateIfCurrent.immediate(toAppointmentRow(next), expectedVersion, options.requireFree)
    );
  }

  private commit(write: () => CommitOutcome): CommitOutcome {
    try {
      return write();
    } catch (error) {
      if (isOverlapViolation(error)) {
        return 'conflict';
      }
      if (isBusy(error)) {
        throw new TransientStoreError('Database is busy', error);
      }
      throw error;
    }
  }
}

/**
 * Stored responses for `Idempotency-Key` replays.
 */
export class SqliteIdempotencyStore {
  private readonly statements: Statements;

  constructor(db: SqliteDatabase) {
    this.statements = prepareStatements(db);
  }

  find(idempotencyKey: string): IdempotencyRecord | undefined {
    return this.statements.getIdempotencyKey.get(idempotencyKey);
  }

  save(idempotencyKey: string, requestHash: string, responseStatus: number, responseBody: string): void {
    this.statements.insertIdempotencyKey.run(idempotencyKey, requestHash, responseStatus, responseBody);
  }
}
