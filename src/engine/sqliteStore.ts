import Database from 'better-sqlite3';
import { z } from 'zod';
import {
  DataSourceSchema,
  PGY_LEVELS,
  PgyLevelSchema,
  ResidentSchema,
  RotationTypeSchema,
  SWAP_STATUSES,
  SwapRequestSchema,
  SwapStatusSchema,
  blockAssignmentSchema,
  parseRecord,
} from '@domain/types';
import type {
  AuditEntry,
  Resident,
  RotationAssignment,
  RotationType,
  SwapQuery,
  SwapRequest,
} from '@domain/types';
import { nowISO } from '@utils/dayjs';
import { debugError, debugLog } from '@utils/debug';
import {
  DEFAULT_SWAP_QUERY_LIMIT,
  StoreConstraintError,
  TransactionFinishedError,
} from './store';
import type {
  ResidentFilter,
  ScheduleStore,
  ScheduleStoreOptions,
  ScheduleWriter,
  StoreConstraint,
} from './store';

const STATUS_LIST = SWAP_STATUSES.map((status) => `'${status}'`).join(', ');
const PGY_LIST = PGY_LEVELS.map((level) => `'${level}'`).join(', ');

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS residents (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    pgy_level TEXT NOT NULL CHECK(pgy_level IN (${PGY_LIST})),
    academic_year_id TEXT,
    is_active INTEGER NOT NULL DEFAULT 1
  );

  CREATE TABLE IF NOT EXISTS rotations (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    start_time TEXT,
    end_time TEXT,
    is_overnight INTEGER NOT NULL DEFAULT 0,
    weekdays_only INTEGER NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS schedule_assignments (
    id TEXT PRIMARY KEY,
    resident_id TEXT NOT NULL REFERENCES residents(id),
    rotation_id TEXT NOT NULL REFERENCES rotations(id),
    week_start TEXT NOT NULL,
    week_end TEXT NOT NULL,
    academic_year_id TEXT,
    source TEXT NOT NULL DEFAULT 'manual',
    updated_at TEXT NOT NULL,
    CONSTRAINT uq_resident_week UNIQUE (resident_id, week_start)
  );

  CREATE INDEX IF NOT EXISTS ix_schedule_assignments_week
    ON schedule_assignments (week_start, week_end);

  CREATE TABLE IF NOT EXISTS swap_requests (
    id TEXT PRIMARY KEY,
    requester_id TEXT NOT NULL REFERENCES residents(id),
    target_id TEXT NOT NULL REFERENCES residents(id),
    requester_assignment_id TEXT NOT NULL REFERENCES schedule_assignments(id),
    target_assignment_id TEXT NOT NULL REFERENCES schedule_assignments(id),
    status TEXT NOT NULL CHECK(status IN (${STATUS_LIST})),
    requester_note TEXT,
    admin_note TEXT,
    peer_confirmed_at TEXT,
    admin_reviewed_by TEXT,
    admin_reviewed_at TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS ix_swap_requests_status ON swap_requests (status);

  CREATE UNIQUE INDEX IF NOT EXISTS uq_outstanding_swap
    ON swap_requests (requester_id, requester_assignment_id)
    WHERE status IN ('pending', 'peer_confirmed');

  CREATE TABLE IF NOT EXISTS audit_log (
    id TEXT PRIMARY KEY,
    admin_id TEXT NOT NULL,
    action TEXT NOT NULL,
    entity_type TEXT NOT NULL,
    entity_id TEXT NOT NULL,
    old_value TEXT NOT NULL,
    new_value TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS ix_audit_log_entity ON audit_log (entity_type, entity_id);
`;

const sqliteFlag = z.number().int().transform((value) => value === 1);

const ResidentRowSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    pgy_level: PgyLevelSchema,
    academic_year_id: z.string().nullable(),
    is_active: sqliteFlag,
  })
  .transform(
    (row): Resident => ({
      id: row.id,
      name: row.name,
      pgyLevel: row.pgy_level,
      academicYearId: row.academic_year_id,
      isActive: row.is_active,
    }),
  );

const RotationRowSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    start_time: z.string().nullable(),
    end_time: z.string().nullable(),
    is_overnight: sqliteFlag,
    weekdays_only: sqliteFlag,
  })
  .transform(
    (row): RotationType => ({
      id: row.id,
      name: row.name,
      startTime: row.start_time,
      endTime: row.end_time,
      isOvernight: row.is_overnight,
      weekdaysOnly: row.weekdays_only,
    }),
  );

const AssignmentRowSchema = z
  .object({
    id: z.string(),
    resident_id: z.string(),
    rotation_id: z.string(),
    week_start: z.string(),
    week_end: z.string(),
    academic_year_id: z.string().nullable(),
    source: DataSourceSchema,
  })
  .transform(
    (row): RotationAssignment => ({
      id: row.id,
      residentId: row.resident_id,
      rotationId: row.rotation_id,
      weekStartISO: row.week_start,
      weekEndISO: row.week_end,
      academicYearId: row.academic_year_id,
      source: row.source,
    }),
  );

const SwapRowSchema = z
  .object({
    id: z.string(),
    requester_id: z.string(),
    target_id: z.string(),
    requester_assignment_id: z.string(),
    target_assignment_id: z.string(),
    status: SwapStatusSchema,
    requester_note: z.string().nullable(),
    admin_note: z.string().nullable(),
    peer_confirmed_at: z.string().nullable(),
    admin_reviewed_by: z.string().nullable(),
    admin_reviewed_at: z.string().nullable(),
    created_at: z.string(),
    updated_at: z.string(),
  })
  .transform(
    (row): SwapRequest => ({
      id: row.id,
      requesterId: row.requester_id,
      targetId: row.target_id,
      requesterAssignmentId: row.requester_assignment_id,
      targetAssignmentId: row.target_assignment_id,
      status: row.status,
      requesterNote: row.requester_note,
      adminNote: row.admin_note,
      peerConfirmedAt: row.peer_confirmed_at,
      adminReviewedBy: row.admin_reviewed_by,
      adminReviewedAt: row.admin_reviewed_at,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    }),
  );

const jsonObject = z.string().transform((value, ctx): Record<string, unknown> => {
  const parsed = z.record(z.unknown()).safeParse(JSON.parse(value));
  if (!parsed.success) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a JSON object' });
    return z.NEVER;
  }
  return parsed.data;
});

const AuditRowSchema = z
  .object({
    id: z.string(),
    admin_id: z.string(),
    action: z.enum(['swap_approve', 'swap_reject']),
    entity_type: z.literal('swap_request'),
    entity_id: z.string(),
    old_value: jsonObject,
    new_value: jsonObject,
    created_at: z.string(),
  })
  .transform(
    (row): AuditEntry => ({
      id: row.id,
      adminId: row.admin_id,
      action: row.action,
      entityType: row.entity_type,
      entityId: row.entity_id,
      oldValue: row.old_value,
      newValue: row.new_value,
      createdAt: row.created_at,
    }),
  );

function sqliteErrorCode(error: unknown): string | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

/**
 * Runs a write and converts SQLite constraint failures into `StoreConstraintError`. Any other
 * failure propagates untouched.
 */
function withConstraintMapping<T>(
  uniqueConstraint: StoreConstraint,
  describe: () => string,
  write: () => T,
): T {
  try {
    return write();
  } catch (error) {
    const code = sqliteErrorCode(error);
    if (code === 'SQLITE_CONSTRAINT_UNIQUE') {
      throw new StoreConstraintError(uniqueConstraint, describe());
    }
    if (code === 'SQLITE_CONSTRAINT_FOREIGNKEY') {
      throw new StoreConstraintError('missing_reference', describe());
    }
    debugError('store.sqlite.write', () => ({ code, message: describe() }));
    throw error;
  }
}

function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ');
}

function toFlag(value: boolean): number {
  return value ? 1 : 0;
}

export type SqliteScheduleStoreOptions = ScheduleStoreOptions & {
  /** File path or `:memory:`. */
  filename: string;
};

export class SqliteScheduleStore implements ScheduleStore {
  private readonly db: Database.Database;
  private readonly writer: ScheduleWriter;
  private readonly assignmentSchema: ReturnType<typeof blockAssignmentSchema>;

  constructor(options: SqliteScheduleStoreOptions) {
    this.assignmentSchema = blockAssignmentSchema(options.blockLengthDays);
    this.db = new Database(options.filename);
    if (options.filename !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = ON');
    this.db.exec(SCHEMA_SQL);
    this.writer = this.createWriter();
    debugLog('store.sqlite.open', { filename: options.filename });
  }

  transaction<T>(work: (tx: ScheduleWriter) => T): T {
    const run = this.db.transaction(() => work(this.writer));
    // IMMEDIATE takes the write lock before the first read so that read-then-write sequences
    // from two connections cannot interleave.
    return run.immediate();
  }

  close(): void {
    this.db.close();
  }

  private createWriter(): ScheduleWriter {
    const db = this.db;
    const assignmentSchema = this.assignmentSchema;

    // The writer outlives each transaction; outside one every statement would autocommit.
    const assertOpen = (): void => {
      if (!db.inTransaction) {
        throw new TransactionFinishedError();
      }
    };

    const one = <S extends z.ZodTypeAny>(
      entity: string,
      schema: S,
      row: unknown,
    ): z.output<S> | null => (row === undefined ? null : parseRecord(entity, schema, row));

    const many = <S extends z.ZodTypeAny>(
      entity: string,
      schema: S,
      rows: unknown[],
    ): Array<z.output<S>> => rows.map((row) => parseRecord(entity, schema, row));

    const getResident = (id: string): Resident | null =>
      one(
        'resident',
        ResidentRowSchema,
        db.prepare('SELECT * FROM residents WHERE id = ?').get(id),
      );

    const getRotationType = (id: string): RotationType | null =>
      one(
        'rotation',
        RotationRowSchema,
        db.prepare('SELECT * FROM rotations WHERE id = ?').get(id),
      );

    const getAssignment = (id: string): RotationAssignment | null =>
      one(
        'assignment',
        AssignmentRowSchema,
        db.prepare('SELECT * FROM schedule_assignments WHERE id = ?').get(id),
      );

    const getSwapRequest = (id: string): SwapRequest | null =>
      one(
        'swap request',
        SwapRowSchema,
        db.prepare('SELECT * FROM swap_requests WHERE id = ?').get(id),
      );

    const writeSwap = (swap: SwapRequest, sql: string): void => {
      const row = parseRecord('swap request', SwapRequestSchema, swap);
      withConstraintMapping(
        'outstanding_swap',
        () =>
          `Swap ${row.id} conflicts with an outstanding request for assignment ${row.requesterAssignmentId}`,
        () => db.prepare(sql).run(row),
      );
    };

    return {
      getResident,
      listResidents: (filter: ResidentFilter = {}) => {
        const conditions: string[] = [];
        const params: Array<string | number> = [];
        if (filter.activeOnly) {
          conditions.push('is_active = 1');
        }
        if (filter.academicYearId === null) {
          conditions.push('academic_year_id IS NULL');
        } else if (filter.academicYearId !== undefined) {
          conditions.push('academic_year_id = ?');
          params.push(filter.academicYearId);
        }
        if (filter.pgyLevels) {
          if (filter.pgyLevels.length === 0) {
            return [];
          }
          conditions.push(`pgy_level IN (${placeholders(filter.pgyLevels.length)})`);
          params.push(...filter.pgyLevels);
        }
        if (filter.excludeIds && filter.excludeIds.length > 0) {
          conditions.push(`id NOT IN (${placeholders(filter.excludeIds.length)})`);
          params.push(...filter.excludeIds);
        }
        const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
        return many(
          'resident',
          ResidentRowSchema,
          db.prepare(`SELECT * FROM residents ${where} ORDER BY rowid`).all(...params),
        );
      },
      getRotationType,
      listRotationTypes: (ids) => {
        if (ids && ids.length === 0) {
          return [];
        }
        const rows = ids
          ? db
              .prepare(
                `SELECT * FROM rotations WHERE id IN (${placeholders(ids.length)}) ORDER BY id`,
              )
              .all(...ids)
          : db.prepare('SELECT * FROM rotations ORDER BY id').all();
        return many('rotation', RotationRowSchema, rows);
      },
      getAssignment,
      listAssignmentsForResidents: (residentIds) => {
        if (residentIds.length === 0) {
          return [];
        }
        return many(
          'assignment',
          AssignmentRowSchema,
          db
            .prepare(
              `SELECT * FROM schedule_assignments WHERE resident_id IN (${placeholders(residentIds.length)})
               ORDER BY week_start, id`,
            )
            .all(...residentIds),
        );
      },
      listAssignmentsForWeek: (weekStartISO, residentIds) => {
        if (residentIds.length === 0) {
          return [];
        }
        return many(
          'assignment',
          AssignmentRowSchema,
          db
            .prepare(
              `SELECT * FROM schedule_assignments
               WHERE week_start = ? AND resident_id IN (${placeholders(residentIds.length)})
               ORDER BY week_start, id`,
            )
            .all(weekStartISO, ...residentIds),
        );
      },
      getSwapRequest,
      findOutstandingSwap: (requesterId, requesterAssignmentId) =>
        one(
          'swap request',
          SwapRowSchema,
          db
            .prepare(
              `SELECT * FROM swap_requests
               WHERE requester_id = ? AND requester_assignment_id = ?
                 AND status IN ('pending', 'peer_confirmed')`,
            )
            .get(requesterId, requesterAssignmentId),
        ),
      listSwapRequests: (query: SwapQuery = {}) => {
        const conditions: string[] = [];
        const params: Array<string | number> = [];
        if (query.status) {
          conditions.push('status = ?');
          params.push(query.status);
        }
        if (query.residentId) {
          const asRequester = query.asRequester ?? true;
          const asTarget = query.asTarget ?? true;
          const parties: string[] = [];
          if (asRequester) {
            parties.push('requester_id = ?');
            params.push(query.residentId);
          }
          if (asTarget) {
            parties.push('target_id = ?');
            params.push(query.residentId);
          }
          conditions.push(parties.length > 0 ? `(${parties.join(' OR ')})` : '0');
        }
        const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
        params.push(query.limit ?? DEFAULT_SWAP_QUERY_LIMIT);
        return many(
          'swap request',
          SwapRowSchema,
          db
            .prepare(
              `SELECT * FROM swap_requests ${where} ORDER BY created_at DESC, id DESC LIMIT ?`,
            )
            .all(...params),
        );
      },
      listAuditEntries: (entityId) => {
        const rows =
          entityId === undefined
            ? db.prepare('SELECT * FROM audit_log ORDER BY rowid').all()
            : db
                .prepare('SELECT * FROM audit_log WHERE entity_id = ? ORDER BY rowid')
                .all(entityId);
        return many('audit entry', AuditRowSchema, rows);
      },

      saveResident: (input) => {
        assertOpen();
        const resident = parseRecord('resident', ResidentSchema, input);
        db.prepare(
          `INSERT INTO residents (id, name, pgy_level, academic_year_id, is_active)
           VALUES (@id, @name, @pgyLevel, @academicYearId, @isActive)
           ON CONFLICT(id) DO UPDATE SET
             name = excluded.name,
             pgy_level = excluded.pgy_level,
             academic_year_id = excluded.academic_year_id,
             is_active = excluded.is_active`,
        ).run({ ...resident, isActive: toFlag(resident.isActive) });
        return resident;
      },
      saveRotationType: (input) => {
        assertOpen();
        const rotation = parseRecord('rotation', RotationTypeSchema, input);
        db.prepare(
          `INSERT INTO rotations (id, name, start_time, end_time, is_overnight, weekdays_only)
           VALUES (@id, @name, @startTime, @endTime, @isOvernight, @weekdaysOnly)
           ON CONFLICT(id) DO UPDATE SET
             name = excluded.name,
             start_time = excluded.start_time,
             end_time = excluded.end_time,
             is_overnight = excluded.is_overnight,
             weekdays_only = excluded.weekdays_only`,
        ).run({
          ...rotation,
          isOvernight: toFlag(rotation.isOvernight),
          weekdaysOnly: toFlag(rotation.weekdaysOnly),
        });
        return rotation;
      },
      saveAssignment: (input) => {
        assertOpen();
        const assignment = parseRecord('assignment', assignmentSchema, input);
        withConstraintMapping(
          'resident_week',
          () =>
            `Resident ${assignment.residentId} already has an assignment for week ${assignment.weekStartISO}`,
          () =>
            db
              .prepare(
                `INSERT INTO schedule_assignments
                   (id, resident_id, rotation_id, week_start, week_end, academic_year_id, source, updated_at)
                 VALUES
                   (@id, @residentId, @rotationId, @weekStartISO, @weekEndISO, @academicYearId, @source, @updatedAt)
                 ON CONFLICT(id) DO UPDATE SET
                   resident_id = excluded.resident_id,
                   rotation_id = excluded.rotation_id,
                   week_start = excluded.week_start,
                   week_end = excluded.week_end,
                   academic_year_id = excluded.academic_year_id,
                   source = excluded.source,
                   updated_at = excluded.updated_at`,
              )
              .run({ ...assignment, updatedAt: nowISO() }),
        );
        return assignment;
      },
      setAssignmentRotation: (assignmentId, rotationId) => {
        assertOpen();
        const result = withConstraintMapping(
          'missing_reference',
          () => `Cannot set rotation ${rotationId} on assignment ${assignmentId}`,
          () =>
            db
              .prepare(
                'UPDATE schedule_assignments SET rotation_id = ?, updated_at = ? WHERE id = ?',
              )
              .run(rotationId, nowISO(), assignmentId),
        );
        if (result.changes !== 1) {
          throw new StoreConstraintError(
            'missing_reference',
            `Cannot set rotation ${rotationId} on assignment ${assignmentId}`,
          );
        }
      },
      insertSwapRequest: (swap) => {
        assertOpen();
        writeSwap(
          swap,
          `INSERT INTO swap_requests
             (id, requester_id, target_id, requester_assignment_id, target_assignment_id, status,
              requester_note, admin_note, peer_confirmed_at, admin_reviewed_by, admin_reviewed_at,
              created_at, updated_at)
           VALUES
             (@id, @requesterId, @targetId, @requesterAssignmentId, @targetAssignmentId, @status,
              @requesterNote, @adminNote, @peerConfirmedAt, @adminReviewedBy, @adminReviewedAt,
              @createdAt, @updatedAt)`,
        );
      },
      updateSwapRequest: (swap) => {
        assertOpen();
        if (!getSwapRequest(swap.id)) {
          throw new Error(`Swap request ${swap.id} does not exist`);
        }
        writeSwap(
          swap,
          `UPDATE swap_requests SET
             status = @status,
             requester_note = @requesterNote,
             admin_note = @adminNote,
             peer_confirmed_at = @peerConfirmedAt,
             admin_reviewed_by = @adminReviewedBy,
             admin_reviewed_at = @adminReviewedAt,
             updated_at = @updatedAt
           WHERE id = @id`,
        );
      },
      appendAuditEntry: (entry) => {
        assertOpen();
        db.prepare(
          `INSERT INTO audit_log
             (id, admin_id, action, entity_type, entity_id, old_value, new_value, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        ).run(
          entry.id,
          entry.adminId,
          entry.action,
          entry.entityType,
          entry.entityId,
          JSON.stringify(entry.oldValue),
          JSON.stringify(entry.newValue),
          entry.createdAt,
        );
      },
    };
  }
}
