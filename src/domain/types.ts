import { z } from 'zod';
import { formatISODate, parseISODate } from '@utils/dayjs';

export const PGY_LEVELS = ['TY', 'PGY1', 'PGY2', 'PGY3'] as const;
export type PgyLevel = (typeof PGY_LEVELS)[number];

export const SWAP_STATUSES = [
  'pending',
  'peer_confirmed',
  'approved',
  'rejected',
  'cancelled',
] as const;
export type SwapStatus = (typeof SWAP_STATUSES)[number];

export const OUTSTANDING_SWAP_STATUSES: readonly SwapStatus[] = ['pending', 'peer_confirmed'];

export const DATA_SOURCES = ['manual', 'excel', 'amion', 'csv', 'llm'] as const;
export type DataSource = (typeof DATA_SOURCES)[number];

export const VIOLATION_CODES = [
  'block_change_day',
  'duty_hours_7d',
  'duty_hours_avg_week',
] as const;
export type ViolationCode = (typeof VIOLATION_CODES)[number];

export type ViolationSeverity = 'hard' | 'soft';

export const PgyLevelSchema = z.enum(PGY_LEVELS, {
  errorMap: () => ({ message: `PGY level must be one of: ${PGY_LEVELS.join(', ')}` }),
});

export const SwapStatusSchema = z.enum(SWAP_STATUSES);

export const DataSourceSchema = z.enum(DATA_SOURCES);

const idSchema = z.string().min(1, 'Identifier is required');

export const isoDateStringSchema = z
  .string()
  .regex(/^[0-9]{4}-[0-9]{2}-[0-9]{2}$/u, 'Date must use YYYY-MM-DD format');

export const timeOfDaySchema = z
  .string()
  .regex(/^([01][0-9]|2[0-3]):[0-5][0-9]$/u, 'Time of day must use HH:mm format');

const isoTimestampSchema = z
  .string()
  .datetime({ offset: true, message: 'Value must be an ISO8601 string with timezone offset' });

export const ResidentSchema = z
  .object({
    id: idSchema,
    name: z.string().min(1, 'Resident name is required'),
    pgyLevel: PgyLevelSchema,
    academicYearId: idSchema.nullable().default(null),
    isActive: z.boolean().default(true),
  })
  .strict();

export type Resident = z.infer<typeof ResidentSchema>;
export type ResidentInput = z.input<typeof ResidentSchema>;

export const RotationTypeSchema = z
  .object({
    id: idSchema,
    name: z.string().min(1, 'Rotation name is required'),
    startTime: timeOfDaySchema.nullable().default(null),
    endTime: timeOfDaySchema.nullable().default(null),
    isOvernight: z.boolean().default(false),
    weekdaysOnly: z.boolean().default(false),
  })
  .strict();

export type RotationType = z.infer<typeof RotationTypeSchema>;
export type RotationTypeInput = z.input<typeof RotationTypeSchema>;

const BaseRotationAssignmentSchema = z
  .object({
    id: idSchema,
    residentId: idSchema,
    rotationId: idSchema,
    weekStartISO: isoDateStringSchema,
    weekEndISO: isoDateStringSchema,
    academicYearId: idSchema.nullable().default(null),
    source: DataSourceSchema.default('manual'),
  })
  .strict();

export const RotationAssignmentSchema = BaseRotationAssignmentSchema.superRefine(
  (assignment: z.infer<typeof BaseRotationAssignmentSchema>, ctx: z.RefinementCtx) => {
    // Lexical comparison is chronological for YYYY-MM-DD.
    if (assignment.weekEndISO < assignment.weekStartISO) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'weekEndISO must not be before weekStartISO',
        path: ['weekEndISO'],
      });
    }
  },
);

export const DEFAULT_BLOCK_LENGTH_DAYS = 7;

/** Assignment schema that also requires the record to cover exactly one block, inclusive. */
export function blockAssignmentSchema(blockLengthDays: number = DEFAULT_BLOCK_LENGTH_DAYS) {
  return RotationAssignmentSchema.superRefine((assignment, ctx) => {
    const expectedEnd = formatISODate(
      parseISODate(assignment.weekStartISO).add(blockLengthDays - 1, 'day'),
    );
    if (assignment.weekEndISO !== expectedEnd) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `weekEndISO must be ${expectedEnd} for a ${blockLengthDays}-day block`,
        path: ['weekEndISO'],
      });
    }
  });
}

export type RotationAssignment = z.infer<typeof RotationAssignmentSchema>;
export type RotationAssignmentInput = z.input<typeof RotationAssignmentSchema>;

export const SwapRequestSchema = z
  .object({
    id: idSchema,
    requesterId: idSchema,
    targetId: idSchema,
    requesterAssignmentId: idSchema,
    targetAssignmentId: idSchema,
    status: SwapStatusSchema,
    requesterNote: z.string().nullable(),
    adminNote: z.string().nullable(),
    peerConfirmedAt: isoTimestampSchema.nullable(),
    adminReviewedBy: idSchema.nullable(),
    adminReviewedAt: isoTimestampSchema.nullable(),
    createdAt: isoTimestampSchema,
    updatedAt: isoTimestampSchema,
  })
  .strict();

export type SwapRequest = z.infer<typeof SwapRequestSchema>;

export type AuditAction = 'swap_approve' | 'swap_reject';

export type AuditEntry = {
  id: string;
  adminId: string;
  action: AuditAction;
  entityType: 'swap_request';
  entityId: string;
  oldValue: Record<string, unknown>;
  newValue: Record<string, unknown>;
  createdAt: string;
};

export type Violation = {
  code: ViolationCode;
  message: string;
  severity: ViolationSeverity;
  spanStartISO: string;
  spanEndISO: string;
  residentId: string;
};

export type SwapQuery = {
  residentId?: string;
  status?: SwapStatus;
  asRequester?: boolean;
  asTarget?: boolean;
  limit?: number;
};

export class StoreRecordError extends Error {
  constructor(
    public readonly entity: string,
    public readonly issues: z.ZodIssue[],
  ) {
    super(`Invalid ${entity} record: ${issues.map((issue) => issue.message).join('; ')}`);
    this.name = 'StoreRecordError';
  }
}

export function parseRecord<S extends z.ZodTypeAny>(
  entity: string,
  schema: S,
  input: unknown,
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new StoreRecordError(entity, result.error.issues);
  }
  return result.data;
}

export function isOutstandingStatus(status: SwapStatus): boolean {
  return OUTSTANDING_SWAP_STATUSES.includes(status);
}
