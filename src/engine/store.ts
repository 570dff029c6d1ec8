import type {
  AuditEntry,
  PgyLevel,
  Resident,
  ResidentInput,
  RotationAssignment,
  RotationAssignmentInput,
  RotationType,
  RotationTypeInput,
  SwapQuery,
  SwapRequest,
} from '@domain/types';

export const DEFAULT_SWAP_QUERY_LIMIT = 50;

export type ResidentFilter = {
  academicYearId?: string | null;
  pgyLevels?: readonly PgyLevel[];
  activeOnly?: boolean;
  excludeIds?: readonly string[];
};

export type ScheduleReader = {
  getResident(id: string): Resident | null;
  listResidents(filter?: ResidentFilter): Resident[];
  getRotationType(id: string): RotationType | null;
  listRotationTypes(ids?: readonly string[]): RotationType[];
  getAssignment(id: string): RotationAssignment | null;
  listAssignmentsForResidents(residentIds: readonly string[]): RotationAssignment[];
  listAssignmentsForWeek(
    weekStartISO: string,
    residentIds: readonly string[],
  ): RotationAssignment[];
  getSwapRequest(id: string): SwapRequest | null;
  findOutstandingSwap(requesterId: string, requesterAssignmentId: string): SwapRequest | null;
  listSwapRequests(query?: SwapQuery): SwapRequest[];
  listAuditEntries(entityId?: string): AuditEntry[];
};

export type ScheduleWriter = ScheduleReader & {
  saveResident(resident: ResidentInput): Resident;
  saveRotationType(rotation: RotationTypeInput): RotationType;
  /** Rejects a second assignment for the same (resident, week start). */
  saveAssignment(assignment: RotationAssignmentInput): RotationAssignment;
  setAssignmentRotation(assignmentId: string, rotationId: string): void;
  /** Rejects a second outstanding request for the same (requester, requester assignment). */
  insertSwapRequest(swap: SwapRequest): void;
  updateSwapRequest(swap: SwapRequest): void;
  appendAuditEntry(entry: AuditEntry): void;
};

export type ScheduleStore = {
  /**
   * Runs `work` as one all-or-nothing unit: every write it makes is committed when it returns
   * and discarded when it throws. Writers are exclusive for the duration of the call.
   */
  transaction<T>(work: (tx: ScheduleWriter) => T): T;
  close(): void;
};

export type ScheduleStoreOptions = {
  /** Length of one rotation block in days; saved assignments must span exactly one. */
  blockLengthDays?: number;
};

export type StoreConstraint = 'outstanding_swap' | 'resident_week' | 'missing_reference';

export class StoreConstraintError extends Error {
  constructor(
    public readonly constraint: StoreConstraint,
    message: string,
  ) {
    super(message);
    this.name = 'StoreConstraintError';
  }
}

export class TransactionFinishedError extends Error {
  constructor() {
    super('Schedule writer used after its transaction finished');
    this.name = 'TransactionFinishedError';
  }
}

export function compareSwapsNewestFirst(a: SwapRequest, b: SwapRequest): number {
  const byCreated = b.createdAt.localeCompare(a.createdAt);
  return byCreated !== 0 ? byCreated : b.id.localeCompare(a.id);
}

export function matchesSwapQuery(swap: SwapRequest, query: SwapQuery): boolean {
  if (query.status && swap.status !== query.status) {
    return false;
  }
  if (!query.residentId) {
    return true;
  }
  const asRequester = query.asRequester ?? true;
  const asTarget = query.asTarget ?? true;
  return (
    (asRequester && swap.requesterId === query.residentId) ||
    (asTarget && swap.targetId === query.residentId)
  );
}
