import {
  ResidentSchema,
  RotationTypeSchema,
  SwapRequestSchema,
  blockAssignmentSchema,
  isOutstandingStatus,
  parseRecord,
} from '@domain/types';
import type {
  AuditEntry,
  Resident,
  ResidentInput,
  RotationAssignment,
  RotationAssignmentInput,
  RotationType,
  RotationTypeInput,
  SwapQuery,
  SwapRequest,
} from '@domain/types';
import {
  DEFAULT_SWAP_QUERY_LIMIT,
  StoreConstraintError,
  TransactionFinishedError,
  compareSwapsNewestFirst,
  matchesSwapQuery,
} from './store';
import type {
  ResidentFilter,
  ScheduleStore,
  ScheduleStoreOptions,
  ScheduleWriter,
} from './store';

type MemoryState = {
  residents: Map<string, Resident>;
  rotations: Map<string, RotationType>;
  assignments: Map<string, RotationAssignment>;
  swaps: Map<string, SwapRequest>;
  audit: AuditEntry[];
};

function emptyState(): MemoryState {
  return {
    residents: new Map(),
    rotations: new Map(),
    assignments: new Map(),
    swaps: new Map(),
    audit: [],
  };
}

function compareAssignments(a: RotationAssignment, b: RotationAssignment): number {
  const byWeek = a.weekStartISO.localeCompare(b.weekStartISO);
  return byWeek !== 0 ? byWeek : a.id.localeCompare(b.id);
}

function matchesResidentFilter(resident: Resident, filter: ResidentFilter): boolean {
  if (filter.activeOnly && !resident.isActive) {
    return false;
  }
  if (filter.academicYearId !== undefined && resident.academicYearId !== filter.academicYearId) {
    return false;
  }
  if (filter.pgyLevels && !filter.pgyLevels.includes(resident.pgyLevel)) {
    return false;
  }
  if (filter.excludeIds && filter.excludeIds.includes(resident.id)) {
    return false;
  }
  return true;
}

type WriterSession = {
  state: MemoryState;
  assignmentSchema: ReturnType<typeof blockAssignmentSchema>;
  isOpen: () => boolean;
};

function createWriter({ state, assignmentSchema, isOpen }: WriterSession): ScheduleWriter {
  const assertOpen = (): void => {
    if (!isOpen()) {
      throw new TransactionFinishedError();
    }
  };

  const assertOutstandingSlotFree = (swap: SwapRequest): void => {
    if (!isOutstandingStatus(swap.status)) {
      return;
    }
    for (const other of state.swaps.values()) {
      if (
        other.id !== swap.id &&
        other.requesterId === swap.requesterId &&
        other.requesterAssignmentId === swap.requesterAssignmentId &&
        isOutstandingStatus(other.status)
      ) {
        throw new StoreConstraintError(
          'outstanding_swap',
          `Swap ${other.id} is already outstanding for assignment ${swap.requesterAssignmentId}`,
        );
      }
    }
  };

  const assertSwapReferences = (swap: SwapRequest): void => {
    const missing = [
      state.residents.has(swap.requesterId) ? null : `resident ${swap.requesterId}`,
      state.residents.has(swap.targetId) ? null : `resident ${swap.targetId}`,
      state.assignments.has(swap.requesterAssignmentId)
        ? null
        : `assignment ${swap.requesterAssignmentId}`,
      state.assignments.has(swap.targetAssignmentId)
        ? null
        : `assignment ${swap.targetAssignmentId}`,
    ].filter((entry): entry is string => entry !== null);
    if (missing.length > 0) {
      throw new StoreConstraintError(
        'missing_reference',
        `Swap ${swap.id} references unknown ${missing.join(', ')}`,
      );
    }
  };

  return {
    getResident: (id) => {
      const resident = state.residents.get(id);
      return resident ? { ...resident } : null;
    },
    listResidents: (filter = {}) =>
      [...state.residents.values()]
        .filter((resident) => matchesResidentFilter(resident, filter))
        .map((resident) => ({ ...resident })),
    getRotationType: (id) => {
      const rotation = state.rotations.get(id);
      return rotation ? { ...rotation } : null;
    },
    listRotationTypes: (ids) => {
      const wanted = ids ? new Set(ids) : null;
      return [...state.rotations.values()]
        .filter((rotation) => !wanted || wanted.has(rotation.id))
        .sort((a, b) => a.id.localeCompare(b.id))
        .map((rotation) => ({ ...rotation }));
    },
    getAssignment: (id) => {
      const assignment = state.assignments.get(id);
      return assignment ? { ...assignment } : null;
    },
    listAssignmentsForResidents: (residentIds) => {
      const wanted = new Set(residentIds);
      return [...state.assignments.values()]
        .filter((assignment) => wanted.has(assignment.residentId))
        .sort(compareAssignments)
        .map((assignment) => ({ ...assignment }));
    },
    listAssignmentsForWeek: (weekStartISO, residentIds) => {
      const wanted = new Set(residentIds);
      return [...state.assignments.values()]
        .filter(
          (assignment) =>
            assignment.weekStartISO === weekStartISO && wanted.has(assignment.residentId),
        )
        .sort(compareAssignments)
        .map((assignment) => ({ ...assignment }));
    },
    getSwapRequest: (id) => {
      const swap = state.swaps.get(id);
      return swap ? { ...swap } : null;
    },
    findOutstandingSwap: (requesterId, requesterAssignmentId) => {
      for (const swap of state.swaps.values()) {
        if (
          swap.requesterId === requesterId &&
          swap.requesterAssignmentId === requesterAssignmentId &&
          isOutstandingStatus(swap.status)
        ) {
          return { ...swap };
        }
      }
      return null;
    },
    listSwapRequests: (query: SwapQuery = {}) =>
      [...state.swaps.values()]
        .filter((swap) => matchesSwapQuery(swap, query))
        .sort(compareSwapsNewestFirst)
        .slice(0, query.limit ?? DEFAULT_SWAP_QUERY_LIMIT)
        .map((swap) => ({ ...swap })),
    listAuditEntries: (entityId) =>
      state.audit
        .filter((entry) => entityId === undefined || entry.entityId === entityId)
        .map((entry) => ({ ...entry })),

    saveResident: (input: ResidentInput) => {
      assertOpen();
      const resident = parseRecord('resident', ResidentSchema, input);
      state.residents.set(resident.id, resident);
      return { ...resident };
    },
    saveRotationType: (input: RotationTypeInput) => {
      assertOpen();
      const rotation = parseRecord('rotation', RotationTypeSchema, input);
      state.rotations.set(rotation.id, rotation);
      return { ...rotation };
    },
    saveAssignment: (input: RotationAssignmentInput) => {
      assertOpen();
      const assignment = parseRecord('assignment', assignmentSchema, input);
      if (!state.residents.has(assignment.residentId)) {
        throw new StoreConstraintError(
          'missing_reference',
          `Assignment ${assignment.id} references unknown resident ${assignment.residentId}`,
        );
      }
      if (!state.rotations.has(assignment.rotationId)) {
        throw new StoreConstraintError(
          'missing_reference',
          `Assignment ${assignment.id} references unknown rotation ${assignment.rotationId}`,
        );
      }
      for (const other of state.assignments.values()) {
        if (
          other.id !== assignment.id &&
          other.residentId === assignment.residentId &&
          other.weekStartISO === assignment.weekStartISO
        ) {
          throw new StoreConstraintError(
            'resident_week',
            `Resident ${assignment.residentId} already has assignment ${other.id} for week ${assignment.weekStartISO}`,
          );
        }
      }
      state.assignments.set(assignment.id, assignment);
      return { ...assignment };
    },
    setAssignmentRotation: (assignmentId, rotationId) => {
      assertOpen();
      const assignment = state.assignments.get(assignmentId);
      if (!assignment || !state.rotations.has(rotationId)) {
        throw new StoreConstraintError(
          'missing_reference',
          `Cannot set rotation ${rotationId} on assignment ${assignmentId}`,
        );
      }
      state.assignments.set(assignmentId, { ...assignment, rotationId });
    },
    insertSwapRequest: (input) => {
      assertOpen();
      const swap = parseRecord('swap request', SwapRequestSchema, input);
      if (state.swaps.has(swap.id)) {
        throw new Error(`Swap request ${swap.id} already exists`);
      }
      assertSwapReferences(swap);
      assertOutstandingSlotFree(swap);
      state.swaps.set(swap.id, swap);
    },
    updateSwapRequest: (input) => {
      assertOpen();
      const swap = parseRecord('swap request', SwapRequestSchema, input);
      if (!state.swaps.has(swap.id)) {
        throw new Error(`Swap request ${swap.id} does not exist`);
      }
      assertOutstandingSlotFree(swap);
      state.swaps.set(swap.id, swap);
    },
    appendAuditEntry: (entry) => {
      assertOpen();
      state.audit.push({ ...entry });
    },
  };
}

/**
 * In-process store. Each transaction works on a structured clone of the committed state and
 * replaces it only when the work function returns.
 */
export class MemoryScheduleStore implements ScheduleStore {
  private state: MemoryState = emptyState();
  private active = false;
  private readonly assignmentSchema: ReturnType<typeof blockAssignmentSchema>;

  constructor(options: ScheduleStoreOptions = {}) {
    this.assignmentSchema = blockAssignmentSchema(options.blockLengthDays);
  }

  transaction<T>(work: (tx: ScheduleWriter) => T): T {
    if (this.active) {
      throw new Error('MemoryScheduleStore does not support nested transactions');
    }
    this.active = true;
    let open = true;
    try {
      const draft = structuredClone(this.state);
      const result = work(
        createWriter({
          state: draft,
          assignmentSchema: this.assignmentSchema,
          isOpen: () => open,
        }),
      );
      this.state = draft;
      return result;
    } finally {
      open = false;
      this.active = false;
    }
  }

  close(): void {
    this.state = emptyState();
  }
}
