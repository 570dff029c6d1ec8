import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StoreRecordError } from '../../src/domain/types';
import type { SwapRequest } from '../../src/domain/types';
import { StoreConstraintError, TransactionFinishedError } from '../../src/engine/store';
import type { ResidentFilter, ScheduleStore } from '../../src/engine/store';
import {
  STORE_FACTORIES,
  buildAssignment,
  buildResident,
  buildRotation,
  seedStore,
} from '../builders/dataBuilders';

function buildPendingSwap(id: string, overrides: Partial<SwapRequest> = {}): SwapRequest {
  return {
    id,
    requesterId: 'r-1',
    targetId: 'r-2',
    requesterAssignmentId: 'a-1',
    targetAssignmentId: 'a-2',
    status: 'pending',
    requesterNote: null,
    adminNote: null,
    peerConfirmedAt: null,
    adminReviewedBy: null,
    adminReviewedAt: null,
    createdAt: '2025-07-01T12:00:00.000Z',
    updatedAt: '2025-07-01T12:00:00.000Z',
    ...overrides,
  };
}

function captureConstraint(fn: () => unknown): StoreConstraintError {
  try {
    fn();
  } catch (error) {
    if (error instanceof StoreConstraintError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a StoreConstraintError');
}

describe.each(STORE_FACTORIES)('ScheduleStore ($name)', ({ create }) => {
  let store: ScheduleStore;

  beforeEach(() => {
    store = create();
    seedStore(store, {
      residents: [
        buildResident('r-1', 'PGY2'),
        buildResident('r-2', 'PGY3', { isActive: false }),
        { id: 'r-3', name: 'Unassigned Year', pgyLevel: 'TY' },
      ],
      rotations: [
        buildRotation('rot-b', '07:00', '17:00'),
        buildRotation('rot-a', '19:00', '07:00', { isOvernight: true }),
      ],
      assignments: [
        buildAssignment('a-3', 'r-1', 'rot-a', '2025-07-12'),
        buildAssignment('a-1', 'r-1', 'rot-b'),
        buildAssignment('a-2', 'r-2', 'rot-a'),
      ],
    });
  });

  afterEach(() => {
    store.close();
  });

  it('applies schema defaults and keeps booleans', () => {
    const [resident, inactive] = store.transaction((tx) => [
      tx.getResident('r-3'),
      tx.getResident('r-2'),
    ]);
    expect(resident).toEqual({
      id: 'r-3',
      name: 'Unassigned Year',
      pgyLevel: 'TY',
      academicYearId: null,
      isActive: true,
    });
    expect(inactive?.isActive).toBe(false);
    expect(store.transaction((tx) => tx.getRotationType('rot-a'))?.isOvernight).toBe(true);
  });

  it('rejects records that fail their schema', () => {
    expect(() =>
      store.transaction((tx) =>
        tx.saveAssignment({
          ...buildAssignment('a-bad', 'r-1', 'rot-a', '2025-07-19'),
          weekEndISO: '2025-07-18',
        }),
      ),
    ).toThrow(StoreRecordError);
  });

  it('requires an assignment to cover exactly one block', () => {
    expect(() =>
      store.transaction((tx) =>
        tx.saveAssignment({
          ...buildAssignment('a-long', 'r-1', 'rot-a', '2025-07-19'),
          weekEndISO: '2025-08-17',
        }),
      ),
    ).toThrow('Invalid assignment record: weekEndISO must be 2025-07-25 for a 7-day block');
    expect(store.transaction((tx) => tx.getAssignment('a-long'))).toBeNull();
  });

  it('refuses writes through a writer whose transaction has finished', () => {
    const writer = store.transaction((tx) => tx);

    expect(() => writer.setAssignmentRotation('a-1', 'rot-a')).toThrow(TransactionFinishedError);
    expect(() => writer.saveResident(buildResident('r-9', 'PGY1'))).toThrow(
      TransactionFinishedError,
    );
    expect(store.transaction((tx) => tx.getAssignment('a-1')?.rotationId)).toBe('rot-b');
    expect(store.transaction((tx) => tx.getResident('r-9'))).toBeNull();
  });

  it('filters residents by year, level, activity and exclusion', () => {
    const residentIds = (filter?: ResidentFilter) =>
      store.transaction((tx) => tx.listResidents(filter).map((resident) => resident.id));

    expect(residentIds()).toEqual(['r-1', 'r-2', 'r-3']);
    expect(residentIds({ activeOnly: true })).toEqual(['r-1', 'r-3']);
    expect(residentIds({ academicYearId: null })).toEqual(['r-3']);
    expect(
      residentIds({ academicYearId: 'ay-2025', pgyLevels: ['PGY2', 'PGY3'], excludeIds: ['r-1'] }),
    ).toEqual(['r-2']);
  });

  it('orders assignments by week then id and rotations by id', () => {
    const [assignments, week, rotations] = store.transaction((tx) => [
      tx.listAssignmentsForResidents(['r-1', 'r-2']).map((a) => a.id),
      tx.listAssignmentsForWeek('2025-07-05', ['r-1']).map((a) => a.id),
      tx.listRotationTypes().map((r) => r.id),
    ]);
    expect(assignments).toEqual(['a-1', 'a-2', 'a-3']);
    expect(week).toEqual(['a-1']);
    expect(rotations).toEqual(['rot-a', 'rot-b']);
    expect(store.transaction((tx) => tx.listRotationTypes(['rot-b']).map((r) => r.id))).toEqual([
      'rot-b',
    ]);
  });

  it('allows one assignment per resident and week', () => {
    const error = captureConstraint(() =>
      store.transaction((tx) => tx.saveAssignment(buildAssignment('a-dup', 'r-1', 'rot-a'))),
    );
    expect(error.constraint).toBe('resident_week');
  });

  it('rejects assignments that reference unknown rows', () => {
    const error = captureConstraint(() =>
      store.transaction((tx) =>
        tx.saveAssignment(buildAssignment('a-9', 'r-ghost', 'rot-a', '2025-07-19')),
      ),
    );
    expect(error.constraint).toBe('missing_reference');
  });

  it('allows one outstanding request per requester assignment', () => {
    store.transaction((tx) => tx.insertSwapRequest(buildPendingSwap('s-1')));

    const error = captureConstraint(() =>
      store.transaction((tx) =>
        tx.insertSwapRequest(buildPendingSwap('s-2', { status: 'peer_confirmed' })),
      ),
    );
    expect(error.constraint).toBe('outstanding_swap');

    store.transaction((tx) =>
      tx.updateSwapRequest(buildPendingSwap('s-1', { status: 'cancelled' })),
    );
    store.transaction((tx) => tx.insertSwapRequest(buildPendingSwap('s-2')));
    expect(
      store.transaction((tx) => tx.findOutstandingSwap('r-1', 'a-1'))?.id,
    ).toBe('s-2');
  });

  it('discards every write of a transaction that throws', () => {
    expect(() =>
      store.transaction((tx) => {
        tx.saveResident(buildResident('r-9', 'PGY1'));
        tx.setAssignmentRotation('a-1', 'rot-a');
        throw new Error('abort');
      }),
    ).toThrow('abort');

    const [resident, rotationId] = store.transaction((tx) => [
      tx.getResident('r-9'),
      tx.getAssignment('a-1')?.rotationId,
    ]);
    expect(resident).toBeNull();
    expect(rotationId).toBe('rot-b');
  });

  it('filters audit entries by entity in insertion order', () => {
    const entries: Array<[string, string]> = [
      ['log-2', 's-1'],
      ['log-1', 's-2'],
      ['log-3', 's-1'],
    ];
    store.transaction((tx) => {
      for (const [id, entityId] of entries) {
        tx.appendAuditEntry({
          id,
          adminId: 'admin-1',
          action: 'swap_reject',
          entityType: 'swap_request',
          entityId,
          oldValue: { status: 'pending' },
          newValue: { status: 'rejected', adminNote: null },
          createdAt: '2025-07-01T12:00:00.000Z',
        });
      }
    });

    expect(store.transaction((tx) => tx.listAuditEntries('s-1').map((entry) => entry.id))).toEqual(
      ['log-2', 'log-3'],
    );
    expect(store.transaction((tx) => tx.listAuditEntries())[1]?.newValue).toEqual({
      status: 'rejected',
      adminNote: null,
    });
  });
});

describe.each(STORE_FACTORIES)('ScheduleStore block length ($name)', ({ create }) => {
  it('checks assignment spans against the configured block length', () => {
    const store = create({ blockLengthDays: 14 });
    seedStore(store, {
      residents: [buildResident('r-1', 'PGY2')],
      rotations: [buildRotation('rot-a', '07:00', '17:00')],
    });

    expect(() =>
      store.transaction((tx) => tx.saveAssignment(buildAssignment('a-1', 'r-1', 'rot-a'))),
    ).toThrow('weekEndISO must be 2025-07-18 for a 14-day block');

    const saved = store.transaction((tx) =>
      tx.saveAssignment({
        ...buildAssignment('a-1', 'r-1', 'rot-a'),
        weekEndISO: '2025-07-18',
      }),
    );
    expect(saved.weekEndISO).toBe('2025-07-18');
    store.close();
  });
});
