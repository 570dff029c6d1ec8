import { describe, expect, it } from 'vitest';
import {
  SWAP_TRANSITIONS,
  SwapError,
  canSwapPgyLevels,
  categorizeSwapRejection,
  compatiblePgyLevels,
  describeSwapRejection,
  resolveTransition,
} from '../../src/domain/rules';
import type { SwapAction, SwapActorRole, SwapRejectionReason } from '../../src/domain/rules';
import type { SwapRequest, SwapStatus } from '../../src/domain/types';

function buildSwap(status: SwapStatus): SwapRequest {
  return {
    id: 'swap-1',
    requesterId: 'r-requester',
    targetId: 'r-target',
    requesterAssignmentId: 'a-requester',
    targetAssignmentId: 'a-target',
    status,
    requesterNote: null,
    adminNote: null,
    peerConfirmedAt: null,
    adminReviewedBy: null,
    adminReviewedAt: null,
    createdAt: '2025-07-01T12:00:00.000Z',
    updatedAt: '2025-07-01T12:00:00.000Z',
  };
}

const SWAP_ACTIONS: SwapAction[] = ['confirm', 'decline', 'cancel', 'approve', 'reject'];

const ACTOR_IDS: Record<SwapActorRole, string> = {
  requester: 'r-requester',
  target: 'r-target',
  admin: 'admin-1',
};

function captureSwapError(fn: () => unknown): SwapError {
  try {
    fn();
  } catch (error) {
    if (error instanceof SwapError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a SwapError');
}

describe('PGY compatibility', () => {
  it('pairs juniors with juniors and seniors with seniors', () => {
    expect(canSwapPgyLevels('TY', 'PGY1')).toBe(true);
    expect(canSwapPgyLevels('PGY1', 'PGY1')).toBe(true);
    expect(canSwapPgyLevels('PGY2', 'PGY3')).toBe(true);
    expect(canSwapPgyLevels('PGY1', 'PGY2')).toBe(false);
    expect(canSwapPgyLevels('PGY1', 'PGY3')).toBe(false);
    expect(canSwapPgyLevels('TY', 'PGY3')).toBe(false);
  });

  it('lists the levels a resident may trade with', () => {
    expect(compatiblePgyLevels('PGY3')).toEqual(['PGY2', 'PGY3']);
    expect(compatiblePgyLevels('TY')).toEqual(['TY', 'PGY1']);
  });
});

describe('resolveTransition', () => {
  it('moves a pending swap to peer_confirmed when the target confirms', () => {
    expect(resolveTransition(buildSwap('pending'), 'confirm', 'r-target')).toBe('peer_confirmed');
  });

  it('checks the actor before the status', () => {
    const error = captureSwapError(() =>
      resolveTransition(buildSwap('approved'), 'confirm', 'r-requester'),
    );

    expect(error.reason).toEqual({
      kind: 'wrong-actor',
      swapId: 'swap-1',
      action: 'confirm',
      actorId: 'r-requester',
      expected: 'target',
    });
    expect(error.message).toBe('You are not the target of this swap request');
    expect(error.category).toBe('wrong-actor');
  });

  it('only lets the requester cancel', () => {
    const error = captureSwapError(() =>
      resolveTransition(buildSwap('pending'), 'cancel', 'r-target'),
    );
    expect(error.message).toBe('You are not the requester of this swap');
    expect(resolveTransition(buildSwap('peer_confirmed'), 'cancel', 'r-requester')).toBe(
      'cancelled',
    );
  });

  it('rejects an approval outside peer_confirmed', () => {
    const error = captureSwapError(() =>
      resolveTransition(buildSwap('pending'), 'approve', 'admin-1'),
    );
    expect(error.category).toBe('wrong-status');
    expect(error.message).toBe('Cannot approve swap in pending status (allowed: peer_confirmed)');
  });

  it('lets an admin reject from pending and peer_confirmed only', () => {
    expect(resolveTransition(buildSwap('pending'), 'reject', 'admin-1')).toBe('rejected');
    expect(resolveTransition(buildSwap('peer_confirmed'), 'reject', 'admin-1')).toBe('rejected');
    expect(() => resolveTransition(buildSwap('cancelled'), 'reject', 'admin-1')).toThrow(
      'Cannot reject swap in cancelled status (allowed: pending, peer_confirmed)',
    );
  });

  it('declines only while pending', () => {
    expect(resolveTransition(buildSwap('pending'), 'decline', 'r-target')).toBe('rejected');
    expect(() => resolveTransition(buildSwap('peer_confirmed'), 'decline', 'r-target')).toThrow(
      SwapError,
    );
  });
});

describe('swap status graph', () => {
  it.each(['approved', 'rejected', 'cancelled'] as const)(
    'allows no action out of %s',
    (status) => {
      const kinds = SWAP_ACTIONS.map((action) => {
        const actorId = ACTOR_IDS[SWAP_TRANSITIONS[action].actor];
        return captureSwapError(() => resolveTransition(buildSwap(status), action, actorId)).reason
          .kind;
      });
      expect(kinds).toEqual(SWAP_ACTIONS.map(() => 'wrong-status'));
    },
  );

  it('assigns each action a single actor role', () => {
    expect(SWAP_TRANSITIONS.approve.actor).toBe('admin');
    expect(SWAP_TRANSITIONS.confirm.actor).toBe('target');
    expect(SWAP_TRANSITIONS.cancel.actor).toBe('requester');
  });
});

describe('describeSwapRejection', () => {
  const cases: Array<[SwapRejectionReason, string, string]> = [
    [{ kind: 'self-swap', residentId: 'r-1' }, 'Cannot swap with yourself', 'invalid-request'],
    [
      { kind: 'resident-not-found', party: 'requester', residentId: 'r-1' },
      'Requester not found',
      'not-found',
    ],
    [
      { kind: 'resident-not-found', party: 'target', residentId: 'r-2' },
      'Target resident not found',
      'not-found',
    ],
    [
      {
        kind: 'pgy-incompatible',
        requesterId: 'r-1',
        targetId: 'r-2',
        requesterLevel: 'PGY1',
        targetLevel: 'PGY3',
      },
      'PGY level mismatch: PGY1 cannot swap with PGY3',
      'invalid-request',
    ],
    [
      { kind: 'assignment-not-found', party: 'target', assignmentId: 'a-2' },
      "Target's assignment not found",
      'not-found',
    ],
    [
      {
        kind: 'assignment-ownership',
        party: 'requester',
        assignmentId: 'a-2',
        residentId: 'r-1',
        ownerId: 'r-2',
      },
      'Requester assignment does not belong to requester',
      'invalid-request',
    ],
    [
      { kind: 'duplicate-pending', requesterId: 'r-1', assignmentId: 'a-1', existingSwapId: null },
      'A pending swap request already exists for this assignment',
      'conflict',
    ],
    [{ kind: 'swap-not-found', swapId: 'swap-9' }, 'Swap request not found', 'not-found'],
  ];

  it.each(cases)('renders %o', (reason, message, category) => {
    expect(describeSwapRejection(reason)).toBe(message);
    expect(categorizeSwapRejection(reason)).toBe(category);
  });
});
