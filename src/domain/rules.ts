import type { PgyLevel, SwapRequest, SwapStatus } from './types';

/**
 * Swap-eligible groups. Seniors and juniors never trade with each other, whatever the distance
 * between their levels.
 */
export const PGY_SWAP_GROUPS: Readonly<Record<PgyLevel, ReadonlySet<PgyLevel>>> = {
  TY: new Set<PgyLevel>(['TY', 'PGY1']),
  PGY1: new Set<PgyLevel>(['TY', 'PGY1']),
  PGY2: new Set<PgyLevel>(['PGY2', 'PGY3']),
  PGY3: new Set<PgyLevel>(['PGY2', 'PGY3']),
};

export function canSwapPgyLevels(a: PgyLevel, b: PgyLevel): boolean {
  return PGY_SWAP_GROUPS[a].has(b);
}

export function compatiblePgyLevels(level: PgyLevel): PgyLevel[] {
  return [...PGY_SWAP_GROUPS[level]];
}

export type SwapAction = 'confirm' | 'decline' | 'cancel' | 'approve' | 'reject';

export type SwapActorRole = 'requester' | 'target' | 'admin';

type TransitionRule = {
  from: readonly SwapStatus[];
  to: SwapStatus;
  actor: SwapActorRole;
};

export const SWAP_TRANSITIONS = {
  confirm: { from: ['pending'], to: 'peer_confirmed', actor: 'target' },
  decline: { from: ['pending'], to: 'rejected', actor: 'target' },
  cancel: { from: ['pending', 'peer_confirmed'], to: 'cancelled', actor: 'requester' },
  approve: { from: ['peer_confirmed'], to: 'approved', actor: 'admin' },
  reject: { from: ['pending', 'peer_confirmed'], to: 'rejected', actor: 'admin' },
} as const satisfies Record<SwapAction, TransitionRule>;

export type SwapParty = 'requester' | 'target';

export type SwapRejectionReason =
  | { kind: 'self-swap'; residentId: string }
  | { kind: 'resident-not-found'; party: SwapParty; residentId: string }
  | {
      kind: 'pgy-incompatible';
      requesterId: string;
      targetId: string;
      requesterLevel: PgyLevel;
      targetLevel: PgyLevel;
    }
  | { kind: 'assignment-not-found'; party: SwapParty; assignmentId: string }
  | {
      kind: 'assignment-ownership';
      party: SwapParty;
      assignmentId: string;
      residentId: string;
      ownerId: string;
    }
  | {
      kind: 'duplicate-pending';
      requesterId: string;
      assignmentId: string;
      existingSwapId: string | null;
    }
  | { kind: 'swap-not-found'; swapId: string }
  | {
      kind: 'wrong-actor';
      swapId: string;
      action: SwapAction;
      actorId: string;
      expected: Exclude<SwapActorRole, 'admin'>;
    }
  | {
      kind: 'wrong-status';
      swapId: string;
      action: SwapAction;
      status: SwapStatus;
      allowed: readonly SwapStatus[];
    };

export type SwapErrorCategory =
  | 'not-found'
  | 'wrong-actor'
  | 'wrong-status'
  | 'invalid-request'
  | 'conflict';

export function categorizeSwapRejection(reason: SwapRejectionReason): SwapErrorCategory {
  switch (reason.kind) {
    case 'resident-not-found':
    case 'assignment-not-found':
    case 'swap-not-found':
      return 'not-found';
    case 'wrong-actor':
      return 'wrong-actor';
    case 'wrong-status':
      return 'wrong-status';
    case 'duplicate-pending':
      return 'conflict';
    case 'self-swap':
    case 'pgy-incompatible':
    case 'assignment-ownership':
      return 'invalid-request';
  }
}

export function describeSwapRejection(reason: SwapRejectionReason): string {
  switch (reason.kind) {
    case 'self-swap':
      return 'Cannot swap with yourself';
    case 'resident-not-found':
      return reason.party === 'requester' ? 'Requester not found' : 'Target resident not found';
    case 'pgy-incompatible':
      return `PGY level mismatch: ${reason.requesterLevel} cannot swap with ${reason.targetLevel}`;
    case 'assignment-not-found':
      return reason.party === 'requester'
        ? "Requester's assignment not found"
        : "Target's assignment not found";
    case 'assignment-ownership':
      return reason.party === 'requester'
        ? 'Requester assignment does not belong to requester'
        : 'Target assignment does not belong to target';
    case 'duplicate-pending':
      return 'A pending swap request already exists for this assignment';
    case 'swap-not-found':
      return 'Swap request not found';
    case 'wrong-actor':
      return reason.expected === 'target'
        ? 'You are not the target of this swap request'
        : 'You are not the requester of this swap';
    case 'wrong-status':
      return `Cannot ${reason.action} swap in ${reason.status} status (allowed: ${reason.allowed.join(', ')})`;
  }
}

export class SwapError extends Error {
  public readonly category: SwapErrorCategory;

  constructor(public readonly reason: SwapRejectionReason) {
    super(describeSwapRejection(reason));
    this.name = 'SwapError';
    this.category = categorizeSwapRejection(reason);
  }
}

/**
 * Checks actor then status for a transition and returns the status it leads to. Admin actions
 * carry no actor check here; authorising the admin is the caller's concern.
 */
export function resolveTransition(
  swap: SwapRequest,
  action: SwapAction,
  actorId: string,
): SwapStatus {
  const rule: TransitionRule = SWAP_TRANSITIONS[action];

  if (rule.actor === 'target' && swap.targetId !== actorId) {
    throw new SwapError({
      kind: 'wrong-actor',
      swapId: swap.id,
      action,
      actorId,
      expected: 'target',
    });
  }
  if (rule.actor === 'requester' && swap.requesterId !== actorId) {
    throw new SwapError({
      kind: 'wrong-actor',
      swapId: swap.id,
      action,
      actorId,
      expected: 'requester',
    });
  }

  if (!rule.from.includes(swap.status)) {
    throw new SwapError({
      kind: 'wrong-status',
      swapId: swap.id,
      action,
      status: swap.status,
      allowed: rule.from,
    });
  }

  return rule.to;
}
