import { randomUUID } from 'node:crypto';
import { DEFAULT_PROGRAM_RULES, type ProgramRules } from '@domain/programRules';
import { SwapError, canSwapPgyLevels, compatiblePgyLevels, resolveTransition } from '@domain/rules';
import type { SwapAction, SwapParty } from '@domain/rules';
import type {
  AuditAction,
  Resident,
  RotationAssignment,
  SwapQuery,
  SwapRequest,
  SwapStatus,
} from '@domain/types';
import { nowISO } from '@utils/dayjs';
import { debugLog, withDebugGroup } from '@utils/debug';
import { collectViolations, enforceNoHardViolations } from './scheduleValidator';
import { StoreConstraintError } from './store';
import type { ScheduleReader, ScheduleStore, ScheduleWriter } from './store';

export type SwapWorkflowOptions = {
  rules?: ProgramRules;
  /** Re-validate both residents after the exchange and abort approval on a hard violation. */
  validateOnApprove?: boolean;
  now?: () => string;
  createId?: () => string;
};

export type CreateSwapRequestInput = {
  requesterId: string;
  targetId: string;
  requesterAssignmentId: string;
  targetAssignmentId: string;
  note?: string | null;
};

export type EligibleTarget = {
  resident: Resident;
  assignment: RotationAssignment;
};

export type SwapAssignmentDetail = RotationAssignment & { rotationName: string | null };

export type SwapDetails = {
  swap: SwapRequest;
  requester: Resident | null;
  target: Resident | null;
  requesterAssignment: SwapAssignmentDetail | null;
  targetAssignment: SwapAssignmentDetail | null;
};

type TransitionContext = {
  tx: ScheduleWriter;
  swap: SwapRequest;
  next: SwapStatus;
  timestamp: string;
};

function loadAssignment(
  tx: ScheduleReader,
  party: SwapParty,
  assignmentId: string,
): RotationAssignment {
  const assignment = tx.getAssignment(assignmentId);
  if (!assignment) {
    throw new SwapError({ kind: 'assignment-not-found', party, assignmentId });
  }
  return assignment;
}

function describeAssignment(
  tx: ScheduleReader,
  assignmentId: string,
): SwapAssignmentDetail | null {
  const assignment = tx.getAssignment(assignmentId);
  if (!assignment) {
    return null;
  }
  return { ...assignment, rotationName: tx.getRotationType(assignment.rotationId)?.name ?? null };
}

export class SwapWorkflow {
  private readonly rules: ProgramRules;
  private readonly validateOnApprove: boolean;
  private readonly now: () => string;
  private readonly createId: () => string;

  constructor(
    private readonly store: ScheduleStore,
    options: SwapWorkflowOptions = {},
  ) {
    this.rules = options.rules ?? DEFAULT_PROGRAM_RULES;
    this.validateOnApprove = options.validateOnApprove ?? false;
    this.now = options.now ?? nowISO;
    this.createId = options.createId ?? randomUUID;
  }

  createSwapRequest(input: CreateSwapRequestInput): SwapRequest {
    return withDebugGroup('swap.create', input, () =>
      this.store.transaction((tx) => {
        const { requesterId, targetId, requesterAssignmentId, targetAssignmentId } = input;

        if (requesterId === targetId) {
          throw new SwapError({ kind: 'self-swap', residentId: requesterId });
        }

        const requester = tx.getResident(requesterId);
        if (!requester) {
          throw new SwapError({
            kind: 'resident-not-found',
            party: 'requester',
            residentId: requesterId,
          });
        }
        const target = tx.getResident(targetId);
        if (!target) {
          throw new SwapError({
            kind: 'resident-not-found',
            party: 'target',
            residentId: targetId,
          });
        }

        if (!canSwapPgyLevels(requester.pgyLevel, target.pgyLevel)) {
          throw new SwapError({
            kind: 'pgy-incompatible',
            requesterId,
            targetId,
            requesterLevel: requester.pgyLevel,
            targetLevel: target.pgyLevel,
          });
        }

        const requesterAssignment = loadAssignment(tx, 'requester', requesterAssignmentId);
        const targetAssignment = loadAssignment(tx, 'target', targetAssignmentId);

        if (requesterAssignment.residentId !== requesterId) {
          throw new SwapError({
            kind: 'assignment-ownership',
            party: 'requester',
            assignmentId: requesterAssignmentId,
            residentId: requesterId,
            ownerId: requesterAssignment.residentId,
          });
        }
        if (targetAssignment.residentId !== targetId) {
          throw new SwapError({
            kind: 'assignment-ownership',
            party: 'target',
            assignmentId: targetAssignmentId,
            residentId: targetId,
            ownerId: targetAssignment.residentId,
          });
        }

        const existing = tx.findOutstandingSwap(requesterId, requesterAssignmentId);
        if (existing) {
          throw new SwapError({
            kind: 'duplicate-pending',
            requesterId,
            assignmentId: requesterAssignmentId,
            existingSwapId: existing.id,
          });
        }

        const timestamp = this.now();
        const swap: SwapRequest = {
          id: this.createId(),
          requesterId,
          targetId,
          requesterAssignmentId,
          targetAssignmentId,
          status: 'pending',
          requesterNote: input.note ?? null,
          adminNote: null,
          peerConfirmedAt: null,
          adminReviewedBy: null,
          adminReviewedAt: null,
          createdAt: timestamp,
          updatedAt: timestamp,
        };

        try {
          tx.insertSwapRequest(swap);
        } catch (error) {
          if (error instanceof StoreConstraintError && error.constraint === 'outstanding_swap') {
            throw new SwapError({
              kind: 'duplicate-pending',
              requesterId,
              assignmentId: requesterAssignmentId,
              existingSwapId: null,
            });
          }
          throw error;
        }

        debugLog('swap.created', { swapId: swap.id, requesterId, targetId });
        return swap;
      }),
    );
  }

  confirmSwap(swapId: string, residentId: string): SwapRequest {
    return this.transition(swapId, 'confirm', residentId, ({ swap, next, timestamp }) => ({
      ...swap,
      status: next,
      peerConfirmedAt: timestamp,
      updatedAt: timestamp,
    }));
  }

  declineSwap(swapId: string, residentId: string): SwapRequest {
    return this.transition(swapId, 'decline', residentId, ({ swap, next, timestamp }) => ({
      ...swap,
      status: next,
      updatedAt: timestamp,
    }));
  }

  cancelSwap(swapId: string, residentId: string): SwapRequest {
    return this.transition(swapId, 'cancel', residentId, ({ swap, next, timestamp }) => ({
      ...swap,
      status: next,
      updatedAt: timestamp,
    }));
  }

  /**
   * Exchanges the two assignments' rotations and marks the request approved. The exchange, the
   * status change and the audit entry commit together or not at all.
   */
  approveSwap(swapId: string, adminId: string, note: string | null = null): SwapRequest {
    return this.transition(swapId, 'approve', adminId, ({ tx, swap, next, timestamp }) => {
      const requesterAssignment = loadAssignment(tx, 'requester', swap.requesterAssignmentId);
      const targetAssignment = loadAssignment(tx, 'target', swap.targetAssignmentId);

      tx.setAssignmentRotation(requesterAssignment.id, targetAssignment.rotationId);
      tx.setAssignmentRotation(targetAssignment.id, requesterAssignment.rotationId);

      if (this.validateOnApprove) {
        const violations = collectViolations(
          tx,
          [requesterAssignment.residentId, targetAssignment.residentId],
          this.rules,
        );
        enforceNoHardViolations(violations, 'swap_approve');
      }

      const approved: SwapRequest = {
        ...swap,
        status: next,
        adminNote: note,
        adminReviewedBy: adminId,
        adminReviewedAt: timestamp,
        updatedAt: timestamp,
      };
      this.audit(tx, 'swap_approve', adminId, timestamp, swap, approved, {
        requesterRotationId: targetAssignment.rotationId,
        targetRotationId: requesterAssignment.rotationId,
      });
      return approved;
    });
  }

  rejectSwap(swapId: string, adminId: string, note: string | null = null): SwapRequest {
    return this.transition(swapId, 'reject', adminId, ({ tx, swap, next, timestamp }) => {
      const rejected: SwapRequest = {
        ...swap,
        status: next,
        adminNote: note,
        adminReviewedBy: adminId,
        adminReviewedAt: timestamp,
        updatedAt: timestamp,
      };
      this.audit(tx, 'swap_reject', adminId, timestamp, swap, rejected);
      return rejected;
    });
  }

  /**
   * Residents the given resident could offer `assignmentId` to: active, same academic year and
   * PGY group, with an assignment starting the same week. Empty when the resident or the
   * assignment is unknown, or the assignment belongs to someone else.
   */
  getEligibleTargets(residentId: string, assignmentId: string): EligibleTarget[] {
    return this.store.transaction((tx) => {
      const requester = tx.getResident(residentId);
      const assignment = tx.getAssignment(assignmentId);
      if (!requester || !assignment || assignment.residentId !== residentId) {
        return [];
      }

      const candidates = tx.listResidents({
        activeOnly: true,
        academicYearId: requester.academicYearId,
        pgyLevels: compatiblePgyLevels(requester.pgyLevel),
        excludeIds: [residentId],
      });
      const weekAssignments = new Map(
        tx
          .listAssignmentsForWeek(
            assignment.weekStartISO,
            candidates.map((candidate) => candidate.id),
          )
          .map((candidateAssignment) => [candidateAssignment.residentId, candidateAssignment]),
      );

      const targets: EligibleTarget[] = [];
      for (const resident of candidates) {
        const candidateAssignment = weekAssignments.get(resident.id);
        if (candidateAssignment) {
          targets.push({ resident, assignment: candidateAssignment });
        }
      }
      debugLog('swap.eligible', { residentId, assignmentId, targets: targets.length });
      return targets;
    });
  }

  listSwapRequests(query: SwapQuery = {}): SwapRequest[] {
    return this.store.transaction((tx) => tx.listSwapRequests(query));
  }

  getSwapDetails(swapId: string): SwapDetails | null {
    return this.store.transaction((tx) => {
      const swap = tx.getSwapRequest(swapId);
      if (!swap) {
        return null;
      }
      return {
        swap,
        requester: tx.getResident(swap.requesterId),
        target: tx.getResident(swap.targetId),
        requesterAssignment: describeAssignment(tx, swap.requesterAssignmentId),
        targetAssignment: describeAssignment(tx, swap.targetAssignmentId),
      };
    });
  }

  private transition(
    swapId: string,
    action: SwapAction,
    actorId: string,
    apply: (context: TransitionContext) => SwapRequest,
  ): SwapRequest {
    return withDebugGroup(`swap.${action}`, { swapId, actorId }, () =>
      this.store.transaction((tx) => {
        const swap = tx.getSwapRequest(swapId);
        if (!swap) {
          throw new SwapError({ kind: 'swap-not-found', swapId });
        }
        const next = resolveTransition(swap, action, actorId);
        const updated = apply({ tx, swap, next, timestamp: this.now() });
        tx.updateSwapRequest(updated);
        debugLog('swap.transition', { swapId, action, from: swap.status, to: updated.status });
        return updated;
      }),
    );
  }

  private audit(
    tx: ScheduleWriter,
    action: AuditAction,
    adminId: string,
    timestamp: string,
    before: SwapRequest,
    after: SwapRequest,
    extra: Record<string, unknown> = {},
  ): void {
    tx.appendAuditEntry({
      id: this.createId(),
      adminId,
      action,
      entityType: 'swap_request',
      entityId: before.id,
      oldValue: { status: before.status },
      newValue: { status: after.status, adminNote: after.adminNote, ...extra },
      createdAt: timestamp,
    });
  }
}
