import { hasHardViolations, validateSchedule } from '@domain/dutyHours';
import { DEFAULT_PROGRAM_RULES, type ProgramRules } from '@domain/programRules';
import type { Violation } from '@domain/types';
import { debugLog } from '@utils/debug';
import type { ScheduleReader, ScheduleStore } from './store';

export type ValidateResidentsOptions = {
  /** Free-form label carried on the error and response, e.g. "swap_approve". */
  context?: string;
  failOnHard?: boolean;
  rules?: ProgramRules;
};

export class ScheduleValidationError extends Error {
  constructor(
    public readonly violations: readonly Violation[],
    public readonly context: string,
  ) {
    super(`Schedule validation failed (${context}): ${violations.length} violation(s)`);
    this.name = 'ScheduleValidationError';
  }
}

export type ValidationFailedResponse = {
  status: 'validation_failed';
  context: string;
  violations: Violation[];
};

export function asValidationResponse(error: ScheduleValidationError): ValidationFailedResponse {
  return {
    status: 'validation_failed',
    context: error.context,
    violations: [...error.violations],
  };
}

/** Validates the residents' full schedules as currently visible through `reader`. */
export function collectViolations(
  reader: ScheduleReader,
  residentIds: readonly string[],
  rules: ProgramRules = DEFAULT_PROGRAM_RULES,
): Violation[] {
  const assignments = reader.listAssignmentsForResidents(residentIds);
  const rotationIds = [...new Set(assignments.map((assignment) => assignment.rotationId))];
  const rotationsById = new Map(
    reader.listRotationTypes(rotationIds).map((rotation) => [rotation.id, rotation]),
  );
  return validateSchedule(assignments, rotationsById, rules);
}

export function enforceNoHardViolations(violations: readonly Violation[], context: string): void {
  if (hasHardViolations(violations)) {
    debugLog('validator.blocked', { context, violations: violations.length });
    throw new ScheduleValidationError(violations, context);
  }
}

export function validateResidents(
  store: ScheduleStore,
  residentIds: readonly string[],
  options: ValidateResidentsOptions = {},
): Violation[] {
  if (residentIds.length === 0) {
    return [];
  }
  const { context = 'validation', failOnHard = true, rules = DEFAULT_PROGRAM_RULES } = options;

  const violations = store.transaction((tx) => collectViolations(tx, residentIds, rules));
  if (failOnHard) {
    enforceNoHardViolations(violations, context);
  }
  return violations;
}
