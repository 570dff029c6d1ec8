import { z } from 'zod';
import { DEFAULT_BLOCK_LENGTH_DAYS, timeOfDaySchema } from './types';

/** Weekday numbers as returned by `dayjs().day()`. */
export const SATURDAY = 6;

const ProgramRulesSchema = z
  .object({
    dutyHoursMax7d: z.number().positive(),
    dutyHoursMaxWeek: z.number().positive(),
    rotationChangeDay: z.number().int().min(0).max(6),
    blockLengthDays: z.number().int().positive(),
    defaultStartTime: timeOfDaySchema,
    defaultEndTime: timeOfDaySchema,
  })
  .strict();

export type ProgramRules = Readonly<z.infer<typeof ProgramRulesSchema>>;

// Baseline ACGME-style values; the program runs with a 100h rolling cap locally.
const ACGME_DEFAULTS: ProgramRules = {
  dutyHoursMax7d: 80,
  dutyHoursMaxWeek: 80,
  rotationChangeDay: SATURDAY,
  blockLengthDays: DEFAULT_BLOCK_LENGTH_DAYS,
  defaultStartTime: '06:00',
  defaultEndTime: '19:00',
};

const LOCAL_OVERRIDES: Partial<ProgramRules> = {
  dutyHoursMax7d: 100,
  dutyHoursMaxWeek: 80,
};

export const DEFAULT_PROGRAM_RULES: ProgramRules = Object.freeze({
  ...ACGME_DEFAULTS,
  ...LOCAL_OVERRIDES,
});

export class ProgramRulesError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    super(
      `Invalid program rules: ${issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
    );
    this.name = 'ProgramRulesError';
  }
}

export function resolveProgramRules(overrides?: Partial<ProgramRules>): ProgramRules {
  if (!overrides) {
    return DEFAULT_PROGRAM_RULES;
  }
  const result = ProgramRulesSchema.safeParse({ ...DEFAULT_PROGRAM_RULES, ...overrides });
  if (!result.success) {
    throw new ProgramRulesError(result.error.issues);
  }
  return Object.freeze(result.data);
}
