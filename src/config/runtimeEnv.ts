import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { resolveProgramRules, type ProgramRules } from '@domain/programRules';
import { SqliteScheduleStore } from '@engine/sqliteStore';
import { debugLog } from '@utils/debug';

export const DEFAULT_DB_PATH = 'data/rotations.db';
const IN_MEMORY_DB = ':memory:';

export type RuntimeEnv = Readonly<{
  dbPath: string;
  rules: ProgramRules;
  validateOnApprove: boolean;
}>;

type RawEnv = {
  readonly ROTATION_DB_PATH?: string;
  readonly DUTY_HOURS_MAX_7D?: string;
  readonly DUTY_HOURS_MAX_WEEK?: string;
  readonly SWAP_VALIDATE_ON_APPROVE?: string;
};

let cachedEnv: RuntimeEnv | null = null;
let warnedDbFallback = false;

function normalize(value: string | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function parseHours(name: string, value: string | undefined): number | undefined {
  const normalized = normalize(value);
  if (normalized === null) {
    return undefined;
  }
  const hours = Number(normalized);
  if (!Number.isFinite(hours) || hours <= 0) {
    throw new Error(`Invalid ${name} provided: expected a positive number, got "${normalized}"`);
  }
  return hours;
}

function parseFlag(name: string, value: string | undefined): boolean {
  const normalized = normalize(value)?.toLowerCase() ?? null;
  if (normalized === null) {
    return false;
  }
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }
  throw new Error(`Invalid ${name} provided: expected true, false, 1 or 0, got "${normalized}"`);
}

export function resolveRuntimeEnv(rawEnv: RawEnv = process.env): RuntimeEnv {
  if (cachedEnv) {
    return cachedEnv;
  }

  const dbPath = normalize(rawEnv.ROTATION_DB_PATH) ?? DEFAULT_DB_PATH;
  if (dbPath === DEFAULT_DB_PATH && !warnedDbFallback) {
    warnedDbFallback = true;
    debugLog('env', `ROTATION_DB_PATH not set; falling back to ${DEFAULT_DB_PATH}.`);
  }

  const dutyHoursMax7d = parseHours('DUTY_HOURS_MAX_7D', rawEnv.DUTY_HOURS_MAX_7D);
  const dutyHoursMaxWeek = parseHours('DUTY_HOURS_MAX_WEEK', rawEnv.DUTY_HOURS_MAX_WEEK);

  cachedEnv = {
    dbPath,
    rules: resolveProgramRules({
      ...(dutyHoursMax7d === undefined ? {} : { dutyHoursMax7d }),
      ...(dutyHoursMaxWeek === undefined ? {} : { dutyHoursMaxWeek }),
    }),
    validateOnApprove: parseFlag('SWAP_VALIDATE_ON_APPROVE', rawEnv.SWAP_VALIDATE_ON_APPROVE),
  };

  return cachedEnv;
}

export function resetRuntimeEnv(): void {
  cachedEnv = null;
  warnedDbFallback = false;
}

export function openScheduleStore(env: RuntimeEnv = resolveRuntimeEnv()): SqliteScheduleStore {
  if (env.dbPath !== IN_MEMORY_DB) {
    mkdirSync(path.dirname(path.resolve(env.dbPath)), { recursive: true });
  }
  return new SqliteScheduleStore({
    filename: env.dbPath,
    blockLengthDays: env.rules.blockLengthDays,
  });
}
