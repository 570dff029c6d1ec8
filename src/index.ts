export * from '@domain/types';
export * from '@domain/programRules';
export * from '@domain/calendar';
export * from '@domain/dutyHours';
export * from '@domain/rules';
export * from '@engine/store';
export { MemoryScheduleStore } from '@engine/memoryStore';
export { SqliteScheduleStore, type SqliteScheduleStoreOptions } from '@engine/sqliteStore';
export * from '@engine/scheduleValidator';
export * from '@engine/swapWorkflow';
export * from '@config/runtimeEnv';
export { formatViolationsCsv, VIOLATION_CSV_COLUMNS } from '@utils/csv';
export { setDebugLogging, getDebugChannel } from '@utils/debug';
