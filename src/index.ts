export { createSleepTrackerApp } from './app.js';
export type { SleepTrackerApp, SleepTrackerAppOptions } from './app.js';
export { loadConfig } from './config/index.js';
export type { Config } from './config/index.js';
export { TrackerState, selectStartAvailable, selectStopAvailable, selectClearAvailable } from './core/tracker/TrackerState.js';
export type { TrackerSnapshot, TrackerStateOptions } from './core/tracker/TrackerState.js';
export { QualityState } from './core/quality/QualityState.js';
export type { QualitySnapshot, QualityStateOptions } from './core/quality/QualityState.js';
export { WorkScope } from './core/scope/WorkScope.js';
export { formatHistory, renderHistoryText, qualityLabel, formatDuration } from './core/tracker/formatHistory.js';
export type { HistoryRow } from './core/tracker/formatHistory.js';
export { SqliteSleepSessionStore } from './adapters/sleep/SqliteSleepSessionStore.js';
export { SleepSessionRepository } from './persistence/repositories/SleepSessionRepository.js';
export { openDatabase, runMigrations } from './persistence/database.js';
export { isOpenSession } from './ports/SleepSessionStore.js';
export type { SleepSession, NewSleepSession, SleepSessionStore } from './ports/SleepSessionStore.js';
export {
  SleepTrackerError,
  AdapterError,
  SleepStoreError,
  JobCancelledError,
  ValidationError,
  ConfigError,
} from './utils/errors.js';
