import type { Config } from './config/index.js';
import { DEFAULT_DATABASE_PATH, openDatabase } from './persistence/database.js';
import { SleepSessionRepository } from './persistence/repositories/SleepSessionRepository.js';
import { SqliteSleepSessionStore } from './adapters/sleep/SqliteSleepSessionStore.js';
import { TrackerState } from './core/tracker/TrackerState.js';
import { QualityState } from './core/quality/QualityState.js';
import { SleepTrackerError } from './utils/errors.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger({ component: 'app' });

export interface SleepTrackerApp {
  tracker: TrackerState;
  store: SqliteSleepSessionStore;
  /**
   * State for rating one closed session. Disposed by close() if still open.
   * Throws once the app is closed.
   */
  openQualityScreen(sessionId: number): QualityState;
  /** Rating screens opened and not yet disposed. */
  activeQualityScreens(): number;
  close(): Promise<void>;
}

export interface SleepTrackerAppOptions {
  now?: () => number;
}

export function createSleepTrackerApp(
  config: Config,
  options: SleepTrackerAppOptions = {}
): SleepTrackerApp {
  const db = openDatabase(config.databasePath ?? DEFAULT_DATABASE_PATH);
  const store = new SqliteSleepSessionStore(new SleepSessionRepository(db));
  const tracker = new TrackerState(store, { timeZone: config.timezone, now: options.now });
  const qualityScreens = new Set<QualityState>();
  let closed = false;

  logger.info({ timezone: config.timezone }, 'Sleep tracker ready');

  return {
    tracker,
    store,
    openQualityScreen(sessionId: number): QualityState {
      if (closed) {
        throw new SleepTrackerError('Sleep tracker is closed', 'APP_CLOSED');
      }
      const screen: QualityState = new QualityState(sessionId, store, {
        onDispose: () => qualityScreens.delete(screen),
      });
      qualityScreens.add(screen);
      return screen;
    },
    activeQualityScreens(): number {
      return qualityScreens.size;
    },
    async close(): Promise<void> {
      if (closed) return;
      closed = true;
      // Let queued writes land before the connection goes away
      await Promise.all([tracker.whenIdle(), ...[...qualityScreens].map((screen) => screen.whenIdle())]);
      tracker.dispose();
      // dispose() removes each screen from the set
      for (const screen of [...qualityScreens]) {
        screen.dispose();
      }
      db.close();
      logger.info('Sleep tracker closed');
    },
  };
}
