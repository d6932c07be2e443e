import { createStore, type StoreApi } from 'zustand/vanilla';
import type { SleepSession, SleepSessionStore } from '../../ports/SleepSessionStore.js';
import { isOpenSession } from '../../ports/SleepSessionStore.js';
import { createLogger } from '../../utils/logger.js';
import { WorkScope } from '../scope/WorkScope.js';
import { formatHistory, type HistoryRow } from './formatHistory.js';

export interface TrackerSnapshot {
  /** The open session being tracked, if any. Always re-read from the store. */
  currentSession: SleepSession | null;
  /** Every stored session, newest first. */
  sessions: SleepSession[];
  historyView: HistoryRow[];
  /** Set to the just-closed session after a stop; consume with doneNavigatingToQuality(). */
  sessionToRate: SleepSession | null;
  /** Set after a clear; consume with doneShowingClearedNotice(). */
  showClearedNotice: boolean;
}

export interface TrackerStateOptions {
  timeZone?: string;
  now?: () => number;
}

export const selectStartAvailable = (s: TrackerSnapshot): boolean => s.currentSession === null;
export const selectStopAvailable = (s: TrackerSnapshot): boolean => s.currentSession !== null;
export const selectClearAvailable = (s: TrackerSnapshot): boolean => s.sessions.length > 0;

export class TrackerState {
  readonly state: StoreApi<TrackerSnapshot>;

  private readonly logger = createLogger({ component: 'TrackerState' });
  private readonly scope = new WorkScope('TrackerState');
  private readonly timeZone: string;
  private readonly now: () => number;
  private readonly unsubscribeFromStore: () => void;

  constructor(
    private readonly store: SleepSessionStore,
    options: TrackerStateOptions = {}
  ) {
    this.timeZone = options.timeZone ?? 'UTC';
    this.now = options.now ?? Date.now;
    this.state = createStore<TrackerSnapshot>()(() => ({
      currentSession: null,
      sessions: [],
      historyView: [],
      sessionToRate: null,
      showClearedNotice: false,
    }));

    this.unsubscribeFromStore = this.store.onChange(() => {
      void this.refreshHistory();
    });
    void this.initialize();
  }

  onStartTracking(): Promise<void> {
    return this.scope.launch('startTracking', async () => {
      const startedAt = this.now();
      await this.scope.io(() => this.store.insertRecord({ startTime: startedAt, endTime: startedAt }));
      const currentSession = await this.readOpenSession();
      this.state.setState({ currentSession });
      this.logger.info({ sessionId: currentSession?.id }, 'Sleep tracking started');
    });
  }

  onStopTracking(): Promise<void> {
    return this.scope.launch('stopTracking', async () => {
      const open = this.state.getState().currentSession;
      if (!open) {
        this.logger.debug('Stop requested with no open session');
        return;
      }
      // A closed session must end strictly after it started
      const closed: SleepSession = { ...open, endTime: Math.max(this.now(), open.startTime + 1) };
      const stored = await this.scope.io(() => this.store.updateRecord(closed));
      const currentSession = await this.readOpenSession();
      if (!stored) {
        this.logger.info({ sessionId: closed.id }, 'Session was removed before it could be stopped');
        this.state.setState({ currentSession });
        return;
      }
      this.state.setState({ currentSession, sessionToRate: closed });
      this.logger.info({ sessionId: closed.id }, 'Sleep tracking stopped');
    });
  }

  onClear(): Promise<void> {
    return this.scope.launch('clear', async () => {
      await this.scope.io(() => this.store.clearAllRecords());
      this.state.setState({ currentSession: null, showClearedNotice: true });
    });
  }

  doneNavigatingToQuality(): void {
    this.state.setState({ sessionToRate: null });
  }

  doneShowingClearedNotice(): void {
    this.state.setState({ showClearedNotice: false });
  }

  /** Resolves once every queued workflow and history refresh has run. */
  whenIdle(): Promise<void> {
    return this.scope.whenIdle();
  }

  dispose(): void {
    this.unsubscribeFromStore();
    this.scope.cancel();
  }

  private initialize(): Promise<void> {
    return this.scope.launch('initialize', async () => {
      const currentSession = await this.readOpenSession();
      this.state.setState({ currentSession });
      await this.loadHistory();
    });
  }

  private refreshHistory(): Promise<void> {
    return this.scope.launch('refreshHistory', () => this.loadHistory());
  }

  private async loadHistory(): Promise<void> {
    const sessions = await this.scope.io(() => this.store.getAllRecords());
    this.state.setState({ sessions, historyView: formatHistory(sessions, this.timeZone) });
  }

  /** Latest stored session when it is still open, otherwise null. */
  private async readOpenSession(): Promise<SleepSession | null> {
    const latest = await this.scope.io(() => this.store.getLatestOpenRecord());
    if (!latest || !isOpenSession(latest)) {
      return null;
    }
    return latest;
  }
}
