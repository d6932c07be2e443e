import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Database } from 'better-sqlite3';
import { openDatabase } from '../../persistence/database.js';
import { SleepSessionRepository } from '../../persistence/repositories/SleepSessionRepository.js';
import { SqliteSleepSessionStore } from '../../adapters/sleep/SqliteSleepSessionStore.js';
import { TrackerState } from '../../core/tracker/TrackerState.js';
import { QualityState } from '../../core/quality/QualityState.js';

describe('sleep tracking against SQLite', () => {
  let db: Database;
  let repository: SleepSessionRepository;
  let store: SqliteSleepSessionStore;
  let clock: number;
  const holders: Array<{ dispose(): void }> = [];

  function createTracker(): TrackerState {
    const tracker = new TrackerState(store, { now: () => clock, timeZone: 'UTC' });
    holders.push(tracker);
    return tracker;
  }

  function createQualityScreen(sessionId: number): QualityState {
    const screen = new QualityState(sessionId, store);
    holders.push(screen);
    return screen;
  }

  beforeEach(() => {
    db = openDatabase(':memory:');
    repository = new SleepSessionRepository(db);
    store = new SqliteSleepSessionStore(repository);
    clock = 0;
  });

  afterEach(() => {
    holders.splice(0).forEach((holder) => holder.dispose());
    db.close();
  });

  it('closes the session adopted on initialize', async () => {
    repository.create({ startTime: 100, endTime: 100 });
    const tracker = createTracker();
    await tracker.whenIdle();
    expect(tracker.state.getState().currentSession).toEqual({ id: 1, startTime: 100, endTime: 100 });

    clock = 500;
    await tracker.onStopTracking();
    await tracker.whenIdle();

    expect(repository.getById(1)).toEqual({ id: 1, startTime: 100, endTime: 500 });
    expect(tracker.state.getState().currentSession).toBeNull();
    expect(tracker.state.getState().historyView.map((row) => row.inProgress)).toEqual([false]);
  });

  it('starts tracking on an empty store', async () => {
    const tracker = createTracker();
    await tracker.whenIdle();
    expect(tracker.state.getState().currentSession).toBeNull();

    clock = 1000;
    await tracker.onStartTracking();
    await tracker.whenIdle();

    expect(repository.getAll()).toEqual([{ id: 1, startTime: 1000, endTime: 1000 }]);
    expect(tracker.state.getState().currentSession).toEqual({ id: 1, startTime: 1000, endTime: 1000 });
    expect(tracker.state.getState().historyView).toEqual([
      {
        id: 1,
        startedAt: 'Thursday Jan-01-1970 00:00',
        endedAt: null,
        duration: null,
        quality: '--',
        inProgress: true,
      },
    ]);
  });

  it('closes the session started just before a back-to-back stop', async () => {
    const tracker = createTracker();
    clock = 1000;

    const started = tracker.onStartTracking();
    const stopped = tracker.onStopTracking();
    await Promise.all([started, stopped]);
    await tracker.whenIdle();

    expect(repository.getAll()).toEqual([{ id: 1, startTime: 1000, endTime: 1001 }]);
    expect(tracker.state.getState().currentSession).toBeNull();
    expect(tracker.state.getState().sessionToRate).toEqual({ id: 1, startTime: 1000, endTime: 1001 });
  });

  it('empties the history on clear', async () => {
    const tracker = createTracker();
    clock = 1000;
    await tracker.onStartTracking();
    clock = 2000;
    await tracker.onStopTracking();
    clock = 3000;
    await tracker.onStartTracking();

    await tracker.onClear();
    await tracker.whenIdle();

    const snapshot = tracker.state.getState();
    expect(snapshot.currentSession).toBeNull();
    expect(snapshot.sessions).toEqual([]);
    expect(snapshot.historyView).toEqual([]);
    expect(repository.getAll()).toEqual([]);
  });

  it('rates the night that was just stopped', async () => {
    const tracker = createTracker();
    clock = 1000;
    await tracker.onStartTracking();
    clock = 29_800_000;
    await tracker.onStopTracking();

    const { sessionToRate } = tracker.state.getState();
    expect(sessionToRate?.id).toBe(1);
    tracker.doneNavigatingToQuality();

    const screen = createQualityScreen(1);
    await screen.onSetSleepQuality(5);
    await tracker.whenIdle();

    expect(screen.state.getState().navigateSignal).toBe(true);
    expect(repository.getById(1)).toEqual({ id: 1, startTime: 1000, endTime: 29_800_000, qualityScore: 5 });
    expect(tracker.state.getState().historyView[0]).toMatchObject({
      quality: 'Excellent',
      duration: '8:16:39',
    });
  });

  it('does not navigate when the rated session was cleared meanwhile', async () => {
    const tracker = createTracker();
    clock = 1000;
    await tracker.onStartTracking();
    clock = 2000;
    await tracker.onStopTracking();
    const screen = createQualityScreen(1);

    await tracker.onClear();
    await screen.onSetSleepQuality(3);

    expect(screen.state.getState().navigateSignal).toBe(false);
    expect(repository.getAll()).toEqual([]);
  });

  it('does not navigate when a clear lands while the rating is in flight', async () => {
    repository.create({ startTime: 100, endTime: 500 });
    const tracker = createTracker();
    await tracker.whenIdle();
    const screen = createQualityScreen(1);

    const rated = screen.onSetSleepQuality(3);
    const cleared = tracker.onClear();
    await Promise.all([rated, cleared]);

    expect(repository.getAll()).toEqual([]);
    expect(screen.state.getState().navigateSignal).toBe(false);
  });
});
