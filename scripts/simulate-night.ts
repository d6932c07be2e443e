/**
 * Drives one tracked night through the state holders and prints the history.
 * Run with: npx tsx scripts/simulate-night.ts
 */
import { loadConfig } from '../src/config/index.js';
import { createSleepTrackerApp } from '../src/app.js';
import { renderHistoryText } from '../src/core/tracker/formatHistory.js';

const EIGHT_HOURS = 8 * 60 * 60 * 1000;

async function main(): Promise<void> {
  const config = loadConfig();
  let clock = Date.parse('2026-01-30T22:30:00Z');
  const app = createSleepTrackerApp(
    { ...config, databasePath: config.databasePath ?? ':memory:' },
    { now: () => clock }
  );

  app.tracker.state.subscribe((snapshot, previous) => {
    if (snapshot.currentSession !== previous.currentSession) {
      console.log('current session:', snapshot.currentSession);
    }
  });

  await app.tracker.onStartTracking();
  clock += EIGHT_HOURS;
  await app.tracker.onStopTracking();

  const { sessionToRate } = app.tracker.state.getState();
  if (sessionToRate) {
    app.tracker.doneNavigatingToQuality();
    const screen = app.openQualityScreen(sessionToRate.id);
    await screen.onSetSleepQuality(4);
    console.log('navigate back:', screen.state.getState().navigateSignal);
    screen.doneNavigating();
  }

  await app.tracker.whenIdle();
  console.log(renderHistoryText(app.tracker.state.getState().historyView));
  await app.close();
}

main().catch((error) => {
  console.error('Simulation failed:', error);
  process.exit(1);
});
