import type { SleepSession } from '../../ports/SleepSessionStore.js';
import { isOpenSession } from '../../ports/SleepSessionStore.js';

export interface HistoryRow {
  id: number;
  startedAt: string;
  /** Null while the session is still being tracked. */
  endedAt: string | null;
  duration: string | null;
  quality: string;
  inProgress: boolean;
}

const QUALITY_LABELS: readonly string[] = [
  'Very bad',
  'Poor',
  'So-so',
  'OK',
  'Pretty good',
  'Excellent',
];

export const MIN_QUALITY_SCORE = 0;
export const MAX_QUALITY_SCORE = QUALITY_LABELS.length - 1;

export function qualityLabel(score: number | undefined): string {
  if (score === undefined) return '--';
  return QUALITY_LABELS[score] ?? '--';
}

function formatTimestamp(epochMillis: number, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    weekday: 'long',
    year: 'numeric',
    month: 'short',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(new Date(epochMillis));

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';

  // e.g. "Thursday Jan-01-1970 00:00"
  return `${part('weekday')} ${part('month')}-${part('day')}-${part('year')} ${part('hour')}:${part('minute')}`;
}

/** Elapsed time as H:MM:SS. */
export function formatDuration(elapsedMillis: number): string {
  const totalSeconds = Math.max(0, Math.floor(elapsedMillis / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${hours}:${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

export function toHistoryRow(session: SleepSession, timeZone: string): HistoryRow {
  const inProgress = isOpenSession(session);
  return {
    id: session.id,
    startedAt: formatTimestamp(session.startTime, timeZone),
    endedAt: inProgress ? null : formatTimestamp(session.endTime, timeZone),
    duration: inProgress ? null : formatDuration(session.endTime - session.startTime),
    quality: qualityLabel(session.qualityScore),
    inProgress,
  };
}

export function formatHistory(sessions: readonly SleepSession[], timeZone: string): HistoryRow[] {
  return sessions.map((session) => toHistoryRow(session, timeZone));
}

/** Plain-text rendering of the history list, one block per night. */
export function renderHistoryText(rows: readonly HistoryRow[]): string {
  if (rows.length === 0) return 'No sleep data yet.';

  const blocks = rows.map((row) => {
    const lines = [`Start: ${row.startedAt}`];
    if (row.inProgress) {
      lines.push('In progress');
    } else {
      lines.push(`End: ${row.endedAt ?? ''}`);
      lines.push(`Quality: ${row.quality}`);
      lines.push(`Duration: ${row.duration ?? ''}`);
    }
    return lines.join('\n');
  });

  return ['Here is your sleep data:', ...blocks].join('\n\n');
}
