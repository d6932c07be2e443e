import type { Database } from 'better-sqlite3';
import type { NewSleepSession, SleepSession } from '../../ports/SleepSessionStore.js';

type SleepSessionRow = {
  id: number;
  start_time_milli: number;
  end_time_milli: number;
  quality_score: number | null;
};

function rowToSession(row: SleepSessionRow): SleepSession {
  const session: SleepSession = {
    id: row.id,
    startTime: row.start_time_milli,
    endTime: row.end_time_milli,
  };
  if (row.quality_score != null) session.qualityScore = row.quality_score;
  return session;
}

export class SleepSessionRepository {
  constructor(private readonly db: Database) {}

  create(input: NewSleepSession): SleepSession {
    const result = this.db
      .prepare(
        `INSERT INTO sleep_sessions (start_time_milli, end_time_milli, quality_score)
         VALUES (?, ?, ?)`
      )
      .run(input.startTime, input.endTime, input.qualityScore ?? null);
    return {
      id: Number(result.lastInsertRowid),
      ...input,
    };
  }

  getLatest(): SleepSession | null {
    const row = this.db
      .prepare('SELECT * FROM sleep_sessions ORDER BY id DESC LIMIT 1')
      .get() as SleepSessionRow | undefined;
    if (!row) return null;
    return rowToSession(row);
  }

  getAll(): SleepSession[] {
    const rows = this.db
      .prepare('SELECT * FROM sleep_sessions ORDER BY id DESC')
      .all() as SleepSessionRow[];
    return rows.map(rowToSession);
  }

  getById(id: number): SleepSession | null {
    const row = this.db
      .prepare('SELECT * FROM sleep_sessions WHERE id = ?')
      .get(id) as SleepSessionRow | undefined;
    if (!row) return null;
    return rowToSession(row);
  }

  /** Overwrites every column of an existing row. Returns false when the id is gone. */
  update(session: SleepSession): boolean {
    const result = this.db
      .prepare(
        `UPDATE sleep_sessions
         SET start_time_milli = ?, end_time_milli = ?, quality_score = ?
         WHERE id = ?`
      )
      .run(session.startTime, session.endTime, session.qualityScore ?? null, session.id);
    return result.changes > 0;
  }

  clear(): number {
    return this.db.prepare('DELETE FROM sleep_sessions').run().changes;
  }
}
