export interface SleepSession {
  id: number;
  startTime: number; // epoch ms
  endTime: number; // epoch ms; equals startTime while the session is open
  /** Self-reported quality, 0 (very bad) to 5 (excellent). Unset until rated. */
  qualityScore?: number;
}

export type NewSleepSession = Omit<SleepSession, 'id'>;

export function isOpenSession(session: SleepSession): boolean {
  return session.startTime === session.endTime;
}

export interface SleepSessionStore {
  /** Most recently inserted session, open or not. */
  getLatestOpenRecord(): Promise<SleepSession | null>;
  /** All sessions, newest first. */
  getAllRecords(): Promise<SleepSession[]>;
  getRecord(id: number): Promise<SleepSession | null>;
  insertRecord(session: NewSleepSession): Promise<void>;
  /** Resolves false when no stored session has this id. */
  updateRecord(session: SleepSession): Promise<boolean>;
  clearAllRecords(): Promise<void>;
  /** Listener runs after every write. Returns an unsubscribe function. */
  onChange(listener: () => void): () => void;
}
