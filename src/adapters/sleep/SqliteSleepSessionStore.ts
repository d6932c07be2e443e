import { EventEmitter } from 'node:events';
import type {
  NewSleepSession,
  SleepSession,
  SleepSessionStore,
} from '../../ports/SleepSessionStore.js';
import type { SleepSessionRepository } from '../../persistence/repositories/SleepSessionRepository.js';
import { SleepStoreError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const CHANGE = 'change';

export class SqliteSleepSessionStore implements SleepSessionStore {
  private readonly logger = createLogger({ adapter: 'SqliteSleepSessionStore' });
  private readonly changes = new EventEmitter();

  constructor(private readonly sleepSessionRepository: SleepSessionRepository) {}

  async getLatestOpenRecord(): Promise<SleepSession | null> {
    return this.call('getLatestOpenRecord', () => this.sleepSessionRepository.getLatest());
  }

  async getAllRecords(): Promise<SleepSession[]> {
    return this.call('getAllRecords', () => this.sleepSessionRepository.getAll());
  }

  async getRecord(id: number): Promise<SleepSession | null> {
    return this.call('getRecord', () => this.sleepSessionRepository.getById(id));
  }

  async insertRecord(session: NewSleepSession): Promise<void> {
    const created = this.call('insertRecord', () => this.sleepSessionRepository.create(session));
    this.logger.debug({ sessionId: created.id }, 'Sleep session inserted');
    this.notify();
  }

  async updateRecord(session: SleepSession): Promise<boolean> {
    const updated = this.call('updateRecord', () => this.sleepSessionRepository.update(session));
    if (!updated) {
      this.logger.warn({ sessionId: session.id }, 'Update matched no sleep session');
      return false;
    }
    this.notify();
    return true;
  }

  async clearAllRecords(): Promise<void> {
    const removed = this.call('clearAllRecords', () => this.sleepSessionRepository.clear());
    this.logger.info({ removed }, 'Sleep sessions cleared');
    this.notify();
  }

  onChange(listener: () => void): () => void {
    this.changes.on(CHANGE, listener);
    return () => {
      this.changes.off(CHANGE, listener);
    };
  }

  private notify(): void {
    this.changes.emit(CHANGE);
  }

  private call<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new SleepStoreError(`Sleep session store failed during ${operation}`, { cause: error });
    }
  }
}
