import type pino from 'pino';
import { z } from 'zod';
import { createStore, type StoreApi } from 'zustand/vanilla';
import type { SleepSessionStore } from '../../ports/SleepSessionStore.js';
import { ValidationError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { WorkScope } from '../scope/WorkScope.js';
import { MAX_QUALITY_SCORE, MIN_QUALITY_SCORE } from '../tracker/formatHistory.js';

export interface QualitySnapshot {
  /** Raised once the score is stored; the observer resets it with doneNavigating(). */
  navigateSignal: boolean;
}

export interface QualityStateOptions {
  /** Runs once, the first time the screen is disposed. */
  onDispose?: () => void;
}

const qualityScoreSchema = z.number().int().min(MIN_QUALITY_SCORE).max(MAX_QUALITY_SCORE);

/**
 * State for the rating screen of a single, already closed session.
 */
export class QualityState {
  readonly state: StoreApi<QualitySnapshot>;

  private readonly logger: pino.Logger;
  private readonly scope = new WorkScope('QualityState');

  constructor(
    readonly targetSessionId: number,
    private readonly store: SleepSessionStore,
    private readonly options: QualityStateOptions = {}
  ) {
    this.logger = createLogger({ component: 'QualityState', sessionId: targetSessionId });
    this.state = createStore<QualitySnapshot>()(() => ({ navigateSignal: false }));
  }

  onSetSleepQuality(score: number): Promise<void> {
    const parsed = qualityScoreSchema.safeParse(score);
    if (!parsed.success) {
      throw new ValidationError(
        `Sleep quality must be an integer from ${MIN_QUALITY_SCORE} to ${MAX_QUALITY_SCORE}, got ${score}`,
        { cause: parsed.error }
      );
    }
    const qualityScore = parsed.data;

    return this.scope.launch('setSleepQuality', async () => {
      const session = await this.scope.io(() => this.store.getRecord(this.targetSessionId));
      if (!session) {
        this.logger.info('Session no longer exists; skipping rating');
        return;
      }
      const stored = await this.scope.io(() => this.store.updateRecord({ ...session, qualityScore }));
      if (!stored) {
        this.logger.info('Session was removed before the rating was stored');
        return;
      }
      this.state.setState({ navigateSignal: true });
      this.logger.info({ qualityScore }, 'Sleep quality recorded');
    });
  }

  doneNavigating(): void {
    this.state.setState({ navigateSignal: false });
  }

  whenIdle(): Promise<void> {
    return this.scope.whenIdle();
  }

  dispose(): void {
    if (!this.scope.isActive) return;
    this.scope.cancel();
    this.options.onDispose?.();
  }
}
