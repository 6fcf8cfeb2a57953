/**
 * Interest Graph Service
 *
 * Records user interactions against a profile's weighted interest graph.
 * Each interaction is one read-modify-write of the whole graph, committed
 * with a version check and retried when another writer got in first.
 */

import { InvalidArgumentError, OptimisticLockError } from '../errors.js';
import { ConsoleLogger, type Logger } from '../logging/console-logger.js';
import { DEFAULT_DECAY_RATE, type InterestScore } from '../models/interest-score.model.js';
import {
  actionWeight,
  GENERAL_INTEREST,
  InterestGraph,
  type RankedInterest,
} from '../models/interest-graph.model.js';
import type { IProfileStore } from '../stores/profile-store.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { retry } from '../utils/retry.js';

export interface InterestGraphServiceOptions {
  /** Decay rate given to labels the graph has not seen before */
  decayRate?: number;
  /** Attempts before a version conflict is surfaced */
  maxAttempts?: number;
  clock?: Clock;
  logger?: Logger;
}

export class InterestGraphService {
  private readonly decayRate: number;
  private readonly maxAttempts: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly profiles: IProfileStore,
    options: InterestGraphServiceOptions = {}
  ) {
    this.decayRate = options.decayRate ?? DEFAULT_DECAY_RATE;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new ConsoleLogger('InterestGraph');
  }

  /**
   * Apply one interaction and persist the graph.
   *
   * @returns the label's score after the update
   * @throws InvalidArgumentError for an unknown action or empty label (nothing is written)
   * @throws OptimisticLockError when every attempt lost a concurrent write
   */
  async recordInteraction(userId: string, label: string, actionType: string): Promise<InterestScore> {
    actionWeight(actionType);
    if (label.trim() === '') {
      throw new InvalidArgumentError('Interest label must not be empty', 'label');
    }
    await this.profiles.ensure(userId);

    return retry(
      async () => {
        const current = await this.readGraph(userId);
        const now = this.clock();
        const next = current.graph.recordInteraction(label, actionType, now, this.decayRate);
        await this.profiles.writeInterestGraph(userId, next, current.version);

        const updated = next.get(label.trim());
        if (!updated) {
          throw new Error(`Interest "${label}" missing after update`);
        }
        this.logger.debug('Recorded interaction', {
          userId,
          label: updated.label,
          actionType,
          score: updated.score,
        });
        return updated;
      },
      {
        maxAttempts: this.maxAttempts,
        shouldRetry: (error) => error instanceof OptimisticLockError,
        onRetry: (_error, attempt) => {
          this.logger.warn('Interest graph changed concurrently, retrying', { userId, attempt });
        },
      }
    );
  }

  /**
   * Label with the highest stored score, or "General" for an empty graph or
   * an unknown user.
   */
  async topInterest(userId: string): Promise<string> {
    const stored = await this.profiles.readInterestGraph(userId);
    return stored ? stored.graph.topInterest() : GENERAL_INTEREST;
  }

  async getGraph(userId: string): Promise<InterestGraph> {
    const stored = await this.profiles.readInterestGraph(userId);
    return stored?.graph ?? InterestGraph.empty();
  }

  async rankedInterests(userId: string, now: Date = this.clock()): Promise<RankedInterest[]> {
    return (await this.getGraph(userId)).ranked(now);
  }

  private async readGraph(userId: string): Promise<{ graph: InterestGraph; version: number }> {
    const stored = await this.profiles.readInterestGraph(userId);
    return stored ?? { graph: InterestGraph.empty(), version: 0 };
  }
}
