/**
 * Interest Score Model
 *
 * One label's attention score in a user's weighted interest graph.
 * Scores decay geometrically per elapsed day and are only recomputed when
 * the label is touched (lazy decay); nothing decays on a timer.
 */

import { z } from 'zod';
import { InvalidArgumentError } from '../errors.js';

/** Default per-day decay multiplier */
export const DEFAULT_DECAY_RATE = 0.95;

const MS_PER_DAY = 86_400_000;

/**
 * Persisted form of one interest score.
 */
export interface InterestScoreJson {
  label: string;
  score: number;
  last_updated: string;
  interaction_count: number;
  decay_rate: number;
}

export interface InterestScoreInit {
  label: string;
  score?: number;
  lastUpdated?: Date;
  interactionCount?: number;
  decayRate?: number;
}

/**
 * Shape check for persisted entries. Range checks live in the constructor so
 * that hand-built and deserialized scores obey the same rules.
 */
export const interestScoreJsonSchema = z.object({
  label: z.string().optional(),
  score: z.number().default(0),
  last_updated: z.unknown().optional(),
  interaction_count: z.number().int().nonnegative().default(0),
  decay_rate: z.number().default(DEFAULT_DECAY_RATE),
});

export class InterestScore {
  readonly label: string;
  readonly score: number;
  readonly lastUpdated: Date;
  readonly interactionCount: number;
  readonly decayRate: number;

  constructor(init: InterestScoreInit) {
    const score = init.score ?? 0;
    const decayRate = init.decayRate ?? DEFAULT_DECAY_RATE;
    const interactionCount = init.interactionCount ?? 0;

    if (!Number.isFinite(score) || score < 0 || score > 1) {
      throw new InvalidArgumentError(`Score must be between 0.0 and 1.0, got ${score}`, 'score');
    }
    if (!Number.isFinite(decayRate) || decayRate <= 0 || decayRate > 1) {
      throw new InvalidArgumentError(`Decay rate must be in (0.0, 1.0], got ${decayRate}`, 'decayRate');
    }
    if (!Number.isInteger(interactionCount) || interactionCount < 0) {
      throw new InvalidArgumentError(
        `Interaction count must be a non-negative integer, got ${interactionCount}`,
        'interactionCount'
      );
    }

    this.label = init.label;
    this.score = score;
    this.lastUpdated = init.lastUpdated ?? new Date();
    this.interactionCount = interactionCount;
    this.decayRate = decayRate;
  }

  /**
   * Score after decaying from `lastUpdated` to `now`:
   * `score * decayRate ^ daysElapsed`. A non-positive elapsed time (clock skew)
   * leaves the score as stored.
   */
  decayedScore(now: Date): number {
    const daysElapsed = (now.getTime() - this.lastUpdated.getTime()) / MS_PER_DAY;
    if (!(daysElapsed > 0)) {
      return this.score;
    }
    return Math.max(0, this.score * Math.pow(this.decayRate, daysElapsed));
  }

  /**
   * Copy with some fields replaced; the copy is validated like any new score.
   */
  with(changes: Partial<Omit<InterestScoreInit, 'label'>>): InterestScore {
    return new InterestScore({
      label: this.label,
      score: changes.score ?? this.score,
      lastUpdated: changes.lastUpdated ?? this.lastUpdated,
      interactionCount: changes.interactionCount ?? this.interactionCount,
      decayRate: changes.decayRate ?? this.decayRate,
    });
  }

  toJSON(): InterestScoreJson {
    return {
      label: this.label,
      score: this.score,
      last_updated: this.lastUpdated.toISOString(),
      interaction_count: this.interactionCount,
      decay_rate: this.decayRate,
    };
  }

  /**
   * Rebuild a score from its persisted form. `fallbackLabel` is used when the
   * entry carries no label of its own; an unreadable `last_updated` becomes `now`.
   *
   * @throws InvalidArgumentError when the entry is not a valid score
   */
  static fromJSON(data: unknown, fallbackLabel: string, now: Date = new Date()): InterestScore {
    const parsed = interestScoreJsonSchema.safeParse(data);
    if (!parsed.success) {
      throw new InvalidArgumentError(
        `Invalid interest score for "${fallbackLabel}": ${parsed.error.issues[0]?.message ?? 'unknown shape'}`,
        'interestScore'
      );
    }

    return new InterestScore({
      label: parsed.data.label ?? fallbackLabel,
      score: parsed.data.score,
      lastUpdated: parseTimestamp(parsed.data.last_updated) ?? now,
      interactionCount: parsed.data.interaction_count,
      decayRate: parsed.data.decay_rate,
    });
  }
}

function parseTimestamp(value: unknown): Date | null {
  if (typeof value !== 'string' || value.trim() === '') {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}
