/**
 * Weighted Interest Graph
 *
 * Label -> InterestScore mapping owned by one user profile. The graph is an
 * immutable value: recording an interaction returns a new graph, which the
 * profile store writes back whole.
 */

import { InvalidArgumentError, toError } from '../errors.js';
import { DEFAULT_DECAY_RATE, InterestScore, type InterestScoreJson } from './interest-score.model.js';

/** Weight added to a label's score per action */
export const ACTION_WEIGHTS = {
  click: 0.1,
  view_50_percent: 0.3,
  view_100_percent: 0.5,
  share: 0.8,
  explicit_tag: 1.0,
} as const satisfies Record<string, number>;

export type ActionType = keyof typeof ACTION_WEIGHTS;

export const ACTION_TYPES: readonly ActionType[] = [
  'click',
  'view_50_percent',
  'view_100_percent',
  'share',
  'explicit_tag',
];

/** Interest context used when a user has no recorded interests */
export const GENERAL_INTEREST = 'General';

export const MAX_SCORE = 1.0;

export function isActionType(value: string): value is ActionType {
  return ACTION_TYPES.some((action) => action === value);
}

/**
 * Weight for an action type.
 *
 * @throws InvalidArgumentError for unknown action types
 */
export function actionWeight(actionType: string): number {
  if (!isActionType(actionType)) {
    throw new InvalidArgumentError(
      `Invalid action_type '${actionType}'. Must be one of: ${ACTION_TYPES.join(', ')}`,
      'actionType'
    );
  }
  return ACTION_WEIGHTS[actionType];
}

/** One row of a ranked graph listing */
export interface RankedInterest {
  label: string;
  storedScore: number;
  decayedScore: number;
  interactionCount: number;
  lastUpdated: Date;
}

export class InterestGraph {
  private constructor(private readonly scores: ReadonlyMap<string, InterestScore>) {}

  static empty(): InterestGraph {
    return new InterestGraph(new Map());
  }

  static fromScores(scores: Iterable<InterestScore>): InterestGraph {
    const map = new Map<string, InterestScore>();
    for (const score of scores) {
      map.set(score.label, score);
    }
    return new InterestGraph(map);
  }

  get size(): number {
    return this.scores.size;
  }

  get(label: string): InterestScore | undefined {
    return this.scores.get(label);
  }

  labels(): string[] {
    return [...this.scores.keys()];
  }

  values(): InterestScore[] {
    return [...this.scores.values()];
  }

  /**
   * Apply one interaction: lazy decay, add the action weight, clamp to 1.0,
   * stamp `now` and bump the interaction count. New labels start at 0.0.
   *
   * @throws InvalidArgumentError for an unknown action or an empty label
   */
  recordInteraction(
    label: string,
    actionType: string,
    now: Date,
    decayRate: number = DEFAULT_DECAY_RATE
  ): InterestGraph {
    const weight = actionWeight(actionType);
    const key = label.trim();
    if (key === '') {
      throw new InvalidArgumentError('Interest label must not be empty', 'label');
    }

    const existing = this.scores.get(key);
    const base = existing
      ? existing.with({ score: existing.decayedScore(now) })
      : new InterestScore({ label: key, score: 0, lastUpdated: now, decayRate });

    const updated = base.with({
      score: Math.min(MAX_SCORE, base.score + weight),
      lastUpdated: now,
      interactionCount: base.interactionCount + 1,
    });

    const next = new Map(this.scores);
    next.set(key, updated);
    return new InterestGraph(next);
  }

  /**
   * Label with the highest stored score, ignoring decay since the last
   * update. Ties keep the first label in stored order.
   */
  topInterest(): string {
    let top: InterestScore | null = null;
    for (const score of this.scores.values()) {
      if (top === null || score.score > top.score) {
        top = score;
      }
    }
    return top?.label ?? GENERAL_INTEREST;
  }

  /**
   * All labels with stored and decayed scores, highest decayed score first.
   */
  ranked(now: Date): RankedInterest[] {
    return this.values()
      .map((score) => ({
        label: score.label,
        storedScore: score.score,
        decayedScore: score.decayedScore(now),
        interactionCount: score.interactionCount,
        lastUpdated: score.lastUpdated,
      }))
      .sort((a, b) => b.decayedScore - a.decayedScore);
  }

  /**
   * Labels become own keys, "__proto__" included.
   */
  toJSON(): Record<string, InterestScoreJson> {
    return Object.fromEntries([...this.scores].map(([label, score]) => [label, score.toJSON()]));
  }

  serialize(): string {
    return JSON.stringify(this.toJSON());
  }

  /**
   * Rebuild a graph from its persisted document. Anything unreadable yields an
   * empty graph; `onMalformed` receives the reason.
   */
  static parse(
    raw: string | null | undefined,
    now: Date = new Date(),
    onMalformed?: (error: Error) => void
  ): InterestGraph {
    if (!raw || raw.trim() === '') {
      return InterestGraph.empty();
    }

    try {
      const data: unknown = JSON.parse(raw);
      if (typeof data !== 'object' || data === null || Array.isArray(data)) {
        throw new InvalidArgumentError('Interest graph document must be a JSON object', 'interestGraph');
      }

      const scores = new Map<string, InterestScore>();
      for (const [label, entry] of Object.entries(data)) {
        scores.set(label, InterestScore.fromJSON(entry, label, now));
      }
      return new InterestGraph(scores);
    } catch (error) {
      onMalformed?.(toError(error));
      return InterestGraph.empty();
    }
  }
}
