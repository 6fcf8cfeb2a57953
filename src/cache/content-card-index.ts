/**
 * Content Card Index - the personalized content reuse cache.
 *
 * Cards are keyed by (word, target language, CEFR level, interest context,
 * tone). Matching is exact on all five fields. The index is append-only:
 * cards are inserted on a miss and never updated.
 *
 * Usage:
 * ```typescript
 * const index = new SqliteContentCardIndex(client);
 * const { card, created } = await index.findOrCreate(key, () => generateDraft());
 * ```
 */

import { ConstraintViolationError } from '../errors.js';
import type { SqliteClient } from '../db/sqlite-client.js';
import {
  cardKeyOf,
  isCefrLevel,
  parseUsages,
  serializeUsages,
  type CefrLevel,
  type ContentCard,
  type ContentCardDraft,
  type ContentCardKey,
  type GrammaticalGender,
} from '../models/content-card.model.js';
import { systemClock, type Clock } from '../utils/clock.js';

// ============================================================================
// Cache Statistics
// ============================================================================

/** Snapshot of lookup statistics */
export interface CacheStats {
  readonly hitCount: number;
  readonly missCount: number;
  /** Hits as a percentage of lookups (0-100) */
  hitRate(): number;
}

class IndexStats implements CacheStats {
  constructor(
    public readonly hitCount: number,
    public readonly missCount: number
  ) {}

  hitRate(): number {
    const total = this.hitCount + this.missCount;
    if (total === 0) return 0;
    return Math.round((this.hitCount * 100) / total);
  }
}

// ============================================================================
// Index Contract
// ============================================================================

export interface FindOrCreateCardResult {
  card: ContentCard;
  /** True when this call inserted the card */
  created: boolean;
  /**
   * True only when the card was found without producing a draft. A call that
   * lost the insert race has produced one and reports false here.
   */
  reused: boolean;
}

export interface IContentCardIndex {
  /** Exact-match lookup on the composite key */
  find(key: ContentCardKey): Promise<ContentCard | null>;
  /**
   * Insert a new card.
   *
   * @throws ConstraintViolationError when a card with the same key exists
   */
  insert(draft: ContentCardDraft): Promise<ContentCard>;
  /**
   * Return the card for `key`, calling `produce` only on a miss. The produced
   * draft is always stored under `key`.
   */
  findOrCreate(key: ContentCardKey, produce: () => Promise<ContentCardDraft>): Promise<FindOrCreateCardResult>;
  getById(id: number): Promise<ContentCard | null>;
  listForWord(wordId: number): Promise<ContentCard[]>;
  stats(): CacheStats;
}

// ============================================================================
// SQLite Implementation
// ============================================================================

export interface CardRow {
  id: number;
  word_id: number;
  definition: string;
  conversation: string | null;
  examples: string;
  target_language: string;
  target_cefr: string;
  interest_context: string;
  tone_style: string;
  generated_level: string | null;
  generated_language: string | null;
  part_of_speech: string | null;
  base_form: string | null;
  gender: string | null;
  is_fallback: number;
  created_at: string;
}

type InsertParams = [
  number, string, string | null, string, string, string, string, string,
  string | null, string | null, string | null, string | null, string | null, number, string,
];

function toCefrLevel(value: string): CefrLevel {
  if (!isCefrLevel(value)) {
    throw new Error(`Stored CEFR level "${value}" is not A1-C2`);
  }
  return value;
}

function toGender(value: string | null): GrammaticalGender | null {
  return value === 'm' || value === 'f' ? value : null;
}

export function rowToContentCard(row: CardRow): ContentCard {
  return {
    id: row.id,
    wordId: row.word_id,
    definition: row.definition,
    conversation: row.conversation,
    usages: parseUsages(row.examples),
    targetLanguage: row.target_language,
    cefrLevel: toCefrLevel(row.target_cefr),
    interestContext: row.interest_context,
    toneStyle: row.tone_style,
    generatedLevel: row.generated_level !== null && isCefrLevel(row.generated_level) ? row.generated_level : null,
    generatedLanguage: row.generated_language,
    partOfSpeech: row.part_of_speech,
    baseForm: row.base_form,
    gender: toGender(row.gender),
    isFallback: row.is_fallback === 1,
    createdAt: row.created_at,
  };
}

export class SqliteContentCardIndex implements IContentCardIndex {
  private hitCount = 0;
  private missCount = 0;

  constructor(
    private readonly client: SqliteClient,
    private readonly clock: Clock = systemClock
  ) {}

  async find(key: ContentCardKey): Promise<ContentCard | null> {
    const row = this.client.connection
      .prepare<[number, string, string, string, string], CardRow>(
        `SELECT * FROM content_cards
         WHERE word_id = ? AND target_language = ? AND target_cefr = ?
           AND interest_context = ? AND tone_style = ?`
      )
      .get(key.wordId, key.targetLanguage, key.cefrLevel, key.interestContext, key.toneStyle);
    return row ? rowToContentCard(row) : null;
  }

  async insert(draft: ContentCardDraft): Promise<ContentCard> {
    const createdAt = this.clock().toISOString();
    const result = this.client.write('content_cards', (db) =>
      db
        .prepare<InsertParams>(
          `INSERT INTO content_cards (
             word_id, definition, conversation, examples,
             target_language, target_cefr, interest_context, tone_style,
             generated_level, generated_language, part_of_speech, base_form, gender,
             is_fallback, created_at
           ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          draft.wordId,
          draft.definition,
          draft.conversation,
          serializeUsages(draft.usages),
          draft.targetLanguage,
          draft.cefrLevel,
          draft.interestContext,
          draft.toneStyle,
          draft.generatedLevel,
          draft.generatedLanguage,
          draft.partOfSpeech,
          draft.baseForm,
          draft.gender,
          draft.isFallback ? 1 : 0,
          createdAt
        )
    );

    return {
      ...draft,
      usages: [...draft.usages],
      id: Number(result.lastInsertRowid),
      createdAt,
    };
  }

  async findOrCreate(
    key: ContentCardKey,
    produce: () => Promise<ContentCardDraft>
  ): Promise<FindOrCreateCardResult> {
    const existing = await this.find(key);
    if (existing) {
      this.hitCount++;
      return { card: existing, created: false, reused: true };
    }
    this.missCount++;

    const draft = { ...(await produce()), ...cardKeyOf(key) };
    try {
      return { card: await this.insert(draft), created: true, reused: false };
    } catch (error) {
      if (!(error instanceof ConstraintViolationError)) {
        throw error;
      }
      const winner = await this.find(key);
      if (!winner) {
        throw error;
      }
      return { card: winner, created: false, reused: false };
    }
  }

  async getById(id: number): Promise<ContentCard | null> {
    const row = this.client.connection
      .prepare<[number], CardRow>('SELECT * FROM content_cards WHERE id = ?')
      .get(id);
    return row ? rowToContentCard(row) : null;
  }

  async listForWord(wordId: number): Promise<ContentCard[]> {
    return this.client.connection
      .prepare<[number], CardRow>('SELECT * FROM content_cards WHERE word_id = ? ORDER BY id')
      .all(wordId)
      .map(rowToContentCard);
  }

  stats(): CacheStats {
    return new IndexStats(this.hitCount, this.missCount);
  }
}
