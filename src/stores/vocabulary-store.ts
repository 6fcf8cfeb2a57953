/**
 * Vocabulary Store - per-user memberships over shared content cards.
 */

import type { SqliteClient } from '../db/sqlite-client.js';
import { rowToContentCard, type CardRow } from '../cache/content-card-index.js';
import {
  DEFAULT_FAMILIARITY,
  type VocabularyEntry,
  type VocabularyMembership,
} from '../models/content-card.model.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { findOrCreate, type FindOrCreateResult } from '../utils/find-or-create.js';

interface MembershipRow {
  id: number;
  user_id: string;
  card_id: number;
  familiarity: number;
  added_at: string;
  updated_at: string;
}

/** Membership joined with card and word columns, prefixed to avoid clashes */
interface EntryRow extends CardRow {
  m_id: number;
  m_user_id: string;
  m_familiarity: number;
  m_added_at: string;
  m_updated_at: string;
  w_text: string;
  w_language: string;
  w_created_at: string;
  w_updated_at: string;
}

export interface ListVocabularyOptions {
  /** Only entries with this familiarity rating */
  familiarity?: number;
}

export interface IVocabularyStore {
  find(userId: string, cardId: number): Promise<VocabularyMembership | null>;
  /**
   * @throws ConstraintViolationError when the user already holds the card
   */
  insert(userId: string, cardId: number): Promise<VocabularyMembership>;
  /** Membership for (user, card), created with familiarity 1 if absent */
  findOrCreate(userId: string, cardId: number): Promise<FindOrCreateResult<VocabularyMembership>>;
  updateFamiliarity(userId: string, cardId: number, familiarity: number): Promise<VocabularyMembership | null>;
  remove(userId: string, cardId: number): Promise<boolean>;
  listForUser(userId: string, options?: ListVocabularyOptions): Promise<VocabularyEntry[]>;
  countForCard(cardId: number): Promise<number>;
}

function rowToMembership(row: MembershipRow): VocabularyMembership {
  return {
    id: row.id,
    userId: row.user_id,
    cardId: row.card_id,
    familiarity: row.familiarity,
    addedAt: row.added_at,
    updatedAt: row.updated_at,
  };
}

function rowToEntry(row: EntryRow): VocabularyEntry {
  return {
    membership: {
      id: row.m_id,
      userId: row.m_user_id,
      cardId: row.id,
      familiarity: row.m_familiarity,
      addedAt: row.m_added_at,
      updatedAt: row.m_updated_at,
    },
    card: rowToContentCard(row),
    word: {
      id: row.word_id,
      text: row.w_text,
      language: row.w_language,
      createdAt: row.w_created_at,
      updatedAt: row.w_updated_at,
    },
  };
}

const ENTRY_SELECT = `
  SELECT c.*,
         m.id AS m_id, m.user_id AS m_user_id, m.familiarity AS m_familiarity,
         m.added_at AS m_added_at, m.updated_at AS m_updated_at,
         w.text AS w_text, w.language AS w_language,
         w.created_at AS w_created_at, w.updated_at AS w_updated_at
  FROM vocabulary_memberships m
  JOIN content_cards c ON c.id = m.card_id
  JOIN words w ON w.id = c.word_id
  WHERE m.user_id = ?`;

export class SqliteVocabularyStore implements IVocabularyStore {
  constructor(
    private readonly client: SqliteClient,
    private readonly clock: Clock = systemClock
  ) {}

  async find(userId: string, cardId: number): Promise<VocabularyMembership | null> {
    const row = this.client.connection
      .prepare<[string, number], MembershipRow>(
        'SELECT * FROM vocabulary_memberships WHERE user_id = ? AND card_id = ?'
      )
      .get(userId, cardId);
    return row ? rowToMembership(row) : null;
  }

  async insert(userId: string, cardId: number): Promise<VocabularyMembership> {
    const now = this.clock().toISOString();
    const result = this.client.write('vocabulary_memberships', (db) =>
      db
        .prepare<[string, number, number, string, string]>(
          `INSERT INTO vocabulary_memberships (user_id, card_id, familiarity, added_at, updated_at)
           VALUES (?, ?, ?, ?, ?)`
        )
        .run(userId, cardId, DEFAULT_FAMILIARITY, now, now)
    );

    return {
      id: Number(result.lastInsertRowid),
      userId,
      cardId,
      familiarity: DEFAULT_FAMILIARITY,
      addedAt: now,
      updatedAt: now,
    };
  }

  async findOrCreate(userId: string, cardId: number): Promise<FindOrCreateResult<VocabularyMembership>> {
    return findOrCreate(
      () => this.find(userId, cardId),
      () => this.insert(userId, cardId)
    );
  }

  async updateFamiliarity(
    userId: string,
    cardId: number,
    familiarity: number
  ): Promise<VocabularyMembership | null> {
    const result = this.client.connection
      .prepare<[number, string, string, number]>(
        `UPDATE vocabulary_memberships SET familiarity = ?, updated_at = ?
         WHERE user_id = ? AND card_id = ?`
      )
      .run(familiarity, this.clock().toISOString(), userId, cardId);
    return result.changes > 0 ? this.find(userId, cardId) : null;
  }

  async remove(userId: string, cardId: number): Promise<boolean> {
    const result = this.client.connection
      .prepare<[string, number]>('DELETE FROM vocabulary_memberships WHERE user_id = ? AND card_id = ?')
      .run(userId, cardId);
    return result.changes > 0;
  }

  /**
   * Entries newest first.
   */
  async listForUser(userId: string, options: ListVocabularyOptions = {}): Promise<VocabularyEntry[]> {
    const db = this.client.connection;
    const order = ' ORDER BY m.added_at DESC, m.id DESC';

    const rows =
      options.familiarity === undefined
        ? db.prepare<[string], EntryRow>(ENTRY_SELECT + order).all(userId)
        : db
            .prepare<[string, number], EntryRow>(`${ENTRY_SELECT} AND m.familiarity = ?${order}`)
            .all(userId, options.familiarity);

    return rows.map(rowToEntry);
  }

  async countForCard(cardId: number): Promise<number> {
    const row = this.client.connection
      .prepare<[number], { count: number }>(
        'SELECT COUNT(*) AS count FROM vocabulary_memberships WHERE card_id = ?'
      )
      .get(cardId);
    return row?.count ?? 0;
  }
}
