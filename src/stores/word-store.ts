/**
 * Word Store - global dictionary entries.
 *
 * One row per normalized text. The language is corrected in place when a
 * lookup resolves a different target language than the one stored.
 */

import type { SqliteClient } from '../db/sqlite-client.js';
import { normalizeWordText, type Word } from '../models/content-card.model.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { findOrCreate } from '../utils/find-or-create.js';

interface WordRow {
  id: number;
  text: string;
  language: string;
  created_at: string;
  updated_at: string;
}

export interface ResolvedWord {
  word: Word;
  created: boolean;
  /** The stored language differed and was replaced */
  languageCorrected: boolean;
}

export interface IWordStore {
  findByText(text: string): Promise<Word | null>;
  insert(text: string, language: string): Promise<Word>;
  /** Find by normalized text or create; align the stored language with `language` */
  resolve(text: string, language: string): Promise<ResolvedWord>;
  updateLanguage(id: number, language: string): Promise<Word | null>;
  deleteByText(text: string): Promise<boolean>;
}

function rowToWord(row: WordRow): Word {
  return {
    id: row.id,
    text: row.text,
    language: row.language,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class SqliteWordStore implements IWordStore {
  constructor(
    private readonly client: SqliteClient,
    private readonly clock: Clock = systemClock
  ) {}

  async findByText(text: string): Promise<Word | null> {
    const row = this.client.connection
      .prepare<[string], WordRow>('SELECT * FROM words WHERE text = ?')
      .get(normalizeWordText(text));
    return row ? rowToWord(row) : null;
  }

  async findById(id: number): Promise<Word | null> {
    const row = this.client.connection.prepare<[number], WordRow>('SELECT * FROM words WHERE id = ?').get(id);
    return row ? rowToWord(row) : null;
  }

  /**
   * @throws ConstraintViolationError when the text already exists
   */
  async insert(text: string, language: string): Promise<Word> {
    const now = this.clock().toISOString();
    const result = this.client.write('words', (db) =>
      db
        .prepare<[string, string, string, string]>(
          'INSERT INTO words (text, language, created_at, updated_at) VALUES (?, ?, ?, ?)'
        )
        .run(normalizeWordText(text), language, now, now)
    );

    return {
      id: Number(result.lastInsertRowid),
      text: normalizeWordText(text),
      language,
      createdAt: now,
      updatedAt: now,
    };
  }

  async resolve(text: string, language: string): Promise<ResolvedWord> {
    const { value, created } = await findOrCreate(
      () => this.findByText(text),
      () => this.insert(text, language)
    );

    if (created || value.language === language) {
      return { word: value, created, languageCorrected: false };
    }

    const corrected = await this.updateLanguage(value.id, language);
    return { word: corrected ?? value, created: false, languageCorrected: corrected !== null };
  }

  async updateLanguage(id: number, language: string): Promise<Word | null> {
    const now = this.clock().toISOString();
    const result = this.client.connection
      .prepare<[string, string, number]>('UPDATE words SET language = ?, updated_at = ? WHERE id = ?')
      .run(language, now, id);
    return result.changes > 0 ? this.findById(id) : null;
  }

  /**
   * Delete a word; its cards and their memberships cascade.
   */
  async deleteByText(text: string): Promise<boolean> {
    const result = this.client.connection
      .prepare<[string]>('DELETE FROM words WHERE text = ?')
      .run(normalizeWordText(text));
    return result.changes > 0;
  }
}
