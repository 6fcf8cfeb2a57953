/**
 * SQLite Schema for the lexicard content cache
 *
 * Uniqueness invariants live here, not in application code:
 * - one word per normalized text
 * - one content card per (word, language, level, interest, tone)
 * - one vocabulary membership per (user, card)
 *
 * Foreign keys cascade: deleting a word removes its cards and their
 * memberships; deleting a profile removes its memberships and tag selections.
 */

import type { Database } from 'better-sqlite3';

import { CEFR_LEVELS } from '../models/content-card.model.js';

const CEFR_CHECK = CEFR_LEVELS.map((level) => `'${level}'`).join(', ');

/**
 * Schema definition, in creation order
 */
export const SCHEMA_DDL = {
  tables: [
    // Profile owns the interest graph document and its CAS version
    `CREATE TABLE IF NOT EXISTS profiles (
      user_id TEXT PRIMARY KEY,
      nickname TEXT,
      cefr_level TEXT CHECK (cefr_level IS NULL OR cefr_level IN (${CEFR_CHECK})),
      age_group TEXT,
      learning_style TEXT,
      target_language TEXT NOT NULL DEFAULT 'fr',
      native_language TEXT NOT NULL DEFAULT 'en',
      interest_graph TEXT NOT NULL DEFAULT '{}',
      interest_graph_version INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )`,

    `CREATE TABLE IF NOT EXISTS words (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      text TEXT NOT NULL UNIQUE,
      language TEXT NOT NULL DEFAULT 'fr',
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )`,

    `CREATE TABLE IF NOT EXISTS content_cards (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      word_id INTEGER NOT NULL REFERENCES words(id) ON DELETE CASCADE,
      definition TEXT NOT NULL,
      conversation TEXT,
      examples TEXT NOT NULL DEFAULT '[]',
      target_language TEXT NOT NULL,
      target_cefr TEXT NOT NULL CHECK (target_cefr IN (${CEFR_CHECK})),
      interest_context TEXT NOT NULL,
      tone_style TEXT NOT NULL,
      generated_level TEXT,
      generated_language TEXT,
      part_of_speech TEXT,
      base_form TEXT,
      gender TEXT CHECK (gender IS NULL OR gender IN ('m', 'f')),
      is_fallback INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      UNIQUE (word_id, target_language, target_cefr, interest_context, tone_style)
    )`,

    `CREATE TABLE IF NOT EXISTS vocabulary_memberships (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id TEXT NOT NULL REFERENCES profiles(user_id) ON DELETE CASCADE,
      card_id INTEGER NOT NULL REFERENCES content_cards(id) ON DELETE CASCADE,
      familiarity INTEGER NOT NULL DEFAULT 1 CHECK (familiarity BETWEEN 1 AND 5),
      added_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      UNIQUE (user_id, card_id)
    )`,

    `CREATE TABLE IF NOT EXISTS interest_categories (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      slug TEXT NOT NULL UNIQUE,
      position INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL
    )`,

    `CREATE TABLE IF NOT EXISTS interest_tags (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      category_id INTEGER NOT NULL REFERENCES interest_categories(id) ON DELETE CASCADE,
      name TEXT NOT NULL,
      slug TEXT NOT NULL UNIQUE,
      position INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      UNIQUE (category_id, name)
    )`,

    `CREATE TABLE IF NOT EXISTS profile_interest_tags (
      user_id TEXT NOT NULL REFERENCES profiles(user_id) ON DELETE CASCADE,
      tag_id INTEGER NOT NULL REFERENCES interest_tags(id) ON DELETE CASCADE,
      PRIMARY KEY (user_id, tag_id)
    )`,
  ],

  indexes: [
    `CREATE INDEX IF NOT EXISTS idx_words_language_text ON words (language, text)`,
    `CREATE INDEX IF NOT EXISTS idx_memberships_user_added ON vocabulary_memberships (user_id, added_at DESC)`,
    `CREATE INDEX IF NOT EXISTS idx_tags_category_position ON interest_tags (category_id, position)`,
  ],
};

/** Tables in dependency order, children first */
export const TABLES = [
  'profile_interest_tags',
  'interest_tags',
  'interest_categories',
  'vocabulary_memberships',
  'content_cards',
  'words',
  'profiles',
] as const;

export type TableName = (typeof TABLES)[number];

/**
 * Create all tables and indexes that don't exist yet.
 */
export function initializeSchema(db: Database): void {
  db.pragma('foreign_keys = ON');
  db.transaction(() => {
    for (const ddl of SCHEMA_DDL.tables) {
      db.exec(ddl);
    }
    for (const ddl of SCHEMA_DDL.indexes) {
      db.exec(ddl);
    }
  })();
}

/**
 * Drop all tables (for tests and resets)
 */
export function dropAllTables(db: Database): void {
  for (const table of TABLES) {
    db.exec(`DROP TABLE IF EXISTS ${table}`);
  }
}

/**
 * Row count per table
 */
export function getSchemaStats(db: Database): Record<string, number> {
  const stats: Record<string, number> = {};
  for (const table of TABLES) {
    const row = db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get();
    stats[table] = row?.count ?? 0;
  }
  return stats;
}
