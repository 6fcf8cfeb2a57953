/**
 * Taxonomy Store - interest categories and tags.
 */

import type { SqliteClient } from '../db/sqlite-client.js';
import {
  slugify,
  type InterestCategory,
  type InterestCategoryWithTags,
  type InterestTag,
} from '../models/interest-taxonomy.model.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { findOrCreate, type FindOrCreateResult } from '../utils/find-or-create.js';

interface CategoryRow {
  id: number;
  name: string;
  slug: string;
  position: number;
}

interface TagRow {
  id: number;
  category_id: number;
  name: string;
  slug: string;
  position: number;
}

export interface ITaxonomyStore {
  findOrCreateCategory(name: string, position: number): Promise<FindOrCreateResult<InterestCategory>>;
  findOrCreateTag(categoryId: number, name: string, position: number): Promise<FindOrCreateResult<InterestTag>>;
  listCategories(): Promise<InterestCategoryWithTags[]>;
  findTagsBySlugs(slugs: readonly string[]): Promise<InterestTag[]>;
}

const rowToCategory = (row: CategoryRow): InterestCategory => ({
  id: row.id,
  name: row.name,
  slug: row.slug,
  position: row.position,
});

const rowToTag = (row: TagRow): InterestTag => ({
  id: row.id,
  categoryId: row.category_id,
  name: row.name,
  slug: row.slug,
  position: row.position,
});

export class SqliteTaxonomyStore implements ITaxonomyStore {
  constructor(
    private readonly client: SqliteClient,
    private readonly clock: Clock = systemClock
  ) {}

  async findOrCreateCategory(name: string, position: number): Promise<FindOrCreateResult<InterestCategory>> {
    return findOrCreate(
      async () => {
        const row = this.client.connection
          .prepare<[string], CategoryRow>('SELECT id, name, slug, position FROM interest_categories WHERE name = ?')
          .get(name);
        return row ? rowToCategory(row) : null;
      },
      async () => {
        const slug = slugify(name);
        const result = this.client.write('interest_categories', (db) =>
          db
            .prepare<[string, string, number, string]>(
              'INSERT INTO interest_categories (name, slug, position, created_at) VALUES (?, ?, ?, ?)'
            )
            .run(name, slug, position, this.clock().toISOString())
        );
        return { id: Number(result.lastInsertRowid), name, slug, position };
      }
    );
  }

  async findOrCreateTag(
    categoryId: number,
    name: string,
    position: number
  ): Promise<FindOrCreateResult<InterestTag>> {
    return findOrCreate(
      async () => {
        const row = this.client.connection
          .prepare<[number, string], TagRow>(
            'SELECT id, category_id, name, slug, position FROM interest_tags WHERE category_id = ? AND name = ?'
          )
          .get(categoryId, name);
        return row ? rowToTag(row) : null;
      },
      async () => {
        const slug = slugify(name);
        const result = this.client.write('interest_tags', (db) =>
          db
            .prepare<[number, string, string, number, string]>(
              'INSERT INTO interest_tags (category_id, name, slug, position, created_at) VALUES (?, ?, ?, ?, ?)'
            )
            .run(categoryId, name, slug, position, this.clock().toISOString())
        );
        return { id: Number(result.lastInsertRowid), categoryId, name, slug, position };
      }
    );
  }

  async listCategories(): Promise<InterestCategoryWithTags[]> {
    const db = this.client.connection;
    const categories = db
      .prepare<[], CategoryRow>('SELECT id, name, slug, position FROM interest_categories ORDER BY position, id')
      .all();
    const tags = db
      .prepare<[], TagRow>('SELECT id, category_id, name, slug, position FROM interest_tags ORDER BY position, id')
      .all();

    return categories.map((row) => ({
      ...rowToCategory(row),
      tags: tags.filter((tag) => tag.category_id === row.id).map(rowToTag),
    }));
  }

  /**
   * Tags matching `slugs`; unknown slugs are simply absent from the result.
   */
  async findTagsBySlugs(slugs: readonly string[]): Promise<InterestTag[]> {
    if (slugs.length === 0) {
      return [];
    }
    const placeholders = slugs.map(() => '?').join(', ');
    return this.client.connection
      .prepare<string[], TagRow>(
        `SELECT id, category_id, name, slug, position FROM interest_tags WHERE slug IN (${placeholders})`
      )
      .all(...slugs)
      .map(rowToTag);
  }
}
