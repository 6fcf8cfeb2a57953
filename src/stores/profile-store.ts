/**
 * Profile Store
 *
 * Persists user profiles, their selected interest tags, and the interest
 * graph document. The graph is written with a compare-and-swap on
 * `interest_graph_version`: a writer that read an older version affects no
 * row and gets an OptimisticLockError.
 */

import type { SqliteClient } from '../db/sqlite-client.js';
import { OptimisticLockError } from '../errors.js';
import { ConsoleLogger, type Logger } from '../logging/console-logger.js';
import { isCefrLevel } from '../models/content-card.model.js';
import { InterestGraph } from '../models/interest-graph.model.js';
import type { InterestTag } from '../models/interest-taxonomy.model.js';
import {
  isAgeGroup,
  isLearningStyle,
  PERSONALIZATION_DEFAULTS,
  type ProfileUpdate,
  type UserProfile,
} from '../models/user-profile.model.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { findOrCreate } from '../utils/find-or-create.js';

interface ProfileRow {
  user_id: string;
  nickname: string | null;
  cefr_level: string | null;
  age_group: string | null;
  learning_style: string | null;
  target_language: string;
  native_language: string;
  interest_graph: string;
  interest_graph_version: number;
  created_at: string;
  updated_at: string;
}

interface TagRow {
  id: number;
  category_id: number;
  name: string;
  slug: string;
  position: number;
}

/** A graph together with the version it was read at */
export interface VersionedInterestGraph {
  graph: InterestGraph;
  version: number;
}

export interface IProfileStore {
  find(userId: string): Promise<UserProfile | null>;
  /** Profile for `userId`, created with defaults when missing */
  ensure(userId: string): Promise<UserProfile>;
  update(userId: string, changes: ProfileUpdate): Promise<UserProfile | null>;
  delete(userId: string): Promise<boolean>;
  /** Null when the profile does not exist */
  readInterestGraph(userId: string): Promise<VersionedInterestGraph | null>;
  /**
   * Write `graph` if the stored version still equals `expectedVersion`.
   *
   * @returns the new version
   * @throws OptimisticLockError when another writer got in first
   */
  writeInterestGraph(userId: string, graph: InterestGraph, expectedVersion: number): Promise<number>;
  /** Replace the profile's tag selection */
  selectInterestTags(userId: string, tagIds: readonly number[]): Promise<void>;
  /** Selected tags in taxonomy display order */
  selectedTags(userId: string): Promise<InterestTag[]>;
}

function rowToTag(row: TagRow): InterestTag {
  return {
    id: row.id,
    categoryId: row.category_id,
    name: row.name,
    slug: row.slug,
    position: row.position,
  };
}

export interface SqliteProfileStoreOptions {
  clock?: Clock;
  logger?: Logger;
}

export class SqliteProfileStore implements IProfileStore {
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly client: SqliteClient,
    options: SqliteProfileStoreOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new ConsoleLogger('ProfileStore');
  }

  async find(userId: string): Promise<UserProfile | null> {
    const row = this.findRow(userId);
    if (!row) {
      return null;
    }
    const tags = await this.selectedTags(userId);
    return this.rowToProfile(row, tags.map((tag) => tag.name));
  }

  async ensure(userId: string): Promise<UserProfile> {
    const { value, created } = await findOrCreate(
      () => this.find(userId),
      () => this.insert(userId)
    );
    if (created) {
      this.logger.debug('Created profile', { userId });
    }
    return value;
  }

  async update(userId: string, changes: ProfileUpdate): Promise<UserProfile | null> {
    const current = this.findRow(userId);
    if (!current) {
      return null;
    }

    this.client.connection
      .prepare<[string | null, string | null, string | null, string | null, string, string, string, string]>(
        `UPDATE profiles
         SET nickname = ?, cefr_level = ?, age_group = ?, learning_style = ?,
             target_language = ?, native_language = ?, updated_at = ?
         WHERE user_id = ?`
      )
      .run(
        changes.nickname !== undefined ? changes.nickname : current.nickname,
        changes.cefrLevel !== undefined ? changes.cefrLevel : current.cefr_level,
        changes.ageGroup !== undefined ? changes.ageGroup : current.age_group,
        changes.learningStyle !== undefined ? changes.learningStyle : current.learning_style,
        changes.targetLanguage ?? current.target_language,
        changes.nativeLanguage ?? current.native_language,
        this.clock().toISOString(),
        userId
      );

    return this.find(userId);
  }

  /**
   * Delete a profile; its memberships and tag selections cascade.
   */
  async delete(userId: string): Promise<boolean> {
    const result = this.client.connection.prepare<[string]>('DELETE FROM profiles WHERE user_id = ?').run(userId);
    return result.changes > 0;
  }

  async readInterestGraph(userId: string): Promise<VersionedInterestGraph | null> {
    const row = this.findRow(userId);
    if (!row) {
      return null;
    }

    const graph = InterestGraph.parse(row.interest_graph, this.clock(), (error) => {
      this.logger.warn('Malformed interest graph, treating as empty', { userId, reason: error.message });
    });
    return { graph, version: row.interest_graph_version };
  }

  async writeInterestGraph(userId: string, graph: InterestGraph, expectedVersion: number): Promise<number> {
    const result = this.client.connection
      .prepare<[string, string, string, number]>(
        `UPDATE profiles
         SET interest_graph = ?, interest_graph_version = interest_graph_version + 1, updated_at = ?
         WHERE user_id = ? AND interest_graph_version = ?`
      )
      .run(graph.serialize(), this.clock().toISOString(), userId, expectedVersion);

    if (result.changes === 0) {
      throw new OptimisticLockError(
        `Interest graph for ${userId} changed since version ${expectedVersion}`,
        expectedVersion
      );
    }
    return expectedVersion + 1;
  }

  async selectInterestTags(userId: string, tagIds: readonly number[]): Promise<void> {
    this.client.transaction((db) => {
      db.prepare<[string]>('DELETE FROM profile_interest_tags WHERE user_id = ?').run(userId);
      const insert = db.prepare<[string, number]>(
        'INSERT OR IGNORE INTO profile_interest_tags (user_id, tag_id) VALUES (?, ?)'
      );
      for (const tagId of tagIds) {
        insert.run(userId, tagId);
      }
      db.prepare<[string, string]>('UPDATE profiles SET updated_at = ? WHERE user_id = ?').run(
        this.clock().toISOString(),
        userId
      );
    });
  }

  async selectedTags(userId: string): Promise<InterestTag[]> {
    return this.client.connection
      .prepare<[string], TagRow>(
        `SELECT t.id, t.category_id, t.name, t.slug, t.position
         FROM profile_interest_tags p
         JOIN interest_tags t ON t.id = p.tag_id
         JOIN interest_categories c ON c.id = t.category_id
         WHERE p.user_id = ?
         ORDER BY c.position, t.position, t.id`
      )
      .all(userId)
      .map(rowToTag);
  }

  private findRow(userId: string): ProfileRow | undefined {
    return this.client.connection
      .prepare<[string], ProfileRow>('SELECT * FROM profiles WHERE user_id = ?')
      .get(userId);
  }

  private async insert(userId: string): Promise<UserProfile> {
    const now = this.clock().toISOString();
    this.client.write('profiles', (db) =>
      db
        .prepare<[string, string, string, string, string]>(
          `INSERT INTO profiles (user_id, target_language, native_language, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?)`
        )
        .run(userId, PERSONALIZATION_DEFAULTS.targetLanguage, PERSONALIZATION_DEFAULTS.nativeLanguage, now, now)
    );

    return {
      userId,
      nickname: null,
      cefrLevel: null,
      ageGroup: null,
      learningStyle: null,
      targetLanguage: PERSONALIZATION_DEFAULTS.targetLanguage,
      nativeLanguage: PERSONALIZATION_DEFAULTS.nativeLanguage,
      topInterestLabels: [],
      createdAt: now,
      updatedAt: now,
    };
  }

  private rowToProfile(row: ProfileRow, topInterestLabels: string[]): UserProfile {
    return {
      userId: row.user_id,
      nickname: row.nickname,
      cefrLevel: row.cefr_level !== null && isCefrLevel(row.cefr_level) ? row.cefr_level : null,
      ageGroup: row.age_group !== null && isAgeGroup(row.age_group) ? row.age_group : null,
      learningStyle: row.learning_style !== null && isLearningStyle(row.learning_style) ? row.learning_style : null,
      targetLanguage: row.target_language,
      nativeLanguage: row.native_language,
      topInterestLabels,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
