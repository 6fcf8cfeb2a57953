/**
 * Profile Store Tests
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { openDatabase, type SqliteClient } from '../db/sqlite-client.js';
import { OptimisticLockError } from '../errors.js';
import { InterestGraph } from '../models/interest-graph.model.js';
import { createManualClock, createMockLogger, type MockLogger } from '../testing/fixtures.js';
import { SqliteProfileStore } from './profile-store.js';
import { SqliteTaxonomyStore } from './taxonomy-store.js';

describe('SqliteProfileStore', () => {
  let client: SqliteClient;
  let store: SqliteProfileStore;
  let logger: MockLogger;
  const time = createManualClock();

  beforeEach(() => {
    client = openDatabase(':memory:', { logger: createMockLogger() });
    logger = createMockLogger();
    store = new SqliteProfileStore(client, { clock: time.clock, logger });
  });

  afterEach(() => {
    client.close();
  });

  describe('ensure()', () => {
    it('should create a profile with defaults', async () => {
      const profile = await store.ensure('alice');

      expect(profile).toMatchObject({
        userId: 'alice',
        cefrLevel: null,
        ageGroup: null,
        learningStyle: null,
        targetLanguage: 'fr',
        nativeLanguage: 'en',
        topInterestLabels: [],
      });
    });

    it('should return the existing profile', async () => {
      await store.ensure('alice');
      await store.update('alice', { cefrLevel: 'B1' });
      expect((await store.ensure('alice')).cefrLevel).toBe('B1');
    });
  });

  describe('update()', () => {
    it('should change only the given fields', async () => {
      await store.ensure('alice');
      await store.update('alice', { cefrLevel: 'B2', learningStyle: 'Academic' });
      const profile = await store.update('alice', { targetLanguage: 'es' });

      expect(profile).toMatchObject({ cefrLevel: 'B2', learningStyle: 'Academic', targetLanguage: 'es', nativeLanguage: 'en' });
    });

    it('should clear fields set to null', async () => {
      await store.ensure('alice');
      await store.update('alice', { cefrLevel: 'B2' });
      expect((await store.update('alice', { cefrLevel: null }))?.cefrLevel).toBeNull();
    });

    it('should return null for an unknown user', async () => {
      expect(await store.update('nobody', { cefrLevel: 'A2' })).toBeNull();
    });
  });

  it('should delete profiles', async () => {
    await store.ensure('alice');
    expect(await store.delete('alice')).toBe(true);
    expect(await store.find('alice')).toBeNull();
  });

  describe('interest graph', () => {
    it('should read an empty graph at version 0 for a new profile', async () => {
      await store.ensure('alice');
      const stored = await store.readInterestGraph('alice');

      expect(stored?.version).toBe(0);
      expect(stored?.graph.size).toBe(0);
    });

    it('should return null for an unknown user', async () => {
      expect(await store.readInterestGraph('nobody')).toBeNull();
    });

    it('should write with the expected version and bump it', async () => {
      await store.ensure('alice');
      const graph = InterestGraph.empty().recordInteraction('Hockey', 'share', time.clock());

      expect(await store.writeInterestGraph('alice', graph, 0)).toBe(1);

      const stored = await store.readInterestGraph('alice');
      expect(stored?.version).toBe(1);
      expect(stored?.graph.get('Hockey')?.score).toBe(0.8);
    });

    it('should reject a write against a stale version', async () => {
      await store.ensure('alice');
      const graph = InterestGraph.empty().recordInteraction('Hockey', 'click', time.clock());
      await store.writeInterestGraph('alice', graph, 0);

      await expect(store.writeInterestGraph('alice', InterestGraph.empty(), 0)).rejects.toBeInstanceOf(
        OptimisticLockError
      );
      expect((await store.readInterestGraph('alice'))?.graph.labels()).toEqual(['Hockey']);
    });

    it('should read a malformed document as empty and warn', async () => {
      await store.ensure('alice');
      client.connection.prepare("UPDATE profiles SET interest_graph = '{broken' WHERE user_id = 'alice'").run();

      const stored = await store.readInterestGraph('alice');

      expect(stored?.graph.size).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith(
        'Malformed interest graph, treating as empty',
        expect.objectContaining({ userId: 'alice' })
      );
    });
  });

  describe('interest tags', () => {
    it('should expose selected tag names in taxonomy order', async () => {
      const taxonomy = new SqliteTaxonomyStore(client, time.clock);
      const sports = (await taxonomy.findOrCreateCategory('Sports', 0)).value;
      const music = (await taxonomy.findOrCreateCategory('Music', 1)).value;
      const jazz = (await taxonomy.findOrCreateTag(music.id, 'Jazz', 0)).value;
      const tennis = (await taxonomy.findOrCreateTag(sports.id, 'Tennis', 1)).value;
      const hockey = (await taxonomy.findOrCreateTag(sports.id, 'Hockey', 0)).value;

      await store.ensure('alice');
      await store.selectInterestTags('alice', [jazz.id, tennis.id, hockey.id]);

      expect((await store.find('alice'))?.topInterestLabels).toEqual(['Hockey', 'Tennis', 'Jazz']);

      await store.selectInterestTags('alice', [jazz.id]);
      expect((await store.selectedTags('alice')).map((tag) => tag.name)).toEqual(['Jazz']);
    });
  });
});
