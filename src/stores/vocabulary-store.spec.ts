/**
 * Vocabulary Store Tests
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { SqliteContentCardIndex } from '../cache/content-card-index.js';
import { openDatabase, type SqliteClient } from '../db/sqlite-client.js';
import { ConstraintViolationError } from '../errors.js';
import { fallbackDraft, type ContentCard } from '../models/content-card.model.js';
import { createManualClock, createMockLogger } from '../testing/fixtures.js';
import { SqliteProfileStore } from './profile-store.js';
import { SqliteVocabularyStore } from './vocabulary-store.js';
import { SqliteWordStore } from './word-store.js';

describe('SqliteVocabularyStore', () => {
  let client: SqliteClient;
  let store: SqliteVocabularyStore;
  let words: SqliteWordStore;
  let cards: SqliteContentCardIndex;
  let time: ReturnType<typeof createManualClock>;

  async function createCard(text: string): Promise<ContentCard> {
    const word = await words.insert(text, 'fr');
    return cards.insert(
      fallbackDraft(
        { wordId: word.id, targetLanguage: 'fr', cefrLevel: 'A1', interestContext: 'General', toneStyle: 'Neutral' },
        text
      )
    );
  }

  beforeEach(async () => {
    time = createManualClock();
    client = openDatabase(':memory:', { logger: createMockLogger() });
    store = new SqliteVocabularyStore(client, time.clock);
    words = new SqliteWordStore(client, time.clock);
    cards = new SqliteContentCardIndex(client, time.clock);

    const profiles = new SqliteProfileStore(client, { clock: time.clock, logger: createMockLogger() });
    await profiles.ensure('alice');
    await profiles.ensure('bob');
  });

  afterEach(() => {
    client.close();
  });

  it('should insert with familiarity 1', async () => {
    const card = await createCard('manger');
    const membership = await store.insert('alice', card.id);

    expect(membership.familiarity).toBe(1);
    expect(await store.find('alice', card.id)).toEqual(membership);
  });

  it('should allow one membership per user and card', async () => {
    const card = await createCard('manger');
    await store.insert('alice', card.id);
    await expect(store.insert('alice', card.id)).rejects.toBeInstanceOf(ConstraintViolationError);
  });

  describe('findOrCreate()', () => {
    it('should leave an existing membership untouched', async () => {
      const card = await createCard('manger');
      await store.insert('alice', card.id);
      await store.updateFamiliarity('alice', card.id, 4);

      const result = await store.findOrCreate('alice', card.id);

      expect(result.created).toBe(false);
      expect(result.value.familiarity).toBe(4);
    });

    it('should recover from a lost insert race', async () => {
      const card = await createCard('manger');
      const winner = await store.insert('alice', card.id);
      vi.spyOn(store, 'find').mockResolvedValueOnce(null);

      const result = await store.findOrCreate('alice', card.id);

      expect(result).toEqual({ value: winner, created: false });
      expect(await store.countForCard(card.id)).toBe(1);
    });
  });

  it('should update familiarity and return null for a missing membership', async () => {
    const card = await createCard('manger');
    await store.insert('alice', card.id);

    expect((await store.updateFamiliarity('alice', card.id, 3))?.familiarity).toBe(3);
    expect(await store.updateFamiliarity('bob', card.id, 3)).toBeNull();
  });

  it('should remove memberships', async () => {
    const card = await createCard('manger');
    await store.insert('alice', card.id);

    expect(await store.remove('alice', card.id)).toBe(true);
    expect(await store.remove('alice', card.id)).toBe(false);
  });

  describe('listForUser()', () => {
    it('should list entries newest first with card and word', async () => {
      const manger = await createCard('manger');
      const boire = await createCard('boire');
      await store.insert('alice', manger.id);
      time.advanceDays(1);
      await store.insert('alice', boire.id);
      await store.insert('bob', manger.id);

      const entries = await store.listForUser('alice');

      expect(entries.map((entry) => entry.word.text)).toEqual(['boire', 'manger']);
      expect(entries[0]?.card).toEqual(boire);
      expect(entries[0]?.membership.userId).toBe('alice');
      expect(entries[0]?.membership.cardId).toBe(boire.id);
    });

    it('should filter by familiarity', async () => {
      const manger = await createCard('manger');
      const boire = await createCard('boire');
      await store.insert('alice', manger.id);
      await store.insert('alice', boire.id);
      await store.updateFamiliarity('alice', boire.id, 5);

      const entries = await store.listForUser('alice', { familiarity: 5 });
      expect(entries.map((entry) => entry.word.text)).toEqual(['boire']);
    });
  });

  it('should cascade when a word is deleted', async () => {
    const card = await createCard('manger');
    await store.insert('alice', card.id);

    await words.deleteByText('manger');

    expect(await store.find('alice', card.id)).toBeNull();
    expect(await cards.getById(card.id)).toBeNull();
  });
});
