import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { openDatabase, type SqliteClient } from '../db/sqlite-client.js';
import { InvalidArgumentError, NotFoundError } from '../errors.js';
import { SqliteProfileStore } from '../stores/profile-store.js';
import { SqliteTaxonomyStore } from '../stores/taxonomy-store.js';
import { createManualClock, createMockLogger } from '../testing/fixtures.js';
import { InterestGraphService } from './interest-graph.service.js';
import { loadTaxonomySeed, TaxonomyService } from './taxonomy.service.js';

const SEED = {
  categories: [
    { name: 'Sports & Fitness', tags: ['Hockey', 'Tennis'] },
    { name: 'Music & Arts', tags: ['Jazz'] },
  ],
};

describe('loadTaxonomySeed()', () => {
  it('should load the bundled taxonomy', () => {
    const seed = loadTaxonomySeed();

    expect(seed.categories).toHaveLength(10);
    expect(seed.categories.flatMap((c) => c.tags)).toHaveLength(60);
    expect(seed.categories[0]?.name).toBe('Cooking & Food');
  });

  it('should reject files of the wrong shape', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lexicard-seed-'));
    const file = path.join(dir, 'seed.json');
    fs.writeFileSync(file, JSON.stringify({ categories: [{ name: 'Sports' }] }));

    try {
      expect(() => loadTaxonomySeed(file)).toThrow(InvalidArgumentError);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('TaxonomyService', () => {
  let client: SqliteClient;
  let profiles: SqliteProfileStore;
  let interests: InterestGraphService;
  let service: TaxonomyService;

  beforeEach(() => {
    const { clock } = createManualClock();
    client = openDatabase(':memory:', { logger: createMockLogger() });
    profiles = new SqliteProfileStore(client, { clock, logger: createMockLogger() });
    interests = new InterestGraphService(profiles, { clock, logger: createMockLogger() });
    service = new TaxonomyService(new SqliteTaxonomyStore(client, clock), profiles, interests, createMockLogger());
  });

  afterEach(() => {
    client.close();
  });

  describe('seedTaxonomy()', () => {
    it('should create every category and tag once', async () => {
      expect(await service.seedTaxonomy(SEED)).toEqual({ categoriesCreated: 2, tagsCreated: 3 });
      expect(await service.seedTaxonomy(SEED)).toEqual({ categoriesCreated: 0, tagsCreated: 0 });

      const categories = await service.listTaxonomy();
      expect(categories.map((c) => c.name)).toEqual(['Sports & Fitness', 'Music & Arts']);
      expect(categories[0]?.tags.map((t) => t.slug)).toEqual(['hockey', 'tennis']);
    });

    it('should seed the bundled taxonomy', async () => {
      expect(await service.seedTaxonomy(loadTaxonomySeed())).toEqual({ categoriesCreated: 10, tagsCreated: 60 });
    });
  });

  describe('selectInterests()', () => {
    beforeEach(async () => {
      await service.seedTaxonomy(SEED);
    });

    it('should select tags and record them as explicit interests', async () => {
      const result = await service.selectInterests('alice', ['tennis', 'hockey']);

      expect(result.selected.map((t) => t.name)).toEqual(['Hockey', 'Tennis']);
      expect(result.added).toHaveLength(2);
      expect((await interests.getGraph('alice')).get('Hockey')?.score).toBe(1);
      expect((await profiles.find('alice'))?.topInterestLabels).toEqual(['Hockey', 'Tennis']);
    });

    it('should only record newly added tags', async () => {
      await service.selectInterests('alice', ['hockey']);

      const result = await service.selectInterests('alice', ['hockey', 'jazz']);

      expect(result.added.map((t) => t.name)).toEqual(['Jazz']);
      expect((await interests.getGraph('alice')).get('Hockey')?.interactionCount).toBe(1);
    });

    it('should replace the previous selection', async () => {
      await service.selectInterests('alice', ['hockey', 'tennis']);

      const result = await service.selectInterests('alice', ['jazz']);

      expect(result.selected.map((t) => t.name)).toEqual(['Jazz']);
    });

    it('should reject unknown slugs without changing the selection', async () => {
      await service.selectInterests('alice', ['hockey']);

      await expect(service.selectInterests('alice', ['hockey', 'curling'])).rejects.toThrow(NotFoundError);
      expect((await profiles.selectedTags('alice')).map((t) => t.slug)).toEqual(['hockey']);
    });
  });
});
