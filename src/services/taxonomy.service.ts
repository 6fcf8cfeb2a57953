/**
 * Taxonomy Service
 *
 * Seeds the interest taxonomy and manages which tags a profile selects.
 * Newly selected tags are fed into the interest graph as explicit_tag
 * interactions.
 */

import * as fs from 'fs';
import { fileURLToPath } from 'url';

import { InvalidArgumentError, NotFoundError } from '../errors.js';
import { ConsoleLogger, type Logger } from '../logging/console-logger.js';
import {
  taxonomySeedSchema,
  type InterestCategoryWithTags,
  type InterestTag,
  type TaxonomySeed,
} from '../models/interest-taxonomy.model.js';
import type { IProfileStore } from '../stores/profile-store.js';
import type { ITaxonomyStore } from '../stores/taxonomy-store.js';
import type { InterestGraphService } from './interest-graph.service.js';

/** Seed file shipped with the package */
export const DEFAULT_TAXONOMY_PATH = fileURLToPath(new URL('../../data/interest-taxonomy.json', import.meta.url));

export interface SeedResult {
  categoriesCreated: number;
  tagsCreated: number;
}

export interface SelectionResult {
  selected: InterestTag[];
  /** Tags that were not selected before this call */
  added: InterestTag[];
}

/**
 * Read and validate a taxonomy seed file.
 *
 * @throws InvalidArgumentError when the file does not match the seed shape
 */
export function loadTaxonomySeed(filePath: string = DEFAULT_TAXONOMY_PATH): TaxonomySeed {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  const parsed = taxonomySeedSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidArgumentError(
      `Invalid taxonomy seed ${filePath}: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`,
      'taxonomy'
    );
  }
  return parsed.data;
}

export class TaxonomyService {
  private readonly logger: Logger;

  constructor(
    private readonly taxonomy: ITaxonomyStore,
    private readonly profiles: IProfileStore,
    private readonly interests: InterestGraphService,
    logger?: Logger
  ) {
    this.logger = logger ?? new ConsoleLogger('TaxonomyService');
  }

  /**
   * Create missing categories and tags. Running the same seed twice creates
   * nothing the second time.
   */
  async seedTaxonomy(seed: TaxonomySeed): Promise<SeedResult> {
    const result: SeedResult = { categoriesCreated: 0, tagsCreated: 0 };

    for (const [categoryIndex, entry] of seed.categories.entries()) {
      const category = await this.taxonomy.findOrCreateCategory(entry.name, categoryIndex);
      if (category.created) result.categoriesCreated++;

      for (const [tagIndex, tagName] of entry.tags.entries()) {
        const tag = await this.taxonomy.findOrCreateTag(category.value.id, tagName, tagIndex);
        if (tag.created) result.tagsCreated++;
      }
    }

    this.logger.info('Seeded interest taxonomy', { ...result });
    return result;
  }

  async listTaxonomy(): Promise<InterestCategoryWithTags[]> {
    return this.taxonomy.listCategories();
  }

  /**
   * Replace the profile's tag selection with `tagSlugs`.
   *
   * @throws NotFoundError when a slug names no tag (nothing is changed)
   */
  async selectInterests(userId: string, tagSlugs: readonly string[]): Promise<SelectionResult> {
    const slugs = [...new Set(tagSlugs)];
    const tags = await this.taxonomy.findTagsBySlugs(slugs);
    const unknown = slugs.filter((slug) => !tags.some((tag) => tag.slug === slug));
    if (unknown.length > 0) {
      throw new NotFoundError(`Unknown interest tags: ${unknown.join(', ')}`, 'interest_tag');
    }

    await this.profiles.ensure(userId);
    const previous = new Set((await this.profiles.selectedTags(userId)).map((tag) => tag.id));
    await this.profiles.selectInterestTags(
      userId,
      tags.map((tag) => tag.id)
    );

    const selected = await this.profiles.selectedTags(userId);
    const added = selected.filter((tag) => !previous.has(tag.id));
    for (const tag of added) {
      await this.interests.recordInteraction(userId, tag.name, 'explicit_tag');
    }

    this.logger.info('Updated interest selection', { userId, selected: selected.length, added: added.length });
    return { selected, added };
  }
}
