/**
 * Lexicard Command Handlers
 *
 * Business logic for the CLI commands. Handlers take the service container,
 * print through `container.console`, and return the process exit code.
 */

import { InvalidArgumentError, LexicardError } from '../../errors.js';
import { isCefrLevel, type ContentCard } from '../../models/content-card.model.js';
import { isAgeGroup, isLearningStyle, type ProfileUpdate } from '../../models/user-profile.model.js';
import { loadTaxonomySeed } from '../../services/taxonomy.service.js';
import type { ServiceContainer } from '../service-container.js';

export interface LookupOptions {
  user?: string;
}

export interface UserOptions {
  user: string;
}

export interface ProfileSetOptions extends UserOptions {
  level?: string;
  target?: string;
  native?: string;
  ageGroup?: string;
  style?: string;
  nickname?: string;
}

export interface VocabListOptions extends UserOptions {
  familiarity?: string;
}

export interface TaxonomySeedOptions {
  file?: string;
}

function parseInteger(value: string, argument: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`${argument} must be an integer, got "${value}"`, argument);
  }
  return parsed;
}

/**
 * Run a handler body, reporting failures as exit code 1.
 */
async function run(container: ServiceContainer, body: () => Promise<void>): Promise<number> {
  try {
    await body();
    return 0;
  } catch (err) {
    if (err instanceof LexicardError) {
      container.console.error(`✗ ${err.message}`);
      return 1;
    }
    throw err;
  }
}

function printCard(container: ServiceContainer, card: ContentCard): void {
  const out = container.console;
  out.log(`Card #${card.id} [${card.targetLanguage} ${card.cefrLevel} | ${card.interestContext} | ${card.toneStyle}]`);
  if (card.isFallback) {
    out.log('  (fallback content, generation failed)');
  }
  out.log(`  Definition: ${card.definition}`);
  if (card.partOfSpeech || card.baseForm) {
    const gender = card.gender ? `, ${card.gender}` : '';
    out.log(`  Grammar: ${card.partOfSpeech ?? '?'} (${card.baseForm ?? '?'}${gender})`);
  }
  if (card.conversation) {
    out.log(`  Conversation: ${card.conversation}`);
  }
  card.usages
    .filter((usage) => usage !== '')
    .forEach((usage, index) => out.log(`  ${index + 1}. ${usage}`));
}

// =============================================================================
// Lookup and interactions
// =============================================================================

export async function handleLookup(
  word: string,
  options: LookupOptions,
  container: ServiceContainer
): Promise<number> {
  return run(container, async () => {
    const result = await container.vocabulary.fetchWordContent(options.user ?? null, word);
    printCard(container, result.card);
    container.console.log(result.cacheHit ? '  Source: cache' : '  Source: generated');
    if (result.membership) {
      container.console.log(`  Familiarity: ${result.membership.familiarity}/5`);
    }
  });
}

export async function handleInteract(
  label: string,
  action: string,
  options: UserOptions,
  container: ServiceContainer
): Promise<number> {
  return run(container, async () => {
    const score = await container.interests.recordInteraction(options.user, label, action);
    container.console.log(
      `✓ ${score.label}: ${score.score.toFixed(2)} (${score.interactionCount} interaction${score.interactionCount === 1 ? '' : 's'})`
    );
  });
}

export async function handleInterests(options: UserOptions, container: ServiceContainer): Promise<number> {
  return run(container, async () => {
    const ranked = await container.interests.rankedInterests(options.user);
    container.console.log(`Top interest: ${await container.interests.topInterest(options.user)}`);
    if (ranked.length === 0) {
      container.console.log('No interests recorded');
      return;
    }
    for (const interest of ranked) {
      container.console.log(
        `  ${interest.label}: ${interest.storedScore.toFixed(2)} stored, ${interest.decayedScore.toFixed(2)} now, ${interest.interactionCount}x`
      );
    }
  });
}

// =============================================================================
// Profile
// =============================================================================

/**
 * @throws InvalidArgumentError for unknown level, age group or style values
 */
export function toProfileUpdate(options: ProfileSetOptions): ProfileUpdate {
  const update: ProfileUpdate = {};

  if (options.level !== undefined) {
    const level = options.level.toUpperCase();
    if (!isCefrLevel(level)) {
      throw new InvalidArgumentError(`Unknown CEFR level "${options.level}"`, 'level');
    }
    update.cefrLevel = level;
  }
  if (options.ageGroup !== undefined) {
    if (!isAgeGroup(options.ageGroup)) {
      throw new InvalidArgumentError(`Unknown age group "${options.ageGroup}"`, 'ageGroup');
    }
    update.ageGroup = options.ageGroup;
  }
  if (options.style !== undefined) {
    if (!isLearningStyle(options.style)) {
      throw new InvalidArgumentError(`Unknown learning style "${options.style}"`, 'style');
    }
    update.learningStyle = options.style;
  }
  if (options.target !== undefined) update.targetLanguage = options.target.toLowerCase();
  if (options.native !== undefined) update.nativeLanguage = options.native.toLowerCase();
  if (options.nickname !== undefined) update.nickname = options.nickname;

  return update;
}

export async function handleProfileSet(options: ProfileSetOptions, container: ServiceContainer): Promise<number> {
  return run(container, async () => {
    const update = toProfileUpdate(options);
    await container.profiles.ensure(options.user);
    const profile = await container.profiles.update(options.user, update);
    if (!profile) {
      throw new InvalidArgumentError(`Profile ${options.user} disappeared during update`, 'user');
    }
    container.console.log(`✓ Profile ${profile.userId}`);
    container.console.log(`  Level: ${profile.cefrLevel ?? '(default)'}`);
    container.console.log(`  Languages: ${profile.targetLanguage} (native ${profile.nativeLanguage})`);
    container.console.log(`  Age group: ${profile.ageGroup ?? '(default)'}`);
    container.console.log(`  Style: ${profile.learningStyle ?? '(default)'}`);
  });
}

export async function handleProfileInterests(
  slugs: string[],
  options: UserOptions,
  container: ServiceContainer
): Promise<number> {
  return run(container, async () => {
    const { selected, added } = await container.taxonomy.selectInterests(options.user, slugs);
    container.console.log(`✓ Selected ${selected.length} interest${selected.length === 1 ? '' : 's'}`);
    for (const tag of selected) {
      container.console.log(`  - ${tag.name}${added.some((a) => a.id === tag.id) ? ' (new)' : ''}`);
    }
  });
}

// =============================================================================
// Vocabulary
// =============================================================================

export async function handleVocabList(options: VocabListOptions, container: ServiceContainer): Promise<number> {
  return run(container, async () => {
    const familiarity =
      options.familiarity === undefined ? undefined : parseInteger(options.familiarity, 'familiarity');
    const entries = await container.vocabulary.listVocabulary(options.user, { familiarity });
    if (entries.length === 0) {
      container.console.log('Vocabulary is empty');
      return;
    }
    for (const entry of entries) {
      container.console.log(
        `  #${entry.card.id} ${entry.word.text} [${entry.card.cefrLevel}, ${entry.card.interestContext}] familiarity ${entry.membership.familiarity}`
      );
    }
  });
}

export async function handleVocabRate(
  cardId: string,
  value: string,
  options: UserOptions,
  container: ServiceContainer
): Promise<number> {
  return run(container, async () => {
    const membership = await container.vocabulary.updateFamiliarity(
      options.user,
      parseInteger(cardId, 'cardId'),
      parseInteger(value, 'familiarity')
    );
    container.console.log(`✓ Card #${membership.cardId} familiarity ${membership.familiarity}`);
  });
}

export async function handleVocabRemove(
  cardId: string,
  options: UserOptions,
  container: ServiceContainer
): Promise<number> {
  return run(container, async () => {
    const removed = await container.vocabulary.removeFromVocabulary(options.user, parseInteger(cardId, 'cardId'));
    container.console.log(removed ? `✓ Removed card #${cardId}` : `Card #${cardId} was not in the vocabulary`);
  });
}

// =============================================================================
// Taxonomy
// =============================================================================

export async function handleTaxonomySeed(options: TaxonomySeedOptions, container: ServiceContainer): Promise<number> {
  return run(container, async () => {
    const seed = options.file ? loadTaxonomySeed(options.file) : loadTaxonomySeed();
    const result = await container.taxonomy.seedTaxonomy(seed);
    container.console.log(
      `✓ Seeding complete. Categories: ${result.categoriesCreated} new. Tags: ${result.tagsCreated} new.`
    );
  });
}

export async function handleTaxonomyList(container: ServiceContainer): Promise<number> {
  return run(container, async () => {
    const categories = await container.taxonomy.listTaxonomy();
    if (categories.length === 0) {
      container.console.log('Taxonomy is empty. Run taxonomy:seed first.');
      return;
    }
    for (const category of categories) {
      container.console.log(`${category.name}`);
      for (const tag of category.tags) {
        container.console.log(`  ${tag.slug.padEnd(28)} ${tag.name}`);
      }
    }
  });
}
