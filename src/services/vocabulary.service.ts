/**
 * Vocabulary Service
 *
 * Word lookup through the personalized content cache:
 * 1. resolve personalization settings once
 * 2. find-or-create the word, correcting its language
 * 3. reuse a card under the same (word, language, level, interest, tone) key,
 *    or generate one; any generation failure stores a fallback card
 * 4. link the card into the user's vocabulary
 *
 * Anonymous callers (userId null) read cards but get no membership.
 */

import type { IContentCardIndex } from '../cache/content-card-index.js';
import type { ContentGenerationGateway, GeneratedContent } from '../client/generation-gateway.js';
import { DEFAULT_GENERATION_TIMEOUT_MS } from '../config.js';
import { GenerationError, InvalidArgumentError, NotFoundError, toError } from '../errors.js';
import { ConsoleLogger, type Logger } from '../logging/console-logger.js';
import {
  assertFamiliarity,
  describeCardKey,
  fallbackDraft,
  normalizeWordText,
  type ContentCard,
  type ContentCardDraft,
  type ContentCardKey,
  type VocabularyEntry,
  type VocabularyMembership,
} from '../models/content-card.model.js';
import type { PersonalizationSettings } from '../models/user-profile.model.js';
import type { IProfileStore } from '../stores/profile-store.js';
import type { IVocabularyStore, ListVocabularyOptions } from '../stores/vocabulary-store.js';
import type { IWordStore } from '../stores/word-store.js';
import { DeadlineExceededError, withTimeout } from '../utils/timeout.js';
import { PersonalizationService } from './personalization.service.js';

export interface WordLookupResult {
  card: ContentCard;
  /** Null for anonymous lookups */
  membership: VocabularyMembership | null;
  /** True when an existing card was served without generating */
  cacheHit: boolean;
}

export interface VocabularyServiceDeps {
  words: IWordStore;
  cards: IContentCardIndex;
  vocabulary: IVocabularyStore;
  profiles: IProfileStore;
  gateway: ContentGenerationGateway;
}

export interface VocabularyServiceOptions {
  /** Upper bound for one generation call */
  generationTimeoutMs?: number;
  logger?: Logger;
}

function draftFromGenerated(key: ContentCardKey, content: GeneratedContent): ContentCardDraft {
  return {
    ...key,
    definition: content.definition,
    conversation: content.conversationalExample,
    usages: content.usages,
    generatedLevel: content.resolvedLevel,
    generatedLanguage: content.resolvedTargetLanguage,
    partOfSpeech: content.partOfSpeech,
    baseForm: content.baseForm,
    gender: content.gender,
    isFallback: false,
  };
}

export class VocabularyService {
  private readonly personalization: PersonalizationService;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly deps: VocabularyServiceDeps,
    options: VocabularyServiceOptions = {}
  ) {
    this.personalization = new PersonalizationService(deps.profiles);
    this.timeoutMs = options.generationTimeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS;
    this.logger = options.logger ?? new ConsoleLogger('VocabularyService');
  }

  /**
   * Look up a word for a user (or anonymously with `userId` null).
   *
   * @throws InvalidArgumentError for empty word text
   */
  async fetchWordContent(userId: string | null, wordText: string): Promise<WordLookupResult> {
    const text = normalizeWordText(wordText);
    if (text === '') {
      throw new InvalidArgumentError('Word text must not be empty', 'wordText');
    }

    const { settings } = await this.personalization.resolve(userId);

    const resolved = await this.deps.words.resolve(text, settings.targetLanguage);
    if (resolved.created) {
      this.logger.info('Created word', { word: text, language: settings.targetLanguage });
    } else if (resolved.languageCorrected) {
      this.logger.info('Corrected word language', { word: text, language: settings.targetLanguage });
    }

    const key: ContentCardKey = {
      wordId: resolved.word.id,
      targetLanguage: settings.targetLanguage,
      cefrLevel: settings.cefrLevel,
      interestContext: settings.interestContext,
      toneStyle: settings.toneStyle,
    };

    const { card, created, reused } = await this.deps.cards.findOrCreate(key, () =>
      this.produceDraft(key, text, settings)
    );
    if (created) {
      this.logger.info(card.isFallback ? 'Stored fallback card' : 'Stored new card', {
        key: describeCardKey(key),
        cardId: card.id,
      });
    } else if (reused) {
      this.logger.debug('Reusing card', { key: describeCardKey(key), cardId: card.id });
    } else {
      this.logger.info('Card stored concurrently, discarding generated draft', {
        key: describeCardKey(key),
        cardId: card.id,
      });
    }

    let membership: VocabularyMembership | null = null;
    if (userId !== null) {
      await this.deps.profiles.ensure(userId);
      const result = await this.deps.vocabulary.findOrCreate(userId, card.id);
      membership = result.value;
      if (result.created) {
        this.logger.info('Added card to vocabulary', { userId, cardId: card.id });
      }
    }

    return { card, membership, cacheHit: reused };
  }

  async listVocabulary(userId: string, options: ListVocabularyOptions = {}): Promise<VocabularyEntry[]> {
    if (options.familiarity !== undefined) {
      assertFamiliarity(options.familiarity);
    }
    return this.deps.vocabulary.listForUser(userId, options);
  }

  /**
   * @throws InvalidArgumentError unless `familiarity` is 1-5
   * @throws NotFoundError when the user has no membership for the card
   */
  async updateFamiliarity(userId: string, cardId: number, familiarity: number): Promise<VocabularyMembership> {
    assertFamiliarity(familiarity);
    const updated = await this.deps.vocabulary.updateFamiliarity(userId, cardId, familiarity);
    if (!updated) {
      throw new NotFoundError(`No vocabulary entry for card ${cardId}`, 'vocabulary_membership');
    }
    return updated;
  }

  async removeFromVocabulary(userId: string, cardId: number): Promise<boolean> {
    return this.deps.vocabulary.remove(userId, cardId);
  }

  /**
   * Delete a word with all its cards and memberships.
   */
  async deleteWord(wordText: string): Promise<boolean> {
    const deleted = await this.deps.words.deleteByText(wordText);
    if (deleted) {
      this.logger.info('Deleted word', { word: normalizeWordText(wordText) });
    }
    return deleted;
  }

  private async produceDraft(
    key: ContentCardKey,
    wordText: string,
    settings: PersonalizationSettings
  ): Promise<ContentCardDraft> {
    this.logger.info('No matching card, generating', { key: describeCardKey(key) });
    try {
      const content = await withTimeout(
        (signal) => this.deps.gateway.generate(wordText, settings, signal),
        this.timeoutMs
      );
      return draftFromGenerated(key, content);
    } catch (error) {
      const failure = this.toGenerationError(wordText, error);
      this.logger.error(`Generation failed for "${wordText}", using fallback card`, failure, {
        kind: failure.kind,
      });
      return fallbackDraft(key, wordText);
    }
  }

  private toGenerationError(wordText: string, error: unknown): GenerationError {
    if (error instanceof GenerationError) {
      return error;
    }
    if (error instanceof DeadlineExceededError) {
      return new GenerationError(`Generation for "${wordText}" timed out after ${error.timeoutMs}ms`, 'timeout', error);
    }
    const cause = toError(error);
    return new GenerationError(cause.message, 'provider', cause);
  }
}
