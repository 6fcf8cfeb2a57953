/**
 * Content Card Models
 *
 * Words, the generated content cards cached per personalization key, and
 * the vocabulary memberships that link users to cards.
 */

import { InvalidArgumentError } from '../errors.js';

// =============================================================================
// CEFR Levels
// =============================================================================

export const CEFR_LEVELS = ['A1', 'A2', 'B1', 'B2', 'C1', 'C2'] as const;

export type CefrLevel = (typeof CEFR_LEVELS)[number];

export function isCefrLevel(value: string): value is CefrLevel {
  return CEFR_LEVELS.some((level) => level === value);
}

// =============================================================================
// Word
// =============================================================================

/**
 * Global dictionary entry, shared by every user.
 */
export interface Word {
  id: number;
  /** Normalized text (trimmed, lower-cased) */
  text: string;
  /** Language code of the word, e.g. "fr" */
  language: string;
  createdAt: string;
  updatedAt: string;
}

/**
 * Trim and lower-case raw user input into a word's identity.
 */
export function normalizeWordText(text: string): string {
  return text.trim().toLowerCase();
}

// =============================================================================
// Content Card
// =============================================================================

/** Number of usage examples a generated card carries */
export const USAGE_EXAMPLE_COUNT = 3;

export type GrammaticalGender = 'm' | 'f';

/**
 * Composite cache key. At most one card exists per key.
 */
export interface ContentCardKey {
  wordId: number;
  targetLanguage: string;
  cefrLevel: CefrLevel;
  interestContext: string;
  toneStyle: string;
}

/**
 * Everything needed to insert a card.
 */
export interface ContentCardDraft extends ContentCardKey {
  definition: string;
  conversation: string | null;
  usages: string[];
  /** Level reported by the generator, which may differ from the requested one */
  generatedLevel: CefrLevel | null;
  /** Target language reported by the generator */
  generatedLanguage: string | null;
  partOfSpeech: string | null;
  baseForm: string | null;
  gender: GrammaticalGender | null;
  /** Placeholder content written after a generation failure */
  isFallback: boolean;
}

export interface ContentCard extends ContentCardDraft {
  id: number;
  createdAt: string;
}

export function cardKeyOf(card: ContentCardKey): ContentCardKey {
  return {
    wordId: card.wordId,
    targetLanguage: card.targetLanguage,
    cefrLevel: card.cefrLevel,
    interestContext: card.interestContext,
    toneStyle: card.toneStyle,
  };
}

/**
 * Readable form of a key for logs.
 */
export function describeCardKey(key: ContentCardKey): string {
  return `word#${key.wordId} (${key.targetLanguage}, ${key.cefrLevel}, ${key.interestContext}, ${key.toneStyle})`;
}

/**
 * Placeholder placed in the cache when generation fails.
 */
export function fallbackDraft(key: ContentCardKey, wordText: string): ContentCardDraft {
  return {
    ...cardKeyOf(key),
    definition: `Definition for ${wordText}`,
    conversation: '',
    usages: [],
    generatedLevel: null,
    generatedLanguage: null,
    partOfSpeech: null,
    baseForm: null,
    gender: null,
    isFallback: true,
  };
}

export function serializeUsages(usages: readonly string[]): string {
  return usages.length > 0 ? JSON.stringify(usages) : '[]';
}

/**
 * Read the stored usage list. Corrupt JSON or a non-list value reads as an
 * empty list.
 */
export function parseUsages(raw: string | null | undefined): string[] {
  if (!raw) {
    return [];
  }
  try {
    const value: unknown = JSON.parse(raw);
    if (!Array.isArray(value)) {
      return [];
    }
    return value.map((item) => (typeof item === 'string' ? item : String(item ?? '')));
  } catch {
    return [];
  }
}

// =============================================================================
// Vocabulary Membership
// =============================================================================

export const FAMILIARITY_MIN = 1;
export const FAMILIARITY_MAX = 5;
export const DEFAULT_FAMILIARITY = 1;

/**
 * A user's link to a card, with their own familiarity rating.
 */
export interface VocabularyMembership {
  id: number;
  userId: string;
  cardId: number;
  /** 1 = new, 5 = mastered */
  familiarity: number;
  addedAt: string;
  updatedAt: string;
}

/**
 * @throws InvalidArgumentError unless `value` is an integer from 1 to 5
 */
export function assertFamiliarity(value: number): void {
  if (!Number.isInteger(value) || value < FAMILIARITY_MIN || value > FAMILIARITY_MAX) {
    throw new InvalidArgumentError(
      `Familiarity must be an integer from ${FAMILIARITY_MIN} to ${FAMILIARITY_MAX}, got ${value}`,
      'familiarity'
    );
  }
}

/**
 * Membership joined with its card and word, as listed to the user.
 */
export interface VocabularyEntry {
  membership: VocabularyMembership;
  card: ContentCard;
  word: Word;
}
