/**
 * Content Generation Gateway contract.
 *
 * Implementations turn a word and the caller's personalization into card
 * content, or throw GenerationError. Response normalization happens inside
 * the gateway; callers only ever see `GeneratedContent`.
 */

import type { CefrLevel, GrammaticalGender } from '../models/content-card.model.js';
import type { PersonalizationSettings } from '../models/user-profile.model.js';

export interface GeneratedContent {
  /** Explanation written in the native language */
  definition: string;
  /** Short dialogue in the target language */
  conversationalExample: string;
  /** Exactly three example sentences in the target language */
  usages: string[];
  resolvedLevel: CefrLevel;
  resolvedTargetLanguage: string;
  nativeLanguage: string | null;
  partOfSpeech: string | null;
  baseForm: string | null;
  gender: GrammaticalGender | null;
  /** Interest the generator chose from the candidates */
  selectedInterest: string | null;
}

export interface ContentGenerationGateway {
  /**
   * @param signal aborted when the caller stops waiting
   * @throws GenerationError on provider failure or unusable output
   */
  generate(wordText: string, settings: PersonalizationSettings, signal?: AbortSignal): Promise<GeneratedContent>;
}
