/**
 * User Profile Models
 *
 * The profile fields that drive personalization, and the settings struct
 * they resolve into at the start of every lookup.
 */

import { type CefrLevel } from './content-card.model.js';
import { GENERAL_INTEREST } from './interest-graph.model.js';

export const AGE_GROUPS = [
  'early_childhood',
  'early_elementary',
  'upper_elementary',
  'middle_school',
  'high_school',
  'adult',
  'senior',
] as const;

export type AgeGroup = (typeof AGE_GROUPS)[number];

export function isAgeGroup(value: string): value is AgeGroup {
  return AGE_GROUPS.some((group) => group === value);
}

export const LEARNING_STYLES = ['Fun', 'Academic'] as const;

export type LearningStyle = (typeof LEARNING_STYLES)[number];

export function isLearningStyle(value: string): value is LearningStyle {
  return LEARNING_STYLES.some((style) => style === value);
}

export interface UserProfile {
  userId: string;
  nickname: string | null;
  cefrLevel: CefrLevel | null;
  ageGroup: AgeGroup | null;
  learningStyle: LearningStyle | null;
  /** Language being learned */
  targetLanguage: string;
  /** Language used for explanations */
  nativeLanguage: string;
  /** Names of the interest tags the user selected, in taxonomy order */
  topInterestLabels: string[];
  createdAt: string;
  updatedAt: string;
}

export interface ProfileUpdate {
  nickname?: string | null;
  cefrLevel?: CefrLevel | null;
  ageGroup?: AgeGroup | null;
  learningStyle?: LearningStyle | null;
  targetLanguage?: string;
  nativeLanguage?: string;
}

/**
 * Fully resolved personalization for one lookup. Every field has a value;
 * defaults are applied once, here, and nowhere else.
 */
export interface PersonalizationSettings {
  targetLanguage: string;
  nativeLanguage: string;
  cefrLevel: CefrLevel;
  ageGroup: AgeGroup;
  learningStyle: LearningStyle;
  /** Interest context of the cache key (top interest graph label) */
  interestContext: string;
  /** Tone of the cache key; fixed until tone preferences exist */
  toneStyle: string;
  /** Interests offered to the generator, most relevant first */
  candidateInterests: string[];
}

export const PERSONALIZATION_DEFAULTS = {
  targetLanguage: 'fr',
  nativeLanguage: 'en',
  cefrLevel: 'A1',
  ageGroup: 'adult',
  learningStyle: 'Fun',
  interestContext: GENERAL_INTEREST,
  toneStyle: 'Neutral',
  candidateInterests: ['General Knowledge', 'Daily Life'],
} as const satisfies Omit<PersonalizationSettings, 'candidateInterests'> & {
  candidateInterests: readonly string[];
};

export const MAX_CANDIDATE_INTERESTS = 3;

/**
 * Resolve the settings for a lookup. `profile` is null for anonymous users.
 */
export function resolvePersonalization(
  profile: UserProfile | null,
  interestContext: string = GENERAL_INTEREST
): PersonalizationSettings {
  const defaults = PERSONALIZATION_DEFAULTS;

  const candidates: string[] = [];
  if (interestContext !== GENERAL_INTEREST) {
    candidates.push(interestContext);
  }
  for (const label of profile?.topInterestLabels ?? []) {
    if (!candidates.includes(label)) {
      candidates.push(label);
    }
  }

  return {
    targetLanguage: profile?.targetLanguage || defaults.targetLanguage,
    nativeLanguage: profile?.nativeLanguage || defaults.nativeLanguage,
    cefrLevel: profile?.cefrLevel ?? defaults.cefrLevel,
    ageGroup: profile?.ageGroup ?? defaults.ageGroup,
    learningStyle: profile?.learningStyle ?? defaults.learningStyle,
    interestContext: interestContext || defaults.interestContext,
    toneStyle: defaults.toneStyle,
    candidateInterests:
      candidates.length > 0
        ? candidates.slice(0, MAX_CANDIDATE_INTERESTS)
        : [...defaults.candidateInterests],
  };
}
