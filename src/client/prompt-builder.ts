/**
 * Personalized tutor prompt for a word lookup.
 */

import type { PersonalizationSettings } from '../models/user-profile.model.js';

const LANGUAGE_NAMES: Readonly<Record<string, string>> = {
  fr: 'French',
  en: 'English',
  es: 'Spanish',
  de: 'German',
  it: 'Italian',
  pt: 'Portuguese',
  zh: 'Chinese',
  ja: 'Japanese',
  ko: 'Korean',
};

export function languageName(code: string): string {
  return LANGUAGE_NAMES[code] ?? code.toUpperCase();
}

export function toneInstruction(learningStyle: string): string {
  return learningStyle === 'Academic' ? 'Formal, precise, academic' : 'Humorous, witty, engaging';
}

/** What the prompt was built from, for debug logs */
export interface PromptSnapshot {
  targetAge: string;
  targetLevel: string;
  targetLanguage: string;
  nativeLanguage: string;
  candidateInterests: string[];
  style: string;
  tone: string;
}

export interface BuiltPrompt {
  prompt: string;
  snapshot: PromptSnapshot;
}

export function buildPrompt(wordText: string, settings: PersonalizationSettings): BuiltPrompt {
  const target = languageName(settings.targetLanguage);
  const native = languageName(settings.nativeLanguage);
  const level = settings.cefrLevel;
  const interests = settings.candidateInterests.join(', ');
  const tone = toneInstruction(settings.learningStyle);

  const prompt = `You are a highly personalized ${target} language tutor for a ${settings.ageGroup} student.
Level: ${level}. Interests: [${interests}].

Target Word: "${wordText}"

**Instructions:**
1. **Context Selection:** Select the ONE interest from [${interests}] that fits "${wordText}" most naturally. If none fit perfectly, choose the closest match.

2. **Content Generation:**
   - **Conversation (conversation_target):** Write 4-6 sentences in ${target} at ${level} level, using the **selected interest** as the setting.
   - **Explanation (explanation_native):** Explain "${wordText}" using an analogy or example from the **selected interest**. Write in ${native}.
   - **Examples (usages_target):** Provide exactly 3 different ${target} example sentences showing different usage contexts, at ${level} level.
   - **Grammar Info:** Identify part_of_speech, base_form, and gender (if applicable for ${target}).

3. **Tone:** ${tone}

Return ONLY valid JSON. No markdown. No extra text.

Schema:
{
  "input_word": "${wordText}",
  "target_language": "${settings.targetLanguage}",
  "native_language": "${settings.nativeLanguage}",
  "selected_interest": "The chosen interest from the list",
  "part_of_speech": "verb" | "noun" | "adjective" | "adverb" | "other",
  "base_form": "string (infinitive for verbs, singular for nouns, masculine singular for adjectives)",
  "gender": "m" | "f" | null,
  "difficulty_system": "CEFR",
  "difficulty_level": "A1" | "A2" | "B1" | "B2" | "C1" | "C2",
  "conversation_target": "4-6 sentences in ${target} using the selected interest",
  "explanation_native": "${native} explanation using an analogy from the selected interest",
  "usages_target": ["sentence 1", "sentence 2", "sentence 3"]
}
`;

  return {
    prompt,
    snapshot: {
      targetAge: settings.ageGroup,
      targetLevel: level,
      targetLanguage: settings.targetLanguage,
      nativeLanguage: settings.nativeLanguage,
      candidateInterests: [...settings.candidateInterests],
      style: settings.learningStyle,
      tone,
    },
  };
}
