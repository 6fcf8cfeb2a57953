/**
 * Response normalization for generated card content.
 *
 * Providers answer with one of two field sets:
 * - current: explanation_native, conversation_target, usages_target,
 *   difficulty_level, target_language
 * - legacy: personalized_explanation (or definition_en), conversation_fr,
 *   usages_fr, cefr_level, language
 *
 * Both are mapped onto GeneratedContent here and nowhere else.
 */

import { z } from 'zod';

import { GenerationError } from '../errors.js';
import { CEFR_LEVELS, USAGE_EXAMPLE_COUNT } from '../models/content-card.model.js';
import type { GeneratedContent } from './generation-gateway.js';

// =============================================================================
// JSON extraction
// =============================================================================

/**
 * Pull the JSON object out of text that may carry code fences or chatter,
 * and drop trailing commas before closing brackets.
 */
export function extractJsonText(text: string): string {
  let cleaned = text.replace(/```json\s*/g, '').replace(/```\s*/g, '').trim();

  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start !== -1 && end > start) {
    cleaned = cleaned.slice(start, end + 1);
  }

  return cleaned.replace(/,\s*}/g, '}').replace(/,\s*]/g, ']');
}

/**
 * @throws GenerationError (malformed_response) when no JSON can be recovered
 */
export function parseJsonResponse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    try {
      return JSON.parse(extractJsonText(text));
    } catch (error) {
      throw new GenerationError(
        `Failed to parse JSON response: ${text.slice(0, 200)}`,
        'malformed_response',
        error instanceof Error ? error : undefined
      );
    }
  }
}

// =============================================================================
// Field schemas
// =============================================================================

const requiredText = z.unknown().transform((value) => (value === null || value === undefined ? '' : String(value).trim()));

const optionalText = z.unknown().transform((value) => {
  if (value === null || value === undefined) return null;
  const text = String(value).trim();
  return text === '' ? null : text;
});

const usagesField = z
  .array(z.unknown(), { invalid_type_error: 'usages must be a list' })
  .transform((items) => {
    const usages = items
      .slice(0, USAGE_EXAMPLE_COUNT)
      .map((item) => (item === null || item === undefined ? '' : String(item).trim()));
    while (usages.length < USAGE_EXAMPLE_COUNT) {
      usages.push('');
    }
    return usages;
  });

const levelField = z
  .unknown()
  .transform((value) => String(value ?? '').trim().toUpperCase())
  .pipe(z.enum(CEFR_LEVELS));

const genderField = z.unknown().transform((value) => {
  const gender = typeof value === 'string' ? value.trim().toLowerCase() : '';
  return gender === 'm' || gender === 'f' ? gender : null;
});

const grammarFields = {
  native_language: optionalText,
  part_of_speech: optionalText,
  base_form: optionalText,
  gender: genderField,
  selected_interest: optionalText,
};

const currentResponseSchema = z.object({
  explanation_native: requiredText,
  conversation_target: requiredText,
  usages_target: usagesField,
  difficulty_level: levelField,
  target_language: optionalText,
  ...grammarFields,
});

const legacyResponseSchema = z.object({
  personalized_explanation: optionalText,
  definition_en: optionalText,
  conversation_fr: requiredText,
  usages_fr: usagesField,
  cefr_level: levelField,
  language: optionalText,
  ...grammarFields,
});

const CURRENT_FIELDS = ['explanation_native', 'conversation_target', 'usages_target', 'difficulty_level'];
const LEGACY_FIELDS = ['conversation_fr', 'usages_fr', 'cefr_level'];

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

// =============================================================================
// Normalization
// =============================================================================

/**
 * Map a parsed provider payload onto GeneratedContent.
 *
 * @param defaultTargetLanguage used when the payload names no target language
 * @throws GenerationError (malformed_response) when neither field set is present
 *   or a field fails validation
 */
export function normalizeResponse(payload: unknown, defaultTargetLanguage: string): GeneratedContent {
  const record = z.record(z.unknown()).safeParse(payload);
  if (!record.success) {
    throw new GenerationError('Response is not a JSON object', 'malformed_response');
  }
  const data = record.data;

  const hasCurrent = CURRENT_FIELDS.every((field) => field in data);
  const hasLegacy =
    LEGACY_FIELDS.every((field) => field in data) && ('personalized_explanation' in data || 'definition_en' in data);

  if (hasCurrent) {
    const parsed = currentResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new GenerationError(`Invalid response: ${describeIssues(parsed.error)}`, 'malformed_response');
    }
    const result = parsed.data;
    return {
      definition: result.explanation_native,
      conversationalExample: result.conversation_target,
      usages: result.usages_target,
      resolvedLevel: result.difficulty_level,
      resolvedTargetLanguage: (result.target_language ?? defaultTargetLanguage).toLowerCase(),
      nativeLanguage: result.native_language?.toLowerCase() ?? null,
      partOfSpeech: result.part_of_speech,
      baseForm: result.base_form,
      gender: result.gender,
      selectedInterest: result.selected_interest,
    };
  }

  if (hasLegacy) {
    const parsed = legacyResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new GenerationError(`Invalid legacy response: ${describeIssues(parsed.error)}`, 'malformed_response');
    }
    const result = parsed.data;
    return {
      definition: result.personalized_explanation ?? result.definition_en ?? '',
      conversationalExample: result.conversation_fr,
      usages: result.usages_fr,
      resolvedLevel: result.cefr_level,
      resolvedTargetLanguage: (result.language ?? defaultTargetLanguage).toLowerCase(),
      nativeLanguage: result.native_language?.toLowerCase() ?? null,
      partOfSpeech: result.part_of_speech,
      baseForm: result.base_form,
      gender: result.gender,
      selectedInterest: result.selected_interest,
    };
  }

  const missing = CURRENT_FIELDS.filter((field) => !(field in data));
  throw new GenerationError(
    `Missing required fields: ${missing.join(', ')} (or legacy ${LEGACY_FIELDS.join(', ')}, personalized_explanation)`,
    'malformed_response'
  );
}

/**
 * Parse raw provider text and normalize it in one step.
 */
export function normalizeResponseText(text: string, defaultTargetLanguage: string): GeneratedContent {
  return normalizeResponse(parseJsonResponse(text.trim()), defaultTargetLanguage);
}
