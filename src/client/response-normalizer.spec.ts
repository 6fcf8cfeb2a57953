/**
 * Response Normalizer Tests
 *
 * Covers JSON recovery from noisy text and mapping of both field sets.
 */

import { describe, it, expect } from 'vitest';
import { GenerationError } from '../errors.js';
import { extractJsonText, normalizeResponse, normalizeResponseText, parseJsonResponse } from './response-normalizer.js';

const CURRENT = {
  input_word: 'manger',
  target_language: 'FR',
  native_language: 'EN',
  selected_interest: 'Hockey',
  part_of_speech: 'verb',
  base_form: 'manger',
  gender: null,
  difficulty_system: 'CEFR',
  difficulty_level: 'b1',
  conversation_target: 'On mange avant le match ?',
  explanation_native: 'To eat, like refuelling between periods.',
  usages_target: ['Je mange.', 'Tu manges.', 'Il mange.'],
};

const LEGACY = {
  personalized_explanation: 'To eat.',
  conversation_fr: 'Tu as mangé ?',
  usages_fr: ['Je mange.'],
  cefr_level: 'A2',
  language: 'fr',
};

function expectMalformed(fn: () => unknown): void {
  try {
    fn();
    expect.unreachable();
  } catch (error) {
    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toHaveProperty('kind', 'malformed_response');
  }
}

describe('extractJsonText()', () => {
  it('should strip code fences and surrounding text', () => {
    expect(extractJsonText('Here you go:\n```json\n{"a": 1}\n```\nEnjoy')).toBe('{"a": 1}');
  });

  it('should drop trailing commas', () => {
    expect(extractJsonText('{"a": [1, 2,], "b": 3,}')).toBe('{"a": [1, 2], "b": 3}');
  });
});

describe('parseJsonResponse()', () => {
  it('should parse clean JSON directly', () => {
    expect(parseJsonResponse('{"a": 1}')).toEqual({ a: 1 });
  });

  it('should recover fenced JSON with trailing commas', () => {
    expect(parseJsonResponse('```json\n{"a": [1,],}\n```')).toEqual({ a: [1] });
  });

  it('should reject text without JSON', () => {
    expectMalformed(() => parseJsonResponse('Sorry, I cannot help with that.'));
    expectMalformed(() => parseJsonResponse(''));
  });
});

describe('normalizeResponse()', () => {
  it('should map the current field set', () => {
    expect(normalizeResponse(CURRENT, 'fr')).toEqual({
      definition: 'To eat, like refuelling between periods.',
      conversationalExample: 'On mange avant le match ?',
      usages: ['Je mange.', 'Tu manges.', 'Il mange.'],
      resolvedLevel: 'B1',
      resolvedTargetLanguage: 'fr',
      nativeLanguage: 'en',
      partOfSpeech: 'verb',
      baseForm: 'manger',
      gender: null,
      selectedInterest: 'Hockey',
    });
  });

  it('should map the legacy field set', () => {
    expect(normalizeResponse(LEGACY, 'es')).toEqual({
      definition: 'To eat.',
      conversationalExample: 'Tu as mangé ?',
      usages: ['Je mange.', '', ''],
      resolvedLevel: 'A2',
      resolvedTargetLanguage: 'fr',
      nativeLanguage: null,
      partOfSpeech: null,
      baseForm: null,
      gender: null,
      selectedInterest: null,
    });
  });

  it('should accept definition_en in legacy responses', () => {
    const { personalized_explanation: _omitted, ...rest } = LEGACY;
    expect(normalizeResponse({ ...rest, definition_en: 'To eat (en).' }, 'fr').definition).toBe('To eat (en).');
  });

  it('should use the requested language when none is given', () => {
    const { target_language: _omitted, ...rest } = CURRENT;
    expect(normalizeResponse(rest, 'de').resolvedTargetLanguage).toBe('de');
  });

  it('should truncate usages to three', () => {
    const result = normalizeResponse({ ...CURRENT, usages_target: ['a', 'b', 'c', 'd', 'e'] }, 'fr');
    expect(result.usages).toEqual(['a', 'b', 'c']);
  });

  it('should keep only m or f as gender', () => {
    expect(normalizeResponse({ ...CURRENT, gender: ' F ' }, 'fr').gender).toBe('f');
    expect(normalizeResponse({ ...CURRENT, gender: 'n' }, 'fr').gender).toBeNull();
  });

  it('should reject non-list usages', () => {
    expectMalformed(() => normalizeResponse({ ...CURRENT, usages_target: 'Je mange.' }, 'fr'));
  });

  it('should reject unknown levels', () => {
    expectMalformed(() => normalizeResponse({ ...CURRENT, difficulty_level: 'D4' }, 'fr'));
  });

  it('should reject payloads with neither field set', () => {
    expectMalformed(() => normalizeResponse({ definition: 'x' }, 'fr'));
    expectMalformed(() => normalizeResponse(['not', 'an', 'object'], 'fr'));
  });
});

describe('normalizeResponseText()', () => {
  it('should parse and normalize in one step', () => {
    const text = `\`\`\`json\n${JSON.stringify(CURRENT)}\n\`\`\``;
    expect(normalizeResponseText(text, 'fr').resolvedLevel).toBe('B1');
  });
});
