/**
 * Personalization resolution tests
 */

import { describe, it, expect } from 'vitest';
import { PERSONALIZATION_DEFAULTS, resolvePersonalization, type UserProfile } from './user-profile.model.js';

function profile(overrides: Partial<UserProfile> = {}): UserProfile {
  return {
    userId: 'alice',
    nickname: null,
    cefrLevel: null,
    ageGroup: null,
    learningStyle: null,
    targetLanguage: 'fr',
    nativeLanguage: 'en',
    topInterestLabels: [],
    createdAt: '2024-03-01T00:00:00.000Z',
    updatedAt: '2024-03-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('resolvePersonalization()', () => {
  it('should use defaults for anonymous users', () => {
    expect(resolvePersonalization(null)).toEqual({
      targetLanguage: 'fr',
      nativeLanguage: 'en',
      cefrLevel: 'A1',
      ageGroup: 'adult',
      learningStyle: 'Fun',
      interestContext: 'General',
      toneStyle: 'Neutral',
      candidateInterests: ['General Knowledge', 'Daily Life'],
    });
  });

  it('should take profile fields over defaults', () => {
    const settings = resolvePersonalization(
      profile({ cefrLevel: 'B2', ageGroup: 'senior', learningStyle: 'Academic', targetLanguage: 'es', nativeLanguage: 'de' })
    );

    expect(settings.cefrLevel).toBe('B2');
    expect(settings.ageGroup).toBe('senior');
    expect(settings.learningStyle).toBe('Academic');
    expect(settings.targetLanguage).toBe('es');
    expect(settings.nativeLanguage).toBe('de');
  });

  it('should fall back for empty language codes', () => {
    const settings = resolvePersonalization(profile({ targetLanguage: '', nativeLanguage: '' }));
    expect(settings.targetLanguage).toBe('fr');
    expect(settings.nativeLanguage).toBe('en');
  });

  it('should put the interest context first among candidates', () => {
    const settings = resolvePersonalization(profile({ topInterestLabels: ['Tennis', 'Hockey', 'Novels'] }), 'Hockey');

    expect(settings.interestContext).toBe('Hockey');
    expect(settings.candidateInterests).toEqual(['Hockey', 'Tennis', 'Novels']);
  });

  it('should cap candidates at three', () => {
    const settings = resolvePersonalization(profile({ topInterestLabels: ['A', 'B', 'C', 'D'] }), 'Z');
    expect(settings.candidateInterests).toEqual(['Z', 'A', 'B']);
  });

  it('should not offer General as a candidate', () => {
    const settings = resolvePersonalization(profile({ topInterestLabels: ['Tennis'] }));
    expect(settings.interestContext).toBe('General');
    expect(settings.candidateInterests).toEqual(['Tennis']);
  });

  it('should always use the fixed tone', () => {
    expect(resolvePersonalization(profile({ learningStyle: 'Academic' })).toneStyle).toBe(
      PERSONALIZATION_DEFAULTS.toneStyle
    );
  });
});
