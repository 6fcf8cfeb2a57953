/**
 * Test fixtures shared by the spec files.
 */

import { vi, type Mock } from 'vitest';

import type { ContentGenerationGateway, GeneratedContent } from '../client/generation-gateway.js';
import type { Logger } from '../logging/console-logger.js';
import type { PersonalizationSettings } from '../models/user-profile.model.js';
import type { Clock } from '../utils/clock.js';

export type MockLogger = { [K in keyof Logger]: Mock<Logger[K]> };

export function createMockLogger(): MockLogger {
  return {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
  };
}

/**
 * Clock that only moves when told to.
 */
export interface ManualClock {
  clock: Clock;
  set(date: Date): void;
  advanceDays(days: number): void;
}

export function createManualClock(start: Date = new Date('2024-03-01T12:00:00.000Z')): ManualClock {
  let now = start;
  return {
    clock: () => now,
    set: (date) => {
      now = date;
    },
    advanceDays: (days) => {
      now = new Date(now.getTime() + days * 86_400_000);
    },
  };
}

export function generatedContent(overrides: Partial<GeneratedContent> = {}): GeneratedContent {
  return {
    definition: 'To eat: like refuelling between periods',
    conversationalExample: 'On mange avant le match ?',
    usages: ['Je mange une pomme.', 'Nous mangeons ensemble.', 'Ils mangent vite.'],
    resolvedLevel: 'B1',
    resolvedTargetLanguage: 'fr',
    nativeLanguage: 'en',
    partOfSpeech: 'verb',
    baseForm: 'manger',
    gender: null,
    selectedInterest: 'Hockey',
    ...overrides,
  };
}

export interface GatewayCall {
  wordText: string;
  settings: PersonalizationSettings;
}

/**
 * In-process gateway. `respond` decides each answer; the default returns
 * `generatedContent()`.
 */
export class FakeGateway implements ContentGenerationGateway {
  readonly calls: GatewayCall[] = [];

  constructor(
    private readonly respond: (wordText: string, settings: PersonalizationSettings, signal?: AbortSignal) => Promise<GeneratedContent> = async () =>
      generatedContent()
  ) {}

  async generate(wordText: string, settings: PersonalizationSettings, signal?: AbortSignal): Promise<GeneratedContent> {
    this.calls.push({ wordText, settings });
    return this.respond(wordText, settings, signal);
  }
}

/**
 * Gateway that never answers until its signal aborts.
 */
export function hangingGateway(): FakeGateway {
  return new FakeGateway(
    (_wordText, _settings, signal) =>
      new Promise<GeneratedContent>((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(new Error('aborted')));
      })
  );
}
