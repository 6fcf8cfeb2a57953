/**
 * Gemini-backed content generation gateway.
 *
 * Usage:
 * ```typescript
 * const gateway = GeminiGateway.fromConfig(loadConfig());
 * const content = await gateway.generate('manger', settings, AbortSignal.timeout(30_000));
 * ```
 */

import { GoogleGenAI } from '@google/genai';

import type { Config } from '../config.js';
import { GenerationError, LexicardError, toError } from '../errors.js';
import { ConsoleLogger, type Logger } from '../logging/console-logger.js';
import type { PersonalizationSettings } from '../models/user-profile.model.js';
import type { ContentGenerationGateway, GeneratedContent } from './generation-gateway.js';
import { buildPrompt } from './prompt-builder.js';
import { normalizeResponseText } from './response-normalizer.js';

/** Request parameters this gateway sends to the models API */
export interface GenerateContentRequest {
  model: string;
  contents: string;
  config: {
    temperature: number;
    topP: number;
    topK: number;
    responseMimeType: string;
    abortSignal?: AbortSignal;
  };
}

/**
 * The slice of `GoogleGenAI.models` used here, injectable for tests.
 */
export interface GenerativeModels {
  generateContent(request: GenerateContentRequest): Promise<{ text?: string }>;
}

export interface GeminiGatewayOptions {
  /** Omitting both `apiKey` and `models` leaves the gateway unconfigured */
  apiKey?: string;
  models?: GenerativeModels;
  model: string;
  logger?: Logger;
}

const GENERATION_SETTINGS = {
  temperature: 0.3,
  topP: 0.8,
  topK: 40,
  responseMimeType: 'application/json',
};

export class GeminiGateway implements ContentGenerationGateway {
  private readonly models: GenerativeModels | null;
  private readonly logger: Logger;

  constructor(private readonly options: GeminiGatewayOptions) {
    this.models = options.models ?? (options.apiKey ? new GoogleGenAI({ apiKey: options.apiKey }).models : null);
    this.logger = options.logger ?? new ConsoleLogger('GeminiGateway');
  }

  static fromConfig(config: Config, logger?: Logger): GeminiGateway {
    return new GeminiGateway({
      apiKey: config.geminiApiKey,
      model: config.geminiModel,
      logger,
    });
  }

  async generate(
    wordText: string,
    settings: PersonalizationSettings,
    signal?: AbortSignal
  ): Promise<GeneratedContent> {
    const models = this.models;
    if (!models) {
      throw new GenerationError('GEMINI_API_KEY is not configured', 'configuration');
    }

    const { prompt, snapshot } = buildPrompt(wordText, settings);
    this.logger.debug('Generating content', { word: wordText, ...snapshot });

    let text: string;
    try {
      const response = await models.generateContent({
        model: this.options.model,
        contents: prompt,
        config: { ...GENERATION_SETTINGS, abortSignal: signal },
      });
      text = response.text ?? '';
    } catch (error) {
      if (signal?.aborted) {
        throw new GenerationError(`Generation for "${wordText}" was cancelled`, 'timeout', toError(error));
      }
      if (error instanceof LexicardError) {
        throw error;
      }
      const cause = toError(error);
      throw new GenerationError(`Provider error for "${wordText}": ${cause.message}`, 'provider', cause);
    }

    return normalizeResponseText(text, settings.targetLanguage);
  }
}
