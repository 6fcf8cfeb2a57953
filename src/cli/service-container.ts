/**
 * Service Container - Dependency Injection Container
 *
 * Wires stores, the generation gateway and services over one SQLite client.
 * Tests pass their own gateway, console and clock.
 */

import { SqliteContentCardIndex } from '../cache/content-card-index.js';
import { GeminiGateway } from '../client/gemini-gateway.js';
import type { ContentGenerationGateway } from '../client/generation-gateway.js';
import type { Config } from '../config.js';
import { SqliteClient } from '../db/sqlite-client.js';
import { ConsoleLogger, type Logger } from '../logging/console-logger.js';
import { InterestGraphService } from '../services/interest-graph.service.js';
import { TaxonomyService } from '../services/taxonomy.service.js';
import { VocabularyService } from '../services/vocabulary.service.js';
import { SqliteProfileStore } from '../stores/profile-store.js';
import { SqliteTaxonomyStore } from '../stores/taxonomy-store.js';
import { SqliteVocabularyStore } from '../stores/vocabulary-store.js';
import { SqliteWordStore } from '../stores/word-store.js';
import { systemClock, type Clock } from '../utils/clock.js';

/**
 * Console operations interface (for testability)
 */
export interface IConsole {
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Service container configuration
 */
export interface ServiceContainerConfig {
  gateway?: ContentGenerationGateway;
  console?: IConsole;
  logger?: Logger;
  clock?: Clock;
}

/**
 * Service container - manages all service dependencies
 */
export class ServiceContainer {
  public readonly console: IConsole;
  public readonly client: SqliteClient;
  public readonly profiles: SqliteProfileStore;
  public readonly cards: SqliteContentCardIndex;
  public readonly vocabulary: VocabularyService;
  public readonly interests: InterestGraphService;
  public readonly taxonomy: TaxonomyService;

  constructor(config: Config, overrides: ServiceContainerConfig = {}) {
    const logger = overrides.logger ?? new ConsoleLogger('lexicard', config.logLevel);
    const clock = overrides.clock ?? systemClock;

    this.console = overrides.console ?? {
      log: console.log.bind(console),
      error: console.error.bind(console),
    };

    this.client = new SqliteClient(config.databasePath, { logger: child(logger, 'db') });
    this.client.initialize();

    this.profiles = new SqliteProfileStore(this.client, { clock, logger: child(logger, 'profiles') });
    this.cards = new SqliteContentCardIndex(this.client, clock);

    this.interests = new InterestGraphService(this.profiles, {
      decayRate: config.interestDecayRate,
      maxAttempts: config.interestGraphMaxRetries,
      clock,
      logger: child(logger, 'interests'),
    });

    this.vocabulary = new VocabularyService(
      {
        words: new SqliteWordStore(this.client, clock),
        cards: this.cards,
        vocabulary: new SqliteVocabularyStore(this.client, clock),
        profiles: this.profiles,
        gateway: overrides.gateway ?? GeminiGateway.fromConfig(config, child(logger, 'gemini')),
      },
      { generationTimeoutMs: config.generationTimeoutMs, logger: child(logger, 'vocabulary') }
    );

    this.taxonomy = new TaxonomyService(
      new SqliteTaxonomyStore(this.client, clock),
      this.profiles,
      this.interests,
      child(logger, 'taxonomy')
    );
  }

  close(): void {
    this.client.close();
  }
}

function child(logger: Logger, prefix: string): Logger {
  return logger instanceof ConsoleLogger ? logger.child(prefix) : logger;
}
