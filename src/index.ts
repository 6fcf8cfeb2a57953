/**
 * Lexicard - Personalized Vocabulary Content Cache
 *
 * Looks up words for language learners and reuses generated content cards
 * across users who share the same (language, level, interest, tone) key.
 * A weighted interest graph per user, with lazy daily decay, picks the
 * interest context.
 *
 * Main capabilities:
 * - Lookup: `VocabularyService.fetchWordContent(userId, word)`
 * - Interests: `InterestGraphService.recordInteraction(userId, label, action)`
 * - Taxonomy: `TaxonomyService.seedTaxonomy(seed)`, `selectInterests(userId, slugs)`
 *
 * Entry points:
 * - CLI: `npx tsx src/cli/lexicard.ts lookup manger --user alice`
 * - Programmatic: `new ServiceContainer(loadConfig())`
 */

// Errors, config, logging
export * from './errors.js';
export * from './config.js';
export * from './logging/console-logger.js';

// Models
export * from './models/index.js';

// Storage
export * from './db/index.js';
export * from './cache/content-card-index.js';
export * from './stores/word-store.js';
export * from './stores/vocabulary-store.js';
export * from './stores/profile-store.js';
export * from './stores/taxonomy-store.js';

// Generation
export * from './client/generation-gateway.js';
export * from './client/gemini-gateway.js';
export * from './client/prompt-builder.js';
export * from './client/response-normalizer.js';

// Services
export * from './services/interest-graph.service.js';
export * from './services/personalization.service.js';
export * from './services/vocabulary.service.js';
export * from './services/taxonomy.service.js';

// Container
export { ServiceContainer, type ServiceContainerConfig, type IConsole } from './cli/service-container.js';
