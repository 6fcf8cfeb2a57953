#!/usr/bin/env node
/**
 * Lexicard CLI
 *
 * Usage:
 *   npx tsx src/cli/lexicard.ts taxonomy:seed
 *   npx tsx src/cli/lexicard.ts profile:set --user alice --level B1
 *   npx tsx src/cli/lexicard.ts profile:interests --user alice hockey tennis
 *   npx tsx src/cli/lexicard.ts interact Hockey share --user alice
 *   npx tsx src/cli/lexicard.ts lookup manger --user alice
 *   npx tsx src/cli/lexicard.ts vocab:list --user alice
 */

import { Command } from 'commander';

import { loadConfig } from '../config.js';
import {
  handleInteract,
  handleInterests,
  handleLookup,
  handleProfileInterests,
  handleProfileSet,
  handleTaxonomyList,
  handleTaxonomySeed,
  handleVocabList,
  handleVocabRate,
  handleVocabRemove,
  type ProfileSetOptions,
} from './handlers/lexicard-handlers.js';
import { ServiceContainer } from './service-container.js';

const program = new Command();

program
  .name('lexicard')
  .description('Personalized vocabulary cards with interest tracking')
  .version('0.1.0')
  .option('--db <path>', 'SQLite database path (overrides DATABASE_PATH)');

/**
 * Build the container, run one handler, close the database and record the
 * exit code.
 */
async function withContainer(handler: (container: ServiceContainer) => Promise<number>): Promise<void> {
  const config = loadConfig();
  const { db } = program.opts<{ db?: string }>();
  const container = new ServiceContainer(db ? { ...config, databasePath: db } : config);
  try {
    process.exitCode = await handler(container);
  } finally {
    container.close();
  }
}

program
  .command('lookup <word>')
  .description('Look up a word, reusing a cached card when one matches')
  .option('-u, --user <id>', 'User ID (omit for an anonymous lookup)')
  .action((word: string, options: { user?: string }) =>
    withContainer((container) => handleLookup(word, options, container))
  );

program
  .command('interact <label> <action>')
  .description('Record an interaction (click, view_50_percent, view_100_percent, share, explicit_tag)')
  .requiredOption('-u, --user <id>', 'User ID')
  .action((label: string, action: string, options: { user: string }) =>
    withContainer((container) => handleInteract(label, action, options, container))
  );

program
  .command('interests')
  .description('Show the interest graph, strongest first')
  .requiredOption('-u, --user <id>', 'User ID')
  .action((options: { user: string }) => withContainer((container) => handleInterests(options, container)));

program
  .command('profile:set')
  .description('Create or update a profile')
  .requiredOption('-u, --user <id>', 'User ID')
  .option('--level <cefr>', 'CEFR level (A1-C2)')
  .option('--target <lang>', 'Target language code')
  .option('--native <lang>', 'Native language code')
  .option('--age-group <group>', 'Age group')
  .option('--style <style>', 'Learning style (Fun or Academic)')
  .option('--nickname <name>', 'Display name')
  .action((options: ProfileSetOptions) => withContainer((container) => handleProfileSet(options, container)));

program
  .command('profile:interests <slugs...>')
  .description('Replace the selected interest tags')
  .requiredOption('-u, --user <id>', 'User ID')
  .action((slugs: string[], options: { user: string }) =>
    withContainer((container) => handleProfileInterests(slugs, options, container))
  );

program
  .command('vocab:list')
  .description('List saved vocabulary, newest first')
  .requiredOption('-u, --user <id>', 'User ID')
  .option('-f, --familiarity <n>', 'Only entries at this familiarity (1-5)')
  .action((options: { user: string; familiarity?: string }) =>
    withContainer((container) => handleVocabList(options, container))
  );

program
  .command('vocab:rate <cardId> <value>')
  .description('Set familiarity (1-5) for a saved card')
  .requiredOption('-u, --user <id>', 'User ID')
  .action((cardId: string, value: string, options: { user: string }) =>
    withContainer((container) => handleVocabRate(cardId, value, options, container))
  );

program
  .command('vocab:remove <cardId>')
  .description('Remove a card from the vocabulary')
  .requiredOption('-u, --user <id>', 'User ID')
  .action((cardId: string, options: { user: string }) =>
    withContainer((container) => handleVocabRemove(cardId, options, container))
  );

program
  .command('taxonomy:seed')
  .description('Seed interest categories and tags (idempotent)')
  .option('--file <path>', 'Seed JSON file')
  .action((options: { file?: string }) => withContainer((container) => handleTaxonomySeed(options, container)));

program
  .command('taxonomy:list')
  .description('List interest categories and tags')
  .action(() => withContainer((container) => handleTaxonomyList(container)));

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`\n✗ ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
