#!/usr/bin/env node
/**
 * wikiracer - Entry Point
 *
 * Finds link paths between Wikipedia articles,
 * caching visited pages in Postgres
 */
import { Command } from 'commander';
import { logger, VERSION } from './core/index.js';
import { parseDepth, runRace } from './commands/race.js';
import { runLinks, runBacklinks } from './commands/links.js';
import { runServices } from './commands/services.js';

const program = new Command();

program
  .name('wikiracer')
  .description('Find a chain of links between two Wikipedia articles')
  .version(VERSION);

program
  .command('race')
  .description('find a path from <start> to <finish>')
  .argument('<start>', 'title of the start article')
  .argument('<finish>', 'title of the target article')
  .option('-d, --depth <n>', 'maximum number of intermediate pages', parseDepth)
  .action(runRace);

program
  .command('links')
  .description('list the articles linked from <title>')
  .argument('<title>')
  .action(runLinks);

program
  .command('backlinks')
  .description('list the articles linking to <title>')
  .argument('<title>')
  .action(runBacklinks);

program
  .command('services')
  .description('show the services declared in the compose file')
  .option('-f, --file <path>', 'compose file to read')
  .action(runServices);

program.parseAsync().catch((error: unknown) => {
  logger.fatal({ error }, 'wikiracer failed');
  process.exit(1);
});
