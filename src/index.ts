#!/usr/bin/env node

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { analyzeBook, type AnalyzeOptions } from './commands/analyze.js';
import { loadConfig } from './config/config.js';
import { REPORT_FORMATS } from './report/renderer.js';

// Initialize the CLI
const program = new Command();

// Load configuration
const config = loadConfig();

program
  .name('book-stats')
  .description('Word, token and cost statistics for books')
  .version('1.0.0');

/**
 * Prints a fatal error and exits with a non-zero status
 * @param error - The thrown value
 * @param debug - Whether to print the stack trace
 */
function exitWithError(error: unknown, debug = false): never {
  if (error instanceof Error) {
    console.error(chalk.red(`Error: ${error.message}`));
    if (debug && error.stack) {
      console.error(chalk.gray(error.stack));
    }
  } else {
    console.error(chalk.red('An unknown error occurred'));
  }
  process.exit(1);
}

// Default command
program
  .command('analyze', { isDefault: true })
  .description('Analyze a book and write its statistics report')
  .argument('<source>', 'Path of the book to analyze')
  .option('-o, --output <path>', 'Report destination (defaults to <source>_word_stats.<ext>)')
  .addOption(new Option('-f, --format <format>', 'Report format').choices(REPORT_FORMATS))
  .option('-d, --debug', 'Enable debug mode')
  .action(async (source: string, options: AnalyzeOptions) => {
    try {
      await analyzeBook(source, options, config);
    } catch (error) {
      exitWithError(error, options.debug);
    }
  });

// Configure settings
program
  .command('config')
  .description('Configure settings')
  .option('-l, --list', 'List current configuration')
  .option('-s, --set <key=value>', 'Set a configuration value')
  .action(async (options: { list?: boolean; set?: string }) => {
    try {
      const { configureSettings } = await import('./commands/configure.js');
      await configureSettings(options, config);
    } catch (error) {
      exitWithError(error);
    }
  });

// Parse command line arguments
await program.parseAsync(process.argv);
