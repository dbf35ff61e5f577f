#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { output, OutputFormat } from './utils/output.js';
import { createRebuildCommand } from './commands/rebuild.js';
import { createSearchCommand } from './commands/search.js';
import { createStatsCommand } from './commands/stats.js';
import { createConfigCommand } from './commands/config.js';

const program = new Command();

program
  .name('snippet-index')
  .description('Scrape a web page into a vector index and retrieve the best-matching snippet')
  .version('1.0.0')
  .option('--json', 'Output results in JSON format')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('-q, --quiet', 'Suppress non-error output')
  .option('--env <path>', 'Load environment variables from this file instead of .env')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts();
    if (opts.json) {
      output.setFormat(OutputFormat.JSON);
    }
    if (opts.quiet) {
      output.setQuiet(true);
    }
  });

// Error handling
program.exitOverride();

process.on('SIGINT', () => {
  console.log('\nOperation cancelled.');
  process.exit(130);
});

process.on('SIGTERM', () => {
  process.exit(143);
});

// Register commands
program.addCommand(createRebuildCommand());
program.addCommand(createSearchCommand());
program.addCommand(createStatsCommand());
program.addCommand(createConfigCommand());

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof CommanderError) {
    // Help and version output arrive here too
    process.exitCode = error.exitCode;
  } else {
    output.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}
