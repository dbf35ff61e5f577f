/**
 * Rebuild Command
 *
 * Scrapes the source page and replaces the index.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { output, OutputFormat } from '../utils/output.js';
import { createCliContext, readGlobalOptions } from '../utils/context.js';

export function createRebuildCommand(): Command {
  return new Command('rebuild')
    .description('Scrape the source page and rebuild the index')
    .argument('[url]', 'Page to scrape (defaults to SNIPPET_SOURCE_URL)')
    .action(async (url: string | undefined, _options: unknown, command: Command) => {
      const context = createCliContext(readGlobalOptions(command));
      if (context.isErr()) {
        output.error('Invalid configuration', context.error);
        process.exit(1);
      }

      const { service } = context.value;
      const result = await service.rebuild(url);

      if (result.isErr()) {
        output.error('Rebuild failed', result.error);
        process.exitCode = 1;
        return;
      }

      const outcome = result.value;
      output.success(`Indexed ${outcome.chunkCount} chunks from ${outcome.sourceUrl}`, {
        title: outcome.sourceTitle,
        builtAt: outcome.builtAt,
        durationMs: outcome.durationMs,
        persisted: outcome.persisted,
      });

      if (outcome.persistenceError) {
        output.warning('The new index is active but could not be saved', {
          reason: outcome.persistenceError.message,
        });
      } else if (output.getFormat() === OutputFormat.HUMAN) {
        console.log(chalk.gray(`  Saved to ${context.value.persistence.filePath}`));
      }
    });
}
