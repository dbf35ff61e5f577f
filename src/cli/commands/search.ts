/**
 * Search Command
 *
 * Returns the best-matching snippet for a query, or reports that nothing
 * relevant enough was found.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { output, OutputFormat } from '../utils/output.js';
import { createCliContext, readGlobalOptions } from '../utils/context.js';

export function createSearchCommand(): Command {
  return new Command('search')
    .description('Find the snippet that best matches a query')
    .argument('<query>', 'Search query')
    .action(async (query: string, _options: unknown, command: Command) => {
      const context = createCliContext(readGlobalOptions(command));
      if (context.isErr()) {
        output.error('Invalid configuration', context.error);
        process.exit(1);
      }

      const { service } = context.value;

      const initialized = await service.initialize();
      if (initialized.isErr()) {
        output.error('Could not build the index', initialized.error);
        process.exitCode = 1;
        return;
      }

      const startTime = Date.now();
      const result = await service.search(query);
      const searchTimeMs = Date.now() - startTime;

      if (result.isErr()) {
        output.error('Search failed', result.error);
        process.exitCode = 1;
        return;
      }

      const retrieval = result.value;

      if (output.getFormat() === OutputFormat.JSON) {
        output.json({ query, searchTimeMs, ...retrieval });
        return;
      }

      if (!retrieval.found) {
        console.log(chalk.yellow('No sufficiently relevant snippet found'));
        console.log(chalk.gray(`  Best score: ${retrieval.bestScore.toFixed(3)}`));
        return;
      }

      console.log(
        chalk.bold.white(retrieval.chunk.sourceTitle) +
          chalk.gray(` (confidence: ${retrieval.confidence.toFixed(3)}, chunk #${retrieval.chunk.id})`)
      );
      console.log(chalk.gray(`  ${retrieval.chunk.sourceUrl}`));
      console.log();
      console.log(retrieval.context);
    });
}
