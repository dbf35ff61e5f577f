/**
 * Stats Command
 */

import { Command } from 'commander';
import { output } from '../utils/output.js';
import { createCliContext, readGlobalOptions } from '../utils/context.js';

export function createStatsCommand(): Command {
  return new Command('stats')
    .description('Show statistics about the saved index')
    .action(async (_options: unknown, command: Command) => {
      const context = createCliContext(readGlobalOptions(command));
      if (context.isErr()) {
        output.error('Invalid configuration', context.error);
        process.exit(1);
      }

      const { service, persistence } = context.value;

      // Stats never trigger a scrape
      await service.initialize({ allowRebuild: false });

      const stats = service.stats();
      const file = await persistence.getStats();

      output.success(stats.chunkCount > 0 ? 'Index statistics' : 'The index is empty', {
        ...stats,
        indexFile: file.path,
        fileSizeBytes: file.exists ? file.sizeBytes : null,
      });
    });
}
