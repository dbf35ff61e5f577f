/**
 * Config Command
 *
 * Prints the effective configuration, with the API key masked.
 */

import { Command } from 'commander';
import { output } from '../utils/output.js';
import { loadConfig, readGlobalOptions } from '../utils/context.js';
import { ENV_VARS, maskApiKey } from '../../lib/env-config.js';

export function createConfigCommand(): Command {
  return new Command('config')
    .description('Show the effective configuration')
    .action((_options: unknown, command: Command) => {
      const config = loadConfig(readGlobalOptions(command));
      if (config.isErr()) {
        output.error('Invalid configuration', config.error);
        process.exit(1);
      }

      const { embedder, ...settings } = config.value;

      output.success('Configuration', {
        [ENV_VARS.sourceUrl]: settings.sourceUrl ?? null,
        [ENV_VARS.chunkSize]: settings.chunkSize,
        [ENV_VARS.chunkOverlap]: settings.chunkOverlap,
        [ENV_VARS.similarityThreshold]: settings.similarityThreshold,
        [ENV_VARS.maxContextLength]: settings.maxContextLength,
        [ENV_VARS.fetchTimeoutMs]: settings.fetchTimeoutMs,
        [ENV_VARS.dataDir]: settings.dataDir,
        [ENV_VARS.indexFile]: settings.indexFile,
        [ENV_VARS.autoScrape]: settings.autoScrape,
        [ENV_VARS.embedder]: embedder.type,
        [ENV_VARS.embedDimensions]: embedder.dimensions,
        ...(embedder.type === 'openai'
          ? {
              [ENV_VARS.openaiModel]: embedder.model,
              [ENV_VARS.openaiApiKey]: maskApiKey(embedder.apiKey),
            }
          : {}),
      });
    });
}
