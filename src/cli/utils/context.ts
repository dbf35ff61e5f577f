/**
 * Shared setup for commands: environment, configuration and services
 */

import type { Command } from 'commander';
import { Result, ok, err } from '../../lib/result-types.js';
import { ConfigError, InvalidChunkConfigError } from '../../lib/errors/IndexErrors.js';
import { loadEnvFile, loadIndexConfig } from '../../lib/env-config.js';
import type { LogLevel } from '../../lib/logger.js';
import type { IndexConfig } from '../../models/index-config.js';
import { createSnippetServices, type SnippetServices } from '../../services/service-factory.js';

/**
 * Options every command inherits from the program
 */
export interface GlobalOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  env?: string;
}

export interface CliContext extends SnippetServices {
  config: IndexConfig;
}

export function consoleLevelFor(options: GlobalOptions): LogLevel {
  if (options.verbose) return 'debug';
  if (options.quiet) return 'error';
  return 'warn';
}

export function readGlobalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals();
  return {
    json: opts.json === true,
    verbose: opts.verbose === true,
    quiet: opts.quiet === true,
    env: typeof opts.env === 'string' ? opts.env : undefined,
  };
}

/**
 * Load .env and configuration
 */
export function loadConfig(
  options: GlobalOptions
): Result<IndexConfig, ConfigError | InvalidChunkConfigError> {
  const envLoaded = loadEnvFile(options.env);
  if (envLoaded.isErr()) {
    return err(envLoaded.error);
  }
  return loadIndexConfig(process.env);
}

/**
 * Load configuration and build the services
 */
export function createCliContext(
  options: GlobalOptions
): Result<CliContext, ConfigError | InvalidChunkConfigError> {
  const config = loadConfig(options);
  if (config.isErr()) {
    return err(config.error);
  }

  const services = createSnippetServices(config.value, { consoleLevel: consoleLevelFor(options) });
  if (services.isErr()) {
    return err(services.error);
  }

  return ok({ config: config.value, ...services.value });
}
