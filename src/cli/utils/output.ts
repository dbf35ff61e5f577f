/**
 * Output formatting utilities for CLI
 */

import chalk from 'chalk';

/**
 * Output format types
 */
export enum OutputFormat {
  HUMAN = 'human',
  JSON = 'json'
}

/**
 * Symbols for terminal output
 */
const symbols = {
  success: '✓',
  error: '✗',
  warning: '⚠',
};

/**
 * Output formatter class
 */
export class OutputFormatter {
  private format: OutputFormat;
  private quiet = false;

  constructor(format: OutputFormat = OutputFormat.HUMAN) {
    this.format = format;
  }

  /**
   * Outputs success message
   */
  success(message: string, data?: Record<string, unknown>): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'success', message, ...data });
    } else {
      if (this.quiet) return;
      console.log(`${chalk.green(symbols.success)} ${message}`);
      if (data) {
        this.details(data);
      }
    }
  }

  /**
   * Outputs error message
   */
  error(message: string, error?: Error): void {
    if (this.format === OutputFormat.JSON) {
      this.json({
        status: 'error',
        message,
        error: error
          ? {
              name: error.name,
              code: 'code' in error ? error.code : undefined,
              message: error.message,
            }
          : undefined,
      });
    } else {
      console.error(`${chalk.red(symbols.error)} ${chalk.red(message)}`);
      if (error && error.message !== message) {
        console.error(`  ${chalk.dim(error.message)}`);
      }
    }
  }

  /**
   * Outputs warning message
   */
  warning(message: string, details?: Record<string, unknown>): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'warning', message, ...details });
    } else {
      console.warn(`${chalk.yellow(symbols.warning)} ${chalk.yellow(message)}`);
      if (details) {
        this.details(details);
      }
    }
  }

  /**
   * Outputs raw JSON
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Outputs details (key-value pairs)
   */
  private details(data: Record<string, unknown>): void {
    for (const [key, value] of Object.entries(data)) {
      if (value === undefined) continue;
      const formattedKey = key
        .replace(/([a-z])([A-Z])/g, '$1 $2')
        .replace(/\b\w/g, (l) => l.toUpperCase());
      console.log(`  ${chalk.dim(formattedKey + ':')} ${value === null ? '-' : String(value)}`);
    }
  }

  /**
   * Sets output format
   */
  setFormat(format: OutputFormat): void {
    this.format = format;
  }

  /**
   * Gets output format
   */
  getFormat(): OutputFormat {
    return this.format;
  }

  /**
   * Suppress success output in human mode
   */
  setQuiet(quiet: boolean): void {
    this.quiet = quiet;
  }
}

/**
 * Default output formatter instance
 */
export const output = new OutputFormatter();
