/**
 * Progress logger for CLI commands. Writes to stderr so `--json` output on
 * stdout stays parseable.
 */
import chalk from 'chalk';
import type { Logger } from '../core/pdf/types.js';

export interface CliLoggerOptions {
  /** Suppress info/debug lines (warnings still print). */
  quiet?: boolean;
  verbose?: boolean;
  /** Defaults to process.stderr. */
  stream?: { write(chunk: string): unknown };
}

export function createCliLogger(opts: CliLoggerOptions = {}): Logger {
  const stream = opts.stream ?? process.stderr;
  const emit = (text: string): void => { stream.write(`${text}\n`); };

  return {
    debug: opts.verbose && !opts.quiet ? (message) => emit(chalk.dim(message)) : undefined,
    info: opts.quiet ? undefined : (message) => emit(chalk.dim(`  ${message}`)),
    warn: (message) => emit(chalk.yellow(`  Warning: ${message}`)),
  };
}
