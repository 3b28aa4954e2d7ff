import chalk from 'chalk';
import { SplitError } from '../core/pdf/errors.js';

/**
 * Wrap a command action with the shared error handler: print the message
 * (red text, or an `{ error }` object with --json) and exit 1.
 */
export function cliAction<A extends unknown[]>(
  fn: (...args: A) => Promise<void>,
  isJson: (...args: A) => boolean,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (isJson(...args)) {
        console.log(JSON.stringify({
          error: err instanceof SplitError ? err.code : 'SPLIT_FAILED',
          message,
        }, null, 2));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
      process.exit(1);
    }
  };
}
