/**
 * @opsdeck/cli - Command Error Handling
 * Every command action is wrapped once at registration.
 */

import chalk from 'chalk';
import { OpsError, errorMessage } from '@opsdeck/shared';
import { logger } from '@opsdeck/logger';

export interface ErrorOutput {
  write(text: string): void;
  exit(code: number): void;
}

const processOutput: ErrorOutput = {
  write: (text) => {
    process.stderr.write(text);
  },
  exit: (code) => process.exit(code),
};

export function reportError(error: unknown, output: ErrorOutput = processOutput): void {
  if (error instanceof OpsError) {
    logger.debug('Command failed', error.toJSON());
    output.write(`${chalk.red(error.message)}\n`);
    output.exit(error.exitCode);
    return;
  }

  logger.error('Unexpected error', { error: errorMessage(error) });
  output.write(`${chalk.red(`Error: ${errorMessage(error)}`)}\n`);
  output.exit(1);
}

export function withErrorHandling<A extends unknown[]>(
  action: (...args: A) => Promise<void>,
  output?: ErrorOutput,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      reportError(error, output);
    }
  };
}
