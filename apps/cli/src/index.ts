/**
 * @opsdeck/cli - Commander Program Definition
 *
 * 2 command groups:
 * 1. run - upload files to a remote shell and run a command there
 * 2. eb  - Elastic Beanstalk instances (instances, exec, tail, ssh, run, pg:restore)
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createRunCommand } from './commands/run.cmd.js';
import { createEbCommand } from './commands/eb.cmd.js';

export const VERSION = '1.0.0';

// ============================================================================
// Program Factory
// ============================================================================

export function createCLI(): Command {
  const program = new Command();

  program
    .name('opsdeck')
    .description('Operations toolkit for Elastic Beanstalk and Heroku applications')
    .version(VERSION);

  // ========================================================================
  // 1. RUN - Bootstrap upload + remote command
  // ========================================================================
  program.addCommand(createRunCommand());

  // ========================================================================
  // 2. EB - Elastic Beanstalk instances
  // ========================================================================
  program.addCommand(createEbCommand());

  program.on('--help', () => {
    console.log('');
    console.log(chalk.yellow('Examples:'));
    console.log(chalk.gray('  opsdeck run --platform heroku --app shop --file ./seed.sh -- sh seed.sh'));
    console.log(chalk.gray('  opsdeck eb exec --app shop -- uptime'));
    console.log(chalk.gray('  opsdeck eb run --app shop -- ./bin/console'));
    console.log('');
  });

  program.configureOutput({
    outputError: (str, write) => {
      write(chalk.red(`\nError: ${str}`));
    },
  });

  return program;
}

export { createRunCommand, runAction } from './commands/run.cmd.js';
export { createEbCommand } from './commands/eb.cmd.js';
export { configPath, expandPath, loadConfig, loadInventoryFile } from './lib/config.js';
export { reportError, withErrorHandling, type ErrorOutput } from './lib/errors.js';
