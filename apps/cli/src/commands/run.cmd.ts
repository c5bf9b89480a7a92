/**
 * @opsdeck/cli - Run Command
 *
 * Uploads local files into a fresh remote shell and runs a command there.
 *   opsdeck run --platform heroku --app shop --file ./tasks.sh -- bash tasks.sh
 */

import { Command } from 'commander';
import { UserMessageError, platformNameSchema } from '@opsdeck/shared';
import { createContextualLogger, generateCorrelationId, type LoggerLike } from '@opsdeck/logger';
import { Runner, createPlatform } from '@opsdeck/runner';
import { loadConfig } from '../lib/config.js';
import { joinCommand } from '../lib/context.js';
import { withErrorHandling } from '../lib/errors.js';

export interface RunOptions {
  platform: string;
  app?: string;
  file: string[];
  extractPath?: string;
  workDir?: string;
  log?: boolean;
}

// ============================================================================
// Command Factory
// ============================================================================

export function createRunCommand(): Command {
  return new Command('run')
    .description('Upload files to a remote shell and run a command in it')
    .argument('[command...]', 'command to run (default: bash -i)')
    .option('--platform <name>', 'where the shell runs (local|heroku|eb)', 'local')
    .option('--app <name>', 'application name (heroku, eb)', process.env.OPSDECK_APP_NAME)
    .option('--file <path...>', 'local file to upload', [])
    .option('--extract-path <dir>', 'remote directory the files are extracted into')
    .option('--work-dir <dir>', 'remote directory the command runs in')
    .option('--log', 'log output line by line instead of attaching the terminal')
    .action(withErrorHandling(runAction));
}

// ============================================================================
// Action
// ============================================================================

export async function runAction(words: string[], options: RunOptions): Promise<void> {
  const platformName = platformNameSchema.safeParse(options.platform);
  if (!platformName.success) {
    throw new UserMessageError(`Unknown platform "${options.platform}". Expected local, heroku or eb.`);
  }

  const config = loadConfig();
  const logger = createContextualLogger({
    correlationId: generateCorrelationId(),
    command: 'run',
    appName: options.app,
    platform: platformName.data,
  });

  const runner = new Runner({
    failurePolicy: 'exit',
    platform: createPlatform(platformName.data, {
      appName: options.app,
      herokuBinary: config.herokuBinary,
      ebRunBinary: config.ebRunBinary,
    }),
    command: joinCommand(words),
    extractPath: options.extractPath,
    workDir: options.workDir,
    log: options.log ? sessionLog(logger) : undefined,
    logger,
  });

  for (const file of options.file) {
    await runner.addFile(file);
  }

  await runner.execute();
}

/** Session output lines at info level, visible with the default LOG_LEVEL. */
export function sessionLog(logger: LoggerLike): LoggerLike {
  return {
    debug: (message, meta) => logger.info(message, meta),
    info: (message, meta) => logger.info(message, meta),
    warn: (message, meta) => logger.warn(message, meta),
    error: (message, meta) => logger.error(message, meta),
  };
}
