/**
 * @opsdeck/cli - Elastic Beanstalk Commands
 *
 * instances, exec, tail, ssh, run, pg:restore
 * Instances are reached through the inventory's bastion host.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { Gateway } from '@opsdeck/ssh';
import {
  createContext,
  createFanout,
  createGateway,
  createInstanceService,
  joinCommand,
  requireApp,
  type CliContext,
} from '../lib/context.js';
import { withErrorHandling } from '../lib/errors.js';

interface AppOptions {
  app?: string;
}

// ============================================================================
// Command Factory
// ============================================================================

export function createEbCommand(): Command {
  const eb = new Command('eb').description('Elastic Beanstalk application instances');
  const appOption = ['--app <name>', 'application to run command against', process.env.OPSDECK_APP_NAME] as const;

  eb.command('instances')
    .description('list application instances by environment type')
    .option(...appOption)
    .option('--json', 'format output as JSON')
    .action(withErrorHandling(instancesAction));

  eb.command('exec')
    .description('run a command on every application instance')
    .argument('<command...>', 'command to run')
    .option(...appOption)
    .option('--env-type <type>', 'only instances of this environment type')
    .action(withErrorHandling(execAction));

  eb.command('tail')
    .description('tail the application log of every instance')
    .option(...appOption)
    .action(withErrorHandling(tailAction));

  eb.command('ssh')
    .description('SSH to an application instance (for debugging)')
    .argument('[command...]', 'command to run')
    .option(...appOption)
    .option('--env-type <type>', 'environment to select the instance from', 'web')
    .action(withErrorHandling(sshAction));

  eb.command('run')
    .description('run an application command (e.g. console) in the app image')
    .argument('<command...>', 'application command to run')
    .option(...appOption)
    .action(withErrorHandling(runAction));

  eb.command('pg:restore')
    .description('restore a PostgreSQL dump into the application database')
    .argument('<backup-url>', 'URL of the pg_dump custom-format file')
    .option(...appOption)
    .action(withErrorHandling(pgRestoreAction));

  return eb;
}

// ============================================================================
// Actions
// ============================================================================

async function instancesAction(options: AppOptions & { json?: boolean }): Promise<void> {
  const app = requireApp(options.app);
  const ctx = createContext('eb instances', app);
  const service = createInstanceService(ctx);

  const instances = await service.getInstances(app);

  if (options.json) {
    console.log(JSON.stringify(instances));
    return;
  }

  for (const [envType, ids] of Object.entries(instances)) {
    console.log(chalk.cyan(`${app}-${envType}`) + chalk.gray(` (${ids.length})`));
    for (const id of ids) {
      console.log(`  ${id}`);
    }
  }
}

async function execAction(words: string[], options: AppOptions & { envType?: string }): Promise<void> {
  const app = requireApp(options.app);
  const command = joinCommand(words) ?? '';
  const ctx = createContext('eb exec', app);

  const spinner = ora('Resolving instances...').start();
  const instances = await ctx.inventory.findInstances({ appName: app, envType: options.envType });
  spinner.succeed(`Running on ${instances.length} instance(s)`);

  await withGateway(ctx, async (gateway) => {
    await createFanout(ctx, gateway).run(instances.map(instance => instance.id), command);
  });
}

async function tailAction(options: AppOptions): Promise<void> {
  const app = requireApp(options.app);
  const ctx = createContext('eb tail', app);

  await withGateway(ctx, async (gateway) => {
    await createInstanceService(ctx, createFanout(ctx, gateway)).tailAppLog(app);
  });
}

async function sshAction(words: string[], options: AppOptions & { envType: string }): Promise<void> {
  const app = requireApp(options.app);
  const ctx = createContext('eb ssh', app);
  const service = createInstanceService(ctx);

  const exit = await service.runInstanceSsh(app, { envType: options.envType, command: joinCommand(words) });
  if (exit.code !== 0) {
    process.exitCode = exit.code ?? 130;
  }
}

async function runAction(words: string[], options: AppOptions): Promise<void> {
  const app = requireApp(options.app);
  const ctx = createContext('eb run', app);
  const service = createInstanceService(ctx);

  await service.runAppCommand(app, joinCommand(words) ?? '');
}

async function pgRestoreAction(backupUrl: string, options: AppOptions): Promise<void> {
  const app = requireApp(options.app);
  const ctx = createContext('eb pg:restore', app);
  const service = createInstanceService(ctx);

  console.log(chalk.yellow(`Restoring ${app} database from backup...`));
  await service.pgRestore(app, backupUrl);
}

// ============================================================================
// Gateway Lifecycle
// ============================================================================

async function withGateway(ctx: CliContext, fn: (gateway: Gateway) => Promise<void>): Promise<void> {
  const gateway = await createGateway(ctx);
  try {
    await fn(gateway);
  } finally {
    await gateway.close();
  }
}

