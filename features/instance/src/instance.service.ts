/**
 * InstanceService - operations on the instances of one application
 *
 * - runAppCommand: one-off container on one instance (worker preferred)
 * - runInstanceSsh: ssh to a random instance of an env type
 * - tailAppLog: container logs of every instance, through the fan-out
 * - pgRestore: restore a database dump from inside the app image
 */

import {
  ExecuteError,
  OpsError,
  ResolutionError,
  SSH_DEFAULTS,
  shellEscape,
  type Inventory,
} from '@opsdeck/shared';
import { logger as defaultLogger, type LoggerLike } from '@opsdeck/logger';
import { buildInstanceSshCommand } from '@opsdeck/ssh';
import type { FanoutResult, FanoutService, IdentitySource } from '@opsdeck/fanout';
import { findBastion, findInstance, getInstances } from './inventory.js';
import { buildInstanceDockerRunCommand, buildLogTailScript, buildPgRestoreScript } from './scripts.js';
import { spawnInteractive, type CommandExit, type CommandSpawner } from './spawn.js';

export interface InstanceServiceOptions {
  inventory: Inventory;
  identity: IdentitySource;
  /** Required by tailAppLog only. */
  fanout?: Pick<FanoutService, 'run'>;
  spawn?: CommandSpawner;
  /** Returns an index in [0, length). */
  pick?: (length: number) => number;
  user?: string;
  bastionUser?: string;
  logger?: LoggerLike;
}

export class InstanceService {
  private readonly spawn: CommandSpawner;
  private readonly pick: (length: number) => number;
  private readonly logger: LoggerLike;

  constructor(private readonly options: InstanceServiceOptions) {
    this.spawn = options.spawn ?? spawnInteractive;
    this.pick = options.pick ?? ((length) => Math.floor(Math.random() * length));
    this.logger = options.logger ?? defaultLogger;
  }

  getInstances(appName: string): Promise<Record<string, string[]>> {
    return getInstances(this.options.inventory, appName);
  }

  /** `ssh` command line reaching the instance through the bastion. */
  async instanceSshCommand(instanceId: string, options: { tty?: boolean } = {}): Promise<string> {
    const { inventory, identity } = this.options;
    const instance = await findInstance(inventory, { ids: [instanceId] });
    const bastion = await findBastion(inventory);

    return buildInstanceSshCommand({
      host: instance.privateAddress,
      identityPath: await identity.identityPath(instance.keyName),
      bastionHost: bastion.publicAddress,
      user: this.options.user ?? SSH_DEFAULTS.instanceUser,
      bastionUser: this.options.bastionUser ?? SSH_DEFAULTS.bastionUser,
      tty: options.tty,
    });
  }

  /** Run `command` inside the app image on one instance, worker instances first. */
  async runAppCommand(appName: string, command: string): Promise<void> {
    const instances = await this.getInstances(appName);
    const workers = instances.worker ?? [];
    const instanceId = this.sample(workers.length > 0 ? workers : Object.values(instances).flat(), appName);

    this.logger.debug('Running app command', { appName, instanceId, command });

    const sshCommand = await this.instanceSshCommand(instanceId, { tty: true });
    const exit = await this.spawn(buildInstanceDockerRunCommand(sshCommand, command));
    this.assertSuccess(command, exit);
  }

  /** Interactive ssh (or one command) on a random instance of `envType`. */
  async runInstanceSsh(appName: string, options: { envType: string; command?: string }): Promise<CommandExit> {
    const instances = await this.getInstances(appName);
    const instanceId = this.sample(instances[options.envType] ?? [], `${appName}-${options.envType}`);

    const sshCommand = await this.instanceSshCommand(instanceId);
    const line = options.command ? `${sshCommand} ${shellEscape(options.command)}` : sshCommand;

    this.logger.debug('Opening instance ssh', { appName, instanceId });
    return this.spawn(line);
  }

  /** Follow the container logs of every instance of the application. */
  async tailAppLog(appName: string): Promise<FanoutResult[]> {
    const { fanout } = this.options;
    if (!fanout) {
      throw new OpsError('Log tailing needs a fan-out service', 'FANOUT_UNAVAILABLE');
    }
    const instances = await this.getInstances(appName);
    return fanout.run(Object.values(instances).flat(), buildLogTailScript());
  }

  pgRestore(appName: string, backupUrl: string): Promise<void> {
    return this.runAppCommand(appName, buildPgRestoreScript(backupUrl));
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private sample(ids: readonly string[], scope: string): string {
    if (ids.length === 0) {
      throw new ResolutionError(`No instances found for ${scope}`, { scope });
    }
    return ids[this.pick(ids.length)];
  }

  private assertSuccess(command: string, { code, signal }: CommandExit): void {
    if (code === 0) return;
    throw new ExecuteError({ command, status: code, signal });
  }
}
