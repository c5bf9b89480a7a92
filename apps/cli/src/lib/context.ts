/**
 * @opsdeck/cli - Service Wiring
 * Builds the inventory, identity resolver, gateway and services a command needs.
 */

import {
  StaticInventory,
  UserMessageError,
  shellJoin,
  type OpsConfig,
} from '@opsdeck/shared';
import { createContextualLogger, generateCorrelationId, type ContextualLogger } from '@opsdeck/logger';
import { IdentityResolver, Ssh2Gateway, type Gateway } from '@opsdeck/ssh';
import { FanoutService } from '@opsdeck/fanout';
import { InstanceService, findBastion } from '@opsdeck/instance';
import { expandPath, loadConfig, loadInventoryFile } from './config.js';

export interface CliContext {
  config: OpsConfig;
  logger: ContextualLogger;
  inventory: StaticInventory;
  identity: IdentityResolver;
}

export function createContext(command: string, appName?: string, config: OpsConfig = loadConfig()): CliContext {
  if (!config.inventoryPath) {
    throw new UserMessageError('No inventory configured. Set "inventoryPath" in the opsdeck config file.');
  }

  const file = loadInventoryFile(expandPath(config.inventoryPath));
  const inventory = new StaticInventory(file.instances, file.keyPairs);
  const logger = createContextualLogger({ correlationId: generateCorrelationId(), command, appName });

  return {
    config,
    logger,
    inventory,
    identity: new IdentityResolver({
      directory: inventory,
      keyDir: config.keyDir ? expandPath(config.keyDir) : undefined,
      logger,
    }),
  };
}

/** Gateway through the inventory's bastion, authenticated by the ssh agent. */
export async function createGateway(ctx: CliContext): Promise<Gateway> {
  const bastion = await findBastion(ctx.inventory);
  return new Ssh2Gateway({
    bastion: {
      host: bastion.publicAddress,
      port: ctx.config.bastion.port,
      username: ctx.config.bastion.user,
    },
    logger: ctx.logger,
  });
}

export function createFanout(ctx: CliContext, gateway: Gateway): FanoutService {
  return new FanoutService({
    inventory: ctx.inventory,
    identity: ctx.identity,
    gateway,
    user: ctx.config.instanceUser,
    logger: ctx.logger,
  });
}

export function createInstanceService(ctx: CliContext, fanout?: FanoutService): InstanceService {
  return new InstanceService({
    inventory: ctx.inventory,
    identity: ctx.identity,
    fanout,
    user: ctx.config.instanceUser,
    bastionUser: ctx.config.bastion.user,
    logger: ctx.logger,
  });
}

export function requireApp(app: string | undefined): string {
  if (!app) {
    throw new UserMessageError('Missing application name. Pass --app NAME or set OPSDECK_APP_NAME.');
  }
  return app;
}

/** Command words as one shell command line. */
export function joinCommand(words: readonly string[]): string | undefined {
  return words.length > 0 ? shellJoin(words) : undefined;
}
