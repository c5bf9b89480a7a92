/**
 * @opsdeck/fanout - Target Resolution
 * Inventory ids to connection details, all or nothing.
 */

import { ResolutionError, SSH_DEFAULTS, type InstanceRecord, type Inventory } from '@opsdeck/shared';
import type { FanoutTarget, IdentitySource } from './types.js';

export interface ResolveTargetsOptions {
  inventory: Inventory;
  identity: IdentitySource;
  user?: string;
}

/** Environment name, else `<app>-<envType>`, else the instance id. */
export function targetGroup(instance: InstanceRecord): string {
  if (instance.environmentName) return instance.environmentName;
  const tag = [instance.appName, instance.envType].filter(Boolean).join('-');
  return tag || instance.id;
}

/**
 * Resolve every id or fail before any connection is attempted.
 * Duplicate ids resolve to one target.
 */
export async function resolveTargets(ids: readonly string[], options: ResolveTargetsOptions): Promise<FanoutTarget[]> {
  const { inventory, identity, user = SSH_DEFAULTS.instanceUser } = options;
  const unique = [...new Set(ids)];

  if (unique.length === 0) {
    throw new ResolutionError('No instances given');
  }

  const instances = await inventory.findInstances({ ids: unique });
  const found = new Set(instances.map(instance => instance.id));
  const missing = unique.filter(id => !found.has(id));

  if (missing.length > 0) {
    throw new ResolutionError(
      `Could not find instance: ${missing.map(id => JSON.stringify(id)).join(', ')}`,
      { missing },
    );
  }

  if (instances.length !== unique.length) {
    throw new ResolutionError(
      `Expected ${unique.length} instance(s) but found ${instances.length}`,
      { ids: unique },
    );
  }

  return Promise.all(instances.map(async (instance) => ({
    id: instance.id,
    address: instance.privateAddress,
    user,
    keyPath: await identity.identityPath(instance.keyName),
    group: targetGroup(instance),
  })));
}
