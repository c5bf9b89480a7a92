/**
 * @opsdeck/instance - Inventory Lookups
 */

import {
  BASTION_GROUP,
  ResolutionError,
  type InstanceFilter,
  type InstanceRecord,
  type Inventory,
} from '@opsdeck/shared';

/** Instances without an env type are listed under this key. */
export const UNTYPED_ENV = 'default';

export async function findInstance(inventory: Inventory, filter: InstanceFilter): Promise<InstanceRecord> {
  const instances = await inventory.findInstances(filter);
  if (instances.length !== 1) {
    throw new ResolutionError(
      `Expect to find 1 instance matching ${JSON.stringify(filter)} but found ${instances.length}`,
      { filter, found: instances.map(instance => instance.id) },
    );
  }
  return instances[0];
}

/** The bastion host, which must be reachable on a public address. */
export async function findBastion(inventory: Inventory): Promise<InstanceRecord & { publicAddress: string }> {
  const bastion = await findInstance(inventory, { groups: [BASTION_GROUP] });
  const { publicAddress } = bastion;
  if (!publicAddress) {
    throw new ResolutionError(`Bastion instance ${bastion.id} has no public address`, { id: bastion.id });
  }
  return { ...bastion, publicAddress };
}

/** Instance ids of an application, keyed by env type (`web`, `worker`, ...). */
export async function getInstances(inventory: Inventory, appName: string): Promise<Record<string, string[]>> {
  const instances = await inventory.findInstances({ appName });
  const grouped: Record<string, string[]> = {};

  for (const instance of instances) {
    const envType = instance.envType ?? UNTYPED_ENV;
    (grouped[envType] ??= []).push(instance.id);
  }
  return grouped;
}
