/**
 * @opsdeck/shared - Static Inventory
 * Inventory and key-pair directory over a fixed list of records.
 */

import type {
  InstanceFilter,
  InstanceRecord,
  Inventory,
  KeyPairDirectory,
  KeyPairRecord,
} from '../types/index.js';

export function matchesFilter(instance: InstanceRecord, filter: InstanceFilter): boolean {
  if (filter.ids && !filter.ids.includes(instance.id)) return false;
  if (filter.groups && !filter.groups.some(group => instance.groups.includes(group))) return false;
  if (filter.appName !== undefined && instance.appName !== filter.appName) return false;
  if (filter.envType !== undefined && instance.envType !== filter.envType) return false;
  return true;
}

export class StaticInventory implements Inventory, KeyPairDirectory {
  constructor(
    private readonly instances: readonly InstanceRecord[],
    private readonly keyPairs: readonly KeyPairRecord[] = [],
  ) {}

  async findInstances(filter: InstanceFilter): Promise<InstanceRecord[]> {
    return this.instances.filter(instance => matchesFilter(instance, filter));
  }

  async findKeyPair(name: string): Promise<KeyPairRecord | undefined> {
    return this.keyPairs.find(keyPair => keyPair.name === name);
  }
}
