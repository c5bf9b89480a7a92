/**
 * @opsdeck/shared - Instance & Inventory Types
 */

// ============================================================================
// Instance Records
// ============================================================================

export type EnvType = 'web' | 'worker' | (string & {});

export interface InstanceRecord {
  id: string;
  privateAddress: string;
  publicAddress?: string;
  keyName: string;
  groups: string[];
  appName?: string;
  envType?: EnvType;
  environmentName?: string;
}

export interface KeyPairRecord {
  name: string;
  fingerprint: string;
}

/**
 * Inventory filter. Every given field must match; `ids` and `groups`
 * match when the instance carries any of the listed values.
 */
export interface InstanceFilter {
  ids?: string[];
  groups?: string[];
  appName?: string;
  envType?: string;
}

// ============================================================================
// Collaborator Contracts
// ============================================================================

/** Discovery service returning exactly the instances matching a filter. */
export interface Inventory {
  findInstances(filter: InstanceFilter): Promise<InstanceRecord[]>;
}

/** Maps a key-pair name to the fingerprint registered with the provider. */
export interface KeyPairDirectory {
  findKeyPair(name: string): Promise<KeyPairRecord | undefined>;
}
