/**
 * @opsdeck/shared - SSH Types
 */

export interface SSHConfig {
  host: string;
  port: number;
  username: string;
  privateKeyPath?: string;
}

/** Connection details for one host reached through the bastion. */
export interface RemoteTarget {
  address: string;
  port?: number;
  username: string;
  privateKeyPath: string;
}
