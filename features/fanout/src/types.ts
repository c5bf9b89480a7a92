/**
 * @opsdeck/fanout - Types
 */

export type OutputChannel = 'stdout' | 'stderr';

export interface FanoutTarget {
  id: string;
  address: string;
  user: string;
  keyPath: string;
  /** Environment tag printed in front of every output line. */
  group: string;
}

export interface FanoutResult {
  id: string;
  group: string;
  /** null when the host never reported an exit code. */
  exitStatus: number | null;
  signal?: string;
  /** Set when the host failed before or instead of exiting. */
  reason?: string;
  /** Output of the host, kept only when it failed. */
  output?: string;
}

export interface OutputSink {
  line(channel: OutputChannel, target: FanoutTarget, line: string): void;
}

/** Source of private key paths by key-pair name. */
export interface IdentitySource {
  identityPath(keyName: string): Promise<string>;
}
