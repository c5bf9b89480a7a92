/**
 * @opsdeck/ssh - Bastion Gateway
 *
 * One ssh2 connection to the bastion host, shared by every session opened
 * through it. Each target session rides its own forwarded channel, so many
 * sessions can be open and executing at the same time.
 */

import { Client, type ClientChannel, type ConnectConfig } from 'ssh2';
import { readFile } from 'node:fs/promises';
import type { Readable } from 'node:stream';
import { SSH_DEFAULTS, type RemoteTarget, type SSHConfig } from '@opsdeck/shared';
import type { LoggerLike } from '@opsdeck/logger';

// ============================================================================
// Contracts
// ============================================================================

export interface ExitStatus {
  /** Exit code, or null when the remote process was killed by a signal. */
  code: number | null;
  signal?: string;
}

export interface ExecHandle {
  stdout: Readable;
  stderr: Readable;
  /** Settles once the remote command has exited and its channel closed. */
  exit: Promise<ExitStatus>;
}

export interface RemoteSession {
  exec(command: string): Promise<ExecHandle>;
  shutdown(): Promise<void>;
}

export interface Gateway {
  openSession(target: RemoteTarget): Promise<RemoteSession>;
  close(): Promise<void>;
}

// ============================================================================
// ssh2 Session
// ============================================================================

class Ssh2Session implements RemoteSession {
  private closed = false;

  constructor(private readonly client: Client) {
    client.once('close', () => {
      this.closed = true;
    });
  }

  exec(command: string): Promise<ExecHandle> {
    return new Promise((resolve, reject) => {
      this.client.exec(command, (err, channel) => {
        if (err) {
          reject(err);
          return;
        }
        resolve({
          stdout: channel,
          stderr: channel.stderr,
          exit: waitForExit(channel),
        });
      });
    });
  }

  /** The connection errored after the handshake; ssh2 closes it itself. */
  markFailed(): void {
    this.closed = true;
  }

  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.client.end();
  }
}

function waitForExit(channel: ClientChannel): Promise<ExitStatus> {
  return new Promise((resolve) => {
    let status: ExitStatus = { code: null };

    channel.once('exit', (code: number | null, signal?: string) => {
      status = signal ? { code: null, signal } : { code };
    });

    channel.once('close', () => resolve(status));
  });
}

// ============================================================================
// ssh2 Gateway
// ============================================================================

export interface Ssh2GatewayOptions {
  bastion: SSHConfig;
  readyTimeout?: number;
  logger?: LoggerLike;
}

export class Ssh2Gateway implements Gateway {
  private bastion: Promise<Client> | null = null;
  private readonly readyTimeout: number;

  constructor(private readonly options: Ssh2GatewayOptions) {
    this.readyTimeout = options.readyTimeout ?? SSH_DEFAULTS.readyTimeout;
  }

  async openSession(target: RemoteTarget): Promise<RemoteSession> {
    const bastion = await this.connectBastion();
    const port = target.port ?? SSH_DEFAULTS.port;

    const sock = await new Promise<ClientChannel>((resolve, reject) => {
      bastion.forwardOut('127.0.0.1', 0, target.address, port, (err, channel) => {
        if (err) reject(err);
        else resolve(channel);
      });
    });

    let session: Ssh2Session | undefined;
    let client: Client;
    try {
      const privateKey = await readFile(target.privateKeyPath);
      client = await connect({
        sock,
        username: target.username,
        privateKey,
        readyTimeout: this.readyTimeout,
      }, (err) => {
        this.options.logger?.warn('SSH session error', { address: target.address, reason: err.message });
        session?.markFailed();
      });
    } catch (error) {
      sock.close();
      throw error;
    }

    this.options.logger?.debug('SSH session opened', { address: target.address, username: target.username });
    session = new Ssh2Session(client);
    return session;
  }

  async close(): Promise<void> {
    if (!this.bastion) return;
    const pending = this.bastion;
    this.bastion = null;
    const client = await pending;
    client.end();
  }

  private connectBastion(): Promise<Client> {
    if (!this.bastion) {
      const { host, port, username, privateKeyPath } = this.options.bastion;
      const pending: Promise<Client> = (async () => {
        const config: ConnectConfig = {
          host,
          port,
          username,
          readyTimeout: this.readyTimeout,
          agent: process.env.SSH_AUTH_SOCK,
        };
        if (privateKeyPath) {
          config.privateKey = await readFile(privateKeyPath);
        }
        const client = await connect(config, (err) => {
          this.options.logger?.warn('Bastion connection error', { host, reason: err.message });
          if (this.bastion === pending) this.bastion = null;
        });
        this.options.logger?.debug('Bastion connected', { host, username });
        return client;
      })();
      this.bastion = pending;
      // A failed connection must not be reused by later sessions
      pending.catch(() => {
        if (this.bastion === pending) this.bastion = null;
      });
      return pending;
    }
    return this.bastion;
  }
}

/**
 * Connect and wait for the handshake. Errors before `ready` reject; later
 * ones go to `onError`, which stays attached for the life of the client.
 */
function connect(config: ConnectConfig, onError: (err: Error) => void): Promise<Client> {
  return new Promise((resolve, reject) => {
    const client = new Client();
    let ready = false;
    client
      .on('error', (err: Error) => {
        if (ready) onError(err);
        else reject(err);
      })
      .once('ready', () => {
        ready = true;
        resolve(client);
      })
      .connect(config);
  });
}
