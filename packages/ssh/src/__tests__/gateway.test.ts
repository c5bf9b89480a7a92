/**
 * Bastion Gateway Tests
 */

import type { EventEmitter } from 'node:events';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { LoggerLike } from '@opsdeck/logger';
import { Ssh2Gateway } from '../gateway.js';

jest.mock('ssh2', () => {
  const { EventEmitter } = jest.requireActual<typeof import('node:events')>('node:events');

  class Client extends EventEmitter {
    static instances: Client[] = [];
    static channels: Array<{ close: jest.Mock }> = [];
    config: { username?: string } = {};
    ended = false;

    constructor() {
      super();
      Client.instances.push(this);
    }

    connect(config: { username?: string }): this {
      this.config = config;
      setImmediate(() => {
        if (config.username === 'refused') this.emit('error', new Error('handshake failed'));
        else this.emit('ready');
      });
      return this;
    }

    forwardOut(
      _srcIP: string,
      _srcPort: number,
      _dstIP: string,
      _dstPort: number,
      callback: (err: Error | undefined, channel: { close: jest.Mock }) => void,
    ): void {
      const channel = { close: jest.fn() };
      Client.channels.push(channel);
      callback(undefined, channel);
    }

    end(): void {
      this.ended = true;
    }
  }

  return { Client };
});

interface FakeClient extends EventEmitter {
  config: { username?: string };
  ended: boolean;
}

const ssh2 = jest.requireMock<{
  Client: { instances: FakeClient[]; channels: Array<{ close: jest.Mock }> };
}>('ssh2');

function createLogger(): jest.Mocked<LoggerLike> {
  return { info: jest.fn(), error: jest.fn(), warn: jest.fn(), debug: jest.fn() };
}

describe('Ssh2Gateway', () => {
  let dir: string;
  let keyPath: string;
  let logger: jest.Mocked<LoggerLike>;
  let gateway: Ssh2Gateway;

  beforeEach(async () => {
    ssh2.Client.instances.length = 0;
    ssh2.Client.channels.length = 0;
    dir = await mkdtemp(join(tmpdir(), 'opsdeck-gateway-'));
    keyPath = join(dir, 'ops.pem');
    await writeFile(keyPath, 'test-key');
    logger = createLogger();
    gateway = new Ssh2Gateway({
      bastion: { host: 'bastion.example.com', port: 22, username: 'jump' },
      logger,
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should open a session over a channel forwarded through the bastion', async () => {
    await gateway.openSession({ address: '10.0.0.5', username: 'ops', privateKeyPath: keyPath });

    expect(ssh2.Client.instances.map(c => c.config.username)).toEqual(['jump', 'ops']);
    expect(ssh2.Client.channels).toHaveLength(1);
  });

  it('should survive target connection errors after the handshake', async () => {
    const session = await gateway.openSession({ address: '10.0.0.5', username: 'ops', privateKeyPath: keyPath });
    const target = ssh2.Client.instances[1];

    expect(() => {
      target.emit('error', new Error('connection reset'));
      target.emit('error', new Error('connection reset'));
    }).not.toThrow();
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith('SSH session error', { address: '10.0.0.5', reason: 'connection reset' });

    await session.shutdown();
    expect(target.ended).toBe(false);
  });

  it('should reconnect the bastion after it errors', async () => {
    await gateway.openSession({ address: '10.0.0.5', username: 'ops', privateKeyPath: keyPath });
    const bastion = ssh2.Client.instances[0];

    expect(() => bastion.emit('error', new Error('socket hang up'))).not.toThrow();
    expect(logger.warn).toHaveBeenCalledWith('Bastion connection error', {
      host: 'bastion.example.com',
      reason: 'socket hang up',
    });

    await gateway.openSession({ address: '10.0.0.6', username: 'ops', privateKeyPath: keyPath });

    expect(ssh2.Client.instances.map(c => c.config.username)).toEqual(['jump', 'ops', 'jump', 'ops']);
  });

  it('should close the forwarded channel when the target handshake fails', async () => {
    await expect(
      gateway.openSession({ address: '10.0.0.5', username: 'refused', privateKeyPath: keyPath }),
    ).rejects.toThrow('handshake failed');

    expect(ssh2.Client.channels[0].close).toHaveBeenCalledTimes(1);
  });

  it('should close the forwarded channel when the key file cannot be read', async () => {
    await expect(
      gateway.openSession({ address: '10.0.0.5', username: 'ops', privateKeyPath: join(dir, 'missing.pem') }),
    ).rejects.toThrow('ENOENT');

    expect(ssh2.Client.channels[0].close).toHaveBeenCalledTimes(1);
    expect(ssh2.Client.instances).toHaveLength(1);
  });
});
