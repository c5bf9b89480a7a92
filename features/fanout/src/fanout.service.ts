/**
 * FanoutService - one command on many hosts through the bastion
 *
 * Flow:
 * 1. resolveTargets (all ids or nothing, before any connection)
 * 2. per host, concurrently: openSession -> register -> exec -> stream lines -> exit status
 * 3. wait for every host, shut every registered session down
 * 4. raise one FanoutError naming each failed host
 *
 * A failing host never cancels its siblings.
 */

import { FanoutError, errorMessage, type HostFailure, type Inventory } from '@opsdeck/shared';
import { logger as defaultLogger, type LoggerLike } from '@opsdeck/logger';
import type { Gateway } from '@opsdeck/ssh';
import type { Readable } from 'node:stream';
import { LineBuffer } from './line-buffer.js';
import { SessionRegistry } from './session-registry.js';
import { streamSink } from './sinks.js';
import { resolveTargets } from './targets.js';
import type {
  FanoutResult,
  FanoutTarget,
  IdentitySource,
  OutputChannel,
  OutputSink,
} from './types.js';

export interface FanoutServiceOptions {
  inventory: Inventory;
  identity: IdentitySource;
  gateway: Gateway;
  sink?: OutputSink;
  /** Login user on the target hosts. */
  user?: string;
  logger?: LoggerLike;
}

export class FanoutService {
  private readonly sink: OutputSink;
  private readonly logger: LoggerLike;

  constructor(private readonly options: FanoutServiceOptions) {
    this.sink = options.sink ?? streamSink();
    this.logger = options.logger ?? defaultLogger;
  }

  /** Run `command` on every instance in `ids`. */
  async run(ids: readonly string[], command: string): Promise<FanoutResult[]> {
    const targets = await resolveTargets(ids, {
      inventory: this.options.inventory,
      identity: this.options.identity,
      user: this.options.user,
    });
    return this.runOnTargets(targets, command);
  }

  async runOnTargets(targets: readonly FanoutTarget[], command: string): Promise<FanoutResult[]> {
    const registry = new SessionRegistry();
    const startTime = Date.now();

    this.logger.debug('Fan-out started', { command, hosts: targets.map(t => t.id) });

    try {
      const settled = await Promise.allSettled(targets.map(target => this.runHost(target, command, registry)));

      const results = settled.map((outcome, i): FanoutResult => {
        if (outcome.status === 'fulfilled') return outcome.value;
        return {
          id: targets[i].id,
          group: targets[i].group,
          exitStatus: null,
          reason: errorMessage(outcome.reason),
        };
      });

      const failures = results.filter(result => result.exitStatus !== 0);

      this.logger.debug('Fan-out finished', {
        command,
        duration: Date.now() - startTime,
        failed: failures.map(f => f.id),
      });

      if (failures.length > 0) {
        throw new FanoutError(command, failures.map(toHostFailure));
      }

      return results;
    } finally {
      await registry.shutdownAll(this.logger);
    }
  }

  // ==========================================================================
  // Per-host Execution
  // ==========================================================================

  private async runHost(target: FanoutTarget, command: string, registry: SessionRegistry): Promise<FanoutResult> {
    const session = await this.options.gateway.openSession({
      address: target.address,
      username: target.user,
      privateKeyPath: target.keyPath,
    });
    registry.add(session);

    const handle = await session.exec(command);
    const output: string[] = [];

    await Promise.all([
      this.pipe(handle.stdout, 'stdout', target, output),
      this.pipe(handle.stderr, 'stderr', target, output),
    ]);
    const status = await handle.exit;

    return {
      id: target.id,
      group: target.group,
      exitStatus: status.code,
      signal: status.signal,
      output: status.code === 0 ? undefined : output.join(''),
    };
  }

  private pipe(stream: Readable, channel: OutputChannel, target: FanoutTarget, output: string[]): Promise<void> {
    const buffer = new LineBuffer();
    const emit = (line: string) => {
      output.push(line);
      this.sink.line(channel, target, line);
    };

    return new Promise((resolve, reject) => {
      let done = false;
      const finish = () => {
        if (done) return;
        done = true;
        const rest = buffer.flush();
        if (rest !== undefined) emit(rest);
        resolve();
      };

      stream.on('data', (chunk: Buffer | string) => {
        for (const line of buffer.push(chunk)) emit(line);
      });
      stream.once('end', finish);
      stream.once('close', finish);
      stream.once('error', reject);
    });
  }
}

function toHostFailure(result: FanoutResult): HostFailure {
  const { id, group, output } = result;
  if (result.exitStatus !== null) {
    return { id, group, exitStatus: result.exitStatus, output };
  }
  return {
    id,
    group,
    reason: result.reason ?? (result.signal ? `killed by signal ${result.signal}` : 'no exit status'),
    output,
  };
}
