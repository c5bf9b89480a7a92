/**
 * @opsdeck/runner - Runner
 *
 * Spawns the platform-wrapped bootstrap command in a pseudo-terminal,
 * delivers the archive when the remote shell asks for it, then either
 * passes the session through to the local terminal (interactive) or turns
 * it into log lines (logged).
 *
 * Flow: spawn -> [upload sentinel] -> payload write -> [exec sentinel] -> exit
 */

import {
  DEFAULT_RUNNER_COMMAND,
  ERASE_LINE,
  ExecuteError,
} from '@opsdeck/shared';
import { logger as defaultLogger, type LoggerLike } from '@opsdeck/logger';
import { Archive } from './archive.js';
import { buildBootstrapCommand, encodePayload } from './bootstrap.js';
import { SentinelFramer } from './framer.js';
import { LineCollapser } from './output.js';
import { LocalPlatform, type Platform } from './platform.js';
import { spawnPty, type PtyExit, type PtyProcess, type PtySpawner } from './pty.js';
import { FALLBACK_SIZE, processTerminal, type RunnerTerminal } from './terminal.js';

// ============================================================================
// Types
// ============================================================================

/**
 * What a failed command does: `raise` rejects with an ExecuteError,
 * `exit` ends the current process with the command's exit status.
 */
export type FailurePolicy = 'raise' | 'exit';

interface InputForwarder {
  release(): void;
  dispose(): void;
}

export interface RunnerOptions {
  failurePolicy: FailurePolicy;
  platform?: Platform;
  /** Directory to `cd` into on the remote side before exec. */
  workDir?: string;
  /** Directory the archive is extracted into (`tar -C`). */
  extractPath?: string;
  command?: string;
  /** Log sink. When set the session runs in logged mode. */
  log?: LoggerLike;
  spawn?: PtySpawner;
  terminal?: RunnerTerminal;
  exit?: (code: number) => void;
  logger?: LoggerLike;
}

// ============================================================================
// Runner
// ============================================================================

export class Runner {
  readonly archive = new Archive();
  readonly platform: Platform;
  readonly command: string;
  readonly failurePolicy: FailurePolicy;
  readonly workDir?: string;
  readonly extractPath?: string;

  private readonly log?: LoggerLike;
  private readonly spawn: PtySpawner;
  private readonly terminal: RunnerTerminal;
  private readonly exit: (code: number) => void;
  private readonly logger: LoggerLike;

  constructor(options: RunnerOptions) {
    this.failurePolicy = options.failurePolicy;
    this.platform = options.platform ?? new LocalPlatform();
    this.command = options.command ?? DEFAULT_RUNNER_COMMAND;
    this.workDir = options.workDir;
    this.extractPath = options.extractPath;
    this.log = options.log;
    this.spawn = options.spawn ?? spawnPty;
    this.terminal = options.terminal ?? processTerminal();
    this.exit = options.exit ?? ((code) => process.exit(code));
    this.logger = options.logger ?? defaultLogger;
  }

  get interactive(): boolean {
    return this.log === undefined;
  }

  addFile(path: string, mode?: number, content?: Buffer | string): Promise<void> {
    return this.archive.add(path, mode, content);
  }

  /** Full command line handed to the pseudo-terminal, plus the payload it expects. */
  async prepare(): Promise<{ spawnCommand: string; payload: string }> {
    const payload = encodePayload(await this.archive.finalize());
    const bootstrap = buildBootstrapCommand({
      payloadLength: Buffer.byteLength(payload),
      command: this.command,
      extractPath: this.extractPath,
      workDir: this.workDir,
    });
    return { spawnCommand: this.platform.wrap(bootstrap), payload };
  }

  async execute(): Promise<void> {
    const { spawnCommand, payload } = await this.prepare();
    const size = this.interactive ? this.terminal.size() : FALLBACK_SIZE;

    this.logger.debug('Spawning runner session', {
      platform: this.platform.name,
      command: this.command,
      payloadBytes: payload.length,
      mode: this.interactive ? 'interactive' : 'logged',
    });

    const child = await this.spawn('/bin/sh', ['-c', spawnCommand], {
      ...size,
      cwd: process.cwd(),
      env: process.env,
    });

    const lines = this.log ? new LineCollapser(line => this.log?.debug(line)) : undefined;
    const display = (text: string) => {
      if (text === '') return;
      if (lines) lines.push(text);
      else this.terminal.output.write(text);
    };
    const eraseLine = (text: string) => {
      if (lines) {
        lines.push(text);
        lines.discardPartial();
      } else {
        display(text + ERASE_LINE);
      }
    };

    const framer = new SentinelFramer();
    const cleanups: Array<() => void> = [];
    let status: PtyExit;

    try {
      let input: InputForwarder | undefined;
      if (this.interactive) {
        cleanups.push(this.forwardResize(child));
        input = this.forwardInput(child, framer);
        cleanups.push(input.dispose);
        this.terminal.setRawMode(true);
        cleanups.push(() => this.terminal.setRawMode(false));
      }

      status = await this.pump(child, framer, payload, display, eraseLine, () => input?.release());
    } finally {
      lines?.flush();
      for (const cleanup of cleanups.reverse()) cleanup();
    }

    this.handleExit(status);
  }

  // ==========================================================================
  // Session Plumbing
  // ==========================================================================

  private pump(
    child: PtyProcess,
    framer: SentinelFramer,
    payload: string,
    display: (text: string) => void,
    eraseLine: (text: string) => void,
    onExecStart: () => void,
  ): Promise<PtyExit> {
    return new Promise((resolve, reject) => {
      const data = child.onData((chunk) => {
        let visible = '';
        for (const char of chunk) {
          if (!framer.quiet) visible += char;

          const transition = framer.feed(char);
          if (transition === 'upload') {
            eraseLine(visible);
            visible = '';
            setImmediate(() => {
              try {
                child.write(payload);
              } catch (error) {
                data.dispose();
                exit.dispose();
                child.kill();
                reject(error);
              }
            });
          } else if (transition === 'exec') {
            onExecStart();
          }
        }
        display(visible);
      });

      const exit = child.onExit((status) => {
        data.dispose();
        exit.dispose();
        resolve(status);
      });
    });
  }

  private forwardResize(child: PtyProcess): () => void {
    return this.terminal.onResize(() => {
      const { cols, rows } = this.terminal.size();
      child.resize(cols, rows);
    });
  }

  /**
   * Copy local keystrokes to the remote side. While the payload is being
   * uploaded the input channel belongs to the payload; keystrokes typed
   * meanwhile are held and sent once the command starts.
   */
  private forwardInput(child: PtyProcess, framer: SentinelFramer): InputForwarder {
    const { input } = this.terminal;
    let held = '';

    const release = () => {
      if (held === '') return;
      child.write(held);
      held = '';
    };

    const onData = (chunk: Buffer | string) => {
      held += chunk.toString();
      if (!framer.quiet) release();
    };

    input.on('data', onData);
    input.resume();

    return {
      release,
      dispose: () => {
        input.off('data', onData);
        input.pause();
      },
    };
  }

  private handleExit({ exitCode, signal }: PtyExit): void {
    if (exitCode === 0 && !signal) return;

    const status = signal ? null : exitCode;
    this.logger.debug('Runner session failed', { command: this.command, status, signal });

    if (this.failurePolicy === 'raise') {
      throw new ExecuteError({ command: this.command, status, signal });
    }
    this.exit(status ?? 130);
  }
}
