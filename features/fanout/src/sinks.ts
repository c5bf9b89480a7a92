/**
 * @opsdeck/fanout - Output Sinks
 */

import type { LoggerLike } from '@opsdeck/logger';
import type { FanoutTarget, OutputChannel, OutputSink } from './types.js';

export function formatLine(target: FanoutTarget, line: string): string {
  return `${target.group} ${target.id} ${line.replace(/\r?\n$/, '')}`;
}

interface Writable {
  write(chunk: string): unknown;
}

/** Prefixed lines on the process's stdout/stderr; blank lines are skipped. */
export function streamSink(
  streams: Record<OutputChannel, Writable> = { stdout: process.stdout, stderr: process.stderr },
): OutputSink {
  return {
    line(channel, target, line) {
      if (line.replace(/\r?\n$/, '') === '') return;
      streams[channel].write(`${formatLine(target, line)}\n`);
    },
  };
}

/** Prefixed lines as debug log entries. */
export function loggerSink(log: LoggerLike): OutputSink {
  return {
    line(channel, target, line) {
      log.debug(formatLine(target, line), { channel });
    },
  };
}
