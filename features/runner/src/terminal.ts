/**
 * @opsdeck/runner - Local Terminal
 * The controlling terminal as seen by an interactive Runner session.
 */

import type { Readable } from 'node:stream';

export interface TerminalSize {
  cols: number;
  rows: number;
}

export interface RunnerTerminal {
  input: Readable;
  output: { write(chunk: string): unknown };
  size(): TerminalSize;
  setRawMode(enabled: boolean): void;
  /** Subscribe to window size changes; returns the unsubscribe function. */
  onResize(listener: () => void): () => void;
}

export const FALLBACK_SIZE: TerminalSize = { cols: 80, rows: 24 };

/** The process's own stdin/stdout; streams are touched only when used. */
export function processTerminal(): RunnerTerminal {
  return {
    get input() {
      return process.stdin;
    },
    output: {
      write: (chunk: string) => process.stdout.write(chunk),
    },
    size: () => ({
      cols: process.stdout.columns || FALLBACK_SIZE.cols,
      rows: process.stdout.rows || FALLBACK_SIZE.rows,
    }),
    setRawMode: (enabled) => {
      if (process.stdin.isTTY) process.stdin.setRawMode(enabled);
    },
    onResize: (listener) => {
      process.stdout.on('resize', listener);
      return () => {
        process.stdout.off('resize', listener);
      };
    },
  };
}
