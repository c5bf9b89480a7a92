/**
 * @opsdeck/instance - Local Command Execution
 */

import { spawn } from 'node:child_process';

export interface CommandExit {
  code: number | null;
  signal?: string;
}

/** Runs a shell command line locally with the operator's terminal attached. */
export type CommandSpawner = (command: string) => Promise<CommandExit>;

export const spawnInteractive: CommandSpawner = (command) => {
  return new Promise((resolve, reject) => {
    const child = spawn('/bin/sh', ['-c', command], { stdio: 'inherit' });
    child.once('error', reject);
    child.once('exit', (code, signal) => {
      resolve({ code, signal: signal ?? undefined });
    });
  });
};
