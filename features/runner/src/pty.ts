/**
 * @opsdeck/runner - Pseudo-terminal Spawning
 * node-pty is loaded on first use so the rest of the runner works without it.
 */

export interface Disposable {
  dispose(): void;
}

export interface PtyExit {
  exitCode: number;
  signal?: number;
}

export interface PtyProcess {
  onData(listener: (data: string) => void): Disposable;
  onExit(listener: (exit: PtyExit) => void): Disposable;
  write(data: string): void;
  resize(cols: number, rows: number): void;
  kill(signal?: string): void;
}

export interface PtySpawnOptions {
  cols: number;
  rows: number;
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export type PtySpawner = (file: string, args: string[], options: PtySpawnOptions) => Promise<PtyProcess>;

export const spawnPty: PtySpawner = async (file, args, options) => {
  let pty: typeof import('node-pty');
  try {
    pty = await import('node-pty');
  } catch (error) {
    throw new Error(`node-pty is required to run commands in a pseudo-terminal: ${error instanceof Error ? error.message : String(error)}`);
  }

  return pty.spawn(file, args, {
    name: 'xterm-256color',
    cols: options.cols,
    rows: options.rows,
    cwd: options.cwd,
    env: options.env,
  });
};
