/**
 * @opsdeck/runner - Bootstrap Upload Protocol & Pseudo-terminal Runner
 */

export { Runner, type RunnerOptions, type FailurePolicy } from './runner.js';
export { Archive, archivePath, type ArchiveEntry } from './archive.js';
export { buildBootstrapCommand, buildBootstrapScript, encodePayload, type BootstrapInput } from './bootstrap.js';
export { SentinelFramer, type FramerTransition } from './framer.js';
export { LineCollapser, collapseCarriageReturns } from './output.js';
export {
  createPlatform,
  ElasticBeanstalkPlatform,
  HerokuPlatform,
  LocalPlatform,
  type Platform,
  type PlatformOptions,
} from './platform.js';
export { spawnPty, type PtyExit, type PtyProcess, type PtySpawner, type PtySpawnOptions } from './pty.js';
export { processTerminal, type RunnerTerminal, type TerminalSize } from './terminal.js';
