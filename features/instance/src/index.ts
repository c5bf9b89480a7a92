/**
 * @opsdeck/instance - Instance-level Operations
 */

export { InstanceService, type InstanceServiceOptions } from './instance.service.js';
export { UNTYPED_ENV, findBastion, findInstance, getInstances } from './inventory.js';
export {
  buildDockerRunScript,
  buildInstanceDockerRunCommand,
  buildLogTailScript,
  buildPgRestoreScript,
} from './scripts.js';
export { spawnInteractive, type CommandExit, type CommandSpawner } from './spawn.js';
