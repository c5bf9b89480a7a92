/**
 * @opsdeck/fanout - Concurrent Multi-host Command Fan-out
 */

export { FanoutService, type FanoutServiceOptions } from './fanout.service.js';
export { LineBuffer } from './line-buffer.js';
export { SessionRegistry } from './session-registry.js';
export { formatLine, loggerSink, streamSink } from './sinks.js';
export { resolveTargets, targetGroup, type ResolveTargetsOptions } from './targets.js';
export type {
  FanoutResult,
  FanoutTarget,
  IdentitySource,
  OutputChannel,
  OutputSink,
} from './types.js';
