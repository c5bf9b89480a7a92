/**
 * @opsdeck/fanout - Session Registry
 * Every session opened during one fan-out, so all of them can be shut down.
 */

import { errorMessage } from '@opsdeck/shared';
import type { LoggerLike } from '@opsdeck/logger';
import type { RemoteSession } from '@opsdeck/ssh';

export class SessionRegistry {
  private readonly sessions: RemoteSession[] = [];

  add(session: RemoteSession): void {
    this.sessions.push(session);
  }

  get size(): number {
    return this.sessions.length;
  }

  /**
   * Shut every registered session down. Failures are logged and do not stop
   * the remaining shutdowns.
   */
  async shutdownAll(logger?: LoggerLike): Promise<void> {
    const sessions = this.sessions.splice(0);
    const results = await Promise.allSettled(sessions.map(session => session.shutdown()));

    for (const result of results) {
      if (result.status === 'rejected') {
        logger?.warn('SSH session shutdown failed', { reason: errorMessage(result.reason) });
      }
    }
  }
}
