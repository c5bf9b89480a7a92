/**
 * @opsdeck/runner - Sentinel Framer
 *
 * Classifies the character stream coming back from a remote shell into
 * protocol phases. The bootstrap script prints two sentinel tokens: one
 * before it starts reading the payload and one before it execs the target
 * command. A token counts only when the character before it is not a plain
 * space, so the same text typed or echoed as a command argument is ignored.
 */

import { EXEC_SENTINEL, UPLOAD_SENTINEL } from '@opsdeck/shared';

export type FramerTransition = 'upload' | 'exec';

const WINDOW = Math.max(UPLOAD_SENTINEL.length, EXEC_SENTINEL.length) + 1;

function endsWithToken(buffer: string, token: string): boolean {
  if (!buffer.endsWith(token)) return false;
  const before = buffer.length - token.length - 1;
  return before < 0 || buffer[before] !== ' ';
}

export class SentinelFramer {
  /** null once the exec sentinel has been seen: tokens are single-use. */
  private buffer: string | null = '';
  private quietMode = false;

  /** True between the upload and exec sentinels; incoming bytes are not echoed. */
  get quiet(): boolean {
    return this.quietMode;
  }

  get finished(): boolean {
    return this.buffer === null;
  }

  feed(char: string): FramerTransition | undefined {
    if (this.buffer === null) return undefined;

    this.buffer = (this.buffer + char).slice(-WINDOW);

    if (endsWithToken(this.buffer, UPLOAD_SENTINEL)) {
      this.quietMode = true;
      this.buffer = '';
      return 'upload';
    }

    if (endsWithToken(this.buffer, EXEC_SENTINEL)) {
      this.quietMode = false;
      this.buffer = null;
      return 'exec';
    }

    return undefined;
  }
}
