/**
 * @opsdeck/runner - Logged Output
 *
 * Turns a raw terminal stream into log lines. A carriage return overwrites
 * the start of the current line the way a terminal would, so progress bars
 * collapse into their final state. Cursor movement beyond that is not
 * emulated.
 */

export function collapseCarriageReturns(line: string): string {
  return line.split('\r').reduce((visible, part) => part + visible.slice(part.length), '');
}

export class LineCollapser {
  private pending = '';

  constructor(private readonly emit: (line: string) => void) {}

  push(text: string): void {
    this.pending += text;
    this.drain();
  }

  /** Drop the unterminated remainder, as a terminal line erase would. */
  discardPartial(): void {
    this.pending = '';
  }

  /** Emit the unterminated remainder, if any. */
  flush(): void {
    if (this.pending === '') return;
    this.pending += '\n';
    this.drain();
  }

  private drain(): void {
    let match = /\r?\n/.exec(this.pending);
    while (match) {
      const line = this.pending.slice(0, match.index);
      this.pending = this.pending.slice(match.index + match[0].length);
      this.emit(collapseCarriageReturns(line));
      match = /\r?\n/.exec(this.pending);
    }
  }
}
