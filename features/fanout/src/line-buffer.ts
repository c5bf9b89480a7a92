/**
 * @opsdeck/fanout - Line Buffer
 * Splits one output channel into lines, whatever the chunk boundaries.
 */

import { StringDecoder } from 'node:string_decoder';

export class LineBuffer {
  private buffer = '';
  private readonly decoder = new StringDecoder('utf8');

  /** Append a chunk and return every line it completed, terminators included. */
  push(chunk: Buffer | string): string[] {
    this.buffer += typeof chunk === 'string' ? chunk : this.decoder.write(chunk);

    const lines: string[] = [];
    let pos = this.buffer.indexOf('\n');
    while (pos !== -1) {
      lines.push(this.buffer.slice(0, pos + 1));
      this.buffer = this.buffer.slice(pos + 1);
      pos = this.buffer.indexOf('\n');
    }
    return lines;
  }

  /** The unterminated remainder at channel close, or undefined when there is none. */
  flush(): string | undefined {
    const rest = this.buffer + this.decoder.end();
    this.buffer = '';
    return rest === '' ? undefined : rest;
  }
}
