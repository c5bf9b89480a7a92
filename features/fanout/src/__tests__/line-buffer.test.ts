/**
 * LineBuffer Tests
 */

import { LineBuffer } from '../line-buffer.js';

describe('LineBuffer', () => {
  it('should emit lines only once they are complete', () => {
    const buffer = new LineBuffer();

    expect(buffer.push('ab')).toEqual([]);
    expect(buffer.push('c\ndef\n')).toEqual(['abc\n', 'def\n']);
    expect(buffer.push('gh')).toEqual([]);
    expect(buffer.flush()).toBe('gh');
  });

  it('should return undefined on flush when nothing is pending', () => {
    const buffer = new LineBuffer();
    buffer.push('done\n');

    expect(buffer.flush()).toBeUndefined();
  });

  it('should join multi-byte characters split across chunks', () => {
    const buffer = new LineBuffer();
    const bytes = Buffer.from('é\n');

    expect(buffer.push(bytes.subarray(0, 1))).toEqual([]);
    expect(buffer.push(bytes.subarray(1))).toEqual(['é\n']);
  });
});
