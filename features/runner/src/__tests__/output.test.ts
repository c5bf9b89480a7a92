/**
 * Logged Output Tests
 */

import { LineCollapser, collapseCarriageReturns } from '../output.js';

describe('collapseCarriageReturns', () => {
  it('should overwrite the start of the line after a carriage return', () => {
    expect(collapseCarriageReturns('10%\r50%\r100%')).toBe('100%');
    expect(collapseCarriageReturns('downloading\rdone')).toBe('doneloading');
  });

  it('should leave lines without carriage returns alone', () => {
    expect(collapseCarriageReturns('plain line')).toBe('plain line');
  });
});

describe('LineCollapser', () => {
  function collect() {
    const lines: string[] = [];
    return { lines, collapser: new LineCollapser(line => lines.push(line)) };
  }

  it('should emit completed lines regardless of chunking', () => {
    const { lines, collapser } = collect();

    collapser.push('Res');
    collapser.push('toring...\r\nDo');
    collapser.push('ne.\n');

    expect(lines).toEqual(['Restoring...', 'Done.']);
  });

  it('should collapse progress output into the last state', () => {
    const { lines, collapser } = collect();

    collapser.push('[#   ] 25%\r[##  ] 50%\r[####] 100%\r\n');

    expect(lines).toEqual(['[####] 100%']);
  });

  it('should treat a carriage return before a newline as a line ending', () => {
    const { lines, collapser } = collect();

    collapser.push('abc\r');
    expect(lines).toEqual([]);

    collapser.push('\n');
    expect(lines).toEqual(['abc']);
  });

  it('should flush an unterminated remainder once', () => {
    const { lines, collapser } = collect();

    collapser.push('partial');
    collapser.flush();
    collapser.flush();

    expect(lines).toEqual(['partial']);
  });
});
