/**
 * Command Error Handling Tests
 */

import { ResolutionError } from '@opsdeck/shared';
import { reportError, withErrorHandling, type ErrorOutput } from '../lib/errors.js';

function recordingOutput(): ErrorOutput & { text: string; codes: number[] } {
  const codes: number[] = [];
  const output = {
    text: '',
    codes,
    write: (text: string) => { output.text += text; },
    exit: (code: number) => { output.codes.push(code); },
  };
  return output;
}

describe('Command error handling', () => {
  it('should print an OpsError message and exit with its code', () => {
    const output = recordingOutput();

    reportError(new ResolutionError('Could not find instance: "i-9"'), output);

    expect(output.text).toContain('Could not find instance: "i-9"');
    expect(output.codes).toEqual([1]);
  });

  it('should prefix unexpected errors and exit with 1', () => {
    const output = recordingOutput();

    reportError(new TypeError('boom'), output);

    expect(output.text).toContain('Error: boom');
    expect(output.codes).toEqual([1]);
  });

  it('should wrap an action and leave successful runs alone', async () => {
    const output = recordingOutput();
    const ok = withErrorHandling(async (_name: string) => {}, output);
    const failing = withErrorHandling(async () => {
      throw new ResolutionError('nope');
    }, output);

    await ok('shop');
    expect(output.codes).toEqual([]);

    await failing();
    expect(output.codes).toEqual([1]);
  });
});
