/**
 * Bootstrap Script Tests
 */

import { buildBootstrapCommand, buildBootstrapScript, encodePayload } from '../bootstrap.js';

describe('Bootstrap', () => {
  describe('encodePayload', () => {
    it('should wrap base64 into 60-character lines ending in newlines', () => {
      const archive = Buffer.alloc(50, 1);
      const payload = encodePayload(archive);
      const lines = payload.split('\n');

      expect(lines.map(line => line.length)).toEqual([60, 8, 0]);
      expect(lines.join('')).toBe(archive.toString('base64'));
    });

    it('should encode an empty buffer as empty text', () => {
      expect(encodePayload(Buffer.alloc(0))).toBe('');
    });
  });

  describe('buildBootstrapScript', () => {
    it('should upload, extract and exec in order', () => {
      const script = buildBootstrapScript({
        payloadLength: 81,
        extractPath: '/tmp',
        command: '/tmp/app.sh',
      });

      expect(script.split(';')).toEqual([
        'set -euo pipefail',
        'stty -echo',
        'echo -en opsdeck\\\\x2dupload',
        'dd bs=1 count=81 | base64 --decode | tar zx -C /tmp',
        'stty echo',
        'echo -en opsdeck\\\\x2dexec',
        'exec /tmp/app.sh',
      ]);
    });

    it('should never contain the literal sentinel tokens', () => {
      const script = buildBootstrapScript({ payloadLength: 1, command: 'bash -i' });

      expect(script).not.toContain('opsdeck-upload');
      expect(script).not.toContain('opsdeck-exec');
    });

    it('should extract into the current directory without an extract path', () => {
      const script = buildBootstrapScript({ payloadLength: 12, command: 'bash -i' });

      expect(script).toContain(';dd bs=1 count=12 | base64 --decode | tar zx;');
    });

    it('should cd into the work dir keeping tilde expansion', () => {
      const script = buildBootstrapScript({
        payloadLength: 12,
        command: './bin/console',
        workDir: '~/app dir',
      });

      expect(script.endsWith(';cd ~/app\\ dir;exec ./bin/console')).toBe(true);
    });

    it('should escape the extract path', () => {
      const script = buildBootstrapScript({ payloadLength: 1, command: 'true', extractPath: '/tmp/my files' });

      expect(script).toContain('tar zx -C /tmp/my\\ files;');
    });

    it('should be a pure function of its inputs', () => {
      const input = { payloadLength: 4096, command: 'bin/worker', extractPath: '/app', workDir: '/app' };

      expect(buildBootstrapScript(input)).toBe(buildBootstrapScript({ ...input }));
    });
  });

  describe('buildBootstrapCommand', () => {
    it('should pass the script as one escaped bash -c argument', () => {
      const command = buildBootstrapCommand({ payloadLength: 4, command: 'true' });

      expect(command.startsWith('bash -c set\\ -euo\\ pipefail\\;stty\\ -echo\\;')).toBe(true);
      expect(command.endsWith('\\;exec\\ true')).toBe(true);
      expect(command.slice('bash -c '.length).replace(/\\(.)/g, '$1'))
        .toBe(buildBootstrapScript({ payloadLength: 4, command: 'true' }));
    });
  });
});
