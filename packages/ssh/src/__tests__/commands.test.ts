/**
 * SSH Command Builder Tests
 */

import { buildInstanceSshCommand, buildProxyCommand } from '../commands.js';

describe('SSH Commands', () => {
  describe('buildProxyCommand', () => {
    it('should forward stdio to the target through the bastion', () => {
      expect(buildProxyCommand('bastion.example.com')).toBe('ssh -W %h:%p root@bastion.example.com');
    });
  });

  describe('buildInstanceSshCommand', () => {
    it('should build a non-tty command with error log level', () => {
      const cmd = buildInstanceSshCommand({
        host: 'ip-10-0-1-12.internal',
        identityPath: '/home/ops/.ssh/app-prod.pem',
        bastionHost: 'bastion.example.com',
      });

      expect(cmd).toBe(
        'ssh -o UserKnownHostsFile=/dev/null -o StrictHostKeyChecking=no -o LogLevel=error '
        + '-o ProxyCommand=ssh\\ -W\\ \\%h:\\%p\\ root@bastion.example.com '
        + '-i /home/ops/.ssh/app-prod.pem ec2-user@ip-10-0-1-12.internal',
      );
    });

    it('should request a tty and quiet logging for interactive use', () => {
      const cmd = buildInstanceSshCommand({
        host: '10.0.1.12',
        identityPath: '/keys/my key.pem',
        bastionHost: 'bastion.example.com',
        user: 'admin',
        tty: true,
      });

      expect(cmd).toBe(
        'ssh -o UserKnownHostsFile=/dev/null -o StrictHostKeyChecking=no -o LogLevel=quiet -t '
        + '-o ProxyCommand=ssh\\ -W\\ \\%h:\\%p\\ root@bastion.example.com '
        + '-i /keys/my\\ key.pem admin@10.0.1.12',
      );
    });
  });
});
