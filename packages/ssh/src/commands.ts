/**
 * @opsdeck/ssh - SSH Command Builders
 * Command lines for the system ssh client, proxied through the bastion.
 */

import { SSH_DEFAULTS, shellEscape } from '@opsdeck/shared';

export interface InstanceSshCommandInput {
  host: string;
  identityPath: string;
  bastionHost: string;
  user?: string;
  bastionUser?: string;
  tty?: boolean;
}

export function buildProxyCommand(bastionHost: string, bastionUser: string = SSH_DEFAULTS.bastionUser): string {
  return `ssh -W %h:%p ${bastionUser}@${shellEscape(bastionHost)}`;
}

/**
 * `ssh` invocation reaching a private instance through the bastion with
 * ProxyCommand. Host keys are not checked.
 */
export function buildInstanceSshCommand(input: InstanceSshCommandInput): string {
  const {
    host,
    identityPath,
    bastionHost,
    user = SSH_DEFAULTS.instanceUser,
    bastionUser = SSH_DEFAULTS.bastionUser,
    tty = false,
  } = input;

  return [
    'ssh',
    '-o UserKnownHostsFile=/dev/null',
    '-o StrictHostKeyChecking=no',
    `-o LogLevel=${tty ? 'quiet' : 'error'}`,
    tty ? '-t' : null,
    `-o ProxyCommand=${shellEscape(buildProxyCommand(bastionHost, bastionUser))}`,
    `-i ${shellEscape(identityPath)}`,
    `${user}@${shellEscape(host)}`,
  ].filter((part): part is string => part !== null).join(' ');
}
