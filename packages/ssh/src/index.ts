/**
 * @opsdeck/ssh - Bastion Gateway, Identity Resolution & SSH Commands
 */

export {
  Ssh2Gateway,
  type Gateway,
  type RemoteSession,
  type ExecHandle,
  type ExitStatus,
  type Ssh2GatewayOptions,
} from './gateway.js';
export { IdentityResolver, ec2KeyFingerprint, type IdentityResolverOptions } from './identity.js';
export { buildInstanceSshCommand, buildProxyCommand, type InstanceSshCommandInput } from './commands.js';
