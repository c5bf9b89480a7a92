/**
 * @opsdeck/shared - Constants
 */

// ============================================================================
// Bootstrap Protocol
// ============================================================================

export const UPLOAD_SENTINEL = 'opsdeck-upload';
export const EXEC_SENTINEL = 'opsdeck-exec';

/** Erase the current line and return the cursor to column 0. */
export const ERASE_LINE = '\x1b[2K\r';

/** Base64 payload line width; keeps each line below the pty canonical-mode limit. */
export const PAYLOAD_LINE_WIDTH = 60;

export const DEFAULT_RUNNER_COMMAND = 'bash -i';

// ============================================================================
// SSH Defaults
// ============================================================================

export const SSH_DEFAULTS = {
  port: 22,
  bastionUser: 'root',
  instanceUser: 'ec2-user',
  readyTimeout: 30000,
} as const;

export const BASTION_GROUP = 'bastion';

// ============================================================================
// Elastic Beanstalk Paths
// ============================================================================

export const EB_PATHS = {
  generateEnv: '/opt/elasticbeanstalk/containerfiles/support/generate_env',
  stagingImageId: '/etc/elasticbeanstalk/.aws_beanstalk.staging-image-id',
  currentImageId: '/etc/elasticbeanstalk/.aws_beanstalk.current-image-id',
  stagingContainerId: '/etc/elasticbeanstalk/.aws_beanstalk.staging-container-id',
  currentContainerId: '/etc/elasticbeanstalk/.aws_beanstalk.current-container-id',
} as const;
