/**
 * @opsdeck/instance - Remote Scripts
 *
 * Shell scripts executed on Elastic Beanstalk instances. The app image and
 * container are looked up from the staging ids first (an in-progress deploy)
 * and then from the current ids.
 */

import { EB_PATHS, shellEscape } from '@opsdeck/shared';

/**
 * Prefix that runs a one-off container of the app image with the
 * environment's variables. The command to run inside is appended by the caller.
 */
export function buildDockerRunScript(options: { tty?: boolean } = {}): string {
  const dockerFlags = options.tty ? '--rm --interactive --tty' : '--rm';

  return [
    'set -euo pipefail',
    'ENV_FILE="$(mktemp -t opsdeck-run-env.XXXXXX)"',
    `trap 'rm "\${ENV_FILE?}"' EXIT`,
    `sudo ${EB_PATHS.generateEnv} > "\${ENV_FILE?}"`,
    `IMAGE_ID="$(cat ${EB_PATHS.stagingImageId} 2> /dev/null || cat ${EB_PATHS.currentImageId})"`,
    `sudo docker run ${dockerFlags} --env-file "\${ENV_FILE?}" "\${IMAGE_ID?}"`,
  ].join('\n');
}

/** `ssh ... '<docker run script> sh -c <command>'` for one instance, over a tty. */
export function buildInstanceDockerRunCommand(sshCommand: string, command: string): string {
  const remote = `${buildDockerRunScript({ tty: true })} sh -c ${shellEscape(command)}`;
  return `${sshCommand} ${shellEscape(remote)}`;
}

/**
 * Follows the app container's log forever, re-attaching after each deploy.
 * Every line is prefixed with the short container id.
 */
export function buildLogTailScript(): string {
  return [
    'set -euo pipefail',
    'while true; do',
    `  CONTAINER_ID="$(cat ${EB_PATHS.stagingContainerId} 2> /dev/null || cat ${EB_PATHS.currentContainerId})"`,
    '  sudo docker logs --timestamps --follow --since 1m "${CONTAINER_ID?}" 2>&1 | \\',
    `    gawk '{ print substr(CONTAINER_ID, 0, 12) " " $0; fflush(); }' CONTAINER_ID="\${CONTAINER_ID?}"`,
    'done',
  ].join('\n');
}

/**
 * Downloads a PostgreSQL dump and restores it over the app database
 * (`DATABASE_URL` inside the container). Objects owned by the database user
 * are dropped first; extension comments are left out of the restore list.
 */
export function buildPgRestoreScript(backupUrl: string): string {
  return [
    `wget -O /tmp/backup.dump ${shellEscape(backupUrl)}`,
    "pg_restore -l /tmp/backup.dump | grep -v 'COMMENT - EXTENSION' > /tmp/backup.list",
    `PGUSER="$(echo "\${DATABASE_URL?}" | sed -E 's|^[a-z]+://([^:@/]+).*$|\\1|')"`,
    'echo Resetting...',
    `PGOPTIONS='--client-min-messages=warning' psql -X -q -v ON_ERROR_STOP=1 "\${DATABASE_URL?}" -c "DROP OWNED BY \${PGUSER?} CASCADE; CREATE SCHEMA public;"`,
    'echo Restoring...',
    'pg_restore --jobs=4 --no-acl --no-owner --dbname "${DATABASE_URL?}" --exit-on-error -L /tmp/backup.list /tmp/backup.dump',
    'echo Done.',
    'rm /tmp/backup.list /tmp/backup.dump',
  ].join('\n');
}
