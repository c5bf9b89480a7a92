/**
 * @opsdeck/runner - Bootstrap Script
 *
 * One `bash -c` command that receives a base64 tarball on stdin, unpacks it
 * and execs the target command. The remote side only needs bash, dd,
 * base64 and tar.
 */

import {
  EXEC_SENTINEL,
  PAYLOAD_LINE_WIDTH,
  UPLOAD_SENTINEL,
  shellEscape,
} from '@opsdeck/shared';

export interface BootstrapInput {
  /** Byte length of the encoded payload the script reads from stdin. */
  payloadLength: number;
  command: string;
  extractPath?: string;
  workDir?: string;
}

/** Base64 in fixed-width lines, each ending in a newline. */
export function encodePayload(archive: Buffer): string {
  const encoded = archive.toString('base64');
  let payload = '';
  for (let i = 0; i < encoded.length; i += PAYLOAD_LINE_WIDTH) {
    payload += `${encoded.slice(i, i + PAYLOAD_LINE_WIDTH)}\n`;
  }
  return payload;
}

/**
 * `echo -en` argument printing the token. The dash is written as `\x2d`,
 * so the script text itself never contains the token.
 */
function echoSentinel(token: string): string {
  return `echo -en ${token.replace('-', '\\\\x2d')}`;
}

/** Escaped directory for `cd`, keeping a leading `~` unescaped for tilde expansion. */
function cdTarget(dir: string): string {
  return shellEscape(dir).replace(/^\\~/, '~');
}

export function buildBootstrapScript(input: BootstrapInput): string {
  const { payloadLength, command, extractPath, workDir } = input;
  const extract = extractPath ? ` -C ${shellEscape(extractPath)}` : '';

  return [
    'set -euo pipefail',
    'stty -echo',
    echoSentinel(UPLOAD_SENTINEL),
    `dd bs=1 count=${payloadLength} | base64 --decode | tar zx${extract}`,
    'stty echo',
    echoSentinel(EXEC_SENTINEL),
    workDir ? `cd ${cdTarget(workDir)}` : null,
    `exec ${command}`,
  ].filter((step): step is string => step !== null).join(';');
}

export function buildBootstrapCommand(input: BootstrapInput): string {
  return `bash -c ${shellEscape(buildBootstrapScript(input))}`;
}
