/**
 * @opsdeck/ssh - Identity Resolution
 * Finds the local private key file registered under an EC2 key-pair name.
 */

import { createHash, createPrivateKey } from 'node:crypto';
import { readdir, readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { UserMessageError, errorMessage, type KeyPairDirectory } from '@opsdeck/shared';
import type { LoggerLike } from '@opsdeck/logger';

/**
 * EC2 fingerprint of a private key: SHA-1 of its PKCS#8 DER encoding,
 * hex pairs joined by colons.
 */
export function ec2KeyFingerprint(pem: string | Buffer): string {
  const der = createPrivateKey(pem).export({ type: 'pkcs8', format: 'der' });
  const digest = createHash('sha1').update(der).digest('hex');
  return digest.replace(/..(?=.)/g, '$&:');
}

export interface IdentityResolverOptions {
  directory: KeyPairDirectory;
  keyDir?: string;
  logger?: LoggerLike;
}

export class IdentityResolver {
  private readonly keyDir: string;
  private readonly cache = new Map<string, Promise<string>>();

  constructor(private readonly options: IdentityResolverOptions) {
    this.keyDir = options.keyDir ?? join(homedir(), '.ssh');
  }

  /** Path of the local `*.pem` file whose fingerprint matches the key pair. */
  identityPath(keyName: string): Promise<string> {
    let pending = this.cache.get(keyName);
    if (!pending) {
      pending = this.lookup(keyName);
      this.cache.set(keyName, pending);
      pending.catch(() => this.cache.delete(keyName));
    }
    return pending;
  }

  private async lookup(keyName: string): Promise<string> {
    const keyPair = await this.options.directory.findKeyPair(keyName);
    if (!keyPair) {
      throw new UserMessageError(`Could not find key pair fingerprint for "${keyName}"`);
    }

    const entries = await readdir(this.keyDir);
    const candidates = entries.filter(name => name.endsWith('.pem')).sort();

    for (const name of candidates) {
      const path = join(this.keyDir, name);
      let fingerprint: string;
      try {
        fingerprint = ec2KeyFingerprint(await readFile(path));
      } catch (error) {
        // Encrypted or malformed keys cannot match
        this.options.logger?.debug('Skipping unreadable key', { path, reason: errorMessage(error) });
        continue;
      }
      if (fingerprint === keyPair.fingerprint) {
        return path;
      }
    }

    throw new UserMessageError(
      `Could not find "${keyName}" SSH key with fingerprint ${keyPair.fingerprint}`,
      { keyDir: this.keyDir },
    );
  }
}
