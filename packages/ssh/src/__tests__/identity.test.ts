/**
 * Identity Resolution Tests
 */

import { generateKeyPairSync } from 'node:crypto';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { KeyPairDirectory, KeyPairRecord } from '@opsdeck/shared';
import { UserMessageError } from '@opsdeck/shared';
import { IdentityResolver, ec2KeyFingerprint } from '../identity.js';

function generatePem(): { pkcs1: string; pkcs8: string } {
  const { privateKey } = generateKeyPairSync('rsa', { modulusLength: 2048 });
  return {
    pkcs1: privateKey.export({ type: 'pkcs1', format: 'pem' }).toString(),
    pkcs8: privateKey.export({ type: 'pkcs8', format: 'pem' }).toString(),
  };
}

function directoryOf(records: KeyPairRecord[]): KeyPairDirectory {
  return {
    findKeyPair: async (name) => records.find(r => r.name === name),
  };
}

describe('ec2KeyFingerprint', () => {
  it('should produce colon-separated SHA-1 hex', () => {
    const { pkcs1 } = generatePem();

    expect(ec2KeyFingerprint(pkcs1)).toMatch(/^([0-9a-f]{2}:){19}[0-9a-f]{2}$/);
  });

  it('should not depend on the PEM encoding of the key', () => {
    const { pkcs1, pkcs8 } = generatePem();

    expect(ec2KeyFingerprint(pkcs1)).toBe(ec2KeyFingerprint(pkcs8));
  });
});

describe('IdentityResolver', () => {
  let keyDir: string;
  let appKey: string;

  beforeEach(async () => {
    keyDir = await mkdtemp(join(tmpdir(), 'opsdeck-keys-'));
    appKey = generatePem().pkcs1;
    await writeFile(join(keyDir, 'other.pem'), generatePem().pkcs1);
    await writeFile(join(keyDir, 'app-prod.pem'), appKey);
    await writeFile(join(keyDir, 'broken.pem'), 'not a key');
    await writeFile(join(keyDir, 'notes.txt'), 'ignored');
  });

  afterEach(async () => {
    await rm(keyDir, { recursive: true, force: true });
  });

  it('should find the key file whose fingerprint matches the key pair', async () => {
    const resolver = new IdentityResolver({
      directory: directoryOf([{ name: 'app-prod', fingerprint: ec2KeyFingerprint(appKey) }]),
      keyDir,
    });

    await expect(resolver.identityPath('app-prod')).resolves.toBe(join(keyDir, 'app-prod.pem'));
  });

  it('should look a key pair up only once', async () => {
    const findKeyPair = jest.fn(async (name: string) => ({ name, fingerprint: ec2KeyFingerprint(appKey) }));
    const resolver = new IdentityResolver({ directory: { findKeyPair }, keyDir });

    await resolver.identityPath('app-prod');
    await resolver.identityPath('app-prod');

    expect(findKeyPair).toHaveBeenCalledTimes(1);
  });

  it('should fail when the key pair is unknown', async () => {
    const resolver = new IdentityResolver({ directory: directoryOf([]), keyDir });

    await expect(resolver.identityPath('missing')).rejects.toThrow(
      new UserMessageError('Could not find key pair fingerprint for "missing"'),
    );
  });

  it('should fail when no local key matches', async () => {
    const fingerprint = '00:11:22:33:44:55:66:77:88:99:aa:bb:cc:dd:ee:ff:00:11:22:33';
    const resolver = new IdentityResolver({
      directory: directoryOf([{ name: 'app-prod', fingerprint }]),
      keyDir,
    });

    await expect(resolver.identityPath('app-prod')).rejects.toThrow(
      `Could not find "app-prod" SSH key with fingerprint ${fingerprint}`,
    );
  });
});
