/**
 * @opsdeck/runner - Archive Builder
 * In-memory gzip tarball of files to deliver to a remote shell.
 */

import { readFile, stat } from 'node:fs/promises';
import { posix } from 'node:path';
import { gzipSync } from 'node:zlib';
import { pack } from 'tar-stream';
import { ArchiveError } from '@opsdeck/shared';

export interface ArchiveEntry {
  path: string;
  mode: number;
  content: Buffer;
  mtime: Date;
}

const DEFAULT_MODE = 0o644;

/**
 * Path under which an entry is stored. Leading slashes and `./` segments
 * are dropped; paths climbing out of the archive root are rejected.
 */
export function archivePath(path: string): string {
  const normalized = posix.normalize(path.replace(/\\/g, '/')).replace(/^\/+/, '');
  if (normalized === '' || normalized === '.' || normalized === '..' || normalized.startsWith('../')) {
    throw new ArchiveError(path, new Error('path must stay inside the archive root'));
  }
  return normalized;
}

export class Archive {
  private entries: ArchiveEntry[] = [];
  private result: Promise<Buffer> | null = null;

  get size(): number {
    return this.entries.length;
  }

  /**
   * Add an entry. Without `content` the file at `path` is read and `mode`
   * defaults to its permission bits. Adding the same path twice keeps both
   * entries; the later one wins on extraction.
   */
  async add(path: string, mode?: number, content?: Buffer | string): Promise<void> {
    this.assertOpen();

    const name = archivePath(path);

    if (content === undefined) {
      try {
        const [data, info] = await Promise.all([readFile(path), stat(path)]);
        content = data;
        mode ??= info.mode & 0o7777;
      } catch (error) {
        throw new ArchiveError(path, error);
      }
      // finalize() may have run while the file was being read
      this.assertOpen();
    }

    this.entries.push({
      path: name,
      mode: mode ?? DEFAULT_MODE,
      content: typeof content === 'string' ? Buffer.from(content) : content,
      mtime: new Date(),
    });
  }

  /** Gzipped tarball of every entry in insertion order. Computed once until reset(). */
  finalize(): Promise<Buffer> {
    this.result ??= build(this.entries);
    return this.result;
  }

  private assertOpen(): void {
    if (this.result) {
      throw new Error('Archive is finalized. Call reset() before adding entries.');
    }
  }

  reset(): void {
    this.entries = [];
    this.result = null;
  }
}

async function build(entries: readonly ArchiveEntry[]): Promise<Buffer> {
  const tarball = pack();
  const chunks: Buffer[] = [];

  const done = new Promise<Buffer>((resolve, reject) => {
    tarball.on('data', (chunk: Buffer) => chunks.push(chunk));
    tarball.on('end', () => resolve(Buffer.concat(chunks)));
    tarball.on('error', reject);
  });

  for (const entry of entries) {
    await new Promise<void>((resolve, reject) => {
      tarball.entry(
        { name: entry.path, mode: entry.mode, mtime: entry.mtime, size: entry.content.length },
        entry.content,
        (err) => (err ? reject(err) : resolve()),
      );
    });
  }
  tarball.finalize();

  return gzipSync(await done);
}
