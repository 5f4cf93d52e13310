import { promises as fs } from 'node:fs';
import type { Dirent, Stats } from 'node:fs';
import path from 'node:path';

import type {
  DirectoryMatch,
  FileSystemEntryType,
  FileSystemPort,
  IfExists,
  PathProbe,
} from '../application/ports/file-system.port';
import { IF_EXISTS } from '../application/ports/file-system.port';
import { FileExistsError } from '../domain/errors';
import { directoryOf, formatPath } from '../domain/path-model';
import type { WildcardPath } from '../domain/path-model';

const OWNER_WRITE = 0o200;

const WRITE_FLAGS: Record<IfExists, string> = {
  [IF_EXISTS.OVERWRITE]: 'w',
  [IF_EXISTS.APPEND]: 'a',
  [IF_EXISTS.ERROR]: 'wx',
};

// fs errors are not always `instanceof Error` (Jest runs tests in a separate realm)
const hasErrorCode = (error: unknown, ...codes: string[]): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  typeof error.code === 'string' &&
  codes.includes(error.code);

const mapEntryType = (entry: Dirent | Stats): FileSystemEntryType => {
  if (entry.isFile()) {
    return 'file';
  }
  if (entry.isDirectory()) {
    return 'directory';
  }
  if (entry.isSymbolicLink()) {
    return 'symlink';
  }
  return 'other';
};

export class NodeFileSystem implements FileSystemPort {
  public async exists(targetPath: string): Promise<boolean> {
    try {
      await fs.lstat(targetPath);
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
        return false;
      }
      throw error;
    }
  }

  public async probe(targetPath: string): Promise<PathProbe> {
    try {
      return mapEntryType(await fs.stat(targetPath));
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
        return 'missing';
      }
      throw error;
    }
  }

  public async realPath(targetPath: string): Promise<string> {
    return fs.realpath(targetPath);
  }

  public async readMatches(
    pattern: WildcardPath,
    options: { resolveSymlinks: boolean },
  ): Promise<DirectoryMatch[]> {
    const directory = formatPath(directoryOf(pattern));
    const entries = await fs.readdir(directory, { withFileTypes: true });
    const matches: DirectoryMatch[] = [];

    for (const entry of entries) {
      const match: DirectoryMatch = { name: entry.name, type: mapEntryType(entry) };
      if (options.resolveSymlinks) {
        Object.assign(match, await this.resolve(path.join(directory, entry.name)));
      }
      matches.push(match);
    }

    return matches;
  }

  public async readBytes(targetPath: string): Promise<Uint8Array> {
    const handle = await fs.open(targetPath, 'r');
    try {
      const { size } = await handle.stat();
      const buffer = Buffer.alloc(size);
      let offset = 0;
      while (offset < size) {
        const { bytesRead } = await handle.read(buffer, offset, size - offset, offset);
        if (bytesRead === 0) {
          break;
        }
        offset += bytesRead;
      }
      return buffer.subarray(0, offset);
    } finally {
      await handle.close();
    }
  }

  public async writeBytes(targetPath: string, bytes: Uint8Array, ifExists: IfExists): Promise<void> {
    try {
      await fs.writeFile(targetPath, bytes, { flag: WRITE_FLAGS[ifExists] });
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) {
        throw new FileExistsError(targetPath);
      }
      throw error;
    }
  }

  public async ensureDirectory(targetPath: string): Promise<void> {
    await fs.mkdir(targetPath, { recursive: true });
  }

  public async createDirectory(targetPath: string): Promise<void> {
    try {
      await fs.mkdir(targetPath);
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) {
        throw new FileExistsError(targetPath);
      }
      throw error;
    }
  }

  public async remove(targetPath: string): Promise<void> {
    await fs.rm(targetPath, { recursive: true, force: true });
  }

  public async isWritable(targetPath: string): Promise<boolean> {
    const stats = await fs.stat(targetPath);
    return (stats.mode & OWNER_WRITE) !== 0;
  }

  public async makeWritable(targetPath: string): Promise<void> {
    const stats = await fs.stat(targetPath);
    await fs.chmod(targetPath, (stats.mode & 0o7777) | OWNER_WRITE);
  }

  private async resolve(entryPath: string): Promise<Pick<DirectoryMatch, 'realPath' | 'realType'>> {
    try {
      const realPath = await fs.realpath(entryPath);
      return { realPath, realType: mapEntryType(await fs.stat(realPath)) };
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT', 'ELOOP')) {
        return { realPath: null, realType: null };
      }
      throw error;
    }
  }
}
