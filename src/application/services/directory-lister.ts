import type { DirectoryMatch, DirectoryReaderPort } from '../ports/file-system.port';
import { FILE_SYSTEM_ENTRY_TYPE } from '../ports/file-system.port';
import { ENTRY_KIND } from '../../domain/directory-entry';
import type { DirectoryEntry } from '../../domain/directory-entry';
import { directoryWildcard } from '../../domain/path-composer';
import {
  assertConcrete,
  childDirectory,
  childFile,
  directoryOf,
  formatPath,
  parseDirectoryPath,
  parsePath,
} from '../../domain/path-model';
import type { AnyPath, Path } from '../../domain/path-model';
import { getLogger } from '../../utils/get-logger';

export type ListOptions = {
  followSymlinks?: boolean;
};

const byHostPath = (left: DirectoryEntry, right: DirectoryEntry): number => {
  const a = formatPath(left.path);
  const b = formatPath(right.path);
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};

export class DirectoryLister {
  private readonly logger = getLogger();

  public constructor(private readonly reader: DirectoryReaderPort) { }

  /**
   * Immediate entries of a concrete directory, sorted by host path.
   * With `followSymlinks`, entries carry their resolved real path and
   * duplicates (two links to one target) collapse to one.
   */
  public async listDirectory(dir: AnyPath, options: ListOptions = {}): Promise<DirectoryEntry[]> {
    const followSymlinks = options.followSymlinks ?? false;
    const pattern = directoryWildcard(assertConcrete(dir, 'listDirectory'));
    const base = directoryOf(pattern);

    const matches = await this.reader.readMatches(pattern, { resolveSymlinks: followSymlinks });
    const seen = new Set<string>();
    const entries: DirectoryEntry[] = [];

    for (const match of matches) {
      const entry = followSymlinks ? this.toResolvedEntry(base, match) : this.toEntry(base, match);
      const key = formatPath(entry.path);
      if (seen.has(key)) {
        this.logger.debug(`Dropping duplicate entry: name=${match.name}, resolved=${key}`);
        continue;
      }
      seen.add(key);
      entries.push(entry);
    }

    return entries.sort(byHostPath);
  }

  private toEntry(base: Path, match: DirectoryMatch): DirectoryEntry {
    if (match.type === FILE_SYSTEM_ENTRY_TYPE.DIRECTORY) {
      return { path: childDirectory(base, match.name), kind: ENTRY_KIND.DIRECTORY };
    }
    if (match.type === FILE_SYSTEM_ENTRY_TYPE.SYMLINK) {
      return { path: childFile(base, match.name), kind: ENTRY_KIND.SYMLINK };
    }
    return { path: childFile(base, match.name), kind: ENTRY_KIND.FILE };
  }

  private toResolvedEntry(base: Path, match: DirectoryMatch): DirectoryEntry {
    if (match.realPath === undefined || match.realPath === null) {
      return this.toEntry(base, match);
    }
    if (match.realType === FILE_SYSTEM_ENTRY_TYPE.DIRECTORY) {
      return { path: parseDirectoryPath(match.realPath), kind: ENTRY_KIND.DIRECTORY };
    }
    return { path: parsePath(match.realPath), kind: ENTRY_KIND.FILE };
  }
}
