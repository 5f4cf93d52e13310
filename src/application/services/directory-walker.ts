import type { DirectoryReaderPort } from '../ports/file-system.port';
import { FILE_SYSTEM_ENTRY_TYPE } from '../ports/file-system.port';
import { DirectoryLister } from './directory-lister';
import { ENTRY_KIND } from '../../domain/directory-entry';
import type { DirectoryEntry } from '../../domain/directory-entry';
import { DirectoryNotFoundError } from '../../domain/errors';
import { asDirectory, assertConcrete, canonicalize, formatPath, parsePath } from '../../domain/path-model';
import type { AnyPath, Path } from '../../domain/path-model';
import { IF_MISSING, INCLUDE_DIRECTORIES, resolveWalkOptions } from '../../domain/walk-options';
import type { ResolvedWalkOptions, WalkOptions } from '../../domain/walk-options';
import { getLogger } from '../../utils/get-logger';

export type Visitor = (entry: DirectoryEntry) => void | Promise<void>;

// stat() on "file/" fails with ENOTDIR, so probe the bare form
const withoutTrailingSeparator = (hostPath: string): string =>
  hostPath.length > 1 && hostPath.endsWith('/') ? hostPath.slice(0, -1) : hostPath;

type WalkState = {
  options: ResolvedWalkOptions;
  entered: Set<string>;
};

export class DirectoryWalker {
  private readonly logger = getLogger();
  private readonly lister: DirectoryLister;

  public constructor(private readonly reader: DirectoryReaderPort) {
    this.lister = new DirectoryLister(reader);
  }

  /**
   * Visit everything under `dir`, one entry at a time.
   *
   * - `none`: files only.
   * - `depth-first`: a directory is visited after its contents.
   * - `breadth-first`: a directory is visited before its contents, and a
   *   directory rejected by `test` is pruned with everything below it.
   */
  public async walk(dir: AnyPath, visit: Visitor, options?: WalkOptions): Promise<void> {
    const resolved = resolveWalkOptions(options);
    const root = asDirectory(canonicalize(assertConcrete(dir, 'walk')));
    const rootHostPath = withoutTrailingSeparator(formatPath(root));
    const probe = await this.reader.probe(rootHostPath);

    if (probe === 'missing') {
      if (resolved.ifMissing === IF_MISSING.ERROR) {
        throw new DirectoryNotFoundError(rootHostPath);
      }
      this.logger.debug(`Walk root missing, ignoring: path=${rootHostPath}`);
      return;
    }

    if (probe !== FILE_SYSTEM_ENTRY_TYPE.DIRECTORY) {
      const entry: DirectoryEntry = { path: parsePath(rootHostPath), kind: ENTRY_KIND.FILE };
      if (resolved.test(entry)) {
        await visit(entry);
      }
      return;
    }

    await this.walkDirectory(root, visit, { options: resolved, entered: new Set() });
  }

  private async walkDirectory(dir: Path, visit: Visitor, state: WalkState): Promise<void> {
    const { includeDirectories, test, followSymlinks } = state.options;
    const self: DirectoryEntry = { path: dir, kind: ENTRY_KIND.DIRECTORY };

    if (followSymlinks) {
      const realPath = await this.reader.realPath(formatPath(dir));
      if (state.entered.has(realPath)) {
        this.logger.debug(`Directory already entered, skipping: path=${formatPath(dir)}, real=${realPath}`);
        return;
      }
      state.entered.add(realPath);
    }

    if (includeDirectories === INCLUDE_DIRECTORIES.BREADTH_FIRST) {
      if (!test(self)) {
        this.logger.debug(`Pruning directory: path=${formatPath(dir)}`);
        return;
      }
      await visit(self);
    }

    const children = await this.lister.listDirectory(dir, { followSymlinks });
    for (const child of children) {
      if (child.kind === ENTRY_KIND.DIRECTORY) {
        await this.walkDirectory(child.path, visit, state);
      } else if (test(child)) {
        await visit(child);
      }
    }

    if (includeDirectories === INCLUDE_DIRECTORIES.DEPTH_FIRST && test(self)) {
      await visit(self);
    }
  }
}
