import { InvalidCompositionError, NotADirectoryPathError } from './errors';
import {
  MATCH_ALL,
  PATH_KIND,
  assertConcrete,
  canonicalize,
  emptyPath,
  isWildcard,
  makePath,
} from './path-model';
import type { AnyPath, Path, PathKind, WildcardPath } from './path-model';

type DirectoryFold = {
  kind: PathKind;
  directory: string[];
};

const foldDirectories = (paths: readonly AnyPath[], operation: string): DirectoryFold => {
  const fold: DirectoryFold = { kind: PATH_KIND.RELATIVE, directory: [] };

  paths.forEach((value, index) => {
    const concrete = assertConcrete(value, operation);
    if (index === 0 || concrete.kind === PATH_KIND.ABSOLUTE) {
      fold.kind = concrete.kind;
      fold.directory = [...concrete.directory];
      return;
    }
    fold.directory.push(...concrete.directory);
  });

  return fold;
};

/**
 * Merge paths left to right into one directory path. A later absolute path
 * replaces everything before it; a later relative path extends it.
 */
export const mergeAsDirectory = (paths: readonly AnyPath[]): Path => {
  if (paths.length === 0) {
    return emptyPath();
  }
  const fold = foldDirectories(paths, 'mergeAsDirectory');
  return canonicalize(makePath(fold));
};

/**
 * Merge paths like {@link mergeAsDirectory} and attach the file fields of the
 * last path. The last path must name a file.
 */
export const mergeAsFile = (paths: readonly AnyPath[]): Path => {
  const last = paths[paths.length - 1];
  if (last === undefined) {
    return emptyPath();
  }
  const { name, type, version } = assertConcrete(last, 'mergeAsFile');
  if (name === undefined) {
    throw new InvalidCompositionError('The last path of a file merge must name a file');
  }
  const fold = foldDirectories(paths, 'mergeAsFile');

  return canonicalize(makePath({ ...fold, name, type, version }));
};

export const directoryWildcard = (dir: AnyPath): WildcardPath => {
  if (isWildcard(dir)) {
    throw new NotADirectoryPathError();
  }
  const { kind, directory } = canonicalize(dir);
  const wildcard: WildcardPath = {
    wildcard: true,
    kind,
    directory,
    name: MATCH_ALL,
    type: MATCH_ALL,
  };
  return Object.freeze(wildcard);
};
