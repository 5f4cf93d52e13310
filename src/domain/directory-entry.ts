import type { ValueOf } from '../types/value-of';
import type { Path } from './path-model';

export const ENTRY_KIND = {
  FILE: 'file',
  DIRECTORY: 'directory',
  SYMLINK: 'symlink',
} as const;

export type EntryKind = ValueOf<typeof ENTRY_KIND>;

/**
 * `symlink` marks a link left unresolved: either links were not followed or
 * the target does not exist.
 */
export type DirectoryEntry = {
  path: Path;
  kind: EntryKind;
};
