import type { ValueOf } from '../../types/value-of';
import type { WildcardPath } from '../../domain/path-model';

export const FILE_SYSTEM_ENTRY_TYPE = {
  FILE: 'file',
  DIRECTORY: 'directory',
  SYMLINK: 'symlink',
  OTHER: 'other',
} as const;

export type FileSystemEntryType = ValueOf<typeof FILE_SYSTEM_ENTRY_TYPE>;

export const IF_EXISTS = {
  OVERWRITE: 'overwrite',
  APPEND: 'append',
  ERROR: 'error',
} as const;

export type IfExists = ValueOf<typeof IF_EXISTS>;

export type DirectoryMatch = {
  name: string;
  type: FileSystemEntryType;
  /** Set when links were resolved; null for a dangling link. */
  realPath?: string | null;
  realType?: FileSystemEntryType | null;
};

export type PathProbe = FileSystemEntryType | 'missing';

export interface DirectoryReaderPort {
  /** Type of the object at `path`, following links. */
  probe(path: string): Promise<PathProbe>;
  realPath(path: string): Promise<string>;
  readMatches(pattern: WildcardPath, options: { resolveSymlinks: boolean }): Promise<DirectoryMatch[]>;
}

export interface RawFilePort {
  exists(path: string): Promise<boolean>;
  /** Bytes actually read; shorter than the stat size if the file shrank. */
  readBytes(path: string): Promise<Uint8Array>;
  writeBytes(path: string, bytes: Uint8Array, ifExists: IfExists): Promise<void>;
  ensureDirectory(path: string): Promise<void>;
  createDirectory(path: string): Promise<void>;
  remove(path: string): Promise<void>;
}

export interface PermissionPort {
  isWritable(path: string): Promise<boolean>;
  makeWritable(path: string): Promise<void>;
}

export type FileSystemPort = DirectoryReaderPort & RawFilePort & PermissionPort;
