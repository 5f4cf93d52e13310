import { z } from 'zod';

import type { ValueOf } from '../types/value-of';
import type { DirectoryEntry } from './directory-entry';
import { InvalidOptionError } from './errors';

export const INCLUDE_DIRECTORIES = {
  NONE: 'none',
  DEPTH_FIRST: 'depth-first',
  BREADTH_FIRST: 'breadth-first',
} as const;

export type IncludeDirectories = ValueOf<typeof INCLUDE_DIRECTORIES>;

export const IF_MISSING = {
  ERROR: 'error',
  IGNORE: 'ignore',
} as const;

export type IfMissing = ValueOf<typeof IF_MISSING>;

export const INCLUDE_DIRECTORIES_SCHEMA = z.enum(
  Object.values(INCLUDE_DIRECTORIES) as [IncludeDirectories, ...IncludeDirectories[]],
);

export const IF_MISSING_SCHEMA = z.enum(Object.values(IF_MISSING) as [IfMissing, ...IfMissing[]]);

export type EntryTest = (entry: DirectoryEntry) => boolean;

export type WalkOptions = {
  includeDirectories?: IncludeDirectories;
  test?: EntryTest;
  ifMissing?: IfMissing;
  followSymlinks?: boolean;
};

export type ResolvedWalkOptions = Required<WalkOptions>;

const acceptAll: EntryTest = () => true;

const walkOptionsSchema = z
  .object({
    includeDirectories: INCLUDE_DIRECTORIES_SCHEMA.default(INCLUDE_DIRECTORIES.DEPTH_FIRST),
    ifMissing: IF_MISSING_SCHEMA.default(IF_MISSING.ERROR),
    followSymlinks: z.boolean().default(false),
  })
  .strict();

/**
 * Validate walk options coming from untyped callers (CLI flags, JSON).
 */
export const resolveWalkOptions = (options: WalkOptions = {}): ResolvedWalkOptions => {
  const { test, ...rest } = options;
  if (test !== undefined && typeof test !== 'function') {
    throw new InvalidOptionError('Walk option "test" must be a function');
  }

  const parsed = walkOptionsSchema.safeParse(rest);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`)
      .join('; ');
    throw new InvalidOptionError(`Invalid walk options: ${details}`);
  }

  return { ...parsed.data, test: test ?? acceptAll };
};
