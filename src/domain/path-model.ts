import path from 'node:path';

import type { ValueOf } from '../types/value-of';
import { WildcardNotAllowedError } from './errors';

export const PATH_KIND = {
  ABSOLUTE: 'absolute',
  RELATIVE: 'relative',
} as const;

export type PathKind = ValueOf<typeof PATH_KIND>;

export const SELF_COMPONENT = '.';
export const PARENT_COMPONENT = '..';
export const MATCH_ALL = '*';

/**
 * Structured filesystem path. Directory form has no `name`; file form does.
 */
export type Path = Readonly<{
  kind: PathKind;
  directory: readonly string[];
  name?: string;
  type?: string;
  version?: string;
}>;

/**
 * Opaque match-all variant of a directory path. Only the composer builds one
 * and only the lister consumes it.
 */
export type WildcardPath = Readonly<{
  wildcard: true;
  kind: PathKind;
  directory: readonly string[];
  name: typeof MATCH_ALL;
  type: typeof MATCH_ALL;
}>;

export type AnyPath = Path | WildcardPath;

type PathFields = {
  kind: PathKind;
  directory: readonly string[];
  name?: string;
  type?: string;
  version?: string;
};

export const isWildcard = (value: AnyPath): value is WildcardPath =>
  'wildcard' in value && value.wildcard === true;

export const assertConcrete = (value: AnyPath, operation: string): Path => {
  if (isWildcard(value)) {
    throw new WildcardNotAllowedError(operation);
  }
  return value;
};

export const makePath = (fields: PathFields): Path => {
  const result: PathFields = {
    kind: fields.kind,
    directory: Object.freeze([...fields.directory]),
  };
  if (fields.name !== undefined) {
    result.name = fields.name;
    if (fields.type !== undefined) result.type = fields.type;
    if (fields.version !== undefined) result.version = fields.version;
  }
  return Object.freeze(result);
};

export const emptyPath = (): Path => makePath({ kind: PATH_KIND.RELATIVE, directory: [] });

export const isDirectoryForm = (value: AnyPath): boolean => !isWildcard(value) && value.name === undefined;

export const isFileForm = (value: AnyPath): boolean => !isWildcard(value) && value.name !== undefined;

export const isAbsolute = (value: AnyPath): boolean => value.kind === PATH_KIND.ABSOLUTE;

export const directoryOf = (value: AnyPath): Path =>
  makePath({ kind: value.kind, directory: value.directory });

/** Treat a file-form path's leaf as one more directory component. */
export const asDirectory = (value: Path): Path =>
  value.name === undefined
    ? directoryOf(value)
    : makePath({ kind: value.kind, directory: [...value.directory, pathName(value)] });

export const childDirectory = (dir: Path, component: string): Path =>
  makePath({ kind: dir.kind, directory: [...dir.directory, component] });

export const childFile = (dir: Path, leaf: string): Path =>
  makePath({ kind: dir.kind, directory: dir.directory, ...splitLeaf(leaf) });

/**
 * Split a leaf segment into name and type at its last dot.
 * Dotfiles (".bashrc") and trailing dots keep the whole segment as the name.
 */
export const splitLeaf = (leaf: string): { name: string; type?: string } => {
  const dot = leaf.lastIndexOf('.');
  if (dot <= 0 || dot === leaf.length - 1) {
    return { name: leaf };
  }
  return { name: leaf.slice(0, dot), type: leaf.slice(dot + 1) };
};

const toSegments = (text: string): { absolute: boolean; segments: string[]; trailing: boolean } => {
  const unified = path.sep === '\\' ? text.replace(/\\/g, '/') : text;
  return {
    absolute: unified.startsWith('/'),
    segments: unified.split('/').filter((segment) => segment.length > 0),
    trailing: unified.endsWith('/'),
  };
};

const kindOf = (absolute: boolean): PathKind => (absolute ? PATH_KIND.ABSOLUTE : PATH_KIND.RELATIVE);

/**
 * Parse a host path string. A trailing separator, or a final "." / "..",
 * yields a directory-form path; otherwise the last segment is the file leaf.
 */
export const parsePath = (text: string): Path => {
  const { absolute, segments, trailing } = toSegments(text);
  const last = segments[segments.length - 1];

  if (last === undefined || trailing || last === SELF_COMPONENT || last === PARENT_COMPONENT) {
    return makePath({ kind: kindOf(absolute), directory: segments });
  }

  return makePath({
    kind: kindOf(absolute),
    directory: segments.slice(0, -1),
    ...splitLeaf(last),
  });
};

/** Parse a host path string treating every segment as a directory component. */
export const parseDirectoryPath = (text: string): Path => {
  const { absolute, segments } = toSegments(text);
  return makePath({ kind: kindOf(absolute), directory: segments });
};

export const pathName = (value: AnyPath): string => {
  if (value.name === undefined) {
    return '';
  }
  return value.type === undefined ? value.name : `${value.name}.${value.type}`;
};

/**
 * Render a path in host syntax. Directory-form paths end with a separator;
 * the empty relative path renders as "./".
 */
export const formatPath = (value: AnyPath): string => {
  const prefix = isAbsolute(value) ? '/' : '';
  const directories = value.directory.map((component) => `${component}/`).join('');
  const leaf = pathName(value);

  if (!isAbsolute(value) && directories === '' && leaf === '') {
    return './';
  }
  return `${prefix}${directories}${leaf}`;
};

/**
 * Reduce the directory components to normal form: drop ".", cancel ".."
 * against a preceding real component, keep ".." that has nothing to cancel.
 */
export const canonicalize = (value: AnyPath): Path => {
  const concrete = assertConcrete(value, 'canonicalize');
  const stack: string[] = [];

  for (const component of concrete.directory) {
    if (component === SELF_COMPONENT) {
      continue;
    }
    if (component === PARENT_COMPONENT) {
      const top = stack[stack.length - 1];
      if (top !== undefined && top !== PARENT_COMPONENT) {
        stack.pop();
      } else {
        stack.push(component);
      }
      continue;
    }
    stack.push(component);
  }

  return makePath({ ...concrete, directory: stack });
};

export const pathsEqual = (left: AnyPath, right: AnyPath): boolean => {
  const a = canonicalize(left);
  const b = canonicalize(right);
  return (
    a.kind === b.kind &&
    a.name === b.name &&
    a.type === b.type &&
    a.version === b.version &&
    a.directory.length === b.directory.length &&
    a.directory.every((component, index) => component === b.directory[index])
  );
};
