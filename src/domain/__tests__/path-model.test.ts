import { WildcardNotAllowedError } from '../errors';
import { directoryWildcard } from '../path-composer';
import {
  PATH_KIND,
  asDirectory,
  canonicalize,
  emptyPath,
  formatPath,
  makePath,
  parseDirectoryPath,
  parsePath,
  pathsEqual,
} from '../path-model';

const canonical = (text: string) => formatPath(canonicalize(parsePath(text)));

describe('parsePath', () => {
  it('should split a relative file path into directory, name and type', () => {
    const parsed = parsePath('docs/guide/intro.md');

    expect(parsed.kind).toBe(PATH_KIND.RELATIVE);
    expect(parsed.directory).toEqual(['docs', 'guide']);
    expect(parsed.name).toBe('intro');
    expect(parsed.type).toBe('md');
  });

  it('should treat a trailing separator as directory form', () => {
    const parsed = parsePath('/var/log/');

    expect(parsed.kind).toBe(PATH_KIND.ABSOLUTE);
    expect(parsed.directory).toEqual(['var', 'log']);
    expect(parsed.name).toBeUndefined();
  });

  it('should treat a final parent reference as a directory component', () => {
    expect(parsePath('a/..').directory).toEqual(['a', '..']);
    expect(parsePath('a/..').name).toBeUndefined();
  });

  it('should keep dotfiles whole', () => {
    const parsed = parsePath('home/.bashrc');

    expect(parsed.name).toBe('.bashrc');
    expect(parsed.type).toBeUndefined();
  });

  it('should split only at the last dot', () => {
    const parsed = parsePath('archive.tar.gz');

    expect(parsed.name).toBe('archive.tar');
    expect(parsed.type).toBe('gz');
  });

  it('should parse every segment as a directory with parseDirectoryPath', () => {
    expect(parseDirectoryPath('/srv/site.d').directory).toEqual(['srv', 'site.d']);
  });

  it('should return frozen values', () => {
    const parsed = parsePath('a/b/c.txt');

    expect(Object.isFrozen(parsed)).toBe(true);
    expect(Object.isFrozen(parsed.directory)).toBe(true);
  });
});

describe('formatPath', () => {
  it('should render directory form with a trailing separator', () => {
    expect(formatPath(parsePath('/var/log/'))).toBe('/var/log/');
    expect(formatPath(parsePath('src/lib/'))).toBe('src/lib/');
  });

  it('should render the empty relative path as ./', () => {
    expect(formatPath(emptyPath())).toBe('./');
  });

  it('should render the absolute root as /', () => {
    expect(formatPath(parsePath('/'))).toBe('/');
  });
});

describe('canonicalize', () => {
  it('should cancel a parent reference against the preceding component', () => {
    expect(canonical('a/b/../c/')).toBe('a/c/');
  });

  it('should keep a leading parent reference in a relative path', () => {
    expect(canonical('../a/')).toBe('../a/');
  });

  it('should drop self references', () => {
    expect(canonical('a/./b/')).toBe('a/b/');
  });

  it('should keep a parent reference at the root of an absolute path', () => {
    expect(canonical('/../x/')).toBe('/../x/');
  });

  it('should not cancel a parent reference against a retained one', () => {
    expect(canonical('../../a/../b/')).toBe('../../b/');
  });

  it('should preserve the file fields', () => {
    const result = canonicalize(parsePath('/x/./y/../report.tar.gz'));

    expect(result.directory).toEqual(['x']);
    expect(result.name).toBe('report.tar');
    expect(result.type).toBe('gz');
    expect(formatPath(result)).toBe('/x/report.tar.gz');
  });

  it('should preserve the version field', () => {
    const versioned = makePath({ kind: PATH_KIND.RELATIVE, directory: ['a', '.'], name: 'notes', type: 'txt', version: '3' });

    expect(canonicalize(versioned).version).toBe('3');
  });

  it('should canonicalize the empty path to a relative path with no components', () => {
    const result = canonicalize(parsePath(''));

    expect(result.kind).toBe(PATH_KIND.RELATIVE);
    expect(result.directory).toEqual([]);
  });

  it('should be idempotent', () => {
    const samples = ['', './', '../', '/..', 'a/b/../../..', '/a/./b/../../c/d.txt', '../x/./../y/', 'a/../../b/'];

    for (const sample of samples) {
      const once = canonicalize(parsePath(sample));
      const twice = canonicalize(once);
      expect(pathsEqual(once, twice)).toBe(true);
      expect(twice.directory).toEqual(once.directory);
    }
  });

  it('should reject wildcard paths', () => {
    const wildcard = directoryWildcard(parsePath('a/'));

    expect(() => canonicalize(wildcard)).toThrow(WildcardNotAllowedError);
  });
});

describe('pathsEqual', () => {
  it('should compare canonical forms', () => {
    expect(pathsEqual(parsePath('a/./b/../c/'), parsePath('a/c/'))).toBe(true);
  });

  it('should distinguish relative from absolute paths with the same components', () => {
    expect(pathsEqual(parsePath('a/'), parsePath('/a/'))).toBe(false);
  });

  it('should distinguish directory form from file form', () => {
    expect(pathsEqual(parsePath('a/b/'), parsePath('a/b'))).toBe(false);
  });
});

describe('asDirectory', () => {
  it('should turn a file leaf into a directory component', () => {
    expect(formatPath(asDirectory(parsePath('/srv/site.d')))).toBe('/srv/site.d/');
  });
});
