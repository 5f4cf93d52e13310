import * as fs from 'fs-extra';
import * as path from 'path';
import os from 'os';

import { DirectoryLister } from '../directory-lister';
import { NodeFileSystem } from '../../../infrastructure/node-file-system';
import { WildcardNotAllowedError } from '../../../domain/errors';
import { directoryWildcard } from '../../../domain/path-composer';
import { formatPath, parseDirectoryPath } from '../../../domain/path-model';
import type { DirectoryEntry } from '../../../domain/directory-entry';

const describeEntries = (entries: DirectoryEntry[]) =>
  entries.map((entry) => [entry.kind, formatPath(entry.path)]);

describe('DirectoryLister', () => {
  let tempDir: string;
  let lister: DirectoryLister;

  beforeEach(async () => {
    tempDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'fs-toolkit-lister-')));
    lister = new DirectoryLister(new NodeFileSystem());

    await fs.writeFile(path.join(tempDir, 'a.txt'), 'alpha');
    await fs.mkdir(path.join(tempDir, 'sub'));
    await fs.symlink(path.join(tempDir, 'a.txt'), path.join(tempDir, 'link'));
    await fs.symlink(path.join(tempDir, 'a.txt'), path.join(tempDir, 'link2'));
    await fs.symlink(path.join(tempDir, 'missing'), path.join(tempDir, 'dangling'));
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  it('should list entries as seen when not following links', async () => {
    const entries = await lister.listDirectory(parseDirectoryPath(tempDir), { followSymlinks: false });

    expect(describeEntries(entries)).toEqual([
      ['file', `${tempDir}/a.txt`],
      ['symlink', `${tempDir}/dangling`],
      ['symlink', `${tempDir}/link`],
      ['symlink', `${tempDir}/link2`],
      ['directory', `${tempDir}/sub/`],
    ]);
  });

  it('should resolve links and drop duplicates when following links', async () => {
    const entries = await lister.listDirectory(parseDirectoryPath(tempDir), { followSymlinks: true });

    expect(describeEntries(entries)).toEqual([
      ['file', `${tempDir}/a.txt`],
      ['symlink', `${tempDir}/dangling`],
      ['directory', `${tempDir}/sub/`],
    ]);
  });

  it('should resolve links that point outside the listed directory', async () => {
    const outside = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'fs-toolkit-outside-')));
    try {
      await fs.writeFile(path.join(outside, 'x.txt'), 'x');
      await fs.symlink(path.join(outside, 'x.txt'), path.join(tempDir, 'external'));

      const entries = await lister.listDirectory(parseDirectoryPath(tempDir), { followSymlinks: true });

      expect(describeEntries(entries)).toContainEqual(['file', `${outside}/x.txt`]);
    } finally {
      await fs.remove(outside);
    }
  });

  it('should default to not following links', async () => {
    const entries = await lister.listDirectory(parseDirectoryPath(tempDir));

    expect(entries).toHaveLength(5);
  });

  it('should return the same order on repeated calls', async () => {
    const first = await lister.listDirectory(parseDirectoryPath(tempDir));
    const second = await lister.listDirectory(parseDirectoryPath(tempDir));

    expect(describeEntries(second)).toEqual(describeEntries(first));
  });

  it('should reject a wildcard directory', async () => {
    const wildcard = directoryWildcard(parseDirectoryPath(tempDir));

    await expect(lister.listDirectory(wildcard)).rejects.toThrow(WildcardNotAllowedError);
  });
});
