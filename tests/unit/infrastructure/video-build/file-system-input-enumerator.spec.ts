import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FileSystemInputEnumerator, isVideoFile } from '@/infrastructure/video-build/index.js';
import { AppErrorCode } from '@/shared/errors/app-error.js';

let root: string;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), 'input-enumerator-'));
  await fs.mkdir(path.join(root, 'nested', 'deeper'), { recursive: true });
  await fs.mkdir(path.join(root, 'folder.mp4'));
  await Promise.all(
    ['c.mov', 'b.MP4', 'a.mp4', 'notes.txt', 'README', 'nested/d.mkv', 'nested/deeper/e.Webm', 'nested/skip.srt'].map(
      (name) => fs.writeFile(path.join(root, name), name),
    ),
  );
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe('FileSystemInputEnumerator', () => {
  const enumerator = new FileSystemInputEnumerator();

  it('keeps allow-listed extensions of direct children, case-insensitively and sorted', async () => {
    await expect(enumerator.enumerate(root, false)).resolves.toEqual([
      path.join(root, 'a.mp4'),
      path.join(root, 'b.MP4'),
      path.join(root, 'c.mov'),
    ]);
  });

  it('descends into subdirectories when recursive', async () => {
    await expect(enumerator.enumerate(root, true)).resolves.toEqual([
      path.join(root, 'a.mp4'),
      path.join(root, 'b.MP4'),
      path.join(root, 'c.mov'),
      path.join(root, 'nested', 'd.mkv'),
      path.join(root, 'nested', 'deeper', 'e.Webm'),
    ]);
  });

  it('orders a directory before siblings that extend its name', async () => {
    const clips = path.join(root, 'ordering');
    await fs.mkdir(path.join(clips, 'clips'), { recursive: true });
    await Promise.all(
      [path.join('clips', 'a.mp4'), 'clips-2.mp4', 'clips.mp4'].map((name) =>
        fs.writeFile(path.join(clips, name), ''),
      ),
    );

    await expect(enumerator.enumerate(clips, true)).resolves.toEqual([
      path.join(clips, 'clips', 'a.mp4'),
      path.join(clips, 'clips-2.mp4'),
      path.join(clips, 'clips.mp4'),
    ]);
  });

  it('returns an explicitly named file whatever its extension', async () => {
    await expect(enumerator.enumerate(path.join(root, 'notes.txt'), false)).resolves.toEqual([
      path.join(root, 'notes.txt'),
    ]);
  });

  it('returns nothing for a directory without videos', async () => {
    const empty = path.join(root, 'empty');
    await fs.mkdir(empty);

    await expect(enumerator.enumerate(empty, true)).resolves.toEqual([]);
  });

  it('follows symbolic links to files', async () => {
    await fs.symlink(path.join(root, 'nested', 'd.mkv'), path.join(root, 'linked.mkv'));

    await expect(enumerator.enumerate(root, false)).resolves.toContain(path.join(root, 'linked.mkv'));
  });

  it('fails with NotFound for a missing path', async () => {
    const missing = path.join(root, 'does-not-exist');

    await expect(enumerator.enumerate(missing, false)).rejects.toMatchObject({
      code: AppErrorCode.NotFound,
      message: `Input path not found: ${missing}`,
    });
  });
});

describe('isVideoFile', () => {
  const cases: Array<[string, boolean]> = [
    ['movie.mpeg', true],
    ['MOVIE.FLV', true],
    ['clip.m4v', true],
    ['archive.mp4.zip', false],
    ['.mp4', false],
    ['noext', false],
  ];

  it.each(cases)('%s -> %s', (name, expected) => {
    expect(isVideoFile(name)).toBe(expected);
  });
});
