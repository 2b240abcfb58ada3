import type { Dirent, Stats } from 'node:fs';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import type { InputEnumerator } from '../../../domain/video-container/index.js';
import { AppError } from '../../../shared/errors/app-error.js';
import { hasErrorCode } from '../../../shared/errors/errno.js';
import { createChildLogger } from '../../../shared/logger/pino.js';

import { isVideoFile } from './video-extensions.js';

export class FileSystemInputEnumerator implements InputEnumerator {
  private readonly logger = createChildLogger({ module: 'FileSystemInputEnumerator' });

  /**
   * A file is returned as-is whatever its extension. A directory yields the
   * allow-listed video files below it, ordered one path component at a time
   * (`clips/a.mp4` comes before `clips-2.mp4`).
   */
  public async enumerate(root: string, recursive: boolean): Promise<string[]> {
    const resolved = path.resolve(root);
    const stats = await statOrUndefined(resolved);

    if (stats?.isFile()) {
      return [resolved];
    }

    if (!stats?.isDirectory()) {
      throw AppError.notFound(`Input path not found: ${root}`, { path: resolved });
    }

    const files = await this.collectFiles(resolved, recursive);
    const inputs = files.filter(isVideoFile).sort(byPathComponents(resolved));

    this.logger.debug(
      { root: resolved, recursive, scanned: files.length, matched: inputs.length },
      'Enumerated input directory',
    );

    return inputs;
  }

  private async collectFiles(directory: string, recursive: boolean): Promise<string[]> {
    const entries: Dirent[] = await fs.readdir(directory, { withFileTypes: true });
    const files: string[] = [];

    for (const entry of entries) {
      const entryPath = path.join(directory, entry.name);

      if (entry.isFile()) {
        files.push(entryPath);
      } else if (entry.isDirectory()) {
        if (recursive) {
          files.push(...(await this.collectFiles(entryPath, recursive)));
        }
      } else if (entry.isSymbolicLink()) {
        // Links to files count; links to directories are not descended into
        const target = await statOrUndefined(entryPath);
        if (target?.isFile()) {
          files.push(entryPath);
        }
      }
    }

    return files;
  }
}

function byPathComponents(root: string): (left: string, right: string) => number {
  const split = (filePath: string): string[] => path.relative(root, filePath).split(path.sep);

  return (left, right) => {
    const a = split(left);
    const b = split(right);

    for (let i = 0; i < Math.min(a.length, b.length); i += 1) {
      if (a[i] !== b[i]) {
        return a[i] < b[i] ? -1 : 1;
      }
    }
    return a.length - b.length;
  };
}

async function statOrUndefined(filePath: string): Promise<Stats | undefined> {
  try {
    return await fs.stat(filePath);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) {
      return undefined;
    }
    throw error;
  }
}
