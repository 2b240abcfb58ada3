import { constants, promises as fs } from 'node:fs';
import path from 'node:path';

import type { EnvironmentVariables } from '../../../shared/config/env.js';
import { AppError } from '../../../shared/errors/app-error.js';

import { pathListDelimiter } from './execution-environment.js';

export type FfmpegSource = 'explicit' | 'bundled' | 'path';

export interface ResolvedFfmpeg {
  readonly binary: string;
  /** Shared libraries shipped next to a bundled binary. */
  readonly libraryDir?: string;
  readonly source: FfmpegSource;
}

export interface FfmpegLocatorOptions {
  readonly explicitPath?: string;
  readonly toolRoot?: string;
  readonly platform?: NodeJS.Platform;
  readonly env?: EnvironmentVariables;
}

const DEFAULT_PATHEXT = '.COM;.EXE;.BAT;.CMD';

/**
 * Resolution order: explicit path, then `<toolRoot>/third_party/ffmpeg/bin/ffmpeg`
 * (with `../lib` as library directory when present), then the first match on PATH.
 */
export async function resolveFfmpeg(options: FfmpegLocatorOptions = {}): Promise<ResolvedFfmpeg> {
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;

  if (options.explicitPath) {
    return { binary: options.explicitPath, source: 'explicit' };
  }

  if (options.toolRoot) {
    const bundled = await findBundledFfmpeg(options.toolRoot, platform);
    if (bundled) {
      return bundled;
    }
  }

  const onPath = await findOnPath('ffmpeg', env, platform);
  if (onPath) {
    return { binary: onPath, source: 'path' };
  }

  throw AppError.notFound('ffmpeg not found in PATH (or use --ffmpeg)', { platform });
}

export function bundledFfmpegPath(toolRoot: string, platform: NodeJS.Platform): string {
  const executable = platform === 'win32' ? 'ffmpeg.exe' : 'ffmpeg';
  return path.join(toolRoot, 'third_party', 'ffmpeg', 'bin', executable);
}

async function findBundledFfmpeg(
  toolRoot: string,
  platform: NodeJS.Platform,
): Promise<ResolvedFfmpeg | undefined> {
  const binary = bundledFfmpegPath(toolRoot, platform);
  if (!(await isFile(binary))) {
    return undefined;
  }

  const libraryDir = path.join(toolRoot, 'third_party', 'ffmpeg', 'lib');
  return (await isDirectory(libraryDir))
    ? { binary, libraryDir, source: 'bundled' }
    : { binary, source: 'bundled' };
}

export async function findOnPath(
  command: string,
  env: EnvironmentVariables,
  platform: NodeJS.Platform,
): Promise<string | undefined> {
  const searchPath = platform === 'win32' ? readWindowsVariable(env, 'PATH') : env.PATH;
  if (!searchPath) {
    return undefined;
  }

  const extensions =
    platform === 'win32'
      ? (readWindowsVariable(env, 'PATHEXT') ?? DEFAULT_PATHEXT).split(';').filter(Boolean)
      : [''];

  for (const directory of searchPath.split(pathListDelimiter(platform))) {
    if (!directory) {
      continue;
    }

    for (const extension of extensions) {
      const candidate = path.join(directory, `${command}${extension}`);
      if (await isExecutableFile(candidate, platform)) {
        return candidate;
      }
    }
  }

  return undefined;
}

function readWindowsVariable(env: EnvironmentVariables, name: string): string | undefined {
  const key = Object.keys(env).find((candidate) => candidate.toUpperCase() === name);
  return key === undefined ? undefined : env[key];
}

async function isExecutableFile(candidate: string, platform: NodeJS.Platform): Promise<boolean> {
  if (!(await isFile(candidate))) {
    return false;
  }
  if (platform === 'win32') {
    return true;
  }

  try {
    await fs.access(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

async function isFile(candidate: string): Promise<boolean> {
  try {
    return (await fs.stat(candidate)).isFile();
  } catch {
    return false;
  }
}

async function isDirectory(candidate: string): Promise<boolean> {
  try {
    return (await fs.stat(candidate)).isDirectory();
  } catch {
    return false;
  }
}
