import type { EnvironmentVariables } from '../../../shared/config/env.js';

export type LibraryPathVariable = 'PATH' | 'DYLD_LIBRARY_PATH' | 'LD_LIBRARY_PATH';

export function libraryPathVariable(platform: NodeJS.Platform): LibraryPathVariable {
  switch (platform) {
    case 'win32':
      return 'PATH';
    case 'darwin':
      return 'DYLD_LIBRARY_PATH';
    default:
      return 'LD_LIBRARY_PATH';
  }
}

export function pathListDelimiter(platform: NodeJS.Platform): string {
  return platform === 'win32' ? ';' : ':';
}

/**
 * Copy of `env` with `libraryDir` prepended to the platform's shared-library
 * search variable. Without a library directory the copy is unchanged.
 */
export function prepareExecutionEnvironment(
  env: EnvironmentVariables,
  libraryDir: string | undefined,
  platform: NodeJS.Platform,
): Record<string, string | undefined> {
  const prepared: Record<string, string | undefined> = { ...env };
  if (!libraryDir) {
    return prepared;
  }

  const variable = libraryPathVariable(platform);
  // Windows keeps the original casing of Path
  const key =
    platform === 'win32'
      ? (Object.keys(prepared).find((name) => name.toUpperCase() === variable) ?? variable)
      : variable;

  const current = prepared[key];
  prepared[key] = current ? `${libraryDir}${pathListDelimiter(platform)}${current}` : libraryDir;
  return prepared;
}
