import path from 'node:path';

export const INTERMEDIATE_EXTENSION = '.webm';

export const CONTAINER_EXTENSION = '.video';

export interface OutputPaths {
  readonly intermediatePath: string;
  readonly finalPath: string;
}

/**
 * Outputs are flattened into `outputDir`: `clips/intro.mp4` becomes
 * `<outputDir>/intro.webm` and `<outputDir>/intro.video`.
 */
export function deriveOutputPaths(sourcePath: string, outputDir: string): OutputPaths {
  const stem = path.parse(sourcePath).name;
  const root = path.resolve(outputDir);

  return {
    intermediatePath: path.join(root, `${stem}${INTERMEDIATE_EXTENSION}`),
    finalPath: path.join(root, `${stem}${CONTAINER_EXTENSION}`),
  };
}
