import path from 'node:path';

import { AppError } from '../../../shared/errors/app-error.js';
import type { EncodingConfiguration } from '../value-objects/encoding-configuration.js';
import { deriveOutputPaths } from '../value-objects/file-naming.js';

export interface ConversionJobProps {
  readonly sourcePath: string;
  readonly outputDir: string;
  readonly configuration: EncodingConfiguration;
}

export class ConversionJob {
  public readonly sourcePath: string;

  public readonly intermediatePath: string;

  public readonly finalPath: string;

  public readonly configuration: EncodingConfiguration;

  private constructor(
    sourcePath: string,
    intermediatePath: string,
    finalPath: string,
    configuration: EncodingConfiguration,
  ) {
    this.sourcePath = sourcePath;
    this.intermediatePath = intermediatePath;
    this.finalPath = finalPath;
    this.configuration = configuration;
  }

  public static create(props: ConversionJobProps): ConversionJob {
    const sourcePath = path.resolve(props.sourcePath);
    const { intermediatePath, finalPath } = deriveOutputPaths(sourcePath, props.outputDir);

    // A .webm source inside the output directory would be encoded onto itself
    if (intermediatePath === sourcePath) {
      throw AppError.validation(
        'video-build.intermediate-collides-with-source',
        { sourcePath, intermediatePath },
        `Intermediate file would overwrite its own source: ${sourcePath}`,
      );
    }

    return new ConversionJob(sourcePath, intermediatePath, finalPath, props.configuration);
  }

  public get name(): string {
    return path.basename(this.sourcePath);
  }
}
