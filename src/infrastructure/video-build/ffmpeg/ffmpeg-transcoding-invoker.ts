import type {
  ConversionJob,
  EncoderProcess,
  TranscodingInvoker,
} from '../../../domain/video-container/index.js';
import type { EnvironmentVariables } from '../../../shared/config/env.js';
import { AppError } from '../../../shared/errors/app-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';

import { prepareExecutionEnvironment } from './execution-environment.js';
import type { ResolvedFfmpeg } from './ffmpeg-locator.js';
import { SpawnEncoderProcess } from './spawn-encoder-process.js';
import { buildVp9Arguments } from './vp9-arguments.js';

export interface FfmpegTranscodingInvokerOptions {
  readonly ffmpeg: ResolvedFfmpeg;
  readonly process?: EncoderProcess;
  /** Base environment for the encoder; defaults to the current process environment. */
  readonly env?: EnvironmentVariables;
  readonly platform?: NodeJS.Platform;
}

export class FfmpegTranscodingInvoker implements TranscodingInvoker {
  private readonly logger = createChildLogger({ module: 'FfmpegTranscodingInvoker' });

  private readonly binary: string;

  private readonly encoder: EncoderProcess;

  private readonly environment: EnvironmentVariables;

  public constructor(options: FfmpegTranscodingInvokerOptions) {
    this.binary = options.ffmpeg.binary;
    this.encoder = options.process ?? new SpawnEncoderProcess();
    this.environment = prepareExecutionEnvironment(
      options.env ?? process.env,
      options.ffmpeg.libraryDir,
      options.platform ?? process.platform,
    );
  }

  public async transcode(job: ConversionJob): Promise<void> {
    const args = buildVp9Arguments(job);

    this.logger.debug({ source: job.sourcePath, binary: this.binary, args }, 'Invoking ffmpeg');

    const result = await this.encoder.run({ binary: this.binary, args, env: this.environment });

    if (result.exitCode !== 0) {
      this.logger.debug(
        { source: job.sourcePath, exitCode: result.exitCode, signal: result.signal },
        'ffmpeg exited unsuccessfully',
      );
      throw AppError.encodingFailed({
        sourcePath: job.sourcePath,
        output: result.output,
        exitCode: result.exitCode,
        signal: result.signal,
      });
    }
  }
}
